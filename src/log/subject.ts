const SINGLE = '*'
const TAIL = '>'

/** NATS-style matching: `*` is one token, a trailing `>` one or more. */
export function subjectMatches(pattern: string, subject: string): boolean {
  const patternTokens = pattern.split('.')
  const subjectTokens = subject.split('.')

  for (let i = 0; i < patternTokens.length; i++) {
    const token = patternTokens[i]
    if (token === TAIL) return subjectTokens.length > i
    if (i >= subjectTokens.length) return false
    if (token !== SINGLE && token !== subjectTokens[i]) return false
  }

  return patternTokens.length === subjectTokens.length
}

export function isLiteralSubject(subject: string): boolean {
  return subject
    .split('.')
    .every((token) => token !== '' && token !== SINGLE && token !== TAIL)
}

export function isValidPattern(pattern: string): boolean {
  const tokens = pattern.split('.')
  return tokens.every(
    (token, i) =>
      token !== '' && (token !== TAIL || i === tokens.length - 1),
  )
}
