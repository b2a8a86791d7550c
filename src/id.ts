import { nanoid } from 'nanoid'

/** Source of opaque, globally unique event ids. */
export interface IdGenerator {
  next(): string
}

export const nanoidGenerator: IdGenerator = {
  next: () => nanoid(),
}
