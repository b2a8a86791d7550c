import {
  CodecNotRegisteredError,
  Event,
  EventStoreClient,
  EventTypeMismatchError,
  EventTypeRequiredError,
  InvalidMetadataError,
  MsgpackCodec,
  SequenceConflictError,
  TypeNotRegisteredError,
  TypeRegistry,
  typeOf,
} from '../src'
import {
  createStore,
  OrderPlaced,
  OrderShipped,
  orderTypes,
  placed,
  shipped,
  silentLogger,
  START,
  Unregistered,
} from './utils'

const bytes = (text: string) => new TextEncoder().encode(text)
const tick = () => new Promise((resolve) => setImmediate(resolve))

class ValidatedOrder {
  id = ''

  validate() {
    if (!this.id) throw new Error('order id required')
  }
}

describe('raw payloads', () => {
  test('append fills in the event and load returns it', async () => {
    // Given
    const { store } = await createStore()
    const event = { type: 'order-placed', data: bytes('one') }

    // When
    const sequence = await store.append('orders.1', event)

    // Then
    expect(sequence).toBe(1)
    expect(event).toEqual({
      id: 'id-1',
      type: 'order-placed',
      time: START,
      data: bytes('one'),
      subject: 'orders.1',
      sequence: 1,
    })
    expect(await store.load('orders.1')).toEqual({
      events: [
        {
          id: 'id-1',
          type: 'order-placed',
          time: START,
          data: bytes('one'),
          meta: {},
          subject: 'orders.1',
          sequence: 1,
        },
      ],
      sequence: 1,
    })
  })

  test('every event needs a type', async () => {
    const { log, store } = await createStore()
    const publish = jest.spyOn(log, 'publish')

    await expect(
      store.append('orders.1', { data: bytes('one') }),
    ).rejects.toThrow(EventTypeRequiredError)
    expect(publish).not.toHaveBeenCalled()
  })
})

describe('append', () => {
  test('decodes typed payloads into their classes', async () => {
    const { store } = await createStore({ types: orderTypes() })

    await store.append('orders.1', [{ data: placed('1') }, { data: shipped('1') }])
    const { events } = await store.load('orders.1')

    expect(events.map((e) => e.type)).toEqual(['order-placed', 'order-shipped'])
    expect(events[0].data).toBeInstanceOf(OrderPlaced)
    expect(events[0].data).toEqual(placed('1'))
    expect(events[1].data).toBeInstanceOf(OrderShipped)
  })

  test('publishes the envelope as headers', async () => {
    // Given
    const { log, store } = await createStore({ types: orderTypes() })
    const publish = jest.spyOn(log, 'publish')

    // When
    await store.append(
      'orders.1',
      { data: placed('1'), meta: { user: 'test-user' } },
      { expectedSequence: 0 },
    )

    // Then
    expect(publish).toHaveBeenCalledWith(
      'orders',
      {
        subject: 'orders.1',
        id: 'id-1',
        data: bytes('{"id":"1"}'),
        headers: {
          'Event-Type': 'order-placed',
          'Event-Time': '2019-09-20T14:00:00.000Z',
          'Event-Codec': 'json',
          'Event-Meta-user': 'test-user',
        },
        expectedLastSubjectSequence: 0,
      },
      undefined,
    )
  })

  test('sequences grow across subjects', async () => {
    const { store } = await createStore({ types: orderTypes() })

    expect(await store.append('orders.1', { data: placed('1') })).toBe(1)
    expect(await store.append('orders.2', { data: placed('2') })).toBe(2)
    expect(await store.append('orders.1', { data: shipped('1') })).toBe(3)
  })

  test('an empty batch publishes nothing', async () => {
    const { log, store } = await createStore()
    const publish = jest.spyOn(log, 'publish')

    expect(await store.append('orders.1', [])).toBe(0)
    expect(publish).not.toHaveBeenCalled()
  })

  test('re-appending an event with the same id is a no-op', async () => {
    const { store } = await createStore({ types: orderTypes() })
    const event = { data: placed('1') }

    expect(await store.append('orders.1', event)).toBe(1)
    expect(await store.append('orders.1', event)).toBe(1)
    expect(await store.append('orders.1', { ...event })).toBe(1)
    expect((await store.info()).messages).toBe(1)
  })

  test('keeps explicit ids and times', async () => {
    const { store } = await createStore({ types: orderTypes() })
    const time = new Date('2020-01-01T00:00:00.000Z')

    await store.append('orders.1', { id: 'order-1-placed', time, data: placed('1') })
    const { events } = await store.load('orders.1')

    expect(events[0].id).toBe('order-1-placed')
    expect(events[0].time).toEqual(time)
  })

  test('carries metadata through', async () => {
    const { store } = await createStore({ types: orderTypes() })

    await store.append('orders.1', {
      data: placed('1'),
      meta: { user: 'test-user', 'correlation-id': 'c-1' },
    })
    const { events } = await store.load('orders.1')

    expect(events[0].meta).toEqual({ user: 'test-user', 'correlation-id': 'c-1' })
  })

  const invalid: Array<[Event, string]> = [
    [{ data: new Unregistered() }, 'no registered type for Unregistered'],
    [{ data: undefined }, 'event data required'],
    [{ data: null }, 'event data required'],
    [
      { type: 'order-shipped', data: placed('1') },
      'wrong type for event data: order-shipped (registered as order-placed)',
    ],
  ]

  test.each(invalid)('rejects %p before publishing', async (event, message) => {
    const { log, store } = await createStore({ types: orderTypes() })
    const publish = jest.spyOn(log, 'publish')

    await expect(
      store.append('orders.1', [{ data: placed('0') }, event]),
    ).rejects.toThrow(message)
    expect(publish).not.toHaveBeenCalled()
  })

  const unsafe: Array<Record<string, string>> = [
    { 'trace id': 'x' },
    { 'trace:id': 'x' },
    { '': 'x' },
    { trace: 'two\nlines' },
    { trace: ' padded' },
  ]

  test.each(unsafe)('refuses metadata %p before publishing', async (meta) => {
    const { log, store } = await createStore({ types: orderTypes() })
    const publish = jest.spyOn(log, 'publish')

    await expect(
      store.append('orders.1', [{ data: placed('1') }, { data: placed('2'), meta }]),
    ).rejects.toThrow(InvalidMetadataError)
    expect(publish).not.toHaveBeenCalled()
  })

  test('names the offending metadata key', async () => {
    const { store } = await createStore({ types: orderTypes() })

    await expect(
      store.append('orders.1', { data: placed('1'), meta: { 'trace id': 'x' } }),
    ).rejects.toThrow('invalid metadata "trace id": " " is not allowed in a key')
  })

  test('payloads can travel as msgpack', async () => {
    const types = new TypeRegistry(
      { 'order-placed': typeOf(OrderPlaced) },
      { codec: new MsgpackCodec() },
    )
    const { log, store } = await createStore({ types })
    const publish = jest.spyOn(log, 'publish')

    await store.append('orders.1', { data: placed('1') })
    const { events } = await store.load('orders.1')

    expect(publish.mock.calls[0][1].headers['Event-Codec']).toBe('msgpack')
    expect(events[0].data).toBeInstanceOf(OrderPlaced)
    expect(events[0].data).toEqual(placed('1'))
  })

  test('a declared type must match the registered one', async () => {
    const { store } = await createStore({ types: orderTypes() })

    await expect(
      store.append('orders.1', { type: 'order-shipped', data: placed('1') }),
    ).rejects.toThrow(EventTypeMismatchError)
  })

  test('validation failures surface unchanged', async () => {
    const types = new TypeRegistry({
      'order-placed': typeOf(OrderPlaced),
      'validated-order': typeOf(ValidatedOrder),
    })
    const { log, store } = await createStore({ types })
    const publish = jest.spyOn(log, 'publish')

    await expect(
      store.append('orders.1', [
        { data: placed('1') },
        { data: new ValidatedOrder() },
      ]),
    ).rejects.toThrow(new Error('order id required'))
    expect(publish).not.toHaveBeenCalled()
  })

  test('subjects outside the stream are refused', async () => {
    const { store } = await createStore({ types: orderTypes() })

    await expect(
      store.append('invoices.1', { data: placed('1') }),
    ).rejects.toThrow('subject invoices.1 is not bound to stream orders')
  })
})

describe('optimistic concurrency', () => {
  test('a stale expectation is a conflict', async () => {
    const { store } = await createStore({ types: orderTypes() })
    await store.append('orders.1', { data: placed('1') })

    const stale = store.append(
      'orders.1',
      { data: shipped('1') },
      { expectedSequence: 0 },
    )

    await expect(stale).rejects.toThrow(SequenceConflictError)
    await expect(stale).rejects.toThrow(
      'sequence conflict on orders.1: expected last sequence 0',
    )
    expect(
      await store.append('orders.1', { data: shipped('1') }, { expectedSequence: 1 }),
    ).toBe(2)
  })

  test('only one of two racing writers wins', async () => {
    const { store } = await createStore({ types: orderTypes() })

    const results = await Promise.allSettled([
      store.append('orders.1', { data: placed('1') }, { expectedSequence: 0 }),
      store.append('orders.1', { data: placed('1') }, { expectedSequence: 0 }),
    ])

    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected'])
    expect((await store.load('orders.1')).events).toHaveLength(1)
  })

  test('expectations are scoped to the subject', async () => {
    const { store } = await createStore({ types: orderTypes() })
    await store.append('orders.1', { data: placed('1') })

    expect(
      await store.append('orders.2', { data: placed('2') }, { expectedSequence: 0 }),
    ).toBe(2)
  })

  test('only the first event of a batch carries the expectation', async () => {
    const { log, store } = await createStore({ types: orderTypes() })
    const publish = jest.spyOn(log, 'publish')

    const sequence = await store.append(
      'orders.1',
      [{ data: placed('1') }, { data: shipped('1') }],
      { expectedSequence: 0 },
    )

    expect(sequence).toBe(2)
    expect(publish.mock.calls[0][1].expectedLastSubjectSequence).toBe(0)
    expect(publish.mock.calls[1][1].expectedLastSubjectSequence).toBeUndefined()
  })
})

describe('load', () => {
  test('an unknown subject is empty', async () => {
    const { log, store } = await createStore()
    const read = jest.spyOn(log, 'read')

    expect(await store.load('orders.9')).toEqual({ events: [], sequence: 0 })
    expect(read).not.toHaveBeenCalled()
  })

  test('resumes after a sequence', async () => {
    // Given
    const { log, store } = await createStore({ types: orderTypes() })
    for (const id of ['1', '2', '3', '4']) {
      await store.append('orders.1', { data: placed(id) })
    }
    const read = jest.spyOn(log, 'read')

    // When
    const partial = await store.load('orders.1', { afterSequence: 2 })
    const current = await store.load('orders.1', { afterSequence: 4 })

    // Then
    expect(partial.events.map((e) => e.sequence)).toEqual([3, 4])
    expect(partial.sequence).toBe(4)
    expect(current).toEqual({ events: [], sequence: 4 })
    expect(read).toHaveBeenCalledTimes(1)
  })

  test('matches wildcard subjects', async () => {
    const { store } = await createStore({ types: orderTypes() })
    await store.append('orders.1', { data: placed('1') })
    await store.append('orders.2', { data: placed('2') })
    await store.append('orders.1', { data: shipped('1') })

    const { events, sequence } = await store.load('orders.*')

    expect(sequence).toBe(3)
    expect(events.map((e) => e.subject)).toEqual(['orders.1', 'orders.2', 'orders.1'])
  })

  test('stops at the last sequence seen when it started', async () => {
    const { log, store } = await createStore({ types: orderTypes() })
    for (const id of ['1', '2', '3']) {
      await store.append('orders.1', { data: placed(id) })
    }
    jest.spyOn(log, 'lastSequence').mockResolvedValue(2)

    const { events, sequence } = await store.load('orders.1')

    expect(sequence).toBe(2)
    expect(events.map((e) => e.sequence)).toEqual([1, 2])
  })

  test('can be aborted while reading', async () => {
    const { log, store } = await createStore({ types: orderTypes() })
    await store.append('orders.1', { data: placed('1') })
    jest.spyOn(log, 'lastSequence').mockResolvedValue(5)
    const controller = new AbortController()

    const loading = store.load('orders.1', { signal: controller.signal })
    await tick()
    controller.abort(new Error('stopped'))

    await expect(loading).rejects.toThrow('stopped')
  })

  test('fails when the read ends short', async () => {
    const { log, store } = await createStore({ types: orderTypes() })
    for (const id of ['1', '2', '3']) {
      await store.append('orders.1', { data: placed(id) })
    }
    jest.spyOn(log, 'lastSequence').mockResolvedValue(5)

    const loading = store.load('orders.1')
    await tick()
    await log.deleteStream('orders')

    await expect(loading).rejects.toThrow(
      'read of orders.1 ended at sequence 3 before 5',
    )
  })

  test('refuses payloads written with another codec', async () => {
    const { log, store } = await createStore()
    await store.append('orders.1', { type: 'order-placed', data: bytes('{"id":"1"}') })
    const typed = new EventStoreClient(log, {
      types: orderTypes(),
      logger: silentLogger,
    }).get('orders')

    await expect(typed.load('orders.1')).rejects.toThrow(
      new CodecNotRegisteredError('binary'),
    )
  })

  test('refuses types the reader does not know', async () => {
    class OrderCancelled {
      id = ''
    }
    const writerTypes = new TypeRegistry({
      'order-placed': typeOf(OrderPlaced),
      'order-cancelled': typeOf(OrderCancelled),
    })
    const { log, store } = await createStore({ types: writerTypes })
    await store.append('orders.1', { data: new OrderCancelled() })
    const reader = new EventStoreClient(log, {
      types: orderTypes(),
      logger: silentLogger,
    }).get('orders')

    await expect(reader.load('orders.1')).rejects.toThrow(
      new TypeNotRegisteredError('order-cancelled'),
    )
  })
})
