import { describe, it, expect, vi, beforeEach } from 'vitest'
import {
    ConnectError,
    ConnectionLostError,
    PublishError,
    QueueConflictError,
    create,
    createLogger,
    parseQueueConfiguration,
    type QueueConfigurationInput,
} from '@mqbridge/core'
import { AckPolicy, NatsError, RetentionPolicy, connect, headers, type NatsConnection } from 'nats'
import { NatsAdapter, toDurableName, toStreamName } from './index'

// Keep the real header / enum helpers, mock the network entry point
vi.mock('nats', async (importOriginal) => ({
    ...(await importOriginal<typeof import('nats')>()),
    connect: vi.fn(),
}))

vi.mock('ulid', () => ({
    ulid: () => '01HZX0TEST0ULID0000000000',
}))

const logger = createLogger({ level: 'silent' })

const defaultConfig: QueueConfigurationInput = {
    brokerClient: 'nats',
    address: 'localhost:4222, nats://backup:4222',
    queueName: 'orders.created',
    subscriptionName: 'billing.workers',
    ackDeadline: '30s',
}

const notFound = () => new NatsError('stream not found', '404')

function jsMsg(seq: number, body: string, deliveryCount = 1, hdrs: Record<string, string> = {}) {
    const h = headers()
    for (const [key, value] of Object.entries(hdrs)) h.set(key, value)
    return {
        seq,
        data: new TextEncoder().encode(body),
        headers: h,
        info: { stream: 'ORDERS_CREATED', redeliveryCount: deliveryCount, timestampNanos: 1_700_000_000_000_000_000 },
        ack: vi.fn(),
        nak: vi.fn(),
    }
}

function batchOf(messages: ReturnType<typeof jsMsg>[]) {
    return Object.assign(
        (async function* () {
            yield* messages
        })(),
        { stop: vi.fn() },
    )
}

function fakeNats() {
    const consumer = { fetch: vi.fn().mockResolvedValue(batchOf([])) }
    const js = {
        publish: vi.fn().mockResolvedValue({ stream: 'ORDERS_CREATED', seq: 42, duplicate: false }),
        consumers: { get: vi.fn().mockResolvedValue(consumer) },
    }
    const jsm = {
        streams: {
            info: vi.fn().mockResolvedValue({ config: { subjects: ['orders.created'] } }),
            add: vi.fn().mockResolvedValue({}),
        },
        consumers: {
            info: vi.fn().mockResolvedValue({ config: { ack_policy: AckPolicy.Explicit } }),
            add: vi.fn().mockResolvedValue({}),
        },
    }
    let closed = false
    const nc = {
        jetstream: vi.fn().mockReturnValue(js),
        jetstreamManager: vi.fn().mockResolvedValue(jsm),
        isClosed: vi.fn().mockImplementation(() => closed),
        close: vi.fn().mockImplementation(async () => {
            closed = true
        }),
        closed: vi.fn().mockReturnValue(new Promise<void>(() => {})),
        kill: () => {
            closed = true
        },
    }
    return { nc, js, jsm, consumer }
}

describe('NatsAdapter', () => {
    let fake: ReturnType<typeof fakeNats>
    let adapter: NatsAdapter

    const build = (overrides: Partial<QueueConfigurationInput> = {}) =>
        new NatsAdapter(parseQueueConfiguration({ ...defaultConfig, ...overrides }), logger)

    beforeEach(async () => {
        vi.clearAllMocks()
        fake = fakeNats()
        const connection: Partial<NatsConnection> = fake.nc
        vi.mocked(connect).mockResolvedValue(connection as NatsConnection)

        adapter = build()
        await adapter.connect()
    })

    describe('naming', () => {
        it('derives stream and durable names', () => {
            expect(toStreamName('orders.created')).toBe('ORDERS_CREATED')
            expect(toDurableName('billing.workers')).toBe('billing_workers')
            expect(adapter.stream).toBe('ORDERS_CREATED')
            expect(adapter.durable).toBe('billing_workers')
        })

        it('normalizes the server list', () => {
            expect(adapter.servers).toEqual(['nats://localhost:4222', 'nats://backup:4222'])
        })
    })

    describe('connect', () => {
        it('connects with name and token', async () => {
            await build({ authToken: 'test-secret' }).connect()

            expect(connect).toHaveBeenLastCalledWith({
                servers: ['nats://localhost:4222', 'nats://backup:4222'],
                name: 'mqbridge',
                token: 'test-secret',
            })
        })

        it('wraps failures in ConnectError', async () => {
            vi.mocked(connect).mockRejectedValueOnce(new Error('CONNECTION_REFUSED'))

            await expect(build().connect()).rejects.toBeInstanceOf(ConnectError)
        })

        it('closes the connection when JetStream is unavailable', async () => {
            const cause = new NatsError('jetstream not enabled', '503')
            fake.nc.jetstreamManager.mockRejectedValueOnce(cause)
            const other = build({ options: { jsDomain: 'edge' } })

            const failure = await other.connect().catch((err: unknown) => err)

            expect(failure).toBeInstanceOf(ConnectError)
            expect(failure).toHaveProperty(
                'message',
                'JetStream is not available at nats://localhost:4222,nats://backup:4222 in domain "edge"',
            )
            expect(failure).toHaveProperty('cause', cause)
            expect(fake.nc.close).toHaveBeenCalledTimes(1)
            expect(other.isConnected()).toBe(false)
        })

        it('reports a closed connection as lost', async () => {
            fake.nc.kill()

            expect(adapter.isConnected()).toBe(false)
            await expect(adapter.publish(new Uint8Array())).rejects.toBeInstanceOf(ConnectionLostError)
        })
    })

    describe('declareQueue', () => {
        it('creates a missing work-queue stream and durable consumer', async () => {
            fake.jsm.streams.info.mockRejectedValueOnce(notFound())
            fake.jsm.consumers.info.mockRejectedValueOnce(notFound())

            await adapter.declareQueue('orders.created')

            expect(fake.jsm.streams.add).toHaveBeenCalledWith({
                name: 'ORDERS_CREATED',
                subjects: ['orders.created'],
                retention: RetentionPolicy.Workqueue,
                num_replicas: 1,
            })
            expect(fake.jsm.consumers.add).toHaveBeenCalledWith('ORDERS_CREATED', {
                durable_name: 'billing_workers',
                ack_policy: AckPolicy.Explicit,
                ack_wait: 30_000_000_000,
                filter_subject: 'orders.created',
                max_deliver: -1,
            })
        })

        it('reuses what already exists', async () => {
            await adapter.declareQueue('orders.created')

            expect(fake.jsm.streams.add).not.toHaveBeenCalled()
            expect(fake.jsm.consumers.add).not.toHaveBeenCalled()
        })

        it('rejects a stream bound to other subjects', async () => {
            fake.jsm.streams.info.mockResolvedValueOnce({ config: { subjects: ['orders.*.v2'] } })

            await expect(adapter.declareQueue('orders.created')).rejects.toBeInstanceOf(QueueConflictError)
        })

        it('rejects a consumer without explicit acks', async () => {
            fake.jsm.consumers.info.mockResolvedValueOnce({ config: { ack_policy: AckPolicy.None } })

            await expect(adapter.declareQueue('orders.created')).rejects.toBeInstanceOf(QueueConflictError)
        })
    })

    describe('publish', () => {
        it('publishes with a de-duplication id and headers', async () => {
            const receipt = await adapter.publish(new Uint8Array([1, 2]), { headers: { tenant: 'acme' } })

            expect(receipt).toEqual({ messageId: '01HZX0TEST0ULID0000000000', brokerId: 'ORDERS_CREATED:42' })
            const [subject, payload, options] = fake.js.publish.mock.calls[0] ?? []
            expect(subject).toBe('orders.created')
            expect(payload).toEqual(new Uint8Array([1, 2]))
            expect(options.msgID).toBe('01HZX0TEST0ULID0000000000')
            expect(options.headers.get('messageId')).toBe('01HZX0TEST0ULID0000000000')
            expect(options.headers.get('tenant')).toBe('acme')
        })

        it('raises PublishError when JetStream refuses the message', async () => {
            fake.js.publish.mockRejectedValueOnce(new Error('no responders'))

            await expect(adapter.publish(new Uint8Array())).rejects.toBeInstanceOf(PublishError)
        })
    })

    describe('receive', () => {
        it('fetches a batch from the durable consumer', async () => {
            fake.consumer.fetch.mockResolvedValueOnce(
                batchOf([jsMsg(5, 'a', 1, { messageId: 'msg-5', tenant: 'acme' }), jsMsg(6, 'b', 3)]),
            )

            const messages = await adapter.receive(10, 200)

            expect(fake.js.consumers.get).toHaveBeenCalledWith('ORDERS_CREATED', 'billing_workers')
            expect(fake.consumer.fetch).toHaveBeenCalledWith({ max_messages: 10, expires: 1_000 })
            expect(messages).toEqual([
                {
                    id: 'msg-5',
                    receipt: '1:5',
                    payload: new TextEncoder().encode('a'),
                    headers: { tenant: 'acme' },
                    enqueuedAt: new Date(1_700_000_000_000),
                    redeliveryCount: 0,
                },
                {
                    id: 'ORDERS_CREATED:6',
                    receipt: '1:6',
                    payload: new TextEncoder().encode('b'),
                    headers: {},
                    enqueuedAt: new Date(1_700_000_000_000),
                    redeliveryCount: 2,
                },
            ])
        })

        it('passes longer timeouts through as the pull expiry', async () => {
            await adapter.receive(1, 5_000)

            expect(fake.consumer.fetch).toHaveBeenCalledWith({ max_messages: 1, expires: 5_000 })
        })

        it('stops the pull when aborted', async () => {
            let release = () => {}
            const done = new Promise<void>((resolve) => {
                release = resolve
            })
            const batch = Object.assign(
                (async function* () {
                    await done
                })(),
                { stop: vi.fn(() => release()) },
            )
            fake.consumer.fetch.mockResolvedValueOnce(batch)
            const controller = new AbortController()

            const pending = adapter.receive(1, 60_000, controller.signal)
            controller.abort()

            await expect(pending).resolves.toEqual([])
            expect(batch.stop).toHaveBeenCalledTimes(1)
        })

        it('returns nothing for an already aborted signal', async () => {
            const controller = new AbortController()
            controller.abort()

            await expect(adapter.receive(1, 5_000, controller.signal)).resolves.toEqual([])
            expect(fake.consumer.fetch).not.toHaveBeenCalled()
        })
    })

    describe('settlement', () => {
        it('acks a delivery once', async () => {
            const jm = jsMsg(5, 'a')
            fake.consumer.fetch.mockResolvedValueOnce(batchOf([jm]))
            const [message] = await adapter.receive(1, 0)
            if (!message) throw new Error('expected a message')

            await adapter.ack(message)
            await adapter.ack(message)

            expect(jm.ack).toHaveBeenCalledTimes(1)
        })

        it('naks with the requested delay', async () => {
            const jm = jsMsg(5, 'a')
            fake.consumer.fetch.mockResolvedValueOnce(batchOf([jm]))
            const [message] = await adapter.receive(1, 0)
            if (!message) throw new Error('expected a message')

            await adapter.nack(message, 2_500)

            expect(jm.nak).toHaveBeenCalledWith(2_500)
        })

        it('naks immediately without a delay', async () => {
            const jm = jsMsg(5, 'a')
            fake.consumer.fetch.mockResolvedValueOnce(batchOf([jm]))
            const [message] = await adapter.receive(1, 0)
            if (!message) throw new Error('expected a message')

            await adapter.nack(message)

            expect(jm.nak).toHaveBeenCalledWith()
        })

        it('forgets an expired delivery and leaves redelivery to ack_wait', async () => {
            const jm = jsMsg(5, 'a')
            fake.consumer.fetch.mockResolvedValueOnce(batchOf([jm]))
            const [message] = await adapter.receive(1, 0)
            if (!message) throw new Error('expected a message')

            await adapter.expire(message)
            await adapter.ack(message)

            expect(jm.nak).not.toHaveBeenCalled()
            expect(jm.ack).not.toHaveBeenCalled()
        })
    })

    describe('disconnect', () => {
        it('closes the connection once', async () => {
            await adapter.disconnect()
            await adapter.disconnect()

            expect(fake.nc.close).toHaveBeenCalledTimes(1)
            expect(adapter.isConnected()).toBe(false)
        })
    })

    it('registers itself for brokerClient "nats"', () => {
        expect(create(parseQueueConfiguration(defaultConfig), logger)).toBeInstanceOf(NatsAdapter)
    })
})
