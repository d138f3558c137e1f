import { describe, expect, it } from 'vitest';
import { QueueConnection } from './connection';
import { createLogger } from './logger';
import type { MessageHandle } from './message-handle';
import { MemoryAdapter, type MemoryAdapterOptions } from './testing/memory-adapter';

const logger = createLogger({ level: 'silent' });

async function open(overrides: { prefetch?: number } = {}, options: MemoryAdapterOptions = {}) {
   const adapter = new MemoryAdapter(options);
   const connection = await QueueConnection.open(
      {
         brokerClient: 'rabbitmq',
         address: 'memory',
         queueName: 'jobs',
         receiveTimeout: 20,
         ...overrides,
      },
      { adapter, logger },
   );
   return { adapter, connection };
}

const bytes = (handle: MessageHandle | undefined) => Array.from(handle?.payload ?? []);

describe('Publisher and Consumer', () => {
   it('round-trips arbitrary bytes', async () => {
      const { connection } = await open();
      const publisher = connection.publisher();

      await publisher.send(new Uint8Array());
      await publisher.send(Uint8Array.from([0xff, 0xfe, 0x00, 0x80]));
      await publisher.send('héllo');
      const handles = await connection.consumer().poll(10);

      expect(handles).toHaveLength(3);
      expect(bytes(handles[0])).toEqual([]);
      expect(bytes(handles[1])).toEqual([0xff, 0xfe, 0x00, 0x80]);
      expect(handles[2]?.text()).toBe('héllo');
      expect(bytes(handles[2])).toEqual([0x68, 0xc3, 0xa9, 0x6c, 0x6c, 0x6f]);
   });

   it('carries JSON and headers', async () => {
      const { connection } = await open();

      await connection.publisher().sendJson({ order: 42 }, { headers: { tenant: 'acme' } });
      const [handle] = await connection.consumer().poll();

      expect(handle?.json()).toEqual({ order: 42 });
      expect(handle?.headers).toEqual({ tenant: 'acme' });
      expect(handle?.redeliveryCount).toBe(0);
      expect(handle?.enqueuedAt).toBeInstanceOf(Date);
   });

   it('returns an empty batch on timeout', async () => {
      const { connection } = await open();

      await expect(connection.consumer().poll()).resolves.toEqual([]);
   });

   it('clamps a batch to the adapter maximum', async () => {
      const { connection } = await open({ prefetch: 5 }, { capabilities: { maxPrefetch: 3 } });
      const publisher = connection.publisher();
      for (let i = 0; i < 5; i++) await publisher.send(`m${i}`);
      const consumer = connection.consumer();

      const handles = await consumer.poll(5);

      expect(consumer.batchLimit).toBe(3);
      expect(handles).toHaveLength(3);
   });

   it('takes one message at a time without batching support', async () => {
      const { connection } = await open({}, { capabilities: { prefetchBatching: false } });
      await connection.publisher().send('a');
      await connection.publisher().send('b');

      await expect(connection.consumer().poll(10)).resolves.toHaveLength(1);
   });

   it('defaults the batch size to the configured prefetch', async () => {
      const { connection } = await open({ prefetch: 2 });
      for (const body of ['a', 'b', 'c']) await connection.publisher().send(body);

      await expect(connection.consumer().poll()).resolves.toHaveLength(2);
   });

   it('lets competing consumers share the queue', async () => {
      const { connection } = await open();
      for (const body of ['a', 'b', 'c', 'd']) await connection.publisher().send(body);

      const first = await connection.consumer().poll(2);
      const second = await connection.consumer().poll(2);

      const ids = [...first, ...second].map((handle) => handle.id);
      expect(new Set(ids).size).toBe(4);
   });

   it('tracks every polled handle until it is settled', async () => {
      const { connection } = await open();
      await connection.publisher().send('a');
      const [handle] = await connection.consumer().poll();
      expect(connection.health().pendingHandles).toBe(1);

      await handle?.ack();

      expect(connection.health().pendingHandles).toBe(0);
   });

   describe('messages', () => {
      it('streams until the queue stays idle', async () => {
         const { connection } = await open();
         for (const body of ['a', 'b', 'c']) await connection.publisher().send(body);
         const seen: string[] = [];

         for await (const handle of connection.consumer().messages({ inactivityTimeoutMs: 30 })) {
            seen.push(handle.text());
            await handle.ack();
         }

         expect(seen).toEqual(['a', 'b', 'c']);
      });

      it('stops when aborted', async () => {
         const { connection } = await open();
         await connection.publisher().send('only');
         const controller = new AbortController();
         const seen: string[] = [];

         for await (const handle of connection.consumer().messages({ signal: controller.signal })) {
            seen.push(handle.text());
            controller.abort();
         }

         expect(seen).toEqual(['only']);
      });
   });
});
