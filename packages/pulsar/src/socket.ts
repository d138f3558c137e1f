import { ConnectionLostError } from '@mqbridge/core';
import { WebSocket } from 'ws';

/**
 * Open a WebSocket and resolve once the handshake completes. A refused
 * upgrade (401, 404 ...) rejects with the HTTP status in the message.
 */
export function openSocket(
   url: string,
   headers: Record<string, string>,
   timeoutMs: number,
): Promise<WebSocket> {
   return new Promise((resolve, reject) => {
      const socket = new WebSocket(url, { headers, handshakeTimeout: timeoutMs });
      let settled = false;

      const fail = (err: Error) => {
         if (settled) return;
         settled = true;
         reject(err);
         socket.terminate();
      };

      socket.on('error', fail);
      socket.once('unexpected-response', (_req, res) =>
         fail(new Error(`WebSocket upgrade to ${url} refused with HTTP ${res.statusCode}`)),
      );
      socket.once('open', () => {
         settled = true;
         socket.off('error', fail);
         resolve(socket);
      });
   });
}

/** Serialize `frame` and resolve once the socket has written it. */
export function sendFrame(socket: WebSocket, frame: object): Promise<void> {
   return new Promise((resolve, reject) => {
      if (socket.readyState !== WebSocket.OPEN) {
         reject(new ConnectionLostError('Pulsar socket is not open'));
         return;
      }
      socket.send(JSON.stringify(frame), (err) =>
         err ? reject(new ConnectionLostError('Pulsar socket write failed', { cause: err })) : resolve(),
      );
   });
}

export function frameText(data: WebSocket.RawData): string {
   if (Buffer.isBuffer(data)) return data.toString('utf8');
   if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
   return Buffer.from(data).toString('utf8');
}
