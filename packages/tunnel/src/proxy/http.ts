/**
 * HTTP CONNECT tunnel negotiation over an already-open connection to the proxy
 */

import type * as net from 'node:net';
import { formatHostPort, type TunnelTarget } from './types.js';

/** Upper bound for the proxy's response head */
const MAX_RESPONSE_HEAD = 16 * 1024;

export class HttpConnectRejectedError extends Error {
  constructor(readonly statusLine: string, readonly statusCode?: number) {
    super(`Proxy CONNECT failed: ${statusLine}`);
    this.name = 'HttpConnectRejectedError';
  }
}

export function buildConnectRequest(target: TunnelTarget): string {
  const authority = formatHostPort(target.host, target.port);
  return [
    `CONNECT ${authority} HTTP/1.1`,
    `Host: ${authority}`,
    'Connection: keep-alive',
    '\r\n',
  ].join('\r\n');
}

/**
 * Parse the status line of the proxy's response head.
 * Returns null when the line is not an HTTP/1.x status line.
 */
export function parseStatusLine(head: string): { statusCode: number; statusLine: string } | null {
  const statusLine = head.split('\r\n', 1)[0] ?? '';
  const match = statusLine.match(/^HTTP\/1\.[01]\s+(\d{3})(?:\s|$)/);
  if (!match) return null;
  return { statusCode: Number(match[1]), statusLine };
}

/**
 * Send `CONNECT host:port` and wait for a 2xx response head.
 * Bytes received past the head are pushed back onto the socket, which is
 * returned paused so nothing is lost before the caller starts reading.
 */
export function negotiateHttpConnect(socket: net.Socket, target: TunnelTarget): Promise<net.Socket> {
  return new Promise<net.Socket>((resolve, reject) => {
    const buffers: Buffer[] = [];
    let received = 0;

    const cleanup = () => {
      socket.removeListener('data', onData);
      socket.removeListener('error', onError);
      socket.removeListener('close', onClose);
    };

    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    const onClose = () => {
      cleanup();
      reject(new Error('Proxy closed the connection before completing CONNECT'));
    };

    const onData = (chunk: Buffer) => {
      buffers.push(chunk);
      received += chunk.length;
      const combined = Buffer.concat(buffers);
      const headerEnd = combined.indexOf('\r\n\r\n');
      if (headerEnd === -1) {
        if (received > MAX_RESPONSE_HEAD) {
          cleanup();
          reject(new Error(`Proxy CONNECT response head exceeds ${MAX_RESPONSE_HEAD} bytes`));
        }
        return;
      }

      cleanup();
      const head = combined.subarray(0, headerEnd).toString('latin1');
      const status = parseStatusLine(head);
      if (!status) {
        reject(new HttpConnectRejectedError(head.split('\r\n', 1)[0] ?? ''));
        return;
      }
      if (status.statusCode < 200 || status.statusCode > 299) {
        reject(new HttpConnectRejectedError(status.statusLine, status.statusCode));
        return;
      }

      socket.pause();
      const leftover = combined.subarray(headerEnd + 4);
      if (leftover.length > 0) {
        socket.unshift(leftover);
      }
      resolve(socket);
    };

    socket.on('data', onData);
    socket.once('error', onError);
    socket.once('close', onClose);
    socket.write(buildConnectRequest(target));
  });
}
