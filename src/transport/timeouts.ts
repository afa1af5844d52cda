import * as http from 'http';
import * as https from 'https';
import type { TimeoutPhase } from '@/errors/error-types';

/**
 * Raised by the transport when one of its timeouts fires
 */
export class TransportTimeoutError extends Error {
  public readonly code = 'ETIMEDOUT';
  public readonly phase: TimeoutPhase;
  public readonly timeoutMs: number;

  constructor(phase: TimeoutPhase, timeoutMs: number) {
    super(`${phase} timeout of ${timeoutMs}ms exceeded`);
    this.name = 'TransportTimeoutError';
    this.phase = phase;
    this.timeoutMs = timeoutMs;
  }
}

export interface SocketTimeouts {
  connectMs: number;
  socketMs: number;
}

export interface ConnectingSocket {
  readonly connecting: boolean;
  once(event: 'connect', listener: () => void): unknown;
}

/**
 * The parts of a node ClientRequest the timeout guard touches
 */
export interface GuardedRequest {
  setTimeout(timeoutMs: number, callback: () => void): unknown;
  once(event: 'socket', listener: (socket: ConnectingSocket) => void): unknown;
  once(event: 'close', listener: () => void): unknown;
  destroy(error?: Error): unknown;
}

/**
 * Arm connect and socket-inactivity timeouts on a request. Reused keep-alive
 * sockets are already connected and only get the inactivity timeout.
 */
export function guardRequest(req: GuardedRequest, timeouts: SocketTimeouts): void {
  req.setTimeout(timeouts.socketMs, () => {
    req.destroy(new TransportTimeoutError('socket', timeouts.socketMs));
  });

  req.once('socket', (socket) => {
    if (!socket.connecting) return;

    const timer = setTimeout(() => {
      req.destroy(new TransportTimeoutError('connect', timeouts.connectMs));
    }, timeouts.connectMs);

    socket.once('connect', () => clearTimeout(timer));
    req.once('close', () => clearTimeout(timer));
  });
}

/**
 * Node request function handed to axios as its `transport`, so that connect
 * and socket timeouts apply to every request it makes
 */
export function createTimedRequester(timeouts: SocketTimeouts) {
  return {
    request(options: http.RequestOptions, callback?: (res: http.IncomingMessage) => void): http.ClientRequest {
      const req = options.protocol === 'https:' ? https.request(options, callback) : http.request(options, callback);
      guardRequest(req, timeouts);
      return req;
    },
  };
}
