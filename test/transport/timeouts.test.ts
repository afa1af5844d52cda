import { EventEmitter } from 'events';
import { describe, expect, it, vi } from 'vitest';
import { guardRequest, TransportTimeoutError, type ConnectingSocket, type GuardedRequest } from '@/transport/timeouts';

class FakeSocket extends EventEmitter implements ConnectingSocket {
  constructor(public connecting: boolean) {
    super();
  }
}

class FakeRequest extends EventEmitter implements GuardedRequest {
  public destroyedWith?: Error;
  public inactivity?: { timeoutMs: number; callback: () => void };

  setTimeout(timeoutMs: number, callback: () => void): this {
    this.inactivity = { timeoutMs, callback };
    return this;
  }

  destroy(error?: Error): this {
    this.destroyedWith = error;
    this.emit('close');
    return this;
  }
}

const timeouts = { connectMs: 100, socketMs: 500 };

describe('guardRequest', () => {
  it('destroys the request when the connection is not made in time', () => {
    vi.useFakeTimers();
    const req = new FakeRequest();
    guardRequest(req, timeouts);

    req.emit('socket', new FakeSocket(true));
    vi.advanceTimersByTime(100);

    expect(req.destroyedWith).toEqual(new TransportTimeoutError('connect', 100));
    expect(req.destroyedWith).toMatchObject({ phase: 'connect', timeoutMs: 100, code: 'ETIMEDOUT' });
  });

  it('clears the connect timer once connected', () => {
    vi.useFakeTimers();
    const req = new FakeRequest();
    const socket = new FakeSocket(true);
    guardRequest(req, timeouts);

    req.emit('socket', socket);
    vi.advanceTimersByTime(50);
    socket.emit('connect');
    vi.advanceTimersByTime(1000);

    expect(req.destroyedWith).toBeUndefined();
  });

  it('does not arm a connect timer for a reused socket', () => {
    vi.useFakeTimers();
    const req = new FakeRequest();
    guardRequest(req, timeouts);

    req.emit('socket', new FakeSocket(false));
    vi.advanceTimersByTime(1000);

    expect(req.destroyedWith).toBeUndefined();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('clears the connect timer when the request closes', () => {
    vi.useFakeTimers();
    const req = new FakeRequest();
    guardRequest(req, timeouts);

    req.emit('socket', new FakeSocket(true));
    req.emit('close');

    expect(vi.getTimerCount()).toBe(0);
  });

  it('destroys the request after socket inactivity', () => {
    const req = new FakeRequest();
    guardRequest(req, timeouts);

    expect(req.inactivity?.timeoutMs).toBe(500);
    req.inactivity?.callback();

    expect(req.destroyedWith).toEqual(new TransportTimeoutError('socket', 500));
  });
});
