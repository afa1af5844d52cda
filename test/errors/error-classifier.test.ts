import { describe, expect, it } from 'vitest';
import { AxiosError, AxiosHeaders, CanceledError } from 'axios';
import { classify } from '@/errors/error-classifier';
import {
  CancelledError,
  ClientError,
  ErrorCode,
  type ErrorContext,
  ServerError,
  TimeoutError,
  UnknownError,
} from '@/errors/error-types';
import type { TransportOutcome } from '@/interfaces/transport';
import { HttpMethod } from '@/models/types';
import { SerializationError } from '@/serialization/json-serializer';
import { TransportTimeoutError } from '@/transport/timeouts';

const context: ErrorContext = { method: HttpMethod.GET, url: 'https://api.example.com/items', attempt: 0 };

function statusOutcome(status: number, body = ''): TransportOutcome {
  return { type: 'response', response: { status, statusText: '', headers: { 'content-type': 'text/plain' }, body } };
}

function thrown(error: unknown): TransportOutcome {
  return { type: 'exception', error };
}

describe('classify', () => {
  describe('responses', () => {
    it('maps 4xx statuses to ClientError', () => {
      const error = classify(statusOutcome(404, 'missing'), context);

      expect(error).toBeInstanceOf(ClientError);
      expect(error).toMatchObject({
        kind: 'client',
        statusCode: 404,
        body: 'missing',
        headers: { 'content-type': 'text/plain' },
        code: ErrorCode.CLIENT_NOT_FOUND,
        context,
      });
      expect(error.message).toBe('Client error 404');
    });

    it('maps 5xx statuses to ServerError', () => {
      const error = classify(statusOutcome(503), context);

      expect(error).toBeInstanceOf(ServerError);
      expect(error.code).toBe(ErrorCode.SERVER_UNAVAILABLE);
      expect(error.getStatusCode()).toBe(503);
    });

    it('maps other statuses to UnknownError', () => {
      const error = classify(statusOutcome(302), context);

      expect(error).toBeInstanceOf(UnknownError);
      expect(error.code).toBe(ErrorCode.UNEXPECTED_STATUS);
      expect(error.message).toBe('Unexpected HTTP status 302');
    });

    it('covers the boundaries of each range', () => {
      expect(classify(statusOutcome(400)).kind).toBe('client');
      expect(classify(statusOutcome(499)).kind).toBe('client');
      expect(classify(statusOutcome(500)).kind).toBe('server');
      expect(classify(statusOutcome(599)).kind).toBe('server');
      expect(classify(statusOutcome(600)).kind).toBe('unknown');
    });
  });

  describe('exceptions', () => {
    it('returns a NetworkError unchanged', () => {
      const original = new CancelledError(context);

      expect(classify(thrown(original))).toBe(original);
    });

    it('maps transport timeouts to TimeoutError with their phase', () => {
      const error = classify(thrown(new TransportTimeoutError('connect', 100)), context);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({ phase: 'connect', code: ErrorCode.TIMEOUT_CONNECT });
      expect(error.message).toBe('connect timeout of 100ms exceeded');
    });

    it('finds a transport timeout wrapped by axios', () => {
      const wrapped = AxiosError.from(new TransportTimeoutError('socket', 50), 'ETIMEDOUT');

      expect(classify(thrown(wrapped))).toMatchObject({ kind: 'timeout', phase: 'socket' });
    });

    it('maps axios timeout codes to TimeoutError', () => {
      const error = classify(thrown(new AxiosError('timeout of 10ms exceeded', 'ECONNABORTED')));

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error.code).toBe(ErrorCode.TIMEOUT);
    });

    it('maps cancellations to CancelledError', () => {
      const abort = new Error('This operation was aborted');
      abort.name = 'AbortError';

      expect(classify(thrown(new CanceledError()))).toBeInstanceOf(CancelledError);
      expect(classify(thrown(abort))).toBeInstanceOf(CancelledError);
    });

    it('applies the status rules to an axios error carrying a response', () => {
      const error = new AxiosError('Request failed', 'ERR_BAD_RESPONSE', undefined, undefined, {
        status: 500,
        statusText: 'Internal Server Error',
        data: 'oops',
        headers: {},
        config: { headers: new AxiosHeaders() },
      });

      expect(classify(thrown(error), context)).toMatchObject({ kind: 'server', statusCode: 500, body: 'oops' });
    });

    it('maps decode failures to UnknownError', () => {
      const error = classify(thrown(new SerializationError('Response body is not valid JSON')));

      expect(error).toBeInstanceOf(UnknownError);
      expect(error.code).toBe(ErrorCode.DECODE_FAILED);
    });

    it('maps connection failures to UnknownError', () => {
      const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9'), { code: 'ECONNREFUSED' });
      const error = classify(thrown(refused));

      expect(error).toBeInstanceOf(UnknownError);
      expect(error.code).toBe(ErrorCode.CONNECTION_FAILED);
      expect(error.cause).toBe(refused);
    });

    it('wraps values that are not errors', () => {
      const error = classify(thrown('boom'));

      expect(error).toBeInstanceOf(UnknownError);
      expect(error.message).toBe('Unknown error: boom');
      expect(error.code).toBe(ErrorCode.UNKNOWN);
    });
  });

  it('yields equal errors for the same outcome', () => {
    const outcomes: TransportOutcome[] = [
      statusOutcome(429, 'slow down'),
      statusOutcome(502),
      thrown(new TransportTimeoutError('request', 30_000)),
      thrown(new CanceledError()),
      thrown(new Error('socket hang up')),
    ];

    for (const outcome of outcomes) {
      const first = classify(outcome, context);
      const second = classify(outcome, context);

      expect(second).not.toBe(first);
      expect(second.constructor).toBe(first.constructor);
      expect(second.serialize()).toEqual(first.serialize());
    }
  });
});
