import axios from 'axios';
import type { TransportOutcome, TransportResponse } from '@/interfaces/transport';
import { SerializationError } from '@/serialization/json-serializer';
import { TransportTimeoutError } from '@/transport/timeouts';
import {
  CancelledError,
  ClientError,
  ErrorCode,
  type ErrorContext,
  isNetworkError,
  type NetworkError,
  ServerError,
  TimeoutError,
  UnknownError,
} from './error-types';

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ECONNABORTED', 'ESOCKETTIMEDOUT']);
const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'EPIPE']);

/**
 * Map the outcome of a failed attempt to exactly one member of the taxonomy.
 *
 * Pure: the same outcome always yields an equal error, and nothing else is
 * touched.
 */
export function classify(outcome: TransportOutcome, context?: ErrorContext): NetworkError {
  if (outcome.type === 'response') {
    return classifyResponse(outcome.response, context);
  }
  return classifyException(outcome.error, context);
}

function classifyResponse(response: TransportResponse, context?: ErrorContext): NetworkError {
  const { status, body, headers } = response;

  if (status >= 400 && status <= 499) {
    return new ClientError(status, body, headers, context);
  }
  if (status >= 500 && status <= 599) {
    return new ServerError(status, body, headers, context);
  }
  return new UnknownError(`Unexpected HTTP status ${status}`, ErrorCode.UNEXPECTED_STATUS, context);
}

function classifyException(error: unknown, context?: ErrorContext): NetworkError {
  if (isNetworkError(error)) {
    return error;
  }

  const timeout = findTimeout(error);
  if (timeout) {
    return new TimeoutError(timeout.message, timeout.phase, context, error);
  }

  if (isCancellation(error)) {
    return new CancelledError(context, error);
  }

  if (axios.isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new TimeoutError(error.message, undefined, context, error);
    }
    if (error.response) {
      return classifyResponse(
        {
          status: error.response.status,
          statusText: error.response.statusText,
          headers: {},
          body: typeof error.response.data === 'string' ? error.response.data : '',
        },
        context
      );
    }
  }

  if (error instanceof SerializationError) {
    const code = error.operation === 'encode' ? ErrorCode.ENCODE_FAILED : ErrorCode.DECODE_FAILED;
    return new UnknownError(error.message, code, context, error);
  }

  if (error instanceof Error) {
    const code = errorCode(error);
    if (error.name === 'TimeoutError' || (code !== undefined && TIMEOUT_CODES.has(code))) {
      return new TimeoutError(error.message, undefined, context, error);
    }
    if (code !== undefined && CONNECTION_CODES.has(code)) {
      return new UnknownError(error.message, ErrorCode.CONNECTION_FAILED, context, error);
    }
    return new UnknownError(error.message || 'Unknown error', ErrorCode.UNKNOWN, context, error);
  }

  return new UnknownError(`Unknown error: ${String(error)}`, ErrorCode.UNKNOWN, context, error);
}

function findTimeout(error: unknown): TransportTimeoutError | undefined {
  if (error instanceof TransportTimeoutError) {
    return error;
  }
  if (error instanceof Error && error.cause instanceof TransportTimeoutError) {
    return error.cause;
  }
  return undefined;
}

function isCancellation(error: unknown): boolean {
  if (axios.isCancel(error)) {
    return true;
  }
  if (error instanceof Error) {
    return error.name === 'AbortError' || errorCode(error) === 'ERR_CANCELED' || errorCode(error) === 'ABORT_ERR';
  }
  return false;
}

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}
