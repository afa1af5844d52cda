/**
 * Network error taxonomy surfaced by the client.
 * Every failed request ends in exactly one of these; callers match on `kind`
 * or on the class instead of parsing messages.
 */

import type { HttpHeaders, HttpMethod } from '@/models/types';

/**
 * Discriminant of the taxonomy
 */
export type NetworkErrorKind = 'client' | 'server' | 'timeout' | 'cancelled' | 'unknown';

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Specific error codes for different error types
 */
export enum ErrorCode {
  // Client errors (1000-1999)
  CLIENT_BAD_REQUEST = 1400,
  CLIENT_UNAUTHORIZED = 1401,
  CLIENT_FORBIDDEN = 1403,
  CLIENT_NOT_FOUND = 1404,
  CLIENT_RATE_LIMITED = 1429,
  CLIENT_ERROR = 1499,

  // Server errors (2000-2999)
  SERVER_ERROR = 2500,
  SERVER_UNAVAILABLE = 2503,

  // Timeouts (3000-3999)
  TIMEOUT_CONNECT = 3001,
  TIMEOUT_REQUEST = 3002,
  TIMEOUT_SOCKET = 3003,
  TIMEOUT = 3099,

  // Cancellation (4000-4999)
  CANCELLED = 4001,

  // Everything else (9000-9999)
  UNEXPECTED_STATUS = 9001,
  DECODE_FAILED = 9002,
  CONNECTION_FAILED = 9003,
  ENCODE_FAILED = 9004,
  UNKNOWN = 9999
}

/**
 * The request an error belongs to
 */
export interface ErrorContext {
  method?: HttpMethod;
  url?: string;
  /** zero-based attempt that produced the error */
  attempt?: number;
}

/**
 * Suggested actions for error recovery
 */
export interface ErrorSuggestion {
  action: string;
  description: string;
  priority: number;
  automated?: boolean;
}

/**
 * Serialized error format for logging and debugging
 */
export interface SerializedError {
  name: string;
  kind: NetworkErrorKind;
  message: string;
  code: ErrorCode;
  severity: ErrorSeverity;
  statusCode?: number;
  body?: string;
  suggestions: ErrorSuggestion[];
  context?: ErrorContext;
  cause?: {
    name: string;
    message: string;
  };
}

/**
 * Base class of the taxonomy
 */
export abstract class NetworkError extends Error {
  public abstract readonly kind: NetworkErrorKind;
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly suggestions: ErrorSuggestion[];
  public readonly context?: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode,
    severity: ErrorSeverity,
    suggestions: ErrorSuggestion[] = [],
    context?: ErrorContext,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.severity = severity;
    this.suggestions = suggestions;
    this.context = context;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for logging and debugging
   */
  public serialize(): SerializedError {
    const cause = this.cause instanceof Error
      ? { name: this.cause.name, message: this.cause.message }
      : this.cause === undefined ? undefined : { name: typeof this.cause, message: String(this.cause) };

    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      code: this.code,
      severity: this.severity,
      statusCode: this.getStatusCode(),
      body: this.getBody(),
      suggestions: this.suggestions,
      context: this.context,
      cause,
    };
  }

  public getStatusCode(): number | undefined {
    return undefined;
  }

  public getBody(): string | undefined {
    return undefined;
  }

  /**
   * Get primary suggestion for error recovery
   */
  public getPrimarySuggestion(): ErrorSuggestion | undefined {
    return [...this.suggestions].sort((a, b) => a.priority - b.priority)[0];
  }
}

/**
 * HTTP 4xx responses. Never retried.
 */
export class ClientError extends NetworkError {
  public readonly kind = 'client' as const;
  public readonly statusCode: number;
  public readonly body: string;
  public readonly headers: HttpHeaders;

  constructor(statusCode: number, body: string, headers: HttpHeaders = {}, context?: ErrorContext) {
    const suggestions: ErrorSuggestion[] = [];
    if (statusCode === 401 || statusCode === 403) {
      suggestions.push({
        action: 'check_credentials',
        description: 'Verify the auth strategy that applies to this path and method',
        priority: 1
      });
    } else if (statusCode === 429) {
      suggestions.push({
        action: 'reduce_request_rate',
        description: 'Slow down; the server is rate limiting this client',
        priority: 1
      });
    }
    suggestions.push({
      action: 'check_request',
      description: 'Check the URL, method, headers and body sent with the request',
      priority: 2
    });

    super(`Client error ${statusCode}`, clientErrorCode(statusCode), ErrorSeverity.MEDIUM, suggestions, context);
    this.statusCode = statusCode;
    this.body = body;
    this.headers = headers;
  }

  public getStatusCode(): number {
    return this.statusCode;
  }

  public getBody(): string {
    return this.body;
  }
}

/**
 * HTTP 5xx responses
 */
export class ServerError extends NetworkError {
  public readonly kind = 'server' as const;
  public readonly statusCode: number;
  public readonly body: string;
  public readonly headers: HttpHeaders;

  constructor(statusCode: number, body: string, headers: HttpHeaders = {}, context?: ErrorContext) {
    const suggestions: ErrorSuggestion[] = [
      {
        action: 'retry_request',
        description: 'Retry the request after a brief delay',
        priority: 1,
        automated: true
      },
      {
        action: 'check_service_status',
        description: 'Check whether the remote service is degraded',
        priority: 2
      }
    ];

    super(
      `Server error ${statusCode}`,
      statusCode === 503 ? ErrorCode.SERVER_UNAVAILABLE : ErrorCode.SERVER_ERROR,
      ErrorSeverity.HIGH,
      suggestions,
      context
    );
    this.statusCode = statusCode;
    this.body = body;
    this.headers = headers;
  }

  public getStatusCode(): number {
    return this.statusCode;
  }

  public getBody(): string {
    return this.body;
  }
}

export type TimeoutPhase = 'connect' | 'request' | 'socket';

/**
 * The transport gave up waiting
 */
export class TimeoutError extends NetworkError {
  public readonly kind = 'timeout' as const;
  public readonly phase?: TimeoutPhase;

  constructor(message: string, phase?: TimeoutPhase, context?: ErrorContext, cause?: unknown) {
    const suggestions: ErrorSuggestion[] = [
      {
        action: 'retry_request',
        description: 'Retry the request after a brief delay',
        priority: 1,
        automated: true
      },
      {
        action: 'increase_timeout',
        description: `Raise the ${phase ?? 'request'} timeout if the endpoint is known to be slow`,
        priority: 2
      }
    ];

    super(message, timeoutCode(phase), ErrorSeverity.MEDIUM, suggestions, context, cause);
    this.phase = phase;
  }
}

/**
 * The caller cancelled the request. Never retried and never logged as an error.
 */
export class CancelledError extends NetworkError {
  public readonly kind = 'cancelled' as const;

  constructor(context?: ErrorContext, cause?: unknown) {
    super('Request was cancelled', ErrorCode.CANCELLED, ErrorSeverity.LOW, [], context, cause);
  }
}

/**
 * Anything the other members do not cover: connection failures, undecodable
 * bodies, unexpected statuses
 */
export class UnknownError extends NetworkError {
  public readonly kind = 'unknown' as const;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN, context?: ErrorContext, cause?: unknown) {
    const suggestions: ErrorSuggestion[] = [
      {
        action: 'check_connection',
        description: 'Verify the host is reachable from this machine',
        priority: 1
      },
      {
        action: 'enable_logging',
        description: 'Enable HTTP logging to inspect the exchange',
        priority: 2
      }
    ];

    super(message, code, ErrorSeverity.HIGH, suggestions, context, cause);
  }
}

export function isNetworkError(value: unknown): value is NetworkError {
  return value instanceof NetworkError;
}

function clientErrorCode(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
      return ErrorCode.CLIENT_BAD_REQUEST;
    case 401:
      return ErrorCode.CLIENT_UNAUTHORIZED;
    case 403:
      return ErrorCode.CLIENT_FORBIDDEN;
    case 404:
      return ErrorCode.CLIENT_NOT_FOUND;
    case 429:
      return ErrorCode.CLIENT_RATE_LIMITED;
    default:
      return ErrorCode.CLIENT_ERROR;
  }
}

function timeoutCode(phase?: TimeoutPhase): ErrorCode {
  switch (phase) {
    case 'connect':
      return ErrorCode.TIMEOUT_CONNECT;
    case 'request':
      return ErrorCode.TIMEOUT_REQUEST;
    case 'socket':
      return ErrorCode.TIMEOUT_SOCKET;
    default:
      return ErrorCode.TIMEOUT;
  }
}
