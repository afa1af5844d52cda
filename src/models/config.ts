import { assertAuthConfig, AuthConfigError } from '@/auth/factory';
import type { AuthConfig } from '@/interfaces/auth';
import type { Serializer } from '@/interfaces/serialization';
import { AuthType, HttpLogLevel, type HttpHeaders } from './types';

/**
 * Retry behaviour. Attempts are numbered from 0; a failed attempt n is retried
 * while n < maxRetries, after min(maxDelayMs, exponentialBase^n * baseDelayMs).
 */
export interface RetryPolicy {
  maxRetries: number;
  exponentialBase: number;
  maxDelayMs: number;
  baseDelayMs: number;
}

export interface ClientTimeouts {
  connectMs: number;
  requestMs: number;
  socketMs: number;
}

export interface LoggingConfig {
  enabled: boolean;
  level: HttpLogLevel;
}

export interface SerializationConfig {
  /** accept response bodies that are not JSON, returning them as text */
  isLenient: boolean;
  /** strip properties a decode schema does not declare */
  ignoreUnknownKeys: boolean;
  prettyPrint: boolean;
}

/**
 * Resolved, immutable client configuration
 */
export interface ClientConfig {
  readonly baseUrl?: string;
  readonly defaultHeaders: Readonly<HttpHeaders>;
  /** treat any non-2xx status as a failure */
  readonly expectSuccess: boolean;
  readonly logging: Readonly<LoggingConfig>;
  readonly serialization: Readonly<SerializationConfig>;
  /** replaces the JSON serializer built from `serialization` */
  readonly serializer?: Serializer;
  readonly auth: AuthConfig;
  readonly timeouts: Readonly<ClientTimeouts>;
  readonly retry: Readonly<RetryPolicy>;
}

/**
 * What callers pass in; every field falls back to its default
 */
export interface ClientConfigInput {
  baseUrl?: string;
  defaultHeaders?: HttpHeaders;
  expectSuccess?: boolean;
  logging?: Partial<LoggingConfig>;
  serialization?: Partial<SerializationConfig>;
  serializer?: Serializer;
  auth?: AuthConfig;
  timeouts?: Partial<ClientTimeouts>;
  retry?: Partial<RetryPolicy>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 0,
  exponentialBase: 2.0,
  maxDelayMs: 3000,
  baseDelayMs: 1000,
};

export const DEFAULT_TIMEOUTS: ClientTimeouts = {
  requestMs: 30_000,
  connectMs: 15_000,
  socketMs: 30_000,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  enabled: false,
  level: HttpLogLevel.HEADERS,
};

export const DEFAULT_SERIALIZATION: SerializationConfig = {
  isLenient: true,
  ignoreUnknownKeys: true,
  prettyPrint: true,
};

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Fill in defaults, validate and freeze a client configuration
 *
 * @throws ConfigValidationError when a value is out of range or the auth strategy is invalid
 */
export function resolveClientConfig(input: ClientConfigInput = {}): ClientConfig {
  const retry: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...input.retry };
  const timeouts: ClientTimeouts = { ...DEFAULT_TIMEOUTS, ...input.timeouts };
  const logging: LoggingConfig = { ...DEFAULT_LOGGING, ...input.logging };
  const serialization: SerializationConfig = { ...DEFAULT_SERIALIZATION, ...input.serialization };
  const auth: AuthConfig = input.auth ?? { type: AuthType.NONE };

  if (input.baseUrl !== undefined) {
    validateBaseUrl(input.baseUrl);
  }
  validateRetryPolicy(retry);
  validateTimeouts(timeouts);

  if (!Object.values(HttpLogLevel).includes(logging.level)) {
    throw new ConfigValidationError(
      `Invalid log level: ${logging.level}. Must be one of: ${Object.values(HttpLogLevel).join(', ')}`
    );
  }

  const defaultHeaders: HttpHeaders = { ...input.defaultHeaders };
  for (const [name, value] of Object.entries(defaultHeaders)) {
    if (typeof value !== 'string') {
      throw new ConfigValidationError(`Default header ${name} must be a string`);
    }
  }

  try {
    assertAuthConfig(auth);
  } catch (error) {
    if (error instanceof AuthConfigError) {
      throw new ConfigValidationError(`Invalid auth strategy: ${error.message}`);
    }
    throw error;
  }

  return Object.freeze({
    baseUrl: input.baseUrl,
    defaultHeaders: Object.freeze(defaultHeaders),
    expectSuccess: input.expectSuccess ?? true,
    logging: Object.freeze(logging),
    serialization: Object.freeze(serialization),
    serializer: input.serializer,
    auth,
    timeouts: Object.freeze(timeouts),
    retry: Object.freeze(retry),
  });
}

function validateBaseUrl(baseUrl: string): void {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch {
    throw new ConfigValidationError(`Invalid base URL: ${baseUrl}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigValidationError(`Base URL must use http or https: ${baseUrl}`);
  }
}

function validateRetryPolicy(retry: RetryPolicy): void {
  if (!Number.isInteger(retry.maxRetries) || retry.maxRetries < 0) {
    throw new ConfigValidationError(`maxRetries must be a non-negative integer, got ${retry.maxRetries}`);
  }
  if (!(retry.exponentialBase > 1)) {
    throw new ConfigValidationError(`exponentialBase must be greater than 1, got ${retry.exponentialBase}`);
  }
  if (!(retry.maxDelayMs >= 0)) {
    throw new ConfigValidationError(`maxDelayMs must not be negative, got ${retry.maxDelayMs}`);
  }
  if (!(retry.baseDelayMs >= 0)) {
    throw new ConfigValidationError(`baseDelayMs must not be negative, got ${retry.baseDelayMs}`);
  }
}

function validateTimeouts(timeouts: ClientTimeouts): void {
  for (const [name, value] of Object.entries(timeouts)) {
    if (!(value > 0) || !Number.isFinite(value)) {
      throw new ConfigValidationError(`Timeout ${name} must be a positive number of milliseconds, got ${value}`);
    }
  }
}

/**
 * Builder class for creating and validating client configurations
 */
export class ClientConfigBuilder {
  private config: ClientConfigInput = {};

  /**
   * Set the base URL relative paths are resolved against
   */
  setBaseUrl(baseUrl: string): ClientConfigBuilder {
    validateBaseUrl(baseUrl);
    this.config.baseUrl = baseUrl;
    return this;
  }

  /**
   * Add a header sent with every request
   */
  setDefaultHeader(name: string, value: string): ClientConfigBuilder {
    if (!name || name.trim() === '') {
      throw new ConfigValidationError('Header name cannot be empty');
    }
    this.config.defaultHeaders = { ...this.config.defaultHeaders, [name]: value };
    return this;
  }

  setExpectSuccess(expectSuccess: boolean): ClientConfigBuilder {
    this.config.expectSuccess = expectSuccess;
    return this;
  }

  /**
   * Enable or disable traffic logging
   */
  setLogging(enabled: boolean, level: HttpLogLevel = DEFAULT_LOGGING.level): ClientConfigBuilder {
    this.config.logging = { enabled, level };
    return this;
  }

  setSerialization(serialization: Partial<SerializationConfig>): ClientConfigBuilder {
    this.config.serialization = { ...this.config.serialization, ...serialization };
    return this;
  }

  setSerializer(serializer: Serializer): ClientConfigBuilder {
    this.config.serializer = serializer;
    return this;
  }

  /**
   * Set the authentication strategy
   */
  setAuth(auth: AuthConfig): ClientConfigBuilder {
    this.config.auth = auth;
    return this;
  }

  setTimeouts(timeouts: Partial<ClientTimeouts>): ClientConfigBuilder {
    this.config.timeouts = { ...this.config.timeouts, ...timeouts };
    return this;
  }

  setRetryPolicy(retry: Partial<RetryPolicy>): ClientConfigBuilder {
    this.config.retry = { ...this.config.retry, ...retry };
    return this;
  }

  /**
   * Validate everything and produce the frozen configuration
   */
  build(): ClientConfig {
    return resolveClientConfig(this.config);
  }
}
