// Main exports for programmatic use of crossnet-client
export { HttpClient, ClientClosedError, createHttpClient } from './core/client';
export type { BodylessRequestOptions, HttpClientDeps } from './core/client';
export { RequestExecutor } from './core/executor';
export type { RequestOptions, RequestResult, RequestExecutorDeps } from './core/executor';

// Configuration exports
export {
  ClientConfigBuilder,
  ConfigValidationError,
  resolveClientConfig,
  DEFAULT_LOGGING,
  DEFAULT_RETRY_POLICY,
  DEFAULT_SERIALIZATION,
  DEFAULT_TIMEOUTS,
} from './models/config';
export type {
  ClientConfig,
  ClientConfigInput,
  ClientTimeouts,
  LoggingConfig,
  RetryPolicy,
  SerializationConfig,
} from './models/config';
export { AuthType, HttpLogLevel, HttpMethod, isHttpMethod } from './models/types';
export type { HttpHeaders, HttpResponse, QueryParams } from './models/types';

// Authentication
export { Auth, AuthConfigError, rule, createAuthStrategy } from './auth/factory';
export { AuthResolver, extractPath, matchesFully, resolveAuthConfig } from './auth/resolver';
export type { AuthorizedRequest, AuthSource, EffectiveAuth } from './auth/resolver';
export { BasicAuth, BearerTokenAuth, CustomAuth, NoAuth } from './auth/strategies';
export type {
  AuthAttempt,
  AuthConfig,
  AuthHeaders,
  AuthRule,
  AuthSelector,
  BasicAuthConfig,
  BearerAuthConfig,
  CustomAuthConfig,
  DynamicAuthConfig,
  DynamicHeaderFn,
  IAuthStrategy,
  LeafAuthConfig,
  NoAuthConfig,
  RuleBasedAuthConfig,
  TokenProvider,
  TokenRequest,
} from './interfaces/auth';

// Errors
export {
  NetworkError,
  ClientError,
  ServerError,
  TimeoutError,
  CancelledError,
  UnknownError,
  ErrorCode,
  ErrorSeverity,
  isNetworkError,
} from './errors/error-types';
export type {
  ErrorContext,
  ErrorSuggestion,
  NetworkErrorKind,
  SerializedError,
  TimeoutPhase,
} from './errors/error-types';
export { classify } from './errors/error-classifier';
export { formatError, formatNetworkError } from './errors/error-handler';
export { RetryController } from './errors/retry-strategy';
export type { RetryDecision } from './errors/retry-strategy';

// Transport and serialization
export { AxiosTransport } from './transport/axios-transport';
export type { AxiosTransportOptions } from './transport/axios-transport';
export { InMemoryInspector } from './transport/inspector';
export type { InspectorOptions } from './transport/inspector';
export { TransportTimeoutError } from './transport/timeouts';
export type {
  InspectedExchange,
  NetworkInspector,
  Transport,
  TransportBody,
  TransportOutcome,
  TransportRequest,
  TransportResponse,
} from './interfaces/transport';
export type { Serializer } from './interfaces/serialization';
export { JsonSerializer, SerializationError } from './serialization/json-serializer';

// Utilities
export { Logger } from './utils/logger';
export type { LoggerOptions } from './utils/logger';
export { mergeHeaders, redactHeaders, getHeader } from './utils/headers';
