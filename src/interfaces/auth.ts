import type { AuthType, HttpHeaders, HttpMethod } from '@/models/types';

/**
 * Header layers produced by an authentication strategy.
 *
 * Static headers are fixed per strategy (custom headers, API keys). Dynamic
 * headers are computed for every request (the Authorization value, whatever a
 * custom header function writes). The executor merges them in that order.
 */
export interface AuthHeaders {
  staticHeaders: HttpHeaders;
  dynamicHeaders: HttpHeaders;
}

export interface AuthAttempt {
  /** the previous send was answered with 401 */
  refresh: boolean;
}

/**
 * Passed to a token provider. `refresh` is set when the server rejected the
 * previous token with 401 and the request is about to be sent again.
 */
export interface TokenRequest {
  refresh: boolean;
  refreshToken?: string;
}

/**
 * Produces the current bearer token. Invoked once per request attempt and
 * possibly from several in-flight requests at the same time.
 */
export type TokenProvider = (request: TokenRequest) => string | Promise<string>;

/**
 * Writes per-request header values into the accumulator it is given.
 */
export type DynamicHeaderFn = (headers: HttpHeaders) => void | Promise<void>;

export interface NoAuthConfig {
  type: AuthType.NONE;
}

export interface BasicAuthConfig {
  type: AuthType.BASIC;
  username: string;
  password: string;
  customHeaders?: HttpHeaders;
}

export interface BearerAuthConfig {
  type: AuthType.BEARER;
  tokenProvider: TokenProvider;
  /** handed to the token provider when a 401 triggers a refresh */
  refreshToken?: string;
  customHeaders?: HttpHeaders;
}

export interface CustomAuthConfig {
  type: AuthType.CUSTOM;
  staticHeaders: HttpHeaders;
  dynamicHeaderFn?: DynamicHeaderFn;
}

/**
 * Strategies that turn directly into headers
 */
export type LeafAuthConfig = NoAuthConfig | BasicAuthConfig | BearerAuthConfig | CustomAuthConfig;

/**
 * Picks a strategy for a request. Returning null or undefined means no auth.
 */
export type AuthSelector = (method: HttpMethod, path: string) => LeafAuthConfig | null | undefined;

export interface DynamicAuthConfig {
  type: AuthType.DYNAMIC;
  selector: AuthSelector;
}

export interface AuthRule {
  /** null matches every method */
  methods: ReadonlySet<HttpMethod> | null;
  /** must match the whole request path */
  pattern: RegExp;
  strategy: LeafAuthConfig;
}

export interface RuleBasedAuthConfig {
  type: AuthType.RULE_BASED;
  rules: readonly AuthRule[];
  defaultStrategy?: LeafAuthConfig;
}

export type AuthConfig = LeafAuthConfig | DynamicAuthConfig | RuleBasedAuthConfig;

/**
 * Interface for authentication strategy implementations
 *
 * Each leaf auth config is realised by one strategy. Strategies never mutate
 * the layers they are given; they return new ones.
 */
export interface IAuthStrategy {
  /**
   * Apply authentication on top of the given header layers
   */
  applyAuth(headers: AuthHeaders, attempt?: AuthAttempt): Promise<AuthHeaders>;

  getType(): AuthType;

  /**
   * Human-readable name of the auth method (e.g. "Bearer Token")
   */
  getDescription(): string;
}
