import type {
  AuthAttempt,
  AuthHeaders,
  BasicAuthConfig,
  BearerAuthConfig,
  CustomAuthConfig,
  IAuthStrategy,
} from '@/interfaces/auth';
import { AuthType, type HttpHeaders } from '@/models/types';

/**
 * No authentication strategy - performs no header mutation
 */
export class NoAuth implements IAuthStrategy {
  async applyAuth(headers: AuthHeaders): Promise<AuthHeaders> {
    return headers;
  }

  getType(): AuthType {
    return AuthType.NONE;
  }

  getDescription(): string {
    return 'No Authentication';
  }
}

/**
 * Basic authentication strategy
 */
export class BasicAuth implements IAuthStrategy {
  private username: string;
  private password: string;
  private customHeaders: HttpHeaders;

  constructor(config: BasicAuthConfig) {
    this.username = config.username;
    this.password = config.password;
    this.customHeaders = config.customHeaders ?? {};
  }

  async applyAuth(headers: AuthHeaders): Promise<AuthHeaders> {
    const credentials = Buffer.from(`${this.username}:${this.password}`, 'utf8').toString('base64');

    return {
      staticHeaders: {
        ...headers.staticHeaders,
        ...this.customHeaders,
      },
      dynamicHeaders: {
        ...headers.dynamicHeaders,
        'Authorization': `Basic ${credentials}`,
      },
    };
  }

  getType(): AuthType {
    return AuthType.BASIC;
  }

  getDescription(): string {
    return 'Basic Authentication';
  }
}

/**
 * Bearer token authentication strategy. The token provider runs on every call
 * and is told when the call follows a 401.
 */
export class BearerTokenAuth implements IAuthStrategy {
  private config: BearerAuthConfig;

  constructor(config: BearerAuthConfig) {
    this.config = config;
  }

  async applyAuth(headers: AuthHeaders, attempt: AuthAttempt = { refresh: false }): Promise<AuthHeaders> {
    const token = await this.config.tokenProvider({
      refresh: attempt.refresh,
      refreshToken: this.config.refreshToken,
    });

    return {
      staticHeaders: {
        ...headers.staticHeaders,
        ...(this.config.customHeaders ?? {}),
      },
      dynamicHeaders: {
        ...headers.dynamicHeaders,
        'Authorization': `Bearer ${token}`,
      },
    };
  }

  getType(): AuthType {
    return AuthType.BEARER;
  }

  getDescription(): string {
    return 'Bearer Token';
  }
}

/**
 * Caller-defined headers: a fixed set plus an optional per-request function
 */
export class CustomAuth implements IAuthStrategy {
  private config: CustomAuthConfig;

  constructor(config: CustomAuthConfig) {
    this.config = config;
  }

  async applyAuth(headers: AuthHeaders): Promise<AuthHeaders> {
    const dynamicHeaders: HttpHeaders = {};
    if (this.config.dynamicHeaderFn) {
      await this.config.dynamicHeaderFn(dynamicHeaders);
    }

    return {
      staticHeaders: {
        ...headers.staticHeaders,
        ...this.config.staticHeaders,
      },
      dynamicHeaders: {
        ...headers.dynamicHeaders,
        ...dynamicHeaders,
      },
    };
  }

  getType(): AuthType {
    return AuthType.CUSTOM;
  }

  getDescription(): string {
    const names = Object.keys(this.config.staticHeaders);
    return names.length > 0 ? `Custom Headers (${names.join(', ')})` : 'Custom Headers';
  }
}
