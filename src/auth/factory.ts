import type {
  AuthConfig,
  AuthRule,
  AuthSelector,
  BearerAuthConfig,
  CustomAuthConfig,
  DynamicHeaderFn,
  IAuthStrategy,
  LeafAuthConfig,
  TokenProvider,
} from '@/interfaces/auth';
import { AuthType, type HttpHeaders, type HttpMethod } from '@/models/types';
import { BasicAuth, BearerTokenAuth, CustomAuth, NoAuth } from './strategies';

/**
 * Error thrown when an authentication configuration is invalid
 */
export class AuthConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthConfigError';
  }
}

/**
 * Shorthand constructors for every auth variant
 */
export const Auth = {
  none(): LeafAuthConfig {
    return { type: AuthType.NONE };
  },

  basic(username: string, password: string, customHeaders: HttpHeaders = {}): LeafAuthConfig {
    return { type: AuthType.BASIC, username, password, customHeaders };
  },

  bearer(
    tokenProvider: TokenProvider | string,
    options: Pick<BearerAuthConfig, 'refreshToken' | 'customHeaders'> = {}
  ): LeafAuthConfig {
    const provider: TokenProvider = typeof tokenProvider === 'string' ? () => tokenProvider : tokenProvider;
    return {
      type: AuthType.BEARER,
      tokenProvider: provider,
      refreshToken: options.refreshToken,
      customHeaders: options.customHeaders ?? {},
    };
  },

  custom(staticHeaders: HttpHeaders, dynamicHeaderFn?: DynamicHeaderFn): CustomAuthConfig {
    return { type: AuthType.CUSTOM, staticHeaders, dynamicHeaderFn };
  },

  dynamic(selector: AuthSelector): AuthConfig {
    return { type: AuthType.DYNAMIC, selector };
  },

  ruleBased(rules: readonly AuthRule[], defaultStrategy?: LeafAuthConfig): AuthConfig {
    return { type: AuthType.RULE_BASED, rules, defaultStrategy };
  },
};

/**
 * Build a rule for the given methods (null = any method) and path pattern.
 * String patterns are compiled as regular expressions; either way the pattern
 * has to match the entire path.
 */
export function rule(
  methods: HttpMethod | readonly HttpMethod[] | ReadonlySet<HttpMethod> | null,
  pattern: string | RegExp,
  strategy: LeafAuthConfig
): AuthRule {
  let methodSet: ReadonlySet<HttpMethod> | null;
  if (methods === null) {
    methodSet = null;
  } else if (typeof methods === 'string') {
    methodSet = new Set([methods]);
  } else {
    methodSet = new Set(methods);
  }

  return {
    methods: methodSet,
    pattern: typeof pattern === 'string' ? new RegExp(pattern) : pattern,
    strategy,
  };
}

export function isLeafAuthConfig(config: AuthConfig): config is LeafAuthConfig {
  return config.type !== AuthType.DYNAMIC && config.type !== AuthType.RULE_BASED;
}

/**
 * Narrow a strategy to a leaf, rejecting a nested Dynamic or RuleBased one
 *
 * @param where - where the strategy came from, for the error message
 * @throws AuthConfigError when the strategy is not a leaf or is malformed
 */
export function assertLeafAuthConfig(config: AuthConfig, where: string): LeafAuthConfig {
  if (!isLeafAuthConfig(config)) {
    throw new AuthConfigError(
      `${where} must be a none, basic, bearer or custom strategy, got ${config.type}; ` +
        'dynamic and rule-based strategies cannot be nested'
    );
  }
  validateLeaf(config, where);
  return config;
}

/**
 * Validate a complete auth configuration, including every rule of a
 * rule-based one
 *
 * @throws AuthConfigError when required fields are missing or strategies are nested
 */
export function assertAuthConfig(config: AuthConfig): void {
  switch (config.type) {
    case AuthType.NONE:
    case AuthType.BASIC:
    case AuthType.BEARER:
    case AuthType.CUSTOM:
      validateLeaf(config, 'auth strategy');
      return;

    case AuthType.DYNAMIC:
      if (typeof config.selector !== 'function') {
        throw new AuthConfigError('Dynamic authentication requires a selector function');
      }
      return;

    case AuthType.RULE_BASED:
      if (!Array.isArray(config.rules)) {
        throw new AuthConfigError('Rule-based authentication requires a list of rules');
      }
      config.rules.forEach((authRule, index) => {
        if (!(authRule.pattern instanceof RegExp)) {
          throw new AuthConfigError(`Rule ${index} must have a RegExp path pattern`);
        }
        assertLeafAuthConfig(authRule.strategy, `Rule ${index} strategy`);
      });
      if (config.defaultStrategy !== undefined) {
        assertLeafAuthConfig(config.defaultStrategy, 'Default strategy');
      }
      return;

    default: {
      const unsupported: never = config;
      throw new AuthConfigError(`Unsupported authentication type: ${JSON.stringify(unsupported)}`);
    }
  }
}

function validateLeaf(config: LeafAuthConfig, where: string): void {
  switch (config.type) {
    case AuthType.BASIC:
      if (!config.username || config.username.trim().length === 0) {
        throw new AuthConfigError(`${where}: username is required for basic authentication`);
      }
      if (typeof config.password !== 'string') {
        throw new AuthConfigError(`${where}: password is required for basic authentication`);
      }
      return;

    case AuthType.BEARER:
      if (typeof config.tokenProvider !== 'function') {
        throw new AuthConfigError(`${where}: a token provider is required for bearer authentication`);
      }
      return;

    case AuthType.CUSTOM:
      if (config.dynamicHeaderFn !== undefined && typeof config.dynamicHeaderFn !== 'function') {
        throw new AuthConfigError(`${where}: dynamicHeaderFn must be a function`);
      }
      return;

    case AuthType.NONE:
      return;
  }
}

/**
 * Factory function to create the strategy that applies a leaf auth config
 */
export function createAuthStrategy(config: LeafAuthConfig): IAuthStrategy {
  switch (config.type) {
    case AuthType.NONE:
      return new NoAuth();
    case AuthType.BASIC:
      return new BasicAuth(config);
    case AuthType.BEARER:
      return new BearerTokenAuth(config);
    case AuthType.CUSTOM:
      return new CustomAuth(config);
  }
}
