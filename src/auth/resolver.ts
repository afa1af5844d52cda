import type { AuthConfig, AuthHeaders, LeafAuthConfig } from '@/interfaces/auth';
import { AuthType, type HttpMethod } from '@/models/types';
import { Logger } from '@/utils/logger';
import { assertAuthConfig, assertLeafAuthConfig, AuthConfigError, createAuthStrategy } from './factory';

/**
 * Where the effective strategy of a request came from
 */
export type AuthSource = 'static' | 'selector' | 'rule' | 'default' | 'fallback';

/**
 * The leaf strategy that applies to one request
 */
export interface EffectiveAuth {
  strategy: LeafAuthConfig;
  source: AuthSource;
  /** index of the matching rule, for rule-based configs */
  ruleIndex?: number;
}

export interface AuthorizedRequest {
  effective: EffectiveAuth;
  headers: AuthHeaders;
}

const NO_AUTH: LeafAuthConfig = { type: AuthType.NONE };

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Derive the path used for rule matching from a path or a full URL.
 *
 * Absolute URLs yield their encoded pathname, or the text before the first
 * `?` when they cannot be parsed. Relative paths lose their query string and
 * fragment. Anything else is returned unchanged.
 */
export function extractPath(pathOrUrl: string): string {
  if (ABSOLUTE_URL.test(pathOrUrl)) {
    try {
      return new URL(pathOrUrl).pathname;
    } catch {
      return pathOrUrl.split('?')[0];
    }
  }

  if (pathOrUrl.startsWith('/')) {
    return pathOrUrl.split(/[?#]/)[0];
  }

  return pathOrUrl;
}

const anchoredPatterns = new WeakMap<RegExp, RegExp>();

/**
 * Full-match test: the pattern has to cover the whole path, not a substring
 */
export function matchesFully(pattern: RegExp, path: string): boolean {
  let anchored = anchoredPatterns.get(pattern);
  if (!anchored) {
    anchored = new RegExp(`^(?:${pattern.source})$`, pattern.flags.replace(/[gy]/g, ''));
    anchoredPatterns.set(pattern, anchored);
  }
  return anchored.test(path);
}

/**
 * Resolve any strategy to the leaf that applies to a single request.
 * `path` is expected to be the output of {@link extractPath}.
 *
 * A selector result that is not a valid leaf (a nested Dynamic or RuleBased
 * strategy, or a malformed one) is ignored: the request goes out without
 * authentication and a warning is logged.
 */
export function resolveAuthConfig(
  config: AuthConfig,
  method: HttpMethod,
  path: string,
  logger?: Logger
): EffectiveAuth {
  switch (config.type) {
    case AuthType.DYNAMIC: {
      const selected = config.selector(method, path);
      if (selected === null || selected === undefined) {
        return { strategy: NO_AUTH, source: 'selector' };
      }
      try {
        return { strategy: assertLeafAuthConfig(selected, 'Dynamic selector result'), source: 'selector' };
      } catch (error) {
        if (!(error instanceof AuthConfigError)) {
          throw error;
        }
        logger?.warn(`${error.message}; sending ${method} ${path} without authentication`);
        return { strategy: NO_AUTH, source: 'selector' };
      }
    }

    case AuthType.RULE_BASED: {
      const index = config.rules.findIndex(
        (authRule) =>
          (authRule.methods === null || authRule.methods.has(method)) && matchesFully(authRule.pattern, path)
      );
      if (index >= 0) {
        return { strategy: config.rules[index].strategy, source: 'rule', ruleIndex: index };
      }
      if (config.defaultStrategy) {
        return { strategy: config.defaultStrategy, source: 'default' };
      }
      return { strategy: NO_AUTH, source: 'fallback' };
    }

    default:
      return { strategy: config, source: 'static' };
  }
}

/**
 * Resolves the configured auth strategy for each outgoing request and turns it
 * into header layers. One resolver is owned by each client.
 */
export class AuthResolver {
  private config: AuthConfig;
  private logger?: Logger;

  constructor(config: AuthConfig = NO_AUTH, logger?: Logger) {
    assertAuthConfig(config);
    this.config = config;
    this.logger = logger;
  }

  resolve(method: HttpMethod, pathOrUrl: string): EffectiveAuth {
    return resolveAuthConfig(this.config, method, extractPath(pathOrUrl), this.logger);
  }

  /**
   * Resolve the effective strategy and produce its header layers. With
   * `refresh` set, a bearer token provider is told the last token was rejected.
   */
  async authorize(method: HttpMethod, pathOrUrl: string, refresh = false): Promise<AuthorizedRequest> {
    const effective = this.resolve(method, pathOrUrl);
    const strategy = createAuthStrategy(effective.strategy);

    this.logger?.debug(`Auth for ${method} ${pathOrUrl}: ${strategy.getDescription()} (${effective.source})`);

    const headers = await strategy.applyAuth({ staticHeaders: {}, dynamicHeaders: {} }, { refresh });
    return { effective, headers };
  }
}
