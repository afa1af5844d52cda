import { setTimeout as sleep } from 'timers/promises';
import type { AnySchema } from 'ajv';
import { AuthResolver } from '@/auth/resolver';
import { classify } from '@/errors/error-classifier';
import { CancelledError, type ErrorContext, type NetworkError } from '@/errors/error-types';
import { RetryController } from '@/errors/retry-strategy';
import type { Serializer } from '@/interfaces/serialization';
import type { Transport, TransportBody, TransportRequest, TransportResponse } from '@/interfaces/transport';
import type { ClientConfig } from '@/models/config';
import { AuthType, type HttpHeaders, type HttpMethod, type HttpResponse, type QueryParams } from '@/models/types';
import { getHeader, mergeHeaders } from '@/utils/headers';
import { Logger } from '@/utils/logger';

/**
 * Per-call options accepted by every request
 */
export interface RequestOptions {
  body?: unknown;
  /** highest-precedence headers */
  headers?: HttpHeaders;
  query?: QueryParams;
  /** JSON schema the decoded body is validated against */
  schema?: AnySchema;
  signal?: AbortSignal;
}

/**
 * Non-throwing result of a request
 */
export type RequestResult<T> =
  | { ok: true; value: HttpResponse<T> }
  | { ok: false; error: NetworkError };

export interface RequestExecutorDeps {
  config: ClientConfig;
  transport: Transport;
  serializer: Serializer;
  authResolver: AuthResolver;
  retryController: RetryController;
  logger: Logger;
}

type AttemptOutcome =
  | { ok: true; response: TransportResponse }
  | { ok: false; error: NetworkError };

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

function isServerErrorStatus(status: number): boolean {
  return status >= 500 && status <= 599;
}

/**
 * Runs one logical request: builds the URL and headers, sends it through the
 * transport, classifies failures and retries them as the retry controller
 * decides.
 */
export class RequestExecutor {
  private config: ClientConfig;
  private transport: Transport;
  private serializer: Serializer;
  private authResolver: AuthResolver;
  private retryController: RetryController;
  private logger: Logger;

  constructor(deps: RequestExecutorDeps) {
    this.config = deps.config;
    this.transport = deps.transport;
    this.serializer = deps.serializer;
    this.authResolver = deps.authResolver;
    this.retryController = deps.retryController;
    this.logger = deps.logger;
  }

  async execute<T>(method: HttpMethod, pathOrUrl: string, options: RequestOptions = {}): Promise<RequestResult<T>> {
    const url = this.buildUrl(pathOrUrl, options.query);
    const { signal } = options;

    let payload: { body: TransportBody; contentType?: string } | undefined;
    try {
      payload = this.serializeBody(options.body);
    } catch (error) {
      return { ok: false, error: classify({ type: 'exception', error }, { method, url }) };
    }

    for (let attempt = 0; ; attempt++) {
      const context: ErrorContext = { method, url, attempt };

      if (signal?.aborted) {
        return this.cancelled(context, signal.reason);
      }

      const outcome = await this.attempt(method, pathOrUrl, url, payload, options, context);

      let error: NetworkError;
      if (outcome.ok) {
        // Without expectSuccess a 5xx is still retried, then handed back as a response
        if (this.config.expectSuccess || !isServerErrorStatus(outcome.response.status)) {
          return this.decode<T>(outcome.response, url, attempt + 1, options.schema, context);
        }
        error = classify({ type: 'response', response: outcome.response }, context);
      } else {
        error = outcome.error;
      }

      if (error.kind === 'cancelled') {
        this.logger.debug(`${method} ${url} cancelled`);
        return { ok: false, error };
      }

      const decision = this.retryController.shouldRetry(attempt, error);
      if (!decision.retry) {
        return outcome.ok
          ? this.decode<T>(outcome.response, url, attempt + 1, options.schema, context)
          : { ok: false, error };
      }

      this.logger.debug(
        `Attempt ${attempt + 1} of ${method} ${url} failed with ${error.message}, retrying in ${decision.delayMs}ms`
      );

      try {
        await sleep(decision.delayMs, undefined, { signal });
      } catch (reason) {
        return this.cancelled(context, reason);
      }
    }
  }

  private async attempt(
    method: HttpMethod,
    pathOrUrl: string,
    url: string,
    payload: { body: TransportBody; contentType?: string } | undefined,
    options: RequestOptions,
    context: ErrorContext
  ): Promise<AttemptOutcome> {
    const { signal } = options;
    let response: TransportResponse;

    try {
      response = await this.sendAuthorized(method, pathOrUrl, url, payload, options);
    } catch (error) {
      if (signal?.aborted) {
        return { ok: false, error: new CancelledError(context, error) };
      }
      return { ok: false, error: classify({ type: 'exception', error }, context) };
    }

    if (signal?.aborted) {
      return { ok: false, error: new CancelledError(context, signal.reason) };
    }

    if (this.config.expectSuccess && (response.status < 200 || response.status > 299)) {
      return { ok: false, error: classify({ type: 'response', response }, context) };
    }
    return { ok: true, response };
  }

  /**
   * Send with auth resolved for this attempt, so rotating tokens are picked
   * up. A 401 to a bearer-authenticated request is answered once by asking the
   * token provider for a refreshed token and sending again; that resend is not
   * a retry.
   */
  private async sendAuthorized(
    method: HttpMethod,
    pathOrUrl: string,
    url: string,
    payload: { body: TransportBody; contentType?: string } | undefined,
    options: RequestOptions
  ): Promise<TransportResponse> {
    let refresh = false;

    for (;;) {
      const { effective, headers: auth } = await this.authResolver.authorize(method, pathOrUrl, refresh);
      const headers = mergeHeaders(
        this.config.defaultHeaders,
        auth.staticHeaders,
        auth.dynamicHeaders,
        options.headers
      );
      if (payload?.contentType && getHeader(headers, 'Content-Type') === undefined) {
        headers['Content-Type'] = payload.contentType;
      }

      const response = await this.send({ method, url, headers, body: payload?.body, signal: options.signal });
      if (response.status !== 401 || refresh || effective.strategy.type !== AuthType.BEARER) {
        return response;
      }

      this.logger.debug(`${method} ${url} answered 401, refreshing the bearer token`);
      refresh = true;
    }
  }

  /**
   * Wait for the transport, but stop waiting once the caller's signal aborts,
   * whether or not the transport honours the signal itself
   */
  private async send(request: TransportRequest): Promise<TransportResponse> {
    const { signal } = request;
    if (!signal) {
      return this.transport.send(request);
    }
    signal.throwIfAborted();

    let onAbort = (): void => undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([this.transport.send(request), aborted]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private decode<T>(
    response: TransportResponse,
    url: string,
    attempts: number,
    schema: AnySchema | undefined,
    context: ErrorContext
  ): RequestResult<T> {
    try {
      const data = this.serializer.decode<T>(response.body, schema);
      return {
        ok: true,
        value: {
          status: response.status,
          statusText: response.statusText,
          headers: response.headers,
          data,
          url,
          attempts,
        },
      };
    } catch (error) {
      return { ok: false, error: classify({ type: 'exception', error }, context) };
    }
  }

  private cancelled(context: ErrorContext, reason: unknown): RequestResult<never> {
    this.logger.debug(`${context.method} ${context.url} cancelled`);
    return { ok: false, error: new CancelledError(context, reason) };
  }

  /**
   * Absolute URLs are used as given; anything else is appended to the base URL
   */
  buildUrl(pathOrUrl: string, query?: QueryParams): string {
    let url: string;
    if (ABSOLUTE_URL.test(pathOrUrl) || !this.config.baseUrl) {
      url = pathOrUrl;
    } else {
      const base = this.config.baseUrl.replace(/\/+$/, '');
      const path = pathOrUrl.replace(/^\/+/, '');
      url = path ? `${base}/${path}` : base;
    }

    if (!query) {
      return url;
    }

    const params = new URLSearchParams();
    for (const [name, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.append(name, String(value));
      }
    }
    const search = params.toString();
    if (!search) {
      return url;
    }

    const hash = url.indexOf('#');
    const fragment = hash >= 0 ? url.slice(hash) : '';
    const beforeFragment = hash >= 0 ? url.slice(0, hash) : url;
    return `${beforeFragment}${beforeFragment.includes('?') ? '&' : '?'}${search}${fragment}`;
  }

  private serializeBody(body: unknown): { body: TransportBody; contentType?: string } | undefined {
    if (body === undefined) {
      return undefined;
    }
    if (typeof body === 'string' || Buffer.isBuffer(body)) {
      return { body };
    }
    if (body instanceof URLSearchParams) {
      return { body: body.toString(), contentType: 'application/x-www-form-urlencoded' };
    }
    return { body: this.serializer.encode(body), contentType: this.serializer.contentType };
  }
}
