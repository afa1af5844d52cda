import { AuthResolver, type EffectiveAuth } from '@/auth/resolver';
import { RetryController } from '@/errors/retry-strategy';
import type { NetworkInspector, Transport } from '@/interfaces/transport';
import { resolveClientConfig, type ClientConfig, type ClientConfigInput } from '@/models/config';
import { HttpMethod, type HttpResponse } from '@/models/types';
import { JsonSerializer } from '@/serialization/json-serializer';
import { AxiosTransport } from '@/transport/axios-transport';
import { Logger } from '@/utils/logger';
import { RequestExecutor, type RequestOptions, type RequestResult } from './executor';

/**
 * Thrown when a request is issued on a client that has been closed
 */
export class ClientClosedError extends Error {
  constructor() {
    super('HTTP client has been closed');
    this.name = 'ClientClosedError';
  }
}

/**
 * Options for requests that carry no body
 */
export type BodylessRequestOptions = Omit<RequestOptions, 'body'>;

/**
 * Capabilities injected into a client instead of being looked up globally
 */
export interface HttpClientDeps {
  /** replaces the axios transport */
  transport?: Transport;
  /** handed to the default transport; ignored when `transport` is supplied */
  inspector?: NetworkInspector;
  logger?: Logger;
}

/**
 * HTTP client with pluggable auth, retries and a typed error taxonomy.
 *
 * The verb helpers resolve with the decoded body and reject with a
 * `NetworkError`. `request` resolves with the whole response and `execute`
 * never rejects for network failures.
 */
export class HttpClient {
  public readonly config: ClientConfig;
  private transport: Transport;
  private executor: RequestExecutor;
  private authResolver: AuthResolver;
  private logger: Logger;
  private closing?: Promise<void>;

  constructor(config: ClientConfig, transport: Transport, logger: Logger = new Logger({ prefix: '[HTTP]' })) {
    this.config = config;
    this.transport = transport;
    this.logger = logger;
    this.authResolver = new AuthResolver(config.auth, logger.child('[AUTH]'));
    this.executor = new RequestExecutor({
      config,
      transport,
      serializer: config.serializer ?? new JsonSerializer(config.serialization),
      authResolver: this.authResolver,
      retryController: new RetryController(config.retry, logger.child('[RETRY]')),
      logger,
    });
  }

  async execute<T = unknown>(
    method: HttpMethod,
    pathOrUrl: string,
    options: RequestOptions = {}
  ): Promise<RequestResult<T>> {
    if (this.closing) {
      throw new ClientClosedError();
    }
    return this.executor.execute<T>(method, pathOrUrl, options);
  }

  async request<T = unknown>(
    method: HttpMethod,
    pathOrUrl: string,
    options: RequestOptions = {}
  ): Promise<HttpResponse<T>> {
    const result = await this.execute<T>(method, pathOrUrl, options);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  async get<T = unknown>(pathOrUrl: string, options: BodylessRequestOptions = {}): Promise<T> {
    return (await this.request<T>(HttpMethod.GET, pathOrUrl, options)).data;
  }

  async post<T = unknown>(pathOrUrl: string, body?: unknown, options: BodylessRequestOptions = {}): Promise<T> {
    return (await this.request<T>(HttpMethod.POST, pathOrUrl, { ...options, body })).data;
  }

  async put<T = unknown>(pathOrUrl: string, body?: unknown, options: BodylessRequestOptions = {}): Promise<T> {
    return (await this.request<T>(HttpMethod.PUT, pathOrUrl, { ...options, body })).data;
  }

  async patch<T = unknown>(pathOrUrl: string, body?: unknown, options: BodylessRequestOptions = {}): Promise<T> {
    return (await this.request<T>(HttpMethod.PATCH, pathOrUrl, { ...options, body })).data;
  }

  async delete<T = unknown>(pathOrUrl: string, options: RequestOptions = {}): Promise<T> {
    return (await this.request<T>(HttpMethod.DELETE, pathOrUrl, options)).data;
  }

  async head(pathOrUrl: string, options: BodylessRequestOptions = {}): Promise<HttpResponse<undefined>> {
    return this.request<undefined>(HttpMethod.HEAD, pathOrUrl, options);
  }

  async options<T = unknown>(pathOrUrl: string, options: BodylessRequestOptions = {}): Promise<HttpResponse<T>> {
    return this.request<T>(HttpMethod.OPTIONS, pathOrUrl, options);
  }

  /**
   * The leaf strategy a request to this method and path would use
   */
  resolveAuth(method: HttpMethod, pathOrUrl: string): EffectiveAuth {
    return this.authResolver.resolve(method, pathOrUrl);
  }

  /**
   * Release the transport. Safe to call more than once.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.logger.debug('Closing HTTP client');
      this.closing = Promise.resolve(this.transport.close());
    }
    return this.closing;
  }

  isClosed(): boolean {
    return this.closing !== undefined;
  }
}

/**
 * Resolve a configuration and wire a client with the axios transport unless
 * another one is supplied
 *
 * @throws ConfigValidationError when the configuration is invalid
 */
export function createHttpClient(input: ClientConfigInput = {}, deps: HttpClientDeps = {}): HttpClient {
  const config = resolveClientConfig(input);
  const logger = deps.logger ?? new Logger({ prefix: '[HTTP]' });
  const transport =
    deps.transport ??
    new AxiosTransport({
      timeouts: config.timeouts,
      logging: config.logging,
      inspector: deps.inspector,
      logger,
    });

  return new HttpClient(config, transport, logger);
}
