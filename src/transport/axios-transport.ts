import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import * as http from 'http';
import * as https from 'https';
import type {
  NetworkInspector,
  Transport,
  TransportRequest,
  TransportResponse,
} from '@/interfaces/transport';
import { DEFAULT_LOGGING, DEFAULT_TIMEOUTS, type ClientTimeouts, type LoggingConfig } from '@/models/config';
import { HttpLogLevel, type HttpHeaders } from '@/models/types';
import { redactHeaders } from '@/utils/headers';
import { Logger } from '@/utils/logger';
import { bodyText } from './inspector';
import { createTimedRequester, TransportTimeoutError } from './timeouts';

/**
 * Configuration options for the axios transport
 */
export interface AxiosTransportOptions {
  timeouts?: Partial<ClientTimeouts>;
  logging?: Partial<LoggingConfig>;
  /** records every exchange when supplied */
  inspector?: NetworkInspector;
  logger?: Logger;
  /** replaces axios' network adapter, e.g. with an in-process stand-in */
  adapter?: AxiosAdapter;
}

/**
 * Transport backed by an axios instance with keep-alive agents.
 *
 * Every status is handed back as a response; the transport only rejects when
 * no response arrived. Redirects are not followed.
 */
export class AxiosTransport implements Transport {
  private client: AxiosInstance;
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;
  private timeouts: ClientTimeouts;
  private logging: LoggingConfig;
  private inspector?: NetworkInspector;
  private logger: Logger;
  private closed = false;

  constructor(options: AxiosTransportOptions = {}) {
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
    this.logging = { ...DEFAULT_LOGGING, ...options.logging };
    this.inspector = options.inspector;
    this.logger = options.logger ?? new Logger({ prefix: '[HTTP]' });

    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({ keepAlive: true });

    this.client = axios.create({
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      transport: createTimedRequester({
        connectMs: this.timeouts.connectMs,
        socketMs: this.timeouts.socketMs,
      }),
      adapter: options.adapter,
      maxRedirects: 0,
      responseType: 'text',
      transformRequest: [(data: unknown) => data],
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });

    this.setupInterceptors();
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    if (this.closed) {
      throw new Error('Transport has been closed');
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeouts.requestMs);

    const onAbort = () => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    } else {
      request.signal?.addEventListener('abort', onAbort, { once: true });
    }

    const startedAt = Date.now();
    const exchangeId = this.inspector?.onRequest(request);

    try {
      const response = await this.client.request<unknown>({
        url: request.url,
        method: request.method,
        headers: request.headers,
        data: request.body,
        signal: controller.signal,
      });

      const result = toTransportResponse(response);
      if (exchangeId !== undefined) {
        this.inspector?.onResponse(exchangeId, result, Date.now() - startedAt);
      }
      return result;
    } catch (error) {
      const failure = timedOut ? new TransportTimeoutError('request', this.timeouts.requestMs) : error;
      if (exchangeId !== undefined) {
        this.inspector?.onError(exchangeId, failure, Date.now() - startedAt);
      }
      throw failure;
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  isClosed(): boolean {
    return this.closed;
  }

  private setupInterceptors(): void {
    if (!this.logging.enabled || this.logging.level === HttpLogLevel.NONE) {
      return;
    }

    const level = this.logging.level;
    const withHeaders = level === HttpLogLevel.HEADERS || level === HttpLogLevel.ALL;
    const withBody = level === HttpLogLevel.BODY || level === HttpLogLevel.ALL;
    const startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

    // Request interceptor for logging
    this.client.interceptors.request.use((config: InternalAxiosRequestConfig) => {
      startTimes.set(config, Date.now());
      this.logger.info(`--> ${config.method?.toUpperCase()} ${config.url}`);
      if (withHeaders) {
        this.logHeaders(normalizeHeaders(config.headers.toJSON()));
      }
      if (withBody && (typeof config.data === 'string' || Buffer.isBuffer(config.data))) {
        this.logger.raw(bodyText(config.data));
      }
      return config;
    });

    // Response interceptor for logging
    this.client.interceptors.response.use(
      (response) => {
        const startedAt = startTimes.get(response.config);
        const elapsed = startedAt === undefined ? '' : ` (${Date.now() - startedAt}ms)`;
        this.logger.info(`<-- ${response.status} ${response.config.url}${elapsed}`);
        if (withHeaders) {
          this.logHeaders(normalizeHeaders(response.headers));
        }
        if (withBody) {
          this.logger.raw(toText(response.data));
        }
        return response;
      },
      (error: unknown) => {
        if (axios.isCancel(error)) {
          this.logger.debug('<-- request cancelled');
        } else if (error instanceof Error) {
          this.logger.warn(`<-- HTTP FAILED: ${error.message}`);
        }
        return Promise.reject(error);
      }
    );
  }

  private logHeaders(headers: HttpHeaders): void {
    for (const [name, value] of Object.entries(redactHeaders(headers))) {
      this.logger.raw(`${name}: ${value}`);
    }
  }
}

function toTransportResponse(response: AxiosResponse<unknown>): TransportResponse {
  return {
    status: response.status,
    statusText: response.statusText,
    headers: normalizeHeaders(response.headers),
    body: toText(response.data),
  };
}

/**
 * Flatten axios header values to plain strings
 */
export function normalizeHeaders(headers: object): HttpHeaders {
  const result: HttpHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null || typeof value === 'function') continue;
    result[name] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return result;
}

function toText(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return JSON.stringify(data);
}
