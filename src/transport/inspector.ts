import type {
  InspectedExchange,
  NetworkInspector,
  TransportBody,
  TransportRequest,
  TransportResponse,
} from '@/interfaces/transport';
import { redactHeaders } from '@/utils/headers';

export interface InspectorOptions {
  /** exchanges kept before the oldest is dropped */
  maxExchanges?: number;
  /** bodies longer than this are truncated */
  maxContentLength?: number;
  redactHeaders?: string[];
}

const DEFAULT_INSPECTOR_OPTIONS: Required<InspectorOptions> = {
  maxExchanges: 100,
  maxContentLength: 250_000,
  redactHeaders: ['Authorization', 'Bearer', 'X-API-Key'],
};

/**
 * Keeps the most recent exchanges in memory for inspection
 */
export class InMemoryInspector implements NetworkInspector {
  private options: Required<InspectorOptions>;
  private exchanges: InspectedExchange[] = [];
  private nextId = 1;

  constructor(options: InspectorOptions = {}) {
    this.options = { ...DEFAULT_INSPECTOR_OPTIONS, ...options };
  }

  onRequest(request: TransportRequest): number {
    const id = this.nextId++;
    this.exchanges.push({
      id,
      method: request.method,
      url: request.url,
      requestHeaders: redactHeaders(request.headers, this.options.redactHeaders),
      requestBody: request.body === undefined ? undefined : this.truncate(bodyText(request.body)),
      startedAt: new Date(),
    });

    if (this.exchanges.length > this.options.maxExchanges) {
      this.exchanges.shift();
    }
    return id;
  }

  onResponse(id: number, response: TransportResponse, durationMs: number): void {
    const exchange = this.find(id);
    if (!exchange) return;
    exchange.status = response.status;
    exchange.responseHeaders = redactHeaders(response.headers, this.options.redactHeaders);
    exchange.responseBody = this.truncate(response.body);
    exchange.durationMs = durationMs;
  }

  onError(id: number, error: unknown, durationMs: number): void {
    const exchange = this.find(id);
    if (!exchange) return;
    exchange.error = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    exchange.durationMs = durationMs;
  }

  /**
   * Recorded exchanges, oldest first
   */
  getExchanges(): readonly InspectedExchange[] {
    return this.exchanges;
  }

  clear(): void {
    this.exchanges = [];
  }

  private find(id: number): InspectedExchange | undefined {
    return this.exchanges.find((exchange) => exchange.id === id);
  }

  private truncate(body: string): string {
    if (body.length <= this.options.maxContentLength) {
      return body;
    }
    return `${body.slice(0, this.options.maxContentLength)}… (truncated)`;
  }
}

export function bodyText(body: TransportBody): string {
  return typeof body === 'string' ? body : body.toString('utf8');
}
