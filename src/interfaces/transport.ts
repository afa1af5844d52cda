import type { HttpHeaders, HttpMethod } from '@/models/types';

/**
 * Body as handed to the transport: already serialized
 */
export type TransportBody = string | Buffer;

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: TransportBody;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  headers: HttpHeaders;
  body: string;
}

/**
 * Interface for the component that performs the network I/O.
 *
 * A transport resolves with whatever status the server sent; deciding what
 * counts as success is the caller's job. It rejects only when no response was
 * received (timeouts, aborts, connection failures).
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;

  /**
   * Release connections and other resources. Safe to call more than once.
   */
  close(): void | Promise<void>;
}

/**
 * What the transport produced for one attempt that did not succeed
 */
export type TransportOutcome =
  | { type: 'response'; response: TransportResponse }
  | { type: 'exception'; error: unknown };

/**
 * One request/response pair as seen by an inspector
 */
export interface InspectedExchange {
  id: number;
  method: HttpMethod;
  url: string;
  requestHeaders: HttpHeaders;
  requestBody?: string;
  startedAt: Date;
  durationMs?: number;
  status?: number;
  responseHeaders?: HttpHeaders;
  responseBody?: string;
  error?: string;
}

/**
 * Optional capability for recording traffic. A transport given one reports
 * every exchange to it and otherwise behaves exactly as without it.
 */
export interface NetworkInspector {
  onRequest(request: TransportRequest): number;
  onResponse(id: number, response: TransportResponse, durationMs: number): void;
  onError(id: number, error: unknown, durationMs: number): void;
}
