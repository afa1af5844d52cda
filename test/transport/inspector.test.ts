import { describe, expect, it } from 'vitest';
import { HttpMethod } from '@/models/types';
import { bodyText, InMemoryInspector } from '@/transport/inspector';
import { response } from '../helpers/fake-transport';

const request = (url: string, body?: string) => ({
  method: HttpMethod.GET,
  url,
  headers: { Authorization: 'Bearer test-token', 'x-api-key': 'test-key', Accept: '*/*' },
  body,
});

describe('InMemoryInspector', () => {
  it('records an exchange from request to response', () => {
    const inspector = new InMemoryInspector();

    const id = inspector.onRequest(request('https://api.example.com/a', 'ping'));
    inspector.onResponse(id, response(200, 'pong', { 'content-type': 'text/plain' }), 12);

    expect(inspector.getExchanges()).toEqual([
      {
        id: 1,
        method: HttpMethod.GET,
        url: 'https://api.example.com/a',
        requestHeaders: { Authorization: '██', 'x-api-key': '██', Accept: '*/*' },
        requestBody: 'ping',
        startedAt: expect.any(Date),
        status: 200,
        responseHeaders: { 'content-type': 'text/plain' },
        responseBody: 'pong',
        durationMs: 12,
      },
    ]);
  });

  it('drops the oldest exchanges beyond the limit', () => {
    const inspector = new InMemoryInspector({ maxExchanges: 2 });

    inspector.onRequest(request('/1'));
    inspector.onRequest(request('/2'));
    inspector.onRequest(request('/3'));

    expect(inspector.getExchanges().map((exchange) => [exchange.id, exchange.url])).toEqual([
      [2, '/2'],
      [3, '/3'],
    ]);
  });

  it('truncates long bodies', () => {
    const inspector = new InMemoryInspector({ maxContentLength: 4 });

    const id = inspector.onRequest(request('/a', 'abcdefgh'));
    inspector.onResponse(id, response(200, 'xyz'), 1);

    expect(inspector.getExchanges()[0]).toMatchObject({
      requestBody: 'abcd… (truncated)',
      responseBody: 'xyz',
    });
  });

  it('honours a custom list of redacted headers', () => {
    const inspector = new InMemoryInspector({ redactHeaders: ['Accept'] });

    inspector.onRequest(request('/a'));

    expect(inspector.getExchanges()[0].requestHeaders).toEqual({
      Authorization: 'Bearer test-token',
      'x-api-key': 'test-key',
      Accept: '██',
    });
  });

  it('records errors', () => {
    const inspector = new InMemoryInspector();

    const first = inspector.onRequest(request('/a'));
    const second = inspector.onRequest(request('/b'));
    inspector.onError(first, new TypeError('fetch failed'), 3);
    inspector.onError(second, 'aborted', 4);

    expect(inspector.getExchanges().map((exchange) => [exchange.error, exchange.durationMs])).toEqual([
      ['TypeError: fetch failed', 3],
      ['aborted', 4],
    ]);
  });

  it('ignores updates for exchanges it no longer holds', () => {
    const inspector = new InMemoryInspector({ maxExchanges: 1 });

    const evicted = inspector.onRequest(request('/a'));
    inspector.onRequest(request('/b'));
    inspector.onResponse(evicted, response(200), 1);
    inspector.onError(99, new Error('late'), 1);

    expect(inspector.getExchanges()).toHaveLength(1);
    expect(inspector.getExchanges()[0].status).toBeUndefined();
  });

  it('clears recorded exchanges and keeps numbering', () => {
    const inspector = new InMemoryInspector();
    inspector.onRequest(request('/a'));

    inspector.clear();
    const id = inspector.onRequest(request('/b'));

    expect(id).toBe(2);
    expect(inspector.getExchanges()).toHaveLength(1);
  });
});

describe('bodyText', () => {
  it('decodes buffers as utf-8', () => {
    expect(bodyText(Buffer.from('héllo', 'utf8'))).toBe('héllo');
    expect(bodyText('plain')).toBe('plain');
  });
});
