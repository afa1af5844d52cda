import { describe, expect, it } from 'vitest';
import { Auth, rule } from '@/auth/factory';
import { ClientClosedError, createHttpClient, HttpClient } from '@/core/client';
import { ClientError, ServerError } from '@/errors/error-types';
import { ConfigValidationError } from '@/models/config';
import { AuthType, HttpMethod } from '@/models/types';
import { AxiosTransport } from '@/transport/axios-transport';
import { FakeTransport, response } from '../helpers/fake-transport';

const BASE_URL = 'https://api.example.com';

describe('HttpClient', () => {
  it('resolves verb helpers with the decoded body', async () => {
    const transport = new FakeTransport(response(200, '{"id":5,"name":"Ada"}'));
    const client = createHttpClient({ baseUrl: BASE_URL }, { transport });

    await expect(client.get<{ id: number; name: string }>('/users/5')).resolves.toEqual({ id: 5, name: 'Ada' });
    expect(transport.requests[0]).toMatchObject({ method: HttpMethod.GET, url: `${BASE_URL}/users/5` });
  });

  it('sends the body with post, put and patch', async () => {
    const transport = new FakeTransport(response(200, '{}'));
    const client = createHttpClient({ baseUrl: BASE_URL, serialization: { prettyPrint: false } }, { transport });

    await client.post('/items', { a: 1 });
    await client.put('/items/1', { a: 2 });
    await client.patch('/items/1', { a: 3 }, { query: { dryRun: true } });

    expect(transport.requests.map((request) => [request.method, request.url, request.body])).toEqual([
      [HttpMethod.POST, `${BASE_URL}/items`, '{"a":1}'],
      [HttpMethod.PUT, `${BASE_URL}/items/1`, '{"a":2}'],
      [HttpMethod.PATCH, `${BASE_URL}/items/1?dryRun=true`, '{"a":3}'],
    ]);
  });

  it('supports delete, head and options', async () => {
    const transport = new FakeTransport(response(204, '', { allow: 'GET, HEAD' }));
    const client = createHttpClient({ baseUrl: BASE_URL }, { transport });

    await expect(client.delete('/items/1')).resolves.toBeUndefined();
    await expect(client.head('/items/1')).resolves.toMatchObject({ status: 204, data: undefined });
    await expect(client.options('/items')).resolves.toMatchObject({ headers: { allow: 'GET, HEAD' } });
    expect(transport.requests.map((request) => request.method)).toEqual([
      HttpMethod.DELETE,
      HttpMethod.HEAD,
      HttpMethod.OPTIONS,
    ]);
  });

  it('rejects with the classified error', async () => {
    const client = createHttpClient({ baseUrl: BASE_URL }, { transport: new FakeTransport(response(403, 'denied')) });

    await expect(client.get('/secret')).rejects.toBeInstanceOf(ClientError);
    await expect(client.get('/secret')).rejects.toMatchObject({ statusCode: 403, body: 'denied' });
  });

  it('exposes the non-throwing result through execute', async () => {
    const client = createHttpClient({ baseUrl: BASE_URL }, { transport: new FakeTransport(response(502)) });

    const result = await client.execute(HttpMethod.GET, '/a');

    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error).toBeInstanceOf(ServerError);
  });

  it('returns status and headers from request', async () => {
    const transport = new FakeTransport(response(201, '{"id":9}', { location: '/items/9' }));
    const client = createHttpClient({ baseUrl: BASE_URL }, { transport });

    await expect(client.request(HttpMethod.POST, '/items', { body: { a: 1 } })).resolves.toEqual({
      status: 201,
      statusText: '',
      headers: { location: '/items/9' },
      data: { id: 9 },
      url: `${BASE_URL}/items`,
      attempts: 1,
    });
  });

  it('reports the effective auth for a request', () => {
    const basic = Auth.basic('user', 'test-secret');
    const client = createHttpClient(
      { auth: Auth.ruleBased([rule(HttpMethod.GET, '/admin/.*', basic)]) },
      { transport: new FakeTransport() }
    );

    expect(client.resolveAuth(HttpMethod.GET, 'https://api.x.com/admin/users?page=2')).toEqual({
      strategy: basic,
      source: 'rule',
      ruleIndex: 0,
    });
    expect(client.resolveAuth(HttpMethod.POST, '/admin/users').strategy).toEqual({ type: AuthType.NONE });
  });

  describe('close', () => {
    it('closes the transport once', async () => {
      const transport = new FakeTransport(response(200));
      const client = createHttpClient({}, { transport });

      await client.close();
      await client.close();

      expect(transport.closeCalls).toBe(1);
      expect(client.isClosed()).toBe(true);
    });

    it('refuses requests after close', async () => {
      const transport = new FakeTransport(response(200));
      const client = createHttpClient({ baseUrl: BASE_URL }, { transport });
      await client.close();

      await expect(client.get('/a')).rejects.toBeInstanceOf(ClientClosedError);
      expect(transport.requests).toHaveLength(0);
    });
  });
});

describe('createHttpClient', () => {
  it('uses the axios transport by default', async () => {
    const client = createHttpClient();

    expect(client).toBeInstanceOf(HttpClient);
    await client.close();
  });

  it('validates the configuration', () => {
    expect(() => createHttpClient({ retry: { maxRetries: -1 } })).toThrow(ConfigValidationError);
  });

  it('accepts a transport built separately', async () => {
    const transport = new AxiosTransport();
    const client = createHttpClient({}, { transport });

    await client.close();

    expect(transport.isClosed()).toBe(true);
  });
});
