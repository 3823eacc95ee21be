import { describe, it, expect, vi, afterEach } from 'vitest';
import { createClient, createClientFromEnv } from '../client.js';
import { RefreshTokenAuthProvider } from '../../auth/index.js';
import { ConfigurationError } from '../../errors/index.js';
import { createMockAuthProvider, jsonResponse, MockHttpClient } from '../../__mocks__/index.js';
import { salesOrdersTable } from '../../__fixtures__/index.js';

const CONFIG = {
  baseUrl: 'https://prism.test',
  tenantName: 'acme',
  clientId: 'test-client',
  clientSecret: 'test-secret',
  refreshToken: 'test-refresh',
};

describe('createClient', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should route service calls through the injected HTTP client', async () => {
    const http = new MockHttpClient().on('GET', '/tables/T1', jsonResponse(200, salesOrdersTable()));
    const client = createClient(CONFIG, { http, auth: createMockAuthProvider() });

    const table = await client.tables.get('T1');

    expect(table?.name).toBe('sales_orders');
    expect(http.requests[0].url).toBe('https://prism.test/api/prismAnalytics/v3/acme/tables/T1');
  });

  it('should authenticate with the refresh token by default', () => {
    const client = createClient(CONFIG);

    expect(client.getAuthProvider()).toBeInstanceOf(RefreshTokenAuthProvider);
    expect(client.getConfig().endpoints.token).toBe('https://prism.test/ccx/oauth2/acme/token');
  });

  it('should send the bearer token and call the fetch implementation from the configuration', async () => {
    const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async (input) =>
      String(input).endsWith('/token')
        ? new Response('{"access_token":"test-token"}', { status: 200, headers: { 'Content-Type': 'application/json' } })
        : new Response('{"id":"FC1"}', { status: 201, headers: { 'Content-Type': 'application/json' } })
    );
    const client = createClient({ ...CONFIG, fetch: fetchMock });

    const container = await client.fileContainers.create();

    expect(container.id).toBe('FC1');
    expect(fetchMock.mock.calls.map(([input]) => String(input))).toEqual([
      'https://prism.test/ccx/oauth2/acme/token',
      'https://prism.test/api/prismAnalytics/v3/acme/fileContainers',
    ]);
    expect(fetchMock.mock.calls[1][1]?.headers).toHaveProperty('Authorization', 'Bearer test-token');
  });

  it('should reject an invalid configuration', () => {
    expect(() => createClient({ ...CONFIG, tenantName: '' })).toThrow(ConfigurationError);
  });

  it('should build a client from the environment', () => {
    vi.stubEnv('PRISM_BASE_URL', 'https://prism.test');
    vi.stubEnv('PRISM_TENANT_NAME', 'acme');
    vi.stubEnv('PRISM_CLIENT_ID', 'test-client');
    vi.stubEnv('PRISM_CLIENT_SECRET', 'test-secret');
    vi.stubEnv('PRISM_REFRESH_TOKEN', 'test-refresh');
    vi.stubEnv('PRISM_VERSION', 'v2');

    const client = createClientFromEnv({}, { http: new MockHttpClient() });

    expect(client.getConfig().endpoints.prism).toBe('https://prism.test/api/prismAnalytics/v2/acme');
  });
});
