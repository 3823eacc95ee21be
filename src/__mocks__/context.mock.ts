import { vi } from 'vitest';
import { buildEndpoints } from '../config/index.js';
import { InMemoryMetricsCollector, type Logger } from '../observability/index.js';
import type { ServiceContext } from '../services/context.js';
import { MockHttpClient } from './http-client.mock.js';

export const TEST_BASE_URL = 'https://prism.test';
export const TEST_TENANT = 'acme';
export const TEST_ENDPOINTS = buildEndpoints(TEST_BASE_URL, TEST_TENANT, 'v3');

export interface MockLogger extends Logger {
  trace: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
}

export function createMockLogger(): MockLogger {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export interface TestContext {
  context: ServiceContext;
  http: MockHttpClient;
  logger: MockLogger;
  metrics: InMemoryMetricsCollector;
}

export function createTestContext(): TestContext {
  const http = new MockHttpClient();
  const logger = createMockLogger();
  const metrics = new InMemoryMetricsCollector();

  return {
    context: { http, endpoints: TEST_ENDPOINTS, observability: { logger, metrics } },
    http,
    logger,
    metrics,
  };
}
