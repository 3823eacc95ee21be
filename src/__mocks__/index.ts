export { MockHttpClient, jsonResponse, textResponse, type Responder } from './http-client.mock.js';
export { createMockAuthProvider, type MockAuthProvider } from './auth-provider.mock.js';
export {
  TEST_BASE_URL,
  TEST_TENANT,
  TEST_ENDPOINTS,
  createMockLogger,
  createTestContext,
  type MockLogger,
  type TestContext,
} from './context.mock.js';
