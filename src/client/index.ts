export {
  type PrismClient,
  type PrismClientOptions,
  PrismClientImpl,
  createClient,
  createClientFromEnv,
} from './client.js';
