import { RefreshTokenAuthProvider, type AuthProvider } from '../auth/index.js';
import { configFromEnv, validateConfig, type PrismConfig, type ResolvedPrismConfig } from '../config/index.js';
import { LoadOrchestrator } from '../load/index.js';
import { createConsoleObservability, createNoopObservability, type Observability } from '../observability/index.js';
import { SchemaLoader } from '../schema/index.js';
import {
  BucketsServiceImpl,
  DataChangesServiceImpl,
  DataSourcesServiceImpl,
  FileContainersServiceImpl,
  TablesServiceImpl,
  type BucketsService,
  type DataChangesService,
  type DataSourcesService,
  type FileContainersService,
  type ServiceContext,
  type TablesService,
} from '../services/index.js';
import { FileStager } from '../staging/index.js';
import { FetchHttpClient, type HttpClient } from '../transport/index.js';

/**
 * Main Prism Analytics client interface
 */
export interface PrismClient {
  readonly tables: TablesService;
  readonly buckets: BucketsService;
  readonly dataChanges: DataChangesService;
  readonly fileContainers: FileContainersService;
  readonly dataSources: DataSourcesService;

  /**
   * Load and truncate operations combining buckets and staging
   */
  readonly loads: LoadOrchestrator;

  /**
   * Schema loading from files and existing tables
   */
  readonly schemas: SchemaLoader;

  getConfig(): ResolvedPrismConfig;
  getAuthProvider(): AuthProvider;
}

/**
 * Collaborators that replace the defaults built from the configuration.
 */
export interface PrismClientOptions {
  observability?: Observability;
  auth?: AuthProvider;
  http?: HttpClient;
}

export class PrismClientImpl implements PrismClient {
  readonly tables: TablesService;
  readonly buckets: BucketsService;
  readonly dataChanges: DataChangesService;
  readonly fileContainers: FileContainersService;
  readonly dataSources: DataSourcesService;
  readonly loads: LoadOrchestrator;
  readonly schemas: SchemaLoader;

  private readonly config: ResolvedPrismConfig;
  private readonly auth: AuthProvider;

  constructor(config: PrismConfig, options: PrismClientOptions = {}) {
    this.config = validateConfig(config);
    const observability = options.observability ?? createNoopObservability();

    this.auth =
      options.auth ??
      new RefreshTokenAuthProvider({
        tokenEndpoint: this.config.endpoints.token,
        clientId: this.config.clientId,
        clientSecret: this.config.clientSecret,
        refreshToken: this.config.refreshToken,
        maxAgeSeconds: this.config.tokenMaxAgeSeconds,
        fetch: this.config.fetch,
        logger: observability.logger,
      });

    const http =
      options.http ??
      new FetchHttpClient({
        auth: this.auth,
        timeout: this.config.timeout,
        headers: this.config.headers,
        fetch: this.config.fetch,
        observability,
      });

    const context: ServiceContext = { http, endpoints: this.config.endpoints, observability };

    this.tables = new TablesServiceImpl(context);
    this.buckets = new BucketsServiceImpl(context, this.tables, new FileStager(context));
    this.dataChanges = new DataChangesServiceImpl(context);
    this.fileContainers = new FileContainersServiceImpl(context);
    this.dataSources = new DataSourcesServiceImpl(context);
    this.loads = new LoadOrchestrator(this.buckets, observability);
    this.schemas = new SchemaLoader(this.tables, this.dataSources, observability);
  }

  getConfig(): ResolvedPrismConfig {
    return this.config;
  }

  getAuthProvider(): AuthProvider {
    return this.auth;
  }
}

/**
 * Creates a new Prism client with the provided configuration
 */
export function createClient(config: PrismConfig, options?: PrismClientOptions): PrismClient {
  return new PrismClientImpl(config, options);
}

/**
 * Creates a new Prism client using environment variables
 *
 * Expected environment variables:
 * - PRISM_BASE_URL, PRISM_TENANT_NAME (required)
 * - PRISM_CLIENT_ID, PRISM_CLIENT_SECRET, PRISM_REFRESH_TOKEN (required)
 * - PRISM_VERSION, PRISM_TIMEOUT_MS (optional)
 * - PRISM_LOG_LEVEL (optional, console logging level)
 */
export function createClientFromEnv(overrides?: Partial<PrismConfig>, options: PrismClientOptions = {}): PrismClient {
  const settings = configFromEnv(process.env, overrides);

  return createClient(settings.config, {
    ...options,
    observability: options.observability ?? createConsoleObservability({ level: settings.logLevel }),
  });
}
