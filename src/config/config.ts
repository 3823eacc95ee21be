/**
 * Configuration for the Prism client.
 *
 * Values are validated with zod once, when the client is built; every
 * endpoint the services talk to is derived here from the base URL, the tenant
 * name and the API version.
 *
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { parseLogLevel, type LogLevel } from '../observability/index.js';

export const DEFAULT_API_VERSION = 'v3';
export const DEFAULT_TIMEOUT = 120000; // 2 minutes in milliseconds
export const DEFAULT_TOKEN_MAX_AGE_SECONDS = 900;

/**
 * Configuration accepted by the client.
 */
export interface PrismConfig {
  /** Workday services URL, e.g. `https://wd2-impl-services1.workday.com` */
  baseUrl: string;

  /** Tenant the API client is registered in */
  tenantName: string;

  /** Client ID of the registered API client */
  clientId: string;

  /** Client secret of the registered API client */
  clientSecret: string;

  /** Refresh token issued for the integration user */
  refreshToken: string;

  /**
   * Prism API version.
   * @default 'v3'
   */
  version?: string;

  /**
   * Request timeout in milliseconds.
   * @default 120000
   */
  timeout?: number;

  /**
   * Age after which the bearer token is exchanged again.
   * @default 900
   */
  tokenMaxAgeSeconds?: number;

  /** Extra headers sent with every API request */
  headers?: Record<string, string>;

  /** Custom fetch implementation */
  fetch?: typeof fetch;
}

/**
 * URLs derived from the configuration.
 */
export interface PrismEndpoints {
  /** OAuth2 token endpoint */
  readonly token: string;
  /** Prism Analytics REST API root */
  readonly prism: string;
  /** WQL API root, used for data sources */
  readonly wql: string;
}

export interface ResolvedPrismConfig {
  readonly baseUrl: string;
  readonly tenantName: string;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly refreshToken: string;
  readonly version: string;
  readonly timeout: number;
  readonly tokenMaxAgeSeconds: number;
  readonly headers: Record<string, string>;
  readonly fetch: typeof fetch;
  readonly endpoints: PrismEndpoints;
}

const PrismConfigSchema = z.object({
  baseUrl: z
    .string()
    .url('Base URL must be a valid URL')
    .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
      message: 'Base URL must start with http:// or https://',
    }),
  tenantName: z.string().trim().min(1, 'Tenant name is required'),
  clientId: z.string().trim().min(1, 'Client ID is required'),
  clientSecret: z.string().trim().min(1, 'Client secret is required'),
  refreshToken: z.string().trim().min(1, 'Refresh token is required'),
  version: z.string().trim().min(1, 'Version cannot be empty').optional(),
  timeout: z.number().int().nonnegative('Timeout must be a non-negative number').optional(),
  tokenMaxAgeSeconds: z.number().int().positive('Token max age must be positive').optional(),
  headers: z.record(z.string()).optional(),
});

export function buildEndpoints(baseUrl: string, tenantName: string, version: string): PrismEndpoints {
  return {
    token: `${baseUrl}/ccx/oauth2/${tenantName}/token`,
    prism: `${baseUrl}/api/prismAnalytics/${version}/${tenantName}`,
    wql: `${baseUrl}/api/wql/v1/${tenantName}`,
  };
}

/**
 * Validates and normalizes the configuration
 */
export function validateConfig(config: PrismConfig): ResolvedPrismConfig {
  const { fetch: fetchImpl, ...values } = config;
  const parsed = PrismConfigSchema.safeParse(values);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError(issues.join('; '), { issues });
  }

  const data = parsed.data;
  const baseUrl = data.baseUrl.replace(/\/+$/, '');
  const version = data.version ?? DEFAULT_API_VERSION;

  return {
    baseUrl,
    tenantName: data.tenantName,
    clientId: data.clientId,
    clientSecret: data.clientSecret,
    refreshToken: data.refreshToken,
    version,
    timeout: data.timeout ?? DEFAULT_TIMEOUT,
    tokenMaxAgeSeconds: data.tokenMaxAgeSeconds ?? DEFAULT_TOKEN_MAX_AGE_SECONDS,
    headers: data.headers ?? {},
    fetch: fetchImpl ?? globalThis.fetch,
    endpoints: buildEndpoints(baseUrl, data.tenantName, version),
  };
}

/**
 * Fluent builder for creating PrismConfig objects
 */
export class PrismConfigBuilder {
  private config: Partial<PrismConfig> = {};

  withBaseUrl(baseUrl: string): this {
    this.config.baseUrl = baseUrl;
    return this;
  }

  withTenant(tenantName: string): this {
    this.config.tenantName = tenantName;
    return this;
  }

  /**
   * Sets the API client credentials and the refresh token used to obtain bearer tokens
   */
  withCredentials(clientId: string, clientSecret: string, refreshToken: string): this {
    this.config.clientId = clientId;
    this.config.clientSecret = clientSecret;
    this.config.refreshToken = refreshToken;
    return this;
  }

  withVersion(version: string): this {
    this.config.version = version;
    return this;
  }

  withTimeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  withTokenMaxAge(seconds: number): this {
    this.config.tokenMaxAgeSeconds = seconds;
    return this;
  }

  withHeader(key: string, value: string): this {
    this.config.headers = { ...this.config.headers, [key]: value };
    return this;
  }

  withFetch(fetchImpl: typeof fetch): this {
    this.config.fetch = fetchImpl;
    return this;
  }

  build(): ResolvedPrismConfig {
    const { baseUrl, tenantName, clientId, clientSecret, refreshToken } = this.config;

    if (baseUrl === undefined || tenantName === undefined) {
      throw new ConfigurationError('base URL and tenant are required. Use withBaseUrl() and withTenant().');
    }

    if (clientId === undefined || clientSecret === undefined || refreshToken === undefined) {
      throw new ConfigurationError('credentials are required. Use withCredentials().');
    }

    return validateConfig({ ...this.config, baseUrl, tenantName, clientId, clientSecret, refreshToken });
  }

  static from(config: PrismConfig): PrismConfigBuilder {
    const builder = new PrismConfigBuilder();
    builder.config = { ...config };
    return builder;
  }
}

/**
 * Settings read from the environment, including the log level.
 */
export interface EnvironmentSettings {
  config: PrismConfig;
  logLevel: LogLevel;
}

/**
 * Reads the configuration from environment variables.
 *
 * Expected environment variables:
 * - PRISM_BASE_URL, PRISM_TENANT_NAME (required)
 * - PRISM_CLIENT_ID, PRISM_CLIENT_SECRET, PRISM_REFRESH_TOKEN (required)
 * - PRISM_VERSION, PRISM_TIMEOUT_MS, PRISM_LOG_LEVEL (optional)
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides?: Partial<PrismConfig>
): EnvironmentSettings {
  const baseUrl = overrides?.baseUrl ?? env.PRISM_BASE_URL;
  const tenantName = overrides?.tenantName ?? env.PRISM_TENANT_NAME;
  const clientId = overrides?.clientId ?? env.PRISM_CLIENT_ID;
  const clientSecret = overrides?.clientSecret ?? env.PRISM_CLIENT_SECRET;
  const refreshToken = overrides?.refreshToken ?? env.PRISM_REFRESH_TOKEN;

  if (
    baseUrl === undefined ||
    tenantName === undefined ||
    clientId === undefined ||
    clientSecret === undefined ||
    refreshToken === undefined
  ) {
    const checks: Array<[string, string | undefined]> = [
      ['PRISM_BASE_URL', baseUrl],
      ['PRISM_TENANT_NAME', tenantName],
      ['PRISM_CLIENT_ID', clientId],
      ['PRISM_CLIENT_SECRET', clientSecret],
      ['PRISM_REFRESH_TOKEN', refreshToken],
    ];
    const missing = checks.filter(([, value]) => value === undefined).map(([name]) => name);
    throw new ConfigurationError(`missing environment settings: ${missing.join(', ')}`, { missing });
  }

  let timeout: number | undefined;
  if (env.PRISM_TIMEOUT_MS !== undefined) {
    timeout = Number.parseInt(env.PRISM_TIMEOUT_MS, 10);
    if (Number.isNaN(timeout)) {
      throw new ConfigurationError(`PRISM_TIMEOUT_MS must be an integer, got "${env.PRISM_TIMEOUT_MS}"`);
    }
  }

  return {
    config: {
      version: env.PRISM_VERSION,
      timeout,
      ...overrides,
      baseUrl,
      tenantName,
      clientId,
      clientSecret,
      refreshToken,
    },
    logLevel: parseLogLevel(env.PRISM_LOG_LEVEL),
  };
}
