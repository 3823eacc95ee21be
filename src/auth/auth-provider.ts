import { z } from 'zod';
import { AuthenticationError, NetworkError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';

/**
 * A bearer token and the moment it was issued.
 */
export interface Session {
  readonly accessToken: string;
  /** Epoch milliseconds */
  readonly issuedAt: number;
}

/**
 * Supplies the bearer token sent with every API request.
 */
export interface AuthProvider {
  /**
   * Returns a usable session, obtaining a new one when there is none or it is stale
   */
  getSession(): Promise<Session>;

  /**
   * Headers to merge into an API request
   */
  getAuthHeaders(): Promise<Record<string, string>>;

  /**
   * Drops the current session so the next call obtains a fresh one
   */
  invalidate(): void;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
});

export interface RefreshTokenAuthOptions {
  tokenEndpoint: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  /** @default 900 */
  maxAgeSeconds?: number;
  fetch?: typeof fetch;
  logger?: Logger;
  /** Clock, injectable for tests */
  now?: () => number;
}

/**
 * Exchanges a long-lived refresh token for short-lived bearer tokens
 * (`grant_type=refresh_token`), re-exchanging once the session is older than
 * `maxAgeSeconds`.
 */
export class RefreshTokenAuthProvider implements AuthProvider {
  private readonly options: RefreshTokenAuthOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly maxAgeMs: number;
  private session: Session | undefined;

  constructor(options: RefreshTokenAuthOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.logger = options.logger ?? new NoopLogger();
    this.now = options.now ?? Date.now;
    this.maxAgeMs = (options.maxAgeSeconds ?? 900) * 1000;
  }

  async getSession(): Promise<Session> {
    if (this.session === undefined || this.isStale(this.session)) {
      this.session = await this.createSession();
    }

    return this.session;
  }

  async getAuthHeaders(): Promise<Record<string, string>> {
    const session = await this.getSession();
    return { Authorization: `Bearer ${session.accessToken}` };
  }

  invalidate(): void {
    this.session = undefined;
  }

  private isStale(session: Session): boolean {
    return this.now() - session.issuedAt > this.maxAgeMs;
  }

  private async createSession(): Promise<Session> {
    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: this.options.refreshToken,
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(this.options.tokenEndpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
      });
    } catch (error) {
      throw new NetworkError(`Unable to reach token endpoint ${this.options.tokenEndpoint}`, error);
    }

    if (!response.ok) {
      const text = await response.text();
      this.logger.error('Bearer token request failed', { status: response.status, body: text });
      throw new AuthenticationError(
        `Unable to obtain a bearer token (HTTP ${response.status})`,
        response.status,
        { tokenEndpoint: this.options.tokenEndpoint }
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new AuthenticationError('Token response was not valid JSON', response.status, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AuthenticationError('Token response did not contain an access_token', response.status);
    }

    this.logger.debug('Obtained bearer token');
    return { accessToken: parsed.data.access_token, issuedAt: this.now() };
  }
}

/**
 * Uses a bearer token obtained elsewhere; it is never refreshed.
 */
export class StaticTokenAuthProvider implements AuthProvider {
  private readonly session: Session;

  constructor(accessToken: string, issuedAt: number = Date.now()) {
    if (accessToken.trim().length === 0) {
      throw new AuthenticationError('Access token cannot be empty or whitespace');
    }
    this.session = { accessToken, issuedAt };
  }

  async getSession(): Promise<Session> {
    return this.session;
  }

  async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${this.session.accessToken}` };
  }

  invalidate(): void {}
}
