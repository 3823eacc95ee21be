import type { PrismEndpoints } from '../config/index.js';
import type { Observability } from '../observability/index.js';
import type { HttpClient } from '../transport/index.js';

/**
 * Collaborators shared by every service.
 */
export interface ServiceContext {
  readonly http: HttpClient;
  readonly endpoints: PrismEndpoints;
  readonly observability: Observability;
}
