/**
 * Uniform lookup over the service's paged list endpoints.
 *
 * Every lookup either resolves one item by id, asks the service for one exact
 * name, reads a single page, or scans all pages and filters client side.
 * Lookups never throw: a failed page ends the scan and whatever was
 * accumulated is returned.
 *
 * @module paging/resource-pager
 */

import { z } from 'zod';
import type { HttpClient, QueryParams } from '../transport/index.js';
import { isSuccess } from '../transport/index.js';
import { listPageSchema, type PagedResult } from '../types/index.js';
import { MetricNames, createNoopObservability, type Observability } from '../observability/index.js';

/**
 * Page size used for a single page when only an offset is given.
 */
export const DEFAULT_PAGE_LIMIT = 20;

export interface PageRequest {
  limit: number;
  offset: number;
  /** Exact name filter applied by the service */
  name?: string;
}

export interface PageFailure {
  message: string;
  status?: number;
  error?: unknown;
}

export type PageFetchResult<T> =
  | { kind: 'page'; items: T[]; reportedTotal?: number }
  | { kind: 'failed'; failure: PageFailure };

export type ItemFetchResult<T> =
  | { kind: 'found'; item: T }
  | { kind: 'absent'; failure: PageFailure };

/**
 * A list endpoint the pager can read.
 */
export interface PagedSource<T> {
  /** Resource name used in logs and metrics */
  readonly resource: string;
  /** Largest page the service returns */
  readonly maxPageSize: number;
  fetchItem(id: string): Promise<ItemFetchResult<T>>;
  fetchPage(request: PageRequest): Promise<PageFetchResult<T>>;
  /** Names a search query is matched against */
  searchableNames(item: T): Array<string | undefined>;
  /** API name used for exact matching */
  exactName(item: T): string | undefined;
}

export interface PagerQuery<T> {
  name?: string;
  /** Match `name` as a case-insensitive substring instead of exactly */
  searching?: boolean;
  /** Client-side filter; forces a full scan */
  matcher?: (item: T) => boolean;
  limit?: number;
  offset?: number;
}

export type ScanOutcome = { kind: 'complete' } | { kind: 'interrupted'; failure: PageFailure };

export interface ScanResult<T> {
  result: PagedResult<T>;
  outcome: ScanOutcome;
  pagesFetched: number;
}

export class ResourcePager<T> {
  private readonly source: PagedSource<T>;
  private readonly observability: Observability;

  constructor(source: PagedSource<T>, observability?: Observability) {
    this.source = source;
    this.observability = observability ?? createNoopObservability();
  }

  /**
   * Returns the item with the given id, or undefined when it cannot be read.
   */
  async fetchById(id: string): Promise<T | undefined> {
    try {
      const fetched = await this.source.fetchItem(id);
      if (fetched.kind === 'found') {
        return fetched.item;
      }
      this.observability.logger.debug(`${this.source.resource} ${id} not available`, {
        status: fetched.failure.status,
        reason: fetched.failure.message,
      });
      return undefined;
    } catch (error) {
      this.observability.logger.warn(`${this.source.resource} lookup failed`, {
        id,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  async fetch(query: PagerQuery<T> = {}): Promise<PagedResult<T>> {
    const { result } = await this.scan(query);
    return result;
  }

  async scan(query: PagerQuery<T> = {}): Promise<ScanResult<T>> {
    // an empty name is still a criterion; only an absent one lists everything
    const name = query.name;

    if (name !== undefined && query.searching !== true && query.matcher === undefined) {
      return this.exactLookup(name);
    }

    if (name === undefined && query.matcher === undefined && (query.limit !== undefined || query.offset !== undefined)) {
      return this.singlePage(query.limit, query.offset);
    }

    return this.fullScan(this.buildFilter(name, query));
  }

  private async exactLookup(name: string): Promise<ScanResult<T>> {
    const fetched = await this.fetchPage({ limit: 1, offset: 0, name });
    if (fetched.kind === 'failed') {
      return interrupted([], fetched.failure, 1);
    }

    if (fetched.reportedTotal !== undefined && fetched.reportedTotal > 1) {
      this.observability.logger.warn(`multiple ${this.source.resource} entries share the name ${name}`, {
        reportedTotal: fetched.reportedTotal,
      });
    }

    return complete(fetched.items.slice(0, 1), 1);
  }

  private async singlePage(limit?: number, offset?: number): Promise<ScanResult<T>> {
    const pageLimit = Math.min(
      limit !== undefined && limit > 0 ? limit : DEFAULT_PAGE_LIMIT,
      this.source.maxPageSize
    );
    const pageOffset = offset !== undefined && offset > 0 ? offset : 0;

    const fetched = await this.fetchPage({ limit: pageLimit, offset: pageOffset });
    if (fetched.kind === 'failed') {
      return interrupted([], fetched.failure, 1);
    }
    return complete(fetched.items, 1);
  }

  private async fullScan(keep: (item: T) => boolean): Promise<ScanResult<T>> {
    const pageSize = this.source.maxPageSize;
    const data: T[] = [];
    let offset = 0;
    let pagesFetched = 0;

    for (;;) {
      const fetched = await this.fetchPage({ limit: pageSize, offset });
      pagesFetched++;

      if (fetched.kind === 'failed') {
        return interrupted(data, fetched.failure, pagesFetched);
      }

      data.push(...fetched.items.filter(keep));

      if (fetched.items.length < pageSize) {
        break;
      }

      offset += pageSize;

      if (fetched.reportedTotal !== undefined && offset >= fetched.reportedTotal) {
        break;
      }
    }

    return complete(data, pagesFetched);
  }

  private buildFilter(name: string | undefined, query: PagerQuery<T>): (item: T) => boolean {
    const matcher = query.matcher;
    let nameFilter: ((item: T) => boolean) | undefined;

    if (name !== undefined) {
      if (query.searching === true) {
        const needle = name.toLowerCase();
        nameFilter = (item) =>
          this.source
            .searchableNames(item)
            .some((candidate) => candidate !== undefined && candidate.toLowerCase().includes(needle));
      } else {
        nameFilter = (item) => this.source.exactName(item) === name;
      }
    }

    return (item) => (nameFilter === undefined || nameFilter(item)) && (matcher === undefined || matcher(item));
  }

  private async fetchPage(request: PageRequest): Promise<PageFetchResult<T>> {
    this.observability.metrics.incrementCounter(MetricNames.PAGES_FETCHED, 1, {
      resource: this.source.resource,
    });

    let fetched: PageFetchResult<T>;
    try {
      fetched = await this.source.fetchPage(request);
    } catch (error) {
      fetched = {
        kind: 'failed',
        failure: { message: error instanceof Error ? error.message : String(error), error },
      };
    }

    if (fetched.kind === 'failed') {
      this.observability.logger.warn(`${this.source.resource} listing stopped`, {
        offset: request.offset,
        limit: request.limit,
        status: fetched.failure.status,
        reason: fetched.failure.message,
      });
    }

    return fetched;
  }
}

function complete<T>(data: T[], pagesFetched: number): ScanResult<T> {
  return { result: { total: data.length, data }, outcome: { kind: 'complete' }, pagesFetched };
}

function interrupted<T>(data: T[], failure: PageFailure, pagesFetched: number): ScanResult<T> {
  return {
    result: { total: data.length, data },
    outcome: { kind: 'interrupted', failure },
    pagesFetched,
  };
}

export interface HttpPagedSourceOptions<S extends z.ZodTypeAny> {
  http: HttpClient;
  resource: string;
  /** List endpoint; items are read from `<url>/<id>` */
  url: string;
  itemSchema: S;
  maxPageSize: number;
  /** Extra query parameters sent with list requests, e.g. `type` */
  query?: QueryParams;
  /** Query parameters sent when reading one item, e.g. `format` */
  itemQuery?: QueryParams;
  searchableNames: (item: z.infer<S>) => Array<string | undefined>;
  exactName: (item: z.infer<S>) => string | undefined;
}

/**
 * Paged source over a `GET <url>?limit&offset&name` endpoint returning `{ total, data }`.
 */
export function createHttpPagedSource<S extends z.ZodTypeAny>(
  options: HttpPagedSourceOptions<S>
): PagedSource<z.infer<S>> {
  const pageSchema = listPageSchema(options.itemSchema);

  return {
    resource: options.resource,
    maxPageSize: options.maxPageSize,
    searchableNames: options.searchableNames,
    exactName: options.exactName,

    async fetchItem(id: string): Promise<ItemFetchResult<z.infer<S>>> {
      const response = await options.http.get(`${options.url}/${encodeURIComponent(id)}`, options.itemQuery);
      if (response.status !== 200) {
        return { kind: 'absent', failure: { message: response.statusText, status: response.status } };
      }

      const parsed = options.itemSchema.safeParse(response.body);
      if (!parsed.success) {
        return { kind: 'absent', failure: { message: parsed.error.message, status: response.status } };
      }
      return { kind: 'found', item: parsed.data };
    },

    async fetchPage(request: PageRequest): Promise<PageFetchResult<z.infer<S>>> {
      const response = await options.http.get(options.url, {
        ...options.query,
        limit: request.limit,
        offset: request.offset,
        name: request.name,
      });

      if (!isSuccess(response.status)) {
        return { kind: 'failed', failure: { message: response.statusText, status: response.status } };
      }

      const parsed = pageSchema.safeParse(response.body);
      if (!parsed.success) {
        return { kind: 'failed', failure: { message: parsed.error.message, status: response.status } };
      }

      return { kind: 'page', items: parsed.data.data, reportedTotal: parsed.data.total };
    },
  };
}
