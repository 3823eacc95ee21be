import { ResourcePager, createHttpPagedSource } from '../../paging/index.js';
import type { PagedResult, TypeReference } from '../../types/index.js';
import type { ServiceContext } from '../context.js';
import { DATA_SOURCES_PAGE_SIZE, DataSourceSchema, type DataSource, type DataSourceListParams } from './types.js';

export interface DataSourcesService {
  /**
   * Reads every data source, page by page. Never throws.
   */
  list(params?: DataSourceListParams): Promise<PagedResult<DataSource>>;

  /**
   * Business object whose descriptor matches exactly; `undefined` unless exactly one does.
   */
  findBusinessObject(descriptor: string): Promise<TypeReference | undefined>;
}

export class DataSourcesServiceImpl implements DataSourcesService {
  private readonly pager: ResourcePager<DataSource>;
  private cached: PagedResult<DataSource> | undefined;

  constructor(private readonly context: ServiceContext) {
    this.pager = new ResourcePager(
      createHttpPagedSource({
        http: context.http,
        resource: 'data source',
        url: `${context.endpoints.wql}/dataSources`,
        itemSchema: DataSourceSchema,
        maxPageSize: DATA_SOURCES_PAGE_SIZE,
        searchableNames: (source) => [source.descriptor, source.alias],
        exactName: (source) => source.descriptor,
      }),
      context.observability
    );
  }

  async list(params: DataSourceListParams = {}): Promise<PagedResult<DataSource>> {
    if (params.search !== undefined && params.search.length > 0) {
      return this.pager.fetch({ name: params.search, searching: true });
    }
    return this.pager.fetch();
  }

  async findBusinessObject(descriptor: string): Promise<TypeReference | undefined> {
    if (this.cached === undefined || this.cached.total === 0) {
      this.cached = await this.list();
    }

    const matches = this.cached.data.filter((source) => source.businessObject?.descriptor === descriptor);
    if (matches.length !== 1) {
      this.context.observability.logger.warn(`Business object ${descriptor} not found`, { matches: matches.length });
      return undefined;
    }
    return matches[0].businessObject;
  }
}
