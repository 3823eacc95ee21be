import { NotFoundError, TransportError } from '../../errors/index.js';
import { ResourcePager, createHttpPagedSource } from '../../paging/index.js';
import { isRecord, parsePayload, type PagedResult } from '../../types/index.js';
import type { ServiceContext } from '../context.js';
import {
  ActivitySchema,
  DATA_CHANGES_PAGE_SIZE,
  DataChangeSchema,
  type Activity,
  type ActivityRun,
  type DataChange,
  type DataChangeListParams,
  type RunActivityOptions,
} from './types.js';

export interface DataChangesService {
  get(dataChangeId: string, type?: DataChangeListParams['type']): Promise<DataChange | undefined>;
  list(params?: DataChangeListParams): Promise<PagedResult<DataChange>>;
  getActivity(dataChangeId: string, activityId: string): Promise<Activity | undefined>;

  /**
   * Starts the data change. A 400 carrying a JSON body is reported as `Rejected`.
   *
   * @throws NotFoundError when the data change does not exist
   * @throws TransportError on any other non-201 status
   */
  runActivity(dataChangeId: string, options?: RunActivityOptions): Promise<ActivityRun>;

  /**
   * Validation body for 200, 400 and 404 responses; `undefined` otherwise.
   */
  validate(dataChangeId: string): Promise<Record<string, unknown> | undefined>;

  isValid(dataChangeId: string): Promise<boolean>;
}

const VALIDATION_STATUSES: ReadonlySet<number> = new Set([200, 400, 404]);

export class DataChangesServiceImpl implements DataChangesService {
  private readonly url: string;

  constructor(private readonly context: ServiceContext) {
    this.url = `${context.endpoints.prism}/dataChanges`;
  }

  async get(dataChangeId: string, type: DataChangeListParams['type'] = 'summary'): Promise<DataChange | undefined> {
    return this.pager(type).fetchById(dataChangeId);
  }

  async list(params: DataChangeListParams = {}): Promise<PagedResult<DataChange>> {
    return this.pager(params.type ?? 'summary').fetch({
      name: params.name,
      searching: params.search,
      limit: params.limit,
      offset: params.offset,
    });
  }

  async getActivity(dataChangeId: string, activityId: string): Promise<Activity | undefined> {
    const url = `${this.url}/${encodeURIComponent(dataChangeId)}/activities/${encodeURIComponent(activityId)}`;
    try {
      const response = await this.context.http.get(url);
      if (response.status !== 200) {
        return undefined;
      }
      return parsePayload(ActivitySchema, response.body, 'activity');
    } catch (error) {
      this.context.observability.logger.warn(`Unable to read activity ${activityId}`, {
        dataChangeId,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  async runActivity(dataChangeId: string, options: RunActivityOptions = {}): Promise<ActivityRun> {
    const { logger } = this.context.observability;
    const url = `${this.url}/${encodeURIComponent(dataChangeId)}/activities`;

    // the service names this attribute fileContainerWid, not fileContainerId
    const body =
      options.fileContainerId === undefined ? undefined : { fileContainerWid: options.fileContainerId };

    const response = await this.context.http.post(url, body);

    if (response.status === 201) {
      const activity = parsePayload(ActivitySchema, response.body, 'activity');
      logger.info(`Started data change ${dataChangeId}`, { activityId: activity.id });
      return { state: 'Started', activity };
    }

    if (response.status === 400 && isRecord(response.body)) {
      logger.error(`Data change ${dataChangeId} was rejected`, { body: response.body });
      return { state: 'Rejected', body: response.body };
    }

    if (response.status === 404) {
      throw new NotFoundError('Data change', dataChangeId);
    }

    throw new TransportError('Run data change', response.status, response.body ?? response.text, {
      dataChangeId,
    });
  }

  async validate(dataChangeId: string): Promise<Record<string, unknown> | undefined> {
    const url = `${this.url}/${encodeURIComponent(dataChangeId)}/validate`;
    try {
      const response = await this.context.http.get(url);
      if (VALIDATION_STATUSES.has(response.status) && isRecord(response.body)) {
        return response.body;
      }
      return undefined;
    } catch (error) {
      this.context.observability.logger.warn(`Unable to validate data change ${dataChangeId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  async isValid(dataChangeId: string): Promise<boolean> {
    const { logger } = this.context.observability;
    const validation = await this.validate(dataChangeId);

    if (validation === undefined) {
      logger.error(`Data change ${dataChangeId} not found`);
      return false;
    }

    if ('error' in validation || 'errors' in validation) {
      logger.error(`Data change ${dataChangeId} is not valid`, { validation });
      return false;
    }

    return true;
  }

  private pager(type: NonNullable<DataChangeListParams['type']>): ResourcePager<DataChange> {
    return new ResourcePager(
      createHttpPagedSource({
        http: this.context.http,
        resource: 'data change',
        url: this.url,
        itemSchema: DataChangeSchema,
        maxPageSize: DATA_CHANGES_PAGE_SIZE,
        query: { type },
        itemQuery: { type },
        searchableNames: (dataChange) => [dataChange.name, dataChange.displayName],
        exactName: (dataChange) => dataChange.name,
      }),
      this.context.observability
    );
  }
}
