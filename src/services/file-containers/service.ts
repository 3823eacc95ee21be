import { z } from 'zod';
import { TransportError } from '../../errors/index.js';
import { FileStager, type ContainerFactory, type StagingFiles, type StagingResult } from '../../staging/index.js';
import { parsePayload, type PagedResult } from '../../types/index.js';
import type { ServiceContext } from '../context.js';
import { ContainerFileSchema, FileContainerSchema, type ContainerFile, type FileContainer } from './types.js';

export interface FileContainersService extends ContainerFactory {
  /**
   * @throws TransportError when the service does not return 201
   */
  create(): Promise<FileContainer>;

  /**
   * Files uploaded to a container. Never throws.
   */
  listFiles(containerId: string): Promise<PagedResult<ContainerFile>>;

  /**
   * Uploads files to a container, creating one when no id is given. The id
   * used is returned as `containerId`, ready for a data change activity.
   */
  load(containerId: string | undefined, files?: StagingFiles): Promise<StagingResult>;
}

const ContainerFilesSchema = z.array(ContainerFileSchema);

export class FileContainersServiceImpl implements FileContainersService {
  private readonly url: string;
  private readonly stager: FileStager;

  constructor(private readonly context: ServiceContext) {
    this.url = `${context.endpoints.prism}/fileContainers`;
    this.stager = new FileStager(context, this);
  }

  async create(): Promise<FileContainer> {
    const response = await this.context.http.post(this.url);
    if (response.status !== 201) {
      throw new TransportError('Create file container', response.status, response.body ?? response.text);
    }

    const container = parsePayload(FileContainerSchema, response.body, 'file container');
    this.context.observability.logger.debug(`Created file container ${container.id}`);
    return container;
  }

  async listFiles(containerId: string): Promise<PagedResult<ContainerFile>> {
    const { logger } = this.context.observability;

    try {
      const response = await this.context.http.get(`${this.url}/${encodeURIComponent(containerId)}/files`);

      if (response.status === 200) {
        const parsed = ContainerFilesSchema.safeParse(response.body);
        if (parsed.success) {
          return { total: parsed.data.length, data: parsed.data };
        }
        logger.warn(`Unexpected file list for container ${containerId}`, { issues: parsed.error.message });
      } else if (response.status === 404) {
        logger.warn(
          'File container not found; verify the Self-Service: Prism File Container domain in the Prism Analytics functional area'
        );
      }
    } catch (error) {
      logger.warn(`Unable to list files of container ${containerId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return { total: 0, data: [] };
  }

  async load(containerId: string | undefined, files?: StagingFiles): Promise<StagingResult> {
    return this.stager.stage({ kind: 'fileContainer', containerId }, files);
  }
}
