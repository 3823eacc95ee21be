import { z } from 'zod';
import { TypeReferenceSchema } from '../../types/index.js';

/**
 * WQL data source; its business object is what an Instance field refers to.
 */
export const DataSourceSchema = z
  .object({
    id: z.string().optional(),
    alias: z.string().optional(),
    descriptor: z.string().optional(),
    businessObject: TypeReferenceSchema.optional(),
  })
  .passthrough();

export type DataSource = z.infer<typeof DataSourceSchema>;

export interface DataSourceListParams {
  /** Substring of the descriptor or alias */
  search?: string;
}

/** Largest page the WQL data sources endpoint returns */
export const DATA_SOURCES_PAGE_SIZE = 100;
