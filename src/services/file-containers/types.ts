import { z } from 'zod';

export const FileContainerSchema = z
  .object({
    id: z.string(),
  })
  .passthrough();

export type FileContainer = z.infer<typeof FileContainerSchema>;

export const ContainerFileSchema = z
  .object({
    name: z.string().optional(),
    fileLength: z.number().optional(),
  })
  .passthrough();

export type ContainerFile = z.infer<typeof ContainerFileSchema>;
