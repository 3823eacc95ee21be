export { type FileContainersService, FileContainersServiceImpl } from './service.js';
export { FileContainerSchema, ContainerFileSchema, type FileContainer, type ContainerFile } from './types.js';
