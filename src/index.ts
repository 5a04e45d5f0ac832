export * from './archive';
export * from './compression';
export * from './config';
export * from './container';
export * from './containerReader';
export * from './containerWriter';
export * from './dependencyResolver';
export * from './entry';
export * from './entryIndex';
export * from './errors/containerError';
export * from './logger';
export * from './payloadArena';
export * from './report';
export * from './sourceTree';
export * from './userDataStore';
export { calcChecksum, compressionRatio, formatBytes } from './bufferUtils';
export { HeaderStruct, PREAMBLE_LENGTH, MAGIC_LENGTH } from './structs';
export { TableFormatter, HorizontalAlignment } from './utils';
