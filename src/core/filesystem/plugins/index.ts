export { PluginRegistry } from './registry.js';
export { ListFilesPlugin } from './list-files.js';
export { EmptyDirPlugin } from './empty-dir.js';
export { parsePluginArguments } from './types.js';
export type { FilesystemPlugin } from './types.js';
