export { loadSourceConfig, parseSectionedYaml, DEFAULT_SOURCE_PATH } from './source-config.js';
export type { RawSourceConfig } from './source-config.js';
export { loadHostConfig, hostConfigSchema } from './host-config.js';
export type { HostConfig } from './host-config.js';
