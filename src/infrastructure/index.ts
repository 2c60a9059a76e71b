export { redisPlugin, enqueueEvent, startForwarder, DEFAULT_STREAM_KEY, EVENT_TYPE } from './redis/index.js';
export type { StreamEntry, ForwarderOptions } from './redis/index.js';
export { MqttTransport, createMqttTransport, brokerUrl, buildClientOptions } from './mqtt/index.js';
export { bridgePlugin } from './bridge/index.js';
export type { BridgePluginOptions } from './bridge/index.js';
export { loadSourceConfig, loadHostConfig, parseSectionedYaml } from './config/index.js';
export type { RawSourceConfig, HostConfig } from './config/index.js';
