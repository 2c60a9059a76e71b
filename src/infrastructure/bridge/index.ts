export { default as bridgePlugin } from './bridge-plugin.js';
export type { BridgePluginOptions } from './bridge-plugin.js';
