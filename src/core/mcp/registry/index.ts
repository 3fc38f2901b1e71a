export { ConnectionWrapper } from './connection-wrapper.js';
export { ServerConfigCache } from './config-cache.js';
