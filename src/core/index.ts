export * from './logger/index.js';
export * from './mcp/index.js';
export * from './env.js';
