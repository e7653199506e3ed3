export * from './errors/wam-errors.js';
export * from './protocol/command.js';
export * from './protocol/response.js';
export * from './protocol/transport.js';
export * from './protocol/client.js';
export * from './wam-speaker.js';
export * from './address-resolver.js';
export * from './discovery.js';
export * from './group-coordinator.js';
export * from './speaker-store.js';
export * from './controller.js';
export * from './utils/retry.js';
export { loadConfiguration, formatConfigInfo, defaultConfig, type ConfigLoadResult, type ConfigLoadOptions } from './utils/config-loader.js';
export { initializeDebugManager, debugManager, type DebugCategory } from './utils/debug-manager.js';
export { default as logger, type Logger } from './utils/logger.js';
export type * from './types/wam.js';
