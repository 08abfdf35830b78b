export * from './watcher/index.js';
export * from './providers/index.js';
export { loadConfig, readEnvConfig, resolveEnvReference } from './config/loader.js';
export { loadResolvedConfig, resolveConfig } from './config/resolver.js';
export type * from './config/types.js';
export { ActivityLog, readActivityLog } from './utils/activity-log.js';
export type { ActivityRecord, ActivityStatus } from './utils/activity-log.js';
export { InstanceLock, isProcessAlive } from './utils/instance-lock.js';
export { ConfigError, InstanceLockError } from './utils/error-utils.js';
