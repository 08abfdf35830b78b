/**
 * File watcher - debounced, cooldown-aware change notifications
 *
 * - WatchService: chokidar watchers, event filtering, lifecycle and locking
 * - ChangeAggregator: per-directory pending sets and debounce timers
 * - NotificationDispatcher: flush → one email per batch → cooldown
 * - CooldownRegistry: suppresses re-notifying files that were just sent
 */

export { WatchService, createWatchService } from './WatchService.js';
export type { WatchServiceOptions, ChangeEvent } from './WatchService.js';
export { ChangeAggregator } from './ChangeAggregator.js';
export type { ChangeAggregatorOptions } from './ChangeAggregator.js';
export { NotificationDispatcher } from './NotificationDispatcher.js';
export { CooldownRegistry } from './CooldownRegistry.js';
export { composeNotification, formatTimestamp, formatClock } from './notification.js';
export type * from './types.js';
