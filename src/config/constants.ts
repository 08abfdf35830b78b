/**
 * Centralized configuration constants for folder-courier
 *
 * This file contains the default values and limits used throughout the
 * codebase. The config file, environment and CLI flags override them.
 */

/**
 * File Watcher Configuration
 */
export const WATCHER_CONSTANTS = {
  /** Default quiet period before a batch is flushed (seconds) */
  DEFAULT_DEBOUNCE_SECONDS: 2,

  /** Minimum debounce interval in milliseconds */
  MIN_DEBOUNCE_MS: 50,

  /** Default cooldown after a successful notification (seconds) */
  DEFAULT_COOLDOWN_SECONDS: 10,

  /** Default size ceiling for a changed file (megabytes) */
  DEFAULT_MAX_FILE_SIZE_MB: 100,

  /** Window in which an unlink followed by an add of the same inode is a move */
  RENAME_WINDOW_MS: 1000,

  /** Stability threshold for file write detection */
  STABILITY_THRESHOLD_MS: 300,

  /** Poll interval for file stability check */
  POLL_INTERVAL_MS: 100,
} as const;

/**
 * Email Configuration
 */
export const EMAIL_CONSTANTS = {
  /** Provider used when neither config nor environment names one */
  DEFAULT_PROVIDER: 'outlook',

  /** Transport attempts before a send is reported as failed */
  DEFAULT_RETRY_ATTEMPTS: 3,

  /** Connection and socket timeout for SMTP (seconds) */
  DEFAULT_TIMEOUT_SECONDS: 30,
} as const;

/**
 * File locations, relative to the working directory unless absolute
 */
export const PATH_CONSTANTS = {
  PROJECT_CONFIG_FILE: '.courier/config.json',

  DEFAULT_ACTIVITY_LOG: 'logs/watcher_log.jsonl',

  DEFAULT_LOCK_FILE: '.courier.lock',
} as const;

export const BYTES_PER_MB = 1024 * 1024;
