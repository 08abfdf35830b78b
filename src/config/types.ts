import type { CourierConfig, EmailProviderName, WatchedDirectoryEntry } from './schema.js';

export type { CourierConfig, EmailProviderName, WatchedDirectoryEntry };

/**
 * A directory the watcher monitors, resolved to absolute paths and bytes.
 * Frozen after load.
 */
export interface WatchedDirectory {
  /** Absolute path; also the key for all per-directory state */
  readonly key: string;
  readonly path: string;
  readonly recursive: boolean;
  readonly enabled: boolean;
  readonly maxFileSizeBytes: number;
  readonly notifyEmail: string;
  readonly fromEmail?: string;
  readonly notifyOnChange: boolean;
  readonly createIfMissing: boolean;
}

export interface WatcherSettings {
  debounceMs: number;
  cooldownMs: number;
  sendEmailOnChange: boolean;
}

export interface EmailOptions {
  provider: EmailProviderName;
  host?: string;
  port?: number;
  secure?: boolean;
  username?: string;
  password?: string;
  defaultSender?: string;
  retryAttempts: number;
  timeoutMs: number;
}

export interface DirectoryIssue {
  index: number;
  path?: string;
  message: string;
}

export interface ResolvedConfig {
  directories: WatchedDirectory[];
  skippedDirectories: DirectoryIssue[];
  watcher: WatcherSettings;
  email: EmailOptions;
  activityLogPath: string;
  lockFilePath: string;
}

export interface ConfigSource {
  global: CourierConfig | null;
  project: CourierConfig | null;
  env: CourierConfig;
}
