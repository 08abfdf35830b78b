import path from 'path';
import { loadConfig, resolveEnvReference, type LoadConfigOptions } from './loader.js';
import { WatchedDirectorySchema } from './schema.js';
import { BYTES_PER_MB, EMAIL_CONSTANTS, PATH_CONSTANTS, WATCHER_CONSTANTS } from './constants.js';
import type {
  CourierConfig,
  DirectoryIssue,
  EmailOptions,
  ResolvedConfig,
  WatchedDirectory,
  WatcherSettings
} from './types.js';
import { log } from '../utils/logger.js';

export function secondsToDebounceMs(seconds: number): number {
  return Math.max(Math.round(seconds * 1000), WATCHER_CONSTANTS.MIN_DEBOUNCE_MS);
}

function resolveWatcherSettings(config: CourierConfig): WatcherSettings {
  const settings = config.watching?.settings;
  return {
    debounceMs: secondsToDebounceMs(settings?.debounceDelaySeconds ?? WATCHER_CONSTANTS.DEFAULT_DEBOUNCE_SECONDS),
    cooldownMs: Math.round((settings?.cooldownSeconds ?? WATCHER_CONSTANTS.DEFAULT_COOLDOWN_SECONDS) * 1000),
    sendEmailOnChange: settings?.sendEmailOnChange ?? true
  };
}

function resolveEmailOptions(config: CourierConfig): EmailOptions {
  const email = config.email;
  const smtp = email?.smtp;
  const username = resolveEnvReference(smtp?.username);
  const defaultSender = resolveEnvReference(smtp?.defaultSender);

  return {
    provider: email?.provider ?? EMAIL_CONSTANTS.DEFAULT_PROVIDER,
    host: resolveEnvReference(smtp?.host),
    port: smtp?.port,
    secure: smtp?.secure,
    username,
    password: resolveEnvReference(smtp?.password),
    defaultSender: defaultSender || username,
    retryAttempts: email?.retryAttempts ?? EMAIL_CONSTANTS.DEFAULT_RETRY_ATTEMPTS,
    timeoutMs: Math.round((email?.timeoutSeconds ?? EMAIL_CONSTANTS.DEFAULT_TIMEOUT_SECONDS) * 1000)
  };
}

/**
 * Validate the directory entries one at a time. Invalid or duplicate entries are
 * reported and left out; they never abort the load.
 */
export function resolveDirectories(
  config: CourierConfig,
  cwd: string
): { directories: WatchedDirectory[]; skipped: DirectoryIssue[] } {
  const entries = config.watching?.directories ?? [];
  const defaultMaxMb = config.watching?.settings?.maxFileSizeMb ?? WATCHER_CONSTANTS.DEFAULT_MAX_FILE_SIZE_MB;
  const directories: WatchedDirectory[] = [];
  const skipped: DirectoryIssue[] = [];
  const seen = new Set<string>();

  entries.forEach((entry, index) => {
    const parsed = WatchedDirectorySchema.safeParse(entry);
    if (!parsed.success) {
      skipped.push({
        index,
        message: parsed.error.issues.map(issue => `${issue.path.join('.') || '(entry)'}: ${issue.message}`).join('; ')
      });
      return;
    }

    const value = parsed.data;
    const key = path.resolve(cwd, resolveEnvReference(value.path));
    if (seen.has(key)) {
      skipped.push({ index, path: key, message: 'duplicate directory' });
      return;
    }
    seen.add(key);

    const fromEmail = resolveEnvReference(value.fromEmail);
    directories.push(Object.freeze({
      key,
      path: key,
      recursive: value.recursive ?? false,
      enabled: value.enabled ?? true,
      maxFileSizeBytes: Math.floor((value.maxFileSizeMb ?? defaultMaxMb) * BYTES_PER_MB),
      notifyEmail: resolveEnvReference(value.notifyEmail ?? '').trim(),
      ...(fromEmail ? { fromEmail } : {}),
      notifyOnChange: value.notifyOnChange ?? true,
      createIfMissing: value.createIfMissing ?? false
    }));
  });

  return { directories, skipped };
}

/**
 * Turn merged raw configuration into the immutable runtime view.
 */
export function resolveConfig(config: CourierConfig, cwd = process.cwd()): ResolvedConfig {
  const base = path.resolve(cwd);
  const { directories, skipped } = resolveDirectories(config, base);

  for (const issue of skipped) {
    log.warn('Skipping watched directory entry', {
      index: issue.index,
      path: issue.path ?? null,
      reason: issue.message
    });
  }

  return {
    directories,
    skippedDirectories: skipped,
    watcher: resolveWatcherSettings(config),
    email: resolveEmailOptions(config),
    activityLogPath: path.resolve(base, config.logging?.activityLog ?? PATH_CONSTANTS.DEFAULT_ACTIVITY_LOG),
    lockFilePath: path.resolve(base, config.lockFile ?? PATH_CONSTANTS.DEFAULT_LOCK_FILE)
  };
}

/**
 * Load all config sources and resolve them in one step.
 * @throws ConfigError when a config file cannot be used
 */
export function loadResolvedConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  const cwd = path.resolve(options.cwd || '.');
  return resolveConfig(loadConfig({ ...options, cwd }), cwd);
}
