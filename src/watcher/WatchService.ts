import chokidar from 'chokidar';
import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { ChangeAggregator } from './ChangeAggregator.js';
import { CooldownRegistry } from './CooldownRegistry.js';
import { NotificationDispatcher } from './NotificationDispatcher.js';
import { formatMegabytes } from './notification.js';
import type { ChangeKind, DispatchedFile, DispatchResult, RawFileEvent } from './types.js';
import type { EmailProvider } from '../providers/base.js';
import type { ResolvedConfig, WatchedDirectory, WatcherSettings } from '../config/types.js';
import { BYTES_PER_MB, WATCHER_CONSTANTS } from '../config/constants.js';
import { ActivityLog } from '../utils/activity-log.js';
import { InstanceLock } from '../utils/instance-lock.js';
import { ConfigError, InstanceLockError, getErrorCode, getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';

type Watcher = ReturnType<typeof chokidar.watch>;

export interface ChangeEvent {
  directory: string;
  path: string;
  kind: ChangeKind;
}

export interface WatchServiceOptions {
  directories: WatchedDirectory[];
  settings: WatcherSettings;
  provider: EmailProvider | null;
  /** JSONL activity log; null keeps records in the diagnostic log only */
  activityLogPath?: string | null;
  /** PID lock file; null disables the single-instance guard */
  lockFilePath?: string | null;
  /** Flush pending batches on stop instead of discarding them */
  flushOnStop?: boolean;
  onChange?: ((event: ChangeEvent) => void) | null;
  onProcess?: ((directoryKey: string, files: DispatchedFile[]) => void) | null;
  onDispatch?: ((result: DispatchResult) => void) | null;
  now?: () => number;
}

interface RecentUnlink {
  ino: number;
  size: number;
  at: number;
}

/**
 * WatchService runs one chokidar watcher per enabled directory, filters the raw
 * events and feeds them to the change aggregator, whose flushes go to the
 * notification dispatcher.
 */
export class WatchService {
  private watchers = new Map<string, Watcher>();
  private directories = new Map<string, WatchedDirectory>();
  private ingestChains = new Map<string, Promise<boolean>>();
  private knownFiles = new Map<string, { ino: number; size: number }>();
  private recentUnlinks = new Map<string, RecentUnlink[]>();
  private readonly aggregator: ChangeAggregator;
  private readonly cooldown: CooldownRegistry;
  private readonly dispatcher: NotificationDispatcher;
  private readonly activity: ActivityLog;
  private readonly lock: InstanceLock | null;
  private readonly now: () => number;
  private running = false;

  constructor(private options: WatchServiceOptions) {
    this.now = options.now ?? Date.now;

    for (const directory of options.directories) {
      this.directories.set(directory.key, directory);
    }

    this.activity = new ActivityLog(options.activityLogPath ?? null, 'file_watcher', () => new Date(this.now()));
    this.lock = options.lockFilePath ? new InstanceLock(options.lockFilePath) : null;
    this.cooldown = new CooldownRegistry(options.settings.cooldownMs, this.now);

    this.dispatcher = new NotificationDispatcher({
      directories: options.directories,
      provider: options.provider,
      cooldown: this.cooldown,
      activity: this.activity,
      sendEmailOnChange: options.settings.sendEmailOnChange,
      onProcess: options.onProcess,
      now: () => new Date(this.now())
    });

    this.aggregator = new ChangeAggregator({
      debounceMs: options.settings.debounceMs,
      cooldown: this.cooldown,
      onFlush: async (directoryKey, changes) => {
        const result = await this.dispatcher.dispatch(directoryKey, changes);
        this.options.onDispatch?.(result);
      }
    });
  }

  /**
   * Acquire the instance lock and start a watcher for every enabled directory.
   * Resolves once every watcher has finished its initial scan.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    const enabled = this.options.directories.filter(directory => directory.enabled);
    if (enabled.length === 0) {
      throw new ConfigError('No directories configured for watching');
    }

    if (this.lock) {
      const owner = this.lock.acquire();
      if (owner !== null) {
        throw new InstanceLockError(this.lock.getPath(), owner);
      }
    }

    this.activity.record('start_watching', 'started', {
      directories: enabled.map(directory => directory.path)
    });

    const ready: Promise<void>[] = [];
    try {
      for (const directory of enabled) {
        if (!this.prepareDirectory(directory)) {
          continue;
        }

        const watcher = this.createWatcher(directory);
        this.watchers.set(directory.key, watcher);
        ready.push(
          new Promise<void>(resolve => {
            watcher.once('ready', () => resolve());
          }).then(() => this.rememberExistingFiles(directory, watcher))
        );

        this.activity.record('watching_directory', 'started', {
          path: directory.path,
          recursive: directory.recursive
        });
      }
    } catch (error) {
      await this.closeWatchers();
      this.lock?.release();
      throw error;
    }

    if (this.watchers.size === 0) {
      this.lock?.release();
      throw new ConfigError('None of the configured directories could be watched');
    }

    this.running = true;
    await Promise.all(ready);
  }

  private async closeWatchers(): Promise<void> {
    await Promise.all(Array.from(this.watchers.values(), watcher => watcher.close()));
    this.watchers.clear();
  }

  /**
   * Record inode and size of the files present at startup, so that renaming a
   * file nobody touched since launch still pairs up as a move.
   */
  private async rememberExistingFiles(directory: WatchedDirectory, watcher: Watcher): Promise<void> {
    const prefix = directory.path + path.sep;
    for (const [parent, names] of Object.entries(watcher.getWatched())) {
      for (const name of names) {
        const filePath = path.join(parent, name);
        if (!filePath.startsWith(prefix) || this.knownFiles.has(filePath)) {
          continue;
        }
        try {
          const stats = await fsp.stat(filePath);
          if (stats.isFile()) {
            this.knownFiles.set(filePath, { ino: stats.ino, size: stats.size });
          }
        } catch (error) {
          log.debug('Skipping unreadable entry at startup', { file: filePath, code: getErrorCode(error) ?? null });
        }
      }
    }
  }

  /**
   * Missing directories are created when the entry asks for it, otherwise left unwatched.
   */
  private prepareDirectory(directory: WatchedDirectory): boolean {
    try {
      if (fs.statSync(directory.path).isDirectory()) {
        return true;
      }
      this.activity.record('watching_directory', 'error', {
        path: directory.path,
        error: 'Path is not a directory'
      });
      return false;
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT' && directory.createIfMissing) {
        fs.mkdirSync(directory.path, { recursive: true });
        return true;
      }
      this.activity.record('watching_directory', 'error', {
        path: directory.path,
        error: getErrorMessage(error)
      });
      return false;
    }
  }

  private createWatcher(directory: WatchedDirectory): Watcher {
    const watcher = chokidar.watch(directory.path, {
      ignoreInitial: true,
      persistent: true,
      depth: directory.recursive ? undefined : 0,
      awaitWriteFinish: {
        stabilityThreshold: WATCHER_CONSTANTS.STABILITY_THRESHOLD_MS,
        pollInterval: WATCHER_CONSTANTS.POLL_INTERVAL_MS
      }
    });

    const events: RawFileEvent[] = ['add', 'change', 'unlink'];
    for (const type of events) {
      watcher.on(type, (filePath: string) => {
        void this.ingest(directory.key, type, filePath);
      });
    }
    watcher.on('error', (error: unknown) => {
      log.error('Watcher error', error, { directory: directory.path });
    });

    return watcher;
  }

  /**
   * Normalize one raw event and hand it to the aggregator.
   * Events for the same directory are processed in arrival order.
   * Resolves true when the change was queued for notification.
   */
  ingest(directoryKey: string, type: RawFileEvent, filePath: string): Promise<boolean> {
    const previous = this.ingestChains.get(directoryKey) ?? Promise.resolve(true);
    const next = previous
      .then(() => this.handleFileEvent(directoryKey, type, filePath))
      .catch((error: unknown) => {
        log.error('Failed to process file event', error, { directory: directoryKey, file: filePath, type });
        return false;
      });
    this.ingestChains.set(directoryKey, next);
    return next;
  }

  private async handleFileEvent(directoryKey: string, type: RawFileEvent, rawPath: string): Promise<boolean> {
    const directory = this.directories.get(directoryKey);
    if (!directory) {
      return false;
    }

    const filePath = path.resolve(directory.path, rawPath);

    if (type === 'unlink') {
      this.rememberUnlink(directoryKey, filePath);
      return false;
    }

    let stats: fs.Stats;
    try {
      stats = await fsp.stat(filePath);
    } catch (error) {
      log.debug('Dropping event for unreadable file', { file: filePath, code: getErrorCode(error) ?? null });
      return false;
    }

    if (stats.isDirectory()) {
      return false;
    }

    if (stats.size > directory.maxFileSizeBytes) {
      this.activity.record('file_change', 'skipped', {
        file: filePath,
        reason: `File too large (${formatMegabytes(stats.size)} > ${directory.maxFileSizeBytes / BYTES_PER_MB} MB)`
      });
      return false;
    }

    const kind: ChangeKind = type === 'change'
      ? 'modified'
      : this.matchesRecentUnlink(directoryKey, stats.ino, stats.size) ? 'moved' : 'created';
    this.knownFiles.set(filePath, { ino: stats.ino, size: stats.size });

    if (!this.aggregator.recordChange(directoryKey, filePath, kind)) {
      return false;
    }

    this.activity.record('file_change', 'detected', {
      file: filePath,
      event_type: kind,
      watched_dir: directoryKey
    });
    this.options.onChange?.({ directory: directoryKey, path: filePath, kind });
    return true;
  }

  private rememberUnlink(directoryKey: string, filePath: string): void {
    const known = this.knownFiles.get(filePath);
    this.knownFiles.delete(filePath);
    if (!known) {
      return;
    }

    const cutoff = this.now() - WATCHER_CONSTANTS.RENAME_WINDOW_MS;
    const recent = (this.recentUnlinks.get(directoryKey) ?? []).filter(entry => entry.at >= cutoff);
    recent.push({ ...known, at: this.now() });
    this.recentUnlinks.set(directoryKey, recent);
  }

  /**
   * An add whose inode and size match a file unlinked moments ago is a rename.
   */
  private matchesRecentUnlink(directoryKey: string, ino: number, size: number): boolean {
    const recent = this.recentUnlinks.get(directoryKey);
    if (!recent) {
      return false;
    }

    const cutoff = this.now() - WATCHER_CONSTANTS.RENAME_WINDOW_MS;
    const index = recent.findIndex(entry => entry.at >= cutoff && entry.ino === ino && entry.size === size);
    if (index === -1) {
      return false;
    }
    recent.splice(index, 1);
    return true;
  }

  /**
   * Flush all pending batches immediately
   */
  async flush(): Promise<void> {
    await Promise.all(this.ingestChains.values());
    await this.aggregator.flushAll();
  }

  /**
   * Clean stop: close watchers, cancel (or flush) pending batches, wait for
   * in-flight notifications, release the lock.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    this.activity.record('stop_watching', 'started', {});

    await this.closeWatchers();
    await Promise.all(this.ingestChains.values());

    if (this.options.flushOnStop) {
      await this.aggregator.flushAll();
    } else {
      this.aggregator.cancel();
    }
    await this.aggregator.waitForIdle();

    this.lock?.release();
    this.activity.record('stop_watching', 'completed', {});
  }

  isRunning(): boolean {
    return this.running;
  }

  activeDirectories(): string[] {
    return Array.from(this.watchers.keys());
  }

  getAggregator(): ChangeAggregator {
    return this.aggregator;
  }

  getCooldown(): CooldownRegistry {
    return this.cooldown;
  }
}

/**
 * Build a WatchService from resolved configuration
 */
export function createWatchService(
  config: ResolvedConfig,
  provider: EmailProvider | null,
  overrides: Partial<WatchServiceOptions> = {}
): WatchService {
  return new WatchService({
    directories: config.directories,
    settings: config.watcher,
    provider,
    activityLogPath: config.activityLogPath,
    lockFilePath: config.lockFilePath,
    ...overrides
  });
}
