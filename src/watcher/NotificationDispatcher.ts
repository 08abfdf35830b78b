import fs from 'fs/promises';
import path from 'path';
import type { CooldownRegistry } from './CooldownRegistry.js';
import { composeNotification } from './notification.js';
import type { DispatchedFile, DispatchResult, PendingChange } from './types.js';
import type { EmailProvider, SendResult } from '../providers/base.js';
import type { WatchedDirectory } from '../config/types.js';
import type { ActivityLog } from '../utils/activity-log.js';
import { getErrorCode, getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';

export interface NotificationDispatcherOptions {
  directories: Iterable<WatchedDirectory>;
  provider: EmailProvider | null;
  cooldown: CooldownRegistry;
  activity: ActivityLog;
  /** Global switch; per-directory `notifyOnChange` also applies */
  sendEmailOnChange?: boolean;
  /** Called with the surviving files of each batch, before any send */
  onProcess?: ((directoryKey: string, files: DispatchedFile[]) => void) | null;
  now?: () => Date;
}

/**
 * Turns a flushed batch into at most one email.
 *
 * Files that disappeared before the flush are dropped. A successful send puts
 * every attached file into cooldown; a failed one leaves them eligible again on
 * their next change. Nothing is retried here.
 */
export class NotificationDispatcher {
  private readonly directories = new Map<string, WatchedDirectory>();
  private readonly sendEmailOnChange: boolean;
  private readonly now: () => Date;

  constructor(private readonly options: NotificationDispatcherOptions) {
    for (const directory of options.directories) {
      this.directories.set(directory.key, directory);
    }
    this.sendEmailOnChange = options.sendEmailOnChange ?? true;
    this.now = options.now ?? (() => new Date());
  }

  async dispatch(directoryKey: string, changes: PendingChange[]): Promise<DispatchResult> {
    const directory = this.directories.get(directoryKey);
    if (!directory) {
      log.warn('Flush for a directory that is not configured', { directory: directoryKey });
      return { status: 'skipped', directory: directoryKey, files: [], reason: 'unknown-directory' };
    }

    const files = await this.collectExistingFiles(changes);
    if (files.length === 0) {
      return { status: 'skipped', directory: directoryKey, files, reason: 'no-files' };
    }

    const { activity } = this.options;
    activity.record('process_changes', 'started', {
      watched_dir: directoryKey,
      file_count: files.length
    });
    this.options.onProcess?.(directoryKey, files);

    if (!directory.notifyOnChange || !this.sendEmailOnChange) {
      return { status: 'skipped', directory: directoryKey, files, reason: 'notifications-disabled' };
    }

    const { provider } = this.options;
    if (!provider) {
      return this.fail(directoryKey, files, 'Email service not initialized');
    }

    if (!directory.notifyEmail) {
      return this.fail(directoryKey, files, 'No notification email configured');
    }

    const message = composeNotification(directoryKey, files, this.now());
    const attachments = files.map(file => file.path);

    let result: SendResult;
    try {
      result = await provider.send({
        to: directory.notifyEmail,
        from: directory.fromEmail,
        subject: message.subject,
        text: message.text,
        attachments
      });
    } catch (error) {
      return this.fail(directoryKey, files, getErrorMessage(error), directory.notifyEmail);
    }

    if (!result.success) {
      return this.fail(directoryKey, files, result.error, directory.notifyEmail);
    }

    // Cooldown runs from the moment the send succeeded.
    this.options.cooldown.markNotified(attachments, this.now().getTime());
    activity.record('send_notification', 'success', {
      watched_dir: directoryKey,
      recipient: directory.notifyEmail,
      file_count: files.length,
      files: files.map(file => path.basename(file.path))
    });

    return {
      status: 'sent',
      directory: directoryKey,
      files,
      recipient: directory.notifyEmail,
      messageId: result.messageId
    };
  }

  /**
   * Stat each pending path, keeping only regular files that still exist.
   */
  private async collectExistingFiles(changes: PendingChange[]): Promise<DispatchedFile[]> {
    const files: DispatchedFile[] = [];
    for (const change of changes) {
      try {
        const stats = await fs.stat(change.path);
        if (stats.isFile()) {
          files.push({ ...change, sizeBytes: stats.size });
        }
      } catch (error) {
        log.debug('Dropping file that vanished before flush', {
          file: change.path,
          code: getErrorCode(error) ?? getErrorMessage(error)
        });
      }
    }
    return files;
  }

  private fail(directoryKey: string, files: DispatchedFile[], error: string, recipient?: string): DispatchResult {
    this.options.activity.record('send_notification', 'error', {
      watched_dir: directoryKey,
      error
    });
    return {
      status: 'failed',
      directory: directoryKey,
      files,
      error,
      ...(recipient ? { recipient } : {})
    };
  }
}
