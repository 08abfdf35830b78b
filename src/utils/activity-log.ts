import fs from 'fs';
import path from 'path';
import { log, redactLogData, type LogMetadata } from './logger.js';
import { getErrorMessage } from './error-utils.js';

export type ActivityStatus = 'started' | 'completed' | 'detected' | 'skipped' | 'success' | 'error' | 'warning';

export interface ActivityRecord {
  timestamp: string;
  module: string;
  action: string;
  status: ActivityStatus;
  details: LogMetadata;
}

/**
 * Append-only JSONL record of watcher transitions (detect, process, notify).
 * One line per record; details pass through the logger's redaction rules.
 */
export class ActivityLog {
  private directoryReady = false;

  constructor(
    private readonly filePath: string | null,
    private readonly module = 'file_watcher',
    private readonly now: () => Date = () => new Date()
  ) {}

  getPath(): string | null {
    return this.filePath;
  }

  record(action: string, status: ActivityStatus, details: LogMetadata = {}): ActivityRecord {
    const { meta } = redactLogData('', details);
    const entry: ActivityRecord = {
      timestamp: this.now().toISOString(),
      module: this.module,
      action,
      status,
      details: meta ?? {}
    };

    log.debug(`${action} ${status}`, entry.details);

    if (this.filePath) {
      this.append(this.filePath, entry);
    }

    return entry;
  }

  private append(filePath: string, entry: ActivityRecord): void {
    try {
      if (!this.directoryReady) {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        this.directoryReady = true;
      }
      fs.appendFileSync(filePath, `${JSON.stringify(entry)}\n`, 'utf8');
    } catch (error) {
      log.warn('Failed to append activity record', { path: filePath, error: getErrorMessage(error) });
    }
  }
}

/**
 * Read back an activity log, oldest record first.
 */
export function readActivityLog(filePath: string): ActivityRecord[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  return fs.readFileSync(filePath, 'utf8')
    .split('\n')
    .filter(line => line.trim().length > 0)
    .map((line): ActivityRecord => JSON.parse(line));
}
