export type ChangeKind = 'created' | 'modified' | 'moved';

/** Raw event names as chokidar reports them */
export type RawFileEvent = 'add' | 'change' | 'unlink';

export interface PendingChange {
  path: string;
  kind: ChangeKind;
}

export interface DispatchedFile extends PendingChange {
  sizeBytes: number;
}

export type DispatchStatus = 'sent' | 'failed' | 'skipped';

export type SkipReason = 'unknown-directory' | 'no-files' | 'notifications-disabled';

export interface DispatchResult {
  status: DispatchStatus;
  directory: string;
  files: DispatchedFile[];
  recipient?: string;
  messageId?: string;
  error?: string;
  reason?: SkipReason;
}

export type FlushHandler = (directoryKey: string, changes: PendingChange[]) => Promise<void>;
