import path from 'path';
import type { DispatchedFile } from './types.js';

export interface ComposedNotification {
  subject: string;
  text: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:mm:ss`
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Local wall-clock time as `HH:mm:ss`, for console lines
 */
export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatKilobytes(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)} KB`;
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export function composeSubject(directory: string): string {
  return `File Changes Detected in ${path.basename(directory)}`;
}

export function formatFileLine(file: DispatchedFile): string {
  return `  - ${path.basename(file.path)} (${file.kind}, ${formatKilobytes(file.sizeBytes)})`;
}

/**
 * One-line summary of a processed batch for console output
 */
export function formatBatchSummary(files: DispatchedFile[]): string {
  return `${files.length} file(s): ${files.map(file => path.basename(file.path)).join(', ')}`;
}

/**
 * Build the notification for one flushed batch.
 */
export function composeNotification(directory: string, files: DispatchedFile[], at: Date): ComposedNotification {
  const text = [
    'File changes detected in monitored directory:',
    '',
    `Directory: ${directory}`,
    `Time: ${formatTimestamp(at)}`,
    `Files Changed: ${files.length}`,
    '',
    'Changed Files:',
    ...files.map(formatFileLine),
    '',
    'The changed files are attached to this email.',
    '',
    '---',
    'This is an automated notification from folder-courier.',
    ''
  ].join('\n');

  return { subject: composeSubject(directory), text };
}
