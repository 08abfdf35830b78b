import type { WatchedDirectory } from '../../config/types.js';
import { BYTES_PER_MB } from '../../config/constants.js';

export function makeDirectory(root: string, overrides: Partial<WatchedDirectory> = {}): WatchedDirectory {
  return {
    key: root,
    path: root,
    recursive: false,
    enabled: true,
    maxFileSizeBytes: BYTES_PER_MB,
    notifyEmail: 'ops@example.com',
    notifyOnChange: true,
    createIfMissing: false,
    ...overrides
  };
}
