import fs from 'fs/promises';
import path from 'path';
import os from 'os';

export interface TempDir {
  root: string;
  cleanup: () => Promise<void>;
}

export async function createTempDir(files: Record<string, string | Buffer> = {}): Promise<TempDir> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'courier-test-'));

  for (const [relativePath, contents] of Object.entries(files)) {
    await writeTempFile(root, relativePath, contents);
  }

  return {
    root,
    cleanup: async () => {
      await fs.rm(root, { recursive: true, force: true });
    }
  };
}

export async function writeTempFile(root: string, relativePath: string, contents: string | Buffer): Promise<string> {
  const target = path.join(root, relativePath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, contents);
  return target;
}

/**
 * Manually advanced clock for cooldown checks
 */
export class FakeClock {
  constructor(public current = 1_700_000_000_000) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * Poll until `predicate` holds; rejects after `timeoutMs`
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 5_000, intervalMs = 25): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise(resolve => setTimeout(resolve, intervalMs));
  }
}
