import fs from 'fs';
import path from 'path';
import { getErrorCode } from './error-utils.js';
import { log } from './logger.js';

export type LockState =
  | { status: 'free' }
  | { status: 'held'; pid: number }
  | { status: 'stale'; pid: number | null };

/**
 * True when a process with this pid exists. EPERM means it exists but belongs
 * to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return getErrorCode(error) === 'EPERM';
  }
}

/**
 * PID-file guard that keeps a second watcher from running on the same host.
 * A lock whose owner is gone (or whose content is unreadable) is stale and
 * gets overwritten.
 */
export class InstanceLock {
  private held = false;

  constructor(
    private readonly lockPath: string,
    private readonly pid: number = process.pid,
    private readonly isAlive: (pid: number) => boolean = isProcessAlive
  ) {}

  getPath(): string {
    return this.lockPath;
  }

  isHeld(): boolean {
    return this.held;
  }

  private readOwner(): number | null {
    try {
      const content = fs.readFileSync(this.lockPath, 'utf8').trim();
      const pid = Number.parseInt(content, 10);
      return Number.isInteger(pid) && String(pid) === content ? pid : null;
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  inspect(): LockState {
    if (!fs.existsSync(this.lockPath)) {
      return { status: 'free' };
    }
    const owner = this.readOwner();
    if (owner !== null && owner !== this.pid && this.isAlive(owner)) {
      return { status: 'held', pid: owner };
    }
    return { status: 'stale', pid: owner };
  }

  /**
   * Try to take the lock. Returns the owner's pid when another live process
   * holds it, otherwise writes our pid and returns null.
   */
  acquire(): number | null {
    fs.mkdirSync(path.dirname(this.lockPath), { recursive: true });

    try {
      fs.writeFileSync(this.lockPath, String(this.pid), { flag: 'wx' });
      this.held = true;
      return null;
    } catch (error) {
      if (getErrorCode(error) !== 'EEXIST') {
        throw error;
      }
    }

    const state = this.inspect();
    if (state.status === 'held') {
      return state.pid;
    }

    log.warn('Overwriting stale lock file', { path: this.lockPath, previousPid: state.status === 'stale' ? state.pid : null });
    fs.writeFileSync(this.lockPath, String(this.pid));
    this.held = true;
    return null;
  }

  /**
   * Remove the lock file if it is still ours
   */
  release(): void {
    if (!this.held) {
      return;
    }
    this.held = false;

    try {
      if (this.readOwner() === this.pid) {
        fs.unlinkSync(this.lockPath);
      }
    } catch (error) {
      log.warn('Failed to release lock file', { path: this.lockPath, code: getErrorCode(error) ?? null });
    }
  }
}
