/**
 * Keyed locks used to keep overlap-protected events from running concurrently.
 */
export interface Mutex {
  /** Take the lock for `key` unless another holder has it and it has not expired. */
  tryGetLock(key: string, timeoutMinutes: number): boolean;
  release(key: string): void;
}

interface LockEntry {
  expiresAtMs: number;
}

export class InMemoryMutex implements Mutex {
  private readonly locks = new Map<string, LockEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  tryGetLock(key: string, timeoutMinutes: number): boolean {
    const nowMs = this.now();
    const existing = this.locks.get(key);
    if (existing && existing.expiresAtMs > nowMs) {
      return false;
    }
    this.locks.set(key, { expiresAtMs: nowMs + timeoutMinutes * 60_000 });
    return true;
  }

  release(key: string): void {
    this.locks.delete(key);
  }

  isLocked(key: string): boolean {
    const existing = this.locks.get(key);
    return existing !== undefined && existing.expiresAtMs > this.now();
  }
}
