type LockKind = "read" | "write";

interface Waiter {
  kind: LockKind;
  grant: () => void;
}

/** In-process reader/writer lock. Readers share, writers are exclusive, waiters are served in arrival order. */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly waiters: Waiter[] = [];

  read<T>(task: () => Promise<T>): Promise<T> {
    return this.run("read", task);
  }

  write<T>(task: () => Promise<T>): Promise<T> {
    return this.run("write", task);
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  private async run<T>(kind: LockKind, task: () => Promise<T>): Promise<T> {
    await this.acquire(kind);
    try {
      return await task();
    } finally {
      this.release(kind);
    }
  }

  private acquire(kind: LockKind): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(kind)) {
      this.take(kind);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push({
        kind,
        grant: () => {
          this.take(kind);
          resolve();
        },
      });
    });
  }

  private canGrant(kind: LockKind): boolean {
    if (kind === "read") {
      return !this.writing;
    }
    return !this.writing && this.readers === 0;
  }

  private take(kind: LockKind): void {
    if (kind === "read") {
      this.readers += 1;
    } else {
      this.writing = true;
    }
  }

  private release(kind: LockKind): void {
    if (kind === "read") {
      this.readers -= 1;
    } else {
      this.writing = false;
    }
    this.drain();
  }

  private drain(): void {
    let next = this.waiters[0];
    while (next && this.canGrant(next.kind)) {
      this.waiters.shift();
      next.grant();
      next = this.waiters[0];
    }
  }
}
