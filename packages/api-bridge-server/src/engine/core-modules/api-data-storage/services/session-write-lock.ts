import { Injectable } from '@nestjs/common';

// Serializes tasks that share a key; tasks under different keys run freely.
@Injectable()
export class SessionWriteLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release = () => {};
    const current = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const tail = previous.then(() => current);

    this.tails.set(key, tail);

    await previous;

    try {
      return await task();
    } finally {
      release();

      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
