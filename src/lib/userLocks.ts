/**
 * Per-user serialization: work queued for the same user runs one at a time,
 * in arrival order. Different users never wait on each other.
 */
export class UserLocks {
  private tails = new Map<string, Promise<void>>();

  async run<T>(userId: string, work: () => Promise<T>): Promise<T> {
    const key = String(userId);
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Users with queued or running work. */
  get activeCount(): number {
    return this.tails.size;
  }
}

export const userLocks = new UserLocks();
