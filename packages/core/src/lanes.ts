/**
 * Runs tasks one at a time per key, in submission order. Tasks under
 * different keys run concurrently.
 */
export class SerialLanes {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail),
    );
    this.tails.set(key, tail);
    return result;
  }

  /** Number of keys with queued or running tasks. */
  get activeKeys(): number {
    return this.tails.size;
  }

  /** Resolves when no lane has queued or running work left. */
  async settle(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all([...this.tails.values()]);
    }
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
