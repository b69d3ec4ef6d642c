/**
 * Per-conversation turn serialization.
 *
 * Turns for the same key run one after another in arrival order; turns for
 * different keys run concurrently. Across processes the store's version
 * check is what keeps order.
 */

export class TurnQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result
      .then(() => undefined, () => undefined)
      .then(() => {
        if (this.tails.get(key) === tail) this.tails.delete(key);
      });
    this.tails.set(key, tail);

    return result;
  }

  /** Conversations with a turn queued or in flight */
  get activeKeys(): number {
    return this.tails.size;
  }

  /** Resolves once every queued turn has settled */
  async drain(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }
}
