/**
 * Per-key serialization for read-then-write sequences. Callers on the same key run one after
 * another in arrival order; different keys never wait on each other.
 * Not re-entrant: code running under a key must not request the same key again.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => { release = resolve; });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    await previous;
    try {
      return await fn();
    } finally {
      release();
      if(this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Keys with a holder or waiters right now. */
  activeKeys(): string[] {
    return [...this.tails.keys()];
  }
}
