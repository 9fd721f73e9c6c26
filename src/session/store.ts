// Session store - one engine per key (a chat user), created lazily

export type SessionFactory<K, S> = (key: K) => S | Promise<S>;

/**
 * Holds the pending creation promise rather than the session so concurrent
 * first requests for the same key share one instance. Work submitted through
 * `run` executes one job at a time per key, in submission order.
 */
export class SessionStore<K, S> {
  private sessions = new Map<K, Promise<S>>();
  private queues = new Map<K, Promise<void>>();

  constructor(private factory: SessionFactory<K, S>) {}

  get(key: K): Promise<S> {
    const existing = this.sessions.get(key);
    if (existing) return existing;

    const created = Promise.resolve().then(() => this.factory(key));
    this.sessions.set(key, created);
    // A failed creation is forgotten so the next request can retry
    void created.catch(() => {
      if (this.sessions.get(key) === created) this.sessions.delete(key);
    });
    return created;
  }

  // Queue `job` behind earlier jobs for the same key
  run<T>(key: K, job: (session: S) => Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const result = previous.then(async () => job(await this.get(key)));

    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(key, tail);
    void tail.then(() => {
      if (this.queues.get(key) === tail) this.queues.delete(key);
    });

    return result;
  }

  // True while a job for `key` is queued or running
  isBusy(key: K): boolean {
    return this.queues.has(key);
  }

  get size(): number {
    return this.sessions.size;
  }
}
