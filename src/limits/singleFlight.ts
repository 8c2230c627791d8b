export interface FlightHandle<T> {
  promise: Promise<T>;
  /** True when the caller joined a flight started by someone else. */
  shared: boolean;
}

/**
 * Keyed single-flight coordinator: at most one pending task per key.
 *
 * Callers that arrive while a task for the same key is pending receive the
 * same promise. The key is released once the task settles, so a failed task
 * is retried by the next caller.
 */
export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  public run(key: string, task: () => Promise<T>): FlightHandle<T> {
    const pending = this.inFlight.get(key);
    if (pending) {
      return { promise: pending, shared: true };
    }

    const promise = Promise.resolve()
      .then(task)
      .finally(() => {
        if (this.inFlight.get(key) === promise) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, promise);
    return { promise, shared: false };
  }
}
