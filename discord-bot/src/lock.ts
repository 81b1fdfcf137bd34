/** Promise-chain mutex: callers run one at a time, in arrival order. */
export class Mutex {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // keep the chain alive whether or not this task fails
    this.tail = result.catch(() => undefined);
    return result;
  }
}
