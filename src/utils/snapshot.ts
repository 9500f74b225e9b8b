/**
 * Holds an immutable value that can be rebuilt in the background and
 * published by reference swap. Readers never wait; rebuilds run one at
 * a time in call order.
 */
export class Snapshot<T> {
  private current: T;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(initial: T) {
    this.current = initial;
  }

  get(): T {
    return this.current;
  }

  /**
   * Build a replacement and publish it once `build` resolves.
   * If `build` rejects, the previous value stays in place and the
   * rejection is returned to this caller only.
   */
  replace(build: () => Promise<T>): Promise<T> {
    const run = this.pending.then(async () => {
      const next = await build();
      this.current = next;
      return next;
    });
    // the next rebuild must wait for this one but not inherit its failure
    this.pending = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
