import type { Disposable } from './types';

/**
 * Collects disposables and disposes them together.
 *
 * `disposeAll()` empties the bag and leaves it usable. `[Symbol.dispose]()`
 * also closes it: anything added afterwards is disposed on the spot. Pair it
 * with `using`, or run the work through `DisposeBag.scope`, to tie the
 * subscriptions to a block.
 */
export class DisposeBag implements Disposable {
  private readonly items = new Set<Disposable>();
  private closed = false;

  /**
   * Runs `body` with a fresh bag and disposes the bag however `body` exits.
   * `body` must be synchronous; a returned promise is not awaited.
   */
  static scope<R>(body: (bag: DisposeBag) => R): R {
    const bag = new DisposeBag();
    try {
      return body(bag);
    } finally {
      bag[Symbol.dispose]();
    }
  }

  add<D extends Disposable>(item: D): D {
    if (this.closed) {
      item[Symbol.dispose]();
      return item;
    }
    this.items.add(item);
    return item;
  }

  disposeAll(): void {
    const items = Array.from(this.items);
    this.items.clear();
    const failures: unknown[] = [];
    for (const item of items) {
      try {
        item[Symbol.dispose]();
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} of ${items.length} disposables failed`);
    }
  }

  [Symbol.dispose](): void {
    this.closed = true;
    this.disposeAll();
  }

  get size(): number {
    return this.items.size;
  }

  get isDisposed(): boolean {
    return this.closed;
  }
}
