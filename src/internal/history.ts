import type { Strategy } from '../types';

/**
 * Values retained for replay. Only the owning channel appends to it.
 */
export class HistoryBuffer<V> {
  private values: V[] = [];
  private readonly strategy: Strategy;

  constructor(strategy: Strategy) {
    this.strategy = strategy;
  }

  append(value: V): void {
    switch (this.strategy.kind) {
      case 'none':
        return;
      case 'bounded': {
        const { capacity } = this.strategy;
        if (capacity === 0) return;
        this.values.push(value);
        const overflow = this.values.length - capacity;
        if (overflow > 0) this.values.splice(0, overflow);
        return;
      }
      case 'unbounded':
        this.values.push(value);
        return;
    }
  }

  /** Oldest first. A copy, so later appends never show through. */
  snapshot(): V[] {
    return this.values.slice();
  }

  get size(): number {
    return this.values.length;
  }
}
