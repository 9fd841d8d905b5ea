import { getConfig } from '../config';
import { warn } from './log';

/**
 * The single point every delivery of one channel passes through.
 *
 * Calls are synchronous, so two top-level deliveries never overlap; the only
 * way to arrive here while a delivery is running is from inside a handler, and
 * that call runs inline.
 */
export class DeliveryGate {
  private depth = 0;
  private warned = false;
  private readonly label: string;

  constructor(label: string) {
    this.label = label;
  }

  get isDelivering(): boolean {
    return this.depth > 0;
  }

  get currentDepth(): number {
    return this.depth;
  }

  run(work: () => void): void {
    this.depth++;
    try {
      if (!this.warned && this.depth > getConfig().maxDeliveryDepth) {
        this.warned = true;
        warn(`${this.label}: reentrant delivery nested ${this.depth} deep; a listener may be broadcasting to its own channel in a loop`);
      }
      work();
    } finally {
      this.depth--;
    }
  }
}
