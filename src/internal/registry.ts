import type { Handler, ListenerToken } from '../types';

export interface ListenerEntry<V> {
  readonly handler: Handler<V>;
  active: boolean;
  // Live values held back while the listener is still being replayed to
  backlog: V[] | undefined;
}

interface Slot<V> {
  generation: number;
  entry: ListenerEntry<V> | undefined;
}

/**
 * Slot arena of listeners. A token is a slot index plus the generation the slot
 * had when it was handed out; freeing a slot bumps its generation, so a stale
 * token can never remove the listener that reuses the slot.
 */
export class ListenerRegistry<V> {
  private readonly slots: Slot<V>[] = [];
  private readonly free: number[] = [];
  private count = 0;

  insert(handler: Handler<V>): { token: ListenerToken; entry: ListenerEntry<V> } {
    const entry: ListenerEntry<V> = { handler, active: true, backlog: undefined };
    const reused = this.free.pop();
    let slot: number;
    if (reused === undefined) {
      slot = this.slots.length;
      this.slots.push({ generation: 0, entry });
    } else {
      slot = reused;
      this.slots[slot].entry = entry;
    }
    this.count++;
    return { token: { slot, generation: this.slots[slot].generation }, entry };
  }

  remove(token: ListenerToken): boolean {
    const slot = this.slots[token.slot];
    if (!slot || slot.generation !== token.generation || !slot.entry) return false;
    slot.entry.active = false;
    slot.entry.backlog = undefined;
    slot.entry = undefined;
    slot.generation++;
    this.free.push(token.slot);
    this.count--;
    return true;
  }

  has(token: ListenerToken): boolean {
    const slot = this.slots[token.slot];
    return !!slot && slot.generation === token.generation && slot.entry !== undefined;
  }

  /** Entries registered right now, in slot order. */
  snapshot(): ListenerEntry<V>[] {
    const out: ListenerEntry<V>[] = [];
    for (const slot of this.slots) {
      if (slot.entry) out.push(slot.entry);
    }
    return out;
  }

  get size(): number {
    return this.count;
  }
}
