import type { Channel } from './channel';
import type { DisposeBag } from './dispose-bag';
import { HAS_LISTENER, REMOVE } from './internal/tags';
import type { ChannelRef, ListenerToken, Subscription } from './types';

/**
 * Returned by `Channel.listen`. Holds the channel weakly: a subscription never
 * keeps a channel alive, and disposing one whose channel is gone does nothing.
 */
export class ChannelSubscription<V> implements Subscription {
  private ref: ChannelRef<Channel<V>> | undefined;
  private readonly token: ListenerToken;

  constructor(ref: ChannelRef<Channel<V>>, token: ListenerToken) {
    this.ref = ref;
    this.token = token;
  }

  get isActive(): boolean {
    return this.ref?.deref()?.[HAS_LISTENER](this.token) ?? false;
  }

  dispose(): void {
    const channel = this.ref?.deref();
    this.ref = undefined;
    channel?.[REMOVE](this.token);
  }

  unsubscribe(): void {
    this.dispose();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  /** Hands the subscription to `bag` and returns it. */
  disposed(by: DisposeBag): this {
    by.add(this);
    return this;
  }
}
