import type { HandlerError } from './errors';

export interface Disposable {
  [Symbol.dispose](): void;
}

export interface Subscription extends Disposable {
  dispose(): void;
  unsubscribe(): void;
  readonly isActive: boolean;
}

export type Handler<V> = (value: V) => void;

export type ErrorHandler<E> = (error: E) => void;

export type Strategy =
  | { readonly kind: 'none' }
  | { readonly kind: 'bounded'; readonly capacity: number }
  | { readonly kind: 'unbounded' };

export interface ChannelOptions {
  /** Name used in console reports. Defaults to `channel#<n>`. */
  label?: string;
  /** Receives anything a listener throws, wrapped. Without it the error is logged. */
  onError?: ErrorHandler<HandlerError>;
}

export interface HibikiConfig {
  maxDeliveryDepth: number;
  silent: boolean;
}

export interface ListenerToken {
  readonly slot: number;
  readonly generation: number;
}

/** The slice of `WeakRef` a subscription needs to reach its channel. */
export interface ChannelRef<C> {
  deref(): C | undefined;
}
