import { HandlerError } from './errors';
import { DeliveryGate } from './internal/delivery';
import { HistoryBuffer } from './internal/history';
import * as log from './internal/log';
import { ListenerRegistry, type ListenerEntry } from './internal/registry';
import { APPEND, ATTACH_UPSTREAM, HAS_LISTENER, REMOVE } from './internal/tags';
import { describeStrategy, noBuffering } from './strategy';
import { ChannelSubscription } from './subscription';
import type { ChannelOptions, ErrorHandler, Handler, ListenerToken, Strategy, Subscription } from './types';

export type Operator<T, U> = (source: Channel<T>) => Channel<U>;

let channelCount = 0;

/**
 * The read-only half of a pair made by `createChannel`. Listeners attach with
 * `listen`; values arrive from the paired `Emitter`.
 *
 * What a late listener sees depends on the strategy:
 *
 * ```ts
 * const [emitter, channel] = createChannel<number>(boundedReplay(1));
 * emitter.broadcast(1); // evicted by 2
 * emitter.broadcast(2); // kept for replay
 * channel.listen((v) => console.log(v)); // logs 2 right away, then 3
 * emitter.broadcast(3);
 * ```
 *
 * Handler order within one broadcast is unspecified.
 */
export class Channel<V> {
  readonly strategy: Strategy;
  readonly label: string;
  private readonly history: HistoryBuffer<V>;
  private readonly registry = new ListenerRegistry<V>();
  private readonly gate: DeliveryGate;
  private readonly onError?: ErrorHandler<HandlerError>;
  private readonly ref: WeakRef<Channel<V>>;
  private upstreamSubscription?: Subscription;

  constructor(strategy: Strategy = noBuffering(), options: ChannelOptions = {}) {
    this.strategy = strategy;
    this.label = options.label ?? `channel#${++channelCount}`;
    this.history = new HistoryBuffer<V>(strategy);
    this.gate = new DeliveryGate(this.label);
    this.onError = options.onError;
    this.ref = new WeakRef(this);
  }

  /**
   * Registers `handler`, replays retained values to it alone (oldest first),
   * then keeps it attached until the returned subscription is disposed.
   */
  listen(handler: Handler<V>): ChannelSubscription<V> {
    const { token, entry } = this.registry.insert(handler);
    // Taken together with the registration: anything appended from here on is live.
    const replay = this.history.snapshot();
    if (replay.length > 0) this.replayTo(entry, replay);
    return new ChannelSubscription<V>(this.ref, token);
  }

  pipe(): Channel<V>;
  pipe<A>(op1: Operator<V, A>): Channel<A>;
  pipe<A, B>(op1: Operator<V, A>, op2: Operator<A, B>): Channel<B>;
  pipe<A, B, C>(op1: Operator<V, A>, op2: Operator<A, B>, op3: Operator<B, C>): Channel<C>;
  pipe<A, B, C, D>(
    op1: Operator<V, A>,
    op2: Operator<A, B>,
    op3: Operator<B, C>,
    op4: Operator<C, D>
  ): Channel<D>;
  pipe<A, B, C, D, E>(
    op1: Operator<V, A>,
    op2: Operator<A, B>,
    op3: Operator<B, C>,
    op4: Operator<C, D>,
    op5: Operator<D, E>
  ): Channel<E>;
  pipe(...operators: Operator<V, V>[]): Channel<V> {
    let current: Channel<V> = this;
    for (const operator of operators) {
      current = operator(current);
    }
    return current;
  }

  get listenerCount(): number {
    return this.registry.size;
  }

  /** How many values a listener attaching now would be replayed. */
  get replaySize(): number {
    return this.history.size;
  }

  /** The subscription feeding a derived channel from its source, if any. */
  get upstream(): Subscription | undefined {
    return this.upstreamSubscription;
  }

  toString(): string {
    return `Channel(${this.label}, ${describeStrategy(this.strategy)}, ${this.registry.size} listeners)`;
  }

  [APPEND](value: V): void {
    this.history.append(value);
    const listeners = this.registry.snapshot();
    if (listeners.length === 0) return;
    this.gate.run(() => {
      for (const entry of listeners) {
        // Disposed earlier in this same delivery
        if (!entry.active) continue;
        if (entry.backlog) {
          entry.backlog.push(value);
          continue;
        }
        this.invoke(entry, value, 'live');
      }
    });
  }

  [REMOVE](token: ListenerToken): void {
    this.registry.remove(token);
  }

  [HAS_LISTENER](token: ListenerToken): boolean {
    return this.registry.has(token);
  }

  [ATTACH_UPSTREAM](subscription: Subscription): void {
    this.upstreamSubscription = subscription;
  }

  private replayTo(entry: ListenerEntry<V>, values: V[]): void {
    const backlog: V[] = [];
    entry.backlog = backlog;
    this.gate.run(() => {
      for (const value of values) {
        if (!entry.active) return;
        this.invoke(entry, value, 'replay');
      }
      // Broadcasts made while replaying; the length is read each turn because
      // handing one over may broadcast again.
      for (let i = 0; i < backlog.length; i++) {
        if (!entry.active) return;
        this.invoke(entry, backlog[i], 'live');
      }
    });
    entry.backlog = undefined;
  }

  private invoke(entry: ListenerEntry<V>, value: V, phase: 'live' | 'replay'): void {
    try {
      entry.handler(value);
    } catch (error) {
      this.report(new HandlerError(this.label, phase, error));
    }
  }

  private report(failure: HandlerError): void {
    if (!this.onError) {
      log.error(failure.message, failure.cause);
      return;
    }
    try {
      this.onError(failure);
    } catch (error) {
      log.error(`onError handler of ${this.label} threw`, error);
    }
  }
}

/**
 * The write-only half of a pair. Holds its channel strongly; the channel has
 * no reference back.
 */
export class Emitter<V> {
  private readonly channel: Channel<V>;

  constructor(channel: Channel<V>) {
    this.channel = channel;
  }

  broadcast(value: V): void {
    this.channel[APPEND](value);
  }
}

/** Makes a bound emitter/channel pair. Defaults to no buffering. */
export function createChannel<V>(
  strategy: Strategy = noBuffering(),
  options: ChannelOptions = {}
): [Emitter<V>, Channel<V>] {
  const channel = new Channel<V>(strategy, options);
  return [new Emitter<V>(channel), channel];
}
