export { Channel, Emitter, createChannel, type Operator } from './channel';
export { ChannelSubscription } from './subscription';
export { DisposeBag } from './dispose-bag';
export { noBuffering, boundedReplay, unboundedReplay, describeStrategy } from './strategy';
export { ChannelError, HandlerError, type ChannelErrorCode } from './errors';
export { configure, getConfig, resetConfig } from './config';
export * from './operators';
export * from './types';

import { createChannel, type Channel, type Emitter } from './channel';
import { DisposeBag } from './dispose-bag';
import { boundedReplay, noBuffering, unboundedReplay } from './strategy';
import type { ChannelOptions } from './types';

export const hibiki = {
  make: createChannel,

  /** No buffering: only listeners attached at broadcast time see a value. */
  hot: <V>(options?: ChannelOptions): [Emitter<V>, Channel<V>] => createChannel<V>(noBuffering(), options),

  /** Replays the latest `upTo` values to each new listener. */
  warm: <V>(upTo: number, options?: ChannelOptions): [Emitter<V>, Channel<V>] =>
    createChannel<V>(boundedReplay(upTo), options),

  /** Replays everything ever broadcast. */
  cold: <V>(options?: ChannelOptions): [Emitter<V>, Channel<V>] => createChannel<V>(unboundedReplay(), options),

  bag: (): DisposeBag => new DisposeBag(),

  scope: DisposeBag.scope,
};

export default hibiki;
