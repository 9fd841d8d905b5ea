export type ChannelErrorCode = 'LISTENER_FAILED';

export class ChannelError extends Error {
  readonly code: ChannelErrorCode;

  constructor(code: ChannelErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChannelError';
    this.code = code;
  }
}

/** Wraps whatever a listener threw, tagged with the channel it was listening to. */
export class HandlerError extends ChannelError {
  readonly label: string;
  readonly phase: 'live' | 'replay';

  constructor(label: string, phase: 'live' | 'replay', cause: unknown) {
    super('LISTENER_FAILED', `listener on ${label} threw during ${phase} delivery`, { cause });
    this.name = 'HandlerError';
    this.label = label;
    this.phase = phase;
  }
}
