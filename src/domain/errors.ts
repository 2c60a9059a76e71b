/**
 * Invalid configuration, or a connection / authentication / subscription
 * failure while starting. Surfaced to the host, never retried by the bridge.
 */
export class StartupError extends Error {
  readonly field: string | undefined;

  constructor(message: string, options: { field?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'StartupError';
    this.field = options.field;
  }
}

/** The broker connection dropped after a successful start. */
export class TransportError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
  }
}

/** The host's emit function rejected an event. */
export class SinkError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'SinkError';
  }
}

/** A push was attempted on a closed event queue. */
export class QueueClosedError extends Error {
  constructor() {
    super('Event queue is closed');
    this.name = 'QueueClosedError';
  }
}
