import type { Logger } from 'pino';
import type {
  BridgeOutcome,
  BridgeState,
  BrokerTransport,
  ConnectionConfig,
  EmitFn,
  InboundMessage,
} from '../domain/index.js';
import { SinkError, StartupError, TransportError } from '../domain/index.js';
import { parseConnectionConfig } from './connection-schema.js';
import { decodePayload } from './decode-payload.js';

export type TransportFactory = (config: ConnectionConfig) => BrokerTransport;

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Event bridge — holds one broker subscription and emits a normalized
 * event for every inbound message.
 *
 * State machine: idle → connecting → subscribed → stopping → idle.
 * A failed connect goes straight back to idle and throws StartupError.
 *
 * Dispatch is serialized through a promise chain: message N+1 is not
 * decoded or emitted until `emit` for message N has settled. Once the
 * bridge leaves `subscribed`, queued messages are rejected without
 * reaching `emit`, and so are never acknowledged to the broker.
 *
 * The bridge never reconnects. A dropped connection ends the run with
 * `transport_error`; restarting is the host's decision (see superviseBridge).
 */
export class EventBridge {
  private readonly createTransport: TransportFactory;
  private readonly log: Logger;

  private currentState: BridgeState = 'idle';
  private transport: BrokerTransport | null = null;
  private config: ConnectionConfig | null = null;
  private emit: EmitFn | null = null;
  private dispatchTail: Promise<void> = Promise.resolve();
  private starting: Promise<void> | null = null;
  private teardown: Promise<void> | null = null;
  private closedPromise: Promise<BridgeOutcome> = Promise.resolve({ reason: 'stopped' });
  private resolveClosed: ((outcome: BridgeOutcome) => void) | null = null;

  constructor(createTransport: TransportFactory, log: Logger) {
    this.createTransport = createTransport;
    this.log = log;
  }

  get state(): BridgeState {
    return this.currentState;
  }

  /** Validated configuration of the current run, or null when idle. */
  get connection(): ConnectionConfig | null {
    return this.config;
  }

  /** Resolves with the outcome of the current (or last) run. */
  get closed(): Promise<BridgeOutcome> {
    return this.closedPromise;
  }

  /**
   * Validates `rawConfig`, connects and subscribes. Resolves once the
   * subscription is live; the listener then runs until `stop()` or a
   * connection drop.
   */
  async start(rawConfig: unknown, emit: EmitFn): Promise<void> {
    if (this.currentState !== 'idle') {
      throw new StartupError(`Bridge cannot start while ${this.currentState}`);
    }

    // Validation happens before any transport is created
    const config = parseConnectionConfig(rawConfig);

    this.starting = this.connectAndSubscribe(config, emit);
    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  /**
   * Unsubscribes, closes the connection and waits for an in-flight emit to
   * settle. No event is emitted after this resolves. Safe to call at any time.
   */
  async stop(): Promise<void> {
    if (this.starting) {
      await Promise.allSettled([this.starting]);
    }
    if (this.currentState === 'idle') return;

    await this.shutdown({ reason: 'stopped' });
  }

  private async connectAndSubscribe(config: ConnectionConfig, emit: EmitFn): Promise<void> {
    this.currentState = 'connecting';
    this.config = config;
    this.emit = emit;

    // Messages delivered while the subscription is being set up wait here
    const ready = deferred<void>();
    this.dispatchTail = ready.promise;

    const transport = this.createTransport(config);
    this.transport = transport;
    transport.onClose((err) => this.handleTransportClose(transport, err));

    this.log.info(
      { host: config.host, port: config.port, topic: config.topic },
      'Connecting to broker',
    );

    try {
      await transport.connect();
      await transport.subscribe(config.topic, config.qos, (message) => this.enqueueDispatch(message));
    } catch (err: unknown) {
      await this.release(transport);
      this.reset();
      ready.resolve();
      this.log.error(
        { err, host: config.host, port: config.port, topic: config.topic },
        'Bridge failed to start',
      );
      throw new StartupError(
        `Failed to subscribe to "${config.topic}" on ${config.host}:${config.port}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    const closed = deferred<BridgeOutcome>();
    this.closedPromise = closed.promise;
    this.resolveClosed = closed.resolve;
    this.currentState = 'subscribed';
    ready.resolve();

    this.log.info({ topic: config.topic, qos: config.qos }, 'Subscribed, listening for messages');
  }

  /**
   * Queues one message behind the previous dispatch. The returned promise
   * rejects when the message was not emitted, so the transport withholds
   * the broker acknowledgement.
   */
  private enqueueDispatch(message: InboundMessage): Promise<void> {
    const run = this.dispatchTail.then(() => this.dispatch(message));
    // The tail only orders dispatches; the failure belongs to this message's handler
    this.dispatchTail = run.catch(() => undefined);
    return run;
  }

  /** Decodes and emits one message. Rejects if `emit` was not reached or failed. */
  private async dispatch(message: InboundMessage): Promise<void> {
    const emit = this.emit;
    if (this.currentState !== 'subscribed' || !emit) {
      throw new Error(`Bridge is ${this.currentState}; message from "${message.topic}" was not emitted`);
    }

    const { structured, event } = decodePayload(message.payload);
    if (!structured) {
      this.log.debug(
        { topic: message.topic, bytes: message.payload.length },
        'Payload is not a JSON object, wrapping raw payload',
      );
    }

    try {
      await emit(event);
    } catch (err: unknown) {
      const error = new SinkError(`Event sink rejected a message from "${message.topic}"`, { cause: err });
      if (this.currentState !== 'subscribed') {
        this.log.debug({ err, topic: message.topic }, 'Emit rejected during shutdown');
        throw error;
      }
      this.log.error({ err, topic: message.topic }, 'Event sink failed, stopping listener');
      // Not awaited: teardown waits for this dispatch to finish
      void this.shutdown({ reason: 'sink_error', error });
      throw error;
    }
  }

  private handleTransportClose(transport: BrokerTransport, cause: Error | undefined): void {
    if (transport !== this.transport || this.currentState !== 'subscribed') return;

    const config = this.config;
    const error = new TransportError(
      `Connection to ${config?.host ?? 'broker'}:${config?.port ?? ''} lost`,
      { cause },
    );
    this.log.error({ err: error, topic: config?.topic }, 'Broker connection lost, stopping listener');
    void this.shutdown({ reason: 'transport_error', error });
  }

  private shutdown(outcome: BridgeOutcome): Promise<void> {
    if (this.teardown) return this.teardown;

    this.currentState = 'stopping';
    this.teardown = this.runTeardown(outcome);
    return this.teardown;
  }

  private async runTeardown(outcome: BridgeOutcome): Promise<void> {
    const transport = this.transport;
    const topic = this.config?.topic;

    if (transport && topic !== undefined && outcome.reason !== 'transport_error') {
      try {
        await transport.unsubscribe(topic);
      } catch (err: unknown) {
        this.log.warn({ err, topic }, 'Failed to unsubscribe');
      }
    }

    if (transport) {
      await this.release(transport);
    }

    await this.dispatchTail;

    const resolveClosed = this.resolveClosed;
    this.reset();
    this.teardown = null;

    this.log.info({ topic, reason: outcome.reason }, 'Bridge stopped');
    resolveClosed?.(outcome);
  }

  private async release(transport: BrokerTransport): Promise<void> {
    try {
      await transport.disconnect();
    } catch (err: unknown) {
      this.log.warn({ err }, 'Failed to close broker connection');
    }
  }

  private reset(): void {
    this.currentState = 'idle';
    this.transport = null;
    this.config = null;
    this.emit = null;
    this.resolveClosed = null;
  }
}
