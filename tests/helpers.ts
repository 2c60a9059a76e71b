import { vi } from 'vitest';
import type { Logger } from 'pino';
import type {
  BrokerTransport,
  CloseListener,
  MessageHandler,
  QoS,
} from '../src/domain/index.js';

/** Minimal fake logger; `child()` returns the same fake. */
export function fakeLogger(): Logger {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Lets pending promise callbacks and timers of 0ms run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export const SOURCE = {
  host: 'localhost',
  port: 1883,
  topic: 'anomaly-data-out',
} as const;

/**
 * In-process BrokerTransport. Records every call and lets tests push
 * messages or drop the connection.
 */
export class FakeTransport implements BrokerTransport {
  readonly calls: string[] = [];
  connectError: Error | null = null;
  subscribeError: Error | null = null;
  /** Delivered from inside subscribe(), before it resolves. */
  deliverDuringSubscribe: string | null = null;
  subscribeDelivery: Promise<void> | null = null;

  private handler: MessageHandler | null = null;
  private readonly closeListeners: CloseListener[] = [];

  async connect(): Promise<void> {
    this.calls.push('connect');
    if (this.connectError) throw this.connectError;
  }

  async subscribe(topic: string, qos: QoS, handler: MessageHandler): Promise<void> {
    this.calls.push(`subscribe:${topic}:${qos}`);
    if (this.subscribeError) throw this.subscribeError;
    this.handler = handler;
    if (this.deliverDuringSubscribe !== null) {
      this.subscribeDelivery = this.deliver(this.deliverDuringSubscribe);
    }
  }

  async unsubscribe(topic: string): Promise<void> {
    this.calls.push(`unsubscribe:${topic}`);
  }

  async disconnect(): Promise<void> {
    this.calls.push('disconnect');
  }

  onClose(listener: CloseListener): void {
    this.closeListeners.push(listener);
  }

  /** Hands one message to the subscription handler, as the broker would. */
  deliver(payload: string | Buffer, topic: string = SOURCE.topic): Promise<void> {
    if (!this.handler) {
      throw new Error('FakeTransport: nothing subscribed');
    }
    const body = typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : payload;
    return this.handler({ topic, payload: body });
  }

  /** Simulates the broker closing the connection. */
  drop(error?: Error): void {
    for (const listener of this.closeListeners) {
      listener(error);
    }
  }
}
