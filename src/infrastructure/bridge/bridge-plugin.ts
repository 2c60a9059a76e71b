import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { NormalizedEvent } from '../../domain/index.js';
import type { RestartPolicy, TransportFactory } from '../../application/index.js';
import { EventBridge, EventQueue, sleep, superviseBridge } from '../../application/index.js';
import { createMqttTransport, brokerUrl } from '../mqtt/index.js';
import { startForwarder } from '../redis/index.js';
import type { RawSourceConfig } from '../config/index.js';

export interface BridgePluginOptions {
  log: Logger;
  source: RawSourceConfig;
  streamKey: string;
  queueCapacity: number;
  restartPolicy: RestartPolicy;
  forwardRetryMs: number;
  /** How long close waits for queued events to reach Redis before abandoning them. */
  drainTimeoutMs: number;
  /** Defaults to the MQTT transport. */
  createTransport?: TransportFactory;
}

/**
 * Fastify plugin that owns the event bridge for the lifetime of the server.
 *
 * Wiring: bridge → bounded EventQueue → forwarder → Redis Stream.
 *
 * - Starts the bridge during registration, so an invalid source or an
 *   unreachable broker fails server boot.
 * - Supervises it with the configured restart policy.
 * - Decorates `fastify.bridge` for the health route.
 * - On close: stop the bridge, close the queue, give the forwarder
 *   `drainTimeoutMs` to drain, then abandon what Redis has not taken.
 */
async function bridgePlugin(fastify: FastifyInstance, opts: BridgePluginOptions): Promise<void> {
  const log = opts.log.child({ component: 'event-bridge' });
  const bridge = new EventBridge(opts.createTransport ?? createMqttTransport(log), log);
  const queue = new EventQueue<NormalizedEvent>(opts.queueCapacity);
  const ac = new AbortController();
  const forwardAc = new AbortController();
  const emit = (event: NormalizedEvent): Promise<void> => queue.push(event);

  await bridge.start(opts.source, emit);

  const connection = bridge.connection;
  if (!connection) {
    throw new Error('Bridge reported no connection after start');
  }

  const forwarding = startForwarder(queue, fastify.redis, log, {
    streamKey: opts.streamKey,
    topic: connection.topic,
    broker: brokerUrl(connection),
    retryDelayMs: opts.forwardRetryMs,
    signal: forwardAc.signal,
  });

  const supervision = superviseBridge(bridge, opts.source, emit, opts.restartPolicy, log, ac.signal)
    .then((outcome) => {
      if (!ac.signal.aborted && outcome.reason !== 'stopped') {
        log.error(
          { reason: outcome.reason, err: outcome.error },
          'Event bridge is no longer listening; restart the process to resume',
        );
      }
      return outcome;
    });

  fastify.decorate('bridge', bridge);

  fastify.addHook('onClose', async () => {
    ac.abort();
    // Unblocks an emit waiting for queue space; the bridge is already stopping
    queue.close();
    await bridge.stop();

    const outcome = await supervision;

    const timer = new AbortController();
    const drained = await Promise.race([
      forwarding.then(() => true),
      sleep(opts.drainTimeoutMs, timer.signal).then(() => false),
    ]);
    timer.abort();
    if (!drained) {
      log.warn(
        { drainTimeoutMs: opts.drainTimeoutMs, pending: queue.size },
        'Forwarder did not drain in time, abandoning queued events',
      );
      forwardAc.abort();
    }

    const forwarded = await forwarding;
    log.info({ reason: outcome.reason, forwarded }, 'Event bridge shut down');
  });
}

export default fp(bridgePlugin, {
  name: 'event-bridge',
  dependencies: ['redis'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    bridge: EventBridge;
  }
}
