import type { Logger } from 'pino';
import type { BridgeOutcome, EmitFn } from '../domain/index.js';
import type { EventBridge } from './event-bridge.js';
import { sleep } from './sleep.js';

/**
 * Host-side restart policy for connection drops.
 *
 * The bridge itself never reconnects; this wrapper decides whether a run
 * that ended with `transport_error` is started again.
 */
export interface RestartPolicy {
  /** Total restarts allowed over the supervisor's lifetime. 0 disables restarting. */
  readonly maxRestarts: number;
  readonly delayMs: number;
}

export const NO_RESTART: RestartPolicy = { maxRestarts: 0, delayMs: 0 };

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Watches a started bridge until it stops for good and returns the final
 * outcome. The first start is the caller's, so its StartupError reaches
 * the caller directly.
 *
 * - After a `transport_error`, the bridge is restarted (up to
 *   `policy.maxRestarts` times, `policy.delayMs` apart). A failed restart
 *   counts as an attempt.
 * - `stopped` and `sink_error` end supervision immediately.
 * - Aborting `signal` stops the bridge and ends supervision.
 */
export async function superviseBridge(
  bridge: EventBridge,
  rawConfig: unknown,
  emit: EmitFn,
  policy: RestartPolicy,
  log: Logger,
  signal: AbortSignal,
): Promise<BridgeOutcome> {
  if (signal.aborted) {
    await bridge.stop();
    return { reason: 'stopped' };
  }

  const onAbort = (): void => {
    void bridge.stop();
  };
  signal.addEventListener('abort', onAbort, { once: true });

  try {
    let outcome = await bridge.closed;
    let restarts = 0;

    while (
      outcome.reason === 'transport_error'
      && restarts < policy.maxRestarts
      && !signal.aborted
    ) {
      restarts++;
      log.warn(
        { err: outcome.error, attempt: restarts, maxRestarts: policy.maxRestarts, delayMs: policy.delayMs },
        'Restarting bridge after connection loss',
      );

      await sleep(policy.delayMs, signal);
      if (signal.aborted) break;

      try {
        await bridge.start(rawConfig, emit);
        outcome = await bridge.closed;
      } catch (err: unknown) {
        log.error({ err, attempt: restarts }, 'Bridge restart failed');
        outcome = { reason: 'transport_error', error: toError(err) };
      }
    }

    if (outcome.reason === 'transport_error' && !signal.aborted) {
      log.error({ err: outcome.error, restarts }, 'Bridge gave up after connection loss');
    }
    return outcome;
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}
