/**
 * Lifecycle of one bridge instance:
 *
 *   idle → connecting → subscribed → stopping → idle
 *   connecting → idle   (connection failure)
 */
export type BridgeState = 'idle' | 'connecting' | 'subscribed' | 'stopping';

/** Why a run of the bridge ended. */
export type BridgeStopReason = 'stopped' | 'transport_error' | 'sink_error';

export interface BridgeOutcome {
  readonly reason: BridgeStopReason;
  readonly error?: Error | undefined;
}
