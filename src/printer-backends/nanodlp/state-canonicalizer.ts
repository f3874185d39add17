/**
 * @fileoverview NanoDLP state canonicalization with cancel latching.
 *
 * NanoDLP `State` codes as observed on devices:
 *   0 idle, 1 starting or ending a print (transient), 2 pause requested,
 *   3 paused, 4 cancel requested, 5 printing.
 *
 * A device that is finishing a cancel briefly reports idle, so code 4 latches
 * a cancel that survives later idle snapshots. Only a fresh start from idle
 * (0 then 1) clears it.
 *
 * `canonicalizeState` is pure: it takes the previous latch and returns the
 * next one. `NanoDlpStateHandler` holds that latch between polls and logs
 * transitions.
 */

import { logInfo } from '../../utils/logging';
import type { NanoStatus } from './nano-status';

export const STATE_CODE = {
  IDLE: 0,
  STARTING: 1,
  PAUSE_REQUESTED: 2,
  PAUSED: 3,
  CANCEL_REQUESTED: 4,
  PRINTING: 5,
  UNKNOWN: -1,
} as const;

export type CanonicalStatus = 'Idle' | 'Printing' | 'Paused' | 'Pausing' | 'Canceling';

export interface CanonicalTuple {
  readonly status: CanonicalStatus;
  readonly paused: boolean;
  readonly cancelLatched: boolean;
  readonly pauseLatched: boolean;
  readonly finished: boolean;
}

export interface LatchState {
  readonly cancelLatched: boolean;
  readonly previousStateCode: number;
}

export interface CanonicalizeResult {
  readonly latch: LatchState;
  readonly tuple: CanonicalTuple;
  readonly stateCode: number;
}

export type CanonicalizerInput = Pick<
  NanoStatus,
  'stateCode' | 'state' | 'printing' | 'paused' | 'layerId' | 'layersCount' | 'file'
>;

export function initialLatchState(): LatchState {
  return { cancelLatched: false, previousStateCode: STATE_CODE.UNKNOWN };
}

/**
 * Explicit code when present, otherwise inferred from the text and flags.
 */
export function resolveStateCode(status: CanonicalizerInput): number {
  if (status.stateCode !== null) {
    return status.stateCode;
  }
  const text = status.state.toLowerCase();
  if (text === 'printing' || status.printing) return STATE_CODE.PRINTING;
  if (text === 'paused' || status.paused) return STATE_CODE.PAUSED;
  if (text === 'idle') return STATE_CODE.IDLE;
  return STATE_CODE.UNKNOWN;
}

function tuple(
  status: CanonicalStatus,
  flags: Partial<Omit<CanonicalTuple, 'status'>> = {}
): CanonicalTuple {
  return {
    status,
    paused: flags.paused ?? false,
    cancelLatched: flags.cancelLatched ?? false,
    pauseLatched: flags.pauseLatched ?? false,
    finished: flags.finished ?? false,
  };
}

export function canonicalizeState(status: CanonicalizerInput, latch: LatchState): CanonicalizeResult {
  const stateCode = resolveStateCode(status);

  let cancelLatched = latch.cancelLatched;
  if (stateCode === STATE_CODE.CANCEL_REQUESTED) {
    cancelLatched = true;
  }
  if (latch.previousStateCode === STATE_CODE.IDLE && stateCode === STATE_CODE.STARTING) {
    cancelLatched = false;
  }

  const nextLatch: LatchState = { cancelLatched, previousStateCode: stateCode };
  const result = (canonical: CanonicalTuple): CanonicalizeResult => ({ latch: nextLatch, tuple: canonical, stateCode });

  if (stateCode === STATE_CODE.IDLE && cancelLatched) {
    return result(tuple('Idle', { cancelLatched: true }));
  }
  if (cancelLatched) {
    return result(tuple('Canceling', { cancelLatched: true }));
  }

  switch (stateCode) {
    case STATE_CODE.PAUSED:
      return result(tuple('Paused', { paused: true }));
    case STATE_CODE.STARTING:
    case STATE_CODE.PRINTING:
      return result(tuple('Printing'));
    case STATE_CODE.PAUSE_REQUESTED:
      return result(tuple('Pausing', { pauseLatched: true }));
    default:
      break;
  }

  if (status.paused) {
    return result(tuple('Paused', { paused: true }));
  }
  if (status.printing) {
    return result(tuple('Printing'));
  }

  // Leftover layer or file data on an idle device is read as a finished job.
  // Devices that keep stale metadata while idle will also match.
  const finished = status.layerId !== null || status.layersCount !== null || status.file !== null;
  return result(tuple('Idle', { finished }));
}

function sameTuple(a: CanonicalTuple, b: CanonicalTuple): boolean {
  return (
    a.status === b.status &&
    a.cancelLatched === b.cancelLatched &&
    a.pauseLatched === b.pauseLatched &&
    a.finished === b.finished
  );
}

/**
 * Holds the latch between polls and logs each distinct transition once.
 */
export class NanoDlpStateHandler {
  private latch: LatchState = initialLatchState();
  private lastReported: { stateCode: number; tuple: CanonicalTuple } | null = null;

  get cancelLatched(): boolean {
    return this.latch.cancelLatched;
  }

  canonicalize(status: CanonicalizerInput): CanonicalTuple {
    const next = canonicalizeState(status, this.latch);
    this.latch = next.latch;
    this.reportIfChanged(next.stateCode, next.tuple);
    return next.tuple;
  }

  /** Drop the cancel latch, e.g. when a new session starts */
  reset(): void {
    this.latch = { ...this.latch, cancelLatched: false };
  }

  private reportIfChanged(stateCode: number, current: CanonicalTuple): void {
    const last = this.lastReported;
    if (last && last.stateCode === stateCode && sameTuple(last.tuple, current)) {
      return;
    }
    const previousState = last ? String(last.stateCode) : 'unknown';
    const currentState = stateCode < 0 ? 'unknown' : String(stateCode);
    logInfo(
      'NanoDlpStateHandler',
      `state ${previousState} -> ${currentState} | status ${last?.tuple.status ?? 'unknown'} -> ${current.status}` +
        ` | cancel_latched: ${current.cancelLatched} | pause_latched: ${current.pauseLatched}` +
        ` | finished: ${current.finished}`
    );
    this.lastReported = { stateCode, tuple: current };
  }
}
