import type { CompositeStatus } from '../probe/types';
import type { RecoveryAttempt } from '../recovery/RecoveryController';

export type LoopState = 'checking' | 'recovering' | 'sleeping' | 'stopped';

export interface CycleResult {
  status: CompositeStatus;
  /** Present when the check triggered a recovery. */
  recovery?: RecoveryAttempt;
}

export interface LoopSummary {
  cycles: number;
  recoveries: number;
  failedRecoveries: number;
}

export type StateChangeHandler = (state: LoopState, previous: LoopState) => void;
