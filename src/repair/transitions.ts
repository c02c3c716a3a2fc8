import type { IntegrityState } from '../audit/audit-types.js';
import { canTransition } from './states.js';

export interface StateTransition {
  from: IntegrityState;
  to: IntegrityState;
  timestamp: string;
  reason?: string;
}

export class IllegalStateTransitionError extends Error {
  constructor(
    public readonly from: IntegrityState,
    public readonly to: IntegrityState
  ) {
    super(`Illegal state transition: ${from} → ${to}`);
    this.name = 'IllegalStateTransitionError';
  }
}

/**
 * @throws IllegalStateTransitionError when `to` is not reachable from `from`
 */
export function createTransition(
  from: IntegrityState,
  to: IntegrityState,
  timestamp: string,
  reason?: string
): StateTransition {
  if (!canTransition(from, to)) {
    throw new IllegalStateTransitionError(from, to);
  }

  return {
    from,
    to,
    timestamp,
    reason,
  };
}
