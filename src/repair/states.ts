import type { IntegrityState } from '../audit/audit-types.js';

export interface StateMetadata {
  state: IntegrityState;
  canTransitionTo: IntegrityState[];
  description: string;
}

const STATE_DEFINITIONS: Record<IntegrityState, Omit<StateMetadata, 'state'>> = {
  CLEAN: {
    canTransitionTo: [],
    description: 'No inconsistent blocks and every shared key well-formed',
  },

  TAMPERED: {
    canTransitionTo: ['CLEAN'],
    description: 'At least one inconsistent block or corrupted shared key',
  },
};

export function getStateMetadata(state: IntegrityState): StateMetadata {
  return {
    state,
    ...STATE_DEFINITIONS[state],
  };
}

export function canTransition(from: IntegrityState, to: IntegrityState): boolean {
  return STATE_DEFINITIONS[from].canTransitionTo.includes(to);
}
