import type { AccountID, OperationalState } from '../L0/Ontology.js';
import { ActiveGuard, enforce, TransitionGuard } from '../L0/Guards.js';
import { requireOwner } from '../L1/Access.js';
import { transact, type LedgerState, type Transition } from '../L2/State.js';

// Operational Switch: ACTIVE <-> HALTED, owner-gated, no self-transitions.

export function requireActive(state: LedgerState): void {
    enforce(ActiveGuard({ state: state.operationalState }));
}

export function isPaused(state: LedgerState): boolean {
    return state.operationalState === 'HALTED';
}

function toggle(state: LedgerState, caller: AccountID, to: OperationalState): Transition {
    return transact(state, (draft, emit) => {
        const account = requireOwner(draft, caller);
        enforce(TransitionGuard({ from: draft.operationalState, to }));

        draft.operationalState = to;
        emit(to === 'HALTED' ? { type: 'Paused', account } : { type: 'Unpaused', account });
    });
}

export function pause(state: LedgerState, caller: AccountID): Transition {
    return toggle(state, caller, 'HALTED');
}

export function unpause(state: LedgerState, caller: AccountID): Transition {
    return toggle(state, caller, 'ACTIVE');
}
