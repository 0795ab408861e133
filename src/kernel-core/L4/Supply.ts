import type { AccountID, Amount } from '../L0/Ontology.js';
import { requireOwner } from '../L1/Access.js';
import { transact, type LedgerState, type Transition } from '../L2/State.js';
import { settle } from './Ledger.js';

// Supply Governor: issuance is capped by the write-once maxSupply.

export function maxSupply(state: LedgerState): Amount {
    return state.maxSupply;
}

/**
 * Issues `amount` new units to `to`. Rejects (never clamps) issuance past the cap.
 */
export function mint(state: LedgerState, caller: AccountID, to: AccountID, amount: Amount): Transition {
    return transact(state, (draft, emit) => {
        requireOwner(draft, caller);
        settle(draft, { kind: 'issue', to, amount }, emit);
    });
}

/**
 * Destroys `amount` units from the owner's own balance. There is no burn-from.
 */
export function burn(state: LedgerState, caller: AccountID, amount: Amount): Transition {
    return transact(state, (draft, emit) => {
        const from = requireOwner(draft, caller);
        settle(draft, { kind: 'destroy', from, amount }, emit);
    });
}
