import type { AccountID } from '../L0/Ontology.js';
import { enforce, NonNullGuard, OwnerGuard } from '../L0/Guards.js';
import { canonicalAccount, NULL_ACCOUNT } from '../L0/Primitives.js';
import { transact, type LedgerState, type Transition } from '../L2/State.js';

/**
 * Single-owner authorization gate, evaluated first by every administrative operation.
 * Fails while ownership is renounced or when the caller is anyone but the owner.
 * Returns the caller in canonical form.
 */
export function requireOwner(state: LedgerState, caller: AccountID): AccountID {
    enforce(OwnerGuard({ owner: state.owner, caller }));
    return canonicalAccount(caller);
}

export function owner(state: LedgerState): AccountID {
    return state.owner;
}

export function transferOwnership(state: LedgerState, caller: AccountID, newOwner: AccountID): Transition {
    return transact(state, (draft, emit) => {
        requireOwner(draft, caller);
        const next = canonicalAccount(newOwner);
        enforce(NonNullGuard({ account: next, role: 'new owner' }));

        const previousOwner = draft.owner;
        draft.owner = next;
        emit({ type: 'OwnershipTransferred', previousOwner, newOwner: next });
    });
}

/**
 * Clears the owner. IRREVERSIBLE: mint, burn, pause, unpause, setAssetInfo and
 * both ownership operations become permanently unreachable, and a ledger
 * renounced while halted stays halted forever.
 */
export function renounceOwnership(state: LedgerState, caller: AccountID): Transition {
    return transact(state, (draft, emit) => {
        requireOwner(draft, caller);

        const previousOwner = draft.owner;
        draft.owner = NULL_ACCOUNT;
        emit({ type: 'OwnershipTransferred', previousOwner, newOwner: NULL_ACCOUNT });
    });
}
