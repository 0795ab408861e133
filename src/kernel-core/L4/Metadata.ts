import type { AccountID } from '../L0/Ontology.js';
import { requireOwner } from '../L1/Access.js';
import { transact, type LedgerState, type Transition } from '../L2/State.js';

export function assetInfo(state: LedgerState): string {
    return state.assetInfo;
}

// Not gated by the operational switch; repeats of the same uri still notify.
export function setAssetInfo(state: LedgerState, caller: AccountID, uri: string): Transition {
    return transact(state, (draft, emit) => {
        const updatedBy = requireOwner(draft, caller);
        draft.assetInfo = uri;
        emit({ type: 'AssetInfoUpdated', uri, updatedBy });
    });
}
