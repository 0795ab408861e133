import type { AccountID, Amount } from '../L0/Ontology.js';
import { AllowanceGuard, AmountGuard, BalanceGuard, enforce, NonNullGuard, SupplyCapGuard } from '../L0/Guards.js';
import { canonicalAccount, NULL_ACCOUNT, UNLIMITED_ALLOWANCE } from '../L0/Primitives.js';
import { requireActive } from '../L3/Switch.js';
import { transact, type Emit, type LedgerDraft, type LedgerState, type Transition } from '../L2/State.js';

// Every read and write goes through canonicalAccount, so any casing of an id
// names the same balance and allowance entries.

// --- Reads ---
export function balanceOf(state: LedgerState, account: AccountID): Amount {
    return state.balances[canonicalAccount(account)] ?? 0n;
}

export function allowance(state: LedgerState, ownerId: AccountID, spender: AccountID): Amount {
    return state.allowances[canonicalAccount(ownerId)]?.[canonicalAccount(spender)] ?? 0n;
}

export function totalSupply(state: LedgerState): Amount {
    return state.totalSupply;
}

// --- Settlement Primitive ---
export type Movement =
    | { kind: 'transfer'; from: AccountID; to: AccountID; amount: Amount }
    | { kind: 'issue'; to: AccountID; amount: Amount }
    | { kind: 'destroy'; from: AccountID; amount: Amount };

function debit(draft: LedgerDraft, account: AccountID, amount: Amount): void {
    const balance = draft.balances[account] ?? 0n;
    enforce(BalanceGuard({ account, balance, amount }));
    draft.balances[account] = balance - amount;
}

function credit(draft: LedgerDraft, account: AccountID, amount: Amount): void {
    draft.balances[account] = (draft.balances[account] ?? 0n) + amount;
}

/**
 * The single credit/debit primitive behind transfers, issuance and destruction.
 * The operational switch is consulted here, before anything else, so no
 * balance can move while the ledger is halted.
 */
export function settle(draft: LedgerDraft, movement: Movement, emit: Emit): void {
    requireActive(draft);
    enforce(AmountGuard({ amount: movement.amount }));

    switch (movement.kind) {
        case 'transfer': {
            const from = canonicalAccount(movement.from);
            const to = canonicalAccount(movement.to);
            const { amount } = movement;
            enforce(NonNullGuard({ account: from, role: 'sender' }));
            enforce(NonNullGuard({ account: to, role: 'recipient' }));
            debit(draft, from, amount);
            credit(draft, to, amount);
            emit({ type: 'Transfer', from, to, amount });
            return;
        }
        case 'issue': {
            const to = canonicalAccount(movement.to);
            const { amount } = movement;
            enforce(NonNullGuard({ account: to, role: 'recipient' }));
            enforce(SupplyCapGuard({ totalSupply: draft.totalSupply, maxSupply: draft.maxSupply, amount }));
            draft.totalSupply += amount;
            credit(draft, to, amount);
            emit({ type: 'Transfer', from: NULL_ACCOUNT, to, amount });
            return;
        }
        case 'destroy': {
            const from = canonicalAccount(movement.from);
            const { amount } = movement;
            debit(draft, from, amount);
            draft.totalSupply -= amount;
            emit({ type: 'Transfer', from, to: NULL_ACCOUNT, amount });
            return;
        }
    }
}

// --- Operations ---
export function transfer(state: LedgerState, caller: AccountID, to: AccountID, amount: Amount): Transition {
    return transact(state, (draft, emit) => {
        settle(draft, { kind: 'transfer', from: caller, to, amount }, emit);
    });
}

/**
 * Overwrites (does not add to) the allowance of `spender` over the caller's balance.
 * Changing a non-zero allowance to another non-zero value is open to the
 * well-known front-running race; callers that care should approve 0 first.
 */
export function approve(state: LedgerState, caller: AccountID, spenderId: AccountID, amount: Amount): Transition {
    const owner = canonicalAccount(caller);
    const spender = canonicalAccount(spenderId);
    return transact(state, (draft, emit) => {
        requireActive(draft);
        enforce(NonNullGuard({ account: owner, role: 'owner' }));
        enforce(NonNullGuard({ account: spender, role: 'spender' }));
        enforce(AmountGuard({ amount }));

        const bySpender: Record<AccountID, Amount> = draft.allowances[owner] ?? {};
        bySpender[spender] = amount;
        draft.allowances[owner] = bySpender;
        emit({ type: 'Approval', owner, spender, amount });
    });
}

export function transferFrom(state: LedgerState, callerId: AccountID, fromId: AccountID, to: AccountID, amount: Amount): Transition {
    const caller = canonicalAccount(callerId);
    const from = canonicalAccount(fromId);
    return transact(state, (draft, emit) => {
        requireActive(draft);
        enforce(NonNullGuard({ account: to, role: 'recipient' }));
        enforce(AmountGuard({ amount }));

        const current = draft.allowances[from]?.[caller] ?? 0n;
        enforce(AllowanceGuard({ owner: from, spender: caller, allowance: current, amount }));
        if (current !== UNLIMITED_ALLOWANCE) {
            const bySpender: Record<AccountID, Amount> = draft.allowances[from] ?? {};
            bySpender[caller] = current - amount;
            draft.allowances[from] = bySpender;
        }

        settle(draft, { kind: 'transfer', from, to, amount }, emit);
    });
}
