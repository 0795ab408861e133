// src/kernel-core/L0/Invariants.ts
import type { LedgerState } from '../L2/State.js';
import { isAmount, isNullAccount } from './Primitives.js';
import { ErrorCode } from '../Errors.js';

export interface Invariant {
    id: string;
    boundary: string; // The named boundary (e.g. "Supply Conservation")
    description: string;
    permits: string; // "What would make this permissible?"
    predicate: (context: InvariantContext) => boolean;
    violation: ErrorCode;
}

export interface InvariantContext {
    before?: LedgerState;
    after: LedgerState;
}

export interface Rejection {
    code: ErrorCode;
    invariantId: string;
    boundary: string;
    permissible: string;
    message: string;
}

export function sumBalances(state: LedgerState): bigint {
    let total = 0n;
    for (const balance of Object.values(state.balances)) total += balance;
    return total;
}

// I. Supply
export const INV_SUP_01: Invariant = {
    id: 'INV-SUP-01',
    boundary: 'Supply Conservation',
    description: 'Sum of balances must equal total supply',
    permits: 'Every credit must be matched by a debit, issuance or destruction.',
    predicate: ({ after }) => sumBalances(after) === after.totalSupply,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_SUP_02: Invariant = {
    id: 'INV-SUP-02',
    boundary: 'Supply Ceiling',
    description: 'Total supply must lie within [0, maxSupply]',
    permits: 'Issuance must stay at or below the maximum supply.',
    predicate: ({ after }) => after.totalSupply >= 0n && after.totalSupply <= after.maxSupply,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_SUP_03: Invariant = {
    id: 'INV-SUP-03',
    boundary: 'Supply Ceiling',
    description: 'Maximum supply is write-once',
    permits: 'No operation may change the maximum supply.',
    predicate: ({ before, after }) => !before || before.maxSupply === after.maxSupply,
    violation: ErrorCode.INTEGRITY_BREACH
};

// II. Accounts
export const INV_ACC_01: Invariant = {
    id: 'INV-ACC-01',
    boundary: 'Account Integrity',
    description: 'Balances and allowances must be integers in [0, 2^256 - 1]',
    permits: 'Debits and allowance spends must never overdraw.',
    predicate: ({ after }) => {
        if (!Object.values(after.balances).every(isAmount)) return false;
        return Object.values(after.allowances).every(bySpender => Object.values(bySpender).every(isAmount));
    },
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_ACC_02: Invariant = {
    id: 'INV-ACC-02',
    boundary: 'Account Integrity',
    description: 'The null account never holds a balance',
    permits: 'Issuance and destruction are the only movements touching the null account.',
    predicate: ({ after }) => Object.keys(after.balances).every(account => !isNullAccount(account)),
    violation: ErrorCode.INTEGRITY_BREACH
};

// III. Governance
export const INV_GOV_01: Invariant = {
    id: 'INV-GOV-01',
    boundary: 'Token Descriptor',
    description: 'Name, symbol and decimals are immutable',
    permits: 'Descriptor fields are fixed at construction.',
    predicate: ({ before, after }) => !before || (
        before.name === after.name && before.symbol === after.symbol && before.decimals === after.decimals
    ),
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_GOV_02: Invariant = {
    id: 'INV-GOV-02',
    boundary: 'Ownership Finality',
    description: 'Renounced ownership is terminal',
    permits: 'Once renounced, ownership can never be reassigned.',
    predicate: ({ before, after }) => !before || !isNullAccount(before.owner) || isNullAccount(after.owner),
    violation: ErrorCode.INTEGRITY_BREACH
};

// --- Aggregate Ledger Check ---
export const LEDGER_INVARIANTS: Invariant[] = [
    INV_SUP_01, INV_SUP_02, INV_SUP_03,
    INV_ACC_01, INV_ACC_02,
    INV_GOV_01, INV_GOV_02
];

export function checkInvariants(context: InvariantContext): { ok: true } | { ok: false; rejection: Rejection } {
    for (const inv of LEDGER_INVARIANTS) {
        if (!inv.predicate(context)) {
            return {
                ok: false,
                rejection: {
                    code: inv.violation,
                    invariantId: inv.id,
                    boundary: inv.boundary,
                    permissible: inv.permits,
                    message: `Invariant Violation: ${inv.description}`
                }
            };
        }
    }
    return { ok: true };
}
