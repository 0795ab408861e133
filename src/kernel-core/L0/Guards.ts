// src/kernel-core/L0/Guards.ts
import type { AccountID, Amount, CommandID, OperationalState } from './Ontology.js';
import { canonicalAccount, isAmount, isNullAccount, UNLIMITED_ALLOWANCE } from './Primitives.js';
import { checkInvariants, type InvariantContext, type Rejection } from './Invariants.js';
import { ErrorCode, errorFor } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string; details?: Record<string, unknown> };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string, details?: Record<string, unknown>): GuardResult => ({ ok: false, code, violation: msg, details });

/**
 * Converts a failed guard into its typed rejection and throws it.
 */
export function enforce(result: GuardResult): void {
    if (!result.ok) throw errorFor(result.code, result.violation, result.details);
}

// --- Concrete Guards ---

// 0. Invariants (Post-Transition Certification)
export const InvariantGuard: Guard<InvariantContext> = (ctx) => {
    const result = checkInvariants(ctx);
    if (!result.ok) {
        const rejection: Rejection = result.rejection;
        return FAIL(rejection.code, rejection.message, { ...rejection });
    }
    return OK;
};

// 1. Access Control
// A renounced owner is the null account; nobody can satisfy this guard again.
export const OwnerGuard: Guard<{ owner: AccountID, caller: AccountID }> = ({ owner, caller }) => {
    if (isNullAccount(owner)) return FAIL(ErrorCode.OWNERSHIP_RENOUNCED, 'Authority Violation: ownership has been renounced', { caller });
    if (canonicalAccount(caller) !== canonicalAccount(owner)) return FAIL(ErrorCode.NOT_OWNER, `Authority Violation: ${caller} is not the owner`, { caller });
    return OK;
};

// 2. Operational Switch
export const ActiveGuard: Guard<{ state: OperationalState }> = ({ state }) => {
    if (state !== 'ACTIVE') return FAIL(ErrorCode.OPERATION_HALTED, 'Operation halted: ledger is paused');
    return OK;
};

export const TransitionGuard: Guard<{ from: OperationalState, to: OperationalState }> = ({ from, to }) => {
    if (from === to) {
        return to === 'HALTED'
            ? FAIL(ErrorCode.ALREADY_PAUSED, 'Transition Violation: ledger is already paused')
            : FAIL(ErrorCode.NOT_PAUSED, 'Transition Violation: ledger is not paused');
    }
    return OK;
};

// 3. Arguments
export const NonNullGuard: Guard<{ account: AccountID, role: string }> = ({ account, role }) => {
    if (isNullAccount(account)) return FAIL(ErrorCode.NULL_ACCOUNT, `Invalid ${role}: null account`, { role });
    return OK;
};

export const AmountGuard: Guard<{ amount: Amount }> = ({ amount }) => {
    if (!isAmount(amount)) return FAIL(ErrorCode.INVALID_AMOUNT, 'Invalid amount: expected integer in [0, 2^256 - 1]');
    return OK;
};

// 4. Funds
export const BalanceGuard: Guard<{ account: AccountID, balance: Amount, amount: Amount }> = ({ account, balance, amount }) => {
    if (balance < amount) {
        return FAIL(ErrorCode.INSUFFICIENT_BALANCE, `Insufficient balance: ${account} holds ${balance}, needs ${amount}`, {
            account, balance: balance.toString(), amount: amount.toString()
        });
    }
    return OK;
};

export const AllowanceGuard: Guard<{ owner: AccountID, spender: AccountID, allowance: Amount, amount: Amount }> = ({ owner, spender, allowance, amount }) => {
    if (allowance === UNLIMITED_ALLOWANCE) return OK;
    if (allowance < amount) {
        return FAIL(ErrorCode.INSUFFICIENT_ALLOWANCE, `Insufficient allowance: ${spender} may move ${allowance} of ${owner}, needs ${amount}`, {
            owner, spender, allowance: allowance.toString(), amount: amount.toString()
        });
    }
    return OK;
};

// 5. Supply Cap (Issuance)
export const SupplyCapGuard: Guard<{ totalSupply: Amount, maxSupply: Amount, amount: Amount }> = ({ totalSupply, maxSupply, amount }) => {
    if (totalSupply + amount > maxSupply) {
        return FAIL(ErrorCode.SUPPLY_CAP_EXCEEDED, `Supply cap exceeded: ${totalSupply} + ${amount} > ${maxSupply}`, {
            totalSupply: totalSupply.toString(), maxSupply: maxSupply.toString(), amount: amount.toString()
        });
    }
    return OK;
};

// 6. Replay Guard
export const ReplayGuard: Guard<{ commandId: CommandID, seen: ReadonlySet<CommandID> }> = ({ commandId, seen }) => {
    if (seen.has(commandId)) return FAIL(ErrorCode.REPLAY_DETECTED, `Replay Violation: Command ${commandId} already processed`);
    return OK;
};
