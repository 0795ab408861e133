import type { AccountID, Amount } from './Ontology.js';
import { ErrorCode, InvalidArgumentError } from '../Errors.js';

export const NULL_ACCOUNT: AccountID = `0x${'0'.repeat(40)}`;

export const MAX_AMOUNT: Amount = (1n << 256n) - 1n;

/** Allowances at this value are never decremented. */
export const UNLIMITED_ALLOWANCE: Amount = MAX_AMOUNT;

export const DEFAULT_DECIMALS = 18;

const ACCOUNT_FORMAT = /^0x[0-9a-fA-F]{40}$/;
const DECIMAL_FORMAT = /^(0|[1-9][0-9]*)$/;

/** Account ids are stored and compared in lowercase. */
export function canonicalAccount(account: AccountID): AccountID {
    return account.toLowerCase();
}

export function isNullAccount(account: AccountID): boolean {
    return account === NULL_ACCOUNT;
}

export function isAccountId(value: unknown): value is AccountID {
    return typeof value === 'string' && ACCOUNT_FORMAT.test(value);
}

export function parseAccount(value: unknown, field: string = 'account'): AccountID {
    if (!isAccountId(value)) {
        throw new InvalidArgumentError(ErrorCode.INVALID_ACCOUNT, `Malformed ${field}: expected 0x-prefixed 20-byte hex`, { field });
    }
    return canonicalAccount(value);
}

export function isAmount(value: unknown): value is Amount {
    return typeof value === 'bigint' && value >= 0n && value <= MAX_AMOUNT;
}

/**
 * Accepts bigint, safe non-negative integers and decimal strings.
 */
export function parseAmount(value: unknown, field: string = 'amount'): Amount {
    let parsed: bigint | undefined;
    if (typeof value === 'bigint') parsed = value;
    else if (typeof value === 'number' && Number.isSafeInteger(value)) parsed = BigInt(value);
    else if (typeof value === 'string' && DECIMAL_FORMAT.test(value)) parsed = BigInt(value);

    if (parsed === undefined || !isAmount(parsed)) {
        throw new InvalidArgumentError(ErrorCode.INVALID_AMOUNT, `Malformed ${field}: expected integer in [0, 2^256 - 1]`, { field });
    }
    return parsed;
}

// --- Logical Time ---
export class LogicalTimestamp {
    constructor(public readonly time: number, public readonly logical: number) { }

    public static now(): LogicalTimestamp {
        return new LogicalTimestamp(Date.now(), 0);
    }

    public static fromString(s: string): LogicalTimestamp {
        const [time, logical] = s.split(':');
        return new LogicalTimestamp(parseInt(time || '0', 10), parseInt(logical || '0', 10));
    }

    public isBefore(other: LogicalTimestamp): boolean {
        return this.time < other.time || (this.time === other.time && this.logical < other.logical);
    }

    public toString(): string {
        return `${this.time}:${this.logical}`;
    }
}
