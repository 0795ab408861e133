/**
 * Bulwark Ledger Error Taxonomy
 * Centralized error codes for formal rejections and terminal failures.
 */

export enum ErrorCode {
    // I. Authority (Access Control)
    NOT_OWNER = 'NOT_OWNER',
    OWNERSHIP_RENOUNCED = 'OWNERSHIP_RENOUNCED',

    // II. Operational Switch
    OPERATION_HALTED = 'OPERATION_HALTED',
    ALREADY_PAUSED = 'ALREADY_PAUSED',
    NOT_PAUSED = 'NOT_PAUSED',

    // III. Funds & Supply
    INSUFFICIENT_BALANCE = 'INSUFFICIENT_BALANCE',
    INSUFFICIENT_ALLOWANCE = 'INSUFFICIENT_ALLOWANCE',
    SUPPLY_CAP_EXCEEDED = 'SUPPLY_CAP_EXCEEDED',

    // IV. Arguments & Intake
    NULL_ACCOUNT = 'NULL_ACCOUNT',
    INVALID_ACCOUNT = 'INVALID_ACCOUNT',
    INVALID_AMOUNT = 'INVALID_AMOUNT',
    INVALID_PARAMETERS = 'INVALID_PARAMETERS',
    INVALID_COMMAND = 'INVALID_COMMAND',
    SIGNATURE_INVALID = 'SIGNATURE_INVALID',
    REPLAY_DETECTED = 'REPLAY_DETECTED',

    // V. Kernel Internal
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
    REPLAY_FAILURE = 'REPLAY_FAILURE',
}

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Bulwark:${code}] ${message}`);
        this.name = 'KernelError';
    }
}

/**
 * Caller is not the current owner, or ownership has been renounced.
 */
export class AuthorizationError extends KernelError {
    constructor(code: ErrorCode.NOT_OWNER | ErrorCode.OWNERSHIP_RENOUNCED, message: string, metadata?: Record<string, unknown>) {
        super(code, message, metadata);
        this.name = 'AuthorizationError';
    }
}

/**
 * A gated operation was attempted while the ledger is halted.
 */
export class StateError extends KernelError {
    constructor(message: string, metadata?: Record<string, unknown>) {
        super(ErrorCode.OPERATION_HALTED, message, metadata);
        this.name = 'StateError';
    }
}

export class InsufficientFundsError extends KernelError {
    constructor(code: ErrorCode.INSUFFICIENT_BALANCE | ErrorCode.INSUFFICIENT_ALLOWANCE, message: string, metadata?: Record<string, unknown>) {
        super(code, message, metadata);
        this.name = 'InsufficientFundsError';
    }
}

export class SupplyCapError extends KernelError {
    constructor(message: string, metadata?: Record<string, unknown>) {
        super(ErrorCode.SUPPLY_CAP_EXCEEDED, message, metadata);
        this.name = 'SupplyCapError';
    }
}

export class InvalidArgumentError extends KernelError {
    constructor(code: ErrorCode, message: string, metadata?: Record<string, unknown>) {
        super(code, message, metadata);
        this.name = 'InvalidArgumentError';
    }
}

/**
 * pause() while halted, or unpause() while active.
 */
export class InvalidTransitionError extends KernelError {
    constructor(code: ErrorCode.ALREADY_PAUSED | ErrorCode.NOT_PAUSED, message: string, metadata?: Record<string, unknown>) {
        super(code, message, metadata);
        this.name = 'InvalidTransitionError';
    }
}

/**
 * Maps a rejection code onto its taxonomy class.
 */
export function errorFor(code: ErrorCode, message: string, metadata?: Record<string, unknown>): KernelError {
    switch (code) {
        case ErrorCode.NOT_OWNER:
        case ErrorCode.OWNERSHIP_RENOUNCED:
            return new AuthorizationError(code, message, metadata);
        case ErrorCode.OPERATION_HALTED:
            return new StateError(message, metadata);
        case ErrorCode.INSUFFICIENT_BALANCE:
        case ErrorCode.INSUFFICIENT_ALLOWANCE:
            return new InsufficientFundsError(code, message, metadata);
        case ErrorCode.SUPPLY_CAP_EXCEEDED:
            return new SupplyCapError(message, metadata);
        case ErrorCode.ALREADY_PAUSED:
        case ErrorCode.NOT_PAUSED:
            return new InvalidTransitionError(code, message, metadata);
        case ErrorCode.INTEGRITY_BREACH:
        case ErrorCode.REPLAY_FAILURE:
            return new KernelError(code, message, metadata);
        default:
            return new InvalidArgumentError(code, message, metadata);
    }
}
