/**
 * BULWARK ONTOLOGY
 * The single source of truth for ledger primitives, commands and notifications.
 */

// --- 1. Identity ---
/** `0x` followed by 40 lowercase hex digits. */
export type AccountID = string;
export type CommandID = string;

// --- 2. Amounts ---
/** Non-negative integer bounded by 2^256 - 1. */
export type Amount = bigint;

// --- 3. Operational Switch ---
export type OperationalState = 'ACTIVE' | 'HALTED';

// --- 4. Construction ---
export interface TokenParams {
    name: string;
    symbol: string;
    decimals?: number;
    initialSupply: Amount;
    maxSupply: Amount;
    owner: AccountID;
}

// --- 5. Notifications ---
export interface TransferEvent {
    type: 'Transfer';
    from: AccountID;
    to: AccountID;
    amount: Amount;
}

export interface ApprovalEvent {
    type: 'Approval';
    owner: AccountID;
    spender: AccountID;
    amount: Amount;
}

export interface PausedEvent {
    type: 'Paused';
    account: AccountID;
}

export interface UnpausedEvent {
    type: 'Unpaused';
    account: AccountID;
}

export interface OwnershipTransferredEvent {
    type: 'OwnershipTransferred';
    previousOwner: AccountID;
    newOwner: AccountID;
}

export interface AssetInfoUpdatedEvent {
    type: 'AssetInfoUpdated';
    uri: string;
    updatedBy: AccountID;
}

export type TokenEvent =
    | TransferEvent
    | ApprovalEvent
    | PausedEvent
    | UnpausedEvent
    | OwnershipTransferredEvent
    | AssetInfoUpdatedEvent;

// --- 6. Commands ---
export type CommandBody =
    | { op: 'transfer'; to: AccountID; amount: Amount }
    | { op: 'approve'; spender: AccountID; amount: Amount }
    | { op: 'transferFrom'; from: AccountID; to: AccountID; amount: Amount }
    | { op: 'mint'; to: AccountID; amount: Amount }
    | { op: 'burn'; amount: Amount }
    | { op: 'pause' }
    | { op: 'unpause' }
    | { op: 'setAssetInfo'; uri: string }
    | { op: 'transferOwnership'; newOwner: AccountID }
    | { op: 'renounceOwnership' };

export type CommandOp = CommandBody['op'];

/** A command as submitted by a caller, before the kernel stamps it. */
export type CommandInput = {
    commandId: CommandID;
    caller: AccountID;
} & CommandBody;

export type Command = CommandInput & {
    timestamp: string; // Logical timestamp "time:logical"
};

/**
 * The construction record written as the first entry of the audit chain.
 */
export interface GenesisCommand {
    commandId: 'genesis';
    caller: AccountID;
    timestamp: string;
    op: 'genesis';
    params: TokenParams;
}

export type LedgerCommand = Command | GenesisCommand;
