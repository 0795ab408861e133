import { freeze, produce, type Draft } from 'immer';
import type { AccountID, Amount, CommandID, OperationalState, TokenEvent, TokenParams } from '../L0/Ontology.js';
import { canonicalAccount, DEFAULT_DECIMALS, isAccountId, isAmount, isNullAccount, LogicalTimestamp, NULL_ACCOUNT } from '../L0/Primitives.js';
import { canonicalize, hash, ZERO_HASH } from '../L0/Crypto.js';
import { ErrorCode, InvalidArgumentError, KernelError } from '../Errors.js';

// --- Ledger State ---
export interface LedgerState {
    readonly name: string;
    readonly symbol: string;
    readonly decimals: number;
    readonly balances: Readonly<Record<AccountID, Amount>>;
    readonly allowances: Readonly<Record<AccountID, Readonly<Record<AccountID, Amount>>>>;
    readonly totalSupply: Amount;
    readonly maxSupply: Amount;
    readonly owner: AccountID;
    readonly operationalState: OperationalState;
    readonly assetInfo: string;
}

export type LedgerDraft = Draft<LedgerState>;

/**
 * The outcome of one operation: the next state record and the notifications it emits.
 */
export interface Transition {
    state: LedgerState;
    events: TokenEvent[];
}

export type Emit = (event: TokenEvent) => void;

/**
 * Runs a recipe against a draft of `state`. A throw inside the recipe discards
 * the draft and every event emitted so far.
 */
export function transact(state: LedgerState, recipe: (draft: LedgerDraft, emit: Emit) => void): Transition {
    const events: TokenEvent[] = [];
    const next = produce(state, draft => {
        recipe(draft, event => { events.push(event); });
    });
    return { state: next, events };
}

// --- Genesis ---
export function validateParams(params: TokenParams): void {
    const fail = (reason: string) => new InvalidArgumentError(ErrorCode.INVALID_PARAMETERS, `Invalid token parameters: ${reason}`);

    if (typeof params.name !== 'string' || params.name.trim().length === 0) throw fail('name must be non-empty');
    if (typeof params.symbol !== 'string' || params.symbol.trim().length === 0) throw fail('symbol must be non-empty');
    const decimals = params.decimals ?? DEFAULT_DECIMALS;
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 255) throw fail('decimals must be an integer in [0, 255]');
    if (!isAmount(params.initialSupply)) throw fail('initialSupply out of range');
    if (!isAmount(params.maxSupply)) throw fail('maxSupply out of range');
    if (params.initialSupply > params.maxSupply) throw fail(`initialSupply ${params.initialSupply} exceeds maxSupply ${params.maxSupply}`);
    if (!isAccountId(params.owner)) throw fail('owner must be a 0x-prefixed 20-byte hex account');
    if (isNullAccount(canonicalAccount(params.owner))) throw fail('owner must not be the null account');
}

/**
 * Constructs the ledger with the initial supply credited to the creator.
 */
export function createGenesisState(params: TokenParams): Transition {
    validateParams(params);
    const owner = canonicalAccount(params.owner);

    const state: LedgerState = {
        name: params.name,
        symbol: params.symbol,
        decimals: params.decimals ?? DEFAULT_DECIMALS,
        balances: params.initialSupply > 0n ? { [owner]: params.initialSupply } : {},
        allowances: {},
        totalSupply: params.initialSupply,
        maxSupply: params.maxSupply,
        owner,
        operationalState: 'ACTIVE',
        assetInfo: ''
    };

    return {
        state: freeze(state, true),
        events: [{ type: 'Transfer', from: NULL_ACCOUNT, to: owner, amount: params.initialSupply }]
    };
}

// --- Snapshots ---
export interface StateSnapshot {
    version: number;
    state: LedgerState;
    stateRoot: string; // hash of the canonical state record
    commandId: CommandID;
    evidenceId: string;
    timestamp: string;
    hash: string;
    previousHash: string;
}

export function stateRoot(state: LedgerState): string {
    return hash(canonicalize(state));
}

function snapshotHash(version: number, commandId: string, evidenceId: string, timestamp: string, root: string, previousHash: string): string {
    const canonical: [number, string, string, string, string, string] = [version, commandId, evidenceId, timestamp, root, previousHash];
    return hash(canonicalize(canonical));
}

/**
 * Holds the single current ledger record and its hash-linked snapshot chain.
 */
export class StateModel {
    private snapshots: StateSnapshot[] = [];

    constructor(genesis: LedgerState, evidenceId: string, timestamp: string) {
        this.pushSnapshot(genesis, 'genesis', evidenceId, timestamp);
    }

    public get current(): LedgerState {
        return this.tip.state;
    }

    public get version(): number {
        return this.tip.version;
    }

    public getSnapshotChain(): readonly StateSnapshot[] { return this.snapshots; }

    private get tip(): StateSnapshot {
        const last = this.snapshots[this.snapshots.length - 1];
        if (!last) throw new KernelError(ErrorCode.INTEGRITY_BREACH, 'Critical: Genesis Snapshot Missing');
        return last;
    }

    /**
     * Records `next` as the current state. Timestamps must be monotonic.
     */
    public commit(next: LedgerState, commandId: CommandID, evidenceId: string, timestamp: string): StateSnapshot {
        const last = LogicalTimestamp.fromString(this.tip.timestamp);
        if (LogicalTimestamp.fromString(timestamp).isBefore(last)) {
            throw new KernelError(ErrorCode.INTEGRITY_BREACH, `Time Violation: ${timestamp} precedes ${this.tip.timestamp}`);
        }
        return this.pushSnapshot(next, commandId, evidenceId, timestamp);
    }

    private pushSnapshot(state: LedgerState, commandId: CommandID, evidenceId: string, timestamp: string): StateSnapshot {
        const previous = this.snapshots[this.snapshots.length - 1];
        const version = previous ? previous.version + 1 : 0;
        const previousHash = previous ? previous.hash : ZERO_HASH;
        const root = stateRoot(state);

        const snapshot: StateSnapshot = {
            version,
            state,
            stateRoot: root,
            commandId,
            evidenceId,
            timestamp,
            hash: snapshotHash(version, commandId, evidenceId, timestamp, root, previousHash),
            previousHash
        };
        this.snapshots.push(Object.freeze(snapshot));
        return snapshot;
    }

    public verifyIntegrity(): boolean {
        let prevHash = ZERO_HASH;
        for (const snap of this.snapshots) {
            if (snap.previousHash !== prevHash) return false;
            const root = stateRoot(snap.state);
            if (root !== snap.stateRoot) return false;
            if (snapshotHash(snap.version, snap.commandId, snap.evidenceId, snap.timestamp, root, prevHash) !== snap.hash) return false;
            prevHash = snap.hash;
        }
        return true;
    }
}
