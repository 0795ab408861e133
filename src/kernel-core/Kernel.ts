import type { AccountID, Amount, Command, CommandBody, CommandID, CommandInput, GenesisCommand, TokenEvent, TokenParams } from './L0/Ontology.js';
import { enforce, InvariantGuard, ReplayGuard } from './L0/Guards.js';
import { LogicalTimestamp } from './L0/Primitives.js';
import { decodeInput, encodeInput } from './L0/Codec.js';
import { CommandQueue } from './L0/CommandQueue.js';
import { createGenesisState, StateModel, type LedgerState, type Transition } from './L2/State.js';
import { CommandFactory } from './L2/CommandFactory.js';
import { owner } from './L1/Access.js';
import { isPaused } from './L3/Switch.js';
import { allowance, balanceOf, totalSupply } from './L4/Ledger.js';
import { maxSupply } from './L4/Supply.js';
import { assetInfo } from './L4/Metadata.js';
import { applyCommand } from './L4/Dispatch.js';
import { AuditLog, type Evidence } from './L5/Audit.js';
import { NotificationHub, type NotificationListener } from './L5/Notifications.js';
import { ErrorCode, KernelError } from './Errors.js';

export interface Receipt {
    commandId: CommandID;
    events: TokenEvent[];
    evidenceId: string;
    stateHash: string; // Snapshot hash after the commit
    version: number;
    timestamp: string;
}

export interface KernelOptions {
    notifications?: NotificationHub;
    clock?: () => number;
    /** Latest timestamp already in the audit log; new entries are stamped after it. */
    lastTimestamp?: string;
}

export interface SubmitOptions {
    /**
     * Refuses any command id the kernel has ever processed, committed or rejected.
     * Used for signed envelopes, which must not be re-presented.
     */
    singleUse?: boolean;
}

/**
 * Serialized command processor over the single ledger state record.
 *
 * Every mutation is queued; it runs guards, the operation and the post-transition
 * invariants, then persists evidence, and only then commits the snapshot and
 * publishes its events. A failure at any step leaves the state untouched.
 */
export class TokenKernel {
    private seenCommands: Set<CommandID> = new Set(); // Replay Protection
    private presentedCommands: Set<CommandID> = new Set(); // Every id that reached the log
    private queue = new CommandQueue();
    private notifications: NotificationHub;
    private clock: () => number;
    private lastTimestamp: LogicalTimestamp;

    public constructor(
        public readonly state: StateModel,
        private audit: AuditLog,
        options: KernelOptions = {}
    ) {
        this.notifications = options.notifications ?? new NotificationHub();
        this.clock = options.clock ?? Date.now;
        const chain = state.getSnapshotChain();
        this.lastTimestamp = LogicalTimestamp.fromString(options.lastTimestamp ?? chain[chain.length - 1]?.timestamp ?? '0:0');
    }

    /**
     * Constructs a fresh ledger: validates the parameters, credits the initial
     * supply to the owner and records the GENESIS evidence entry.
     */
    public static async create(params: TokenParams, audit: AuditLog = new AuditLog(), options: KernelOptions = {}): Promise<TokenKernel> {
        const genesis = createGenesisState(params);
        const time = (options.clock ?? Date.now)();
        const command: GenesisCommand = {
            commandId: 'genesis',
            caller: genesis.state.owner,
            timestamp: new LogicalTimestamp(time, 0).toString(),
            op: 'genesis',
            params: { ...params, owner: genesis.state.owner }
        };

        const evidence = await audit.append(command, 'GENESIS');
        const model = new StateModel(genesis.state, evidence.evidenceId, command.timestamp);
        const kernel = new TokenKernel(model, audit, options);
        kernel.registerPresentedCommand(command.commandId);
        kernel.publish(command.commandId, evidence.evidenceId, genesis.events);

        console.log(`[TokenKernel] Genesis: ${params.symbol} supply ${params.initialSupply}/${params.maxSupply} owned by ${genesis.state.owner}`);
        return kernel;
    }

    /**
     * Replay support: marks a command id as already processed.
     */
    public registerSeenCommand(id: CommandID): void {
        this.seenCommands.add(id);
        this.presentedCommands.add(id);
    }

    /**
     * Replay support: marks a rejected command id as presented.
     */
    public registerPresentedCommand(id: CommandID): void {
        this.presentedCommands.add(id);
    }

    public subscribe(listener: NotificationListener): () => void {
        return this.notifications.subscribe(listener);
    }

    /**
     * Queues a command. Resolves with the receipt once committed; rejects with
     * the typed error of the first failed check.
     */
    public async submit(input: CommandInput, options: SubmitOptions = {}): Promise<Receipt> {
        // Normalizes account casing and rejects malformed amounts before queueing.
        const normalized = decodeInput(encodeInput(input));
        return this.queue.run(() => this.process(normalized, options));
    }

    private async process(input: CommandInput, options: SubmitOptions): Promise<Receipt> {
        const command: Command = { ...input, timestamp: this.nextTimestamp() };
        const before = this.state.current;
        const seen = options.singleUse ? this.presentedCommands : this.seenCommands;

        let transition: Transition;
        try {
            enforce(ReplayGuard({ commandId: command.commandId, seen }));
            transition = applyCommand(before, command);
            enforce(InvariantGuard({ before, after: transition.state }));
        } catch (e) {
            this.presentedCommands.add(command.commandId);
            await this.reject(command, e);
            throw e;
        }

        const evidence = await this.audit.append(command, 'SUCCESS');
        const snapshot = this.state.commit(transition.state, command.commandId, evidence.evidenceId, command.timestamp);
        this.registerSeenCommand(command.commandId);
        this.publish(command.commandId, evidence.evidenceId, transition.events);

        return {
            commandId: command.commandId,
            events: transition.events,
            evidenceId: evidence.evidenceId,
            stateHash: snapshot.hash,
            version: snapshot.version,
            timestamp: command.timestamp
        };
    }

    private async reject(command: Command, error: unknown): Promise<void> {
        const code = error instanceof KernelError ? error.code : 'UNEXPECTED';
        const message = error instanceof Error ? error.message : String(error);

        if (code === ErrorCode.INTEGRITY_BREACH || code === 'UNEXPECTED') {
            console.error(`[TokenKernel] Commit aborted for ${command.op} ${command.commandId}: ${message}`);
        }
        await this.audit.append(command, 'REJECT', message, { code, op: command.op });
    }

    private publish(commandId: CommandID, evidenceId: string, events: TokenEvent[]): void {
        for (const event of events) {
            this.notifications.publish({ commandId, evidenceId, event });
        }
    }

    private nextTimestamp(): string {
        const now = this.clock();
        const last = this.lastTimestamp;
        this.lastTimestamp = now > last.time
            ? new LogicalTimestamp(now, 0)
            : new LogicalTimestamp(last.time, last.logical + 1);
        return this.lastTimestamp.toString();
    }

    private run(caller: AccountID, body: CommandBody, commandId?: CommandID): Promise<Receipt> {
        return this.submit(CommandFactory.create(caller, body, commandId));
    }

    // --- Operations ---
    public transfer(caller: AccountID, to: AccountID, amount: Amount, commandId?: CommandID): Promise<Receipt> {
        return this.run(caller, { op: 'transfer', to, amount }, commandId);
    }

    public approve(caller: AccountID, spender: AccountID, amount: Amount, commandId?: CommandID): Promise<Receipt> {
        return this.run(caller, { op: 'approve', spender, amount }, commandId);
    }

    public transferFrom(caller: AccountID, from: AccountID, to: AccountID, amount: Amount, commandId?: CommandID): Promise<Receipt> {
        return this.run(caller, { op: 'transferFrom', from, to, amount }, commandId);
    }

    public mint(caller: AccountID, to: AccountID, amount: Amount, commandId?: CommandID): Promise<Receipt> {
        return this.run(caller, { op: 'mint', to, amount }, commandId);
    }

    public burn(caller: AccountID, amount: Amount, commandId?: CommandID): Promise<Receipt> {
        return this.run(caller, { op: 'burn', amount }, commandId);
    }

    public pause(caller: AccountID, commandId?: CommandID): Promise<Receipt> {
        return this.run(caller, { op: 'pause' }, commandId);
    }

    public unpause(caller: AccountID, commandId?: CommandID): Promise<Receipt> {
        return this.run(caller, { op: 'unpause' }, commandId);
    }

    public setAssetInfo(caller: AccountID, uri: string, commandId?: CommandID): Promise<Receipt> {
        return this.run(caller, { op: 'setAssetInfo', uri }, commandId);
    }

    public transferOwnership(caller: AccountID, newOwner: AccountID, commandId?: CommandID): Promise<Receipt> {
        return this.run(caller, { op: 'transferOwnership', newOwner }, commandId);
    }

    /**
     * IRREVERSIBLE. After this commits no account can ever mint, burn, pause,
     * unpause, set the asset info or change ownership again.
     */
    public renounceOwnership(caller: AccountID, commandId?: CommandID): Promise<Receipt> {
        return this.run(caller, { op: 'renounceOwnership' }, commandId);
    }

    // --- Reads (committed state only) ---
    public get snapshot(): LedgerState { return this.state.current; }
    public balanceOf(account: AccountID): Amount { return balanceOf(this.state.current, account); }
    public allowance(ownerId: AccountID, spender: AccountID): Amount { return allowance(this.state.current, ownerId, spender); }
    public totalSupply(): Amount { return totalSupply(this.state.current); }
    public maxSupply(): Amount { return maxSupply(this.state.current); }
    public owner(): AccountID { return owner(this.state.current); }
    public isPaused(): boolean { return isPaused(this.state.current); }
    public assetInfo(): string { return assetInfo(this.state.current); }
    public name(): string { return this.state.current.name; }
    public symbol(): string { return this.state.current.symbol; }
    public decimals(): number { return this.state.current.decimals; }

    public async verifyIntegrity(): Promise<boolean> {
        await this.queue.drain();
        return this.state.verifyIntegrity() && await this.audit.verifyChain();
    }

    public getHistory(): Promise<Evidence[]> {
        return this.audit.getHistory();
    }
}
