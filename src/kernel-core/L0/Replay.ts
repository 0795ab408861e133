import { TokenKernel, type KernelOptions } from '../Kernel.js';
import { AuditLog } from '../L5/Audit.js';
import { createGenesisState, StateModel } from '../L2/State.js';
import { applyCommand } from '../L4/Dispatch.js';
import { checkInvariants } from './Invariants.js';
import { ErrorCode, KernelError } from '../Errors.js';

export class ReplayEngine {
    /**
     * Rebuilds a kernel from the audit log. The first entry must be GENESIS;
     * every SUCCESS entry is re-applied through the same operations that
     * accepted it, REJECT entries are skipped.
     */
    public async replay(log: AuditLog, options: KernelOptions = {}): Promise<TokenKernel> {
        const history = await log.getHistory();
        const [first, ...rest] = history;

        if (!first || first.status !== 'GENESIS' || first.command.op !== 'genesis') {
            throw new KernelError(ErrorCode.REPLAY_FAILURE, 'Replay Failure: audit log does not start with a GENESIS entry');
        }

        console.log(`[ReplayEngine] Starting replay of ${history.length} events...`);

        const genesis = createGenesisState(first.command.params);
        const state = new StateModel(genesis.state, first.evidenceId, first.timestamp);
        const seen: string[] = [];
        const rejected: string[] = [];

        for (const entry of rest) {
            if (entry.status === 'REJECT') rejected.push(entry.command.commandId);
            if (entry.status !== 'SUCCESS') continue;
            const command = entry.command;
            if (command.op === 'genesis') {
                throw new KernelError(ErrorCode.REPLAY_FAILURE, `Replay Failure: duplicate GENESIS at ${entry.evidenceId}`);
            }

            try {
                const before = state.current;
                const transition = applyCommand(before, command);
                const certified = checkInvariants({ before, after: transition.state });
                if (!certified.ok) throw new Error(certified.rejection.message);
                state.commit(transition.state, command.commandId, entry.evidenceId, entry.timestamp);
                seen.push(command.commandId);
            } catch (e) {
                const message = e instanceof Error ? e.message : String(e);
                throw new KernelError(ErrorCode.REPLAY_FAILURE, `Replay Failure at Command ${command.commandId}: ${message}`, { evidenceId: entry.evidenceId });
            }
        }

        // Trailing REJECT entries may be newer than the last committed snapshot.
        const tip = history[history.length - 1] ?? first;
        const kernel = new TokenKernel(state, log, { ...options, lastTimestamp: tip.timestamp });
        kernel.registerPresentedCommand(first.command.commandId);
        for (const id of rejected) kernel.registerPresentedCommand(id);
        for (const id of seen) kernel.registerSeenCommand(id);

        console.log(`[ReplayEngine] Replay complete. Version ${state.version}.`);
        return kernel;
    }
}
