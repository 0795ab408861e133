import { describe, test, expect, beforeEach } from '@jest/globals';
import { ReplayEngine } from '../Replay.js';
import { TokenKernel } from '../../Kernel.js';
import { AuditLog } from '../../L5/Audit.js';
import { ErrorCode, KernelError } from '../../Errors.js';
import { ALICE, BOB, CAROL, OWNER, MemoryEventStore, steppingClock, tokenParams } from '../../__tests__/fixtures.js';

async function rejection(promise: Promise<unknown>): Promise<KernelError> {
    try {
        await promise;
    } catch (e) {
        if (e instanceof KernelError) return e;
        throw e;
    }
    throw new Error('expected a KernelError');
}

describe('Replay Engine', () => {
    let store: MemoryEventStore;
    let original: TokenKernel;

    beforeEach(async () => {
        store = new MemoryEventStore();
        original = await TokenKernel.create(tokenParams(), new AuditLog(store), { clock: steppingClock(1000) });

        await original.transfer(OWNER, ALICE, 300n, 'c1');
        await original.approve(ALICE, BOB, 100n, 'c2');
        await original.transferFrom(BOB, ALICE, CAROL, 40n, 'c3');
        await expect(original.transfer(CAROL, BOB, 41n, 'c4')).rejects.toThrow(KernelError);
        await original.mint(OWNER, CAROL, 2n, 'c5');
        await original.setAssetInfo(OWNER, 'ipfs://asset/1', 'c6');
        await original.pause(OWNER, 'c7');
    });

    test('rebuilds the identical record and snapshot chain', async () => {
        const replayed = await new ReplayEngine().replay(new AuditLog(store));

        expect(replayed.snapshot).toEqual(original.snapshot);
        expect(replayed.state.getSnapshotChain().map(s => s.hash)).toEqual(original.state.getSnapshotChain().map(s => s.hash));
        expect(replayed.isPaused()).toBe(true);
        expect(replayed.allowance(ALICE, BOB)).toBe(60n);
        expect(await replayed.verifyIntegrity()).toBe(true);
    });

    test('replayed command ids stay spent; rejected ones stay open', async () => {
        const replayed = await new ReplayEngine().replay(new AuditLog(store));
        await replayed.unpause(OWNER, 'c8');

        expect((await rejection(replayed.transfer(OWNER, ALICE, 1n, 'c1'))).code).toBe(ErrorCode.REPLAY_DETECTED);
        await replayed.transfer(CAROL, BOB, 41n, 'c4');
        expect(replayed.balanceOf(BOB)).toBe(41n);
    });

    test('rejected ids stay spent for single-use submissions', async () => {
        const replayed = await new ReplayEngine().replay(new AuditLog(store));
        await replayed.unpause(OWNER, 'c8');

        const err = await rejection(replayed.submit({ commandId: 'c4', caller: CAROL, op: 'transfer', to: BOB, amount: 41n }, { singleUse: true }));
        expect(err.code).toBe(ErrorCode.REPLAY_DETECTED);
        expect(replayed.balanceOf(BOB)).toBe(0n);
    });

    test('new entries are stamped after a trailing rejection', async () => {
        // Clock ticks: genesis 1000, c1..c7 1001..1007, 'late' 1008.
        await expect(original.transfer(CAROL, BOB, 999n, 'late')).rejects.toThrow(KernelError);

        const replayed = await new ReplayEngine().replay(new AuditLog(store), { clock: () => 5 });
        const receipt = await replayed.unpause(OWNER, 'c8');
        expect(receipt.timestamp).toBe('1008:1');
    });

    test('the replayed kernel extends the same evidence chain', async () => {
        const replayed = await new ReplayEngine().replay(new AuditLog(store));
        await replayed.unpause(OWNER, 'c8');

        const history = await replayed.getHistory();
        expect(history).toHaveLength(9);
        expect(history[8]?.previousEvidenceId).toBe(history[7]?.evidenceId);
        expect(await replayed.verifyIntegrity()).toBe(true);
    });

    test('a log without genesis is refused', async () => {
        const headless = new MemoryEventStore();
        headless.events = store.events.slice(1);

        expect((await rejection(new ReplayEngine().replay(new AuditLog(headless)))).code).toBe(ErrorCode.REPLAY_FAILURE);
        expect((await rejection(new ReplayEngine().replay(new AuditLog(new MemoryEventStore())))).code).toBe(ErrorCode.REPLAY_FAILURE);
    });

    test('a recorded success that no longer applies is refused', async () => {
        const entry = store.events[1];
        if (!entry) throw new Error('missing entry');
        store.events[1] = {
            ...entry,
            command: { commandId: 'c1', caller: OWNER, op: 'transfer', to: ALICE, amount: 1_000_000n, timestamp: entry.timestamp }
        };

        const err = await rejection(new ReplayEngine().replay(new AuditLog(store)));
        expect(err.code).toBe(ErrorCode.REPLAY_FAILURE);
        expect(err.metadata).toEqual({ evidenceId: entry.evidenceId });
    });
});
