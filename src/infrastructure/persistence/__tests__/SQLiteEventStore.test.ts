import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SQLiteEventStore } from '../SQLiteEventStore.js';
import { TokenKernel } from '../../../kernel-core/Kernel.js';
import { AuditLog } from '../../../kernel-core/L5/Audit.js';
import { ReplayEngine } from '../../../kernel-core/L0/Replay.js';
import { KernelError } from '../../../kernel-core/Errors.js';
import { ALICE, BOB, OWNER, steppingClock, tokenParams } from '../../../kernel-core/__tests__/fixtures.js';

describe('SQLite Event Store', () => {
    let dir: string;
    let dbPath: string;
    let store: SQLiteEventStore;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-store-'));
        dbPath = path.join(dir, 'ledger.db');
        store = new SQLiteEventStore(dbPath);
    });

    afterEach(() => {
        store.close();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('an empty store has no tip', async () => {
        expect(await store.getLatest()).toBeNull();
        expect(await store.getHistory()).toEqual([]);
    });

    test('evidence round-trips with bigint amounts, reasons and metadata intact', async () => {
        const kernel = await TokenKernel.create(tokenParams({ decimals: 6 }), new AuditLog(store), { clock: steppingClock() });
        await kernel.transfer(OWNER, ALICE, 250n, 'c1');
        await expect(kernel.transfer(BOB, ALICE, 1n, 'c2')).rejects.toThrow(KernelError);

        const history = await store.getHistory();
        expect(await new AuditLog(store).verifyChain()).toBe(true);
        expect(history[0]?.command).toMatchObject({ op: 'genesis', params: { decimals: 6, initialSupply: 1000n } });
        expect(history.map(e => e.status)).toEqual(['GENESIS', 'SUCCESS', 'REJECT']);
        expect(history[1]?.command).toMatchObject({ op: 'transfer', amount: 250n, to: ALICE });
        expect(history[2]?.metadata).toEqual({ code: 'INSUFFICIENT_BALANCE', op: 'transfer' });
        expect((await store.getLatest())?.evidenceId).toBe(history[2]?.evidenceId);
    });

    test('a reopened database replays to the same ledger', async () => {
        const kernel = await TokenKernel.create(tokenParams(), new AuditLog(store), { clock: steppingClock() });
        await kernel.transfer(OWNER, ALICE, 250n);
        await kernel.approve(ALICE, BOB, 50n);
        await kernel.mint(OWNER, BOB, 9n);
        store.close();

        store = new SQLiteEventStore(dbPath);
        const audit = new AuditLog(store);
        expect(await audit.verifyChain()).toBe(true);

        const replayed = await new ReplayEngine().replay(audit);
        expect(replayed.snapshot).toEqual(kernel.snapshot);
        expect(replayed.balanceOf(BOB)).toBe(9n);
        expect(replayed.allowance(ALICE, BOB)).toBe(50n);

        await replayed.transfer(ALICE, BOB, 1n);
        expect(await replayed.verifyIntegrity()).toBe(true);
    });
});
