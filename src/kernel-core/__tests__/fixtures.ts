import type { TokenParams } from '../L0/Ontology.js';
import type { Evidence, IEventStore } from '../L5/Audit.js';
import { createGenesisState, type LedgerState } from '../L2/State.js';

export const OWNER = `0x${'1'.repeat(40)}`;
export const ALICE = `0x${'a'.repeat(40)}`;
export const BOB = `0x${'b'.repeat(40)}`;
export const CAROL = `0x${'c'.repeat(40)}`;

/** The same account id with its hex digits upper-cased. */
export function mixedCase(account: string): string {
    return `0x${account.slice(2).toUpperCase()}`;
}

export function tokenParams(overrides: Partial<TokenParams> = {}): TokenParams {
    return {
        name: 'Test Token',
        symbol: 'TST',
        initialSupply: 1000n,
        maxSupply: 5000n,
        owner: OWNER,
        ...overrides
    };
}

export function genesisState(overrides: Partial<TokenParams> = {}): LedgerState {
    return createGenesisState(tokenParams(overrides)).state;
}

/**
 * Fixed clock advancing 1ms per call.
 */
export function steppingClock(start: number = 1_000): () => number {
    let now = start;
    return () => now++;
}

export class MemoryEventStore implements IEventStore {
    public events: Evidence[] = [];

    async append(evidence: Evidence): Promise<void> {
        this.events.push(evidence);
    }

    async getHistory(): Promise<Evidence[]> {
        return [...this.events];
    }

    async getLatest(): Promise<Evidence | null> {
        return this.events[this.events.length - 1] ?? null;
    }
}
