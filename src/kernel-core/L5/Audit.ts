// src/kernel-core/L5/Audit.ts
import { hash, canonicalize, ZERO_HASH } from '../L0/Crypto.js';
import type { LedgerCommand } from '../L0/Ontology.js';

/**
 * Event Store Port
 */
export interface IEventStore {
    append(evidence: Evidence): Promise<void>;
    getHistory(): Promise<Evidence[]>;
    getLatest(): Promise<Evidence | null>;
}

export type EvidenceStatus = 'GENESIS' | 'SUCCESS' | 'REJECT';

// --- Evidence (the ledger's truth substrate) ---
export interface Evidence {
    evidenceId: string; // The identifying hash
    previousEvidenceId: string; // Chain linkage
    command: LedgerCommand;
    status: EvidenceStatus;
    reason?: string;
    metadata?: Record<string, unknown>; // Structured diagnostics (error code, etc.)
    timestamp: string; // Logical Timestamp: "time:logical"
}

export class AuditLog {
    private localChain: Evidence[] = [];

    constructor(private store?: IEventStore) { }

    public async append(
        command: LedgerCommand,
        status: EvidenceStatus = 'SUCCESS',
        reason?: string,
        metadata?: Record<string, unknown>
    ): Promise<Evidence> {
        const latest = await this.getTip();
        const previousHash = latest ? latest.evidenceId : ZERO_HASH;
        const entryTs = command.timestamp;

        const evidence: Evidence = {
            evidenceId: calculateEvidenceHash(previousHash, command, status, entryTs, reason, metadata),
            previousEvidenceId: previousHash,
            command,
            status,
            timestamp: entryTs,
            ...(reason ? { reason } : {}),
            ...(metadata ? { metadata } : {})
        };

        Object.freeze(evidence);

        if (this.store) {
            await this.store.append(evidence);
        }

        this.localChain.push(evidence);
        return evidence;
    }

    public async getHistory(): Promise<Evidence[]> {
        if (this.store) {
            return await this.store.getHistory();
        }
        return [...this.localChain];
    }

    public async verifyChain(): Promise<boolean> {
        const history = await this.getHistory();
        let prev = ZERO_HASH;

        for (const entry of history) {
            // 1. Linkage Check
            if (entry.previousEvidenceId !== prev) return false;

            // 2. Hash Check
            const h = calculateEvidenceHash(prev, entry.command, entry.status, entry.timestamp, entry.reason, entry.metadata);
            if (h !== entry.evidenceId) return false;

            prev = entry.evidenceId;
        }
        return true;
    }

    public async getTip(): Promise<Evidence | null> {
        const local = this.localChain[this.localChain.length - 1];
        if (local) return local;
        if (this.store) return await this.store.getLatest();
        return null;
    }
}

/**
 * Canonical evidence tuple: [previousHash, commandId, status, timestamp, hash(reason), hash(metadata), hash(command)].
 */
export function calculateEvidenceHash(
    prevHash: string,
    command: LedgerCommand,
    status: EvidenceStatus,
    timestamp: string,
    reason?: string,
    metadata?: Record<string, unknown>
): string {
    const reasonHash = hash(reason ?? '');
    const metaHash = metadata ? hash(canonicalize(metadata)) : hash('{}');
    const commandHash = hash(canonicalize(command));

    const canonical: [string, string, string, string, string, string, string] = [
        prevHash,
        command.commandId,
        status,
        timestamp,
        reasonHash,
        metaHash,
        commandHash
    ];

    return hash(canonicalize(canonical));
}
