import Database from 'better-sqlite3';
import type { IEventStore, Evidence, EvidenceStatus } from '../../kernel-core/L5/Audit.js';
import { decodeCommand, encodeCommand } from '../../kernel-core/L0/Codec.js';

interface AuditRow {
    sequence: number;
    evidenceId: string;
    previousEvidenceId: string;
    commandId: string;
    caller: string;
    op: string;
    status: string;
    timestamp: string;
    command: string;
    reason: string | null;
    metadata: string | null;
}

const STATUSES: readonly EvidenceStatus[] = ['GENESIS', 'SUCCESS', 'REJECT'];

function parseStatus(value: string): EvidenceStatus {
    const status = STATUSES.find(s => s === value);
    if (!status) throw new Error(`SQLiteEventStore: unknown evidence status ${value}`);
    return status;
}

function parseMetadata(value: string): Record<string, unknown> {
    const parsed: unknown = JSON.parse(value);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error('SQLiteEventStore: metadata column is not a JSON object');
    }
    return { ...parsed };
}

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'ledger.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence INTEGER PRIMARY KEY AUTOINCREMENT,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                commandId TEXT NOT NULL,
                caller TEXT NOT NULL,
                op TEXT NOT NULL,
                status TEXT NOT NULL,
                timestamp TEXT NOT NULL,
                command TEXT NOT NULL,
                reason TEXT,
                metadata TEXT
            )
        `);
    }

    async append(evidence: Evidence): Promise<void> {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                evidenceId, previousEvidenceId, commandId, caller, op, status, timestamp, command, reason, metadata
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            evidence.evidenceId,
            evidence.previousEvidenceId,
            evidence.command.commandId,
            evidence.command.caller,
            evidence.command.op,
            evidence.status,
            evidence.timestamp,
            JSON.stringify(encodeCommand(evidence.command)),
            evidence.reason ?? null,
            evidence.metadata ? JSON.stringify(evidence.metadata) : null
        );
    }

    async getHistory(): Promise<Evidence[]> {
        const rows = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence ASC').all();
        return rows.map(row => this.mapRowToEvidence(row));
    }

    async getLatest(): Promise<Evidence | null> {
        const row = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence DESC LIMIT 1').get();
        if (!row) return null;
        return this.mapRowToEvidence(row);
    }

    private mapRowToEvidence(row: AuditRow): Evidence {
        return {
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            command: decodeCommand(JSON.parse(row.command)),
            status: parseStatus(row.status),
            timestamp: row.timestamp,
            ...(row.reason !== null ? { reason: row.reason } : {}),
            ...(row.metadata !== null ? { metadata: parseMetadata(row.metadata) } : {})
        };
    }

    public isOpen(): boolean {
        return this.db.open;
    }

    public close() {
        this.db.close();
    }
}
