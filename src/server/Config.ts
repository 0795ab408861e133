import type { TokenParams } from '../kernel-core/L0/Ontology.js';
import { decodeParams } from '../kernel-core/L0/Codec.js';
import { ErrorCode, InvalidArgumentError } from '../kernel-core/Errors.js';

export type SignatureMode = 'ed25519' | 'trusted';

export interface LedgerConfig {
    port: number;
    dbPath: string;
    signatureMode: SignatureMode;
    logRequests: boolean;
    /** Genesis parameters; only consulted when the event store is empty. */
    genesis?: TokenParams;
}

export const DEFAULTS = {
    port: 3000,
    dbPath: 'ledger.db',
    signatureMode: 'ed25519',
    tokenName: 'Bulwark Asset',
    tokenSymbol: 'BWK',
    initialSupply: '1000000',
    maxSupply: '5000000'
} as const;

function configError(reason: string): InvalidArgumentError {
    return new InvalidArgumentError(ErrorCode.INVALID_PARAMETERS, `Invalid configuration: ${reason}`);
}

function parsePort(raw: string | undefined): number {
    if (raw === undefined || raw === '') return DEFAULTS.port;
    const port = Number(raw);
    if (!Number.isInteger(port) || port < 0 || port > 65535) throw configError(`LEDGER_PORT ${raw} is not a valid port`);
    return port;
}

function parseSignatureMode(raw: string | undefined): SignatureMode {
    const mode = raw ?? DEFAULTS.signatureMode;
    if (mode !== 'ed25519' && mode !== 'trusted') throw configError(`LEDGER_SIGNATURE_MODE must be ed25519 or trusted, got ${mode}`);
    return mode;
}

/**
 * Reads the ledger configuration from environment variables.
 * Genesis parameters are only assembled when TOKEN_OWNER is set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
    const config: LedgerConfig = {
        port: parsePort(env.LEDGER_PORT),
        dbPath: env.LEDGER_DB_PATH || DEFAULTS.dbPath,
        signatureMode: parseSignatureMode(env.LEDGER_SIGNATURE_MODE),
        logRequests: env.LEDGER_LOG_REQUESTS !== 'false'
    };

    if (env.TOKEN_OWNER) {
        const decimals = env.TOKEN_DECIMALS ? Number(env.TOKEN_DECIMALS) : undefined;
        config.genesis = decodeParams({
            name: env.TOKEN_NAME || DEFAULTS.tokenName,
            symbol: env.TOKEN_SYMBOL || DEFAULTS.tokenSymbol,
            decimals,
            initialSupply: env.TOKEN_INITIAL_SUPPLY || DEFAULTS.initialSupply,
            maxSupply: env.TOKEN_MAX_SUPPLY || DEFAULTS.maxSupply,
            owner: env.TOKEN_OWNER
        });
    }

    return config;
}
