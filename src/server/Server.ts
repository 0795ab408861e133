import express, { type NextFunction, type Request, type Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server as HttpServer } from 'http';
import { TokenKernel, type Receipt } from '../kernel-core/Kernel.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { AuditLog } from '../kernel-core/L5/Audit.js';
import { ReplayEngine } from '../kernel-core/L0/Replay.js';
import { decodeInput, encodeCommand, encodeEvent } from '../kernel-core/L0/Codec.js';
import { parseAccount } from '../kernel-core/L0/Primitives.js';
import { accountIdFromPublicKey, verifySignature } from '../kernel-core/L0/Crypto.js';
import { signingPayload } from '../kernel-core/L2/CommandFactory.js';
import {
    AuthorizationError, ErrorCode, InsufficientFundsError, InvalidArgumentError,
    InvalidTransitionError, KernelError, StateError, SupplyCapError
} from '../kernel-core/Errors.js';
import type { LedgerConfig, SignatureMode } from './Config.js';

export interface AppOptions {
    signatureMode: SignatureMode;
    logRequests?: boolean;
}

// body-parser failures carry their own 4xx status.
function clientStatusOf(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    const status: unknown = Reflect.get(error, 'status');
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function statusFor(error: unknown): number {
    if (error instanceof AuthorizationError) return 403;
    if (error instanceof StateError || error instanceof InvalidTransitionError) return 409;
    if (error instanceof InsufficientFundsError || error instanceof SupplyCapError) return 422;
    if (error instanceof InvalidArgumentError) return error.code === ErrorCode.SIGNATURE_INVALID ? 401 : 400;
    return clientStatusOf(error) ?? 500;
}

function errorCodeOf(error: unknown, status: number): string {
    if (error instanceof KernelError) return error.code;
    return status < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR';
}

function encodeReceipt(receipt: Receipt) {
    return { ...receipt, events: receipt.events.map(encodeEvent) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type AsyncHandler = (req: Request, res: Response) => Promise<void> | void;

// Express 4 does not forward rejected promises to the error middleware.
const handle = (fn: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
        .then(() => fn(req, res))
        .catch(next);
};

async function authenticate(body: Record<string, unknown>, caller: string): Promise<void> {
    const { publicKey, signature } = body;
    const reject = (reason: string) => new InvalidArgumentError(ErrorCode.SIGNATURE_INVALID, `Signature Violation: ${reason}`);

    if (typeof publicKey !== 'string' || typeof signature !== 'string') throw reject('publicKey and signature are required');
    if (!await verifySignature(signingPayload(body.command), signature, publicKey)) throw reject('invalid signature');
    if (accountIdFromPublicKey(publicKey) !== caller) throw reject('public key does not control the caller account');
}

/**
 * Builds the JSON API over a booted kernel.
 */
export function createApp(kernel: TokenKernel, options: AppOptions): express.Express {
    const app = express();
    app.use(cors());
    app.use(bodyParser.json());

    if (options.logRequests ?? true) {
        app.use((req, res, next) => {
            console.log(`[LedgerServer] ${req.method} ${req.url}`);
            next();
        });
    }

    // --- Reads ---
    app.get('/token', (req, res) => {
        res.json({
            name: kernel.name(),
            symbol: kernel.symbol(),
            decimals: kernel.decimals(),
            totalSupply: kernel.totalSupply().toString(),
            maxSupply: kernel.maxSupply().toString(),
            owner: kernel.owner(),
            paused: kernel.isPaused(),
            assetInfo: kernel.assetInfo()
        });
    });

    app.get('/balances/:account', handle((req, res) => {
        const account = parseAccount(req.params.account);
        res.json({ account, balance: kernel.balanceOf(account).toString() });
    }));

    app.get('/allowances/:owner/:spender', handle((req, res) => {
        const owner = parseAccount(req.params.owner, 'owner');
        const spender = parseAccount(req.params.spender, 'spender');
        res.json({ owner, spender, allowance: kernel.allowance(owner, spender).toString() });
    }));

    // --- Audit ---
    app.get('/audit', handle(async (req, res) => {
        const history = await kernel.getHistory();
        res.json(history.map(entry => ({ ...entry, command: encodeCommand(entry.command) })));
    }));

    app.get('/integrity', handle(async (req, res) => {
        res.json({ ok: await kernel.verifyIntegrity() });
    }));

    // --- Commands ---
    app.post('/commands', handle(async (req, res) => {
        const body: unknown = req.body;
        if (!isRecord(body)) throw new InvalidArgumentError(ErrorCode.INVALID_COMMAND, 'Invalid command: expected a JSON envelope');

        const input = decodeInput(body.command);
        const signed = options.signatureMode === 'ed25519';
        if (signed) {
            await authenticate(body, input.caller);
        }

        // A signed envelope is spent once presented, whether it commits or not.
        const receipt = await kernel.submit(input, { singleUse: signed });
        res.json(encodeReceipt(receipt));
    }));

    app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
        const status = statusFor(err);
        const code = errorCodeOf(err, status);
        const message = err instanceof Error ? err.message : String(err);
        if (status >= 500) console.error(`[LedgerServer] ${req.method} ${req.url} failed: ${message}`);
        if (res.headersSent) return next(err);
        res.status(status).json({ error: { code, message } });
    });

    return app;
}

export class LedgerServer {
    private eventStore: SQLiteEventStore;
    private http?: HttpServer;
    private kernel?: TokenKernel;

    constructor(private config: LedgerConfig) {
        this.eventStore = new SQLiteEventStore(config.dbPath);
    }

    public getKernel(): TokenKernel | undefined { return this.kernel; }

    /**
     * Rebuilds the ledger from the event store (or runs genesis on an empty
     * store) and starts listening.
     */
    public async start(): Promise<HttpServer> {
        try {
            const kernel = await this.boot();
            const app = createApp(kernel, { signatureMode: this.config.signatureMode, logRequests: this.config.logRequests });
            const server = await this.listen(app);
            this.http = server;
            return server;
        } catch (e) {
            this.eventStore.close();
            throw e;
        }
    }

    private listen(app: express.Express): Promise<HttpServer> {
        return new Promise<HttpServer>((resolve, reject) => {
            const server = app.listen(this.config.port);
            server.once('error', reject);
            server.once('listening', () => {
                server.off('error', reject);
                console.log(`[LedgerServer] Listening on port ${this.config.port}`);
                resolve(server);
            });
        });
    }

    private async boot(): Promise<TokenKernel> {
        const audit = new AuditLog(this.eventStore);
        const latest = await this.eventStore.getLatest();

        if (latest) {
            console.log('[LedgerServer] Replaying History...');
            this.kernel = await new ReplayEngine().replay(audit);
        } else {
            if (!this.config.genesis) {
                throw new InvalidArgumentError(ErrorCode.INVALID_PARAMETERS, 'Empty event store and no genesis parameters (set TOKEN_OWNER)');
            }
            this.kernel = await TokenKernel.create(this.config.genesis, audit);
        }

        console.log('[LedgerServer] Kernel Active.');
        return this.kernel;
    }

    public async close(): Promise<void> {
        const server = this.http;
        if (server) {
            await new Promise<void>((resolve, reject) => {
                server.close(err => (err ? reject(err) : resolve()));
            });
            this.http = undefined;
        }
        if (this.eventStore.isOpen()) this.eventStore.close();
    }
}
