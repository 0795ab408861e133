// src/kernel-core/L0/Codec.ts
// JSON-safe wire forms of commands and token parameters. Amounts travel as decimal strings.
import type { AccountID, Command, CommandBody, CommandInput, CommandOp, GenesisCommand, LedgerCommand, TokenEvent, TokenParams } from './Ontology.js';
import { parseAccount, parseAmount } from './Primitives.js';
import { ErrorCode, InvalidArgumentError } from '../Errors.js';

export type WireValue = string | number | boolean | null | WireValue[] | { [key: string]: WireValue };
export type WireObject = { [key: string]: WireValue };

const OPS: readonly CommandOp[] = [
    'transfer', 'approve', 'transferFrom', 'mint', 'burn',
    'pause', 'unpause', 'setAssetInfo', 'transferOwnership', 'renounceOwnership'
];

const MAX_URI_LENGTH = 2048;
const MAX_COMMAND_ID_LENGTH = 128;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOp(value: unknown): value is CommandOp {
    return typeof value === 'string' && OPS.some(op => op === value);
}

function invalid(reason: string): InvalidArgumentError {
    return new InvalidArgumentError(ErrorCode.INVALID_COMMAND, `Invalid command: ${reason}`);
}

// --- Encoding ---
export function encodeBody(body: CommandBody): WireObject {
    switch (body.op) {
        case 'transfer': return { op: body.op, to: body.to, amount: body.amount.toString() };
        case 'approve': return { op: body.op, spender: body.spender, amount: body.amount.toString() };
        case 'transferFrom': return { op: body.op, from: body.from, to: body.to, amount: body.amount.toString() };
        case 'mint': return { op: body.op, to: body.to, amount: body.amount.toString() };
        case 'burn': return { op: body.op, amount: body.amount.toString() };
        case 'setAssetInfo': return { op: body.op, uri: body.uri };
        case 'transferOwnership': return { op: body.op, newOwner: body.newOwner };
        case 'pause':
        case 'unpause':
        case 'renounceOwnership':
            return { op: body.op };
    }
}

export function encodeInput(command: CommandInput): WireObject {
    return { commandId: command.commandId, caller: command.caller, ...encodeBody(command) };
}

export function encodeParams(params: TokenParams): WireObject {
    const wire: WireObject = {
        name: params.name,
        symbol: params.symbol,
        initialSupply: params.initialSupply.toString(),
        maxSupply: params.maxSupply.toString(),
        owner: params.owner
    };
    if (params.decimals !== undefined) wire.decimals = params.decimals;
    return wire;
}

export function encodeCommand(command: LedgerCommand): WireObject {
    if (command.op === 'genesis') {
        return {
            commandId: command.commandId,
            caller: command.caller,
            timestamp: command.timestamp,
            op: command.op,
            params: encodeParams(command.params)
        };
    }
    return { ...encodeInput(command), timestamp: command.timestamp };
}

export function encodeEvent(event: TokenEvent): WireObject {
    switch (event.type) {
        case 'Transfer': return { type: event.type, from: event.from, to: event.to, amount: event.amount.toString() };
        case 'Approval': return { type: event.type, owner: event.owner, spender: event.spender, amount: event.amount.toString() };
        case 'Paused':
        case 'Unpaused':
            return { type: event.type, account: event.account };
        case 'OwnershipTransferred': return { type: event.type, previousOwner: event.previousOwner, newOwner: event.newOwner };
        case 'AssetInfoUpdated': return { type: event.type, uri: event.uri, updatedBy: event.updatedBy };
    }
}

// --- Decoding ---
function decodeBody(raw: Record<string, unknown>): CommandBody {
    const op = raw.op;
    if (!isOp(op)) throw invalid(`unknown op ${JSON.stringify(op)}`);

    switch (op) {
        case 'transfer':
            return { op, to: parseAccount(raw.to, 'to'), amount: parseAmount(raw.amount) };
        case 'approve':
            return { op, spender: parseAccount(raw.spender, 'spender'), amount: parseAmount(raw.amount) };
        case 'transferFrom':
            return { op, from: parseAccount(raw.from, 'from'), to: parseAccount(raw.to, 'to'), amount: parseAmount(raw.amount) };
        case 'mint':
            return { op, to: parseAccount(raw.to, 'to'), amount: parseAmount(raw.amount) };
        case 'burn':
            return { op, amount: parseAmount(raw.amount) };
        case 'setAssetInfo': {
            const uri = raw.uri;
            if (typeof uri !== 'string' || uri.length > MAX_URI_LENGTH) throw invalid(`uri must be a string of at most ${MAX_URI_LENGTH} characters`);
            return { op, uri };
        }
        case 'transferOwnership':
            return { op, newOwner: parseAccount(raw.newOwner, 'newOwner') };
        case 'pause':
        case 'unpause':
        case 'renounceOwnership':
            return { op };
    }
}

export function decodeInput(raw: unknown): CommandInput {
    if (!isRecord(raw)) throw invalid('expected an object');
    const { commandId } = raw;
    if (typeof commandId !== 'string' || commandId.length === 0 || commandId.length > MAX_COMMAND_ID_LENGTH) {
        throw invalid(`commandId must be a non-empty string of at most ${MAX_COMMAND_ID_LENGTH} characters`);
    }
    const caller: AccountID = parseAccount(raw.caller, 'caller');
    return { commandId, caller, ...decodeBody(raw) };
}

export function decodeParams(raw: unknown): TokenParams {
    if (!isRecord(raw)) throw invalid('token parameters must be an object');
    const { name, symbol, decimals } = raw;
    if (typeof name !== 'string' || typeof symbol !== 'string') throw invalid('name and symbol must be strings');
    if (decimals !== undefined && typeof decimals !== 'number') throw invalid('decimals must be a number');

    const params: TokenParams = {
        name,
        symbol,
        initialSupply: parseAmount(raw.initialSupply, 'initialSupply'),
        maxSupply: parseAmount(raw.maxSupply, 'maxSupply'),
        owner: parseAccount(raw.owner, 'owner')
    };
    if (decimals !== undefined) params.decimals = decimals;
    return params;
}

export function decodeCommand(raw: unknown): LedgerCommand {
    if (!isRecord(raw)) throw invalid('expected an object');
    const { timestamp } = raw;
    if (typeof timestamp !== 'string' || !/^\d+:\d+$/.test(timestamp)) throw invalid('timestamp must be "time:logical"');

    if (raw.op === 'genesis') {
        const genesis: GenesisCommand = {
            commandId: 'genesis',
            caller: parseAccount(raw.caller, 'caller'),
            timestamp,
            op: 'genesis',
            params: decodeParams(raw.params)
        };
        return genesis;
    }
    const command: Command = { ...decodeInput(raw), timestamp };
    return command;
}
