// src/kernel-core/L2/CommandFactory.ts
import type { AccountID, CommandBody, CommandInput } from '../L0/Ontology.js';
import { canonicalize, hash, randomNonce, signData } from '../L0/Crypto.js';
import { encodeBody, encodeInput, type WireObject } from '../L0/Codec.js';

/**
 * A command as it travels to the HTTP API: wire form plus optional Ed25519 proof.
 */
export interface SignedEnvelope {
    command: WireObject;
    publicKey?: string;
    signature?: string;
}

/** The exact bytes an Ed25519 signature covers. */
export function signingPayload(command: unknown): string {
    return canonicalize(command);
}

export class CommandFactory {
    /**
     * Command ID = SHA256(caller + canonical body + nonce), unless one is supplied.
     */
    static create(caller: AccountID, body: CommandBody, commandId?: string): CommandInput {
        const id = commandId ?? hash(`${caller}:${canonicalize(encodeBody(body))}:${randomNonce()}`);
        return { commandId: id, caller, ...body };
    }

    static async sign(command: CommandInput, publicKeyHex: string, privateKeyHex: string): Promise<SignedEnvelope> {
        const wire = encodeInput(command);
        const signature = await signData(signingPayload(wire), privateKeyHex);
        return { command: wire, publicKey: publicKeyHex, signature };
    }
}
