// src/kernel-core/L0/Crypto.ts
import { createHash, randomBytes } from 'crypto';
import * as ed from '@noble/ed25519';
import type { AccountID } from './Ontology.js';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

export const ZERO_HASH = '0'.repeat(64);

// 1.2 Canonical Encoding
// Sorted object keys, bigint as decimal string, undefined members dropped.
export function canonicalize(value: unknown): string {
    return JSON.stringify(toCanonical(value));
}

function toCanonical(value: unknown): unknown {
    if (typeof value === 'bigint') return value.toString();
    if (Array.isArray(value)) return value.map(toCanonical);
    if (value !== null && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        for (const key of Object.keys(value).sort()) {
            const member: unknown = Reflect.get(value, key);
            if (member !== undefined) out[key] = toCanonical(member);
        }
        return out;
    }
    return value;
}

// 1.3 Digital Signatures (Ed25519, hex encoded)
export type Ed25519PublicKey = string;
export type Signature = string;

export interface KeyPair {
    publicKey: Ed25519PublicKey;
    privateKey: string;
}

export async function generateKeyPair(): Promise<KeyPair> {
    const privateKey = ed.utils.randomPrivateKey();
    const publicKey = await ed.getPublicKey(privateKey);
    return {
        publicKey: Buffer.from(publicKey).toString('hex'),
        privateKey: Buffer.from(privateKey).toString('hex')
    };
}

/**
 * Account ids are the trailing 20 bytes of SHA-256(publicKey).
 */
export function accountIdFromPublicKey(publicKeyHex: Ed25519PublicKey): AccountID {
    const digest = createHash('sha256').update(Buffer.from(publicKeyHex, 'hex')).digest('hex');
    return `0x${digest.slice(-40)}`;
}

export async function verifySignature(data: string, signature: Signature, publicKeyHex: Ed25519PublicKey): Promise<boolean> {
    if (!/^[0-9a-fA-F]+$/.test(signature) || !/^[0-9a-fA-F]{64}$/.test(publicKeyHex)) return false;
    try {
        return await ed.verify(signature, Buffer.from(data).toString('hex'), publicKeyHex);
    } catch (e) {
        console.warn(`[Crypto] Signature verification aborted: ${e instanceof Error ? e.message : String(e)}`);
        return false;
    }
}

export async function signData(data: string, privateKeyHex: string): Promise<Signature> {
    const sig = await ed.sign(Buffer.from(data).toString('hex'), privateKeyHex);
    return Buffer.from(sig).toString('hex');
}

// 1.4 Randomness
export function randomNonce(bytes: number = 16): string {
    return randomBytes(bytes).toString('hex');
}
