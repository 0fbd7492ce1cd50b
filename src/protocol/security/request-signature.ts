/**
 * Signed Requests
 *
 * An API principal is the address of an ed25519 public key:
 *   address = "amm" + first 40 hex chars of sha256(publicKeyHex)
 *
 * Every mutating API call carries { publicKey, signature, nonce }. The
 * signature covers sha256 of the canonical payload
 *   amm-exchange|ACTION|principal|field1|...|fieldN|nonce
 * and nonces must strictly increase per address.
 */

import * as ed from '@noble/ed25519';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex } from '@noble/hashes/utils';
import { logger } from '../utils/logger.js';

const log = logger.child('Auth');

export const ADDRESS_PREFIX = 'amm';
const SIGNING_DOMAIN = 'amm-exchange';

const PUBLIC_KEY_HEX = /^[0-9a-fA-F]{64}$/;
const SIGNATURE_HEX = /^[0-9a-fA-F]{128}$/;

export type SignedAction = 'ADD_LIQUIDITY' | 'REMOVE_LIQUIDITY' | 'SWAP' | 'SET_FEE';

export interface Credentials {
    publicKey: string;
    signature: string;
    nonce: bigint;
}

export interface SignedRequest extends Credentials {
    action: SignedAction;
    principal: string;
    fields: readonly string[];
}

export type SignatureCheck =
    | { valid: true }
    | { valid: false; status: 400 | 403; error: string };

export function publicKeyToAddress(publicKey: string): string {
    return ADDRESS_PREFIX + bytesToHex(sha256(publicKey.toLowerCase())).substring(0, 40);
}

export function signingHash(action: SignedAction, principal: string, fields: readonly string[], nonce: bigint): string {
    const payload = [SIGNING_DOMAIN, action, principal, ...fields, nonce.toString()].join('|');
    return bytesToHex(sha256(payload));
}

/**
 * Field order of each signed action
 */
export const signedFields = {
    addLiquidity(p: { assetA: string; assetB: string; amountADesired: bigint; amountBDesired: bigint; amountAMin: bigint; amountBMin: bigint }): string[] {
        return [p.assetA, p.assetB, p.amountADesired.toString(), p.amountBDesired.toString(), p.amountAMin.toString(), p.amountBMin.toString()];
    },
    removeLiquidity(p: { assetA: string; assetB: string; shareAmount: bigint; amountAMin: bigint; amountBMin: bigint }): string[] {
        return [p.assetA, p.assetB, p.shareAmount.toString(), p.amountAMin.toString(), p.amountBMin.toString()];
    },
    swap(p: { amountIn: bigint; amountOutMin: bigint; path: readonly string[]; recipient: string }): string[] {
        return [p.amountIn.toString(), p.amountOutMin.toString(), p.path.join(','), p.recipient];
    },
    setFee(p: { feeRate: bigint }): string[] {
        return [p.feeRate.toString()];
    },
};

export class RequestVerifier {
    private lastNonce: Map<string, bigint> = new Map();

    async verify(request: SignedRequest): Promise<SignatureCheck> {
        if (!PUBLIC_KEY_HEX.test(request.publicKey)) {
            return { valid: false, status: 400, error: 'publicKey must be 32 bytes of hex' };
        }
        if (!SIGNATURE_HEX.test(request.signature)) {
            return { valid: false, status: 400, error: 'signature must be 64 bytes of hex' };
        }
        if (publicKeyToAddress(request.publicKey) !== request.principal) {
            return { valid: false, status: 403, error: 'Public key does not match address' };
        }
        if (this.isReplay(request)) {
            return { valid: false, status: 403, error: 'Nonce already used' };
        }

        const hash = signingHash(request.action, request.principal, request.fields, request.nonce);
        let isValid: boolean;
        try {
            isValid = await ed.verifyAsync(request.signature, hash, request.publicKey);
        } catch (error) {
            log.warn(`🔒 Signature check errored for ${request.principal}:`, error);
            return { valid: false, status: 400, error: 'Signature verification failed' };
        }
        if (!isValid) {
            log.warn(`🔒 Invalid ${request.action} signature for ${request.principal}`);
            return { valid: false, status: 403, error: 'Invalid signature' };
        }

        // another request may have used the nonce while this one was verifying
        if (this.isReplay(request)) {
            return { valid: false, status: 403, error: 'Nonce already used' };
        }
        this.lastNonce.set(request.principal, request.nonce);
        return { valid: true };
    }

    private isReplay(request: SignedRequest): boolean {
        const last = this.lastNonce.get(request.principal);
        return last !== undefined && request.nonce <= last;
    }
}
