/**
 * Input Validator
 * Shape checks for API and CLI inputs before they reach the exchange.
 * Amounts travel as decimal strings so they survive JSON without precision loss.
 */

import type { Credentials } from './request-signature.js';

// Maximum allowed lengths
const MAX_ASSET_LENGTH = 64;
const MAX_ACCOUNT_LENGTH = 128;
const MAX_PATH_LENGTH = 8;
const MAX_AMOUNT_DIGITS = 78;   // fits 2^256

const ASSET_REGEX = /^[A-Za-z0-9._:-]+$/;
const AMOUNT_REGEX = /^\d+$/;

export type ValidationResult<T> =
    | { valid: true; value: T }
    | { valid: false; error: string };

export class InputValidator {
    /**
     * Validate an asset identifier
     */
    validateAsset(asset: unknown, fieldName: string = 'asset'): ValidationResult<string> {
        if (typeof asset !== 'string' || asset.length === 0) {
            return { valid: false, error: `${fieldName} must be a non-empty string` };
        }
        if (asset.length > MAX_ASSET_LENGTH) {
            return { valid: false, error: `${fieldName} too long (max ${MAX_ASSET_LENGTH})` };
        }
        if (!ASSET_REGEX.test(asset)) {
            return { valid: false, error: `${fieldName} contains invalid characters` };
        }
        return { valid: true, value: asset };
    }

    /**
     * Validate a principal / holder identifier
     */
    validateAccount(account: unknown, fieldName: string = 'account'): ValidationResult<string> {
        if (typeof account !== 'string' || account.trim().length === 0) {
            return { valid: false, error: `${fieldName} must be a non-empty string` };
        }
        if (account.length > MAX_ACCOUNT_LENGTH) {
            return { valid: false, error: `${fieldName} too long (max ${MAX_ACCOUNT_LENGTH})` };
        }
        // Check for control characters (potential injection)
        if (/[\x00-\x1f\x7f]/.test(account)) {
            return { valid: false, error: `${fieldName} contains invalid characters` };
        }
        return { valid: true, value: account };
    }

    /**
     * Validate a non-negative integer amount given as a decimal string or safe integer
     */
    validateAmount(amount: unknown, fieldName: string = 'amount'): ValidationResult<bigint> {
        if (typeof amount === 'number') {
            if (!Number.isSafeInteger(amount) || amount < 0) {
                return { valid: false, error: `${fieldName} must be a non-negative safe integer` };
            }
            return { valid: true, value: BigInt(amount) };
        }
        if (typeof amount !== 'string') {
            return { valid: false, error: `${fieldName} must be a decimal string` };
        }
        if (amount.length > MAX_AMOUNT_DIGITS) {
            return { valid: false, error: `${fieldName} too long` };
        }
        if (!AMOUNT_REGEX.test(amount)) {
            return { valid: false, error: `${fieldName} must contain digits only` };
        }
        return { valid: true, value: BigInt(amount) };
    }

    /**
     * Optional amount: absent means zero (slippage minimums)
     */
    validateOptionalAmount(amount: unknown, fieldName: string): ValidationResult<bigint> {
        if (amount === undefined || amount === null || amount === '') {
            return { valid: true, value: 0n };
        }
        return this.validateAmount(amount, fieldName);
    }

    /**
     * Validate a swap path, given as an array or a comma-separated string
     */
    validatePath(path: unknown, fieldName: string = 'path'): ValidationResult<string[]> {
        const items = typeof path === 'string' ? path.split(',').map(s => s.trim()) : path;
        if (!Array.isArray(items)) {
            return { valid: false, error: `${fieldName} must be an array of assets` };
        }
        if (items.length > MAX_PATH_LENGTH) {
            return { valid: false, error: `${fieldName} too long (max ${MAX_PATH_LENGTH} assets)` };
        }
        const assets: string[] = [];
        for (const [i, item] of items.entries()) {
            const result = this.validateAsset(item, `${fieldName}[${i}]`);
            if (!result.valid) return result;
            assets.push(result.value);
        }
        return { valid: true, value: assets };
    }

    /**
     * Validate the signing fields of a mutating request
     */
    validateCredentials(body: Record<string, unknown>): ValidationResult<Credentials> {
        const { publicKey, signature } = body;
        if (typeof publicKey !== 'string' || typeof signature !== 'string' || body.nonce === undefined) {
            return { valid: false, error: 'Required: publicKey, signature, nonce' };
        }
        const nonce = this.validateAmount(body.nonce, 'nonce');
        if (!nonce.valid) return nonce;
        return { valid: true, value: { publicKey, signature, nonce: nonce.value } };
    }
}

export const inputValidator = new InputValidator();
