import { describe, it, expect } from 'vitest';
import { inputValidator } from '../../src/protocol/security/input-validator.js';

describe('InputValidator', () => {
    describe('validateAmount', () => {
        it('accepts decimal strings beyond the safe integer range', () => {
            expect(inputValidator.validateAmount('123456789012345678901234567890'))
                .toEqual({ valid: true, value: 123456789012345678901234567890n });
        });
        it('accepts safe integers', () => {
            expect(inputValidator.validateAmount(42)).toEqual({ valid: true, value: 42n });
        });
        it('rejects fractions, signs and non-numbers', () => {
            expect(inputValidator.validateAmount('1.5').valid).toBe(false);
            expect(inputValidator.validateAmount('-1').valid).toBe(false);
            expect(inputValidator.validateAmount(1.5).valid).toBe(false);
            expect(inputValidator.validateAmount(null)).toEqual({ valid: false, error: 'amount must be a decimal string' });
        });
    });

    describe('validateOptionalAmount', () => {
        it('treats a missing value as zero', () => {
            expect(inputValidator.validateOptionalAmount(undefined, 'amountAMin')).toEqual({ valid: true, value: 0n });
        });
        it('names the field in errors', () => {
            expect(inputValidator.validateOptionalAmount('x', 'amountAMin'))
                .toEqual({ valid: false, error: 'amountAMin must contain digits only' });
        });
    });

    describe('validateAsset', () => {
        it('accepts symbol-like identifiers', () => {
            expect(inputValidator.validateAsset('USD.c')).toEqual({ valid: true, value: 'USD.c' });
        });
        it('rejects spaces and empty strings', () => {
            expect(inputValidator.validateAsset('US D')).toEqual({ valid: false, error: 'asset contains invalid characters' });
            expect(inputValidator.validateAsset('')).toEqual({ valid: false, error: 'asset must be a non-empty string' });
        });
    });

    describe('validateAccount', () => {
        it('rejects control characters', () => {
            expect(inputValidator.validateAccount('bob\n').valid).toBe(false);
        });
    });

    describe('validatePath', () => {
        it('splits comma-separated strings', () => {
            expect(inputValidator.validatePath('X, Y,Z')).toEqual({ valid: true, value: ['X', 'Y', 'Z'] });
        });
        it('reports the offending index', () => {
            expect(inputValidator.validatePath(['X', 7]))
                .toEqual({ valid: false, error: 'path[1] must be a non-empty string' });
        });
        it('caps the number of hops', () => {
            expect(inputValidator.validatePath(['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I']).valid).toBe(false);
        });
    });
});

describe('InputValidator.validateCredentials', () => {
    it('requires every signing field', () => {
        expect(inputValidator.validateCredentials({ publicKey: 'ab', signature: 'cd' }))
            .toEqual({ valid: false, error: 'Required: publicKey, signature, nonce' });
    });

    it('parses the nonce as an amount', () => {
        expect(inputValidator.validateCredentials({ publicKey: 'ab', signature: 'cd', nonce: '7' }))
            .toEqual({ valid: true, value: { publicKey: 'ab', signature: 'cd', nonce: 7n } });
        expect(inputValidator.validateCredentials({ publicKey: 'ab', signature: 'cd', nonce: '-1' }))
            .toEqual({ valid: false, error: 'nonce must contain digits only' });
    });
});
