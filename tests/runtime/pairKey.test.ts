import { describe, it, expect } from 'vitest';
import { canonicalPair, formatPair, pairId, sideOf } from '../../src/runtime/amm/pairKey.js';
import { codeOf } from '../helpers/exchange.js';

describe('canonicalPair', () => {
    it('orders assets the same way regardless of argument order', () => {
        expect(canonicalPair('USD', 'ETH')).toEqual({ assetLow: 'ETH', assetHigh: 'USD' });
        expect(canonicalPair('ETH', 'USD')).toEqual({ assetLow: 'ETH', assetHigh: 'USD' });
    });

    it('rejects identical assets', () => {
        expect(codeOf(() => canonicalPair('ETH', 'ETH'))).toBe('IdenticalAssets');
    });

    it('rejects the null asset on either side', () => {
        expect(codeOf(() => canonicalPair('', 'ETH'))).toBe('NullAsset');
        expect(codeOf(() => canonicalPair('ETH', ''))).toBe('NullAsset');
        expect(codeOf(() => canonicalPair('0x0000', 'ETH'))).toBe('NullAsset');
    });
});

describe('sideOf', () => {
    const key = canonicalPair('USD', 'ETH');

    it('locates each asset', () => {
        expect(sideOf(key, 'ETH')).toBe('low');
        expect(sideOf(key, 'USD')).toBe('high');
    });

    it('throws for an asset outside the pair', () => {
        expect(() => sideOf(key, 'BTC')).toThrow('BTC is not part of pair ETH/USD');
    });
});

describe('pairId', () => {
    it('does not collide when separators appear inside asset names', () => {
        const left = pairId({ assetLow: 'A', assetHigh: 'B:C' });
        const right = pairId({ assetLow: 'A:B', assetHigh: 'C' });
        expect(left).not.toBe(right);
    });

    it('formats as low/high', () => {
        expect(formatPair(canonicalPair('USD', 'ETH'))).toBe('ETH/USD');
    });
});
