import { describe, it, expect, beforeEach } from 'vitest';
import { PairLedger, optimalDeposit } from '../../src/runtime/amm/PairLedger.js';
import { canonicalPair } from '../../src/runtime/amm/pairKey.js';
import { LOCKED_LIQUIDITY_HOLDER } from '../../src/protocol/params/amm.js';
import { codeOf } from '../helpers/exchange.js';

const key = canonicalPair('ETH', 'USD');

function deposit(amountLow: bigint, amountHigh: bigint, depositor: string = 'alice') {
    return {
        sideA: 'low' as const,
        amountADesired: amountLow,
        amountBDesired: amountHigh,
        amountAMin: 0n,
        amountBMin: 0n,
        depositor,
    };
}

describe('PairLedger', () => {
    let ledger: PairLedger;

    beforeEach(() => {
        ledger = new PairLedger();
        const draft = ledger.draft();
        draft.createPair(key);
        ledger.commit(draft);
    });

    it('creates an empty pool', () => {
        expect(ledger.getPool(key)).toEqual({
            assetLow: 'ETH',
            assetHigh: 'USD',
            exists: true,
            reserveLow: 0n,
            reserveHigh: 0n,
            totalShares: 0n,
        });
    });

    it('rejects a second pair for the same assets', () => {
        expect(codeOf(() => ledger.draft().createPair(key))).toBe('PairExists');
    });

    it('leaves committed state alone until commit', () => {
        const draft = ledger.draft();
        draft.addLiquidity(key, deposit(10_000n, 40_000n));
        expect(draft.getPool(key)?.reserveLow).toBe(10_000n);
        expect(ledger.getPool(key)?.reserveLow).toBe(0n);
    });

    describe('first deposit', () => {
        it('fails when sqrt(a*b) does not clear the locked minimum', () => {
            expect(codeOf(() => ledger.draft().addLiquidity(key, deposit(1000n, 1000n)))).toBe('InsufficientLiquidityMinted');
        });

        it('mints one share just above the minimum', () => {
            const draft = ledger.draft();
            const result = draft.addLiquidity(key, deposit(1001n, 1001n));
            ledger.commit(draft);

            expect(result.shares).toBe(1n);
            expect(ledger.getPool(key)?.totalShares).toBe(1001n);
            expect(ledger.getPosition(key, LOCKED_LIQUIDITY_HOLDER).shareAmount).toBe(1000n);
            expect(ledger.getPosition(key, 'alice').shareRatio).toBe(999000999000999n);
        });

        it('mints sqrt(a*b) - 1000 shares', () => {
            const draft = ledger.draft();
            const result = draft.addLiquidity(key, deposit(1_000_000n, 1_000_000n));
            expect(result.shares).toBe(999_000n);
        });
    });

    describe('later deposits', () => {
        beforeEach(() => {
            const draft = ledger.draft();
            draft.addLiquidity(key, deposit(10_000n, 40_000n));
            ledger.commit(draft);
        });

        it('mints shares in proportion to the reserves', () => {
            const draft = ledger.draft();
            const result = draft.addLiquidity(key, deposit(1000n, 5000n, 'bob'));
            ledger.commit(draft);

            expect(result).toEqual({ amountA: 1000n, amountB: 4000n, amountLow: 1000n, amountHigh: 4000n, shares: 2000n });
            expect(ledger.getPool(key)).toMatchObject({ reserveLow: 11_000n, reserveHigh: 44_000n, totalShares: 22_000n });
        });

        it('keeps totalShares equal to the sum of positions', () => {
            const draft = ledger.draft();
            draft.addLiquidity(key, deposit(1000n, 4000n, 'bob'));
            ledger.commit(draft);

            const sum = ledger.listPositions(key).reduce((acc, p) => acc + p.shareAmount, 0n);
            expect(sum).toBe(ledger.getPool(key)?.totalShares);
        });

        it('reads amounts for the side the caller listed first', () => {
            const draft = ledger.draft();
            const result = draft.addLiquidity(key, {
                ...deposit(4000n, 1000n, 'bob'),
                sideA: 'high',
            });
            expect(result.amountA).toBe(4000n);
            expect(result.amountB).toBe(1000n);
            expect(result.amountLow).toBe(1000n);
        });
    });

    describe('removeLiquidity', () => {
        beforeEach(() => {
            const draft = ledger.draft();
            draft.addLiquidity(key, deposit(10_000n, 40_000n));
            ledger.commit(draft);
        });

        it('pays out the pro-rata reserves', () => {
            const draft = ledger.draft();
            const result = draft.removeLiquidity(key, {
                sideA: 'low',
                shareAmount: 1900n,
                amountAMin: 0n,
                amountBMin: 0n,
                depositor: 'alice',
            });
            ledger.commit(draft);

            expect(result.amountLow).toBe(950n);
            expect(result.amountHigh).toBe(3800n);
            expect(ledger.getPosition(key, 'alice').shareAmount).toBe(17_100n);
            expect(ledger.getPool(key)).toMatchObject({ reserveLow: 9050n, reserveHigh: 36_200n, totalShares: 18_100n });
        });

        it('rejects burning more shares than held', () => {
            const draft = ledger.draft();
            expect(codeOf(() => draft.removeLiquidity(key, {
                sideA: 'low',
                shareAmount: 19_001n,
                amountAMin: 0n,
                amountBMin: 0n,
                depositor: 'alice',
            }))).toBe('InsufficientShares');
        });

        it('enforces the minimum amounts', () => {
            const draft = ledger.draft();
            expect(codeOf(() => draft.removeLiquidity(key, {
                sideA: 'low',
                shareAmount: 1900n,
                amountAMin: 0n,
                amountBMin: 3801n,
                depositor: 'alice',
            }))).toBe('InsufficientAmount');
        });
    });

    it('reports a missing pair', () => {
        const other = canonicalPair('BTC', 'USD');
        expect(codeOf(() => ledger.draft().addLiquidity(other, deposit(5000n, 5000n)))).toBe('PairDoesNotExist');
    });

    it('survives a snapshot round trip', () => {
        const draft = ledger.draft();
        draft.addLiquidity(key, deposit(10_000n, 40_000n));
        ledger.commit(draft);

        const restored = new PairLedger();
        restored.load(ledger.snapshot());
        expect(restored.getPool(key)).toEqual(ledger.getPool(key));
        expect(restored.getPosition(key, 'alice')).toEqual(ledger.getPosition(key, 'alice'));
    });
});

describe('optimalDeposit', () => {
    it('takes the desired amounts into an empty pool', () => {
        expect(optimalDeposit(0n, 0n, 7n, 9n, 0n, 0n)).toEqual({ amountA: 7n, amountB: 9n });
    });

    it('trims B when A fixes the price', () => {
        expect(optimalDeposit(10_000n, 40_000n, 1000n, 5000n, 0n, 0n)).toEqual({ amountA: 1000n, amountB: 4000n });
    });

    it('falls back to trimming A', () => {
        expect(optimalDeposit(10_000n, 40_000n, 1000n, 2000n, 0n, 0n)).toEqual({ amountA: 500n, amountB: 2000n });
    });

    it('enforces the minimums', () => {
        expect(codeOf(() => optimalDeposit(10_000n, 40_000n, 1000n, 5000n, 0n, 4500n))).toBe('InsufficientAmount');
        expect(codeOf(() => optimalDeposit(10_000n, 40_000n, 1000n, 2000n, 600n, 0n))).toBe('InsufficientAmount');
    });
});
