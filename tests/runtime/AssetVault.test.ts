import { describe, it, expect } from 'vitest';
import { InMemoryAssetVault, TransferSettlement } from '../../src/runtime/amm/AssetVault.js';
import { AmmError, isAmmError } from '../../src/runtime/amm/errors.js';

/** Refuses every payout to one account */
class FrozenAccountVault extends InMemoryAssetVault {
    constructor(private readonly frozen: string) {
        super();
    }

    push(asset: string, to: string, amount: bigint): void {
        if (to === this.frozen) {
            throw new AmmError('TransferFailed', `${to} is frozen`);
        }
        super.push(asset, to, amount);
    }
}

function caught(fn: () => void): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return undefined;
}

describe('TransferSettlement', () => {
    it('reverses settled transfers newest first', () => {
        const vault = new InMemoryAssetVault();
        vault.mint('ETH', 'alice', 100n);
        vault.mint('USD', vault.custody, 40n);

        const settlement = new TransferSettlement(vault);
        settlement.pull('ETH', 'alice', 100n);
        settlement.push('USD', 'alice', 40n);
        expect(settlement.count).toBe(2);

        settlement.rollback();

        expect(settlement.count).toBe(0);
        expect(vault.balanceOf('ETH', 'alice')).toBe(100n);
        expect(vault.balanceOf('USD', 'alice')).toBe(0n);
        expect(vault.custodyBalance('USD')).toBe(40n);
    });

    it('skips zero-amount transfers', () => {
        const settlement = new TransferSettlement(new InMemoryAssetVault());
        settlement.pull('ETH', 'alice', 0n);
        expect(settlement.count).toBe(0);
    });

    it('finishes the other reversals when one fails and keeps the abort reason', () => {
        const vault = new FrozenAccountVault('bob');
        vault.mint('ETH', 'alice', 100n);
        vault.mint('USD', 'bob', 50n);

        const settlement = new TransferSettlement(vault);
        settlement.pull('ETH', 'alice', 100n);
        settlement.pull('USD', 'bob', 50n);

        const reason = new AmmError('InsufficientOutputAmount', 'Output below minimum');
        const error = caught(() => settlement.rollback(reason));

        expect(isAmmError(error, 'TransferFailed')).toBe(true);
        expect(error).toMatchObject({ message: 'Could not reverse pull of 50 USD for bob' });
        expect(error instanceof Error ? error.cause : undefined).toBe(reason);

        expect(vault.balanceOf('ETH', 'alice')).toBe(100n);
        expect(vault.custodyBalance('ETH')).toBe(0n);
        expect(vault.custodyBalance('USD')).toBe(50n);
        expect(settlement.count).toBe(0);
    });
});
