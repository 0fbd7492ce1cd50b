/**
 * Asset transfers
 *
 * AssetTransferService is the boundary to whatever actually moves value.
 * InMemoryAssetVault implements it with per-holder balances and a custody
 * account (development node, CLI, tests). TransferSettlement records the
 * transfers made inside one exchange operation so an abort can reverse them.
 */

import { EXCHANGE_CUSTODY } from '../../protocol/params/amm.js';
import { logger } from '../../protocol/utils/logger.js';
import { AmmError } from './errors.js';

const log = logger.child('Vault');

export interface AssetTransferService {
    /** Move value from an external holder into exchange custody */
    pull(asset: string, from: string, amount: bigint): void;
    /** Move value out of custody to an external holder */
    push(asset: string, to: string, amount: bigint): void;
}

export interface VaultData {
    custody: string;
    balances: Record<string, Record<string, string>>;   // asset -> holder -> amount
}

// ========== IN-MEMORY VAULT ==========

export class InMemoryAssetVault implements AssetTransferService {
    private balances: Map<string, Map<string, bigint>> = new Map();

    constructor(readonly custody: string = EXCHANGE_CUSTODY) {}

    balanceOf(asset: string, holder: string): bigint {
        return this.balances.get(asset)?.get(holder) ?? 0n;
    }

    custodyBalance(asset: string): bigint {
        return this.balanceOf(asset, this.custody);
    }

    /**
     * Credit a holder out of thin air (faucet / fixtures)
     */
    mint(asset: string, to: string, amount: bigint): void {
        if (amount <= 0n) {
            throw new AmmError('InvalidAmount', `Mint amount must be positive, got ${amount}`);
        }
        this.setBalance(asset, to, this.balanceOf(asset, to) + amount);
        log.info(`💧 Minted ${amount} ${asset} → ${to}`);
    }

    pull(asset: string, from: string, amount: bigint): void {
        this.move(asset, from, this.custody, amount);
    }

    push(asset: string, to: string, amount: bigint): void {
        this.move(asset, this.custody, to, amount);
    }

    protected move(asset: string, from: string, to: string, amount: bigint): void {
        if (amount <= 0n) {
            throw new AmmError('TransferFailed', `Transfer of ${amount} ${asset} rejected: amount must be positive`);
        }
        const available = this.balanceOf(asset, from);
        if (available < amount) {
            throw new AmmError(
                'TransferFailed',
                `Transfer of ${amount} ${asset} from ${from} failed: balance ${available}`
            );
        }
        this.setBalance(asset, from, available - amount);
        this.setBalance(asset, to, this.balanceOf(asset, to) + amount);
        log.debug(`➡️ ${amount} ${asset}: ${from} → ${to}`);
    }

    private setBalance(asset: string, holder: string, amount: bigint): void {
        let holders = this.balances.get(asset);
        if (!holders) {
            holders = new Map();
            this.balances.set(asset, holders);
        }
        if (amount === 0n) {
            holders.delete(holder);
        } else {
            holders.set(holder, amount);
        }
    }

    // ========== SERIALIZATION ==========

    toJSON(): VaultData {
        const balances: Record<string, Record<string, string>> = {};
        for (const [asset, holders] of this.balances) {
            balances[asset] = Object.fromEntries(
                Array.from(holders.entries()).map(([holder, amount]) => [holder, amount.toString()])
            );
        }
        return { custody: this.custody, balances };
    }

    loadFromData(data: VaultData | null): void {
        this.balances.clear();
        if (!data) return;
        for (const [asset, holders] of Object.entries(data.balances)) {
            for (const [holder, amount] of Object.entries(holders)) {
                this.setBalance(asset, holder, BigInt(amount));
            }
        }
        log.info(`📂 Vault loaded: ${this.balances.size} asset(s)`);
    }
}

// ========== SETTLEMENT ==========

interface SettledTransfer {
    direction: 'pull' | 'push';
    asset: string;
    account: string;
    amount: bigint;
}

/**
 * Transfers completed inside one operation, in order. rollback() reverses
 * them newest first; a transfer that failed was never recorded.
 */
export class TransferSettlement {
    private settled: SettledTransfer[] = [];

    constructor(private readonly transfers: AssetTransferService) {}

    pull(asset: string, from: string, amount: bigint): void {
        if (amount === 0n) return;
        this.transfers.pull(asset, from, amount);
        this.settled.push({ direction: 'pull', asset, account: from, amount });
    }

    push(asset: string, to: string, amount: bigint): void {
        if (amount === 0n) return;
        this.transfers.push(asset, to, amount);
        this.settled.push({ direction: 'push', asset, account: to, amount });
    }

    get count(): number {
        return this.settled.length;
    }

    /**
     * Reverses every settled transfer, newest first. When a reversal fails
     * the rest still run; the result is then a TransferFailed whose cause is
     * the error that aborted the operation.
     */
    rollback(reason?: unknown): void {
        const pending = this.settled.reverse();
        this.settled = [];
        const failed: SettledTransfer[] = [];
        for (const transfer of pending) {
            try {
                if (transfer.direction === 'pull') {
                    this.transfers.push(transfer.asset, transfer.account, transfer.amount);
                } else {
                    this.transfers.pull(transfer.asset, transfer.account, transfer.amount);
                }
            } catch (error) {
                log.error(`Rollback of ${transfer.direction} ${transfer.amount} ${transfer.asset} (${transfer.account}) failed:`, error);
                failed.push(transfer);
            }
        }

        if (failed.length > 0) {
            const described = failed
                .map(t => `${t.direction} of ${t.amount} ${t.asset} for ${t.account}`)
                .join('; ');
            throw new AmmError('TransferFailed', `Could not reverse ${described}`, { cause: reason });
        }
    }
}
