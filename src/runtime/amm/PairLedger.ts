/**
 * Pair Ledger
 *
 * Owns every Pool and DepositorPosition record. Mutations never touch the
 * committed maps directly: they are staged on a LedgerDraft and applied in
 * one step by commit(). A discarded draft leaves the ledger untouched.
 *
 * INVARIANTS:
 * - reserveLow == 0 && reserveHigh == 0  <=>  totalShares == 0
 * - totalShares == sum of all positions (locked liquidity included)
 * - reserveLow * reserveHigh never decreases across a swap
 */

import {
    LOCKED_LIQUIDITY_HOLDER,
    MINIMUM_LIQUIDITY,
    SHARE_RATIO_PRECISION,
} from '../../protocol/params/amm.js';
import { logger } from '../../protocol/utils/logger.js';
import { AmmError } from './errors.js';
import { PairKey, PairSide, canonicalPair, formatPair, pairId, positionId, sideOf } from './pairKey.js';
import { computeSwapOutput, minBigInt, quote, sqrt } from './pricing.js';

const log = logger.child('Ledger');

// ========== RECORDS ==========

export interface Pool extends PairKey {
    exists: boolean;
    reserveLow: bigint;
    reserveHigh: bigint;
    totalShares: bigint;
}

export interface DepositorPosition extends PairKey {
    depositor: string;
    shareAmount: bigint;
    shareRatio: bigint;
}

export interface LiquidityRequest {
    /** Side of the pair the caller listed first */
    sideA: PairSide;
    amountADesired: bigint;
    amountBDesired: bigint;
    amountAMin: bigint;
    amountBMin: bigint;
    depositor: string;
}

export interface LiquidityDeposit {
    amountA: bigint;
    amountB: bigint;
    amountLow: bigint;
    amountHigh: bigint;
    shares: bigint;
}

export interface WithdrawalRequest {
    sideA: PairSide;
    shareAmount: bigint;
    amountAMin: bigint;
    amountBMin: bigint;
    depositor: string;
}

export interface LiquidityWithdrawal {
    amountA: bigint;
    amountB: bigint;
    amountLow: bigint;
    amountHigh: bigint;
    shares: bigint;
}

// ========== SERIALIZATION ==========

export interface PoolSnapshot {
    assetLow: string;
    assetHigh: string;
    reserveLow: string;     // BigInt as string for JSON
    reserveHigh: string;
    totalShares: string;
}

export interface PositionSnapshot {
    assetLow: string;
    assetHigh: string;
    depositor: string;
    shareAmount: string;
    shareRatio: string;
}

export interface LedgerSnapshot {
    pools: PoolSnapshot[];
    positions: PositionSnapshot[];
}

// ========== HELPERS ==========

function reserveOf(pool: Pool, side: PairSide): bigint {
    return side === 'low' ? pool.reserveLow : pool.reserveHigh;
}

function otherSide(side: PairSide): PairSide {
    return side === 'low' ? 'high' : 'low';
}

function emptyPosition(key: PairKey, depositor: string): DepositorPosition {
    return { assetLow: key.assetLow, assetHigh: key.assetHigh, depositor, shareAmount: 0n, shareRatio: 0n };
}

function ratioOf(shareAmount: bigint, totalShares: bigint): bigint {
    if (shareAmount === 0n || totalShares === 0n) return 0n;
    return (shareAmount * SHARE_RATIO_PRECISION) / totalShares;
}

/**
 * Amounts that keep the pool price, holding the first desired amount fixed
 * and falling back to the second when the first would need too much of B.
 */
export function optimalDeposit(
    reserveA: bigint,
    reserveB: bigint,
    amountADesired: bigint,
    amountBDesired: bigint,
    amountAMin: bigint,
    amountBMin: bigint
): { amountA: bigint; amountB: bigint } {
    if (reserveA === 0n && reserveB === 0n) {
        return { amountA: amountADesired, amountB: amountBDesired };
    }

    const amountBOptimal = quote(amountADesired, reserveA, reserveB);
    if (amountBOptimal <= amountBDesired) {
        if (amountBOptimal < amountBMin) {
            throw new AmmError('InsufficientAmount', `Insufficient B amount: ${amountBOptimal} < min ${amountBMin}`);
        }
        return { amountA: amountADesired, amountB: amountBOptimal };
    }

    const amountAOptimal = quote(amountBDesired, reserveB, reserveA);
    if (amountAOptimal > amountADesired) {
        throw new AmmError('ExcessiveInput', `Excessive A amount: ${amountAOptimal} > desired ${amountADesired}`);
    }
    if (amountAOptimal < amountAMin) {
        throw new AmmError('InsufficientAmount', `Insufficient A amount: ${amountAOptimal} < min ${amountAMin}`);
    }
    return { amountA: amountAOptimal, amountB: amountBDesired };
}

// ========== LEDGER ==========

export class PairLedger {
    private pools: Map<string, Pool> = new Map();
    private positions: Map<string, DepositorPosition> = new Map();

    getPool(key: PairKey): Pool | null {
        const pool = this.pools.get(pairId(key));
        return pool ? { ...pool } : null;
    }

    getPosition(key: PairKey, depositor: string): DepositorPosition {
        const position = this.positions.get(positionId(key, depositor));
        return position ? { ...position } : emptyPosition(key, depositor);
    }

    listPools(): Pool[] {
        return Array.from(this.pools.values()).map(pool => ({ ...pool }));
    }

    listPositions(key: PairKey): DepositorPosition[] {
        return Array.from(this.positions.values())
            .filter(p => p.assetLow === key.assetLow && p.assetHigh === key.assetHigh)
            .map(p => ({ ...p }));
    }

    draft(): LedgerDraft {
        return new LedgerDraft(this);
    }

    /**
     * Apply every record staged on the draft in one step.
     */
    commit(draft: LedgerDraft): void {
        const { pools, positions } = draft.changes();
        for (const pool of pools) {
            this.pools.set(pairId(pool), pool);
        }
        for (const position of positions) {
            this.positions.set(positionId(position, position.depositor), position);
        }
        if (pools.length > 0 || positions.length > 0) {
            log.debug(`💾 Committed ${pools.length} pool(s), ${positions.length} position(s)`);
        }
    }

    snapshot(): LedgerSnapshot {
        return {
            pools: Array.from(this.pools.values()).map(p => ({
                assetLow: p.assetLow,
                assetHigh: p.assetHigh,
                reserveLow: p.reserveLow.toString(),
                reserveHigh: p.reserveHigh.toString(),
                totalShares: p.totalShares.toString(),
            })),
            positions: Array.from(this.positions.values()).map(p => ({
                assetLow: p.assetLow,
                assetHigh: p.assetHigh,
                depositor: p.depositor,
                shareAmount: p.shareAmount.toString(),
                shareRatio: p.shareRatio.toString(),
            })),
        };
    }

    load(data: LedgerSnapshot | null): void {
        this.pools.clear();
        this.positions.clear();
        if (!data) return;

        for (const p of data.pools) {
            const key = canonicalPair(p.assetLow, p.assetHigh);
            this.pools.set(pairId(key), {
                ...key,
                exists: true,
                reserveLow: BigInt(p.reserveLow),
                reserveHigh: BigInt(p.reserveHigh),
                totalShares: BigInt(p.totalShares),
            });
        }
        for (const p of data.positions) {
            const key = canonicalPair(p.assetLow, p.assetHigh);
            this.positions.set(positionId(key, p.depositor), {
                ...key,
                depositor: p.depositor,
                shareAmount: BigInt(p.shareAmount),
                shareRatio: BigInt(p.shareRatio),
            });
        }
        log.info(`📂 Ledger loaded: ${this.pools.size} pool(s), ${this.positions.size} position(s)`);
    }
}

// ========== DRAFT ==========

/**
 * Scratch copy of the records one operation touches. Reads fall through to
 * the committed ledger until a record has been staged.
 */
export class LedgerDraft {
    private pools: Map<string, Pool> = new Map();
    private positions: Map<string, DepositorPosition> = new Map();

    constructor(private readonly base: PairLedger) {}

    getPool(key: PairKey): Pool | null {
        const staged = this.pools.get(pairId(key));
        if (staged) return { ...staged };
        return this.base.getPool(key);
    }

    requirePool(key: PairKey): Pool {
        const pool = this.getPool(key);
        if (!pool) {
            throw new AmmError('PairDoesNotExist', `Pair ${formatPair(key)} does not exist`);
        }
        return pool;
    }

    getPosition(key: PairKey, depositor: string): DepositorPosition {
        const staged = this.positions.get(positionId(key, depositor));
        if (staged) return { ...staged };
        return this.base.getPosition(key, depositor);
    }

    changes(): { pools: Pool[]; positions: DepositorPosition[] } {
        return {
            pools: Array.from(this.pools.values()),
            positions: Array.from(this.positions.values()),
        };
    }

    private stagePool(pool: Pool): void {
        this.pools.set(pairId(pool), pool);
    }

    private stagePosition(position: DepositorPosition): void {
        this.positions.set(positionId(position, position.depositor), position);
    }

    // ========== OPERATIONS ==========

    createPair(key: PairKey): Pool {
        if (this.getPool(key)) {
            throw new AmmError('PairExists', `Pair ${formatPair(key)} already exists`);
        }
        const pool: Pool = { ...key, exists: true, reserveLow: 0n, reserveHigh: 0n, totalShares: 0n };
        this.stagePool(pool);
        return { ...pool };
    }

    addLiquidity(key: PairKey, request: LiquidityRequest): LiquidityDeposit {
        const pool = this.requirePool(key);
        const sideB = otherSide(request.sideA);

        const { amountA, amountB } = optimalDeposit(
            reserveOf(pool, request.sideA),
            reserveOf(pool, sideB),
            request.amountADesired,
            request.amountBDesired,
            request.amountAMin,
            request.amountBMin
        );
        const amountLow = request.sideA === 'low' ? amountA : amountB;
        const amountHigh = request.sideA === 'low' ? amountB : amountA;

        let shares: bigint;
        let mintedTotal: bigint;
        if (pool.totalShares === 0n) {
            const root = sqrt(amountLow * amountHigh);
            if (root <= MINIMUM_LIQUIDITY) {
                throw new AmmError(
                    'InsufficientLiquidityMinted',
                    `Insufficient liquidity minted: sqrt(${amountLow} * ${amountHigh}) = ${root} does not clear the ${MINIMUM_LIQUIDITY} lock`
                );
            }
            shares = root - MINIMUM_LIQUIDITY;
            mintedTotal = root;
        } else {
            shares = minBigInt(
                (amountLow * pool.totalShares) / pool.reserveLow,
                (amountHigh * pool.totalShares) / pool.reserveHigh
            );
            if (shares <= 0n) {
                throw new AmmError('InsufficientLiquidityMinted', `Insufficient liquidity minted: ${shares}`);
            }
            mintedTotal = shares;
        }

        const totalShares = pool.totalShares + mintedTotal;
        this.stagePool({
            ...pool,
            reserveLow: pool.reserveLow + amountLow,
            reserveHigh: pool.reserveHigh + amountHigh,
            totalShares,
        });

        if (pool.totalShares === 0n) {
            const locked = this.getPosition(key, LOCKED_LIQUIDITY_HOLDER);
            const lockedAmount = locked.shareAmount + MINIMUM_LIQUIDITY;
            this.stagePosition({ ...locked, shareAmount: lockedAmount, shareRatio: ratioOf(lockedAmount, totalShares) });
        }

        const position = this.getPosition(key, request.depositor);
        const shareAmount = position.shareAmount + shares;
        this.stagePosition({ ...position, shareAmount, shareRatio: ratioOf(shareAmount, totalShares) });

        return { amountA, amountB, amountLow, amountHigh, shares };
    }

    removeLiquidity(key: PairKey, request: WithdrawalRequest): LiquidityWithdrawal {
        const pool = this.requirePool(key);
        const position = this.getPosition(key, request.depositor);

        if (position.shareAmount < request.shareAmount) {
            throw new AmmError(
                'InsufficientShares',
                `Insufficient shares: requested ${request.shareAmount}, held ${position.shareAmount}`
            );
        }

        // Live shares against live reserves; the cached shareRatio is never used here
        const amountLow = (request.shareAmount * pool.reserveLow) / pool.totalShares;
        const amountHigh = (request.shareAmount * pool.reserveHigh) / pool.totalShares;
        const amountA = request.sideA === 'low' ? amountLow : amountHigh;
        const amountB = request.sideA === 'low' ? amountHigh : amountLow;

        if (amountA < request.amountAMin) {
            throw new AmmError('InsufficientAmount', `Insufficient A amount: ${amountA} < min ${request.amountAMin}`);
        }
        if (amountB < request.amountBMin) {
            throw new AmmError('InsufficientAmount', `Insufficient B amount: ${amountB} < min ${request.amountBMin}`);
        }

        const totalShares = pool.totalShares - request.shareAmount;
        this.stagePool({
            ...pool,
            reserveLow: pool.reserveLow - amountLow,
            reserveHigh: pool.reserveHigh - amountHigh,
            totalShares,
        });

        const shareAmount = position.shareAmount - request.shareAmount;
        this.stagePosition({ ...position, shareAmount, shareRatio: ratioOf(shareAmount, totalShares) });

        return { amountA, amountB, amountLow, amountHigh, shares: request.shareAmount };
    }

    /**
     * One hop of a swap: price against the staged reserves and stage the result.
     */
    swapHop(assetIn: string, assetOut: string, amountIn: bigint, feeRateBps: bigint): bigint {
        const key = canonicalPair(assetIn, assetOut);
        const pool = this.requirePool(key);
        const sideIn = sideOf(key, assetIn);

        const reserveIn = reserveOf(pool, sideIn);
        const reserveOut = reserveOf(pool, otherSide(sideIn));
        const amountOut = computeSwapOutput(amountIn, reserveIn, reserveOut, feeRateBps);

        const next: Pool = sideIn === 'low'
            ? { ...pool, reserveLow: reserveIn + amountIn, reserveHigh: reserveOut - amountOut }
            : { ...pool, reserveHigh: reserveIn + amountIn, reserveLow: reserveOut - amountOut };

        // x * y >= k on every swap
        if (next.reserveLow * next.reserveHigh < pool.reserveLow * pool.reserveHigh) {
            throw new Error(`INVARIANT VIOLATION: k decreased on ${formatPair(key)}`);
        }

        this.stagePool(next);
        return amountOut;
    }
}
