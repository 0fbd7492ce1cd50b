/**
 * Exchange (transaction orchestrator)
 *
 * Every state-mutating operation runs as one indivisible unit:
 *   lock → validate → stage ledger deltas → settle transfers → commit → onCommit
 * Any failure discards the draft and the staged events and reverses the
 * transfers already settled, so the operation is as if it never started.
 * Re-entering any mutating operation while one is in flight fails with
 * ReentrantCall.
 */

import { isNullAsset } from '../../protocol/params/amm.js';
import { AuthorizationService, TxLock } from '../../protocol/security/transaction-guard.js';
import { logger } from '../../protocol/utils/logger.js';
import { AssetTransferService, TransferSettlement } from './AssetVault.js';
import { AmmError } from './errors.js';
import { EventLog, ExchangeEvent } from './EventLog.js';
import { FeeChange, FeeController } from './FeeController.js';
import { DepositorPosition, LedgerDraft, PairLedger, Pool } from './PairLedger.js';
import { PairKey, canonicalPair, formatPair, sideOf } from './pairKey.js';
import { computeSwapInput, computeSwapOutput } from './pricing.js';

const log = logger.child('Exchange');

// ========== PARAMS / RESULTS ==========

export interface ExchangeOptions {
    transfers: AssetTransferService;
    authorization: AuthorizationService;
    feeRate?: bigint;
    ledger?: PairLedger;
    events?: EventLog;
    /** Runs once per committed operation, under the lock; a throw reaches the caller */
    onCommit?: (operation: string) => void;
}

export interface AddLiquidityParams {
    assetA: string;
    assetB: string;
    amountADesired: bigint;
    amountBDesired: bigint;
    amountAMin: bigint;
    amountBMin: bigint;
    depositor: string;
}

export interface AddLiquidityResult {
    pair: PairKey;
    amountA: bigint;
    amountB: bigint;
    shares: bigint;
}

export interface RemoveLiquidityParams {
    assetA: string;
    assetB: string;
    shareAmount: bigint;
    amountAMin: bigint;
    amountBMin: bigint;
    depositor: string;
}

export interface RemoveLiquidityResult {
    pair: PairKey;
    amountA: bigint;
    amountB: bigint;
    shares: bigint;
}

export interface SwapParams {
    caller: string;
    amountIn: bigint;
    amountOutMin: bigint;
    path: readonly string[];
    recipient: string;
}

export interface SwapResult {
    /** amounts[0] is the input, amounts[i + 1] the output of hop i */
    amounts: bigint[];
    amountOut: bigint;
}

interface OperationContext {
    draft: LedgerDraft;
    settlement: TransferSettlement;
    emit(event: ExchangeEvent): void;
    afterCommit(fn: () => void): void;
}

// ========== VALIDATION ==========

function requirePositive(amount: bigint, name: string): void {
    if (amount <= 0n) {
        throw new AmmError('InvalidAmount', `${name} must be positive, got ${amount}`);
    }
}

function requireNonNegative(amount: bigint, name: string): void {
    if (amount < 0n) {
        throw new AmmError('InvalidAmount', `${name} cannot be negative, got ${amount}`);
    }
}

function requireAccount(account: string, name: string): void {
    if (isNullAsset(account)) {
        throw new AmmError('InvalidRecipient', `${name} cannot be the null account`);
    }
}

function requirePath(path: readonly string[]): void {
    if (path.length < 2) {
        throw new AmmError('InvalidPath', `Invalid path: need at least 2 assets, got ${path.length}`);
    }
    if (new Set(path).size !== path.length) {
        throw new AmmError('InvalidPath', `Invalid path: assets must be distinct (${path.join(' → ')})`);
    }
}

// ========== EXCHANGE ==========

export class Exchange {
    readonly ledger: PairLedger;
    readonly events: EventLog;
    readonly fees: FeeController;

    private readonly transfers: AssetTransferService;
    private readonly onCommit?: (operation: string) => void;
    private readonly lock = new TxLock();

    constructor(options: ExchangeOptions) {
        this.transfers = options.transfers;
        this.ledger = options.ledger ?? new PairLedger();
        this.events = options.events ?? new EventLog();
        this.fees = new FeeController(options.authorization, options.feeRate);
        this.onCommit = options.onCommit;
    }

    private execute<T>(operation: string, fn: (ctx: OperationContext) => T): T {
        return this.lock.run(operation, () => {
            const draft = this.ledger.draft();
            const settlement = new TransferSettlement(this.transfers);
            const staged: ExchangeEvent[] = [];
            const commitHooks: Array<() => void> = [];

            let result: T;
            try {
                result = fn({
                    draft,
                    settlement,
                    emit: event => staged.push(event),
                    afterCommit: hook => commitHooks.push(hook),
                });
            } catch (error) {
                if (settlement.count > 0) {
                    log.warn(`↩️ Reversing ${settlement.count} transfer(s) of aborted ${operation}`);
                    settlement.rollback(error);
                }
                log.debug(`${operation} aborted: ${error instanceof Error ? error.message : String(error)}`);
                throw error;
            }

            this.ledger.commit(draft);
            commitHooks.forEach(hook => hook());
            this.events.append(staged);
            this.onCommit?.(operation);
            return result;
        });
    }

    // ========== PAIRS ==========

    createPair(assetA: string, assetB: string): PairKey {
        return this.execute('createPair', ({ draft, emit }) => {
            const key = canonicalPair(assetA, assetB);
            draft.createPair(key);
            emit({ type: 'PairCreated', assetLow: key.assetLow, assetHigh: key.assetHigh });
            log.info(`🏊 Pair created: ${formatPair(key)}`);
            return key;
        });
    }

    // ========== LIQUIDITY ==========

    addLiquidity(params: AddLiquidityParams): AddLiquidityResult {
        return this.execute('addLiquidity', ({ draft, settlement, emit }) => {
            const key = canonicalPair(params.assetA, params.assetB);
            requirePositive(params.amountADesired, 'amountADesired');
            requirePositive(params.amountBDesired, 'amountBDesired');
            requireNonNegative(params.amountAMin, 'amountAMin');
            requireNonNegative(params.amountBMin, 'amountBMin');
            requireAccount(params.depositor, 'depositor');

            const deposit = draft.addLiquidity(key, {
                sideA: sideOf(key, params.assetA),
                amountADesired: params.amountADesired,
                amountBDesired: params.amountBDesired,
                amountAMin: params.amountAMin,
                amountBMin: params.amountBMin,
                depositor: params.depositor,
            });

            settlement.pull(params.assetA, params.depositor, deposit.amountA);
            settlement.pull(params.assetB, params.depositor, deposit.amountB);

            emit({
                type: 'LiquidityAdded',
                assetLow: key.assetLow,
                assetHigh: key.assetHigh,
                depositor: params.depositor,
                amountLow: deposit.amountLow,
                amountHigh: deposit.amountHigh,
                shares: deposit.shares,
            });
            log.info(`➕ Liquidity added to ${formatPair(key)}: ${deposit.amountLow} + ${deposit.amountHigh} = ${deposit.shares} shares`);

            return { pair: key, amountA: deposit.amountA, amountB: deposit.amountB, shares: deposit.shares };
        });
    }

    removeLiquidity(params: RemoveLiquidityParams): RemoveLiquidityResult {
        return this.execute('removeLiquidity', ({ draft, settlement, emit }) => {
            const key = canonicalPair(params.assetA, params.assetB);
            requirePositive(params.shareAmount, 'shareAmount');
            requireNonNegative(params.amountAMin, 'amountAMin');
            requireNonNegative(params.amountBMin, 'amountBMin');
            requireAccount(params.depositor, 'depositor');

            const withdrawal = draft.removeLiquidity(key, {
                sideA: sideOf(key, params.assetA),
                shareAmount: params.shareAmount,
                amountAMin: params.amountAMin,
                amountBMin: params.amountBMin,
                depositor: params.depositor,
            });

            settlement.push(params.assetA, params.depositor, withdrawal.amountA);
            settlement.push(params.assetB, params.depositor, withdrawal.amountB);

            emit({
                type: 'LiquidityRemoved',
                assetLow: key.assetLow,
                assetHigh: key.assetHigh,
                depositor: params.depositor,
                amountLow: withdrawal.amountLow,
                amountHigh: withdrawal.amountHigh,
                shares: withdrawal.shares,
            });
            log.info(`➖ Liquidity removed from ${formatPair(key)}: ${withdrawal.shares} shares → ${withdrawal.amountLow} + ${withdrawal.amountHigh}`);

            return { pair: key, amountA: withdrawal.amountA, amountB: withdrawal.amountB, shares: withdrawal.shares };
        });
    }

    // ========== SWAP ==========

    swap(params: SwapParams): SwapResult {
        return this.execute('swap', ({ draft, settlement, emit }) => {
            requirePath(params.path);
            requirePositive(params.amountIn, 'amountIn');
            requireNonNegative(params.amountOutMin, 'amountOutMin');
            requireAccount(params.caller, 'caller');
            requireAccount(params.recipient, 'recipient');

            const path = params.path;
            const feeRate = this.fees.feeRate;

            settlement.pull(path[0], params.caller, params.amountIn);

            const amounts: bigint[] = [params.amountIn];
            for (let i = 0; i < path.length - 1; i++) {
                const hopIn = amounts[i];
                const hopOut = draft.swapHop(path[i], path[i + 1], hopIn, feeRate);
                if (hopOut === 0n) {
                    throw new AmmError('InsufficientOutputAmount', `Hop ${path[i]} → ${path[i + 1]} yields nothing for ${hopIn}`);
                }
                emit({ type: 'SwapExecuted', assetIn: path[i], assetOut: path[i + 1], amountIn: hopIn, amountOut: hopOut });
                amounts.push(hopOut);
            }

            const amountOut = amounts[amounts.length - 1];
            if (amountOut < params.amountOutMin) {
                throw new AmmError(
                    'InsufficientOutputAmount',
                    `Insufficient output amount: ${amountOut} < min ${params.amountOutMin}`
                );
            }

            settlement.push(path[path.length - 1], params.recipient, amountOut);

            log.info(`💱 Swap ${params.amountIn} ${path[0]} → ${amountOut} ${path[path.length - 1]} (${path.length - 1} hop(s))`);
            return { amounts, amountOut };
        });
    }

    // ========== ADMINISTRATION ==========

    setFeeRate(caller: string, newRate: bigint): FeeChange {
        return this.execute('setFeeRate', ({ emit, afterCommit }) => {
            const change = this.fees.prepare(caller, newRate);
            afterCommit(() => this.fees.apply(change));
            emit({ type: 'FeeUpdated', oldRate: change.oldRate, newRate: change.newRate });
            log.info(`⚙️ Fee updated by ${caller}: ${change.oldRate} → ${change.newRate} bps`);
            return change;
        });
    }

    getFeeRate(): bigint {
        return this.fees.feeRate;
    }

    // ========== READS (committed state, no lock) ==========

    getPool(assetA: string, assetB: string): Pool | null {
        return this.ledger.getPool(canonicalPair(assetA, assetB));
    }

    getDepositorPosition(assetA: string, assetB: string, depositor: string): DepositorPosition {
        return this.ledger.getPosition(canonicalPair(assetA, assetB), depositor);
    }

    listPools(): Pool[] {
        return this.ledger.listPools();
    }

    /**
     * Expected amounts along a path for an exact input, at current reserves.
     */
    getAmountsOut(amountIn: bigint, path: readonly string[]): bigint[] {
        requirePath(path);
        const amounts: bigint[] = [amountIn];
        for (let i = 0; i < path.length - 1; i++) {
            const { reserveIn, reserveOut } = this.reservesFor(path[i], path[i + 1]);
            amounts.push(computeSwapOutput(amounts[i], reserveIn, reserveOut, this.fees.feeRate));
        }
        return amounts;
    }

    /**
     * Required amounts along a path for an exact output, walking backwards.
     */
    getAmountsIn(amountOut: bigint, path: readonly string[]): bigint[] {
        requirePath(path);
        const amounts: bigint[] = new Array<bigint>(path.length).fill(0n);
        amounts[path.length - 1] = amountOut;
        for (let i = path.length - 1; i > 0; i--) {
            const { reserveIn, reserveOut } = this.reservesFor(path[i - 1], path[i]);
            amounts[i - 1] = computeSwapInput(amounts[i], reserveIn, reserveOut, this.fees.feeRate);
        }
        return amounts;
    }

    private reservesFor(assetIn: string, assetOut: string): { reserveIn: bigint; reserveOut: bigint } {
        const key = canonicalPair(assetIn, assetOut);
        const pool = this.ledger.getPool(key);
        if (!pool) {
            throw new AmmError('PairDoesNotExist', `Pair ${formatPair(key)} does not exist`);
        }
        return sideOf(key, assetIn) === 'low'
            ? { reserveIn: pool.reserveLow, reserveOut: pool.reserveHigh }
            : { reserveIn: pool.reserveHigh, reserveOut: pool.reserveLow };
    }
}
