/**
 * Pricing Engine
 *
 * Pure integer math over bigint. Every division truncates toward zero and
 * every rounding step favours the pool over the trader.
 */

import { FEE_DENOMINATOR_BPS } from '../../protocol/params/amm.js';
import { AmmError } from './errors.js';

function requirePositive(amount: bigint, name: string): void {
    if (amount <= 0n) {
        throw new AmmError('InvalidAmount', `${name} must be positive, got ${amount}`);
    }
}

function requireReserves(reserveIn: bigint, reserveOut: bigint): void {
    if (reserveIn <= 0n || reserveOut <= 0n) {
        throw new AmmError('InsufficientLiquidity', `Insufficient liquidity: reserves ${reserveIn}/${reserveOut}`);
    }
}

function requireFee(feeRateBps: bigint, feeDenominatorBps: bigint): void {
    if (feeDenominatorBps <= 0n || feeRateBps < 0n || feeRateBps >= feeDenominatorBps) {
        throw new AmmError('InvalidFee', `Invalid fee ${feeRateBps}/${feeDenominatorBps}`);
    }
}

/**
 * Proportional quote at the current price, no fee:
 * amountOut = floor(amountIn * reserveOut / reserveIn)
 */
export function quote(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
    requirePositive(amountIn, 'amountIn');
    requireReserves(reserveIn, reserveOut);
    return (amountIn * reserveOut) / reserveIn;
}

/**
 * Output of an exact-input swap, fee taken from the input.
 * Solves (x + dx)(y - dy) >= xy for dy.
 */
export function computeSwapOutput(
    amountIn: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    feeRateBps: bigint,
    feeDenominatorBps: bigint = FEE_DENOMINATOR_BPS
): bigint {
    requirePositive(amountIn, 'amountIn');
    requireReserves(reserveIn, reserveOut);
    requireFee(feeRateBps, feeDenominatorBps);

    const amountInAfterFee = amountIn * (feeDenominatorBps - feeRateBps);
    const numerator = amountInAfterFee * reserveOut;
    const denominator = reserveIn * feeDenominatorBps + amountInAfterFee;
    return numerator / denominator;
}

/**
 * Input required for an exact-output swap. Rounded up (+1) so the pool
 * never under-collects.
 */
export function computeSwapInput(
    amountOut: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    feeRateBps: bigint,
    feeDenominatorBps: bigint = FEE_DENOMINATOR_BPS
): bigint {
    requirePositive(amountOut, 'amountOut');
    requireReserves(reserveIn, reserveOut);
    requireFee(feeRateBps, feeDenominatorBps);
    if (amountOut >= reserveOut) {
        throw new AmmError('InsufficientLiquidity', `Insufficient liquidity: requested ${amountOut}, reserve ${reserveOut}`);
    }

    const numerator = reserveIn * amountOut * feeDenominatorBps;
    const denominator = (reserveOut - amountOut) * (feeDenominatorBps - feeRateBps);
    return numerator / denominator + 1n;
}

/**
 * Integer square root (floor), Newton iteration.
 */
export function sqrt(value: bigint): bigint {
    if (value < 0n) throw new Error('Square root of negative number');
    if (value === 0n) return 0n;

    let x = value;
    let y = (x + 1n) / 2n;
    while (y < x) {
        x = y;
        y = (x + value / x) / 2n;
    }
    return x;
}

export function minBigInt(a: bigint, b: bigint): bigint {
    return a < b ? a : b;
}
