import type { DepositorPosition, Pool, RecordedEvent } from '../../runtime/amm/index.js';
import { SHARE_RATIO_PRECISION } from '../../protocol/params/amm.js';

// Amounts leave the API as decimal strings

export function poolToJSON(pool: Pool) {
    return {
        assetLow: pool.assetLow,
        assetHigh: pool.assetHigh,
        exists: pool.exists,
        reserveLow: pool.reserveLow.toString(),
        reserveHigh: pool.reserveHigh.toString(),
        totalShares: pool.totalShares.toString(),
    };
}

export function positionToJSON(position: DepositorPosition) {
    return {
        assetLow: position.assetLow,
        assetHigh: position.assetHigh,
        depositor: position.depositor,
        shareAmount: position.shareAmount.toString(),
        shareRatio: position.shareRatio.toString(),
        shareRatioPrecision: SHARE_RATIO_PRECISION.toString(),
    };
}

export function eventToJSON(event: RecordedEvent): Record<string, string | number> {
    const out: Record<string, string | number> = {};
    for (const [key, value] of Object.entries(event)) {
        out[key] = typeof value === 'bigint' ? value.toString() : value;
    }
    return out;
}

export function amountsToJSON(amounts: readonly bigint[]): string[] {
    return amounts.map(amount => amount.toString());
}
