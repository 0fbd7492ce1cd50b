import { isNullAsset } from '../../protocol/params/amm.js';
import { AmmError } from './errors.js';

export interface PairKey {
    readonly assetLow: string;
    readonly assetHigh: string;
}

export type PairSide = 'low' | 'high';

/**
 * Order two assets so (A,B) and (B,A) resolve to the same key.
 */
export function canonicalPair(assetA: string, assetB: string): PairKey {
    if (assetA === assetB) {
        throw new AmmError('IdenticalAssets', `Identical assets: ${assetA}`);
    }
    const [assetLow, assetHigh] = assetA < assetB ? [assetA, assetB] : [assetB, assetA];
    if (isNullAsset(assetLow)) {
        throw new AmmError('NullAsset', 'Pair cannot include the null asset');
    }
    return { assetLow, assetHigh };
}

export function sideOf(key: PairKey, asset: string): PairSide {
    if (asset === key.assetLow) return 'low';
    if (asset === key.assetHigh) return 'high';
    throw new Error(`${asset} is not part of pair ${formatPair(key)}`);
}

export function pairId(key: PairKey): string {
    return JSON.stringify([key.assetLow, key.assetHigh]);
}

export function positionId(key: PairKey, depositor: string): string {
    return JSON.stringify([key.assetLow, key.assetHigh, depositor]);
}

export function formatPair(key: PairKey): string {
    return `${key.assetLow}/${key.assetHigh}`;
}
