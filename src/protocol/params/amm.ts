/**
 * Exchange Parameters (Protocol Level)
 *
 * Deterministic constants shared by the pricing engine and the pair ledger.
 * Node-local settings (ports, paths, logging) live in node/config.ts.
 */

// Fee: basis points over a 10000 denominator
export const FEE_DENOMINATOR_BPS = 10_000n;
export const DEFAULT_FEE_BPS = 30n;       // 0.3%
export const MAX_FEE_BPS = 500n;          // 5%

// Shares withheld from the first deposit of every pool, never redeemable
export const MINIMUM_LIQUIDITY = 1_000n;

// shareRatio = shareAmount * SHARE_RATIO_PRECISION / totalShares
export const SHARE_RATIO_PRECISION = 10n ** 18n;

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

// Holder credited with MINIMUM_LIQUIDITY on the first deposit
export const LOCKED_LIQUIDITY_HOLDER = ZERO_ADDRESS;

// Vault account that holds pooled reserves
export const EXCHANGE_CUSTODY = 'exchange';

const NULL_ASSET_REGEX = /^0x0+$/i;

export function isNullAsset(asset: string): boolean {
    return asset === '' || NULL_ASSET_REGEX.test(asset);
}

