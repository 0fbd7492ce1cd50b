/**
 * AMM Module Exports
 */

export { Exchange } from './Exchange.js';
export type {
    ExchangeOptions,
    AddLiquidityParams,
    AddLiquidityResult,
    RemoveLiquidityParams,
    RemoveLiquidityResult,
    SwapParams,
    SwapResult,
} from './Exchange.js';

// Pricing Engine
export { quote, computeSwapOutput, computeSwapInput, sqrt } from './pricing.js';

// Pair Ledger
export { PairLedger, LedgerDraft, optimalDeposit } from './PairLedger.js';
export type { Pool, DepositorPosition, LedgerSnapshot, PoolSnapshot, PositionSnapshot } from './PairLedger.js';
export { canonicalPair, formatPair, sideOf } from './pairKey.js';
export type { PairKey, PairSide } from './pairKey.js';

// Administration
export { FeeController } from './FeeController.js';
export type { FeeChange } from './FeeController.js';

// Notifications
export { EventLog } from './EventLog.js';
export type { ExchangeEvent, RecordedEvent, EventListener } from './EventLog.js';

// Transfers
export { InMemoryAssetVault, TransferSettlement } from './AssetVault.js';
export type { AssetTransferService, VaultData } from './AssetVault.js';

export { AmmError, isAmmError } from './errors.js';
export type { AmmErrorCode } from './errors.js';
