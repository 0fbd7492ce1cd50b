/**
 * Exchange failure taxonomy.
 *
 * Every failure aborts the enclosing operation with nothing persisted;
 * the code tells callers (API, CLI) which kind of failure it was.
 */

export type AmmErrorCode =
    // input validation
    | 'IdenticalAssets'
    | 'NullAsset'
    | 'InvalidAmount'
    | 'InvalidPath'
    | 'InvalidRecipient'
    | 'InvalidFee'
    // pair lookup
    | 'PairExists'
    | 'PairDoesNotExist'
    // liquidity / slippage
    | 'InsufficientLiquidity'
    | 'InsufficientLiquidityMinted'
    | 'InsufficientAmount'
    | 'ExcessiveInput'
    | 'InsufficientShares'
    | 'InsufficientOutputAmount'
    | 'FeeTooHigh'
    // authorization
    | 'Unauthorized'
    // collaborators and locking
    | 'TransferFailed'
    | 'ReentrantCall';

export class AmmError extends Error {
    constructor(
        public readonly code: AmmErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'AmmError';
    }
}

export function isAmmError(error: unknown, code?: AmmErrorCode): error is AmmError {
    return error instanceof AmmError && (code === undefined || error.code === code);
}
