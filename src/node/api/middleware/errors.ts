import { Response } from 'express';
import { AmmErrorCode, isAmmError } from '../../../runtime/amm/errors.js';
import { logger } from '../../../protocol/utils/logger.js';

const log = logger.child('API');

const STATUS_BY_CODE: Record<AmmErrorCode, number> = {
    IdenticalAssets: 400,
    NullAsset: 400,
    InvalidAmount: 400,
    InvalidPath: 400,
    InvalidRecipient: 400,
    InvalidFee: 400,
    PairExists: 409,
    PairDoesNotExist: 404,
    InsufficientLiquidity: 400,
    InsufficientLiquidityMinted: 400,
    InsufficientAmount: 400,
    ExcessiveInput: 400,
    InsufficientShares: 400,
    InsufficientOutputAmount: 400,
    FeeTooHigh: 400,
    Unauthorized: 403,
    TransferFailed: 422,
    ReentrantCall: 409,
};

export function statusFor(code: AmmErrorCode): number {
    return STATUS_BY_CODE[code];
}

/**
 * Send an exchange failure with its code; anything else is a 500.
 */
export function sendError(res: Response, error: unknown, fallback: string): void {
    if (isAmmError(error)) {
        res.status(statusFor(error.code)).json({
            success: false,
            error: error.message,
            code: error.code,
        });
        return;
    }

    log.error(`${fallback}:`, error);
    res.status(500).json({
        success: false,
        error: error instanceof Error ? error.message : fallback,
    });
}

export function sendInvalid(res: Response, error: string): void {
    res.status(400).json({
        success: false,
        error,
    });
}
