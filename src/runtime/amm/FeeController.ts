import { DEFAULT_FEE_BPS, FEE_DENOMINATOR_BPS, MAX_FEE_BPS } from '../../protocol/params/amm.js';
import { AuthorizationService, Role } from '../../protocol/security/transaction-guard.js';
import { AmmError } from './errors.js';

export interface FeeChange {
    oldRate: bigint;
    newRate: bigint;
}

/**
 * Global swap fee in basis points. Only a FEE_SETTER may change it.
 */
export class FeeController {
    private rate: bigint;

    constructor(
        private readonly authorization: AuthorizationService,
        initialRate: bigint = DEFAULT_FEE_BPS
    ) {
        FeeController.validate(initialRate);
        this.rate = initialRate;
    }

    get feeRate(): bigint {
        return this.rate;
    }

    get denominator(): bigint {
        return FEE_DENOMINATOR_BPS;
    }

    /**
     * Authorize and validate a change without applying it.
     */
    prepare(caller: string, newRate: bigint): FeeChange {
        this.authorization.requireRole(caller, Role.FEE_SETTER);
        FeeController.validate(newRate);
        return { oldRate: this.rate, newRate };
    }

    apply(change: FeeChange): void {
        this.rate = change.newRate;
    }

    static validate(rate: bigint): void {
        if (rate < 0n) {
            throw new AmmError('InvalidFee', `Fee rate cannot be negative: ${rate}`);
        }
        if (rate > MAX_FEE_BPS) {
            throw new AmmError('FeeTooHigh', `Fee too high: ${rate} > ${MAX_FEE_BPS} bps`);
        }
    }
}
