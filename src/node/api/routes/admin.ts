/**
 * Admin API Routes
 * Fee governance. The caller principal comes from the X-Caller header, must
 * sign the request, and is checked against the role registry by the exchange.
 */

import { Router, Request, Response } from 'express';
import type { ExchangeNode } from '../../ExchangeNode.js';
import { MAX_FEE_BPS } from '../../../protocol/params/amm.js';
import { inputValidator } from '../../../protocol/security/input-validator.js';
import { RequestVerifier, signedFields } from '../../../protocol/security/request-signature.js';
import { authenticate, callerOf } from '../middleware/auth.js';
import { sendError, sendInvalid } from '../middleware/errors.js';

export function createAdminRoutes(node: ExchangeNode, verifier: RequestVerifier): Router {
    const router = Router();

    /**
     * GET /api/v1/admin/fee
     */
    router.get('/fee', (_req: Request, res: Response) => {
        res.json({
            success: true,
            data: {
                feeRate: node.exchange.getFeeRate().toString(),
                denominator: node.exchange.fees.denominator.toString(),
                maxFeeRate: MAX_FEE_BPS.toString(),
            },
        });
    });

    /**
     * POST /api/v1/admin/fee
     * Headers: X-Caller
     * Body: { feeRate, publicKey, signature, nonce }
     */
    router.post('/fee', async (req: Request, res: Response) => {
        const caller = callerOf(req);
        if (!caller) {
            res.status(401).json({
                success: false,
                error: 'Caller required. Add X-Caller header.',
            });
            return;
        }

        const body: Record<string, unknown> = req.body ?? {};
        const feeRate = inputValidator.validateAmount(body.feeRate, 'feeRate');
        if (!feeRate.valid) return sendInvalid(res, feeRate.error);
        if (!await authenticate(res, verifier, body, 'SET_FEE', caller, signedFields.setFee({ feeRate: feeRate.value }))) {
            return;
        }

        try {
            const change = node.exchange.setFeeRate(caller, feeRate.value);
            res.json({
                success: true,
                data: {
                    oldRate: change.oldRate.toString(),
                    newRate: change.newRate.toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Fee update failed');
        }
    });

    return router;
}
