/**
 * Vault API Routes (development)
 * Balances held by the in-memory vault and a faucet to fund test accounts.
 */

import { Router, Request, Response } from 'express';
import type { ExchangeNode } from '../../ExchangeNode.js';
import { inputValidator } from '../../../protocol/security/input-validator.js';
import { sendError, sendInvalid } from '../middleware/errors.js';

export interface FaucetSettings {
    enabled: boolean;
    maxAmount: bigint;
}

export function createVaultRoutes(node: ExchangeNode, faucet: FaucetSettings): Router {
    const router = Router();

    /**
     * GET /api/v1/vault/balance?asset=&holder=
     */
    router.get('/balance', (req: Request, res: Response) => {
        const asset = inputValidator.validateAsset(req.query.asset);
        if (!asset.valid) return sendInvalid(res, asset.error);
        const holder = inputValidator.validateAccount(req.query.holder, 'holder');
        if (!holder.valid) return sendInvalid(res, holder.error);

        res.json({
            success: true,
            data: {
                asset: asset.value,
                holder: holder.value,
                balance: node.vault.balanceOf(asset.value, holder.value).toString(),
            },
        });
    });

    /**
     * POST /api/v1/vault/faucet
     * Body: { asset, to, amount }
     */
    router.post('/faucet', (req: Request, res: Response) => {
        if (!faucet.enabled) {
            res.status(403).json({
                success: false,
                error: 'Faucet is disabled on this node',
            });
            return;
        }

        const body: Record<string, unknown> = req.body ?? {};
        const asset = inputValidator.validateAsset(body.asset);
        if (!asset.valid) return sendInvalid(res, asset.error);
        const to = inputValidator.validateAccount(body.to, 'to');
        if (!to.valid) return sendInvalid(res, to.error);
        const amount = inputValidator.validateAmount(body.amount);
        if (!amount.valid) return sendInvalid(res, amount.error);
        if (amount.value > faucet.maxAmount) {
            return sendInvalid(res, `amount exceeds faucet limit of ${faucet.maxAmount}`);
        }
        if (to.value === node.vault.custody) {
            return sendInvalid(res, 'Cannot fund the exchange custody account');
        }

        try {
            node.vault.mint(asset.value, to.value, amount.value);
            node.save();
            res.json({
                success: true,
                data: {
                    asset: asset.value,
                    to: to.value,
                    amount: amount.value.toString(),
                    balance: node.vault.balanceOf(asset.value, to.value).toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Faucet failed');
        }
    });

    return router;
}
