/**
 * Pool API Routes
 *
 * Pairs, liquidity, swaps and quotes. Amounts in and out are decimal strings.
 * Liquidity and swap calls must be signed by the depositor / caller.
 */

import { Router, Request, Response } from 'express';
import type { ExchangeNode } from '../../ExchangeNode.js';
import { inputValidator } from '../../../protocol/security/input-validator.js';
import { RequestVerifier, signedFields } from '../../../protocol/security/request-signature.js';
import { authenticate } from '../middleware/auth.js';
import { sendError, sendInvalid } from '../middleware/errors.js';
import { amountsToJSON, eventToJSON, poolToJSON, positionToJSON } from '../serialize.js';

function pairAssets(source: Record<string, unknown>): { assetA: string; assetB: string } | string {
    const assetA = inputValidator.validateAsset(source.assetA, 'assetA');
    if (!assetA.valid) return assetA.error;
    const assetB = inputValidator.validateAsset(source.assetB, 'assetB');
    if (!assetB.valid) return assetB.error;
    return { assetA: assetA.value, assetB: assetB.value };
}

export function createPoolRoutes(node: ExchangeNode, verifier: RequestVerifier): Router {
    const router = Router();
    const { exchange } = node;

    /**
     * GET /api/v1/pool/pairs
     */
    router.get('/pairs', (_req: Request, res: Response) => {
        res.json({
            success: true,
            data: {
                feeRate: exchange.getFeeRate().toString(),
                pools: exchange.listPools().map(poolToJSON),
            },
        });
    });

    /**
     * GET /api/v1/pool/pair?assetA=&assetB=
     */
    router.get('/pair', (req: Request, res: Response) => {
        const assets = pairAssets(req.query);
        if (typeof assets === 'string') {
            sendInvalid(res, assets);
            return;
        }

        try {
            const pool = exchange.getPool(assets.assetA, assets.assetB);
            if (!pool) {
                res.status(404).json({
                    success: false,
                    error: `Pair ${assets.assetA}/${assets.assetB} does not exist`,
                    code: 'PairDoesNotExist',
                });
                return;
            }
            res.json({
                success: true,
                data: {
                    ...poolToJSON(pool),
                    providers: exchange.ledger.listPositions(pool).filter(p => p.shareAmount > 0n).length,
                },
            });
        } catch (error) {
            sendError(res, error, 'Pair lookup failed');
        }
    });

    /**
     * POST /api/v1/pool/pair
     * Body: { assetA, assetB }
     */
    router.post('/pair', (req: Request, res: Response) => {
        const assets = pairAssets(req.body ?? {});
        if (typeof assets === 'string') {
            sendInvalid(res, assets);
            return;
        }

        try {
            const key = exchange.createPair(assets.assetA, assets.assetB);
            res.status(201).json({
                success: true,
                data: key,
            });
        } catch (error) {
            sendError(res, error, 'Create pair failed');
        }
    });

    /**
     * POST /api/v1/pool/liquidity/add
     * Body: { assetA, assetB, amountADesired, amountBDesired, amountAMin?, amountBMin?, depositor,
     *         publicKey, signature, nonce }
     */
    router.post('/liquidity/add', async (req: Request, res: Response) => {
        const body: Record<string, unknown> = req.body ?? {};
        const assets = pairAssets(body);
        if (typeof assets === 'string') {
            sendInvalid(res, assets);
            return;
        }
        const depositor = inputValidator.validateAccount(body.depositor, 'depositor');
        const amountADesired = inputValidator.validateAmount(body.amountADesired, 'amountADesired');
        const amountBDesired = inputValidator.validateAmount(body.amountBDesired, 'amountBDesired');
        const amountAMin = inputValidator.validateOptionalAmount(body.amountAMin, 'amountAMin');
        const amountBMin = inputValidator.validateOptionalAmount(body.amountBMin, 'amountBMin');
        if (!depositor.valid) return sendInvalid(res, depositor.error);
        if (!amountADesired.valid) return sendInvalid(res, amountADesired.error);
        if (!amountBDesired.valid) return sendInvalid(res, amountBDesired.error);
        if (!amountAMin.valid) return sendInvalid(res, amountAMin.error);
        if (!amountBMin.valid) return sendInvalid(res, amountBMin.error);

        const params = {
            ...assets,
            amountADesired: amountADesired.value,
            amountBDesired: amountBDesired.value,
            amountAMin: amountAMin.value,
            amountBMin: amountBMin.value,
            depositor: depositor.value,
        };
        if (!await authenticate(res, verifier, body, 'ADD_LIQUIDITY', params.depositor, signedFields.addLiquidity(params))) {
            return;
        }

        try {
            const result = exchange.addLiquidity(params);
            res.json({
                success: true,
                data: {
                    pair: result.pair,
                    amountA: result.amountA.toString(),
                    amountB: result.amountB.toString(),
                    shares: result.shares.toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Add liquidity failed');
        }
    });

    /**
     * POST /api/v1/pool/liquidity/remove
     * Body: { assetA, assetB, shareAmount, amountAMin?, amountBMin?, depositor,
     *         publicKey, signature, nonce }
     */
    router.post('/liquidity/remove', async (req: Request, res: Response) => {
        const body: Record<string, unknown> = req.body ?? {};
        const assets = pairAssets(body);
        if (typeof assets === 'string') {
            sendInvalid(res, assets);
            return;
        }
        const depositor = inputValidator.validateAccount(body.depositor, 'depositor');
        const shareAmount = inputValidator.validateAmount(body.shareAmount, 'shareAmount');
        const amountAMin = inputValidator.validateOptionalAmount(body.amountAMin, 'amountAMin');
        const amountBMin = inputValidator.validateOptionalAmount(body.amountBMin, 'amountBMin');
        if (!depositor.valid) return sendInvalid(res, depositor.error);
        if (!shareAmount.valid) return sendInvalid(res, shareAmount.error);
        if (!amountAMin.valid) return sendInvalid(res, amountAMin.error);
        if (!amountBMin.valid) return sendInvalid(res, amountBMin.error);

        const params = {
            ...assets,
            shareAmount: shareAmount.value,
            amountAMin: amountAMin.value,
            amountBMin: amountBMin.value,
            depositor: depositor.value,
        };
        if (!await authenticate(res, verifier, body, 'REMOVE_LIQUIDITY', params.depositor, signedFields.removeLiquidity(params))) {
            return;
        }

        try {
            const result = exchange.removeLiquidity(params);
            res.json({
                success: true,
                data: {
                    pair: result.pair,
                    amountA: result.amountA.toString(),
                    amountB: result.amountB.toString(),
                    shares: result.shares.toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Remove liquidity failed');
        }
    });

    /**
     * GET /api/v1/pool/position?assetA=&assetB=&depositor=
     */
    router.get('/position', (req: Request, res: Response) => {
        const assets = pairAssets(req.query);
        if (typeof assets === 'string') {
            sendInvalid(res, assets);
            return;
        }
        const depositor = inputValidator.validateAccount(req.query.depositor, 'depositor');
        if (!depositor.valid) return sendInvalid(res, depositor.error);

        try {
            const position = exchange.getDepositorPosition(assets.assetA, assets.assetB, depositor.value);
            res.json({
                success: true,
                data: positionToJSON(position),
            });
        } catch (error) {
            sendError(res, error, 'Position lookup failed');
        }
    });

    /**
     * POST /api/v1/pool/swap
     * Body: { caller, amountIn, amountOutMin?, path, recipient?, publicKey, signature, nonce }
     */
    router.post('/swap', async (req: Request, res: Response) => {
        const body: Record<string, unknown> = req.body ?? {};
        const caller = inputValidator.validateAccount(body.caller, 'caller');
        const amountIn = inputValidator.validateAmount(body.amountIn, 'amountIn');
        const amountOutMin = inputValidator.validateOptionalAmount(body.amountOutMin, 'amountOutMin');
        const path = inputValidator.validatePath(body.path);
        if (!caller.valid) return sendInvalid(res, caller.error);
        if (!amountIn.valid) return sendInvalid(res, amountIn.error);
        if (!amountOutMin.valid) return sendInvalid(res, amountOutMin.error);
        if (!path.valid) return sendInvalid(res, path.error);
        const recipient = body.recipient === undefined
            ? caller
            : inputValidator.validateAccount(body.recipient, 'recipient');
        if (!recipient.valid) return sendInvalid(res, recipient.error);

        const params = {
            caller: caller.value,
            amountIn: amountIn.value,
            amountOutMin: amountOutMin.value,
            path: path.value,
            recipient: recipient.value,
        };
        if (!await authenticate(res, verifier, body, 'SWAP', params.caller, signedFields.swap(params))) {
            return;
        }

        try {
            const result = exchange.swap(params);
            res.json({
                success: true,
                data: {
                    path: path.value,
                    amounts: amountsToJSON(result.amounts),
                    amountOut: result.amountOut.toString(),
                    recipient: recipient.value,
                },
            });
        } catch (error) {
            sendError(res, error, 'Swap failed');
        }
    });

    /**
     * GET /api/v1/pool/quote?amountIn=&path=A,B,C
     * or  /api/v1/pool/quote?amountOut=&path=A,B,C
     */
    router.get('/quote', (req: Request, res: Response) => {
        const path = inputValidator.validatePath(req.query.path);
        if (!path.valid) return sendInvalid(res, path.error);

        const exactOut = req.query.amountOut !== undefined;
        const amount = inputValidator.validateAmount(
            exactOut ? req.query.amountOut : req.query.amountIn,
            exactOut ? 'amountOut' : 'amountIn'
        );
        if (!amount.valid) return sendInvalid(res, amount.error);

        try {
            const amounts = exactOut
                ? exchange.getAmountsIn(amount.value, path.value)
                : exchange.getAmountsOut(amount.value, path.value);
            res.json({
                success: true,
                data: {
                    path: path.value,
                    amounts: amountsToJSON(amounts),
                    amountIn: amounts[0].toString(),
                    amountOut: amounts[amounts.length - 1].toString(),
                    feeRate: exchange.getFeeRate().toString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Quote failed');
        }
    });

    /**
     * GET /api/v1/pool/events?since=<seq>
     */
    router.get('/events', (req: Request, res: Response) => {
        const since = inputValidator.validateOptionalAmount(req.query.since, 'since');
        if (!since.valid) return sendInvalid(res, since.error);

        const events = exchange.events.since(Number(since.value));
        res.json({
            success: true,
            data: {
                events: events.map(eventToJSON),
                lastSeq: exchange.events.size,
            },
        });
    });

    return router;
}
