import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../../src/node/api/server.js';
import type { ApiSettings } from '../../src/node/api/server.js';
import { ExchangeNode } from '../../src/node/ExchangeNode.js';
import { signedFields } from '../../src/protocol/security/request-signature.js';
import { createSigner } from '../helpers/signer.js';
import type { TestSigner } from '../helpers/signer.js';

const settings: ApiSettings = {
    version: '1.0.0-test',
    rateLimit: { windowMs: 60_000, maxRequests: 1000 },
    cors: { origin: '*' },
    adminApiKey: '',
    faucet: { enabled: true, maxAmount: 1_000_000n },
};

interface ApiBody {
    success: boolean;
    data?: Record<string, unknown>;
    error?: string;
    code?: string;
}

function isApiBody(value: unknown): value is ApiBody {
    return typeof value === 'object' && value !== null && 'success' in value;
}

async function listen(node: ExchangeNode, overrides: Partial<ApiSettings> = {}): Promise<{ server: Server; base: string }> {
    const app = createApp(node, { ...settings, ...overrides });
    const server = await new Promise<Server>(resolve => {
        const s = app.listen(0, () => resolve(s));
    });
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    return { server, base: `http://127.0.0.1:${port}` };
}

function close(server: Server): Promise<void> {
    return new Promise((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}

describe('API', () => {
    let server: Server;
    let base: string;
    let alice: TestSigner;
    let bob: TestSigner;
    let carol: TestSigner;
    let owner: TestSigner;
    let mallory: TestSigner;

    async function call(method: string, route: string, body?: unknown, headers: Record<string, string> = {}) {
        const response = await fetch(`${base}${route}`, {
            method,
            headers: { 'content-type': 'application/json', ...headers },
            body: body === undefined ? undefined : JSON.stringify(body),
        });
        const json: unknown = await response.json();
        if (!isApiBody(json)) throw new Error(`Unexpected body from ${route}`);
        return { status: response.status, body: json };
    }

    beforeAll(async () => {
        [alice, bob, carol, owner, mallory] = await Promise.all(['11', '22', '33', '44', '55'].map(createSigner));
        const node = new ExchangeNode(null, { feeSetter: owner.address, initialFeeBps: 30n });
        ({ server, base } = await listen(node));
    });

    afterAll(async () => {
        await close(server);
    });

    it('reports health', async () => {
        const { status, body } = await call('GET', '/health');
        expect(status).toBe(200);
        expect(body.data).toMatchObject({ status: 'healthy', version: '1.0.0-test', pools: 0 });
    });

    it('serves the OpenAPI document', async () => {
        const response = await fetch(`${base}/api/docs.json`);
        const doc: unknown = await response.json();
        expect(response.status).toBe(200);
        expect(doc).toMatchObject({ openapi: '3.0.0', info: { title: 'AMM Exchange API' } });
    });

    it('funds accounts from the faucet', async () => {
        const eth = await call('POST', '/api/v1/vault/faucet', { asset: 'ETH', to: alice.address, amount: '10000' });
        expect(eth.status).toBe(200);
        expect(eth.body.data).toEqual({ asset: 'ETH', to: alice.address, amount: '10000', balance: '10000' });

        await call('POST', '/api/v1/vault/faucet', { asset: 'USD', to: alice.address, amount: '40000' });
        await call('POST', '/api/v1/vault/faucet', { asset: 'USD', to: bob.address, amount: '4000' });

        const over = await call('POST', '/api/v1/vault/faucet', { asset: 'USD', to: bob.address, amount: '1000001' });
        expect(over.status).toBe(400);
    });

    it('creates a pair once', async () => {
        const created = await call('POST', '/api/v1/pool/pair', { assetA: 'USD', assetB: 'ETH' });
        expect(created.status).toBe(201);
        expect(created.body.data).toEqual({ assetLow: 'ETH', assetHigh: 'USD' });

        const again = await call('POST', '/api/v1/pool/pair', { assetA: 'ETH', assetB: 'USD' });
        expect(again.status).toBe(409);
        expect(again.body.code).toBe('PairExists');
    });

    it('adds liquidity', async () => {
        const signature = await alice.sign('ADD_LIQUIDITY', signedFields.addLiquidity({
            assetA: 'ETH',
            assetB: 'USD',
            amountADesired: 10_000n,
            amountBDesired: 40_000n,
            amountAMin: 0n,
            amountBMin: 0n,
        }));
        const { status, body } = await call('POST', '/api/v1/pool/liquidity/add', {
            assetA: 'ETH',
            assetB: 'USD',
            amountADesired: '10000',
            amountBDesired: '40000',
            depositor: alice.address,
            ...signature,
        });
        expect(status).toBe(200);
        expect(body.data).toMatchObject({ amountA: '10000', amountB: '40000', shares: '19000' });

        const pair = await call('GET', '/api/v1/pool/pair?assetA=USD&assetB=ETH');
        expect(pair.body.data).toMatchObject({ reserveLow: '10000', reserveHigh: '40000', totalShares: '20000', providers: 2 });
    });

    it('quotes and then swaps at the quoted price', async () => {
        const quote = await call('GET', '/api/v1/pool/quote?amountIn=4000&path=USD,ETH');
        expect(quote.body.data).toMatchObject({ amounts: ['4000', '906'], amountOut: '906' });

        const signature = await bob.sign('SWAP', signedFields.swap({
            amountIn: 4000n,
            amountOutMin: 906n,
            path: ['USD', 'ETH'],
            recipient: bob.address,
        }));
        const swap = await call('POST', '/api/v1/pool/swap', {
            caller: bob.address,
            amountIn: '4000',
            amountOutMin: '906',
            path: ['USD', 'ETH'],
            ...signature,
        });
        expect(swap.status).toBe(200);
        expect(swap.body.data).toMatchObject({ amountOut: '906', recipient: bob.address });

        const balance = await call('GET', `/api/v1/vault/balance?asset=ETH&holder=${bob.address}`);
        expect(balance.body.data).toMatchObject({ balance: '906' });
    });

    it('refuses to spend for a principal that did not sign', async () => {
        const fields = signedFields.swap({ amountIn: 906n, amountOutMin: 0n, path: ['ETH', 'USD'], recipient: mallory.address });
        const body = { caller: bob.address, amountIn: '906', path: ['ETH', 'USD'], recipient: mallory.address };

        const unsigned = await call('POST', '/api/v1/pool/swap', body);
        expect(unsigned.status).toBe(401);
        expect(unsigned.body.error).toBe('Required: publicKey, signature, nonce');

        const spoofed = await call('POST', '/api/v1/pool/swap', {
            ...body,
            ...await mallory.sign('SWAP', fields, { principal: bob.address }),
        });
        expect(spoofed.status).toBe(403);
        expect(spoofed.body.error).toBe('Public key does not match address');

        const replayed = await call('POST', '/api/v1/pool/swap', {
            ...body,
            ...await bob.sign('SWAP', fields, { nonce: 1n }),
        });
        expect(replayed.status).toBe(403);
        expect(replayed.body.error).toBe('Nonce already used');

        const liquidity = await call('POST', '/api/v1/pool/liquidity/remove', {
            assetA: 'ETH',
            assetB: 'USD',
            shareAmount: '19000',
            depositor: alice.address,
            ...await mallory.sign('REMOVE_LIQUIDITY', signedFields.removeLiquidity({
                assetA: 'ETH',
                assetB: 'USD',
                shareAmount: 19_000n,
                amountAMin: 0n,
                amountBMin: 0n,
            }), { principal: alice.address }),
        });
        expect(liquidity.status).toBe(403);

        const balance = await call('GET', `/api/v1/vault/balance?asset=ETH&holder=${bob.address}`);
        expect(balance.body.data).toMatchObject({ balance: '906' });
        const position = await call('GET', `/api/v1/pool/position?assetA=ETH&assetB=USD&depositor=${alice.address}`);
        expect(position.body.data).toMatchObject({ shareAmount: '19000' });
    });

    it('maps exchange failures to status codes', async () => {
        const missing = await call('GET', '/api/v1/pool/pair?assetA=BTC&assetB=USD');
        expect(missing.status).toBe(404);
        expect(missing.body.code).toBe('PairDoesNotExist');

        const broke = await call('POST', '/api/v1/pool/swap', {
            caller: carol.address,
            amountIn: '10',
            path: 'USD,ETH',
            ...await carol.sign('SWAP', signedFields.swap({ amountIn: 10n, amountOutMin: 0n, path: ['USD', 'ETH'], recipient: carol.address })),
        });
        expect(broke.status).toBe(422);
        expect(broke.body.code).toBe('TransferFailed');

        const invalid = await call('POST', '/api/v1/pool/swap', { caller: bob.address, amountIn: '1.5', path: 'USD,ETH' });
        expect(invalid.status).toBe(400);
        expect(invalid.body.error).toBe('amountIn must contain digits only');
    });

    it('gates fee changes on a signed caller with the fee-setter role', async () => {
        const feeBody = async (signer: TestSigner, feeRate: bigint, principal?: string) => ({
            feeRate: feeRate.toString(),
            ...await signer.sign('SET_FEE', signedFields.setFee({ feeRate }), { principal }),
        });

        const anonymous = await call('POST', '/api/v1/admin/fee', { feeRate: '50' });
        expect(anonymous.status).toBe(401);

        const unsigned = await call('POST', '/api/v1/admin/fee', { feeRate: '50' }, { 'x-caller': owner.address });
        expect(unsigned.status).toBe(401);

        const spoofed = await call('POST', '/api/v1/admin/fee', await feeBody(mallory, 500n, owner.address), { 'x-caller': owner.address });
        expect(spoofed.status).toBe(403);
        expect(spoofed.body.error).toBe('Public key does not match address');

        const stranger = await call('POST', '/api/v1/admin/fee', await feeBody(mallory, 50n), { 'x-caller': mallory.address });
        expect(stranger.status).toBe(403);
        expect(stranger.body.code).toBe('Unauthorized');

        const tooHigh = await call('POST', '/api/v1/admin/fee', await feeBody(owner, 501n), { 'x-caller': owner.address });
        expect(tooHigh.status).toBe(400);
        expect(tooHigh.body.code).toBe('FeeTooHigh');

        const ok = await call('POST', '/api/v1/admin/fee', await feeBody(owner, 50n), { 'x-caller': owner.address });
        expect(ok.body.data).toEqual({ oldRate: '30', newRate: '50' });

        const fee = await call('GET', '/api/v1/admin/fee');
        expect(fee.body.data).toEqual({ feeRate: '50', denominator: '10000', maxFeeRate: '500' });
    });

    it('lists events after a sequence number', async () => {
        const { body } = await call('GET', '/api/v1/pool/events?since=1');
        expect(body.data?.events).toMatchObject([
            { seq: 2, type: 'LiquidityAdded', shares: '19000' },
            { seq: 3, type: 'SwapExecuted', assetIn: 'USD', amountOut: '906' },
            { seq: 4, type: 'FeeUpdated', oldRate: '30', newRate: '50' },
        ]);
        expect(body.data?.lastSeq).toBe(4);
    });

    it('rejects malformed JSON and unknown routes', async () => {
        const response = await fetch(`${base}/api/v1/pool/pair`, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: '{"assetA":',
        });
        expect(response.status).toBe(400);

        const unknown = await call('GET', '/api/v1/nowhere');
        expect(unknown.status).toBe(404);
    });
});

describe('API admin key', () => {
    it('requires X-API-Key when one is configured', async () => {
        const node = new ExchangeNode(null, { feeSetter: 'owner', initialFeeBps: 30n });
        const { server, base } = await listen(node, { adminApiKey: 'test-secret' });
        try {
            const missing = await fetch(`${base}/api/v1/admin/fee`);
            expect(missing.status).toBe(401);

            const wrong = await fetch(`${base}/api/v1/admin/fee`, { headers: { 'x-api-key': 'nope' } });
            expect(wrong.status).toBe(403);

            const right = await fetch(`${base}/api/v1/admin/fee`, { headers: { 'x-api-key': 'test-secret' } });
            expect(right.status).toBe(200);
        } finally {
            await close(server);
        }
    });
});
