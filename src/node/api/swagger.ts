/**
 * OpenAPI document served at /api/docs
 */

const amount = { type: 'string', pattern: '^\\d+$', description: 'Integer amount as a decimal string' };
const asset = { type: 'string', example: 'ETH' };

const envelope = (data: Record<string, unknown>) => ({
    type: 'object',
    properties: {
        success: { type: 'boolean', example: true },
        data,
    },
});

const ok = (description: string, data: Record<string, unknown>) => ({
    description,
    content: { 'application/json': { schema: envelope(data) } },
});

const failure = (description: string) => ({
    description,
    content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
});

const jsonBody = (properties: Record<string, unknown>, required: string[]) => ({
    required: true,
    content: {
        'application/json': {
            schema: { type: 'object', properties, required },
        },
    },
});

const signed = {
    publicKey: { type: 'string', description: 'ed25519 public key (64 hex chars) whose address is the principal' },
    signature: { type: 'string', description: 'ed25519 signature (128 hex chars) of the request hash' },
    nonce: { ...amount, description: 'Must exceed the last nonce used by this address' },
};
const signedRequired = ['publicKey', 'signature', 'nonce'];

const pairQuery = [
    { name: 'assetA', in: 'query', required: true, schema: asset },
    { name: 'assetB', in: 'query', required: true, schema: { type: 'string', example: 'USD' } },
];

export const swaggerSpec = {
    openapi: '3.0.0',
    info: {
        title: 'AMM Exchange API',
        version: '1.0.0',
        description: `
## AMM Exchange

Constant-product liquidity pools (x * y = k) with multi-hop swaps.

- Amounts are integers sent and returned as **decimal strings**
- Fees are basis points over 10000 (default 30, max 500)
- Every mutating call is all-or-nothing

### Signed requests

Liquidity, swap and fee calls are signed with ed25519. The principal
(\`depositor\`, \`caller\` or \`X-Caller\`) must be the address of the key:
\`amm\` + first 40 hex chars of sha256(publicKeyHex).

The signature covers sha256 of
\`amm-exchange|ACTION|principal|field...|nonce\`, amounts as decimal strings:

- ADD_LIQUIDITY: assetA, assetB, amountADesired, amountBDesired, amountAMin, amountBMin
- REMOVE_LIQUIDITY: assetA, assetB, shareAmount, amountAMin, amountBMin
- SWAP: amountIn, amountOutMin, path joined by commas, recipient
- SET_FEE: feeRate
        `,
        license: {
            name: 'MIT',
            url: 'https://opensource.org/licenses/MIT',
        },
    },
    servers: [
        {
            url: 'http://localhost:3001/api/v1',
            description: 'Local node',
        },
    ],
    tags: [
        { name: 'Pool', description: 'Pairs, liquidity and swaps' },
        { name: 'Admin', description: 'Fee governance' },
        { name: 'Vault', description: 'Development vault and faucet' },
    ],
    components: {
        schemas: {
            Pool: {
                type: 'object',
                properties: {
                    assetLow: asset,
                    assetHigh: asset,
                    exists: { type: 'boolean' },
                    reserveLow: amount,
                    reserveHigh: amount,
                    totalShares: amount,
                },
            },
            Position: {
                type: 'object',
                properties: {
                    assetLow: asset,
                    assetHigh: asset,
                    depositor: { type: 'string' },
                    shareAmount: amount,
                    shareRatio: { ...amount, description: 'shareAmount / totalShares scaled by shareRatioPrecision' },
                    shareRatioPrecision: amount,
                },
            },
            Error: {
                type: 'object',
                properties: {
                    success: { type: 'boolean', example: false },
                    error: { type: 'string', example: 'Pair ETH/UTIL does not exist' },
                    code: { type: 'string', example: 'PairDoesNotExist' },
                },
            },
        },
        securitySchemes: {
            ApiKey: { type: 'apiKey', in: 'header', name: 'X-API-Key' },
            Caller: { type: 'apiKey', in: 'header', name: 'X-Caller' },
        },
    },
    paths: {
        '/pool/pairs': {
            get: {
                tags: ['Pool'],
                summary: 'List pools',
                responses: {
                    200: ok('All pools', {
                        type: 'object',
                        properties: {
                            feeRate: amount,
                            pools: { type: 'array', items: { $ref: '#/components/schemas/Pool' } },
                        },
                    }),
                },
            },
        },
        '/pool/pair': {
            get: {
                tags: ['Pool'],
                summary: 'Pool reserves and shares',
                parameters: pairQuery,
                responses: {
                    200: ok('Pool', { $ref: '#/components/schemas/Pool' }),
                    404: failure('Pair does not exist'),
                },
            },
            post: {
                tags: ['Pool'],
                summary: 'Create a pair',
                requestBody: jsonBody({ assetA: asset, assetB: asset }, ['assetA', 'assetB']),
                responses: {
                    201: ok('Canonical pair key', {
                        type: 'object',
                        properties: { assetLow: asset, assetHigh: asset },
                    }),
                    400: failure('Identical or null asset'),
                    409: failure('Pair exists'),
                },
            },
        },
        '/pool/liquidity/add': {
            post: {
                tags: ['Pool'],
                summary: 'Add liquidity',
                requestBody: jsonBody({
                    assetA: asset,
                    assetB: asset,
                    amountADesired: amount,
                    amountBDesired: amount,
                    amountAMin: amount,
                    amountBMin: amount,
                    depositor: { type: 'string' },
                    ...signed,
                }, ['assetA', 'assetB', 'amountADesired', 'amountBDesired', 'depositor', ...signedRequired]),
                responses: {
                    200: ok('Amounts taken and shares minted', {
                        type: 'object',
                        properties: { amountA: amount, amountB: amount, shares: amount },
                    }),
                    400: failure('Validation or slippage failure'),
                    401: failure('Missing signature'),
                    403: failure('Signature, key or nonce rejected'),
                    404: failure('Pair does not exist'),
                    422: failure('Transfer failed'),
                },
            },
        },
        '/pool/liquidity/remove': {
            post: {
                tags: ['Pool'],
                summary: 'Remove liquidity',
                requestBody: jsonBody({
                    assetA: asset,
                    assetB: asset,
                    shareAmount: amount,
                    amountAMin: amount,
                    amountBMin: amount,
                    depositor: { type: 'string' },
                    ...signed,
                }, ['assetA', 'assetB', 'shareAmount', 'depositor', ...signedRequired]),
                responses: {
                    200: ok('Amounts returned', {
                        type: 'object',
                        properties: { amountA: amount, amountB: amount, shares: amount },
                    }),
                    400: failure('Validation, shares or slippage failure'),
                    401: failure('Missing signature'),
                    403: failure('Signature, key or nonce rejected'),
                    404: failure('Pair does not exist'),
                },
            },
        },
        '/pool/position': {
            get: {
                tags: ['Pool'],
                summary: 'Depositor position',
                parameters: [...pairQuery, { name: 'depositor', in: 'query', required: true, schema: { type: 'string' } }],
                responses: {
                    200: ok('Position (zero when absent)', { $ref: '#/components/schemas/Position' }),
                },
            },
        },
        '/pool/swap': {
            post: {
                tags: ['Pool'],
                summary: 'Exact-input swap along a path',
                requestBody: jsonBody({
                    caller: { type: 'string' },
                    amountIn: amount,
                    amountOutMin: amount,
                    path: { type: 'array', items: asset, example: ['USD', 'ETH', 'BTC'] },
                    recipient: { type: 'string', description: 'Defaults to caller' },
                    ...signed,
                }, ['caller', 'amountIn', 'path', ...signedRequired]),
                responses: {
                    200: ok('Per-hop amounts', {
                        type: 'object',
                        properties: {
                            path: { type: 'array', items: asset },
                            amounts: { type: 'array', items: amount },
                            amountOut: amount,
                            recipient: { type: 'string' },
                        },
                    }),
                    400: failure('Validation or slippage failure'),
                    401: failure('Missing signature'),
                    403: failure('Signature, key or nonce rejected'),
                    404: failure('A pair on the path does not exist'),
                    422: failure('Transfer failed'),
                },
            },
        },
        '/pool/quote': {
            get: {
                tags: ['Pool'],
                summary: 'Quote a path without executing',
                parameters: [
                    { name: 'path', in: 'query', required: true, schema: { type: 'string', example: 'USD,ETH' } },
                    { name: 'amountIn', in: 'query', schema: amount },
                    { name: 'amountOut', in: 'query', schema: amount },
                ],
                responses: {
                    200: ok('Per-hop amounts', {
                        type: 'object',
                        properties: {
                            amounts: { type: 'array', items: amount },
                            amountIn: amount,
                            amountOut: amount,
                            feeRate: amount,
                        },
                    }),
                },
            },
        },
        '/pool/events': {
            get: {
                tags: ['Pool'],
                summary: 'Events after a sequence number',
                parameters: [{ name: 'since', in: 'query', schema: { type: 'integer', default: 0 } }],
                responses: {
                    200: ok('Events', {
                        type: 'object',
                        properties: {
                            events: { type: 'array', items: { type: 'object' } },
                            lastSeq: { type: 'integer' },
                        },
                    }),
                },
            },
        },
        '/admin/fee': {
            get: {
                tags: ['Admin'],
                summary: 'Current fee',
                security: [{ ApiKey: [] }],
                responses: {
                    200: ok('Fee', {
                        type: 'object',
                        properties: { feeRate: amount, denominator: amount, maxFeeRate: amount },
                    }),
                },
            },
            post: {
                tags: ['Admin'],
                summary: 'Change the fee (fee setter only)',
                security: [{ ApiKey: [], Caller: [] }],
                requestBody: jsonBody({ feeRate: amount, ...signed }, ['feeRate', ...signedRequired]),
                responses: {
                    200: ok('Old and new rate', {
                        type: 'object',
                        properties: { oldRate: amount, newRate: amount },
                    }),
                    400: failure('Fee too high or invalid'),
                    401: failure('Missing X-Caller, X-API-Key or signature'),
                    403: failure('Bad signature, or caller lacks the fee-setter role'),
                },
            },
        },
        '/vault/balance': {
            get: {
                tags: ['Vault'],
                summary: 'Balance of a holder',
                parameters: [
                    { name: 'asset', in: 'query', required: true, schema: asset },
                    { name: 'holder', in: 'query', required: true, schema: { type: 'string' } },
                ],
                responses: {
                    200: ok('Balance', {
                        type: 'object',
                        properties: { asset, holder: { type: 'string' }, balance: amount },
                    }),
                },
            },
        },
        '/vault/faucet': {
            post: {
                tags: ['Vault'],
                summary: 'Mint test balance (development)',
                requestBody: jsonBody({ asset, to: { type: 'string' }, amount }, ['asset', 'to', 'amount']),
                responses: {
                    200: ok('New balance', {
                        type: 'object',
                        properties: { asset, to: { type: 'string' }, amount, balance: amount },
                    }),
                    403: failure('Faucet disabled'),
                },
            },
        },
    },
};
