import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const isDevnet = process.env.NETWORK_MODE !== 'mainnet';

// Read version from package.json dynamically
function getPackageVersion(): string {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = dirname(__filename);
    // src/node/config.ts and dist/src/node/config.js -> root/
    for (const candidate of ['../../package.json', '../../../package.json']) {
        try {
            const pkg: unknown = JSON.parse(readFileSync(join(__dirname, candidate), 'utf-8'));
            if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
                return pkg.version;
            }
        } catch {
            // not at this level
        }
    }
    return '0.0.0';
}

function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    const parsed = parseInt(raw, 10);
    if (Number.isNaN(parsed)) {
        throw new Error(`${name} must be an integer, got "${raw}"`);
    }
    return parsed;
}

function bpsFromEnv(name: string, fallback: bigint): bigint {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    if (!/^\d+$/.test(raw)) {
        throw new Error(`${name} must be a whole number of basis points, got "${raw}"`);
    }
    return BigInt(raw);
}

export const config = {
    network_mode: isDevnet ? 'devnet' : 'mainnet',
    isDevnet,
    version: getPackageVersion(),
    api: {
        port: intFromEnv('API_PORT', 3001),
        rateLimit: {
            windowMs: intFromEnv('RATE_LIMIT_WINDOW_MS', 60000),
            maxRequests: intFromEnv('RATE_LIMIT_MAX', 100),
        },
        cors: {
            origin: process.env.CORS_ORIGIN || '*',
        },
        // Optional second factor for /admin routes (X-API-Key header)
        adminApiKey: process.env.ADMIN_API_KEY || '',
    },
    exchange: {
        // Principal granted the fee-setter role at startup
        feeSetter: process.env.FEE_SETTER || 'owner',
        initialFeeBps: bpsFromEnv('INITIAL_FEE_BPS', 30n),
    },
    storage: {
        dataDir: process.env.DATA_DIR || (isDevnet ? './data/devnet' : './data/mainnet'),
        stateFile: 'exchange.json',
    },
    // Development faucet for the in-memory vault
    faucet: {
        enabled: process.env.FAUCET_ENABLED !== undefined ? process.env.FAUCET_ENABLED === 'true' : isDevnet,
        maxAmount: 1_000_000_000_000n,
    },
};
export type Config = typeof config;
