import fs from 'fs';
import path from 'path';
import type { LedgerSnapshot } from '../../runtime/amm/PairLedger.js';
import type { VaultData } from '../../runtime/amm/AssetVault.js';
import { logger } from '../utils/logger.js';

const log = logger.child('Storage');

export const STATE_FORMAT_VERSION = 1;

export interface ExchangeState {
    version: number;
    feeRate: string;        // BigInt as string for JSON
    ledger: LedgerSnapshot;
    vault: VaultData;
}

function isExchangeState(value: unknown): value is ExchangeState {
    if (typeof value !== 'object' || value === null) return false;
    return 'version' in value && value.version === STATE_FORMAT_VERSION
        && 'feeRate' in value && typeof value.feeRate === 'string'
        && 'ledger' in value && typeof value.ledger === 'object' && value.ledger !== null
        && 'vault' in value && typeof value.vault === 'object' && value.vault !== null;
}

export class Storage {
    private dataDir: string;
    private statePath: string;

    constructor(dataDir: string, stateFile: string = 'exchange.json') {
        this.dataDir = dataDir;
        this.statePath = path.join(this.dataDir, stateFile);
        this.ensureDirectories();
    }

    private ensureDirectories(): void {
        if (!fs.existsSync(this.dataDir)) {
            fs.mkdirSync(this.dataDir, { recursive: true });
        }
    }

    get location(): string {
        return this.statePath;
    }

    saveExchange(state: ExchangeState): void {
        // write-then-rename
        const tmpPath = `${this.statePath}.tmp`;
        fs.writeFileSync(tmpPath, JSON.stringify(state, null, 2));
        fs.renameSync(tmpPath, this.statePath);
        log.debug('💾 Exchange state saved to disk');
    }

    loadExchange(): ExchangeState | null {
        if (!fs.existsSync(this.statePath)) {
            return null;
        }
        const content = fs.readFileSync(this.statePath, 'utf-8');
        const parsed: unknown = JSON.parse(content);
        if (!isExchangeState(parsed)) {
            throw new Error(`Unrecognized exchange state in ${this.statePath}`);
        }
        return parsed;
    }
}
