/**
 * Exchange Node
 *
 * Wires the exchange to its in-process collaborators (vault, role registry)
 * and to disk. The API server and every CLI command go through here.
 */

import { Storage, ExchangeState, STATE_FORMAT_VERSION } from '../protocol/storage/Storage.js';
import { Role, RoleRegistry } from '../protocol/security/transaction-guard.js';
import { logger } from '../protocol/utils/logger.js';
import { Exchange, InMemoryAssetVault, PairLedger } from '../runtime/amm/index.js';

const log = logger.child('Node');

export interface ExchangeNodeOptions {
    feeSetter: string;
    initialFeeBps: bigint;
}

export class ExchangeNode {
    readonly vault: InMemoryAssetVault;
    readonly roles: RoleRegistry;
    readonly exchange: Exchange;

    constructor(
        private readonly storage: Storage | null,
        options: ExchangeNodeOptions
    ) {
        const state = storage?.loadExchange() ?? null;

        this.vault = new InMemoryAssetVault();
        this.vault.loadFromData(state?.vault ?? null);

        this.roles = new RoleRegistry();
        this.roles.grantRole(options.feeSetter, Role.FEE_SETTER);

        const ledger = new PairLedger();
        ledger.load(state?.ledger ?? null);

        this.exchange = new Exchange({
            transfers: this.vault,
            authorization: this.roles,
            ledger,
            feeRate: state ? BigInt(state.feeRate) : options.initialFeeBps,
            onCommit: operation => this.persist(operation),
        });

        if (state) {
            log.info(`📂 Exchange restored from ${storage?.location}: ${ledger.listPools().length} pool(s), fee ${state.feeRate} bps`);
        }
    }

    state(): ExchangeState {
        return {
            version: STATE_FORMAT_VERSION,
            feeRate: this.exchange.getFeeRate().toString(),
            ledger: this.exchange.ledger.snapshot(),
            vault: this.vault.toJSON(),
        };
    }

    save(): void {
        this.storage?.saveExchange(this.state());
    }

    private persist(operation: string): void {
        try {
            this.save();
        } catch (error) {
            log.error(`💾 ${operation} committed in memory but could not be saved:`, error);
            throw error;
        }
    }
}
