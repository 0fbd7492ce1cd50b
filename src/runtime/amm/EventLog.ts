/**
 * Append-only notification log.
 *
 * Operations stage their events and the exchange appends them only after
 * the ledger commit, so observers never see an aborted operation.
 */

import { logger } from '../../protocol/utils/logger.js';

const log = logger.child('Events');

export interface PairCreated {
    type: 'PairCreated';
    assetLow: string;
    assetHigh: string;
}

export interface LiquidityAdded {
    type: 'LiquidityAdded';
    assetLow: string;
    assetHigh: string;
    depositor: string;
    amountLow: bigint;
    amountHigh: bigint;
    shares: bigint;
}

export interface LiquidityRemoved {
    type: 'LiquidityRemoved';
    assetLow: string;
    assetHigh: string;
    depositor: string;
    amountLow: bigint;
    amountHigh: bigint;
    shares: bigint;
}

export interface SwapExecuted {
    type: 'SwapExecuted';
    assetIn: string;
    assetOut: string;
    amountIn: bigint;
    amountOut: bigint;
}

export interface FeeUpdated {
    type: 'FeeUpdated';
    oldRate: bigint;
    newRate: bigint;
}

export type ExchangeEvent = PairCreated | LiquidityAdded | LiquidityRemoved | SwapExecuted | FeeUpdated;

export type RecordedEvent = Readonly<ExchangeEvent & { seq: number; timestamp: number }>;

export type EventListener = (event: RecordedEvent) => void;

export class EventLog {
    private records: RecordedEvent[] = [];
    private listeners: Set<EventListener> = new Set();

    append(events: readonly ExchangeEvent[]): RecordedEvent[] {
        const timestamp = Date.now();
        const appended: RecordedEvent[] = [];
        for (const event of events) {
            const record: RecordedEvent = Object.freeze({ ...event, seq: this.records.length + 1, timestamp });
            this.records.push(record);
            appended.push(record);
        }

        for (const record of appended) {
            for (const listener of this.listeners) {
                try {
                    listener(record);
                } catch (error) {
                    log.error(`Listener failed on ${record.type} #${record.seq}:`, error);
                }
            }
        }
        return appended;
    }

    subscribe(listener: EventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Records with seq greater than `seq` (poll with the last seq seen).
     */
    since(seq: number = 0): RecordedEvent[] {
        return this.records.filter(record => record.seq > seq);
    }

    all(): readonly RecordedEvent[] {
        return this.records;
    }

    get size(): number {
        return this.records.length;
    }
}
