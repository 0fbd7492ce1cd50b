import { logger } from '../utils/logger.js';
import { AmmError } from '../../runtime/amm/errors.js';

const log = logger.child('TxGuard');

/**
 * Operation-scoped write lock.
 *
 * One state-mutating operation may hold it at a time. There is no timeout:
 * operations are synchronous and always release in `finally`.
 */
export class TxLock {
    private holder: string | null = null;

    acquire(operation: string): boolean {
        if (this.holder !== null) {
            log.warn(`🔒 Reentrancy blocked: ${operation} while ${this.holder} in progress`);
            return false;
        }
        this.holder = operation;
        return true;
    }

    release(): void {
        this.holder = null;
    }

    isLocked(): boolean {
        return this.holder !== null;
    }

    current(): string | null {
        return this.holder;
    }

    run<T>(operation: string, fn: () => T): T {
        if (!this.acquire(operation)) {
            throw new AmmError('ReentrantCall', `${operation} rejected: ${this.holder} is still in progress`);
        }
        try {
            return fn();
        } finally {
            this.release();
        }
    }
}

export enum Role { FEE_SETTER = 'fee-setter' }

export interface AuthorizationService {
    requireRole(caller: string, role: Role): void;
}

export class RoleRegistry implements AuthorizationService {
    private roles = new Map<string, Set<Role>>();

    grantRole(principal: string, role: Role): void {
        const granted = this.roles.get(principal) || new Set<Role>();
        granted.add(role);
        this.roles.set(principal, granted);
        log.info(`🛡️ Granted ${role} to ${principal}`);
    }

    revokeRole(principal: string, role: Role): void {
        this.roles.get(principal)?.delete(role);
    }

    hasRole(principal: string, role: Role): boolean {
        return this.roles.get(principal)?.has(role) ?? false;
    }

    requireRole(caller: string, role: Role): void {
        if (!this.hasRole(caller, role)) {
            throw new AmmError('Unauthorized', `${caller} is missing role: ${role}`);
        }
    }
}
