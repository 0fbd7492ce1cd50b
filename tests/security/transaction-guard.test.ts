import { describe, it, expect, beforeEach } from 'vitest';
import { Role, RoleRegistry, TxLock } from '../../src/protocol/security/transaction-guard.js';
import { codeOf } from '../helpers/exchange.js';

describe('TxLock', () => {
    let lock: TxLock;
    beforeEach(() => { lock = new TxLock(); });

    it('acquire returns true when free', () => {
        expect(lock.acquire('swap')).toBe(true);
        expect(lock.current()).toBe('swap');
    });
    it('acquire returns false while held', () => {
        lock.acquire('swap');
        expect(lock.acquire('addLiquidity')).toBe(false);
    });
    it('release allows re-acquire', () => {
        lock.acquire('swap');
        lock.release();
        expect(lock.isLocked()).toBe(false);
        expect(lock.acquire('swap')).toBe(true);
    });
    it('run rejects a nested run with ReentrantCall', () => {
        expect(codeOf(() => lock.run('outer', () => lock.run('inner', () => 1)))).toBe('ReentrantCall');
        expect(lock.isLocked()).toBe(false);
    });
    it('run releases when the body throws', () => {
        expect(() => lock.run('swap', () => { throw new Error('boom'); })).toThrow('boom');
        expect(lock.isLocked()).toBe(false);
    });
    it('run returns the body result', () => {
        expect(lock.run('quote', () => 42)).toBe(42);
    });
});

describe('Role-Based Access Control', () => {
    it('grantRole and hasRole work', () => {
        const roles = new RoleRegistry();
        roles.grantRole('owner', Role.FEE_SETTER);
        expect(roles.hasRole('owner', Role.FEE_SETTER)).toBe(true);
        expect(roles.hasRole('someone', Role.FEE_SETTER)).toBe(false);
    });
    it('revokeRole removes permission', () => {
        const roles = new RoleRegistry();
        roles.grantRole('owner', Role.FEE_SETTER);
        roles.revokeRole('owner', Role.FEE_SETTER);
        expect(codeOf(() => roles.requireRole('owner', Role.FEE_SETTER))).toBe('Unauthorized');
    });
});
