/**
 * Shared plumbing for CLI commands
 */

import { InvalidArgumentError } from 'commander';
import { config } from '../config.js';
import { ExchangeNode } from '../ExchangeNode.js';
import { Storage } from '../../protocol/storage/Storage.js';
import { inputValidator } from '../../protocol/security/input-validator.js';
import { isAmmError } from '../../runtime/amm/errors.js';
import cli, { c } from '../../protocol/utils/cli.js';

export function openNode(dataDir: string = config.storage.dataDir): ExchangeNode {
    return new ExchangeNode(new Storage(dataDir, config.storage.stateFile), config.exchange);
}

/**
 * commander argument parser for integer amounts
 */
export function parseAmount(value: string): bigint {
    const result = inputValidator.validateAmount(value, 'amount');
    if (!result.valid) {
        throw new InvalidArgumentError(result.error);
    }
    return result.value;
}

export function parsePath(value: string): string[] {
    const result = inputValidator.validatePath(value);
    if (!result.valid) {
        throw new InvalidArgumentError(result.error);
    }
    return result.value;
}

export function fail(action: string, error: unknown): never {
    console.log('');
    if (isAmmError(error)) {
        console.log(cli.errorBox(
            `${error.message}\n${c.dim(`code: ${error.code}`)}`,
            `${cli.sym.error} ${action} failed`
        ));
    } else {
        cli.error(`${action} failed: ${error instanceof Error ? error.message : 'Unknown'}`);
    }
    console.log('');
    process.exit(1);
}
