/**
 * Admin CLI Commands
 * Fee inspection and updates (fee-setter only)
 */

import { Command } from 'commander';
import { MAX_FEE_BPS } from '../../../protocol/params/amm.js';
import cli, { sym } from '../../../protocol/utils/cli.js';
import { fail, openNode, parseAmount } from '../context.js';

interface FeeOptions {
    set?: bigint;
    caller?: string;
}

export const adminCommand = new Command('admin')
    .description('Exchange administration');

adminCommand
    .command('fee')
    .description('Show the swap fee, or change it with --set')
    .option('--set <bps>', 'New fee in basis points', parseAmount)
    .option('--caller <account>', 'Account requesting the change')
    .action((options: FeeOptions) => {
        const node = openNode();

        if (options.set === undefined) {
            console.log('');
            console.log(cli.infoBox(cli.rows([
                ['Fee', `${node.exchange.getFeeRate()} bps`],
                ['Maximum', `${MAX_FEE_BPS} bps`],
            ]), `${sym.gear} Swap Fee`));
            console.log('');
            process.exit(0);
        }

        if (!options.caller) {
            cli.error('--caller is required with --set');
            process.exit(1);
        }

        try {
            const change = node.exchange.setFeeRate(options.caller, options.set);
            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Old fee', `${change.oldRate} bps`],
                ['New fee', `${change.newRate} bps`],
            ]), `${sym.check} Fee Updated`));
            console.log('');
            process.exit(0);
        } catch (error) {
            fail('Set fee', error);
        }
    });
