/**
 * Vault CLI Commands
 * Fund test accounts and inspect balances in the local vault
 */

import { Command } from 'commander';
import { config } from '../../config.js';
import cli, { sym, c } from '../../../protocol/utils/cli.js';
import { fail, openNode, parseAmount } from '../context.js';

interface FaucetOptions {
    asset: string;
    to: string;
    amount: bigint;
}

interface BalanceOptions {
    asset: string;
    holder: string;
}

export const vaultCommand = new Command('vault')
    .description('Local asset vault (development)');

vaultCommand
    .command('faucet')
    .description('Mint test balance to an account')
    .requiredOption('--asset <asset>', 'Asset to mint')
    .requiredOption('--to <account>', 'Receiving account')
    .requiredOption('--amount <amount>', 'Amount to mint', parseAmount)
    .action((options: FaucetOptions) => {
        if (!config.faucet.enabled) {
            console.log('');
            console.log(cli.warningBox(
                'Set FAUCET_ENABLED=true to use the faucet',
                `${sym.warning_emoji} Faucet Unavailable`
            ));
            console.log('');
            process.exit(1);
        }
        if (options.amount > config.faucet.maxAmount) {
            cli.error(`Amount exceeds faucet limit of ${config.faucet.maxAmount}`);
            process.exit(1);
        }

        const node = openNode();
        if (options.to === node.vault.custody) {
            cli.error('Cannot fund the exchange custody account');
            process.exit(1);
        }

        try {
            node.vault.mint(options.asset, options.to, options.amount);
            node.save();
            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Received', c.success(`+${options.amount} ${options.asset}`)],
                ['Balance', `${node.vault.balanceOf(options.asset, options.to)} ${options.asset}`],
            ]), `${sym.drop} Faucet`));
            console.log('');
            process.exit(0);
        } catch (error) {
            fail('Faucet', error);
        }
    });

vaultCommand
    .command('balance')
    .description('Show the balance of an account')
    .requiredOption('--asset <asset>', 'Asset')
    .requiredOption('--holder <account>', 'Account')
    .action((options: BalanceOptions) => {
        const node = openNode();
        console.log('');
        console.log(cli.infoBox(cli.rows([
            ['Holder', options.holder],
            ['Balance', `${node.vault.balanceOf(options.asset, options.holder)} ${options.asset}`],
        ]), `${sym.gem} Balance`));
        console.log('');
        process.exit(0);
    });
