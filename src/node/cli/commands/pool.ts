/**
 * Pool CLI Commands
 * Pair creation, liquidity, swaps and quotes against the persisted exchange
 */

import { Command } from 'commander';
import { formatPair } from '../../../runtime/amm/index.js';
import { SHARE_RATIO_PRECISION } from '../../../protocol/params/amm.js';
import cli, { sym, c } from '../../../protocol/utils/cli.js';
import { fail, openNode, parseAmount, parsePath } from '../context.js';

interface PairOptions {
    a: string;
    b: string;
}

interface AddOptions extends PairOptions {
    amountA: bigint;
    amountB: bigint;
    minA: bigint;
    minB: bigint;
    depositor: string;
}

interface RemoveOptions extends PairOptions {
    shares: bigint;
    minA: bigint;
    minB: bigint;
    depositor: string;
}

interface SwapOptions {
    path: string[];
    amountIn: bigint;
    minOut: bigint;
    caller: string;
    to?: string;
}

interface QuoteOptions {
    path: string[];
    amountIn?: bigint;
    amountOut?: bigint;
}

function percentOf(shareRatio: bigint): string {
    // shareRatio is scaled by 1e18; show 4 decimals of percent
    const basis = (shareRatio * 1_000_000n) / SHARE_RATIO_PRECISION;
    return `${(Number(basis) / 10_000).toFixed(4)}%`;
}

export const poolCommand = new Command('pool')
    .description('Liquidity pool operations');

// CREATE command
poolCommand
    .command('create')
    .description('Create a trading pair')
    .requiredOption('--a <asset>', 'First asset')
    .requiredOption('--b <asset>', 'Second asset')
    .action((options: PairOptions) => {
        const node = openNode();
        try {
            const key = node.exchange.createPair(options.a, options.b);
            console.log('');
            console.log(cli.successBox(
                cli.rows([['Pair', formatPair(key)]]),
                `${sym.check} Pair Created`
            ));
            console.log('');
            process.exit(0);
        } catch (error) {
            fail('Create pair', error);
        }
    });

// LIST command
poolCommand
    .command('list')
    .description('List all pairs')
    .action(() => {
        const node = openNode();
        const pools = node.exchange.listPools();

        console.log('');
        if (pools.length === 0) {
            console.log(cli.warningBox(
                `Use ${c.primary('amm pool create')} to create one`,
                `${sym.warning_emoji} No Pairs`
            ));
        } else {
            console.log(cli.infoBox(
                pools.map(p => `${sym.bullet} ${c.value(formatPair(p))}  ${c.dim(`${p.reserveLow} / ${p.reserveHigh}`)}`).join('\n'),
                `${sym.gem} Pairs (${pools.length})`
            ));
        }
        console.log('');
        process.exit(0);
    });

// INFO command
poolCommand
    .command('info')
    .description('Show pool reserves and shares')
    .requiredOption('--a <asset>', 'First asset')
    .requiredOption('--b <asset>', 'Second asset')
    .action((options: PairOptions) => {
        const node = openNode();
        try {
            const pool = node.exchange.getPool(options.a, options.b);
            if (!pool) {
                console.log('');
                console.log(cli.warningBox(
                    `Use ${c.primary('amm pool create')} to create the pair`,
                    `${sym.warning_emoji} Pair Not Found`
                ));
                console.log('');
                process.exit(0);
            }

            console.log('');
            console.log(cli.infoBox(cli.rows([
                [`Reserve ${pool.assetLow}`, pool.reserveLow.toString()],
                [`Reserve ${pool.assetHigh}`, pool.reserveHigh.toString()],
                ['Total shares', pool.totalShares.toString()],
                ['Fee', `${node.exchange.getFeeRate()} bps`],
            ]), `${sym.gem} ${formatPair(pool)}`));
            console.log('');
            process.exit(0);
        } catch (error) {
            fail('Pool info', error);
        }
    });

// ADD command
poolCommand
    .command('add')
    .description('Add liquidity to a pair')
    .requiredOption('--a <asset>', 'First asset')
    .requiredOption('--b <asset>', 'Second asset')
    .requiredOption('--amount-a <amount>', 'Desired amount of the first asset', parseAmount)
    .requiredOption('--amount-b <amount>', 'Desired amount of the second asset', parseAmount)
    .option('--min-a <amount>', 'Minimum amount of the first asset', parseAmount, 0n)
    .option('--min-b <amount>', 'Minimum amount of the second asset', parseAmount, 0n)
    .requiredOption('--depositor <account>', 'Depositor account')
    .action((options: AddOptions) => {
        const node = openNode();
        try {
            const result = node.exchange.addLiquidity({
                assetA: options.a,
                assetB: options.b,
                amountADesired: options.amountA,
                amountBDesired: options.amountB,
                amountAMin: options.minA,
                amountBMin: options.minB,
                depositor: options.depositor,
            });

            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Added', `${result.amountA} ${options.a} + ${result.amountB} ${options.b}`],
                ['Shares', result.shares.toString()],
            ]), `${sym.check} Liquidity Added`));
            console.log('');
            process.exit(0);
        } catch (error) {
            fail('Add liquidity', error);
        }
    });

// REMOVE command
poolCommand
    .command('remove')
    .description('Remove liquidity from a pair')
    .requiredOption('--a <asset>', 'First asset')
    .requiredOption('--b <asset>', 'Second asset')
    .requiredOption('--shares <amount>', 'Shares to burn', parseAmount)
    .option('--min-a <amount>', 'Minimum amount of the first asset', parseAmount, 0n)
    .option('--min-b <amount>', 'Minimum amount of the second asset', parseAmount, 0n)
    .requiredOption('--depositor <account>', 'Depositor account')
    .action((options: RemoveOptions) => {
        const node = openNode();
        try {
            const result = node.exchange.removeLiquidity({
                assetA: options.a,
                assetB: options.b,
                shareAmount: options.shares,
                amountAMin: options.minA,
                amountBMin: options.minB,
                depositor: options.depositor,
            });

            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Burned', `${result.shares} shares`],
                ['Got', `${result.amountA} ${options.a}`],
                ['Got', `${result.amountB} ${options.b}`],
            ]), `${sym.check} Liquidity Removed`));
            console.log('');
            process.exit(0);
        } catch (error) {
            fail('Remove liquidity', error);
        }
    });

// SWAP command
poolCommand
    .command('swap')
    .description('Swap along a path of pairs')
    .requiredOption('--path <assets>', 'Comma-separated assets, e.g. USD,ETH,BTC', parsePath)
    .requiredOption('--amount-in <amount>', 'Exact input amount', parseAmount)
    .option('--min-out <amount>', 'Minimum output amount', parseAmount, 0n)
    .requiredOption('--caller <account>', 'Account paying the input')
    .option('--to <account>', 'Recipient (defaults to caller)')
    .action((options: SwapOptions) => {
        const node = openNode();
        try {
            const result = node.exchange.swap({
                caller: options.caller,
                amountIn: options.amountIn,
                amountOutMin: options.minOut,
                path: options.path,
                recipient: options.to ?? options.caller,
            });

            const first = options.path[0];
            const last = options.path[options.path.length - 1];
            console.log('');
            console.log(cli.successBox(cli.rows([
                ['In', `${options.amountIn} ${first}`],
                ['Out', `${result.amountOut} ${last}`],
                ['Route', options.path.join(` ${sym.arrow} `)],
                ['Hops', result.amounts.map(a => a.toString()).join(` ${sym.arrow} `)],
            ]), `${sym.lightning} Swap Successful`));
            console.log('');
            process.exit(0);
        } catch (error) {
            fail('Swap', error);
        }
    });

// QUOTE command
poolCommand
    .command('quote')
    .description('Quote a swap along a path without executing it')
    .requiredOption('--path <assets>', 'Comma-separated assets', parsePath)
    .option('--amount-in <amount>', 'Exact input amount', parseAmount)
    .option('--amount-out <amount>', 'Exact output amount', parseAmount)
    .action((options: QuoteOptions) => {
        const node = openNode();
        try {
            let amounts: bigint[];
            if (options.amountOut !== undefined) {
                amounts = node.exchange.getAmountsIn(options.amountOut, options.path);
            } else if (options.amountIn !== undefined) {
                amounts = node.exchange.getAmountsOut(options.amountIn, options.path);
            } else {
                cli.error('Pass --amount-in or --amount-out');
                process.exit(1);
            }

            console.log('');
            console.log(cli.infoBox(cli.rows([
                ['In', `${amounts[0]} ${options.path[0]}`],
                ['Out', `${amounts[amounts.length - 1]} ${options.path[options.path.length - 1]}`],
                ['Hops', amounts.map(a => a.toString()).join(` ${sym.arrow} `)],
                ['Fee', `${node.exchange.getFeeRate()} bps per hop`],
            ]), `${sym.lightning} Swap Quote`));
            console.log('');
            process.exit(0);
        } catch (error) {
            fail('Quote', error);
        }
    });

// POSITION command
poolCommand
    .command('position')
    .description('Show a depositor position')
    .requiredOption('--a <asset>', 'First asset')
    .requiredOption('--b <asset>', 'Second asset')
    .requiredOption('--depositor <account>', 'Depositor account')
    .action((options: PairOptions & { depositor: string }) => {
        const node = openNode();
        try {
            const position = node.exchange.getDepositorPosition(options.a, options.b, options.depositor);
            console.log('');
            console.log(cli.infoBox(cli.rows([
                ['Depositor', position.depositor],
                ['Shares', position.shareAmount.toString()],
                ['Share', percentOf(position.shareRatio)],
            ]), `${sym.gem} ${formatPair(position)}`));
            console.log('');
            process.exit(0);
        } catch (error) {
            fail('Position', error);
        }
    });
