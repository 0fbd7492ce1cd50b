#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { startNode } from './commands/start.js';
import { poolCommand } from './commands/pool.js';
import { adminCommand } from './commands/admin.js';
import { vaultCommand } from './commands/vault.js';
import { keyCommand } from './commands/key.js';
import { config } from '../config.js';
import cli from '../../protocol/utils/cli.js';

const program = new Command();

program
    .name('amm')
    .description('AMM Exchange - constant-product liquidity pools')
    .version(config.version);

program
    .command('start')
    .description('Start the exchange API server')
    .option('-p, --port <number>', 'API server port', String(config.api.port))
    .option('-d, --data <path>', 'Data directory path', config.storage.dataDir)
    .action(async (options: { port: string; data: string }) => {
        const port = parseInt(options.port, 10);
        if (Number.isNaN(port)) {
            cli.error(`Invalid port: ${options.port}`);
            process.exit(1);
        }
        try {
            await startNode({ apiPort: port, dataDir: options.data });
        } catch (error) {
            cli.error(`Failed to start: ${error instanceof Error ? error.message : 'Unknown'}`);
            process.exit(1);
        }
    });

program.addCommand(poolCommand);
program.addCommand(adminCommand);
program.addCommand(vaultCommand);
program.addCommand(keyCommand);

// Parse AFTER all commands are registered
program.parse();
