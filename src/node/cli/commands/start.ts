import type { Server } from 'http';
import { config } from '../../config.js';
import { startServer } from '../../api/server.js';
import { logger } from '../../../protocol/utils/logger.js';
import { c, successBox, header } from '../../../protocol/utils/cli.js';
import { openNode } from '../context.js';

export interface StartOptions {
    apiPort: number;
    dataDir: string;
}

export async function startNode(options: StartOptions): Promise<Server> {
    const node = openNode(options.dataDir);

    console.log('');
    console.log(header(`Node v${config.version}`));
    console.log('');

    const server = await startServer(node, {
        version: config.version,
        rateLimit: config.api.rateLimit,
        cors: config.api.cors,
        adminApiKey: config.api.adminApiKey,
        faucet: config.faucet,
    }, options.apiPort);

    console.log(successBox([
        `${c.label('Network:')}   ${c.value(config.network_mode)}`,
        `${c.label('API:')}       ${c.value(`http://localhost:${options.apiPort}/api/v1`)}`,
        `${c.label('Data:')}      ${c.value(options.dataDir)}`,
        `${c.label('Fee:')}       ${c.value(`${node.exchange.getFeeRate()} bps`)}`,
        `${c.label('Pools:')}     ${c.value(String(node.exchange.listPools().length))}`,
        `${c.label('Faucet:')}    ${config.faucet.enabled ? c.success('enabled') : c.dim('disabled')}`,
    ].join('\n'), 'Exchange Running'));
    console.log('');

    const shutdown = (): void => {
        logger.info('Shutting down...');
        node.save();
        server.close(() => process.exit(0));
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    return server;
}
