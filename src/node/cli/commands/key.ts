/**
 * Key CLI Commands
 * ed25519 keys whose addresses act as API principals
 */

import { Command } from 'commander';
import * as ed from '@noble/ed25519';
import { bytesToHex } from '@noble/hashes/utils';
import { publicKeyToAddress } from '../../../protocol/security/request-signature.js';
import cli, { sym, c } from '../../../protocol/utils/cli.js';
import { fail } from '../context.js';

export const keyCommand = new Command('key')
    .description('Signing keys for API requests');

// GENERATE command
keyCommand
    .command('generate')
    .description('Create a new signing key')
    .action(async () => {
        try {
            const privateKey = bytesToHex(ed.utils.randomPrivateKey());
            const publicKey = bytesToHex(await ed.getPublicKeyAsync(privateKey));

            console.log('');
            console.log(cli.successBox(cli.rows([
                ['Address', publicKeyToAddress(publicKey)],
                ['Public key', publicKey],
                ['Private key', c.warning(privateKey)],
            ]), `${sym.key} New Signing Key`));
            console.log('');
            cli.warn('Store the private key safely; it is not saved anywhere.');
            process.exit(0);
        } catch (error) {
            fail('Generate key', error);
        }
    });

// ADDRESS command
keyCommand
    .command('address')
    .description('Show the address of a public key')
    .requiredOption('--public-key <hex>', 'ed25519 public key')
    .action((options: { publicKey: string }) => {
        console.log(publicKeyToAddress(options.publicKey));
        process.exit(0);
    });
