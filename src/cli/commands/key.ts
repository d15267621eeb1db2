// src/cli/commands/key.ts
import { Command } from 'commander';
import { KeyDeriver } from '../../core/address/key-deriver.js';
import { loadKeyConfig } from '../../core/config/env.js';
import { reportError } from '../run.js';

export function registerKeyCommand(program: Command): void {
  program
    .command('key_decode')
    .description('Print the plaintext behind an encrypted object key segment')
    .argument('<segment>', 'Encrypted path segment copied from an object key')
    .action((segment: string) => {
      try {
        const { keySecret, keyPrefix } = loadKeyConfig();
        console.log(new KeyDeriver(keySecret, keyPrefix).decode(segment));
      } catch (error) {
        reportError(error);
        process.exit(1);
      }
    });
}
