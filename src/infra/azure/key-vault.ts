/**
 * Key Vault boundary
 *
 * The vault is treated as append-only: existing secrets are read, never
 * overwritten.
 */

import type { Logger } from 'pino';
import { CommandFailedError } from '@/lib/errors';
import type { AzureCli } from './az-cli';

const SECRET_NOT_FOUND = /SecretNotFound|was not found in this key vault/i;

export function isSecretNotFound(error: CommandFailedError): boolean {
  return error.stderrTail.some((line) => SECRET_NOT_FOUND.test(line));
}

export interface VaultClient {
  secretExists: (vault: string, name: string) => Promise<boolean>;
  setSecret: (vault: string, name: string, value: string) => Promise<void>;
}

export function createKeyVaultClient(az: AzureCli, logger: Logger): VaultClient {
  return {
    async secretExists(vault, name) {
      try {
        const id = await az.run([
          'keyvault',
          'secret',
          'show',
          '--vault-name',
          vault,
          '--name',
          name,
          '--query',
          'id',
          '-o',
          'tsv',
        ]);
        return id.trim().length > 0;
      } catch (error) {
        // anything but a not-found answer may hide an existing secret
        if (error instanceof CommandFailedError && isSecretNotFound(error)) {
          logger.debug({ vault, name, exitCode: error.exitCode }, 'Secret not found');
          return false;
        }
        throw error;
      }
    },

    async setSecret(vault, name, value) {
      await az.run(
        ['keyvault', 'secret', 'set', '--vault-name', vault, '--name', name, '--value', value, '-o', 'none'],
        { redact: [value] },
      );
    },
  };
}
