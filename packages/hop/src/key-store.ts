/**
 * Persistence of hop key material.
 *
 * @packageDocumentation
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { HopAccount } from './hop-account.js';

/**
 * Somewhere to keep a hop account's key material until the run is over.
 */
export interface HopKeyStore {
  /**
   * Persist the account. Resolves with where it was written.
   */
  save(account: HopAccount): Promise<string>;
}

export interface FileKeyStoreOptions {
  /**
   * Directory for key files, created if missing.
   * @default '.'
   */
  directory?: string;
  /**
   * Clock used for the file name.
   */
  now?: () => Date;
}

const MAX_NAME_COLLISIONS = 100;

function pad(value: number, length = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * `hop_keys_YYYYMMDD_HHMMSS.txt` in local time, or
 * `hop_keys_YYYYMMDD_HHMMSS_<suffix>.txt` when `suffix` is above zero.
 */
export function formatKeyFileName(date: Date, suffix = 0): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `hop_keys_${day}_${time}${suffix > 0 ? `_${suffix}` : ''}.txt`;
}

/**
 * Contents of a key file.
 */
export function formatKeyFile(account: HopAccount): string {
  return `PUBKEY=${account.address}\nPRIVKEY=${account.exportSecretKey()}\n`;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Key store writing one owner-only file per hop account.
 * Existing files are never overwritten; a run that starts in the same second
 * as another gets a numbered name.
 *
 * @example
 * ```ts
 * const store = createFileKeyStore({ directory: './keys' });
 * const path = await store.save(hop); // ./keys/hop_keys_20240101_120000.txt
 * ```
 */
export function createFileKeyStore(options: FileKeyStoreOptions = {}): HopKeyStore {
  const { directory = '.', now = () => new Date() } = options;

  return {
    async save(account) {
      await mkdir(directory, { recursive: true });
      const date = now();
      const contents = formatKeyFile(account);

      for (let suffix = 0; suffix < MAX_NAME_COLLISIONS; suffix++) {
        const path = join(directory, formatKeyFileName(date, suffix));
        try {
          await writeFile(path, contents, { mode: 0o600, flag: 'wx' });
          return path;
        } catch (error) {
          if (!isAlreadyExists(error)) {
            throw error;
          }
        }
      }
      throw new Error(`Could not find a free key file name in ${directory}`);
    },
  };
}
