/**
 * ConfigStateGuard
 *
 * Snapshots repository-local git config before the run mutates it (auth
 * header, identity, signing) and puts every key back afterwards, whatever
 * happened in between.
 */

import type { VersionControlClient } from '../git/client.js';
import { ConfigRestoreFailure } from '../types/errors.js';
import type { ConfigEntry, ConfigSnapshot } from '../types/sync.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-guard');

export class ConfigStateGuard {
  constructor(private readonly git: VersionControlClient) {}

  /**
   * Record current local values for each key (null when unset)
   */
  async snapshot(keys: readonly string[]): Promise<ConfigSnapshot> {
    const entries: ConfigEntry[] = [];
    for (const key of new Set(keys)) {
      const values = await this.git.configGetAll(key);
      entries.push(Object.freeze({ key, values: values ? Object.freeze([...values]) : null }));
    }
    log.debug({ keys: entries.map((e) => e.key) }, 'Config snapshot taken');
    return Object.freeze(entries);
  }

  /**
   * Put every key back to its captured state. All keys are attempted; failures
   * are reported together.
   */
  async restore(snapshot: ConfigSnapshot): Promise<void> {
    const failedKeys: string[] = [];
    const causes: unknown[] = [];

    for (const entry of snapshot) {
      try {
        await this.git.configUnset(entry.key);
        for (const value of entry.values ?? []) {
          await this.git.configAdd(entry.key, value);
        }
      } catch (error) {
        failedKeys.push(entry.key);
        causes.push(error);
      }
    }

    if (failedKeys.length > 0) {
      throw new ConfigRestoreFailure(failedKeys, causes);
    }
    log.debug({ count: snapshot.length }, 'Config restored');
  }

  /**
   * Run `fn` with the keys snapshotted; restore always runs. A restore failure
   * is logged and does not replace fn's result or error.
   */
  async withGuard<T>(keys: readonly string[], fn: () => Promise<T>): Promise<T> {
    const snapshot = await this.snapshot(keys);
    try {
      return await fn();
    } finally {
      try {
        await this.restore(snapshot);
      } catch (error) {
        const keysLeft = error instanceof ConfigRestoreFailure ? error.keys : snapshot.map((e) => e.key);
        log.error({ err: error, keys: keysLeft }, 'Failed to restore git config');
      }
    }
  }
}
