// packages/cli/src/context.ts
import path from 'node:path';

import { KeyRing } from '@coinkeeper/keyring';
import { CoinMirror, KvStore } from '@coinkeeper/store';
import { CoinRegistry, silentLogger, type Logger } from '@coinkeeper/utxo';

import { ensureConfigDefaults, readConfig, type CoinkeeperConfigV1 } from './config_store.js';
import type { CliPaths } from './paths.js';

export type GetPaths = () => CliPaths;

export type Print = (line: string) => void;

export type WalletContext = {
  paths: CliPaths;
  config: CoinkeeperConfigV1;
  keys: KeyRing;
  registry: CoinRegistry;
  store: KvStore;
  mirror: CoinMirror;
  logger: Logger;
};

/**
 * Load config, key ring and persisted coins.
 * A config `stateFile` overrides the default state location.
 */
export async function openWallet(args: { getPaths: GetPaths; logger?: Logger }): Promise<WalletContext> {
  const base = args.getPaths();
  const config = ensureConfigDefaults(readConfig({ configFile: base.configFile }));
  const paths = config.stateFile ? { ...base, stateFile: path.resolve(base.root, config.stateFile) } : base;

  const keys = new KeyRing({ addressVersion: config.addressVersion });
  for (const hex of config.keys) keys.addHex(hex);

  const store = await KvStore.open({ filename: paths.stateFile });
  const mirror = new CoinMirror(store);
  const registry = new CoinRegistry();
  const logger = args.logger ?? silentLogger;

  const restored = mirror.restore(registry);
  logger.debug(`restored ${restored} coin(s) from ${paths.stateFile}`);

  return { paths, config, keys, registry, store, mirror, logger };
}
