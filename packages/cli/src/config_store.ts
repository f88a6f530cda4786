// packages/cli/src/config_store.ts
import fs from 'node:fs';
import path from 'node:path';

import { DEFAULT_ADDRESS_VERSION } from '@coinkeeper/keyring';

export type CoinkeeperConfigV1 = {
  version: 1;
  createdAt: string;
  /** base58check version byte for displayed addresses */
  addressVersion: number;
  /** watched public keys, compressed hex */
  keys: string[];
  /** optional state file, relative to the config root */
  stateFile?: string;
};

function ensureParentDir(filename: string) {
  fs.mkdirSync(path.dirname(filename), { recursive: true });
}

function field(obj: unknown, key: string): unknown {
  if (typeof obj !== 'object' || obj === null) return undefined;
  return Object.entries(obj).find(([k]) => k === key)?.[1];
}

function isByte(v: unknown): v is number {
  return typeof v === 'number' && Number.isInteger(v) && v >= 0 && v <= 0xff;
}

export function ensureConfigDefaults(partial?: unknown): CoinkeeperConfigV1 {
  const createdAt = field(partial, 'createdAt');
  const addressVersion = field(partial, 'addressVersion');
  const keys = field(partial, 'keys');
  const stateFile = field(partial, 'stateFile');

  const cfg: CoinkeeperConfigV1 = {
    version: 1,
    createdAt: typeof createdAt === 'string' && createdAt ? createdAt : new Date().toISOString(),
    addressVersion: isByte(addressVersion) ? addressVersion : DEFAULT_ADDRESS_VERSION,
    keys: Array.isArray(keys) ? keys.filter((k): k is string => typeof k === 'string') : [],
  };
  if (typeof stateFile === 'string' && stateFile) cfg.stateFile = stateFile;
  return cfg;
}

export function readConfig(args: { configFile: string }): CoinkeeperConfigV1 | null {
  const { configFile } = args;
  if (!fs.existsSync(configFile)) return null;

  const raw = fs.readFileSync(configFile, 'utf8');
  const parsed: unknown = JSON.parse(raw);
  return ensureConfigDefaults(parsed);
}

export function writeConfig(args: { configFile: string; config: CoinkeeperConfigV1 }): void {
  const { configFile, config } = args;
  ensureParentDir(configFile);
  const normalized = ensureConfigDefaults(config);
  fs.writeFileSync(configFile, JSON.stringify(normalized, null, 2) + '\n', 'utf8');
}

/** Returns the config unchanged when `hex` is already watched. */
export function upsertKey(config: CoinkeeperConfigV1, hex: string): { config: CoinkeeperConfigV1; added: boolean } {
  const c = ensureConfigDefaults(config);
  const key = hex.toLowerCase();
  if (c.keys.includes(key)) return { config: c, added: false };
  return { config: { ...c, keys: [...c.keys, key] }, added: true };
}
