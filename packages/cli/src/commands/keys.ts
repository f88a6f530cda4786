// packages/cli/src/commands/keys.ts
import type { Command } from 'commander';

import { PublicKey } from '@coinkeeper/keyring';

import { ensureConfigDefaults, readConfig, upsertKey, writeConfig } from '../config_store.js';
import { openWallet, type GetPaths, type Print } from '../context.js';

function getOrCreateSubcommand(program: Command, name: string, description: string): Command {
  const existing = program.commands.find((c) => c.name() === name);
  if (existing) return existing;
  return program.command(name).description(description);
}

export function registerKeysCommand(program: Command, deps: { getPaths: GetPaths; print?: Print }) {
  const print = deps.print ?? console.log;
  const keys = getOrCreateSubcommand(program, 'keys', 'Manage watched public keys');

  keys
    .command('add')
    .description('Watch a public key (33- or 65-byte SEC1 hex)')
    .argument('<pubkeyHex>')
    .action((hex: string) => {
      const { configFile } = deps.getPaths();
      const key = PublicKey.fromHex(hex);

      const cfg0 = ensureConfigDefaults(readConfig({ configFile }));
      const { config, added } = upsertKey(cfg0, key.toHex());
      if (added) writeConfig({ configFile, config });

      print(`${added ? 'added' : 'already watching'} ${key.toHex()}`);
    });

  keys
    .command('list')
    .description('List watched public keys and their addresses')
    .action(async () => {
      const ctx = await openWallet({ getPaths: deps.getPaths });
      if (ctx.keys.size === 0) {
        print('no keys (run "coinkeeper keys add <pubkeyHex>")');
        return;
      }
      for (const k of ctx.keys.list()) print(`${k.toHex()}  ${ctx.keys.address(k)}`);
    });

  return keys;
}
