// packages/cli/src/commands/coins.ts
import type { Command } from 'commander';

import { PublicKey } from '@coinkeeper/keyring';
import { SCRIPT_TYPE, type ScriptType } from '@coinkeeper/script';
import { txidHex } from '@coinkeeper/tx';

import { openWallet, type GetPaths, type Print } from '../context.js';

function typeName(t: ScriptType): string {
  return t === SCRIPT_TYPE.PayToPubKeyHash ? 'p2pkh' : 'p2pk';
}

export function registerCoinsCommand(program: Command, deps: { getPaths: GetPaths; print?: Print }) {
  const print = deps.print ?? console.log;

  return program
    .command('coins')
    .description('List owned coins, smallest first')
    .option('--address <pubkeyHex>', 'only coins owned by this public key')
    .action(async (opts: { address?: string }) => {
      const ctx = await openWallet({ getPaths: deps.getPaths });
      const keys = opts.address ? [PublicKey.fromHex(opts.address)] : ctx.keys.list();

      for (const k of keys) {
        const coins = ctx.registry.coinsByValue(ctx.keys.serialize(k));
        print(`${ctx.keys.address(k)} (${coins.length} coin(s))`);
        for (const c of coins) {
          print(`  ${txidHex(c.txHash)}:${c.index}  ${c.value}  ${typeName(c.type)}`);
        }
      }
    });
}
