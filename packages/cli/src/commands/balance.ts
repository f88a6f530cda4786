// packages/cli/src/commands/balance.ts
import type { Command } from 'commander';

import { openWallet, type GetPaths, type Print } from '../context.js';

export function registerBalanceCommand(program: Command, deps: { getPaths: GetPaths; print?: Print }) {
  const print = deps.print ?? console.log;

  return program
    .command('balance')
    .description('Show balance per watched key and in total')
    .action(async () => {
      const ctx = await openWallet({ getPaths: deps.getPaths });

      let total = 0n;
      for (const k of ctx.keys.list()) {
        const bal = ctx.registry.balance(ctx.keys.serialize(k));
        total += bal;
        print(`${ctx.keys.address(k)}  ${bal}`);
      }
      print(`total  ${total}`);
    });
}
