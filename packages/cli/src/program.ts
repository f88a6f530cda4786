// packages/cli/src/program.ts
import { Command } from 'commander';

import type { Logger } from '@coinkeeper/utxo';

import { registerBalanceCommand } from './commands/balance.js';
import { registerCoinsCommand } from './commands/coins.js';
import { registerIngestCommand } from './commands/ingest.js';
import { registerKeysCommand } from './commands/keys.js';
import type { Print } from './context.js';
import { resolvePaths } from './paths.js';

export function buildProgram(deps: { cwd?: string; print?: Print; logger?: Logger } = {}): Command {
  const program = new Command();

  program
    .name('coinkeeper')
    .description('Watch-only UTXO wallet: track coins paid to your public keys')
    .option('--home <dir>', 'directory holding .coinkeeper/ (default: COINKEEPER_HOME or find-up from cwd)');

  const getPaths = () => {
    const { home } = program.opts<{ home?: string }>();
    return resolvePaths({ cwd: deps.cwd ?? process.cwd(), home });
  };

  registerKeysCommand(program, { getPaths, print: deps.print });
  registerIngestCommand(program, { getPaths, print: deps.print, logger: deps.logger });
  registerCoinsCommand(program, { getPaths, print: deps.print });
  registerBalanceCommand(program, { getPaths, print: deps.print });

  return program;
}
