// packages/cli/src/commands/ingest.ts
import fs from 'node:fs';
import type { Command } from 'commander';

import { decodeTx, txidHex, type Tx } from '@coinkeeper/tx';
import { DecodeError } from '@coinkeeper/utils';
import { createConsoleLogger, processTransaction, type Logger, type TransactionReport } from '@coinkeeper/utxo';

import { openWallet, type GetPaths, type Print } from '../context.js';

/** One raw tx hex per line; blank lines and `#` comments are ignored. */
export function readRawTxFile(filename: string): string[] {
  return fs
    .readFileSync(filename, 'utf8')
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l && !l.startsWith('#'));
}

export function formatReport(report: TransactionReport): string {
  const skipped =
    report.inputs.filter((o) => o.status === 'skipped').length +
    report.outputs.filter((o) => o.status === 'skipped').length;
  return `${txidHex(report.txHash)}  +${report.added.length} -${report.removed.length} skipped ${skipped}`;
}

export function registerIngestCommand(
  program: Command,
  deps: { getPaths: GetPaths; print?: Print; logger?: Logger }
) {
  const print = deps.print ?? console.log;

  return program
    .command('ingest')
    .description('Absorb raw transactions into the wallet')
    .argument('[rawTx...]', 'raw transaction hex')
    .option('--file <path>', 'read raw transaction hex from a file, one per line')
    .action(async (rawTxs: string[], opts: { file?: string }) => {
      const inputs = [...rawTxs, ...(opts.file ? readRawTxFile(opts.file) : [])];
      if (inputs.length === 0) throw new Error('ingest: no transactions given (pass hex arguments or --file)');

      const ctx = await openWallet({ getPaths: deps.getPaths, logger: deps.logger ?? createConsoleLogger('ingest') });

      let failed = 0;
      for (const [n, raw] of inputs.entries()) {
        let tx: Tx;
        try {
          tx = decodeTx(raw);
        } catch (e) {
          if (!(e instanceof DecodeError)) throw e;
          failed++;
          print(`#${n}: undecodable transaction: ${e.message}`);
          continue;
        }

        const report = processTransaction(tx, { registry: ctx.registry, keys: ctx.keys, logger: ctx.logger });
        await ctx.mirror.apply(report);
        print(formatReport(report));
      }

      print(`ingested ${inputs.length - failed} of ${inputs.length} transaction(s)`);
    });
}
