#!/usr/bin/env node
// packages/cli/src/index.ts
//
// coinkeeper: watch public keys, ingest raw transactions, list coins.
//
//   coinkeeper keys add <pubkeyHex>
//   coinkeeper ingest <rawTxHex...> | --file txs.txt
//   coinkeeper coins [--address <pubkeyHex>]
//   coinkeeper balance

import { buildProgram } from './program.js';

// --- MUST await parseAsync or Node may exit before Commander prints/help runs ---
(async () => {
  await buildProgram().parseAsync(process.argv);
})().catch((err: unknown) => {
  console.error('❌', err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 1;
});
