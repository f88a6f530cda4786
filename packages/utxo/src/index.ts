// packages/utxo/src/index.ts
export { makeCoin, isOutpoint, outpointKey, compareByValue, type Coin } from './coin.js';
export { CoinRegistry } from './registry.js';
export { ExclusiveLock } from './lock.js';
export { NotOwnedError, CoinNotFoundError } from './errors.js';
export { createConsoleLogger, silentLogger, type Logger } from './logger.js';
export {
  processTransaction,
  type ProcessorDeps,
  type TransactionReport,
  type InputOutcome,
  type OutputOutcome,
  type Skipped,
  type SkipReason,
} from './processor.js';
