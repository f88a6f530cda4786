// packages/tx/src/index.ts
export { COINBASE_INDEX, decodeTx, encodeTx, txHash, txidHex, isCoinbaseInput } from './tx.js';
export type { Tx, TxInput, TxOutput } from './types.js';
