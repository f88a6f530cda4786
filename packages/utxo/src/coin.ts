// packages/utxo/src/coin.ts
import { arraysEqual, bytesToHex } from '@coinkeeper/utils';
import type { ScriptType } from '@coinkeeper/script';

/** Snapshot of an owned, unspent output. */
export type Coin = Readonly<{
  /** Serialized public key of the owner. */
  address: Uint8Array;
  txHash: Uint8Array;
  index: number;
  value: bigint;
  type: ScriptType;
}>;

export function makeCoin(fields: {
  address: Uint8Array;
  txHash: Uint8Array;
  index: number;
  value: bigint;
  type: ScriptType;
}): Coin {
  if (fields.txHash.length !== 32) throw new Error('coin txHash must be 32 bytes');
  if (!Number.isInteger(fields.index) || fields.index < 0 || fields.index > 0xffffffff) {
    throw new Error(`coin index out of range: ${fields.index}`);
  }
  if (fields.value < 0n || fields.value > 0xffffffffffffffffn) {
    throw new Error(`coin value out of range: ${fields.value}`);
  }
  return Object.freeze({
    address: fields.address.slice(),
    txHash: fields.txHash.slice(),
    index: fields.index,
    value: fields.value,
    type: fields.type,
  });
}

/** Same coin with its own byte buffers; freezing does not cover typed-array contents. */
export function copyCoin(coin: Coin): Coin {
  return makeCoin(coin);
}

export function isOutpoint(coin: Coin, txHash: Uint8Array, index: number): boolean {
  return coin.index === index && arraysEqual(coin.txHash, txHash);
}

export function outpointKey(txHash: Uint8Array, index: number): string {
  return `${bytesToHex(txHash)}:${index}`;
}

/** Ascending by value; the order coin selection consumes. */
export function compareByValue(a: Coin, b: Coin): number {
  if (a.value < b.value) return -1;
  if (a.value > b.value) return 1;
  return 0;
}
