// packages/tx/src/tx.ts
// -----------------------------------------------------------------------------
// Legacy (non-segwit) transaction wire format:
//   version u32 | varint n | n * (hash 32 | index u32 | varslice script | sequence u32)
//   | varint m | m * (value u64 | varslice script) | locktime u32
// All integers little-endian. Hashes stay in internal byte order; txidHex()
// gives the reversed display form.
// -----------------------------------------------------------------------------

import {
  ByteReader,
  ByteWriter,
  DecodeError,
  bytesToHex,
  hexToBytes,
  isAllZero,
  reverseBytes,
  sha256d,
} from '@coinkeeper/utils';

import type { Tx, TxInput, TxOutput } from './types.js';

/** Index of the synthetic input of a block-reward transaction. */
export const COINBASE_INDEX = 0xffffffff;

function toBytes(raw: Uint8Array | string): Uint8Array {
  if (raw instanceof Uint8Array) return raw;
  try {
    return hexToBytes(raw.trim());
  } catch (e) {
    throw new DecodeError(`tx: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function decodeTx(raw: Uint8Array | string): Tx {
  const r = new ByteReader(toBytes(raw));

  const version = r.readUInt32LE('tx version');

  const inCount = r.readVarInt('tx input count');
  const inputs: TxInput[] = [];
  for (let i = 0; i < inCount; i++) {
    inputs.push({
      hash: r.readBytes(32, `input ${i} hash`),
      index: r.readUInt32LE(`input ${i} index`),
      script: r.readVarSlice(`input ${i} script`),
      sequence: r.readUInt32LE(`input ${i} sequence`),
    });
  }

  const outCount = r.readVarInt('tx output count');
  const outputs: TxOutput[] = [];
  for (let i = 0; i < outCount; i++) {
    outputs.push({
      value: r.readUInt64LE(`output ${i} value`),
      script: r.readVarSlice(`output ${i} script`),
    });
  }

  const locktime = r.readUInt32LE('tx locktime');
  r.assertConsumed('tx');

  return { version, inputs, outputs, locktime };
}

export function encodeTx(tx: Tx): Uint8Array {
  const w = new ByteWriter().writeUInt32LE(tx.version).writeVarInt(tx.inputs.length);
  for (const inp of tx.inputs) {
    if (inp.hash.length !== 32) throw new Error('encodeTx: input hash must be 32 bytes');
    w.writeBytes(inp.hash).writeUInt32LE(inp.index).writeVarSlice(inp.script).writeUInt32LE(inp.sequence);
  }
  w.writeVarInt(tx.outputs.length);
  for (const out of tx.outputs) {
    w.writeUInt64LE(out.value).writeVarSlice(out.script);
  }
  return w.writeUInt32LE(tx.locktime).toBytes();
}

/**
 * Transaction hash: double SHA-256 of the encoding, internal byte order.
 * decodeTx accepts only canonical compact sizes, so for a decoded tx this
 * equals the hash of the original wire bytes.
 */
export function txHash(tx: Tx): Uint8Array {
  return sha256d(encodeTx(tx));
}

/** Display txid (byte-reversed hex) of an internal-order hash. */
export function txidHex(hash: Uint8Array): string {
  return bytesToHex(reverseBytes(hash));
}

export function isCoinbaseInput(input: Pick<TxInput, 'hash' | 'index'>): boolean {
  return input.hash.length === 32 && isAllZero(input.hash) && input.index === COINBASE_INDEX;
}
