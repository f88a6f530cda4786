// packages/store/src/codec.ts
//
// Value and key encodings for the kv store:
//   Uint8Array -> as is
//   string     -> utf-8
//   integer    -> 8-byte little-endian (number or bigint)
//   other      -> JSON
// Keys are built by concatenating parts; each string part is NUL-terminated
// so string prefixes can be recovered from a key.

import { utf8ToBytes } from '@noble/hashes/utils.js';
import { DecodeError, concat, uint64le } from '@coinkeeper/utils';

const decoder = new TextDecoder();

export function toBytes(v: unknown): Uint8Array {
  if (v instanceof Uint8Array) return v;
  if (typeof v === 'string') return utf8ToBytes(v);
  if (typeof v === 'bigint') return uint64le(v);
  if (typeof v === 'number' && Number.isInteger(v)) return uint64le(v);

  const json = JSON.stringify(v);
  if (json === undefined) throw new Error(`toBytes: cannot encode ${typeof v}`);
  return utf8ToBytes(json);
}

export function toKey(...parts: unknown[]): Uint8Array {
  const out: Uint8Array[] = [];
  for (const p of parts) {
    out.push(toBytes(p));
    if (typeof p === 'string') out.push(Uint8Array.of(0x00));
  }
  return concat(out);
}

export function asString(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

function view8(bytes: Uint8Array, label: string): DataView {
  if (bytes.length !== 8) throw new DecodeError(`${label}: expected 8 bytes, got ${bytes.length}`);
  return new DataView(bytes.buffer, bytes.byteOffset, 8);
}

/** Signed 64-bit little-endian; must fit a safe integer. */
export function asInt(bytes: Uint8Array): number {
  const n = view8(bytes, 'asInt').getBigInt64(0, true);
  if (n > BigInt(Number.MAX_SAFE_INTEGER) || n < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new DecodeError(`asInt: ${n} exceeds safe integer range`);
  }
  return Number(n);
}

export function asUInt64(bytes: Uint8Array): bigint {
  return view8(bytes, 'asUInt64').getBigUint64(0, true);
}

export function asJson(bytes: Uint8Array): unknown {
  try {
    return JSON.parse(asString(bytes));
  } catch (e) {
    throw new DecodeError(`asJson: ${e instanceof Error ? e.message : String(e)}`);
  }
}
