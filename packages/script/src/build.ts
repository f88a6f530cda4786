// packages/script/src/build.ts
import { concat } from '@coinkeeper/utils';

import {
  DER_INTEGER,
  DER_SEQUENCE,
  HASH160_PUSH,
  OP_CHECKSIG,
  OP_DUP,
  OP_EQUALVERIFY,
  OP_HASH160,
  SIGHASH_ALL,
} from './opcodes.js';

function ensureBytesLen(u8: Uint8Array, n: number, label: string) {
  if (u8.length !== n) throw new Error(`${label} must be ${n} bytes`);
}

function ensurePushable(u8: Uint8Array, label: string) {
  if (u8.length > 0xff) throw new Error(`${label} too long for a single length byte`);
}

export function getP2PKHScript(pubKeyHash: Uint8Array): Uint8Array {
  ensureBytesLen(pubKeyHash, 20, 'p2pkh hash');
  return concat(
    Uint8Array.of(OP_DUP, OP_HASH160, HASH160_PUSH),
    pubKeyHash,
    Uint8Array.of(OP_EQUALVERIFY, OP_CHECKSIG)
  );
}

export function getP2PKScript(pubKey: Uint8Array): Uint8Array {
  ensurePushable(pubKey, 'p2pk pubkey');
  return concat(Uint8Array.of(pubKey.length), pubKey, Uint8Array.of(OP_CHECKSIG));
}

/** DER wrapper around raw R and S integers (no sighash byte). */
export function encodeDerSignature(r: Uint8Array, s: Uint8Array): Uint8Array {
  const rsLength = 2 + r.length + 2 + s.length;
  if (rsLength > 0xff) throw new Error('der signature too long');
  return concat(
    Uint8Array.of(DER_SEQUENCE, rsLength, DER_INTEGER, r.length),
    r,
    Uint8Array.of(DER_INTEGER, s.length),
    s
  );
}

/** <sig + sighash> <pubkey>, each behind a single length byte. */
export function getSignatureScript(args: {
  r: Uint8Array;
  s: Uint8Array;
  pubKey: Uint8Array;
  sighashType?: number;
}): Uint8Array {
  const sig = concat(encodeDerSignature(args.r, args.s), Uint8Array.of(args.sighashType ?? SIGHASH_ALL));
  ensurePushable(sig, 'signature');
  ensurePushable(args.pubKey, 'scriptsig pubkey');
  return concat(Uint8Array.of(sig.length), sig, Uint8Array.of(args.pubKey.length), args.pubKey);
}
