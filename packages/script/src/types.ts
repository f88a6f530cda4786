// packages/script/src/types.ts
import type { DecodeError, UnsupportedFormatError } from '@coinkeeper/utils';

/** Coin type tag: which output template locked the coin. */
export const SCRIPT_TYPE = {
  PayToPubKeyHash: 0,
  PayToPubKey: 1,
} as const;

export type ScriptType = (typeof SCRIPT_TYPE)[keyof typeof SCRIPT_TYPE];

export type ScriptError = DecodeError | UnsupportedFormatError;

export type MatchResult<T> = { ok: true; value: T } | { ok: false; error: ScriptError };

/** OP_DUP OP_HASH160 <20> OP_EQUALVERIFY OP_CHECKSIG, fields as read. */
export type PayToPubKeyHashScript = {
  dup: number;
  hash160: number;
  hashLength: number;
  pubKeyHash: Uint8Array;
  equalVerify: number;
  checkSig: number;
};

/** <pubkey> OP_CHECKSIG, fields as read. */
export type PayToPubKeyScript = {
  length: number;
  pubKey: Uint8Array;
  checkSig: number;
};

export type OutputMatch =
  | { type: typeof SCRIPT_TYPE.PayToPubKeyHash; pubKeyHash: Uint8Array }
  | { type: typeof SCRIPT_TYPE.PayToPubKey; pubKey: Uint8Array };

/** DER-style signature wrapper up to and including S. */
export type SignatureHeader = {
  sigLength: number;
  sequenceMarker: number;
  rsLength: number;
  rMarker: number;
  rLength: number;
  r: Uint8Array;
  sMarker: number;
  sLength: number;
  s: Uint8Array;
};

export type SignatureHeaderMatch = {
  header: SignatureHeader;
  /** Bytes following the header; never empty. */
  tail: Uint8Array;
};

export type SignatureTail = {
  sighashType: number;
  pubKeyLength: number;
  pubKey: Uint8Array;
};
