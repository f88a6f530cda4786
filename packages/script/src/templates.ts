// packages/script/src/templates.ts
//
// Strict template decoders for the two output scripts and the one signature
// script this wallet understands. Structural decoding and opcode checks are
// separate steps: an output is assigned to a template by shape alone, then the
// fixed opcode bytes of that template are checked.

import { ByteReader, DecodeError, UnsupportedFormatError } from '@coinkeeper/utils';

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
import {
  SCRIPT_TYPE,
  type MatchResult,
  type OutputMatch,
  type PayToPubKeyHashScript,
  type PayToPubKeyScript,
  type SignatureHeaderMatch,
  type SignatureTail,
} from './types.js';

function attempt<T>(fn: () => T): MatchResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (e instanceof DecodeError || e instanceof UnsupportedFormatError) return { ok: false, error: e };
    throw e;
  }
}

function hex8(b: number): string {
  return `0x${b.toString(16).padStart(2, '0')}`;
}

/* ========================================================================== */
/* Output scripts                                                             */
/* ========================================================================== */

export function decodePayToPubKeyHash(script: Uint8Array): MatchResult<PayToPubKeyHashScript> {
  return attempt(() => {
    const r = new ByteReader(script);
    const decoded: PayToPubKeyHashScript = {
      dup: r.readByte('p2pkh dup'),
      hash160: r.readByte('p2pkh hash160'),
      hashLength: r.readByte('p2pkh hash length'),
      pubKeyHash: r.readBytes(20, 'p2pkh hash'),
      equalVerify: r.readByte('p2pkh equalverify'),
      checkSig: r.readByte('p2pkh checksig'),
    };
    r.assertConsumed('p2pkh script');
    return decoded;
  });
}

export function decodePayToPubKey(script: Uint8Array): MatchResult<PayToPubKeyScript> {
  return attempt(() => {
    const r = new ByteReader(script);
    const pubKey = r.readVarBytes('p2pk pubkey');
    const decoded: PayToPubKeyScript = {
      length: pubKey.length,
      pubKey,
      checkSig: r.readByte('p2pk checksig'),
    };
    r.assertConsumed('p2pk script');
    return decoded;
  });
}

/** Opcode check for a structurally decoded P2PKH script; yields the 20-byte hash. */
export function checkPayToPubKeyHash(s: PayToPubKeyHashScript): MatchResult<Uint8Array> {
  const expected: Array<[string, number, number]> = [
    ['dup', s.dup, OP_DUP],
    ['hash160', s.hash160, OP_HASH160],
    ['hash length', s.hashLength, HASH160_PUSH],
    ['equalverify', s.equalVerify, OP_EQUALVERIFY],
    ['checksig', s.checkSig, OP_CHECKSIG],
  ];
  for (const [label, got, want] of expected) {
    if (got !== want) {
      return {
        ok: false,
        error: new DecodeError(`unsupported p2pkh script: ${label} is ${hex8(got)}, expected ${hex8(want)}`),
      };
    }
  }
  return { ok: true, value: s.pubKeyHash };
}

/** Opcode check for a structurally decoded P2PK script; yields the pubkey bytes. */
export function checkPayToPubKey(s: PayToPubKeyScript): MatchResult<Uint8Array> {
  if (s.checkSig !== OP_CHECKSIG) {
    return {
      ok: false,
      error: new DecodeError(`unsupported p2pk script: checksig is ${hex8(s.checkSig)}, expected ${hex8(OP_CHECKSIG)}`),
    };
  }
  return { ok: true, value: s.pubKey };
}

/**
 * Assign an output script to a template (P2PKH first, then P2PK) and check its
 * opcodes. When neither template fits, the error carries both decode messages.
 */
export function matchOutputScript(script: Uint8Array): MatchResult<OutputMatch> {
  const p2pkh = decodePayToPubKeyHash(script);
  if (p2pkh.ok) {
    const hash = checkPayToPubKeyHash(p2pkh.value);
    if (!hash.ok) return hash;
    return { ok: true, value: { type: SCRIPT_TYPE.PayToPubKeyHash, pubKeyHash: hash.value } };
  }

  const p2pk = decodePayToPubKey(script);
  if (p2pk.ok) {
    const pubKey = checkPayToPubKey(p2pk.value);
    if (!pubKey.ok) return pubKey;
    return { ok: true, value: { type: SCRIPT_TYPE.PayToPubKey, pubKey: pubKey.value } };
  }

  return {
    ok: false,
    error: new DecodeError(
      `unrecognized output script (p2pkh: ${p2pkh.error.message}; p2pk: ${p2pk.error.message})`
    ),
  };
}

/* ========================================================================== */
/* Signature scripts                                                          */
/* ========================================================================== */

/**
 * Decode the DER wrapper of a signature script.
 *
 * A script that ends right after S (no sighash byte, no pubkey) is the older
 * form and yields UnsupportedFormatError rather than DecodeError.
 */
export function decodeSignatureHeader(script: Uint8Array): MatchResult<SignatureHeaderMatch> {
  return attempt(() => {
    const r = new ByteReader(script);

    const sigLength = r.readByte('sig length');
    const sequenceMarker = r.readByte('der sequence marker');
    const rsLength = r.readByte('der r/s length');
    const rMarker = r.readByte('der r marker');
    const rLength = r.readByte('der r length');
    const rValue = r.readBytes(rLength, 'der r');
    const sMarker = r.readByte('der s marker');
    const sLength = r.readByte('der s length');
    const sValue = r.readBytes(sLength, 'der s');

    if (!r.hasMore()) {
      throw new UnsupportedFormatError('old type of scriptsig (no sighash/pubkey), ignoring');
    }

    if (sequenceMarker !== DER_SEQUENCE || rMarker !== DER_INTEGER || sMarker !== DER_INTEGER) {
      throw new DecodeError(
        `unsupported scriptsig: markers ${hex8(sequenceMarker)}/${hex8(rMarker)}/${hex8(sMarker)}, ` +
          `expected ${hex8(DER_SEQUENCE)}/${hex8(DER_INTEGER)}/${hex8(DER_INTEGER)}`
      );
    }

    return {
      header: {
        sigLength,
        sequenceMarker,
        rsLength,
        rMarker,
        rLength,
        r: rValue,
        sMarker,
        sLength,
        s: sValue,
      },
      tail: r.readRest(),
    };
  });
}

export function decodeSignatureTail(tail: Uint8Array): MatchResult<SignatureTail> {
  return attempt(() => {
    const r = new ByteReader(tail);
    const sighashType = r.readByte('sighash type');
    const pubKey = r.readVarBytes('scriptsig pubkey');
    r.assertConsumed('scriptsig tail');
    return { sighashType, pubKeyLength: pubKey.length, pubKey };
  });
}

/** Sighash check for a decoded tail; yields the embedded pubkey bytes. */
export function checkSignatureTail(t: SignatureTail): MatchResult<Uint8Array> {
  if (t.sighashType !== SIGHASH_ALL) {
    return {
      ok: false,
      error: new DecodeError(`unsupported scriptsig: sighash type ${hex8(t.sighashType)}`),
    };
  }
  return { ok: true, value: t.pubKey };
}

/** Header, tail and sighash check in one step. */
export function matchSignatureScript(script: Uint8Array): MatchResult<Uint8Array> {
  const head = decodeSignatureHeader(script);
  if (!head.ok) return head;

  const tail = decodeSignatureTail(head.value.tail);
  if (!tail.ok) return tail;

  return checkSignatureTail(tail.value);
}
