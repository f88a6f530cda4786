// packages/utils/src/hash.ts
import { sha256 } from '@noble/hashes/sha2.js';
import { ripemd160 } from '@noble/hashes/legacy.js';

/** hash160(x) = RIPEMD160(SHA256(x)) */
export function hash160(x: Uint8Array): Uint8Array {
  return ripemd160(sha256(x));
}

/** Double SHA-256, the transaction and checksum hash. */
export function sha256d(x: Uint8Array): Uint8Array {
  return sha256(sha256(x));
}
