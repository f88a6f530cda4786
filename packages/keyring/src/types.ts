// packages/keyring/src/types.ts

/**
 * What the transaction processor needs to know about wallet keys.
 * `K` is the implementation's public key value.
 */
export interface OwnershipRegistry<K> {
  /** Parse raw SEC1 bytes; throws DecodeError when they are not a curve point. */
  parsePublicKey(bytes: Uint8Array): K;
  /** Canonical bytes used as the coin's owning address. */
  serialize(key: K): Uint8Array;
  /** Human-readable address for diagnostics. */
  address(key: K): string;
  isOwned(key: K): boolean;
  /** Reverse lookup of a 20-byte hash160 to an owned key. */
  lookupHash(hash: Uint8Array): K | undefined;
}

export type KeyRingOptions = {
  /** base58check version byte of display addresses (default 0x00). */
  addressVersion?: number;
};
