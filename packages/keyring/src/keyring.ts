// packages/keyring/src/keyring.ts
import { base58checkEncode, bytesToHex, hash160 } from '@coinkeeper/utils';

import { PublicKey } from './pubkey.js';
import type { KeyRingOptions, OwnershipRegistry } from './types.js';

export const DEFAULT_ADDRESS_VERSION = 0x00;

/**
 * In-memory set of wallet public keys.
 *
 * The hash160 index is maintained by the same add/remove calls as the key
 * set, under both the compressed and the uncompressed encoding, so a
 * P2PKH output paying either form resolves to the same key.
 */
export class KeyRing implements OwnershipRegistry<PublicKey> {
  readonly addressVersion: number;

  private readonly keys = new Map<string, PublicKey>();
  private readonly byHash = new Map<string, PublicKey>();

  constructor(opts: KeyRingOptions = {}) {
    const v = opts.addressVersion ?? DEFAULT_ADDRESS_VERSION;
    if (!Number.isInteger(v) || v < 0 || v > 0xff) {
      throw new Error(`addressVersion must be a byte (got ${String(opts.addressVersion)})`);
    }
    this.addressVersion = v;
  }

  add(key: PublicKey): void {
    this.keys.set(key.toHex(), key);
    this.byHash.set(bytesToHex(hash160(key.compressed)), key);
    this.byHash.set(bytesToHex(hash160(key.uncompressed)), key);
  }

  addHex(hex: string): PublicKey {
    const key = PublicKey.fromHex(hex);
    this.add(key);
    return key;
  }

  remove(key: PublicKey): boolean {
    if (!this.keys.delete(key.toHex())) return false;
    this.byHash.delete(bytesToHex(hash160(key.compressed)));
    this.byHash.delete(bytesToHex(hash160(key.uncompressed)));
    return true;
  }

  list(): PublicKey[] {
    return [...this.keys.values()];
  }

  get size(): number {
    return this.keys.size;
  }

  parsePublicKey(bytes: Uint8Array): PublicKey {
    return PublicKey.fromBytes(bytes);
  }

  serialize(key: PublicKey): Uint8Array {
    return key.compressed;
  }

  address(key: PublicKey): string {
    return base58checkEncode(this.addressVersion, hash160(key.compressed));
  }

  isOwned(key: PublicKey): boolean {
    return this.keys.has(key.toHex());
  }

  lookupHash(hash: Uint8Array): PublicKey | undefined {
    if (hash.length !== 20) return undefined;
    return this.byHash.get(bytesToHex(hash));
  }
}
