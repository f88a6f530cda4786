// packages/keyring/src/pubkey.ts
import { secp256k1 } from '@noble/curves/secp256k1.js';
import { DecodeError, bytesToHex, hexToBytes } from '@coinkeeper/utils';

type Point = ReturnType<typeof secp256k1.Point.fromBytes>;

/** A secp256k1 public key, kept in both SEC1 encodings. */
export class PublicKey {
  readonly compressed: Uint8Array;
  readonly uncompressed: Uint8Array;

  private constructor(point: Point) {
    this.compressed = point.toBytes(true);
    this.uncompressed = point.toBytes(false);
  }

  static fromBytes(bytes: Uint8Array): PublicKey {
    if (bytes.length !== 33 && bytes.length !== 65) {
      throw new DecodeError(`invalid pubkey length ${bytes.length}`);
    }
    let point: Point;
    try {
      point = secp256k1.Point.fromBytes(bytes);
    } catch (e) {
      throw new DecodeError(`invalid pubkey: ${e instanceof Error ? e.message : String(e)}`);
    }
    return new PublicKey(point);
  }

  static fromHex(hex: string): PublicKey {
    let bytes: Uint8Array;
    try {
      bytes = hexToBytes(hex);
    } catch (e) {
      throw new DecodeError(`invalid pubkey hex: ${e instanceof Error ? e.message : String(e)}`);
    }
    return PublicKey.fromBytes(bytes);
  }

  /** Derive from a 32-byte private key. */
  static fromPrivateKey(priv: Uint8Array): PublicKey {
    return PublicKey.fromBytes(secp256k1.getPublicKey(priv, true));
  }

  toHex(): string {
    return bytesToHex(this.compressed);
  }

  equals(other: PublicKey): boolean {
    return this.toHex() === other.toHex();
  }
}
