// packages/utils/src/writer.ts
/**
 * ByteWriter - append-only counterpart of ByteReader. Compact sizes are
 * always written in their shortest form, the only form readVarInt accepts.
 */

import { concat, uint32le, uint64le } from './bytes.js';

export class ByteWriter {
  private readonly parts: Uint8Array[] = [];

  writeByte(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new Error(`writeByte: ${value} is not a byte`);
    }
    this.parts.push(Uint8Array.of(value));
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    this.parts.push(bytes.slice());
    return this;
  }

  writeUInt32LE(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new Error(`writeUInt32LE: ${value} out of range`);
    }
    this.parts.push(uint32le(value));
    return this;
  }

  writeUInt64LE(value: bigint): this {
    if (value < 0n || value > 0xffffffffffffffffn) throw new Error(`writeUInt64LE: ${value} out of range`);
    this.parts.push(uint64le(value));
    return this;
  }

  writeVarInt(value: number): this {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new Error(`writeVarInt: ${value} must be a non-negative integer`);
    }
    if (value < 0xfd) return this.writeByte(value);
    if (value <= 0xffff) return this.writeByte(0xfd).writeByte(value & 0xff).writeByte(value >>> 8);
    if (value <= 0xffffffff) return this.writeByte(0xfe).writeUInt32LE(value);
    return this.writeByte(0xff).writeUInt64LE(BigInt(value));
  }

  /** Compact-size length, then the bytes. */
  writeVarSlice(bytes: Uint8Array): this {
    return this.writeVarInt(bytes.length).writeBytes(bytes);
  }

  toBytes(): Uint8Array {
    return concat(this.parts);
  }
}
