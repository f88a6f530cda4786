// packages/utils/src/reader.ts
/**
 * ByteReader - positional cursor over untrusted binary data.
 *
 * Every read checks the remaining length first and throws DecodeError
 * instead of returning a short slice.
 */

import { DecodeError } from './errors.js';

export class ByteReader {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  remaining(): number {
    return this.bytes.length - this.offset;
  }

  hasMore(): boolean {
    return this.offset < this.bytes.length;
  }

  readByte(label = 'byte'): number {
    this.need(1, label);
    const value = this.bytes[this.offset];
    this.offset += 1;
    return value;
  }

  /** Read exactly `size` bytes. */
  readBytes(size: number, label = 'bytes'): Uint8Array {
    if (!Number.isInteger(size) || size < 0) {
      throw new DecodeError(`${label}: invalid length ${size}`);
    }
    this.need(size, label);
    const slice = this.bytes.slice(this.offset, this.offset + size);
    this.offset += size;
    return slice;
  }

  /** Read a single length byte, then that many bytes. */
  readVarBytes(label = 'var bytes'): Uint8Array {
    const length = this.readByte(`${label} length`);
    return this.readBytes(length, label);
  }

  readUInt32LE(label = 'uint32'): number {
    this.need(4, label);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readUInt64LE(label = 'uint64'): bigint {
    this.need(8, label);
    const value = this.view.getBigUint64(this.offset, true);
    this.offset += 8;
    return value;
  }

  /** Compact-size integer (0xfd / 0xfe / 0xff prefixes); only the shortest encoding is accepted. */
  readVarInt(label = 'varint'): number {
    const first = this.readByte(label);
    if (first < 0xfd) return first;

    if (first === 0xfd) {
      this.need(2, label);
      const value = this.view.getUint16(this.offset, true);
      this.offset += 2;
      if (value < 0xfd) throw new DecodeError(`${label}: non-canonical compact size ${value}`);
      return value;
    }

    if (first === 0xfe) {
      const value = this.readUInt32LE(label);
      if (value <= 0xffff) throw new DecodeError(`${label}: non-canonical compact size ${value}`);
      return value;
    }

    const big = this.readUInt64LE(label);
    if (big <= 0xffffffffn) throw new DecodeError(`${label}: non-canonical compact size ${big}`);
    if (big > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new DecodeError(`${label}: exceeds safe integer range`);
    }
    return Number(big);
  }

  /** Compact-size length, then that many bytes. */
  readVarSlice(label = 'var slice'): Uint8Array {
    const length = this.readVarInt(`${label} length`);
    return this.readBytes(length, label);
  }

  /** Everything not yet consumed. Leaves the cursor at the end. */
  readRest(): Uint8Array {
    return this.readBytes(this.remaining(), 'rest');
  }

  assertConsumed(label = 'buffer'): void {
    if (this.hasMore()) {
      throw new DecodeError(`${label}: ${this.remaining()} unconsumed trailing byte(s)`);
    }
  }

  private need(size: number, label: string): void {
    if (this.offset + size > this.bytes.length) {
      throw new DecodeError(
        `${label}: need ${size} byte(s) at offset ${this.offset}, have ${this.remaining()}`
      );
    }
  }
}
