import test from 'node:test';
import assert from 'node:assert/strict';

import { ByteReader, ByteWriter, DecodeError, bytesToHex } from '../index.js';

test('ByteReader: reads fixed, length-prefixed and little-endian fields in order', () => {
  const r = new ByteReader(
    Uint8Array.from([0x07, 0x02, 0xaa, 0xbb, 0x01, 0x00, 0x00, 0x80, 0xe8, 0x03, 0, 0, 0, 0, 0, 0])
  );

  assert.equal(r.readByte(), 0x07);
  assert.deepEqual(r.readVarBytes(), Uint8Array.from([0xaa, 0xbb]));
  assert.equal(r.readUInt32LE(), 0x80000001);
  assert.equal(r.readUInt64LE(), 1000n);
  assert.equal(r.remaining(), 0);
  r.assertConsumed();
});

test('ByteReader: short buffer throws DecodeError and names the field', () => {
  const r = new ByteReader(Uint8Array.from([0x05, 0x01, 0x02]));
  assert.throws(
    () => r.readVarBytes('pubkey'),
    (e: unknown) => e instanceof DecodeError && e.message === 'pubkey: need 5 byte(s) at offset 1, have 2'
  );
});

test('ByteReader: assertConsumed rejects trailing bytes', () => {
  const r = new ByteReader(Uint8Array.from([0x01, 0x02]));
  r.readByte();
  assert.throws(() => r.assertConsumed('script'), /script: 1 unconsumed trailing byte\(s\)/);
});

test('ByteReader: compact-size varints', () => {
  assert.equal(new ByteReader(Uint8Array.from([0xfc])).readVarInt(), 0xfc);
  assert.equal(new ByteReader(Uint8Array.from([0xfd, 0x34, 0x12])).readVarInt(), 0x1234);
  assert.equal(new ByteReader(Uint8Array.from([0xfe, 0x78, 0x56, 0x34, 0x12])).readVarInt(), 0x12345678);
  assert.throws(
    () => new ByteReader(Uint8Array.from([0xff, 0, 0, 0, 0, 0, 0, 0, 0x80])).readVarInt(),
    DecodeError
  );
});

test('ByteReader: rejects compact sizes longer than needed', () => {
  const cases: Array<[number[], string]> = [
    [[0xfd, 0x01, 0x00], 'varint: non-canonical compact size 1'],
    [[0xfd, 0xfc, 0x00], 'varint: non-canonical compact size 252'],
    [[0xfe, 0xff, 0xff, 0x00, 0x00], 'varint: non-canonical compact size 65535'],
    [[0xff, 0xff, 0xff, 0xff, 0xff, 0, 0, 0, 0], 'varint: non-canonical compact size 4294967295'],
  ];
  for (const [bytes, message] of cases) {
    assert.throws(
      () => new ByteReader(Uint8Array.from(bytes)).readVarInt(),
      (e: unknown) => e instanceof DecodeError && e.message === message
    );
  }
  assert.equal(new ByteReader(Uint8Array.from([0xfd, 0xfd, 0x00])).readVarInt(), 0xfd);
  assert.equal(new ByteReader(Uint8Array.from([0xfe, 0x00, 0x00, 0x01, 0x00])).readVarInt(), 0x10000);
});

test('ByteWriter: shortest compact sizes that ByteReader reads back', () => {
  assert.equal(bytesToHex(new ByteWriter().writeVarInt(0xfc).toBytes()), 'fc');
  assert.equal(bytesToHex(new ByteWriter().writeVarInt(0xfd).toBytes()), 'fdfd00');
  assert.equal(bytesToHex(new ByteWriter().writeVarInt(0x1234).toBytes()), 'fd3412');
  assert.equal(bytesToHex(new ByteWriter().writeVarInt(0x10000).toBytes()), 'fe00000100');
  assert.equal(bytesToHex(new ByteWriter().writeVarInt(0x100000000).toBytes()), 'ff0000000001000000');

  const bytes = new ByteWriter()
    .writeUInt32LE(7)
    .writeVarSlice(Uint8Array.of(0xaa, 0xbb))
    .writeUInt64LE(1000n)
    .toBytes();
  const r = new ByteReader(bytes);
  assert.equal(r.readUInt32LE(), 7);
  assert.deepEqual(r.readVarSlice(), Uint8Array.of(0xaa, 0xbb));
  assert.equal(r.readUInt64LE(), 1000n);
  r.assertConsumed();

  assert.throws(() => new ByteWriter().writeVarInt(-1), /non-negative integer/);
  assert.throws(() => new ByteWriter().writeByte(256), /not a byte/);
});

test('ByteReader: respects the byteOffset of a subarray view', () => {
  const backing = Uint8Array.from([0xff, 0xff, 0x01, 0x00, 0x00, 0x00]);
  const r = new ByteReader(backing.subarray(2));
  assert.equal(r.readUInt32LE(), 1);
});
