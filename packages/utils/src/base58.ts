// packages/utils/src/base58.ts
// Base58 / base58check, used for display addresses.

import { arraysEqual, bigIntToBytes, bytesToBigInt, concat } from './bytes.js';
import { sha256d } from './hash.js';

export const alphabet = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';

export function base58encode(data: Uint8Array): string {
  let num = bytesToBigInt(data);
  let result = '';
  while (num > 0n) {
    const rem = Number(num % 58n);
    num = num / 58n;
    result = alphabet[rem] + result;
  }
  let zeroCount = 0;
  while (zeroCount < data.length && data[zeroCount] === 0) zeroCount++;
  return '1'.repeat(zeroCount) + result;
}

export function base58decode(str: string): Uint8Array {
  let num = 0n;
  for (const char of str) {
    const idx = alphabet.indexOf(char);
    if (idx === -1) throw new Error(`Invalid base58 character "${char}"`);
    num = num * 58n + BigInt(idx);
  }

  let zeroCount = 0;
  while (zeroCount < str.length && str[zeroCount] === '1') zeroCount++;

  if (num === 0n) return new Uint8Array(zeroCount);

  let byteLen = 0;
  for (let n = num; n > 0n; n >>= 8n) byteLen++;

  return concat(new Uint8Array(zeroCount), bigIntToBytes(num, byteLen));
}

export function base58checkEncode(version: number, payload: Uint8Array): string {
  const data = concat(new Uint8Array([version]), payload);
  const checksum = sha256d(data).slice(0, 4);
  return base58encode(concat(data, checksum));
}

export function base58checkDecode(str: string): { version: number; payload: Uint8Array } {
  const bytes = base58decode(str);
  if (bytes.length < 5) throw new Error('base58check: too short');

  const data = bytes.slice(0, -4);
  const checksum = bytes.slice(-4);
  if (!arraysEqual(checksum, sha256d(data).slice(0, 4))) throw new Error('Checksum mismatch');

  return { version: data[0], payload: data.slice(1) };
}
