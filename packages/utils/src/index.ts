// packages/utils/src/index.ts
export {
  bytesToBigInt,
  bigIntToBytes,
  hexToBytes,
  bytesToHex,
  concat,
  arraysEqual,
  isAllZero,
  reverseBytes,
  uint32le,
  uint64le,
} from './bytes.js';

export { hash160, sha256d } from './hash.js';
export { base58encode, base58decode, base58checkEncode, base58checkDecode } from './base58.js';
export { ByteReader } from './reader.js';
export { ByteWriter } from './writer.js';
export {
  WalletError,
  DecodeError,
  UnsupportedFormatError,
  type WalletErrorKind,
} from './errors.js';
