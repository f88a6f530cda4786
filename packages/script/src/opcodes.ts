// packages/script/src/opcodes.ts

export const OP_DUP = 0x76;
export const OP_HASH160 = 0xa9;
export const OP_EQUALVERIFY = 0x88;
export const OP_CHECKSIG = 0xac;

/** Push length of a 20-byte hash160. */
export const HASH160_PUSH = 0x14;

/** DER SEQUENCE and INTEGER tags of the signature wrapper. */
export const DER_SEQUENCE = 0x30;
export const DER_INTEGER = 0x02;

/** The only sighash type accepted on a signature script. */
export const SIGHASH_ALL = 0x01;
