// packages/tx/src/types.ts

export type TxInput = {
  /** Previous output's transaction hash, internal byte order. */
  hash: Uint8Array;
  index: number;
  script: Uint8Array;
  sequence: number;
};

export type TxOutput = {
  value: bigint;
  script: Uint8Array;
};

export type Tx = {
  version: number;
  inputs: TxInput[];
  outputs: TxOutput[];
  locktime: number;
};
