// packages/utils/src/errors.ts

export type WalletErrorKind =
  | 'DecodeError'
  | 'UnsupportedFormat'
  | 'NotOwned'
  | 'CoinNotFound'
  | 'BucketNotFound'
  | 'KeyNotFound';

/** Base class for every error the wallet packages classify and recover from. */
export class WalletError extends Error {
  readonly kind: WalletErrorKind;

  constructor(kind: WalletErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Malformed, short or over-long binary data. */
export class DecodeError extends WalletError {
  constructor(message: string) {
    super('DecodeError', message);
  }
}

/** Well-formed data in a variant this wallet deliberately does not handle. */
export class UnsupportedFormatError extends WalletError {
  constructor(message: string) {
    super('UnsupportedFormat', message);
  }
}
