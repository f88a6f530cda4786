// packages/store/src/errors.ts
import { WalletError } from '@coinkeeper/utils';

export class BucketNotFoundError extends WalletError {
  readonly bucket: string;

  constructor(bucket: string) {
    super('BucketNotFound', `bucket not found ${bucket}`);
    this.bucket = bucket;
  }
}

export class KeyNotFoundError extends WalletError {
  constructor(bucket: string) {
    super('KeyNotFound', `key not found in bucket ${bucket}`);
  }
}
