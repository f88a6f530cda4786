// packages/utxo/src/errors.ts
import { WalletError } from '@coinkeeper/utils';

import { outpointKey } from './coin.js';

/** The derived key or hash is not tracked by the wallet. */
export class NotOwnedError extends WalletError {
  constructor(message: string) {
    super('NotOwned', message);
  }
}

/** Removal requested for an outpoint the registry does not hold. */
export class CoinNotFoundError extends WalletError {
  readonly txHash: Uint8Array;
  readonly index: number;

  constructor(txHash: Uint8Array, index: number) {
    super('CoinNotFound', `coin was not found: ${outpointKey(txHash, index)}`);
    this.txHash = txHash;
    this.index = index;
  }
}
