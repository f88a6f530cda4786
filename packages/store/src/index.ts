// packages/store/src/index.ts
export { toBytes, toKey, asString, asInt, asUInt64, asJson } from './codec.js';
export { KvStore, KvTx, type KvStoreFile, type KvStoreOptions } from './kvstore.js';
export { BucketNotFoundError, KeyNotFoundError } from './errors.js';
export {
  CoinMirror,
  COIN_BUCKET,
  coinKey,
  toCoinRecord,
  fromCoinRecord,
  type CoinRecord,
} from './coins.js';
