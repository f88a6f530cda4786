// packages/store/src/coins.ts
import { SCRIPT_TYPE, type ScriptType } from '@coinkeeper/script';
import { bytesToHex, hexToBytes } from '@coinkeeper/utils';
import { makeCoin, type Coin, type CoinRegistry, type TransactionReport } from '@coinkeeper/utxo';

import { asJson, toKey } from './codec.js';
import type { KvStore, KvTx } from './kvstore.js';

export const COIN_BUCKET = 'coin';

/** Stored form of a coin; value is a decimal string so it survives JSON. */
export type CoinRecord = {
  address: string;
  txHash: string;
  index: number;
  value: string;
  type: ScriptType;
};

export function coinKey(address: Uint8Array, txHash: Uint8Array, index: number): Uint8Array {
  return toKey(bytesToHex(address), txHash, index);
}

export function toCoinRecord(c: Coin): CoinRecord {
  return {
    address: bytesToHex(c.address),
    txHash: bytesToHex(c.txHash),
    index: c.index,
    value: c.value.toString(),
    type: c.type,
  };
}

function isScriptType(v: unknown): v is ScriptType {
  return v === SCRIPT_TYPE.PayToPubKeyHash || v === SCRIPT_TYPE.PayToPubKey;
}

export function fromCoinRecord(v: unknown): Coin {
  if (typeof v !== 'object' || v === null) throw new Error('coin record is not an object');
  const r: Partial<Record<keyof CoinRecord, unknown>> = { ...v };
  if (typeof r.address !== 'string' || typeof r.txHash !== 'string') throw new Error('coin record: bad hex fields');
  if (typeof r.index !== 'number' || typeof r.value !== 'string' || !/^\d+$/.test(r.value)) {
    throw new Error('coin record: bad index/value');
  }
  if (!isScriptType(r.type)) throw new Error(`coin record: unknown type ${String(r.type)}`);
  return makeCoin({
    address: hexToBytes(r.address),
    txHash: hexToBytes(r.txHash),
    index: r.index,
    value: BigInt(r.value),
    type: r.type,
  });
}

/** Keeps the `coin` bucket in step with processor reports. */
export class CoinMirror {
  constructor(private readonly store: KvStore) {}

  /** Persist one report: removed coins are deleted, added coins written. */
  apply(report: Pick<TransactionReport, 'added' | 'removed'>): Promise<void> {
    return this.store.update((tx) => {
      for (const c of report.removed) {
        const key = coinKey(c.address, c.txHash, c.index);
        if (tx.has(COIN_BUCKET, key)) tx.del(COIN_BUCKET, key);
      }
      for (const c of report.added) {
        tx.put(COIN_BUCKET, coinKey(c.address, c.txHash, c.index), toCoinRecord(c));
      }
    });
  }

  list(): Coin[] {
    return this.store.view((tx) => readCoins(tx));
  }

  /** Load every persisted coin into `registry`; returns how many. */
  restore(registry: CoinRegistry): number {
    const coins = this.list();
    for (const c of coins) registry.add(c.address, c);
    return coins.length;
  }
}

function readCoins(tx: KvTx): Coin[] {
  if (!tx.hasBucket(COIN_BUCKET)) return [];
  return tx.entries(COIN_BUCKET).map(([, v]) => fromCoinRecord(asJson(v)));
}
