// packages/utxo/src/registry.ts
import { bytesToHex, hexToBytes } from '@coinkeeper/utils';

import { compareByValue, copyCoin, isOutpoint, type Coin } from './coin.js';
import { CoinNotFoundError } from './errors.js';
import { ExclusiveLock } from './lock.js';

/**
 * Owned coins keyed by owning address (serialized pubkey).
 *
 * One lock guards every address's list, reads included. Removal swaps the
 * last coin into the hole, so list order is not stable across removals.
 */
export class CoinRegistry {
  private readonly byAddress = new Map<string, Coin[]>();
  private readonly lock = new ExclusiveLock('coin registry');

  /**
   * Append a coin to the address's list. A coin already held for the same
   * outpoint is replaced in place, so an address never lists an outpoint twice.
   * The registry keeps its own copy of the coin's byte fields.
   */
  add(address: Uint8Array, coin: Coin): void {
    this.lock.run(() => {
      const key = bytesToHex(address);
      const list = this.byAddress.get(key) ?? [];
      const held = copyCoin(coin);
      const i = list.findIndex((c) => isOutpoint(c, coin.txHash, coin.index));
      if (i >= 0) list[i] = held;
      else list.push(held);
      this.byAddress.set(key, list);
    });
  }

  /** Remove and return the coin at (hash, index); throws CoinNotFoundError if absent. */
  remove(address: Uint8Array, hash: Uint8Array, index: number): Coin {
    return this.lock.run(() => {
      const list = this.byAddress.get(bytesToHex(address)) ?? [];
      for (let i = 0; i < list.length; i++) {
        const coin = list[i];
        if (!isOutpoint(coin, hash, index)) continue;
        list[i] = list[list.length - 1];
        list.pop();
        return copyCoin(coin);
      }
      throw new CoinNotFoundError(hash, index);
    });
  }

  /** Copies of the address's coins, in registry order. */
  coins(address: Uint8Array): Coin[] {
    return this.lock.run(() => (this.byAddress.get(bytesToHex(address)) ?? []).map(copyCoin));
  }

  coinsByValue(address: Uint8Array): Coin[] {
    return this.coins(address).sort(compareByValue);
  }

  count(address: Uint8Array): number {
    return this.lock.run(() => this.byAddress.get(bytesToHex(address))?.length ?? 0);
  }

  balance(address: Uint8Array): bigint {
    let total = 0n;
    for (const c of this.coins(address)) total += c.value;
    return total;
  }

  /** Every address that has held a coin, including ones now empty. */
  addresses(): Uint8Array[] {
    return this.lock.run(() => [...this.byAddress.keys()].map((k) => hexToBytes(k)));
  }

  /** Every coin across all addresses. */
  snapshot(): Coin[] {
    return this.lock.run(() => [...this.byAddress.values()].flat().map(copyCoin));
  }

  get size(): number {
    return this.lock.run(() => {
      let n = 0;
      for (const list of this.byAddress.values()) n += list.length;
      return n;
    });
  }
}
