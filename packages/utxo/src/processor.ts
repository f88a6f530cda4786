// packages/utxo/src/processor.ts
//
// Scan-and-absorb pass over one decoded transaction:
//   inputs  -> match scriptsig, find an owned pubkey, retire the spent coin
//   outputs -> match p2pkh/p2pk, find an owned pubkey, record a new coin
// Each input and output is handled on its own; a classified failure skips
// that item, is logged, and is reported in the returned outcome list.

import {
  SCRIPT_TYPE,
  checkSignatureTail,
  decodeSignatureHeader,
  decodeSignatureTail,
  matchOutputScript,
} from '@coinkeeper/script';
import type { OwnershipRegistry } from '@coinkeeper/keyring';
import {
  isCoinbaseInput,
  txHash as deriveTxHash,
  txidHex,
  type Tx,
  type TxInput,
  type TxOutput,
} from '@coinkeeper/tx';
import { WalletError, type WalletErrorKind } from '@coinkeeper/utils';

import { makeCoin, type Coin } from './coin.js';
import { NotOwnedError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { CoinRegistry } from './registry.js';

export type SkipReason = Extract<WalletErrorKind, 'DecodeError' | 'UnsupportedFormat' | 'NotOwned' | 'CoinNotFound'>;

export type Skipped = { index: number; status: 'skipped'; reason: SkipReason; message: string };

export type InputOutcome =
  | { index: number; status: 'coinbase' }
  | { index: number; status: 'spent'; coin: Coin }
  | Skipped;

export type OutputOutcome = { index: number; status: 'added'; coin: Coin } | Skipped;

export type TransactionReport = {
  txHash: Uint8Array;
  inputs: InputOutcome[];
  outputs: OutputOutcome[];
  added: Coin[];
  removed: Coin[];
};

export type ProcessorDeps<K> = {
  registry: CoinRegistry;
  keys: OwnershipRegistry<K>;
  logger?: Logger;
};

const SKIP_REASONS: ReadonlySet<WalletErrorKind> = new Set<SkipReason>([
  'DecodeError',
  'UnsupportedFormat',
  'NotOwned',
  'CoinNotFound',
]);

function isSkipReason(kind: WalletErrorKind): kind is SkipReason {
  return SKIP_REASONS.has(kind);
}

/** Run one item step; classified wallet errors become a Skipped outcome, anything else propagates. */
function guard<T extends { index: number }>(index: number, step: () => T): T | Skipped {
  try {
    return step();
  } catch (e) {
    if (e instanceof WalletError && isSkipReason(e.kind)) {
      return { index, status: 'skipped', reason: e.kind, message: e.message };
    }
    throw e;
  }
}

function ownedKey<K>(keys: OwnershipRegistry<K>, pubKeyBytes: Uint8Array): K {
  const key = keys.parsePublicKey(pubKeyBytes);
  if (!keys.isOwned(key)) throw new NotOwnedError(`not concerned address ${keys.address(key)}`);
  return key;
}

function spendInput<K>(
  input: TxInput,
  index: number,
  deps: ProcessorDeps<K>
): { index: number; status: 'spent'; coin: Coin } {
  const head = decodeSignatureHeader(input.script);
  if (!head.ok) throw head.error;

  const tail = decodeSignatureTail(head.value.tail);
  if (!tail.ok) throw tail.error;

  const pubKey = checkSignatureTail(tail.value);
  if (!pubKey.ok) throw pubKey.error;

  const key = ownedKey(deps.keys, pubKey.value);
  const coin = deps.registry.remove(deps.keys.serialize(key), input.hash, input.index);
  return { index, status: 'spent', coin };
}

function absorbOutput<K>(
  output: TxOutput,
  index: number,
  hash: Uint8Array,
  deps: ProcessorDeps<K>
): { index: number; status: 'added'; coin: Coin } {
  const log = deps.logger ?? silentLogger;

  const m = matchOutputScript(output.script);
  if (!m.ok) throw m.error;

  let key: K;
  if (m.value.type === SCRIPT_TYPE.PayToPubKeyHash) {
    log.debug(`output ${index}: pubkeyhash script`);
    const found = deps.keys.lookupHash(m.value.pubKeyHash);
    if (found === undefined) throw new NotOwnedError('not concerned address (pubkey hash not in wallet)');
    key = found;
  } else {
    log.debug(`output ${index}: pubkey script`);
    key = ownedKey(deps.keys, m.value.pubKey);
  }

  const address = deps.keys.serialize(key);
  const coin = makeCoin({ address, txHash: hash, index, value: output.value, type: m.value.type });
  deps.registry.add(address, coin);
  return { index, status: 'added', coin };
}

/**
 * Absorb one transaction into the registry. Never throws for per-item
 * decode, ownership or missing-coin failures; those are returned as
 * `skipped` outcomes and logged as warnings. Coinbase inputs are skipped
 * without a log line.
 */
export function processTransaction<K>(tx: Tx, deps: ProcessorDeps<K>): TransactionReport {
  const log = deps.logger ?? silentLogger;
  const hash = deriveTxHash(tx);
  const txid = txidHex(hash);

  const report: TransactionReport = { txHash: hash, inputs: [], outputs: [], added: [], removed: [] };

  tx.inputs.forEach((input, i) => {
    if (isCoinbaseInput(input)) {
      report.inputs.push({ index: i, status: 'coinbase' });
      return;
    }
    const outcome = guard(i, () => spendInput(input, i, deps));
    if (outcome.status === 'skipped') log.warn(`tx ${txid} input ${i}: ${outcome.message}`);
    else report.removed.push(outcome.coin);
    report.inputs.push(outcome);
  });

  tx.outputs.forEach((output, i) => {
    const outcome = guard(i, () => absorbOutput(output, i, hash, deps));
    if (outcome.status === 'skipped') log.warn(`tx ${txid} output ${i}: ${outcome.message}`);
    else report.added.push(outcome.coin);
    report.outputs.push(outcome);
  });

  return report;
}
