import test from 'node:test';
import assert from 'node:assert/strict';
import { setImmediate as tick } from 'node:timers/promises';

import { KeyRing, PublicKey } from '@coinkeeper/keyring';
import { SCRIPT_TYPE, getP2PKHScript, getP2PKScript, getSignatureScript } from '@coinkeeper/script';
import { COINBASE_INDEX, txHash, txidHex, type Tx, type TxInput, type TxOutput } from '@coinkeeper/tx';
import { arraysEqual, bytesToHex, hash160 } from '@coinkeeper/utils';

import { CoinRegistry, processTransaction, type Logger } from '../index.js';

function b32(x: number): Uint8Array {
  return new Uint8Array(32).fill(x & 0xff);
}

const alice = PublicKey.fromPrivateKey(b32(1));
const bob = PublicKey.fromPrivateKey(b32(2));

function captureLogger(): { lines: string[]; logger: Logger } {
  const lines: string[] = [];
  return {
    lines,
    logger: {
      debug: () => {},
      info: (...args) => lines.push(args.join(' ')),
      warn: (...args) => lines.push(args.join(' ')),
    },
  };
}

function setup() {
  const keys = new KeyRing();
  keys.add(alice);
  const registry = new CoinRegistry();
  const cap = captureLogger();
  return { keys, registry, cap, deps: { keys, registry, logger: cap.logger } };
}

function coinbaseInput(): TxInput {
  return { hash: new Uint8Array(32), index: COINBASE_INDEX, script: Uint8Array.of(0x51), sequence: 0xffffffff };
}

function spendInput(hash: Uint8Array, index: number, pubKey: Uint8Array): TxInput {
  const script = getSignatureScript({ r: new Uint8Array(32).fill(0x11), s: new Uint8Array(32).fill(0x22), pubKey });
  return { hash, index, script, sequence: 0xffffffff };
}

function p2pkh(value: bigint, key: PublicKey): TxOutput {
  return { value, script: getP2PKHScript(hash160(key.compressed)) };
}

function makeTx(inputs: TxInput[], outputs: TxOutput[], locktime = 0): Tx {
  return { version: 1, inputs, outputs, locktime };
}

test('owned P2PKH output becomes one coin of type 0', () => {
  const { registry, cap, deps } = setup();
  const tx = makeTx([coinbaseInput()], [p2pkh(5000n, alice)]);

  const report = processTransaction(tx, deps);

  const coins = registry.coins(alice.compressed);
  assert.equal(coins.length, 1);
  assert.equal(coins[0].value, 5000n);
  assert.equal(coins[0].type, SCRIPT_TYPE.PayToPubKeyHash);
  assert.equal(coins[0].index, 0);
  assert.ok(arraysEqual(coins[0].txHash, txHash(tx)));
  assert.ok(arraysEqual(coins[0].address, alice.compressed));

  assert.deepEqual(report.inputs, [{ index: 0, status: 'coinbase' }]);
  assert.equal(report.outputs[0].status, 'added');
  assert.equal(report.added.length, 1);
  assert.deepEqual(cap.lines, []);
});

test('P2PKH to the uncompressed key hash resolves to the same owner', () => {
  const { registry, deps } = setup();
  const tx = makeTx([coinbaseInput()], [{ value: 9n, script: getP2PKHScript(hash160(alice.uncompressed)) }]);

  processTransaction(tx, deps);
  assert.equal(registry.count(alice.compressed), 1);
});

test('owned P2PK output becomes one coin of type 1, keyed by the compressed key', () => {
  const { registry, deps } = setup();
  const tx = makeTx([coinbaseInput()], [{ value: 77n, script: getP2PKScript(alice.uncompressed) }]);

  processTransaction(tx, deps);

  const coins = registry.coins(alice.compressed);
  assert.equal(coins.length, 1);
  assert.equal(coins[0].type, SCRIPT_TYPE.PayToPubKey);
  assert.equal(coins[0].value, 77n);
});

test('outputs to keys not in the wallet are skipped as NotOwned', () => {
  const { registry, cap, deps } = setup();
  const tx = makeTx([coinbaseInput()], [p2pkh(1n, bob), { value: 2n, script: getP2PKScript(bob.compressed) }]);

  const report = processTransaction(tx, deps);

  assert.equal(registry.size, 0);
  const reasons = report.outputs.map((o) => (o.status === 'skipped' ? o.reason : o.status));
  assert.deepEqual(reasons, ['NotOwned', 'NotOwned']);
  assert.equal(cap.lines.length, 2);
  assert.equal(
    cap.lines[0],
    `tx ${txidHex(report.txHash)} output 0: not concerned address (pubkey hash not in wallet)`
  );
  assert.ok(cap.lines[1].startsWith(`tx ${txidHex(report.txHash)} output 1: not concerned address 1`));
});

test('unrecognized output script is skipped as DecodeError and later outputs still count', () => {
  const { registry, deps } = setup();
  const tx = makeTx([coinbaseInput()], [{ value: 3n, script: Uint8Array.of(0x6a, 0x01, 0x00) }, p2pkh(4n, alice)]);

  const report = processTransaction(tx, deps);

  const first = report.outputs[0];
  assert.equal(first.status, 'skipped');
  if (first.status === 'skipped') {
    assert.equal(first.reason, 'DecodeError');
    assert.ok(first.message.startsWith('unrecognized output script (p2pkh: '));
  }
  assert.equal(registry.balance(alice.compressed), 4n);
  assert.equal(registry.coins(alice.compressed)[0].index, 1);
});

test('P2PKH-shaped output with a wrong opcode is rejected without falling back to P2PK', () => {
  const { registry, deps } = setup();
  const script = getP2PKHScript(hash160(alice.compressed));
  script[24] = 0xad;
  const report = processTransaction(makeTx([coinbaseInput()], [{ value: 1n, script }]), deps);

  const out = report.outputs[0];
  assert.ok(out.status === 'skipped' && out.message === 'unsupported p2pkh script: checksig is 0xad, expected 0xac');
  assert.equal(registry.size, 0);
});

test('spending an owned coin removes it from the registry', () => {
  const { registry, deps } = setup();
  const fund = makeTx([coinbaseInput()], [p2pkh(10n, alice), p2pkh(20n, alice)]);
  const fundHash = processTransaction(fund, deps).txHash;
  assert.equal(registry.count(alice.compressed), 2);

  const spend = makeTx([spendInput(fundHash, 0, alice.compressed)], [p2pkh(8n, bob)]);
  const report = processTransaction(spend, deps);

  assert.equal(report.inputs[0].status, 'spent');
  assert.equal(report.removed.length, 1);
  assert.equal(report.removed[0].value, 10n);
  assert.equal(registry.count(alice.compressed), 1);
  assert.equal(registry.balance(alice.compressed), 20n);
});

test('spending with the uncompressed key form finds the same coin', () => {
  const { registry, deps } = setup();
  const fundHash = processTransaction(makeTx([coinbaseInput()], [p2pkh(10n, alice)]), deps).txHash;

  processTransaction(makeTx([spendInput(fundHash, 0, alice.uncompressed)], []), deps);
  assert.equal(registry.count(alice.compressed), 0);
});

test('spend of an unknown outpoint is skipped as CoinNotFound and leaves the registry unchanged', () => {
  const { registry, cap, deps } = setup();
  processTransaction(makeTx([coinbaseInput()], [p2pkh(10n, alice)]), deps);

  const report = processTransaction(makeTx([spendInput(b32(0x42), 3, alice.compressed)], []), deps);

  const inp = report.inputs[0];
  assert.ok(inp.status === 'skipped' && inp.reason === 'CoinNotFound');
  assert.equal(registry.count(alice.compressed), 1);
  assert.equal(
    cap.lines[0],
    `tx ${txidHex(report.txHash)} input 0: coin was not found: ${'42'.repeat(32)}:3`
  );
});

test('input signed by a key not in the wallet is skipped as NotOwned', () => {
  const { deps } = setup();
  const report = processTransaction(makeTx([spendInput(b32(1), 0, bob.compressed)], []), deps);
  const inp = report.inputs[0];
  assert.ok(inp.status === 'skipped' && inp.reason === 'NotOwned');
});

test('input carrying bytes that are not a curve point is skipped as DecodeError', () => {
  const { deps } = setup();
  const junk = new Uint8Array(33).fill(0x11);
  junk[0] = 0x05;
  const report = processTransaction(makeTx([spendInput(b32(1), 0, junk)], []), deps);
  const inp = report.inputs[0];
  assert.ok(inp.status === 'skipped' && inp.reason === 'DecodeError');
});

test('header-only scriptsig is skipped as UnsupportedFormat and processing continues', () => {
  const { registry, cap, deps } = setup();
  const full = getSignatureScript({ r: b32(0x11), s: b32(0x22), pubKey: alice.compressed });
  // length byte + DER body, no sighash and no pubkey
  const headerOnly = full.slice(0, 1 + 2 + 2 + 32 + 2 + 32);
  const tx = makeTx(
    [
      { hash: b32(7), index: 0, script: headerOnly, sequence: 0 },
      spendInput(b32(8), 0, alice.compressed),
    ],
    [p2pkh(6n, alice)]
  );

  const report = processTransaction(tx, deps);

  const first = report.inputs[0];
  assert.ok(first.status === 'skipped' && first.reason === 'UnsupportedFormat');
  const second = report.inputs[1];
  assert.ok(second.status === 'skipped' && second.reason === 'CoinNotFound');
  assert.equal(registry.balance(alice.compressed), 6n);
  assert.equal(
    cap.lines[0],
    `tx ${txidHex(report.txHash)} input 0: old type of scriptsig (no sighash/pubkey), ignoring`
  );
});

test('scriptsig with a sighash other than ALL is skipped as DecodeError', () => {
  const { deps } = setup();
  const script = getSignatureScript({ r: b32(0x11), s: b32(0x22), pubKey: alice.compressed, sighashType: 0x41 });
  const report = processTransaction(makeTx([{ hash: b32(1), index: 0, script, sequence: 0 }], []), deps);
  const inp = report.inputs[0];
  assert.ok(inp.status === 'skipped' && inp.message === 'unsupported scriptsig: sighash type 0x41');
});

test('coinbase inputs produce no diagnostic', () => {
  const { cap, deps } = setup();
  const report = processTransaction(makeTx([coinbaseInput()], []), deps);
  assert.deepEqual(report.inputs, [{ index: 0, status: 'coinbase' }]);
  assert.deepEqual(cap.lines, []);
});

test('interleaved tasks on disjoint coins end with adds minus removes', async () => {
  const { registry, deps } = setup();
  const TASKS = 8;
  const OUTPUTS = 3;

  async function worker(n: number): Promise<void> {
    const outputs = Array.from({ length: OUTPUTS }, (_, i) => p2pkh(BigInt(n * 10 + i + 1), alice));
    const fund = makeTx([coinbaseInput()], outputs, n);
    const hash = processTransaction(fund, deps).txHash;
    await tick();
    processTransaction(makeTx([spendInput(hash, 1, alice.compressed)], [], n), deps);
    await tick();
  }

  await Promise.all(Array.from({ length: TASKS }, (_, n) => worker(n)));

  assert.equal(registry.count(alice.compressed), TASKS * OUTPUTS - TASKS);
  const hashes = new Set(registry.snapshot().map((c) => `${bytesToHex(c.txHash)}:${c.index}`));
  assert.equal(hashes.size, TASKS * (OUTPUTS - 1));
});
