// packages/store/src/kvstore.ts
import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { bytesToHex, hexToBytes } from '@coinkeeper/utils';

import { asJson, asString, toBytes } from './codec.js';
import { BucketNotFoundError, KeyNotFoundError } from './errors.js';

/** bucket -> hex(key) -> value */
type Buckets = Map<string, Map<string, Uint8Array>>;

export type KvStoreFile = {
  schemaVersion: 1;
  updatedAt: string;
  buckets: Record<string, Record<string, string>>;
};

export type KvStoreOptions = {
  /** JSON file backing the store. In-memory only when omitted. */
  filename?: string;
};

function isStringRecord(v: unknown): v is Record<string, string> {
  if (typeof v !== 'object' || v === null || Array.isArray(v)) return false;
  return Object.values(v).every((x) => typeof x === 'string');
}

function parseFile(raw: string, filename: string): Buckets {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`${filename}: not a store file`);
  }
  if (!('schemaVersion' in parsed) || parsed.schemaVersion !== 1) {
    const v = 'schemaVersion' in parsed ? String(parsed.schemaVersion) : 'missing';
    throw new Error(`Unsupported schemaVersion: ${v}`);
  }
  const rawBuckets = 'buckets' in parsed ? parsed.buckets : undefined;
  if (typeof rawBuckets !== 'object' || rawBuckets === null) {
    throw new Error(`${filename}: missing buckets`);
  }

  const buckets: Buckets = new Map();
  for (const [name, entries] of Object.entries(rawBuckets)) {
    if (!isStringRecord(entries)) throw new Error(`${filename}: bucket ${name} is malformed`);
    const m = new Map<string, Uint8Array>();
    for (const [k, v] of Object.entries(entries)) m.set(k, hexToBytes(v));
    buckets.set(name, m);
  }
  return buckets;
}

function cloneBuckets(src: Buckets): Buckets {
  const out: Buckets = new Map();
  for (const [name, m] of src) out.set(name, new Map(m));
  return out;
}

function hasPrefix(keyHex: string, prefixHex: string): boolean {
  return keyHex.startsWith(prefixHex);
}

function parseMembers(bytes: Uint8Array): string[] {
  const v = asJson(bytes);
  if (!Array.isArray(v) || !v.every((x): x is string => typeof x === 'string')) {
    throw new Error('set value is not a string array');
  }
  return v;
}

/**
 * One transaction over the store's buckets. Keys iterate in byte order.
 * Read-only transactions reject every write.
 */
export class KvTx {
  constructor(
    private readonly buckets: Buckets,
    readonly writable: boolean
  ) {}

  private bucket(name: string): Map<string, Uint8Array> {
    const b = this.buckets.get(name);
    if (!b) throw new BucketNotFoundError(name);
    return b;
  }

  private assertWritable(): void {
    if (!this.writable) throw new Error('write in a read-only transaction');
  }

  /** Sorted (hex key, value) pairs whose key starts with `prefix`. */
  private scan(name: string, prefix: Uint8Array = new Uint8Array()): Array<[string, Uint8Array]> {
    const p = bytesToHex(prefix);
    return [...this.bucket(name)]
      .filter(([k]) => hasPrefix(k, p))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  hasBucket(name: string): boolean {
    return this.buckets.has(name);
  }

  get(bucket: string, key: Uint8Array): Uint8Array {
    const v = this.bucket(bucket).get(bytesToHex(key));
    if (v === undefined) throw new KeyNotFoundError(bucket);
    return v.slice();
  }

  put(bucket: string, key: Uint8Array, value: unknown): void {
    this.assertWritable();
    let b = this.buckets.get(bucket);
    if (!b) {
      b = new Map();
      this.buckets.set(bucket, b);
    }
    b.set(bytesToHex(key), toBytes(value).slice());
  }

  del(bucket: string, key: Uint8Array): void {
    this.assertWritable();
    this.bucket(bucket).delete(bytesToHex(key));
  }

  has(bucket: string, key: Uint8Array): boolean {
    return this.buckets.get(bucket)?.has(bytesToHex(key)) ?? false;
  }

  count(bucket: string, prefix?: Uint8Array): number {
    return this.scan(bucket, prefix).length;
  }

  /** Every (key, value) pair in the bucket whose key starts with `prefix`. */
  entries(bucket: string, prefix?: Uint8Array): Array<[Uint8Array, Uint8Array]> {
    return this.scan(bucket, prefix).map(([k, v]) => [hexToBytes(k), v.slice()]);
  }

  getStrings(bucket: string, prefix?: Uint8Array): string[] {
    return this.scan(bucket, prefix).map(([, v]) => asString(v));
  }

  keyStrings(bucket: string): string[] {
    return this.scan(bucket).map(([k]) => asString(hexToBytes(k)));
  }

  /** Distinct leading string parts (up to the first NUL) of every key. */
  prefixes(bucket: string): string[] {
    const out: string[] = [];
    let last: string | undefined;
    for (const [k] of this.scan(bucket)) {
      const key = hexToBytes(k);
      const nul = key.indexOf(0x00);
      if (nul === -1) throw new Error(`key in bucket ${bucket} has no string prefix`);
      const prefix = asString(key.subarray(0, nul));
      if (prefix === last) continue;
      out.push(prefix);
      last = prefix;
    }
    return out;
  }

  /* -------------------------------- sets -------------------------------- */

  setMembers(bucket: string, key: Uint8Array): string[] {
    return parseMembers(this.get(bucket, key));
  }

  addMember(bucket: string, key: Uint8Array, member: string): void {
    const members = this.has(bucket, key) ? new Set(this.setMembers(bucket, key)) : new Set<string>();
    members.add(member);
    this.put(bucket, key, [...members].sort());
  }

  /** Drop `member`; the key itself goes once the set is empty. */
  removeMember(bucket: string, key: Uint8Array, member: string): void {
    const members = new Set(this.setMembers(bucket, key));
    members.delete(member);
    if (members.size === 0) this.del(bucket, key);
    else this.put(bucket, key, [...members].sort());
  }

  hasMember(bucket: string, key: Uint8Array, member: string): boolean {
    if (!this.has(bucket, key)) return false;
    return this.setMembers(bucket, key).includes(member);
  }
}

/**
 * Bucketed key-value store kept in memory and flushed to one JSON file.
 *
 * `update` runs against a working copy that replaces the live buckets only
 * when the callback returns; updates are queued so one runs at a time.
 */
export class KvStore {
  readonly filename: string | undefined;
  private buckets: Buckets = new Map();
  private loaded = false;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(opts: KvStoreOptions = {}) {
    this.filename = opts.filename;
  }

  static async open(opts: KvStoreOptions = {}): Promise<KvStore> {
    const store = new KvStore(opts);
    await store.load();
    return store;
  }

  async load(): Promise<void> {
    if (this.loaded) return;

    if (this.filename !== undefined) {
      try {
        const raw = await fs.readFile(this.filename, 'utf8');
        this.buckets = parseFile(raw, this.filename);
      } catch (e) {
        if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
          // start new
          this.buckets = new Map();
        } else {
          throw e;
        }
      }
    }

    this.loaded = true;
  }

  private assertLoaded(): void {
    if (!this.loaded) throw new Error('Store not loaded. Call load() first.');
  }

  view<T>(fn: (tx: KvTx) => T): T {
    this.assertLoaded();
    return fn(new KvTx(this.buckets, false));
  }

  update<T>(fn: (tx: KvTx) => T): Promise<T> {
    this.assertLoaded();
    const run = async (): Promise<T> => {
      const working = cloneBuckets(this.buckets);
      const result = fn(new KvTx(working, true));
      this.buckets = working;
      await this.flush();
      return result;
    };
    const next = this.queue.then(run, run);
    this.queue = next.catch(() => undefined);
    return next;
  }

  toFile(): KvStoreFile {
    const buckets: Record<string, Record<string, string>> = {};
    for (const [name, m] of this.buckets) {
      const entries: Record<string, string> = {};
      for (const k of [...m.keys()].sort()) {
        const v = m.get(k);
        if (v !== undefined) entries[k] = bytesToHex(v);
      }
      buckets[name] = entries;
    }
    return { schemaVersion: 1, updatedAt: new Date().toISOString(), buckets };
  }

  async flush(): Promise<void> {
    this.assertLoaded();
    if (this.filename === undefined) return;

    await fs.mkdir(path.dirname(this.filename), { recursive: true });

    const tmp = `${this.filename}.tmp`;
    const json = JSON.stringify(this.toFile(), null, 2);

    await fs.writeFile(tmp, json, 'utf8');
    await fs.rename(tmp, this.filename);
  }
}
