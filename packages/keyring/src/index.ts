// packages/keyring/src/index.ts
export { PublicKey } from './pubkey.js';
export { KeyRing, DEFAULT_ADDRESS_VERSION } from './keyring.js';
export type { OwnershipRegistry, KeyRingOptions } from './types.js';
