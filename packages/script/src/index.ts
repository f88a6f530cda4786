// packages/script/src/index.ts
export * from './opcodes.js';
export * from './types.js';

export {
  decodePayToPubKeyHash,
  decodePayToPubKey,
  checkPayToPubKeyHash,
  checkPayToPubKey,
  matchOutputScript,
  decodeSignatureHeader,
  decodeSignatureTail,
  checkSignatureTail,
  matchSignatureScript,
} from './templates.js';

export { getP2PKHScript, getP2PKScript, encodeDerSignature, getSignatureScript } from './build.js';
