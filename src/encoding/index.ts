export { decodeOne, decodeSignature } from './decodeType.js';
export type {
  DecodeResult,
  EncodedType,
  MethodSignature,
  PrimitiveKind,
  ReferenceKind,
} from './encodingTypes.js';
