export { decodeOne, decodeSignature } from './encoding/index.js';
export type {
  DecodeResult,
  EncodedType,
  MethodSignature,
  PrimitiveKind,
  ReferenceKind,
} from './encoding/index.js';

export { parseClassDump } from './classDump/index.js';
export type { ClassRecord, MethodRecord, PropertyRecord } from './classDump/index.js';

export {
  constantSymbols,
  functionSymbols,
  isConstantSymbol,
  isFunctionSymbol,
  parseStubDescriptor,
} from './stubs/index.js';
export type { StubExportSet, StubVersion } from './stubs/index.js';

export {
  classRecordsFromExports,
  generateBindings,
  generateFunctionBindings,
  generateModule,
  loadSignatureDatabase,
  parseSignatureDatabase,
  renderModule,
  sanitizeClassName,
  sanitizeSelector,
} from './generator/index.js';
export type {
  FunctionBindingOptions,
  FunctionSignature,
  GeneratedModule,
  GeneratedUnit,
  GeneratorOptions,
  SignatureDatabase,
} from './generator/index.js';

export {
  generateFromClassDump,
  generateFromStubDescriptor,
  parseStubDescriptorFile,
  readInput,
  writeOutput,
} from './pipeline.js';

export { FfigenError, InputUnreadableError } from './errors.js';
export type { FfigenErrorCode } from './errors.js';
export { loadOptionalConfig } from './dx/config.js';
export type { FfigenConfig } from './dx/config.js';
export { setDebugEnabled } from './dx/logger.js';
