export { classRecordsFromExports } from './classRecordsFromExports.js';
export { dispatchEntryFor, reconstructSelector } from './dispatch.js';
export { generateBindings, generateModule, renderModule } from './generateBindings.js';
export { generateFunctionBindings } from './generateFunctions.js';
export type { FunctionBindingOptions } from './generateFunctions.js';
export {
  DEFAULT_RUNTIME_MODULE,
  DEFAULT_STRING_CLASS,
} from './generatorTypes.js';
export type { GeneratedModule, GeneratedUnit, GeneratorOptions } from './generatorTypes.js';
export { NameTable } from './nameTable.js';
export { PREAMBLE_NAMES, renderPreamble } from './preamble.js';
export { RESERVED_WORDS, isValidIdentifier, sanitizeClassName, sanitizeSelector } from './sanitize.js';
export {
  DEFAULT_SIGNATURE_DATABASE,
  loadSignatureDatabase,
  parseSignatureDatabase,
} from './signatureDb.js';
export type { FunctionParam, FunctionSignature, SignatureDatabase } from './signatureDb.js';
export {
  FOUNDATION_STRUCTS,
  OPAQUE_FFI_TYPE,
  knownStruct,
  renderFfiType,
  renderTsType,
} from './typeMap.js';
export type { FoundationStructName } from './typeMap.js';
