export { lazyLibrary, loadLibrary } from './createLibrary.js';
export {
  expectBoolean,
  expectCString,
  expectInteger,
  expectNumber,
  expectStruct,
} from './convert.js';
export {
  isCGPoint,
  isCGRect,
  isCGSize,
  isNSDecimal,
  isNSFastEnumerationState,
  isNSProgressFraction,
  isNSRange,
  registerFoundationStructs,
} from './foundationStructs.js';
export type {
  CGPoint,
  CGRect,
  CGSize,
  NSDecimal,
  NSFastEnumerationState,
  NSProgressFraction,
  NSRange,
} from './foundationStructs.js';
export {
  FOUNDATION_LIBRARY_PATH,
  OBJC_LIBRARY_PATH,
  createObjcRuntime,
  dispatch,
  foundationFunction,
  getClass,
  openObjcRuntime,
  selector,
} from './runtime.js';
export type { ObjcRuntime } from './runtime.js';
export type {
  Class,
  DispatchEntry,
  ForeignFunction,
  ForeignLibrary,
  LibraryLoader,
  ObjcLibraries,
  SEL,
  id,
} from './ffiTypes.js';
