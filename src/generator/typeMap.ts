import type { EncodedType, PrimitiveKind, ReferenceKind } from '../encoding/index.js';
import { isValidIdentifier } from './sanitize.js';

/** Opaque placeholder for anything without a usable native layout. */
export const OPAQUE_FFI_TYPE = 'void *';

/** Structs the generated preamble registers with koffi, by canonical name. */
export const FOUNDATION_STRUCTS = [
  'CGPoint',
  'CGRect',
  'CGSize',
  'NSDecimal',
  'NSFastEnumerationState',
  'NSProgressFraction',
  'NSRange',
] as const;

export type FoundationStructName = (typeof FOUNDATION_STRUCTS)[number];

// Aggregate tags as they appear in encodings, mapped to the registered name.
const STRUCT_TAGS: Record<string, FoundationStructName> = {
  CGPoint: 'CGPoint',
  NSPoint: 'CGPoint',
  _NSPoint: 'CGPoint',
  CGSize: 'CGSize',
  NSSize: 'CGSize',
  _NSSize: 'CGSize',
  CGRect: 'CGRect',
  NSRect: 'CGRect',
  _NSRect: 'CGRect',
  NSRange: 'NSRange',
  _NSRange: 'NSRange',
  NSDecimal: 'NSDecimal',
  NSFastEnumerationState: 'NSFastEnumerationState',
  NSProgressFraction: 'NSProgressFraction',
  _NSProgressFraction: 'NSProgressFraction',
};

const FFI_TYPES: Record<PrimitiveKind | ReferenceKind, string> = {
  void: 'void',
  bool: 'bool',
  int8: 'int8_t',
  uint8: 'uint8_t',
  int16: 'int16_t',
  uint16: 'uint16_t',
  int32: 'int32_t',
  uint32: 'uint32_t',
  long: 'long',
  ulong: 'unsigned long',
  int64: 'int64_t',
  uint64: 'uint64_t',
  float: 'float',
  double: 'double',
  receiver: 'void *',
  class: 'void *',
  selector: 'void *',
  cstring: 'const char *',
};

const TS_TYPES: Record<PrimitiveKind | ReferenceKind, string> = {
  void: 'void',
  bool: 'boolean',
  int8: 'number',
  uint8: 'number',
  int16: 'number',
  uint16: 'number',
  int32: 'number',
  uint32: 'number',
  long: 'number | bigint',
  ulong: 'number | bigint',
  int64: 'number | bigint',
  uint64: 'number | bigint',
  float: 'number',
  double: 'number',
  receiver: 'id',
  class: 'Class',
  selector: 'SEL',
  cstring: 'string | null',
};

/**
 * Registered struct for an aggregate tag, if the preamble knows it.
 */
export function knownStruct(tag: string): FoundationStructName | undefined {
  return Object.hasOwn(STRUCT_TAGS, tag) ? STRUCT_TAGS[tag] : undefined;
}

// Empty, `?` and template tags such as `vector<int>` have no usable koffi name.
function isOpaqueAggregate(tag: string): boolean {
  return !isValidIdentifier(tag);
}

/**
 * koffi type token for an encoded type. Never empty.
 */
export function renderFfiType(type: EncodedType): string {
  switch (type.kind) {
    case 'pointer': {
      const pointee = type.pointee;
      if (pointee.kind === 'void' || pointee.kind === 'unresolved') return OPAQUE_FFI_TYPE;
      if (pointee.kind === 'aggregate') {
        const known = knownStruct(pointee.name);
        return known ? `${known} *` : OPAQUE_FFI_TYPE;
      }
      const inner = renderFfiType(pointee);
      return inner.endsWith('*') ? `${inner}*` : `${inner} *`;
    }
    case 'aggregate': {
      if (isOpaqueAggregate(type.name)) return OPAQUE_FFI_TYPE;
      return knownStruct(type.name) ?? type.name;
    }
    case 'unresolved':
      return OPAQUE_FFI_TYPE;
    default:
      return FFI_TYPES[type.kind];
  }
}

/**
 * TypeScript type a wrapper exposes for an encoded type.
 */
export function renderTsType(type: EncodedType): string {
  switch (type.kind) {
    case 'pointer':
    case 'unresolved':
      return 'unknown';
    case 'aggregate':
      return knownStruct(type.name) ?? 'unknown';
    default:
      return TS_TYPES[type.kind];
  }
}
