import koffi from 'koffi';

export type NSRange = { location: number | bigint; length: number | bigint };
export type CGPoint = { x: number; y: number };
export type CGSize = { width: number; height: number };
export type CGRect = { origin: CGPoint; size: CGSize };
export type NSProgressFraction = { completed: number | bigint; total: number | bigint };
export type NSDecimal = { _private: number[] };
export type NSFastEnumerationState = {
  state: number | bigint;
  itemsPtr: unknown;
  mutationsPtr: unknown;
  extra: Array<number | bigint>;
};

let registered = false;

function isRegistered(name: string): boolean {
  try {
    koffi.sizeof(name);
    return true;
  } catch {
    return false;
  }
}

type FieldType = string | ReturnType<typeof koffi.array>;

function defineStruct(name: string, fields: Record<string, FieldType>) {
  // koffi keeps named types for the whole process, across module reloads.
  if (isRegistered(name)) return;
  koffi.struct(name, fields);
}

/**
 * Register the Foundation structs that generated bindings name in their
 * prototypes. Safe to call more than once.
 */
export function registerFoundationStructs() {
  if (registered) return;

  defineStruct('NSRange', { location: 'size_t', length: 'size_t' });
  defineStruct('CGPoint', { x: 'double', y: 'double' });
  defineStruct('CGSize', { width: 'double', height: 'double' });
  defineStruct('CGRect', { origin: 'CGPoint', size: 'CGSize' });
  defineStruct('NSProgressFraction', { completed: 'int64_t', total: 'int64_t' });
  defineStruct('NSDecimal', { _private: koffi.array('uint8_t', 20, 'Array') });
  defineStruct('NSFastEnumerationState', {
    state: 'unsigned long',
    itemsPtr: 'void **',
    mutationsPtr: 'unsigned long *',
    extra: koffi.array('unsigned long', 5, 'Array'),
  });

  registered = true;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function isInteger(v: unknown): v is number | bigint {
  return typeof v === 'number' || typeof v === 'bigint';
}

export function isNSRange(v: unknown): v is NSRange {
  return isRecord(v) && isInteger(v.location) && isInteger(v.length);
}

export function isCGPoint(v: unknown): v is CGPoint {
  return isRecord(v) && typeof v.x === 'number' && typeof v.y === 'number';
}

export function isCGSize(v: unknown): v is CGSize {
  return isRecord(v) && typeof v.width === 'number' && typeof v.height === 'number';
}

export function isCGRect(v: unknown): v is CGRect {
  return isRecord(v) && isCGPoint(v.origin) && isCGSize(v.size);
}

export function isNSProgressFraction(v: unknown): v is NSProgressFraction {
  return isRecord(v) && isInteger(v.completed) && isInteger(v.total);
}

export function isNSDecimal(v: unknown): v is NSDecimal {
  return (
    isRecord(v) && Array.isArray(v._private) && v._private.every((b: unknown) => typeof b === 'number')
  );
}

export function isNSFastEnumerationState(v: unknown): v is NSFastEnumerationState {
  return (
    isRecord(v) &&
    isInteger(v.state) &&
    'itemsPtr' in v &&
    'mutationsPtr' in v &&
    Array.isArray(v.extra) &&
    v.extra.every(isInteger)
  );
}
