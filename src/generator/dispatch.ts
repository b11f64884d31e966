import type { EncodedType } from '../encoding/index.js';
import type { DispatchEntry } from '../ffi/ffiTypes.js';

/**
 * Selector string to register with the runtime for a dumped method name.
 * Every colon-delimited segment gets its colon back; a name without colons
 * is used as is.
 */
export function reconstructSelector(name: string): string {
  if (!name.includes(':')) return name;

  const segments = name.split(':');
  // The split of a trailing colon leaves one empty segment behind.
  if (segments[segments.length - 1] === '') segments.pop();
  return segments.map((s) => `${s}:`).join('');
}

/**
 * Aggregate returns go through the struct-return path, floating point
 * returns through the fpret path, everything else through plain dispatch.
 */
export function dispatchEntryFor(returnType: EncodedType): DispatchEntry {
  switch (returnType.kind) {
    case 'aggregate':
      return 'objc_msgSend_stret';
    case 'float':
    case 'double':
      return 'objc_msgSend_fpret';
    default:
      return 'objc_msgSend';
  }
}
