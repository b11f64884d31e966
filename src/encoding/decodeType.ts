import type {
  DecodeResult,
  EncodedType,
  MethodSignature,
  PrimitiveKind,
  ReferenceKind,
} from './encodingTypes.js';

const SINGLE_CHAR_TYPES: Record<string, PrimitiveKind | ReferenceKind> = {
  v: 'void',
  B: 'bool',
  c: 'int8',
  C: 'uint8',
  s: 'int16',
  S: 'uint16',
  i: 'int32',
  I: 'uint32',
  l: 'long',
  L: 'ulong',
  q: 'int64',
  Q: 'uint64',
  f: 'float',
  d: 'double',
  '@': 'receiver',
  '#': 'class',
  ':': 'selector',
  '*': 'cstring',
};

// Unterminated aggregates keep at most this many characters of the input.
const UNTERMINATED_AGGREGATE_CAP = 10;

function findMatchingBrace(encoding: string): number {
  let depth = 0;
  for (let i = 0; i < encoding.length; i++) {
    const ch = encoding[i];
    if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Decode the first type in a runtime type encoding.
 */
export function decodeOne(encoding: string): DecodeResult {
  if (encoding.length === 0) {
    return { type: { kind: 'unresolved', raw: 'empty' }, consumed: 0 };
  }

  const first = encoding.charAt(0);

  const mapped = SINGLE_CHAR_TYPES[first];
  if (mapped) {
    return { type: { kind: mapped }, consumed: 1 };
  }

  if (first === '^') {
    const inner = decodeOne(encoding.slice(1));
    return {
      type: { kind: 'pointer', pointee: inner.type },
      consumed: inner.consumed + 1,
    };
  }

  if (first === '{') {
    const end = findMatchingBrace(encoding);
    if (end === -1) {
      return {
        type: {
          kind: 'unresolved',
          raw: encoding.slice(0, UNTERMINATED_AGGREGATE_CAP),
        },
        consumed: 1,
      };
    }

    const body = encoding.slice(1, end);
    const eq = body.indexOf('=');
    const name = eq === -1 ? body : body.slice(0, eq);
    return { type: { kind: 'aggregate', name }, consumed: end + 1 };
  }

  return { type: { kind: 'unresolved', raw: first }, consumed: 1 };
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function stripBrackets(raw: string): string {
  let start = 0;
  let end = raw.length;
  while (start < end && raw[start] === '[') start++;
  while (end > start && raw[end - 1] === ']') end--;
  return raw.slice(start, end);
}

/**
 * Decode a full method encoding such as `@24@0:8@16`.
 *
 * Decimal runs are stack sizes/offsets and are skipped. Returns null when
 * nothing could be decoded.
 */
export function decodeSignature(raw: string): MethodSignature | null {
  const clean = stripBrackets(raw.trim()).trim();
  if (!clean) return null;

  const types: EncodedType[] = [];
  let pos = 0;

  while (pos < clean.length) {
    if (isDigit(clean.charAt(pos))) {
      while (pos < clean.length && isDigit(clean.charAt(pos))) pos++;
      continue;
    }

    const { type, consumed } = decodeOne(clean.slice(pos));
    types.push(type);
    // consumed is only 0 for empty input, which the loop guard rules out.
    pos += Math.max(consumed, 1);
  }

  const [returnType, ...argTypes] = types;
  if (!returnType) return null;

  return { returnType, argTypes };
}
