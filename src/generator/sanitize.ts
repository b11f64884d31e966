/**
 * Words a generated member or class may not be named verbatim.
 * `constructor` and `handle` are taken by the wrapper class itself.
 */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'await',
  'break',
  'case',
  'catch',
  'class',
  'const',
  'constructor',
  'continue',
  'debugger',
  'default',
  'delete',
  'do',
  'else',
  'enum',
  'export',
  'extends',
  'false',
  'finally',
  'for',
  'function',
  'handle',
  'if',
  'implements',
  'import',
  'in',
  'instanceof',
  'interface',
  'let',
  'new',
  'null',
  'package',
  'private',
  'protected',
  'public',
  'return',
  'static',
  'super',
  'switch',
  'this',
  'throw',
  'true',
  'try',
  'typeof',
  'var',
  'void',
  'while',
  'with',
  'yield',
]);

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

function startsWithDigit(name: string): boolean {
  return /^[0-9]/.test(name);
}

/**
 * Class identifier for a runtime class name, or null when the result is not
 * a usable identifier (the class is then skipped).
 */
export function sanitizeClassName(name: string): string | null {
  const result = name
    .replace(/[.\- ]/g, '_')
    .replace(/\+/g, 'Plus')
    .replace(/\$/g, 'Dollar')
    .replace(/@/g, 'At');

  if (!result || startsWithDigit(result) || !isValidIdentifier(result)) return null;
  return result;
}

/**
 * Method identifier for a selector. Returns null when nothing usable is left,
 * e.g. for a bare `:`.
 */
export function sanitizeSelector(selector: string): string | null {
  let result = selector
    .replace(/[:\-.]/g, '_')
    .replace(/\+/g, 'plus_')
    .replace(/\$/g, 'dollar_')
    .replace(/^_+|_+$/g, '');

  if (startsWithDigit(result)) result = `_${result}`;
  if (RESERVED_WORDS.has(result)) result = `${result}_`;

  if (!result || !isValidIdentifier(result)) return null;
  return result;
}
