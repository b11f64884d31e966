import type { StubExportSet } from './stubTypes.js';

const PLATFORM_PREFIXES = ['NS', 'CF'];

const LINKER_DIRECTIVE_PREFIX = '$ld$';
const OBJC_RUNTIME_INFIX = '_OBJC_';

/** Drop exactly one leading underscore (the C symbol prefix). */
export function stripSymbolPrefix(symbol: string): string {
  return symbol.startsWith('_') ? symbol.slice(1) : symbol;
}

export function isExcludedSymbol(symbol: string): boolean {
  return symbol.startsWith(LINKER_DIRECTIVE_PREFIX) || symbol.includes(OBJC_RUNTIME_INFIX);
}

function platformPrefix(name: string): string | undefined {
  return PLATFORM_PREFIXES.find((p) => name.startsWith(p));
}

function isConstantShaped(name: string): boolean {
  return /^k[A-Z]/.test(name);
}

function isLowercaseLetter(ch: string): boolean {
  return ch >= 'a' && ch <= 'z';
}

export function isFunctionSymbol(symbol: string): boolean {
  if (isExcludedSymbol(symbol)) return false;
  const name = stripSymbolPrefix(symbol);
  if (isConstantShaped(name)) return false;
  return platformPrefix(name) !== undefined || isLowercaseLetter(name.charAt(0));
}

export function isConstantSymbol(symbol: string): boolean {
  if (isExcludedSymbol(symbol)) return false;
  const name = stripSymbolPrefix(symbol);
  if (isConstantShaped(name)) return true;

  // NS/CF names are constants only when nothing after the prefix is lowercase.
  const prefix = platformPrefix(name);
  if (prefix === undefined) return false;
  return !/[a-z]/.test(name.slice(prefix.length));
}

/** Symbols that look like callable functions, in descriptor order. */
export function functionSymbols(set: StubExportSet): string[] {
  return set.symbols.filter(isFunctionSymbol);
}

/** Symbols that look like exported constants, in descriptor order. */
export function constantSymbols(set: StubExportSet): string[] {
  return set.symbols.filter(isConstantSymbol);
}
