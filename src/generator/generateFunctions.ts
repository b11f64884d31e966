import { traceInfo } from '../dx/trace.js';
import { FfigenError } from '../errors.js';
import { constantSymbols, functionSymbols, stripSymbolPrefix } from '../stubs/index.js';
import type { StubExportSet } from '../stubs/index.js';
import { DEFAULT_RUNTIME_MODULE } from './generatorTypes.js';
import { NameTable } from './nameTable.js';
import { quote, quoteList } from './quote.js';
import { RESERVED_WORDS, isValidIdentifier } from './sanitize.js';
import type { FunctionSignature, SignatureDatabase } from './signatureDb.js';

export type FunctionBindingOptions = {
  runtimeModule?: string;
  /** Library to bind against; defaults to the descriptor's install name. */
  libraryPath?: string;
};

const LOCAL_NAMES = ['lazyLibrary', 'library', 'registerFoundationStructs'];

function declaration(sig: FunctionSignature): string[] {
  const args = sig.params.map((p) => p.type);
  if (sig.variadic) args.push('...');
  const shown = sig.params.map((p) => p.name);
  if (sig.variadic) shown.push('...');

  return [
    `/** \`${sig.name}(${shown.join(', ')})\` */`,
    `export const ${sig.name} = library.func(${quote(sig.name)}, ${quote(sig.returns)}, ${quoteList(args)});`,
  ];
}

function listing(title: string, symbols: string[]): string[] {
  if (symbols.length === 0) return [];
  return ['', `// ${title}:`, ...symbols.map((s) => `//   ${s}`)];
}

/**
 * Module declaring every exported function symbol that has a known
 * signature. Symbols without one, and constants, are listed in comments.
 */
export function generateFunctionBindings(
  set: StubExportSet,
  db: SignatureDatabase,
  options: FunctionBindingOptions = {},
): string {
  const libraryPath = options.libraryPath ?? set.installName;
  if (!libraryPath) {
    throw new FfigenError(
      'MISSING_LIBRARY_PATH',
      'Stub descriptor has no install-name; pass a library path explicitly',
    );
  }
  const runtimeModule = options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;

  const names = new NameTable([...RESERVED_WORDS, ...LOCAL_NAMES]);
  const declared = new Set<string>();
  const body: string[] = [];
  const unmatched: string[] = [];

  for (const symbol of functionSymbols(set)) {
    const name = stripSymbolPrefix(symbol);
    if (declared.has(name)) continue;

    const sig = db.get(name);
    if (!sig || !isValidIdentifier(name) || names.has(name)) {
      unmatched.push(symbol);
      continue;
    }
    names.claim(name);
    declared.add(name);
    body.push('', ...declaration(sig));
  }

  traceInfo('generate.functions', {
    library: libraryPath,
    declared: declared.size,
    unmatched: unmatched.length,
  });

  const lines = [
    '// Generated by objc-ffigen from a stub descriptor. Do not edit.',
    '',
    `import { lazyLibrary, registerFoundationStructs } from ${quote(runtimeModule)};`,
    '',
    'registerFoundationStructs();',
    '',
    `const library = lazyLibrary(${quote(libraryPath)});`,
    ...body,
    ...listing('Function symbols without a known signature', unmatched),
    ...listing('Constant symbols', constantSymbols(set)),
  ];
  return `${lines.join('\n')}\n`;
}
