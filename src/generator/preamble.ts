import { quote, quoteList } from './quote.js';
import { FOUNDATION_STRUCTS } from './typeMap.js';

type PreambleFunction = {
  name: string;
  returns: string;
  args: string[];
};

// Declared in every generated module, whatever the dump contains.
const PREAMBLE_FUNCTIONS: PreambleFunction[] = [
  { name: 'NSLog', returns: 'void', args: ['void *', '...'] },
  { name: 'NSClassFromString', returns: 'void *', args: ['void *'] },
  { name: 'NSSelectorFromString', returns: 'void *', args: ['void *'] },
  { name: 'NSStringFromClass', returns: 'void *', args: ['void *'] },
  { name: 'NSStringFromSelector', returns: 'void *', args: ['void *'] },
];

const TYPE_ALIASES: Array<[string, string]> = [
  ['NSInteger', 'number | bigint'],
  ['NSUInteger', 'number | bigint'],
  ['CGFloat', 'number'],
  ['NSTimeInterval', 'number'],
];

const RUNTIME_VALUES = [
  'dispatch',
  'expectBoolean',
  'expectCString',
  'expectInteger',
  'expectNumber',
  'expectStruct',
  'foundationFunction',
  'getClass',
  ...FOUNDATION_STRUCTS.map((s) => `is${s}`),
  'registerFoundationStructs',
  'selector',
];

const RUNTIME_TYPES = ['Class', 'SEL', 'id', ...FOUNDATION_STRUCTS];

/**
 * Every top-level name the preamble declares or imports. Generated classes
 * must not reuse them.
 */
export const PREAMBLE_NAMES: readonly string[] = [
  ...RUNTIME_VALUES,
  ...RUNTIME_TYPES,
  ...TYPE_ALIASES.map(([name]) => name),
  ...PREAMBLE_FUNCTIONS.map((f) => f.name),
];

function importBlock(keyword: string, names: readonly string[], runtimeModule: string): string[] {
  return [`${keyword} {`, ...names.map((n) => `  ${n},`), `} from ${quote(runtimeModule)};`];
}

export function renderPreamble(runtimeModule: string): string {
  const lines = [
    '// Generated by objc-ffigen from runtime class metadata. Do not edit.',
    '',
    ...importBlock('import', RUNTIME_VALUES, runtimeModule),
    ...importBlock('import type', RUNTIME_TYPES, runtimeModule),
    '',
    `export type { ${FOUNDATION_STRUCTS.join(', ')} };`,
    '',
    'registerFoundationStructs();',
    '',
    '// Basic Foundation types',
    ...TYPE_ALIASES.map(([name, type]) => `export type ${name} = ${type};`),
    '',
    '// Essential Foundation functions',
    ...PREAMBLE_FUNCTIONS.map(
      (f) =>
        `export const ${f.name} = foundationFunction(${quote(f.name)}, ${quote(f.returns)}, ${quoteList(f.args)});`,
    ),
  ];
  return `${lines.join('\n')}\n`;
}
