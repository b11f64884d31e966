import type { ClassRecord, MethodRecord } from '../classDump/index.js';
import { decodeSignature } from '../encoding/index.js';
import type { EncodedType } from '../encoding/index.js';
import { traceInfo } from '../dx/trace.js';
import { warn, type FfigenWarningCode } from '../dx/warnings.js';
import { dispatchEntryFor, reconstructSelector } from './dispatch.js';
import {
  DEFAULT_RUNTIME_MODULE,
  DEFAULT_STRING_CLASS,
  type GeneratedModule,
  type GeneratedUnit,
  type GeneratorOptions,
} from './generatorTypes.js';
import { NameTable } from './nameTable.js';
import { PREAMBLE_NAMES, renderPreamble } from './preamble.js';
import { commentSafe, quote, quoteList } from './quote.js';
import { RESERVED_WORDS, sanitizeClassName, sanitizeSelector } from './sanitize.js';
import { knownStruct, renderFfiType, renderTsType } from './typeMap.js';

type MethodOutcome = { emitted: boolean; lines: string[] };

function convertedReturn(type: EncodedType, call: string): string {
  switch (type.kind) {
    case 'bool':
      return `expectBoolean(${call})`;
    case 'int8':
    case 'uint8':
    case 'int16':
    case 'uint16':
    case 'int32':
    case 'uint32':
    case 'float':
    case 'double':
      return `expectNumber(${call})`;
    case 'long':
    case 'ulong':
    case 'int64':
    case 'uint64':
      return `expectInteger(${call})`;
    case 'cstring':
      return `expectCString(${call})`;
    case 'aggregate': {
      const known = knownStruct(type.name);
      return known ? `expectStruct(is${known}, ${call})` : call;
    }
    default:
      return call;
  }
}

function returnStatement(type: EncodedType, call: string): string {
  if (type.kind === 'void') return `${call};`;
  return `return ${convertedReturn(type, call)};`;
}

function skipped(
  className: string,
  method: MethodRecord,
  code: FfigenWarningCode,
  reason: string,
): MethodOutcome {
  warn({ code, message: `${className} ${method.selector}: ${reason}` });
  return {
    emitted: false,
    lines: [`  // Skipped: ${method.selector} (${reason})`],
  };
}

function renderMethod(className: string, method: MethodRecord, names: NameTable): MethodOutcome {
  const sig = decodeSignature(method.encoding);
  if (!sig) {
    return skipped(className, method, 'MALFORMED_SIGNATURE', `unparseable encoding: ${method.encoding}`);
  }
  if (sig.argTypes.length < 2) {
    return skipped(
      className,
      method,
      'MALFORMED_SIGNATURE',
      `missing receiver or selector in encoding: ${method.encoding}`,
    );
  }

  const sanitized = sanitizeSelector(method.selector);
  if (!sanitized) {
    return skipped(className, method, 'UNRENDERABLE_IDENTIFIER', 'no valid identifier');
  }
  const name = names.claim(sanitized);

  const params = sig.argTypes.slice(2);
  const paramList = params.map((t, i) => `arg${i}: ${renderTsType(t)}`).join(', ');
  const callArgs = ['this.handle', `selector(${quote(reconstructSelector(method.selector))})`]
    .concat(params.map((_, i) => `arg${i}`))
    .join(', ');
  const prototype = [
    quote(dispatchEntryFor(sig.returnType)),
    quote(renderFfiType(sig.returnType)),
    quoteList(params.map(renderFfiType)),
  ].join(', ');

  return {
    emitted: true,
    lines: [
      '  /**',
      `   * \`${commentSafe(method.selector)}\``,
      `   * Type encoding: \`${commentSafe(method.encoding)}\``,
      '   */',
      `  ${name}(${paramList}): ${renderTsType(sig.returnType)} {`,
      `    const fn = dispatch(${prototype});`,
      `    ${returnStatement(sig.returnType, `fn(${callArgs})`)}`,
      '  }',
    ],
  };
}

function stringConvenience(identifier: string): string[] {
  return [
    '',
    '  /** Create a string from UTF-8 text via `stringWithUTF8String:`. */',
    `  static fromString(text: string): ${identifier} | null {`,
    "    const fn = dispatch('objc_msgSend', 'void *', ['const char *']);",
    `    const handle = fn(${identifier}.class(), selector('stringWithUTF8String:'), text);`,
    `    return handle === null ? null : new ${identifier}(handle);`,
    '  }',
    '',
    '  /** UTF-8 contents via `UTF8String`. */',
    '  utf8String(): string | null {',
    "    const fn = dispatch('objc_msgSend', 'const char *', []);",
    "    return expectCString(fn(this.handle, selector('UTF8String')));",
    '  }',
  ];
}

function classDocLines(record: ClassRecord): string[] {
  const lines = ['/**', ` * Objective-C class \`${commentSafe(record.name)}\`.`];
  if (record.superclass !== undefined) {
    lines.push(` * Superclass: \`${commentSafe(record.superclass)}\``);
  }
  if (record.properties.length > 0) {
    lines.push(' *', ' * Properties:');
    for (const p of record.properties) {
      const attrs = p.attributes ? ` \`${commentSafe(p.attributes)}\`` : '';
      lines.push(` * - \`${commentSafe(p.name)}\`${attrs}`);
    }
  }
  lines.push(' */');
  return lines;
}

function generateClassUnit(
  record: ClassRecord,
  classNames: NameTable,
  stringClassName: string,
): GeneratedUnit | null {
  const sanitized = sanitizeClassName(record.name);
  if (!sanitized) {
    warn({
      code: 'UNRENDERABLE_IDENTIFIER',
      message: `class ${record.name} skipped: no valid identifier`,
    });
    return null;
  }

  const identifier = classNames.claim(sanitized);
  const isStringClass = record.name === stringClassName;
  const methodNames = new NameTable(isStringClass ? ['utf8String'] : []);

  const lines = [
    ...classDocLines(record),
    `export class ${identifier} {`,
    '  constructor(readonly handle: id) {}',
    '',
    `  /** Class object for \`${commentSafe(record.name)}\`. */`,
    '  static class(): Class {',
    `    return getClass(${quote(record.name)});`,
    '  }',
  ];

  let emittedMethods = 0;
  let skippedMethods = 0;
  for (const method of record.methods) {
    const outcome = renderMethod(record.name, method, methodNames);
    if (outcome.emitted) emittedMethods++;
    else skippedMethods++;
    lines.push('', ...outcome.lines);
  }

  if (isStringClass) lines.push(...stringConvenience(identifier));
  lines.push('}');

  return {
    className: record.name,
    identifier,
    text: `${lines.join('\n')}\n`,
    emittedMethods,
    skippedMethods,
  };
}

/**
 * Build the preamble and one unit per renderable class, in input order.
 */
export function generateModule(
  classes: ClassRecord[],
  options: GeneratorOptions = {},
): GeneratedModule {
  const runtimeModule = options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
  const stringClassName = options.stringClassName ?? DEFAULT_STRING_CLASS;

  // Class identifiers share the module scope with the preamble.
  const classNames = new NameTable([...RESERVED_WORDS, ...PREAMBLE_NAMES]);
  const units: GeneratedUnit[] = [];
  for (const record of classes) {
    const unit = generateClassUnit(record, classNames, stringClassName);
    if (unit) units.push(unit);
  }

  traceInfo('generate.module', {
    classes: classes.length,
    units: units.length,
    skippedMethods: units.reduce((n, u) => n + u.skippedMethods, 0),
  });

  return { preamble: renderPreamble(runtimeModule), units };
}

export function renderModule(module: GeneratedModule): string {
  return module.preamble + module.units.map((u) => `\n${u.text}`).join('');
}

export function generateBindings(classes: ClassRecord[], options: GeneratorOptions = {}): string {
  return renderModule(generateModule(classes, options));
}
