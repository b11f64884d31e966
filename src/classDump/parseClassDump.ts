import type { ClassRecord, MethodRecord, PropertyRecord } from './classDumpTypes.js';

const INTERFACE_PREFIX = '@interface ';
const SUPERCLASS_PREFIX = 'Superclass: ';
const METHODS_HEADER = 'Methods (';
const PROPERTIES_HEADER = 'Properties (';
const END_MARKER = '@end';
const METHOD_PREFIX = '- ';
const PROPERTY_PREFIX = '@property ';

/**
 * Split `<head> [<tail>]` on the first ` [`.
 * Returns null when the line carries no bracketed part.
 */
function splitBracketed(line: string, prefix: string): [string, string] | null {
  const idx = line.indexOf(' [');
  if (idx === -1) return null;

  const head = line.slice(prefix.length, idx).trim();
  let tail = line.slice(idx + 2).trim();
  if (tail.endsWith(']')) tail = tail.slice(0, -1).trim();
  return [head, tail];
}

function parseMethodLine(line: string): MethodRecord | null {
  const parts = splitBracketed(line, METHOD_PREFIX);
  if (!parts) return null;
  const [selector, encoding] = parts;
  return { selector, encoding };
}

function parsePropertyLine(line: string): PropertyRecord | null {
  const parts = splitBracketed(line, PROPERTY_PREFIX);
  if (parts) {
    const [name, attributes] = parts;
    return name ? { name, attributes } : null;
  }
  const name = line.slice(PROPERTY_PREFIX.length).trim();
  return name ? { name, attributes: '' } : null;
}

/**
 * Parse runtime class-dump output into class records.
 *
 * Line oriented; lines that match none of the markers are ignored.
 */
export function parseClassDump(dump: string): ClassRecord[] {
  const classes: ClassRecord[] = [];
  let current: ClassRecord | null = null;
  let inMethods = false;
  let inProperties = false;

  for (const rawLine of dump.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (line.startsWith(INTERFACE_PREFIX)) {
      if (current) classes.push(current);
      current = {
        name: line.slice(INTERFACE_PREFIX.length).trim(),
        methods: [],
        properties: [],
      };
      inMethods = false;
      inProperties = false;
    } else if (line.startsWith(SUPERCLASS_PREFIX)) {
      if (current) current.superclass = line.slice(SUPERCLASS_PREFIX.length).trim();
    } else if (line.startsWith(METHODS_HEADER)) {
      inMethods = true;
      inProperties = false;
    } else if (line.startsWith(PROPERTIES_HEADER)) {
      inMethods = false;
      inProperties = true;
    } else if (line === END_MARKER) {
      inMethods = false;
      inProperties = false;
    } else if (inMethods && line.startsWith(METHOD_PREFIX)) {
      const method = parseMethodLine(line);
      if (current && method) current.methods.push(method);
    } else if (inProperties && line.startsWith(PROPERTY_PREFIX)) {
      const property = parsePropertyLine(line);
      if (current && property) current.properties.push(property);
    }
  }

  if (current) classes.push(current);
  return classes;
}
