import YAML from 'yaml';

import { logDebug } from '../dx/logger.js';
import { traceDebug } from '../dx/trace.js';
import { warn } from '../dx/warnings.js';
import type { ExportStanza, StubExportSet, StubVersion } from './stubTypes.js';

type StubDocument = {
  installName?: string;
  stanzas: ExportStanza[];
};

type VersionLayout = {
  version: StubVersion;
  matches(content: string): boolean;
  /** Stanza key that only this version's layout may carry. */
  stanzaKey: string;
  /** Stanza key that belongs to the other version's layout. */
  foreignStanzaKey: string;
};

const GENERIC_HEADER = '--- !tapi-tbd';

function isV4(content: string): boolean {
  return (
    content.includes('!tapi-tbd-v4') ||
    (content.includes(GENERIC_HEADER) && /^tbd-version:\s*4\b/m.test(content))
  );
}

// Older tagged headers (`!tapi-tbd-v2`) and a bare header without
// `tbd-version: 4` share the v3 layout.
const VERSIONS: VersionLayout[] = [
  {
    version: 'v3',
    matches: (content) =>
      content.includes('!tapi-tbd-v3') || (content.startsWith(GENERIC_HEADER) && !isV4(content)),
    stanzaKey: 'archs',
    foreignStanzaKey: 'targets',
  },
  {
    version: 'v4',
    matches: isV4,
    stanzaKey: 'targets',
    foreignStanzaKey: 'archs',
  },
];

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isStringList(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((s) => typeof s === 'string');
}

function readList(stanza: Record<string, unknown>, key: string): string[] | null {
  const v = stanza[key];
  if (v === undefined || v === null) return [];
  return isStringList(v) ? v : null;
}

function validateStanza(raw: unknown, layout: VersionLayout): ExportStanza | null {
  if (!isRecord(raw)) return null;
  if (layout.foreignStanzaKey in raw) return null;

  const tag = raw[layout.stanzaKey];
  if (tag !== undefined && !isStringList(tag)) return null;

  const symbols = readList(raw, 'symbols');
  const objcClasses = readList(raw, 'objc-classes');
  const objcIvars = readList(raw, 'objc-ivars');
  if (!symbols || !objcClasses || !objcIvars) return null;

  return { symbols, objcClasses, objcIvars };
}

function validateDocument(raw: unknown, layout: VersionLayout): StubDocument | null {
  // A document with only a marker line has no content.
  if (raw === null || raw === undefined) return { stanzas: [] };
  if (!isRecord(raw)) return null;

  const installName = raw['install-name'];
  if (installName !== undefined && typeof installName !== 'string') return null;

  const exports = raw.exports;
  const stanzas: ExportStanza[] = [];
  if (exports !== undefined && exports !== null) {
    if (!Array.isArray(exports)) return null;
    for (const entry of exports) {
      const stanza = validateStanza(entry, layout);
      if (!stanza) return null;
      stanzas.push(stanza);
    }
  }

  return installName === undefined ? { stanzas } : { installName, stanzas };
}

function parseAs(content: string, layout: VersionLayout): StubExportSet | null {
  const docs = YAML.parseAllDocuments(content);

  const set: StubExportSet = {
    version: layout.version,
    symbols: [],
    objcClasses: [],
    objcIvars: [],
  };

  for (const doc of docs) {
    if (doc.errors.length > 0) {
      logDebug('stub descriptor: yaml error', layout.version, doc.errors[0]?.message);
      return null;
    }

    let data: unknown;
    try {
      data = doc.toJS();
    } catch (err) {
      // Alias expansion limits surface here rather than in doc.errors.
      logDebug('stub descriptor: conversion failed', layout.version, err);
      return null;
    }
    const parsed = validateDocument(data, layout);
    if (!parsed) {
      logDebug('stub descriptor: layout mismatch', layout.version);
      return null;
    }

    if (set.installName === undefined && parsed.installName !== undefined) {
      set.installName = parsed.installName;
    }
    for (const stanza of parsed.stanzas) {
      set.symbols.push(...stanza.symbols);
      set.objcClasses.push(...stanza.objcClasses);
      set.objcIvars.push(...stanza.objcIvars);
    }
  }

  return set;
}

/**
 * Decode a text-based stub descriptor into its flattened exports.
 *
 * Returns null when no version marker matches or every matching version fails
 * to deserialize. Never throws for bad input.
 */
export function parseStubDescriptor(content: string, source = '<input>'): StubExportSet | null {
  let matched = false;

  for (const layout of VERSIONS) {
    if (!layout.matches(content)) continue;
    matched = true;

    const set = parseAs(content, layout);
    if (set) {
      traceDebug('stubs.parsed', {
        source,
        version: set.version,
        symbols: set.symbols.length,
        classes: set.objcClasses.length,
      });
      return set;
    }
  }

  warn({
    code: 'SCHEMA_UNRECOGNIZED',
    message: matched
      ? `${source}: stub descriptor could not be deserialized`
      : `${source}: no stub descriptor version marker found`,
    hint: matched ? undefined : 'expected a document starting with --- !tapi-tbd',
  });
  return null;
}
