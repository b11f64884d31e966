import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { parseClassDump } from './classDump/index.js';
import type { ClassRecord } from './classDump/index.js';
import { logDebug } from './dx/logger.js';
import { traceInfo } from './dx/trace.js';
import { InputUnreadableError } from './errors.js';
import {
  classRecordsFromExports,
  generateFunctionBindings,
  generateModule,
  loadSignatureDatabase,
  renderModule,
} from './generator/index.js';
import type { GeneratedModule, GeneratorOptions } from './generator/index.js';
import { parseStubDescriptor } from './stubs/index.js';
import type { StubExportSet } from './stubs/index.js';

export function readInput(path: string): string {
  try {
    return readFileSync(path, 'utf8');
  } catch (err) {
    throw new InputUnreadableError(path, err);
  }
}

export function writeOutput(path: string, text: string) {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, text, 'utf8');
  logDebug('wrote', path, `${text.length} chars`);
}

export type ClassDumpResult = {
  classes: ClassRecord[];
  module: GeneratedModule;
  text: string;
};

/** Read a class dump and render its bindings module. */
export function generateFromClassDump(
  dumpPath: string,
  options: GeneratorOptions = {},
): ClassDumpResult {
  const classes = parseClassDump(readInput(dumpPath));
  traceInfo('classdump.parsed', { path: dumpPath, classes: classes.length });

  const module = generateModule(classes, options);
  return { classes, module, text: renderModule(module) };
}

/**
 * Read and decode a stub descriptor. Null means the file is not a
 * recognized descriptor; an unreadable file throws.
 */
export function parseStubDescriptorFile(path: string): StubExportSet | null {
  return parseStubDescriptor(readInput(path), path);
}

export type StubGenerationOptions = GeneratorOptions & {
  /** Emit class accessors instead of function declarations. */
  classes?: boolean;
  libraryPath?: string;
  signaturesPath?: string;
};

export function generateFromStubDescriptor(
  path: string,
  options: StubGenerationOptions = {},
): string | null {
  const set = parseStubDescriptorFile(path);
  if (!set) return null;

  if (options.classes) {
    return renderModule(generateModule(classRecordsFromExports(set), options));
  }

  const db = loadSignatureDatabase(options.signaturesPath);
  return generateFunctionBindings(set, db, {
    runtimeModule: options.runtimeModule,
    libraryPath: options.libraryPath,
  });
}
