import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { FfigenError, InputUnreadableError } from '../errors.js';

export type FunctionParam = {
  name: string;
  /** koffi type token. */
  type: string;
};

export type FunctionSignature = {
  name: string;
  returns: string;
  params: FunctionParam[];
  variadic: boolean;
};

export type SignatureDatabase = ReadonlyMap<string, FunctionSignature>;

export const DEFAULT_SIGNATURE_DATABASE = fileURLToPath(
  new URL('../../data/foundation-signatures.json', import.meta.url),
);

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function invalid(path: string, detail: string): FfigenError {
  return new FfigenError(
    'INVALID_SIGNATURE_DATABASE',
    `Invalid signature database ${path}: ${detail}`,
  );
}

function parseParam(raw: unknown, where: string, path: string): FunctionParam {
  if (!isRecord(raw) || typeof raw.name !== 'string' || typeof raw.type !== 'string') {
    throw invalid(path, `${where} must be {name, type}`);
  }
  return { name: raw.name, type: raw.type };
}

function parseSignature(raw: unknown, index: number, path: string): FunctionSignature {
  const where = `functions[${index}]`;
  if (!isRecord(raw)) throw invalid(path, `${where} must be an object`);

  const { name, returns, params, variadic } = raw;
  if (typeof name !== 'string' || !name) throw invalid(path, `${where}.name must be a string`);
  if (typeof returns !== 'string' || !returns) {
    throw invalid(path, `${where}.returns must be a string`);
  }
  if (!Array.isArray(params)) throw invalid(path, `${where}.params must be an array`);
  if (variadic !== undefined && typeof variadic !== 'boolean') {
    throw invalid(path, `${where}.variadic must be a boolean`);
  }

  return {
    name,
    returns,
    params: params.map((p: unknown, i) => parseParam(p, `${where}.params[${i}]`, path)),
    variadic: variadic ?? false,
  };
}

/**
 * Validate the parsed JSON of a signature database. Later entries replace
 * earlier ones with the same name.
 */
export function parseSignatureDatabase(raw: unknown, path = '<inline>'): SignatureDatabase {
  if (!isRecord(raw) || !Array.isArray(raw.functions)) {
    throw invalid(path, 'expected an object with a "functions" array');
  }

  const db = new Map<string, FunctionSignature>();
  raw.functions.forEach((entry: unknown, i) => {
    const sig = parseSignature(entry, i, path);
    db.set(sig.name, sig);
  });
  return db;
}

export function loadSignatureDatabase(path: string = DEFAULT_SIGNATURE_DATABASE): SignatureDatabase {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw new InputUnreadableError(path, err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new FfigenError('INVALID_SIGNATURE_DATABASE', `Invalid signature database ${path}: not JSON`, {
      cause: err,
    });
  }
  return parseSignatureDatabase(raw, path);
}
