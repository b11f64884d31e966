import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { logDebug } from './logger.js';

export const CONFIG_FILE_NAME = 'objc-ffigen.config.js';

export type FfigenConfig = {
  /** Enable debug logs without env var */
  debug?: boolean;
  /** Module specifier generated bindings import the runtime from */
  runtimeModule?: string;
  /** Class that receives the fromString/utf8String convenience methods */
  stringClassName?: string;
  /** Default directory for generated files when --out is not given */
  outDir?: string;
};

let cached:
  | { loaded: true; config: FfigenConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, CONFIG_FILE_NAME);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function pickString(
  source: Record<string, unknown>,
  key: keyof FfigenConfig,
  path: string,
): string | undefined {
  const v = source[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'string' || v.length === 0) {
    throw new Error(`Invalid ${CONFIG_FILE_NAME} at ${path}: "${key}" must be a non-empty string`);
  }
  return v;
}

/**
 * Validate a config module's export. Unknown keys are ignored.
 */
export function normalizeConfig(raw: unknown, path = CONFIG_FILE_NAME): FfigenConfig {
  if (!isRecord(raw)) {
    throw new Error(`Invalid ${CONFIG_FILE_NAME} at ${path}: expected an object export`);
  }

  const config: FfigenConfig = {};
  if (raw.debug !== undefined) {
    if (typeof raw.debug !== 'boolean') {
      throw new Error(`Invalid ${CONFIG_FILE_NAME} at ${path}: "debug" must be a boolean`);
    }
    config.debug = raw.debug;
  }

  const runtimeModule = pickString(raw, 'runtimeModule', path);
  if (runtimeModule) config.runtimeModule = runtimeModule;
  const stringClassName = pickString(raw, 'stringClassName', path);
  if (stringClassName) config.stringClassName = stringClassName;
  const outDir = pickString(raw, 'outDir', path);
  if (outDir) config.outDir = outDir;

  return config;
}

/**
 * Loads optional `objc-ffigen.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<FfigenConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  // Dynamic import so there is zero cost when config isn't present.
  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const exported = isRecord(mod) && 'default' in mod ? mod.default : mod;
  const config = normalizeConfig(exported, p);
  cached = { loaded: true, config };
  logDebug('loaded config', { path: p });
  return config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
