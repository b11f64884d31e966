export type LogLevel = 'debug' | 'warn';

const PREFIX = '[objc-ffigen]';

let enabled = false;

export function isDebugEnabled(): boolean {
  return enabled || process.env.OBJC_FFIGEN_DEBUG === '1';
}

/**
 * Turn debug output on or off for the rest of the process.
 *
 * The CLI calls this for `--debug` and for `debug: true` in the config file.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

function emit(level: LogLevel, args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  if (level === 'warn') console.warn(PREFIX, ...args);
  // eslint-disable-next-line no-console
  else console.log(PREFIX, ...args);
}

/** Parser and generator internals: version fallbacks, layout mismatches. */
export function logDebug(...args: unknown[]) {
  emit('debug', args);
}

/** Skipped classes and methods, unrecognized descriptors. */
export function logWarn(...args: unknown[]) {
  emit('warn', args);
}
