import { logWarn } from './logger.js';
import { traceWarn } from './trace.js';

export type FfigenWarningCode =
  | 'SCHEMA_UNRECOGNIZED'
  | 'MALFORMED_SIGNATURE'
  | 'UNRENDERABLE_IDENTIFIER';

export type FfigenWarning = {
  code: FfigenWarningCode;
  message: string;
  hint?: string;
};

/**
 * Emit a non-fatal warning.
 *
 * This must never throw. It prints only with debug logging enabled and
 * traces at the `warn` level.
 */
export function warn(w: FfigenWarning) {
  try {
    const hint = w.hint ? ` Hint: ${w.hint}` : '';
    logWarn(`warning(${w.code}): ${w.message}${hint}`);
    traceWarn('warning', { code: w.code, message: w.message });
  } catch {
    // Never throw from warnings.
  }
}
