export type FfigenErrorCode =
  | 'INPUT_UNREADABLE'
  | 'INVALID_SIGNATURE_DATABASE'
  | 'MISSING_LIBRARY_PATH';

export class FfigenError extends Error {
  override name = 'FfigenError';
  readonly code: FfigenErrorCode;

  constructor(code: FfigenErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

/**
 * The driver could not read an input file. Fatal for that document only.
 */
export class InputUnreadableError extends FfigenError {
  override name = 'InputUnreadableError';
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super('INPUT_UNREADABLE', `Cannot read input file ${path}${reason}`, { cause });
    this.path = path;
  }
}
