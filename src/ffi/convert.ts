function describe(v: unknown): string {
  return v === null ? 'null' : typeof v;
}

function mismatch(expected: string, v: unknown): TypeError {
  return new TypeError(`Expected ${expected} from native call, got ${describe(v)}`);
}

export function expectNumber(v: unknown): number {
  if (typeof v === 'number') return v;
  throw mismatch('number', v);
}

export function expectInteger(v: unknown): number | bigint {
  if (typeof v === 'number' || typeof v === 'bigint') return v;
  throw mismatch('integer', v);
}

export function expectBoolean(v: unknown): boolean {
  if (typeof v === 'boolean') return v;
  throw mismatch('boolean', v);
}

export function expectCString(v: unknown): string | null {
  if (v === null || typeof v === 'string') return v;
  throw mismatch('string', v);
}

export function expectStruct<T>(guard: (v: unknown) => v is T, v: unknown): T {
  if (guard(v)) return v;
  throw mismatch(`${guard.name.replace(/^is/, '')} struct`, v);
}
