import type { ClassRecord } from '../classDump/index.js';
import type { StubExportSet } from '../stubs/index.js';

/**
 * Accessor-only class records for the classes a stub descriptor exports,
 * in descriptor order with repeats dropped.
 */
export function classRecordsFromExports(set: StubExportSet): ClassRecord[] {
  const seen = new Set<string>();
  const records: ClassRecord[] = [];
  for (const name of set.objcClasses) {
    if (seen.has(name)) continue;
    seen.add(name);
    records.push({ name, methods: [], properties: [] });
  }
  return records;
}
