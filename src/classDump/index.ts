export { parseClassDump } from './parseClassDump.js';
export type { ClassRecord, MethodRecord, PropertyRecord } from './classDumpTypes.js';
