export { parseStubDescriptor } from './parseStubDescriptor.js';
export {
  constantSymbols,
  functionSymbols,
  isConstantSymbol,
  isExcludedSymbol,
  isFunctionSymbol,
  stripSymbolPrefix,
} from './classifySymbols.js';
export type { ExportStanza, StubExportSet, StubVersion } from './stubTypes.js';
