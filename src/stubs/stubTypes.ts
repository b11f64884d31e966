export type StubVersion = 'v3' | 'v4';

/**
 * Exports of one stub descriptor, flattened across every stanza in document
 * order. Duplicates are kept.
 */
export type StubExportSet = {
  version: StubVersion;
  /** `install-name` of the first document, when present. */
  installName?: string;
  symbols: string[];
  objcClasses: string[];
  objcIvars: string[];
};

/** One `exports` stanza after layout validation. */
export type ExportStanza = {
  symbols: string[];
  objcClasses: string[];
  objcIvars: string[];
};
