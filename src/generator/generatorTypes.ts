export type GeneratorOptions = {
  /** Module the generated code imports its runtime helpers from. */
  runtimeModule?: string;
  /** Class that also gets `fromString` and `utf8String`. */
  stringClassName?: string;
};

export type GeneratedUnit = {
  /** Class name as found in the dump. */
  className: string;
  /** Identifier the class is exported under. */
  identifier: string;
  text: string;
  emittedMethods: number;
  skippedMethods: number;
};

export type GeneratedModule = {
  preamble: string;
  units: GeneratedUnit[];
};

export const DEFAULT_RUNTIME_MODULE = 'objc-ffigen/runtime';
export const DEFAULT_STRING_CLASS = 'NSString';
