/** Receiver handle of a runtime object. */
export type id = unknown;
/** Handle of a runtime class object. */
export type Class = unknown;
/** Registered selector handle. */
export type SEL = unknown;

export type ForeignFunction = (...args: unknown[]) => unknown;

/**
 * The slice of a koffi library handle the runtime relies on. Tests pass
 * in-process fakes with the same shape.
 */
export type ForeignLibrary = {
  func(name: string, result: string, args: string[]): ForeignFunction;
};

export type LibraryLoader = (libPath: string) => ForeignLibrary;

export type DispatchEntry = 'objc_msgSend' | 'objc_msgSend_stret' | 'objc_msgSend_fpret';

export type ObjcLibraries = {
  objc: ForeignLibrary;
  foundation: ForeignLibrary;
};
