import { traceDebug } from '../dx/trace.js';
import { loadLibrary } from './createLibrary.js';
import type {
  Class,
  DispatchEntry,
  ForeignFunction,
  LibraryLoader,
  ObjcLibraries,
  SEL,
} from './ffiTypes.js';

export const OBJC_LIBRARY_PATH = '/usr/lib/libobjc.A.dylib';
export const FOUNDATION_LIBRARY_PATH =
  '/System/Library/Frameworks/Foundation.framework/Foundation';

export type ObjcRuntime = {
  libraries: ObjcLibraries;
  getClass(name: string): Class;
  selector(name: string): SEL;
  dispatch(entry: DispatchEntry, returns: string, args: string[]): ForeignFunction;
};

/**
 * Runtime helpers over already opened libraries. Dispatch prototypes are
 * cached per (entry, return type, argument types); selectors per name.
 */
export function createObjcRuntime(libraries: ObjcLibraries): ObjcRuntime {
  const { objc } = libraries;
  let objcGetClass: ForeignFunction | undefined;
  let selRegisterName: ForeignFunction | undefined;
  const selectors = new Map<string, SEL>();
  const prototypes = new Map<string, ForeignFunction>();

  return {
    libraries,

    getClass(name) {
      objcGetClass ??= objc.func('objc_getClass', 'void *', ['const char *']);
      return objcGetClass(name);
    },

    selector(name) {
      if (selectors.has(name)) return selectors.get(name);
      selRegisterName ??= objc.func('sel_registerName', 'void *', ['const char *']);
      const sel = selRegisterName(name);
      selectors.set(name, sel);
      return sel;
    },

    dispatch(entry, returns, args) {
      const key = `${entry}|${returns}|${args.join(',')}`;
      let fn = prototypes.get(key);
      if (!fn) {
        traceDebug('ffi.dispatch.bind', { entry, returns, args });
        fn = objc.func(entry, returns, ['void *', 'void *', ...args]);
        prototypes.set(key, fn);
      }
      return fn;
    },
  };
}

let shared: ObjcRuntime | undefined;

/**
 * Process-wide runtime over the system libobjc and Foundation, opened on
 * first use. Foundation is loaded so its classes are registered before any
 * lookup.
 */
export function openObjcRuntime(load: LibraryLoader = loadLibrary): ObjcRuntime {
  shared ??= createObjcRuntime({
    objc: load(OBJC_LIBRARY_PATH),
    foundation: load(FOUNDATION_LIBRARY_PATH),
  });
  return shared;
}

/** For tests only. */
export function __resetObjcRuntimeForTests() {
  shared = undefined;
}

export function getClass(name: string): Class {
  return openObjcRuntime().getClass(name);
}

export function selector(name: string): SEL {
  return openObjcRuntime().selector(name);
}

export function dispatch(entry: DispatchEntry, returns: string, args: string[]): ForeignFunction {
  return openObjcRuntime().dispatch(entry, returns, args);
}

/** Declare a Foundation C function; it binds on first call. */
export function foundationFunction(name: string, result: string, args: string[]): ForeignFunction {
  let bound: ForeignFunction | undefined;
  return (...callArgs: unknown[]) => {
    bound ??= openObjcRuntime().libraries.foundation.func(name, result, args);
    return bound(...callArgs);
  };
}
