import koffi from 'koffi';

import { logDebug } from '../dx/logger.js';
import type { ForeignFunction, ForeignLibrary, LibraryLoader } from './ffiTypes.js';

export function loadLibrary(libPath: string): ForeignLibrary {
  try {
    return koffi.load(libPath);
  } catch (err) {
    throw new Error(`Failed to load native library: ${libPath}`, { cause: err });
  }
}

/**
 * A library handle that opens `libPath` and binds each function on first
 * call. Declaring functions never touches the disk.
 */
export function lazyLibrary(libPath: string, load: LibraryLoader = loadLibrary): ForeignLibrary {
  let lib: ForeignLibrary | undefined;

  const open = () => {
    if (!lib) {
      logDebug('open library', libPath);
      lib = load(libPath);
    }
    return lib;
  };

  return {
    func(name, result, args) {
      let bound: ForeignFunction | undefined;
      return (...callArgs: unknown[]) => {
        bound ??= open().func(name, result, args);
        return bound(...callArgs);
      };
    },
  };
}
