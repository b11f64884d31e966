import { describe, it, expect, afterEach } from 'vitest';
import koffi from 'koffi';

import { FOUNDATION_STRUCTS } from '../generator/typeMap.js';
import { expectCString, expectInteger, expectNumber, expectStruct } from './convert.js';
import { lazyLibrary, loadLibrary } from './createLibrary.js';
import type { ForeignLibrary } from './ffiTypes.js';
import { isCGPoint, isCGRect, isNSRange, registerFoundationStructs } from './foundationStructs.js';
import {
  FOUNDATION_LIBRARY_PATH,
  OBJC_LIBRARY_PATH,
  __resetObjcRuntimeForTests,
  createObjcRuntime,
  openObjcRuntime,
} from './runtime.js';

type Binding = { name: string; result: string; args: string[] };

function fakeLibrary() {
  const bindings: Binding[] = [];
  const calls: Array<{ name: string; args: unknown[] }> = [];
  const lib: ForeignLibrary = {
    func(name, result, args) {
      bindings.push({ name, result, args });
      return (...callArgs: unknown[]) => {
        calls.push({ name, args: callArgs });
        return { from: name, args: callArgs };
      };
    },
  };
  return { lib, bindings, calls };
}

describe('objc runtime', () => {
  afterEach(() => {
    __resetObjcRuntimeForTests();
  });

  it('looks classes up through objc_getClass, binding it once', () => {
    const objc = fakeLibrary();
    const runtime = createObjcRuntime({ objc: objc.lib, foundation: fakeLibrary().lib });

    expect(runtime.getClass('NSString')).toEqual({ from: 'objc_getClass', args: ['NSString'] });
    runtime.getClass('NSArray');
    expect(objc.bindings).toEqual([
      { name: 'objc_getClass', result: 'void *', args: ['const char *'] },
    ]);
  });

  it('registers each selector once', () => {
    const objc = fakeLibrary();
    const runtime = createObjcRuntime({ objc: objc.lib, foundation: fakeLibrary().lib });

    const first = runtime.selector('init');
    expect(runtime.selector('init')).toBe(first);
    runtime.selector('copy');
    expect(objc.calls.map((c) => c.args)).toEqual([['init'], ['copy']]);
  });

  it('caches dispatch prototypes by entry, return and argument types', () => {
    const objc = fakeLibrary();
    const runtime = createObjcRuntime({ objc: objc.lib, foundation: fakeLibrary().lib });

    const a = runtime.dispatch('objc_msgSend', 'void', ['int32_t']);
    expect(runtime.dispatch('objc_msgSend', 'void', ['int32_t'])).toBe(a);
    expect(runtime.dispatch('objc_msgSend', 'bool', ['int32_t'])).not.toBe(a);
    runtime.dispatch('objc_msgSend_fpret', 'double', []);

    expect(objc.bindings).toEqual([
      { name: 'objc_msgSend', result: 'void', args: ['void *', 'void *', 'int32_t'] },
      { name: 'objc_msgSend', result: 'bool', args: ['void *', 'void *', 'int32_t'] },
      { name: 'objc_msgSend_fpret', result: 'double', args: ['void *', 'void *'] },
    ]);
  });

  it('opens the system libraries once per process', () => {
    const opened: string[] = [];
    const loader = (libPath: string) => {
      opened.push(libPath);
      return fakeLibrary().lib;
    };

    const runtime = openObjcRuntime(loader);
    expect(openObjcRuntime(loader)).toBe(runtime);
    expect(opened).toEqual([OBJC_LIBRARY_PATH, FOUNDATION_LIBRARY_PATH]);
  });
});

describe('library loading', () => {
  it('defers opening until the first call', () => {
    const fake = fakeLibrary();
    let loads = 0;
    const lib = lazyLibrary('/opt/demo.dylib', () => {
      loads++;
      return fake.lib;
    });

    const add = lib.func('add', 'int', ['int', 'int']);
    expect(loads).toBe(0);

    expect(add(2, 3)).toEqual({ from: 'add', args: [2, 3] });
    add(4, 5);
    expect(loads).toBe(1);
    expect(fake.bindings).toEqual([{ name: 'add', result: 'int', args: ['int', 'int'] }]);
  });

  it('names the path when a library cannot be opened', () => {
    expect(() => loadLibrary('/nonexistent/libnothing.dylib')).toThrow(
      'Failed to load native library: /nonexistent/libnothing.dylib',
    );
  });
});

describe('foundation structs', () => {
  it('registers every struct the generator names', () => {
    registerFoundationStructs();
    registerFoundationStructs();

    expect(koffi.sizeof('NSRange')).toBe(16);
    expect(koffi.sizeof('CGRect')).toBe(32);
    expect(koffi.sizeof('NSDecimal')).toBe(20);
    expect(koffi.sizeof('NSFastEnumerationState')).toBe(64);
    for (const name of FOUNDATION_STRUCTS) {
      expect(koffi.sizeof(name)).toBeGreaterThan(0);
    }
  });

  it('recognizes decoded struct values', () => {
    expect(isNSRange({ location: 1, length: 2n })).toBe(true);
    expect(isCGRect({ origin: { x: 0, y: 0 }, size: { width: 3, height: 4 } })).toBe(true);
    expect(isCGRect({ origin: { x: 0 }, size: { width: 3, height: 4 } })).toBe(false);
  });
});

describe('return conversions', () => {
  it('passes matching values through', () => {
    expect(expectNumber(1.5)).toBe(1.5);
    expect(expectInteger(9n)).toBe(9n);
    expect(expectCString(null)).toBeNull();
    expect(expectStruct(isCGPoint, { x: 1, y: 2 })).toEqual({ x: 1, y: 2 });
  });

  it('throws on a type mismatch', () => {
    expect(() => expectNumber('1')).toThrow('Expected number from native call, got string');
    expect(() => expectStruct(isCGPoint, null)).toThrow(
      'Expected CGPoint struct from native call, got null',
    );
  });
});
