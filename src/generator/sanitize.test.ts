import { describe, it, expect } from 'vitest';

import { NameTable } from './nameTable.js';
import { sanitizeClassName, sanitizeSelector } from './sanitize.js';

describe('selector sanitizing', () => {
  it('drops trailing colons and joins segments with underscores', () => {
    expect(sanitizeSelector('initWithString:')).toBe('initWithString');
    expect(sanitizeSelector('init:with:')).toBe('init_with');
  });

  it('suffixes reserved words', () => {
    expect(sanitizeSelector('this')).toBe('this_');
    expect(sanitizeSelector('delete:')).toBe('delete_');
    expect(sanitizeSelector('handle')).toBe('handle_');
  });

  it('prefixes a leading digit', () => {
    expect(sanitizeSelector('3dTransform')).toBe('_3dTransform');
  });

  it('replaces symbol characters', () => {
    expect(sanitizeSelector('.cxx_destruct')).toBe('cxx_destruct');
    expect(sanitizeSelector('operator+')).toBe('operatorplus');
    expect(sanitizeSelector('test-method')).toBe('test_method');
    expect(sanitizeSelector('value$')).toBe('valuedollar');
  });

  it('rejects selectors with nothing left', () => {
    expect(sanitizeSelector(':')).toBeNull();
    expect(sanitizeSelector('__')).toBeNull();
  });
});

describe('class name sanitizing', () => {
  it('substitutes disallowed characters', () => {
    expect(sanitizeClassName('MyApp.View-Controller')).toBe('MyApp_View_Controller');
    expect(sanitizeClassName('Foo+Bar')).toBe('FooPlusBar');
    expect(sanitizeClassName('Foo$Bar')).toBe('FooDollarBar');
    expect(sanitizeClassName('Foo@Bar')).toBe('FooAtBar');
    expect(sanitizeClassName('Two Words')).toBe('Two_Words');
  });

  it('rejects empty results and leading digits', () => {
    expect(sanitizeClassName('')).toBeNull();
    expect(sanitizeClassName('9Lives')).toBeNull();
    expect(sanitizeClassName('Foo<Bar>')).toBeNull();
  });
});

describe('name table', () => {
  it('numbers repeated claims from 1', () => {
    const names = new NameTable();
    expect(names.claim('foo')).toBe('foo');
    expect(names.claim('foo')).toBe('foo_1');
    expect(names.claim('foo')).toBe('foo_2');
    expect(names.claim('bar')).toBe('bar');
  });

  it('skips suffixes that are already taken', () => {
    const names = new NameTable(['foo_1']);
    expect(names.claim('foo')).toBe('foo');
    expect(names.claim('foo')).toBe('foo_2');
  });
});
