import { describe, it, expect } from 'vitest';

import { parseClassDump } from './index.js';

describe('class dump parser', () => {
  it('parses a single interface with superclass and one method', () => {
    const dump = [
      '@interface Foo',
      'Superclass: Bar',
      'Methods (1):',
      '    - baz [v16@0:8]',
      '@end',
    ].join('\n');

    expect(parseClassDump(dump)).toEqual([
      {
        name: 'Foo',
        superclass: 'Bar',
        methods: [{ selector: 'baz', encoding: 'v16@0:8' }],
        properties: [],
      },
    ]);
  });

  it('flushes the open record when the next interface starts', () => {
    const dump = [
      '@interface A',
      'Methods (1):',
      '- one [v16@0:8]',
      '@interface B',
      '- ignored [v16@0:8]',
      'Methods (1):',
      '- two [@16@0:8]',
    ].join('\n');

    const classes = parseClassDump(dump);
    expect(classes.map((c) => c.name)).toEqual(['A', 'B']);
    expect(classes[0]?.methods).toEqual([{ selector: 'one', encoding: 'v16@0:8' }]);
    expect(classes[1]?.methods).toEqual([{ selector: 'two', encoding: '@16@0:8' }]);
  });

  it('keeps the record open after @end until end of input', () => {
    const dump = ['@interface Foo', '@end', 'Superclass: Late'].join('\n');
    expect(parseClassDump(dump)).toEqual([
      { name: 'Foo', superclass: 'Late', methods: [], properties: [] },
    ]);
  });

  it('lets the last superclass line win', () => {
    const dump = ['@interface Foo', 'Superclass: First', 'Superclass: Second'].join('\n');
    expect(parseClassDump(dump)[0]?.superclass).toBe('Second');
  });

  it('ignores method lines outside a methods section', () => {
    const dump = [
      '@interface Foo',
      '- early [v16@0:8]',
      'Methods (1):',
      '- kept [v16@0:8]',
      '@end',
      '- late [v16@0:8]',
    ].join('\n');

    expect(parseClassDump(dump)[0]?.methods.map((m) => m.selector)).toEqual(['kept']);
  });

  it('drops method lines without a bracketed encoding', () => {
    const dump = ['@interface Foo', 'Methods (2):', '- broken', '- ok [v16@0:8]'].join('\n');
    expect(parseClassDump(dump)[0]?.methods).toEqual([{ selector: 'ok', encoding: 'v16@0:8' }]);
  });

  it('splits on the first bracket only', () => {
    const dump = ['@interface Foo', 'Methods (1):', '- initWithString:length: [@32@0:8@16Q24]'].join(
      '\n',
    );
    expect(parseClassDump(dump)[0]?.methods).toEqual([
      { selector: 'initWithString:length:', encoding: '@32@0:8@16Q24' },
    ]);
  });

  it('records properties in a properties section', () => {
    const dump = [
      '@interface Foo',
      'Properties (2):',
      '    @property title [T@"NSString",R,C,N]',
      '    @property hidden',
      'Methods (1):',
      '    - title [@16@0:8]',
      '@end',
    ].join('\n');

    const [foo] = parseClassDump(dump);
    expect(foo?.properties).toEqual([
      { name: 'title', attributes: 'T@"NSString",R,C,N' },
      { name: 'hidden', attributes: '' },
    ]);
    expect(foo?.methods).toHaveLength(1);
  });

  it('ignores property lines while in a methods section', () => {
    const dump = ['@interface Foo', 'Methods (0):', '@property title [T@]'].join('\n');
    expect(parseClassDump(dump)[0]?.properties).toEqual([]);
  });

  it('ignores content before the first interface', () => {
    const dump = ['Superclass: Nobody', 'Methods (1):', '- orphan [v16@0:8]', 'noise'].join('\n');
    expect(parseClassDump(dump)).toEqual([]);
  });

  it('handles CRLF line endings', () => {
    const dump = '@interface Foo\r\nMethods (1):\r\n- baz [v16@0:8]\r\n@end\r\n';
    expect(parseClassDump(dump)[0]?.methods).toEqual([{ selector: 'baz', encoding: 'v16@0:8' }]);
  });
});
