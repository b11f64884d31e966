import { describe, it, expect, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runCli } from './cliCommands.js';
import { __resetConfigCacheForTests } from './dx/config.js';
import { setDebugEnabled } from './dx/logger.js';

const sampleDump = fileURLToPath(new URL('../examples/sample.classdump', import.meta.url));
const sampleTbd = fileURLToPath(new URL('../examples/sample.tbd', import.meta.url));

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: { out: (t: string) => out.push(t), err: (t: string) => err.push(t) },
    out,
    err,
  };
}

function emptyProject() {
  return mkdtempSync(join(tmpdir(), 'objc-ffigen-cli-'));
}

describe('cli', () => {
  const prevTrace = process.env.OBJC_FFIGEN_TRACE;

  afterEach(() => {
    __resetConfigCacheForTests();
    setDebugEnabled(false);
    vi.restoreAllMocks();
    if (prevTrace == null) delete process.env.OBJC_FFIGEN_TRACE;
    else process.env.OBJC_FFIGEN_TRACE = prevTrace;
  });

  it('prints usage and fails without a command', async () => {
    const c = capture();
    expect(await runCli([], c.io, emptyProject())).toBe(1);
    expect(c.out[0]).toContain('objc-ffigen generate <dump>');
  });

  it('rejects unknown commands', async () => {
    const c = capture();
    expect(await runCli(['bogus'], c.io, emptyProject())).toBe(1);
    expect(c.err).toEqual(['Unknown command: bogus']);
  });

  it('writes generated bindings to --out', async () => {
    const root = emptyProject();
    const target = join(root, 'gen', 'bindings.ts');
    const c = capture();

    expect(await runCli(['generate', sampleDump, '--out', target], c.io, root)).toBe(0);
    expect(readFileSync(target, 'utf8')).toContain('export class Greeter {');
    expect(c.err).toEqual([`✓ Wrote ${target}`, '✓ 2 classes, 0 methods skipped']);
    expect(c.out).toEqual([]);
  });

  it('prints to stdout without --out and honors --runtime', async () => {
    const c = capture();
    expect(await runCli(['generate', sampleDump, '--runtime', './rt.js'], c.io, emptyProject())).toBe(
      0,
    );
    expect(c.out[0]).toContain("} from './rt.js';");
  });

  it('uses outDir from the project config', async () => {
    const root = emptyProject();
    writeFileSync(join(root, 'package.json'), '{"type":"module"}\n', 'utf8');
    writeFileSync(
      join(root, 'objc-ffigen.config.js'),
      `export default { outDir: ${JSON.stringify(join(root, 'out'))} };\n`,
      'utf8',
    );
    const c = capture();

    expect(await runCli(['generate', sampleDump], c.io, root)).toBe(0);
    expect(existsSync(join(root, 'out', 'sample.ts'))).toBe(true);
  });

  it('fails on unreadable input', async () => {
    const c = capture();
    expect(await runCli(['generate', '/nonexistent/x.classdump'], c.io, emptyProject())).toBe(1);
    expect(c.err[0]?.startsWith('✗ Cannot read input file /nonexistent/x.classdump')).toBe(
      true,
    );
  });

  it('traces handled failures at the error level', async () => {
    process.env.OBJC_FFIGEN_TRACE = '1';
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const c = capture();

    expect(await runCli(['generate', '/nonexistent/x.classdump'], c.io, emptyProject())).toBe(1);
    const lines = spy.mock.calls
      .filter((call) => call[0] === '[objc-ffigen:trace]')
      .map((call): unknown => JSON.parse(String(call[1])));
    expect(lines).toEqual([
      expect.objectContaining({
        level: 'error',
        event: 'cli.failed',
        data: { command: 'generate', code: 'INPUT_UNREADABLE' },
      }),
    ]);
  });

  it('fails when a file is not a stub descriptor', async () => {
    const c = capture();
    expect(await runCli(['stubs', sampleDump], c.io, emptyProject())).toBe(1);
    expect(c.err).toEqual([`✗ Not a recognized stub descriptor: ${sampleDump}`]);
  });

  it('classifies descriptor symbols as JSON', async () => {
    const c = capture();
    expect(await runCli(['classify', sampleTbd, '--json'], c.io, emptyProject())).toBe(0);

    const parsed: unknown = JSON.parse(c.out[0] ?? '');
    expect(parsed).toEqual({
      version: 'v3',
      installName: '/System/Library/Frameworks/Foundation.framework/Foundation',
      functions: [
        '_NSLog',
        '_NSStringFromClass',
        '_NSSampleHelper',
        '_NSFOUNDATION_VERSION',
        '_sample_reset',
      ],
      constants: ['_kSampleVersion', '_NSFOUNDATION_VERSION'],
      classes: ['Greeter', 'NSString'],
      ivars: ['Greeter._name'],
    });
  });

  it('classifies descriptor symbols as text', async () => {
    const c = capture();
    expect(await runCli(['classify', sampleTbd], c.io, emptyProject())).toBe(0);
    expect(c.out).toContain('Constants (2): _kSampleVersion, _NSFOUNDATION_VERSION');
  });
});
