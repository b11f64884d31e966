import { basename, extname, join } from 'node:path';

import { loadOptionalConfig } from './dx/config.js';
import type { FfigenConfig } from './dx/config.js';
import { setDebugEnabled } from './dx/logger.js';
import { traceError } from './dx/trace.js';
import { FfigenError } from './errors.js';
import {
	generateFromClassDump,
	generateFromStubDescriptor,
	parseStubDescriptorFile,
	writeOutput,
} from './pipeline.js';
import { constantSymbols, functionSymbols } from './stubs/index.js';

export type CliIO = {
	out(text: string): void;
	err(text: string): void;
};

const consoleIO: CliIO = {
	// eslint-disable-next-line no-console
	out: (text) => console.log(text),
	// eslint-disable-next-line no-console
	err: (text) => console.error(text),
};

function getFlagValue(argv: string[], name: string): string | undefined {
	const idx = argv.indexOf(name);
	if (idx === -1) return undefined;
	return argv[idx + 1];
}

function hasFlag(argv: string[], name: string): boolean {
	return argv.includes(name);
}

export function usage() {
	return `objc-ffigen

Usage:
	objc-ffigen generate <dump> [--out <file>] [--runtime <module>] [--string-class <name>]
	objc-ffigen stubs <file.tbd> [--out <file>] [--classes] [--library <path>] [--signatures <file>] [--runtime <module>]
	objc-ffigen classify <file.tbd> [--json]

Examples:
	objc-ffigen generate Foundation.classdump --out gen/foundation.ts
	objc-ffigen stubs Foundation.tbd --out gen/foundation-functions.ts
	objc-ffigen classify Foundation.tbd --json

Notes:
	- Without --out, output goes to stdout (or to outDir from objc-ffigen.config.js)
	- Pass --debug (or set OBJC_FFIGEN_DEBUG=1) to print skipped methods and classes
`;
}

function fmtOk(msg: string) {
	return `\u2713 ${msg}`;
}

function fmtFail(msg: string) {
	return `\u2717 ${msg}`;
}

function outputPath(argv: string[], input: string, config: FfigenConfig | null): string | undefined {
	const explicit = getFlagValue(argv, '--out');
	if (explicit) return explicit;
	if (!config?.outDir) return undefined;
	return join(config.outDir, `${basename(input, extname(input))}.ts`);
}

function emit(io: CliIO, text: string, out: string | undefined) {
	if (out) {
		writeOutput(out, text);
		io.err(fmtOk(`Wrote ${out}`));
	} else {
		io.out(text);
	}
}

/**
 * Run one CLI invocation. `argv` excludes the node binary and script path.
 * Resolves to the process exit code.
 */
export async function runCli(
	argv: string[],
	io: CliIO = consoleIO,
	projectRoot: string = process.cwd(),
): Promise<number> {
	const [cmd, input] = argv;

	if (!cmd || cmd === '--help' || cmd === '-h') {
		io.out(usage());
		return cmd ? 0 : 1;
	}

	const config = await loadOptionalConfig(projectRoot);
	if (config?.debug || hasFlag(argv, '--debug')) setDebugEnabled(true);

	const runtimeModule = getFlagValue(argv, '--runtime') ?? config?.runtimeModule;

	try {
		if (cmd === 'generate') {
			if (!input) {
				io.err('Missing class dump path');
				return 1;
			}
			const { module, text } = generateFromClassDump(input, {
				runtimeModule,
				stringClassName: getFlagValue(argv, '--string-class') ?? config?.stringClassName,
			});
			emit(io, text, outputPath(argv, input, config));
			const skipped = module.units.reduce((n, u) => n + u.skippedMethods, 0);
			io.err(fmtOk(`${module.units.length} classes, ${skipped} methods skipped`));
			return 0;
		}

		if (cmd === 'stubs') {
			if (!input) {
				io.err('Missing stub descriptor path');
				return 1;
			}
			const text = generateFromStubDescriptor(input, {
				classes: hasFlag(argv, '--classes'),
				libraryPath: getFlagValue(argv, '--library'),
				signaturesPath: getFlagValue(argv, '--signatures'),
				runtimeModule,
				stringClassName: config?.stringClassName,
			});
			if (text === null) {
				io.err(fmtFail(`Not a recognized stub descriptor: ${input}`));
				return 1;
			}
			emit(io, text, outputPath(argv, input, config));
			return 0;
		}

		if (cmd === 'classify') {
			if (!input) {
				io.err('Missing stub descriptor path');
				return 1;
			}
			const set = parseStubDescriptorFile(input);
			if (!set) {
				io.err(fmtFail(`Not a recognized stub descriptor: ${input}`));
				return 1;
			}
			const functions = functionSymbols(set);
			const constants = constantSymbols(set);
			if (hasFlag(argv, '--json')) {
				io.out(
					JSON.stringify(
						{
							version: set.version,
							installName: set.installName ?? null,
							functions,
							constants,
							classes: set.objcClasses,
							ivars: set.objcIvars,
						},
						null,
						2,
					),
				);
			} else {
				io.out(`Version: ${set.version}`);
				if (set.installName) io.out(`Install name: ${set.installName}`);
				io.out(`Functions (${functions.length}): ${functions.join(', ')}`);
				io.out(`Constants (${constants.length}): ${constants.join(', ')}`);
				io.out(`Classes (${set.objcClasses.length}): ${set.objcClasses.join(', ')}`);
			}
			return 0;
		}
	} catch (err) {
		if (err instanceof FfigenError) {
			traceError('cli.failed', { command: cmd, code: err.code });
			io.err(fmtFail(err.message));
			return 1;
		}
		throw err;
	}

	io.err(`Unknown command: ${cmd}`);
	io.out(usage());
	return 1;
}
