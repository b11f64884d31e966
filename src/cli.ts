#!/usr/bin/env node

import { runCli } from './cliCommands.js';

async function main() {
	process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err: unknown) => {
	console.error(err);
	process.exit(1);
});
