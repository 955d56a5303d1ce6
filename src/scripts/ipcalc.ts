#!/usr/bin/env node
import { runIpCommand } from '../cli/commands.js';
import { createLogger } from '../logger.js';

const logger = createLogger('ipcalc');
const result = runIpCommand(process.argv.slice(2), logger);

if (result.exitCode === 0) {
	process.stdout.write(`${result.output}\n`);
} else {
	process.stderr.write(`${result.output}\n`);
}
process.exitCode = result.exitCode;
