import type { Logger } from 'pino';
import { z } from 'zod';

import { formatCidr, formatIp } from '../ip/address.js';
import { containsCidr, containsIp, isCidrOverlap } from '../ip/cidr.js';
import { parseCidr, parseIp } from '../ip/parse.js';
import { nextIp, prevIp } from '../ip/step.js';
import type { IpResult } from '../ip/types.js';
import { parseUint } from '../ip/util.js';

export const IP_COMMANDS = [
	'parse-ip',
	'parse-cidr',
	'contains-cidr',
	'contains-ip',
	'overlap',
	'next',
	'prev',
] as const;
const IpCommandSchema = z.enum(IP_COMMANDS);
export type IpCommand = z.infer<typeof IpCommandSchema>;

// Operands expected after the version argument
const OPERAND_COUNT: Record<IpCommand, number> = {
	'parse-ip': 1,
	'parse-cidr': 1,
	'contains-cidr': 2,
	'contains-ip': 2,
	overlap: 2,
	next: 1,
	prev: 1,
};

export const USAGE = `usage: ipcalc <${IP_COMMANDS.join('|')}> <4|6> <operand...>`;

export type CommandResult = {
	exitCode: 0 | 1 | 2;
	output: string;
};

function render<T, N>(result: IpResult<T, N>, format: (value: T) => string): IpResult<string> {
	if (!result.ok) return { ok: false, error: result.error, value: null };
	return { ok: true, value: format(result.value) };
}

function execute(command: IpCommand, version: number, operands: ReadonlyArray<string>): IpResult<string> {
	const [first = '', second = ''] = operands;

	switch (command) {
		case 'parse-ip':
			return render(parseIp(version, first, false), (block) => formatIp(block.base));
		case 'parse-cidr':
			return render(parseCidr(version, first), formatCidr);
		case 'contains-cidr':
			return render(containsCidr(version, first, second), String);
		case 'contains-ip':
			return render(containsIp(version, first, second), String);
		case 'overlap':
			return render(isCidrOverlap(version, first, second), String);
		case 'next':
			return render(parseIp(version, first, false), (block) => formatIp(nextIp(block.base)));
		case 'prev':
			return render(parseIp(version, first, false), (block) => formatIp(prevIp(block.base)));
	}
}

/**
 * Runs one `ipcalc` invocation. `args` excludes the node and script paths.
 */
export function runIpCommand(args: ReadonlyArray<string>, logger: Logger): CommandResult {
	const [name, versionArg, ...operands] = args;

	const command = IpCommandSchema.safeParse(name);
	if (!command.success || versionArg === undefined || operands.length !== OPERAND_COUNT[command.data]) {
		return { exitCode: 2, output: USAGE };
	}

	// NaN fails the version guard
	const version = parseUint(versionArg, 1) ?? Number.NaN;
	const result = execute(command.data, version, operands);

	if (!result.ok) {
		logger.warn({ command: command.data, version: versionArg, operands, code: result.error.code }, 'Command failed');
		return { exitCode: 1, output: `error: ${result.error.code}` };
	}

	logger.debug({ command: command.data, version, operands, output: result.value }, 'Command succeeded');
	return { exitCode: 0, output: result.value };
}
