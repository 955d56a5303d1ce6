import type { Logger } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { USAGE, runIpCommand } from './commands.js';

function makeLogger(): Logger {
	return {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
		trace: vi.fn(),
		fatal: vi.fn(),
		child: vi.fn(),
		level: 'info',
		silent: vi.fn(),
		isLevelEnabled: vi.fn(),
	} as unknown as Logger;
}

describe('runIpCommand', () => {
	it('prints the masked network of a CIDR', () => {
		expect(runIpCommand(['parse-cidr', '4', '172.18.40.40/24'], makeLogger())).toEqual({
			exitCode: 0,
			output: '172.18.40.0/24',
		});
		expect(runIpCommand(['parse-cidr', '6', 'abcd:1234::1/120'], makeLogger())).toEqual({
			exitCode: 0,
			output: 'abcd:1234::/120',
		});
	});

	it('prints the canonical form of an address', () => {
		expect(runIpCommand(['parse-ip', '6', 'ABCD:1234:0:0::1'], makeLogger())).toEqual({
			exitCode: 0,
			output: 'abcd:1234::1',
		});
	});

	it('answers containment and overlap questions', () => {
		const logger = makeLogger();
		expect(runIpCommand(['contains-cidr', '4', '172.18.40.0/24', '172.18.40.0/25'], logger).output).toBe('true');
		expect(runIpCommand(['contains-ip', '6', 'abcd:1235::/120', 'abcd:1234::1'], logger).output).toBe('false');
		expect(runIpCommand(['overlap', '6', 'abcd:1234::/120', 'abcd:1235::/120'], logger).output).toBe('false');
	});

	it('steps addresses up and down', () => {
		expect(runIpCommand(['next', '4', '172.18.40.40'], makeLogger()).output).toBe('172.18.40.41');
		expect(runIpCommand(['prev', '6', 'abcd:1234::1'], makeLogger()).output).toBe('abcd:1234::');
	});

	it('logs debug output on success', () => {
		const logger = makeLogger();
		runIpCommand(['next', '4', '172.18.40.40'], logger);
		expect(logger.debug).toHaveBeenCalledWith(
			{ command: 'next', version: 4, operands: ['172.18.40.40'], output: '172.18.40.41' },
			'Command succeeded',
		);
	});

	it('reports the error code and warns on invalid input', () => {
		const logger = makeLogger();
		expect(runIpCommand(['overlap', '4', 'invalid', '172.18.40.0/24'], logger)).toEqual({
			exitCode: 1,
			output: 'error: INVALID_CIDR_FORMAT',
		});
		expect(logger.warn).toHaveBeenCalledWith(
			{ command: 'overlap', version: '4', operands: ['invalid', '172.18.40.0/24'], code: 'INVALID_CIDR_FORMAT' },
			'Command failed',
		);
	});

	it('reports an invalid version', () => {
		expect(runIpCommand(['next', '5', '172.18.40.40'], makeLogger())).toEqual({
			exitCode: 1,
			output: 'error: INVALID_IP_VERSION',
		});
		expect(runIpCommand(['next', 'four', '172.18.40.40'], makeLogger()).output).toBe('error: INVALID_IP_VERSION');
	});

	it.each(['0x4', ' 6 ', '4.0', '6e0', '04', '+4'])('rejects the loosely written version %j', (version) => {
		expect(runIpCommand(['parse-ip', version, '172.18.40.40'], makeLogger())).toEqual({
			exitCode: 1,
			output: 'error: INVALID_IP_VERSION',
		});
	});

	it('reports an address of the wrong family', () => {
		expect(runIpCommand(['parse-ip', '4', 'abcd::1'], makeLogger()).output).toBe('error: INVALID_IP_FORMAT');
	});

	it('prints usage for unknown commands and wrong operand counts', () => {
		const logger = makeLogger();
		expect(runIpCommand([], logger)).toEqual({ exitCode: 2, output: USAGE });
		expect(runIpCommand(['bogus', '4', '172.18.40.40'], logger)).toEqual({ exitCode: 2, output: USAGE });
		expect(runIpCommand(['next', '4'], logger)).toEqual({ exitCode: 2, output: USAGE });
		expect(runIpCommand(['overlap', '4', '172.18.40.0/24'], logger)).toEqual({ exitCode: 2, output: USAGE });
		expect(logger.warn).not.toHaveBeenCalled();
	});
});
