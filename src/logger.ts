import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

import { type Config, loadConfig } from './config.js';

export type { Logger };

// stdout carries command results; diagnostics go to stderr
const STDERR_FD = 2;

export function createLogger(name: string, config: Config = loadConfig()): Logger {
	const options: LoggerOptions = {
		name,
		level: config.LOG_LEVEL,
	};
	if (config.NODE_ENV !== 'production') {
		return pino({ ...options, transport: { target: 'pino-pretty', options: { destination: STDERR_FD } } });
	}
	return pino(options, pino.destination(STDERR_FD));
}
