import type { Logger } from 'pino';
import { z } from 'zod';

import { loadConfig } from '../config.js';

export const DEFAULT_MAX_QUEUE_SIZE = 1000;
export const DEFAULT_MAX_WAIT_TIME_MS = 15_000;

export const LimiterConfigSchema = z.object({
	maxQueueSize: z.number().int().nonnegative().optional(),
	maxWaitTimeMs: z.number().int().nonnegative().optional(),
});
export type LimiterConfig = z.infer<typeof LimiterConfigSchema>;
export type ResolvedLimiterConfig = {
	maxQueueSize: number;
	maxWaitTimeMs: number;
};

/**
 * Fills in the limiter tunables the caller left unset. Values that are
 * present, zero included, are kept as given.
 */
export function setDefaultsForLimiterConfig(config: LimiterConfig, logger?: Logger): ResolvedLimiterConfig {
	const defaulted: Array<keyof LimiterConfig> = [];

	let maxQueueSize = config.maxQueueSize;
	if (maxQueueSize === undefined) {
		maxQueueSize = DEFAULT_MAX_QUEUE_SIZE;
		defaulted.push('maxQueueSize');
	}

	let maxWaitTimeMs = config.maxWaitTimeMs;
	if (maxWaitTimeMs === undefined) {
		maxWaitTimeMs = DEFAULT_MAX_WAIT_TIME_MS;
		defaulted.push('maxWaitTimeMs');
	}

	if (defaulted.length > 0) {
		logger?.debug({ defaulted, maxQueueSize, maxWaitTimeMs }, 'Limiter config defaults applied');
	}

	return { maxQueueSize, maxWaitTimeMs };
}

/**
 * Resolve the limiter config from LIMITER_* environment variables.
 */
export function loadLimiterConfig(logger?: Logger): ResolvedLimiterConfig {
	const env = loadConfig();
	const config: LimiterConfig = {};
	if (env.LIMITER_MAX_QUEUE_SIZE !== undefined) {
		config.maxQueueSize = env.LIMITER_MAX_QUEUE_SIZE;
	}
	if (env.LIMITER_MAX_WAIT_TIME_MS !== undefined) {
		config.maxWaitTimeMs = env.LIMITER_MAX_WAIT_TIME_MS;
	}
	return setDefaultsForLimiterConfig(config, logger);
}
