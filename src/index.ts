export * from './ip/index.js';
export {
	DEFAULT_MAX_QUEUE_SIZE,
	DEFAULT_MAX_WAIT_TIME_MS,
	type LimiterConfig,
	LimiterConfigSchema,
	type ResolvedLimiterConfig,
	loadLimiterConfig,
	setDefaultsForLimiterConfig,
} from './limiter/config.js';
