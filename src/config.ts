import { z } from 'zod';

const envSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
	LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
	// Limiter tunables; left unset, the limiter defaults apply
	LIMITER_MAX_QUEUE_SIZE: z.coerce.number().int().nonnegative().optional(),
	LIMITER_MAX_WAIT_TIME_MS: z.coerce.number().int().nonnegative().optional(),
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(): Config {
	const result = envSchema.safeParse(process.env);
	if (!result.success) {
		const formatted = result.error.flatten().fieldErrors;
		throw new Error(`Invalid environment configuration: ${JSON.stringify(formatted)}`);
	}
	return result.data;
}
