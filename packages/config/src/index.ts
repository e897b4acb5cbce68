import 'dotenv/config';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

/**
 * Parse environment variables with Zod schema validation.
 * Throws a descriptive error listing every failing key.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		const errors: string[] = [];
		for (const issue of result.error.issues) {
			const key = issue.path.map(String).join('.') || '(root)';
			errors.push(`  ${key}: ${issue.message}`);
		}
		throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
	}

	return result.data;
}

/**
 * Reusable environment variable schemas.
 *
 * Note: in zod v4, .default() on a transformed schema expects the OUTPUT type.
 * Use .prefault() to give an INPUT default that still runs through the transform.
 */
export const CommonEnvSchemas = {
	/** Log level enum */
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

	/** Node environment */
	nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

	/** Boolean from string */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	/** Positive integer from string */
	positiveInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive()),

	/** Duration in milliseconds from string */
	durationMs: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().min(0)),

	/** PostgreSQL connection URL */
	postgresUrl: z.string().regex(/^postgres(ql)?:\/\//, 'must be a postgres:// URL'),

	/** Comma-separated list to array, blanks dropped */
	stringArray: z
		.string()
		.transform((v) =>
			v
				.split(',')
				.map((s) => s.trim())
				.filter((s) => s.length > 0),
		)
		.prefault(''),
};

/**
 * Type helper to extract config type from schema
 */
export type ConfigType<T extends z.ZodObject<z.ZodRawShape>> = z.infer<T>;
