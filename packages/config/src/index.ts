import 'dotenv/config';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

/**
 * Parse environment variables with a Zod schema.
 * Throws one line per offending variable if validation fails.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		const errors = new Map<string, string[]>();
		for (const issue of result.error.issues) {
			const key = issue.path.map(String).join('.') || '(root)';
			errors.set(key, [...(errors.get(key) ?? []), issue.message]);
		}

		const lines = [...errors].map(([key, messages]) => `  ${key}: ${messages.join(', ')}`);
		throw new Error(`Environment validation failed:\n${lines.join('\n')}`);
	}

	return result.data;
}

/**
 * Common environment variable schemas for reuse.
 *
 * In zod v4, .default() on a transformed schema expects the OUTPUT type;
 * .prefault() supplies an INPUT default that is parsed like a real value.
 */
export const CommonEnvSchemas = {
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

	port: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().min(1).max(65535))
		.prefault('8000'),

	/** "true"/"1" (any case) => true */
	boolean: z
		.string()
		.transform((v) => ['true', '1', 'yes'].includes(v.trim().toLowerCase()))
		.prefault('false'),

	positiveInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive()),


	/** Comma-separated list; blanks dropped */
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
