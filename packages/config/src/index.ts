import { config as loadDotenv } from 'dotenv';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

/**
 * Load variables from a dotenv file into `process.env`.
 * Variables already present in the environment win over the file.
 *
 * @returns false when the file does not exist
 */
export function loadEnvFile(path = '.env'): boolean {
	const result = loadDotenv({ path, override: false });

	if (result.error) {
		if ('code' in result.error && result.error.code === 'ENOENT') {
			return false;
		}
		throw result.error;
	}

	return true;
}

/**
 * Parse environment variables with Zod schema validation.
 * Throws a descriptive error listing every invalid variable.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		const tree = z.treeifyError(result.error);
		const errors: string[] = [];

		if ('properties' in tree && tree.properties) {
			for (const [key, sub] of Object.entries(tree.properties)) {
				const node = sub as { errors?: string[] };
				if (node.errors?.length) {
					errors.push(`  ${key}: ${node.errors.join(', ')}`);
				}
			}
		}

		for (const message of tree.errors) {
			errors.push(`  ${message}`);
		}

		throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
	}

	return result.data;
}

/**
 * Reusable environment variable schemas.
 *
 * Note: in zod v4, .default() on a transformed schema expects the OUTPUT type,
 * so string inputs that get transformed use .prefault() instead.
 */
export const CommonEnvSchemas = {
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

	nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

	/** Boolean from string */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	/** TCP port from string */
	port: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().min(1).max(65535)),

	/** Positive integer from string */
	positiveInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive()),
};
