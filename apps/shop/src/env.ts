import { CommonEnvSchemas, parseEnv, z } from '@storefront/config';

/**
 * Shop environment configuration
 */
export const envSchema = z.object({
	NODE_ENV: CommonEnvSchemas.nodeEnv,

	// Logging
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	/** Defaults to on in development */
	LOG_PRETTY: z
		.enum(['true', 'false'])
		.transform((v) => v === 'true')
		.optional(),

	// Database
	DATABASE_URL: z.string().optional(),
	POSTGRES_USER: z.string().optional(),
	POSTGRES_PASSWORD: z.string().optional(),
	POSTGRES_DB: z.string().optional(),
	DATABASE_HOST: z.string().optional(),
	DATABASE_PORT: CommonEnvSchemas.port.prefault('5432'),
	DB_ECHO: CommonEnvSchemas.boolean,
	DB_MAX_CONNECTIONS: CommonEnvSchemas.positiveInt.prefault('10'),
});

export type ShopEnv = z.infer<typeof envSchema>;

export function loadShopEnv(source: Record<string, string | undefined> = process.env): ShopEnv {
	return parseEnv(envSchema, source);
}

export function usePrettyLogs(env: ShopEnv): boolean {
	return env.LOG_PRETTY ?? env.NODE_ENV === 'development';
}

/**
 * PostgreSQL URL from `DATABASE_URL`, or assembled from the individual
 * connection variables.
 *
 * @throws Error when neither form is complete
 */
export function resolveDatabaseUrl(env: ShopEnv): string {
	if (env.DATABASE_URL) return env.DATABASE_URL;

	const { POSTGRES_USER, POSTGRES_PASSWORD, DATABASE_HOST, POSTGRES_DB, DATABASE_PORT } = env;
	if (!POSTGRES_USER || POSTGRES_PASSWORD === undefined || !DATABASE_HOST || !POSTGRES_DB) {
		throw new Error(
			'DATABASE_URL, or POSTGRES_USER, POSTGRES_PASSWORD, DATABASE_HOST and POSTGRES_DB, must be set',
		);
	}

	const credentials = `${encodeURIComponent(POSTGRES_USER)}:${encodeURIComponent(POSTGRES_PASSWORD)}`;
	return `postgres://${credentials}@${DATABASE_HOST}:${DATABASE_PORT}/${encodeURIComponent(POSTGRES_DB)}`;
}
