import { PGlite } from '@electric-sql/pglite';
import { drizzle, type PgliteDatabase } from 'drizzle-orm/pglite';
import { createLogger, type Logger } from '@storefront/logging';
import { createMigrator, type Migrator } from '@storefront/persistence';
import {
	createShopRepository,
	shopMigrations,
	shopSchema,
	type ShopRepository,
	type ShopSchema,
} from '../../infrastructure/persistence/index.js';

export interface ShopTestDatabase {
	readonly db: PgliteDatabase<ShopSchema>;
	readonly migrator: Migrator;
	readonly repository: ShopRepository;
	close(): Promise<void>;
}

export function silentLogger(): Logger {
	return createLogger({ level: 'error', serviceName: 'test', destination: { write: () => undefined } });
}

/**
 * In-process PostgreSQL carrying the shop schema, migrated to head unless
 * `migrate` is false.
 */
export async function createShopTestDatabase(migrate = true): Promise<ShopTestDatabase> {
	const client = new PGlite();
	await client.waitReady;
	const db = drizzle(client, { schema: shopSchema });
	const migrator = createMigrator({ db, migrations: shopMigrations, logger: silentLogger() });
	if (migrate) {
		await migrator.upgrade();
	}

	return {
		db,
		migrator,
		repository: createShopRepository(db),
		async close() {
			await client.close();
		},
	};
}

export async function rejection(promise: Promise<unknown>): Promise<unknown> {
	try {
		await promise;
	} catch (error) {
		return error;
	}
	throw new Error('expected promise to reject');
}
