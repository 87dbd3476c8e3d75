/**
 * Transaction Management
 *
 * Transaction context and utilities for atomic database operations.
 * Written against the driver-independent PgDatabase so the same code runs
 * over postgres.js in production and an in-process PGlite in tests.
 */

import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';

/** Drizzle schema module: tables and relations keyed by export name. */
export type Schema = Record<string, unknown>;

/**
 * Any PostgreSQL Drizzle database or transaction over the given schema.
 */
export type DrizzleDb<TSchema extends Schema> = PgDatabase<PgQueryResultHKT, TSchema>;

/**
 * Transaction context passed to repository operations.
 * Contains the database instance scoped to the current transaction.
 */
export interface TransactionContext<TSchema extends Schema> {
	readonly db: DrizzleDb<TSchema>;
}

/**
 * Transaction manager for executing atomic operations.
 */
export interface TransactionManager<TSchema extends Schema> {
	/**
	 * Execute a function within a database transaction.
	 * If the function throws, the transaction is rolled back and the error re-thrown.
	 * If the function returns, the transaction is committed.
	 */
	inTransaction<T>(fn: (tx: TransactionContext<TSchema>) => Promise<T>): Promise<T>;

	/** The database instance (for non-transactional queries). */
	readonly db: DrizzleDb<TSchema>;
}

export function createTransactionManager<TSchema extends Schema>(db: DrizzleDb<TSchema>): TransactionManager<TSchema> {
	return {
		db,
		async inTransaction<T>(fn: (tx: TransactionContext<TSchema>) => Promise<T>): Promise<T> {
			return db.transaction(async (tx) => fn({ db: tx }));
		},
	};
}

/**
 * Resolve the database instance from a transaction context or fall back to default.
 */
export function resolveDb<TSchema extends Schema>(
	defaultDb: DrizzleDb<TSchema>,
	tx?: TransactionContext<TSchema>,
): DrizzleDb<TSchema> {
	return tx?.db ?? defaultDb;
}
