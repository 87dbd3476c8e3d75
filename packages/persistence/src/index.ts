/**
 * @storefront/persistence
 *
 * Database persistence plumbing using DrizzleORM over PostgreSQL.
 *
 * Key components:
 * - Database connection with explicit, scoped lifetime
 * - Transaction management
 * - Reversible migration history and runner
 * - Constraint violation classification
 * - Shared column definitions and table naming
 *
 * @example
 * ```typescript
 * import { withDatabase, createMigrator } from '@storefront/persistence';
 *
 * await withDatabase({ url: process.env.DATABASE_URL }, schema, async ({ db }) => {
 *     await createMigrator({ db, migrations }).upgrade();
 * });
 * ```
 */

// Database connection
export {
	createDatabase,
	createMigrationDatabase,
	createQueryLogger,
	withDatabase,
	type Database,
	type DatabaseConfig,
} from './connection.js';

// Transaction management
export {
	createTransactionManager,
	resolveDb,
	type DrizzleDb,
	type Schema,
	type TransactionContext,
	type TransactionManager,
} from './transaction.js';

// Migrations
export {
	BASE,
	HEAD,
	buildMigrationChain,
	createMigrator,
	schemaRevisions,
	MigrationError,
	type Migration,
	type MigrationErrorCode,
	type MigrationOperations,
	type Migrator,
	type MigratorOptions,
} from './migrations.js';

// Errors
export {
	PersistenceError,
	constraintViolationOf,
	expectRow,
	sqlStateOf,
	type ConstraintViolation,
} from './errors.js';

// Schema helpers
export { auditColumns, tableName, timestampColumn } from './schema/common.js';
