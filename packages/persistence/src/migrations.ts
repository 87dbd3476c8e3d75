/**
 * Schema Migrations
 *
 * Ordered history of reversible schema deltas. Every migration names its own
 * revision and the revision it builds on; the history must form one unbranched
 * chain from a single base. The applied head is recorded in `schema_revisions`.
 *
 * Each delta runs in one transaction together with the revision bump, so a
 * failing delta leaves neither a partial schema change nor a moved head.
 */

import { and, eq, getTableName, sql, type SQL } from 'drizzle-orm';
import { pgSchema, pgTable, varchar } from 'drizzle-orm/pg-core';
import { createChildLogger, getLogger, type Logger } from '@storefront/logging';
import { createTransactionManager, type DrizzleDb, type Schema } from './transaction.js';

/**
 * Single-row table holding the applied revision.
 */
export const schemaRevisions = pgTable('schema_revisions', {
	versionNum: varchar('version_num', { length: 32 }).primaryKey(),
});

const informationSchemaTables = pgSchema('information_schema').table('tables', {
	tableSchema: varchar('table_schema'),
	tableName: varchar('table_name'),
});

/**
 * Schema operations available to a migration.
 */
export interface MigrationOperations {
	execute(statement: SQL): Promise<void>;
	/** `definition` is raw SQL, e.g. `varchar(50)` or `integer NOT NULL DEFAULT 0` */
	addColumn(table: string, column: string, definition: string): Promise<void>;
	dropColumn(table: string, column: string): Promise<void>;
	createUniqueConstraint(name: string, table: string, columns: readonly string[]): Promise<void>;
	dropConstraint(name: string, table: string): Promise<void>;
}

export interface Migration {
	readonly revision: string;
	/** Predecessor revision; null for the base of the history */
	readonly downRevision: string | null;
	readonly description: string;
	upgrade(op: MigrationOperations): Promise<void>;
	/** Exact inverse of upgrade */
	downgrade(op: MigrationOperations): Promise<void>;
}

export type MigrationErrorCode =
	| 'DUPLICATE_REVISION'
	| 'NO_BASE'
	| 'MULTIPLE_BASES'
	| 'UNKNOWN_DOWN_REVISION'
	| 'BRANCHED_HISTORY'
	| 'CYCLE'
	| 'UNKNOWN_REVISION' // recorded revision not in the history
	| 'UNKNOWN_TARGET'
	| 'INVALID_TARGET' // target on the wrong side of the current revision
	| 'PREDECESSOR_NOT_APPLIED'
	| 'NOT_CURRENT_HEAD';

export class MigrationError extends Error {
	constructor(
		message: string,
		public readonly code: MigrationErrorCode,
		public readonly revision?: string,
	) {
		super(message);
		this.name = 'MigrationError';
	}
}

/**
 * Validate a migration history and order it from base to head.
 *
 * @throws MigrationError when the history is not a single unbranched chain
 */
export function buildMigrationChain(migrations: readonly Migration[]): readonly Migration[] {
	if (migrations.length === 0) return [];

	const byRevision = new Map<string, Migration>();
	const children = new Map<string | null, Migration[]>();

	for (const migration of migrations) {
		if (byRevision.has(migration.revision)) {
			throw new MigrationError(
				`Revision ${migration.revision} is defined more than once`,
				'DUPLICATE_REVISION',
				migration.revision,
			);
		}
		byRevision.set(migration.revision, migration);

		const siblings = children.get(migration.downRevision) ?? [];
		siblings.push(migration);
		children.set(migration.downRevision, siblings);
	}

	for (const migration of migrations) {
		if (migration.downRevision !== null && !byRevision.has(migration.downRevision)) {
			throw new MigrationError(
				`Revision ${migration.revision} revises unknown revision ${migration.downRevision}`,
				'UNKNOWN_DOWN_REVISION',
				migration.revision,
			);
		}
	}

	const bases = children.get(null) ?? [];
	const [base] = bases;
	if (base === undefined) {
		throw new MigrationError('Migration history has no base revision', 'NO_BASE');
	}
	if (bases.length > 1) {
		throw new MigrationError(
			`Migration history has several base revisions: ${bases.map((m) => m.revision).join(', ')}`,
			'MULTIPLE_BASES',
		);
	}

	for (const [parent, siblings] of children) {
		if (parent !== null && siblings.length > 1) {
			throw new MigrationError(
				`Revision ${parent} is revised by ${siblings.map((m) => m.revision).join(', ')}`,
				'BRANCHED_HISTORY',
				parent,
			);
		}
	}

	const chain: Migration[] = [];
	let next: Migration | undefined = base;
	while (next !== undefined) {
		chain.push(next);
		next = children.get(next.revision)?.[0];
	}

	if (chain.length !== migrations.length) {
		const unreachable = migrations.filter((m) => !chain.includes(m)).map((m) => m.revision);
		throw new MigrationError(`Revisions form a cycle: ${unreachable.join(', ')}`, 'CYCLE', unreachable[0]);
	}

	return chain;
}

export interface MigratorOptions<TSchema extends Schema> {
	readonly db: DrizzleDb<TSchema>;
	readonly migrations: readonly Migration[];
	readonly logger?: Logger;
}

export interface Migrator {
	/** Validated history, base first */
	readonly chain: readonly Migration[];
	/** Latest revision of the history, null when it is empty */
	head(): string | null;
	/** Revision currently applied to the database, null when none is. Read-only. */
	currentRevision(): Promise<string | null>;
	/**
	 * Apply every migration after the current revision up to `target`.
	 *
	 * @returns revisions applied, in order
	 */
	upgrade(target?: string): Promise<string[]>;
	/**
	 * Revert migrations down to `target` (a revision or `'base'`), leaving `target` applied.
	 *
	 * @returns revisions reverted, in order
	 */
	downgrade(target: string): Promise<string[]>;
	/** Apply one migration; its predecessor must be the current revision. */
	applyMigration(migration: Migration): Promise<void>;
	/** Revert one migration; it must be the current revision. */
	revertMigration(migration: Migration): Promise<void>;
}

export const HEAD = 'head';
export const BASE = 'base';

/**
 * Create a migrator over the given history.
 *
 * @throws MigrationError when the history is invalid
 */
export function createMigrator<TSchema extends Schema>(options: MigratorOptions<TSchema>): Migrator {
	const chain = buildMigrationChain(options.migrations);
	const logger = createChildLogger(options.logger ?? getLogger(), { component: 'migrator' });
	const transactions = createTransactionManager(options.db);

	const positionOf = (revision: string | null): number => {
		if (revision === null) return -1;
		return chain.findIndex((m) => m.revision === revision);
	};

	const ensureVersionTable = async (): Promise<void> => {
		await options.db.execute(
			sql`CREATE TABLE IF NOT EXISTS ${schemaRevisions} (version_num varchar(32) PRIMARY KEY)`,
		);
	};

	const versionTableExists = async (): Promise<boolean> => {
		const [row] = await options.db
			.select({ tableName: informationSchemaTables.tableName })
			.from(informationSchemaTables)
			.where(
				and(
					eq(informationSchemaTables.tableSchema, sql`current_schema()`),
					eq(informationSchemaTables.tableName, getTableName(schemaRevisions)),
				),
			)
			.limit(1);
		return row !== undefined;
	};

	const readRevision = async (db: DrizzleDb<TSchema>): Promise<string | null> => {
		const [row] = await db.select().from(schemaRevisions).limit(1);
		return row?.versionNum ?? null;
	};

	const writeRevision = async (db: DrizzleDb<TSchema>, revision: string | null): Promise<void> => {
		await db.delete(schemaRevisions);
		if (revision !== null) {
			await db.insert(schemaRevisions).values({ versionNum: revision });
		}
	};

	const currentPosition = async (): Promise<{ revision: string | null; position: number }> => {
		const revision = (await versionTableExists()) ? await readRevision(options.db) : null;
		const position = positionOf(revision);
		if (revision !== null && position === -1) {
			throw new MigrationError(
				`Database is at revision ${revision}, which is not part of the migration history`,
				'UNKNOWN_REVISION',
				revision,
			);
		}
		return { revision, position };
	};

	const migrator: Migrator = {
		chain,

		head() {
			return chain.at(-1)?.revision ?? null;
		},

		async currentRevision() {
			const { revision } = await currentPosition();
			return revision;
		},

		async upgrade(target = HEAD) {
			const { position } = await currentPosition();
			const targetPosition = target === HEAD ? chain.length - 1 : positionOf(target);
			if (targetPosition === -1 && target !== HEAD) {
				throw new MigrationError(`Unknown target revision ${target}`, 'UNKNOWN_TARGET', target);
			}
			if (targetPosition < position) {
				throw new MigrationError(
					`Cannot upgrade to ${target}: it is behind the current revision`,
					'INVALID_TARGET',
					target,
				);
			}

			const pending = chain.slice(position + 1, targetPosition + 1);
			for (const migration of pending) {
				await migrator.applyMigration(migration);
			}
			return pending.map((m) => m.revision);
		},

		async downgrade(target) {
			const { position } = await currentPosition();
			const targetPosition = target === BASE ? -1 : positionOf(target);
			if (targetPosition === -1 && target !== BASE) {
				throw new MigrationError(`Unknown target revision ${target}`, 'UNKNOWN_TARGET', target);
			}
			if (targetPosition > position) {
				throw new MigrationError(
					`Cannot downgrade to ${target}: it is ahead of the current revision`,
					'INVALID_TARGET',
					target,
				);
			}

			const reverting = chain.slice(targetPosition + 1, position + 1).reverse();
			for (const migration of reverting) {
				await migrator.revertMigration(migration);
			}
			return reverting.map((m) => m.revision);
		},

		async applyMigration(migration) {
			await ensureVersionTable();
			await transactions.inTransaction(async ({ db }) => {
				const current = await readRevision(db);
				if (current !== migration.downRevision) {
					throw new MigrationError(
						`Cannot apply ${migration.revision}: requires ${migration.downRevision ?? 'an empty history'}, ` +
							`database is at ${current ?? 'base'}`,
						'PREDECESSOR_NOT_APPLIED',
						migration.revision,
					);
				}
				await migration.upgrade(createOperations(db));
				await writeRevision(db, migration.revision);
			});
			logger.info({ revision: migration.revision, description: migration.description }, 'Applied migration');
		},

		async revertMigration(migration) {
			await ensureVersionTable();
			await transactions.inTransaction(async ({ db }) => {
				const current = await readRevision(db);
				if (current !== migration.revision) {
					throw new MigrationError(
						`Cannot revert ${migration.revision}: database is at ${current ?? 'base'}`,
						'NOT_CURRENT_HEAD',
						migration.revision,
					);
				}
				await migration.downgrade(createOperations(db));
				await writeRevision(db, migration.downRevision);
			});
			logger.info({ revision: migration.revision, description: migration.description }, 'Reverted migration');
		},
	};

	return migrator;
}

function createOperations<TSchema extends Schema>(db: DrizzleDb<TSchema>): MigrationOperations {
	const execute = async (statement: SQL): Promise<void> => {
		await db.execute(statement);
	};

	return {
		execute,

		addColumn(table, column, definition) {
			return execute(
				sql`ALTER TABLE ${sql.identifier(table)} ADD COLUMN ${sql.identifier(column)} ${sql.raw(definition)}`,
			);
		},

		dropColumn(table, column) {
			return execute(sql`ALTER TABLE ${sql.identifier(table)} DROP COLUMN ${sql.identifier(column)}`);
		},

		createUniqueConstraint(name, table, columns) {
			const columnList = sql.join(
				columns.map((c) => sql.identifier(c)),
				sql`, `,
			);
			return execute(
				sql`ALTER TABLE ${sql.identifier(table)} ADD CONSTRAINT ${sql.identifier(name)} UNIQUE (${columnList})`,
			);
		},

		dropConstraint(name, table) {
			return execute(sql`ALTER TABLE ${sql.identifier(table)} DROP CONSTRAINT ${sql.identifier(name)}`);
		},
	};
}
