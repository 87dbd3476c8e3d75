import { sql } from 'drizzle-orm';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
	buildMigrationChain,
	createMigrator,
	MigrationError,
	schemaRevisions,
	type Migration,
} from '../migrations.js';
import { constraintViolationOf, sqlStateOf } from '../errors.js';
import { createTestDatabase, silentLogger, type TestDatabase } from './support/pglite.js';

function stub(revision: string, downRevision: string | null): Migration {
	return {
		revision,
		downRevision,
		description: `stub ${revision}`,
		upgrade: async () => undefined,
		downgrade: async () => undefined,
	};
}

const createWidgets: Migration = {
	revision: 'aaa111',
	downRevision: null,
	description: 'create widgets',
	async upgrade(op) {
		await op.execute(sql`CREATE TABLE widgets (id serial PRIMARY KEY, name varchar(50) NOT NULL)`);
	},
	async downgrade(op) {
		await op.execute(sql`DROP TABLE widgets`);
	},
};

const addWidgetColor: Migration = {
	revision: 'bbb222',
	downRevision: 'aaa111',
	description: 'add widget color',
	async upgrade(op) {
		await op.addColumn('widgets', 'color', 'varchar(20)');
	},
	async downgrade(op) {
		await op.dropColumn('widgets', 'color');
	},
};

const uniqueWidgetName: Migration = {
	revision: 'ccc333',
	downRevision: 'bbb222',
	description: 'unique widget name',
	async upgrade(op) {
		await op.createUniqueConstraint('widgets_name_key', 'widgets', ['name']);
	},
	async downgrade(op) {
		await op.dropConstraint('widgets_name_key', 'widgets');
	},
};

const history = [uniqueWidgetName, createWidgets, addWidgetColor];

async function rejection(promise: Promise<unknown>): Promise<unknown> {
	try {
		await promise;
	} catch (error) {
		return error;
	}
	throw new Error('expected promise to reject');
}

describe('buildMigrationChain', () => {
	it('should order the history from base to head', () => {
		expect(buildMigrationChain(history).map((m) => m.revision)).toEqual(['aaa111', 'bbb222', 'ccc333']);
	});

	it('should accept an empty history', () => {
		expect(buildMigrationChain([])).toEqual([]);
	});

	it.each([
		['DUPLICATE_REVISION', [stub('a', null), stub('a', null)]],
		['NO_BASE', [stub('a', 'a')]],
		['MULTIPLE_BASES', [stub('a', null), stub('b', null)]],
		['UNKNOWN_DOWN_REVISION', [stub('a', null), stub('b', 'missing')]],
		['BRANCHED_HISTORY', [stub('a', null), stub('b', 'a'), stub('c', 'a')]],
		['CYCLE', [stub('a', null), stub('b', 'c'), stub('c', 'b')]],
	])('should reject %s', (code, migrations) => {
		expect(() => buildMigrationChain(migrations)).toThrow(MigrationError);
		try {
			buildMigrationChain(migrations);
		} catch (error) {
			expect(error).toMatchObject({ code });
		}
	});
});

describe('createMigrator', () => {
	let database: TestDatabase<Record<string, never>>;

	beforeEach(async () => {
		database = await createTestDatabase<Record<string, never>>({});
	});

	afterEach(async () => {
		await database.close();
	});

	function migrator(migrations: readonly Migration[] = history) {
		return createMigrator({ db: database.db, migrations, logger: silentLogger() });
	}

	it('should start with no revision applied', async () => {
		const m = migrator();

		expect(m.head()).toBe('ccc333');
		expect(await m.currentRevision()).toBeNull();
	});

	it('should read the revision without creating the version table', async () => {
		const m = migrator();

		expect(await m.currentRevision()).toBeNull();
		expect(await m.downgrade('base')).toEqual([]);

		const result = await database.db.execute<{ found: string | null }>(
			sql`SELECT to_regclass('schema_revisions')::text AS found`,
		);
		expect(result.rows[0]?.found ?? null).toBeNull();
	});

	it('should upgrade to head in chain order and record the revision', async () => {
		const m = migrator();

		expect(await m.upgrade()).toEqual(['aaa111', 'bbb222', 'ccc333']);
		expect(await m.currentRevision()).toBe('ccc333');
		expect(await m.upgrade()).toEqual([]);

		await database.db.execute(sql`INSERT INTO widgets (name, color) VALUES ('bolt', 'red')`);
		const error = await rejection(database.db.execute(sql`INSERT INTO widgets (name) VALUES ('bolt')`));
		expect(constraintViolationOf(error)).toBe('unique_violation');
	});

	it('should upgrade to an intermediate target', async () => {
		const m = migrator();

		expect(await m.upgrade('bbb222')).toEqual(['aaa111', 'bbb222']);
		expect(await m.currentRevision()).toBe('bbb222');
	});

	it('should downgrade as the exact inverse', async () => {
		const m = migrator();
		await m.upgrade();

		expect(await m.downgrade('aaa111')).toEqual(['ccc333', 'bbb222']);
		expect(await m.currentRevision()).toBe('aaa111');

		const error = await rejection(database.db.execute(sql`INSERT INTO widgets (name, color) VALUES ('nut', 'blue')`));
		expect(sqlStateOf(error)).toBe('42703');

		expect(await m.downgrade('base')).toEqual(['aaa111']);
		expect(await m.currentRevision()).toBeNull();
	});

	it('should refuse a migration whose predecessor is not applied', async () => {
		const m = migrator();

		await expect(m.applyMigration(uniqueWidgetName)).rejects.toMatchObject({
			code: 'PREDECESSOR_NOT_APPLIED',
			revision: 'ccc333',
		});
		expect(await m.currentRevision()).toBeNull();
	});

	it('should refuse to revert a migration that is not the current head', async () => {
		const m = migrator();
		await m.upgrade('bbb222');

		await expect(m.revertMigration(createWidgets)).rejects.toMatchObject({ code: 'NOT_CURRENT_HEAD' });
		expect(await m.currentRevision()).toBe('bbb222');
	});

	it('should reject targets that are unknown or on the wrong side', async () => {
		const m = migrator();
		await m.upgrade('bbb222');

		await expect(m.upgrade('zzz999')).rejects.toMatchObject({ code: 'UNKNOWN_TARGET' });
		await expect(m.upgrade('aaa111')).rejects.toMatchObject({ code: 'INVALID_TARGET' });
		await expect(m.downgrade('ccc333')).rejects.toMatchObject({ code: 'INVALID_TARGET' });
	});

	it('should reject a recorded revision outside the history', async () => {
		const m = migrator();
		await m.upgrade('aaa111');
		await database.db.delete(schemaRevisions);
		await database.db.insert(schemaRevisions).values({ versionNum: 'deadbeef' });

		await expect(m.currentRevision()).rejects.toMatchObject({ code: 'UNKNOWN_REVISION' });
	});

	it('should roll back a failing migration together with its revision bump', async () => {
		const broken: Migration = {
			revision: 'bad000',
			downRevision: null,
			description: 'fails halfway',
			async upgrade(op) {
				await op.execute(sql`CREATE TABLE half_done (id integer)`);
				await op.execute(sql`SELECT no_such_column FROM half_done`);
			},
			async downgrade(op) {
				await op.execute(sql`DROP TABLE half_done`);
			},
		};
		const m = migrator([broken]);

		await expect(m.upgrade()).rejects.toThrow();

		expect(await m.currentRevision()).toBeNull();
		const result = await database.db.execute<{ found: string | null }>(
			sql`SELECT to_regclass('half_done')::text AS found`,
		);
		expect(result.rows[0]?.found ?? null).toBeNull();
	});
});
