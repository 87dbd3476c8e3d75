/**
 * Shop CLI
 *
 * Migrates, seeds and reports on the shop database.
 *
 * Usage: npm run shop -- <command> [args] [--env-file <path>]
 */

import { loadEnvFile } from '@storefront/config';
import { createLogger, setDefaultLogger, type Logger } from '@storefront/logging';
import {
	BASE,
	HEAD,
	createMigrationDatabase,
	createMigrator,
	withDatabase,
	type DatabaseConfig,
} from '@storefront/persistence';
import { loadShopEnv, resolveDatabaseUrl, usePrettyLogs } from './env.js';
import {
	createShopRepository,
	shopMigrations,
	shopSchema,
	type ShopRepository,
} from './infrastructure/persistence/index.js';
import { seedFakeData } from './seed.js';

const COMMANDS = new Set(['migrate', 'downgrade', 'current', 'seed', 'report']);

function printUsage(): void {
	console.log(`Usage: shop <command> [--env-file <path>]

Commands:
  migrate [target]      Upgrade the schema to target (default: ${HEAD})
  downgrade <target>    Downgrade the schema to a revision or '${BASE}'
  current               Print the applied revision
  seed                  Insert fake users, orders and products
  report [telegramId]   Log the report queries, for one user if given
  help                  Show this help message

Environment:
  DATABASE_URL          PostgreSQL connection string, or
  POSTGRES_USER, POSTGRES_PASSWORD, DATABASE_HOST, POSTGRES_DB, DATABASE_PORT
  LOG_LEVEL             Log level (default: info)
  NODE_ENV              development, production or test (default: development)
  LOG_PRETTY            Pretty-print logs (default: true in development)
  DB_ECHO               Log every SQL statement at debug level (default: false)
  DB_MAX_CONNECTIONS    Connection pool size (default: 10)`);
}

/**
 * Split CLI arguments into positionals and `--name value` options.
 */
export function parseArgs(args: readonly string[]): { positionals: string[]; options: Record<string, string> } {
	const positionals: string[] = [];
	const options: Record<string, string> = {};
	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) continue;
		const value = args[i + 1];
		if (arg.startsWith('--') && value !== undefined) {
			options[arg.slice(2)] = value;
			i++;
		} else {
			positionals.push(arg);
		}
	}
	return { positionals, options };
}

async function runMigrate(config: DatabaseConfig, logger: Logger, target: string): Promise<void> {
	const database = createMigrationDatabase(config, shopSchema);
	try {
		const migrator = createMigrator({ db: database.db, migrations: shopMigrations, logger });
		const applied = await migrator.upgrade(target);
		logger.info({ applied, revision: await migrator.currentRevision() }, 'Upgrade complete');
	} finally {
		await database.close();
	}
}

async function runDowngrade(config: DatabaseConfig, logger: Logger, target: string): Promise<void> {
	const database = createMigrationDatabase(config, shopSchema);
	try {
		const migrator = createMigrator({ db: database.db, migrations: shopMigrations, logger });
		const reverted = await migrator.downgrade(target);
		logger.info({ reverted, revision: await migrator.currentRevision() }, 'Downgrade complete');
	} finally {
		await database.close();
	}
}

async function runCurrent(config: DatabaseConfig, logger: Logger): Promise<void> {
	await withDatabase(config, shopSchema, async ({ db }) => {
		const migrator = createMigrator({ db, migrations: shopMigrations, logger });
		const revision = await migrator.currentRevision();
		console.log(`${revision ?? BASE}${revision === migrator.head() ? ' (head)' : ''}`);
	});
}

async function runReport(repository: ShopRepository, logger: Logger, telegramId: number | undefined): Promise<void> {
	const users = await repository.getAllUsers();
	const userId = telegramId ?? users.at(-1)?.telegramId;

	logger.info({ users: users.length }, 'Users');
	logger.info({ invited: await repository.selectAllInvitedUsers() }, 'Invited users');
	logger.info({ users: await repository.getAllUsersAdvanced() }, 'English or Ukrainian users named john');

	if (userId !== undefined) {
		logger.info(
			{
				telegramId: userId,
				languageCode: await repository.getUserLanguageCode(userId),
				orders: await repository.getUserTotalNumberOfOrders(userId),
				lines: await repository.getAllUserOrdersNoRelationships(userId),
			},
			'User orders',
		);
	}

	logger.info({ rows: await repository.getTotalNumberOfOrdersByUser() }, 'Orders by user');
	logger.info({ rows: await repository.getTotalNumberOfOrdersByUserWithLabels() }, 'Orders by user, labelled');
	logger.info({ rows: await repository.getCountOfProductsByUser() }, 'Products by user');
	logger.info({ rows: await repository.getCountOfProductsGreaterThanXByUser(50_000) }, 'Users with over 50000 products');
}

export async function main(argv: readonly string[]): Promise<number> {
	const { positionals, options } = parseArgs(argv);
	const [command = 'help', argument] = positionals;

	if (command === 'help' || command === '--help' || command === '-h') {
		printUsage();
		return 0;
	}
	if (!COMMANDS.has(command)) {
		console.error(`Unknown command: ${command}\n`);
		printUsage();
		return 1;
	}

	loadEnvFile(options['env-file'] ?? '.env');
	const env = loadShopEnv();
	const logger = createLogger({ level: env.LOG_LEVEL, serviceName: 'shop', pretty: usePrettyLogs(env) });
	setDefaultLogger(logger);

	const config: DatabaseConfig = {
		url: resolveDatabaseUrl(env),
		maxConnections: env.DB_MAX_CONNECTIONS,
		echo: env.DB_ECHO,
		logger,
	};

	switch (command) {
		case 'migrate':
			await runMigrate(config, logger, argument ?? HEAD);
			return 0;
		case 'downgrade':
			if (argument === undefined) {
				console.error('downgrade requires a target revision\n');
				printUsage();
				return 1;
			}
			await runDowngrade(config, logger, argument);
			return 0;
		case 'current':
			await runCurrent(config, logger);
			return 0;
		case 'seed':
			await withDatabase(config, shopSchema, ({ db }) => seedFakeData(createShopRepository(db), { logger }));
			return 0;
		case 'report': {
			const telegramId = argument === undefined ? undefined : Number.parseInt(argument, 10);
			if (telegramId !== undefined && Number.isNaN(telegramId)) {
				console.error(`Invalid Telegram id: ${argument}\n`);
				return 1;
			}
			await withDatabase(config, shopSchema, ({ db }) => runReport(createShopRepository(db), logger, telegramId));
			return 0;
		}
		default:
			return 1;
	}
}

// Run when executed as main module
const entry = process.argv[1];
const isMainModule = entry !== undefined && (entry.endsWith('/main.ts') || entry.endsWith('/main.js'));

if (isMainModule) {
	try {
		process.exitCode = await main(process.argv.slice(2));
	} catch (error) {
		console.error(error);
		process.exitCode = 1;
	}
}
