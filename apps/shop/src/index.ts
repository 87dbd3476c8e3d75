/**
 * @storefront/shop
 *
 * Shop schema, migration history, repositories and fake-data seeder.
 */

export * from './infrastructure/persistence/index.js';
export { envSchema, loadShopEnv, resolveDatabaseUrl, usePrettyLogs, type ShopEnv } from './env.js';
export { seedFakeData, type SeedOptions, type SeedSummary } from './seed.js';
