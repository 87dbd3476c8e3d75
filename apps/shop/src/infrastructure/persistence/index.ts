export * from './schema/index.js';
export * from './repositories/index.js';
export { shopMigrations } from './migrations/index.js';
export { shopSchema, type ShopDatabase, type ShopSchema, type ShopTransaction } from './database.js';
