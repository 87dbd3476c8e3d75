/**
 * Shop Database Types
 */

import type { DrizzleDb, TransactionContext } from '@storefront/persistence';
import * as schema from './schema/index.js';

/** Schema module handed to drizzle() so db.query knows the relations */
export const shopSchema = schema;

export type ShopSchema = typeof schema;

/** Any Drizzle database or transaction over the shop schema */
export type ShopDatabase = DrizzleDb<ShopSchema>;

export type ShopTransaction = TransactionContext<ShopSchema>;
