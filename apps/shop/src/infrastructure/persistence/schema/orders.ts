/**
 * Orders Database Schema
 */

import { bigint, pgTable, serial } from 'drizzle-orm/pg-core';
import { auditColumns, tableName } from '@storefront/persistence';
import { users } from './users.js';

export const orders = pgTable(tableName('Order'), {
	orderId: serial('order_id').primaryKey(),
	userId: bigint('user_id', { mode: 'number' })
		.notNull()
		.references(() => users.telegramId, { onDelete: 'cascade' }),
	...auditColumns,
});

export type Order = typeof orders.$inferSelect;
export type NewOrder = typeof orders.$inferInsert;
