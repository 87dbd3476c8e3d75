/**
 * Products Database Schema
 */

import { numeric, pgTable, serial, varchar } from 'drizzle-orm/pg-core';
import { auditColumns, tableName } from '@storefront/persistence';

export const products = pgTable(tableName('Product'), {
	productId: serial('product_id').primaryKey(),
	title: varchar('title', { length: 255 }).notNull().unique('products_title_key'),
	description: varchar('description', { length: 3000 }),
	/** Fixed-point decimal, read and written as a decimal string */
	price: numeric('price', { precision: 16, scale: 4 }).notNull(),
	...auditColumns,
});

export type Product = typeof products.$inferSelect;
export type NewProduct = typeof products.$inferInsert;
