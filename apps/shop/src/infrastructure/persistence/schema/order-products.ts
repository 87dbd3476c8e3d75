/**
 * Order Products Database Schema
 *
 * Line items joining orders and products. A (order, product) pair appears
 * at most once; the quantity lives here and nowhere else.
 */

import { integer, pgTable, primaryKey } from 'drizzle-orm/pg-core';
import { tableName } from '@storefront/persistence';
import { orders } from './orders.js';
import { products } from './products.js';

export const orderProducts = pgTable(
	tableName('OrderProduct'),
	{
		orderId: integer('order_id')
			.notNull()
			.references(() => orders.orderId, { onDelete: 'cascade' }),
		productId: integer('product_id')
			.notNull()
			.references(() => products.productId, { onDelete: 'restrict' }),
		quantity: integer('quantity').notNull(),
	},
	(table) => [primaryKey({ name: 'orderproducts_pkey', columns: [table.orderId, table.productId] })],
);

export type OrderProduct = typeof orderProducts.$inferSelect;
export type NewOrderProduct = typeof orderProducts.$inferInsert;
