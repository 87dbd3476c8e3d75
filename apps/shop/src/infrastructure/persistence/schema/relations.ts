/**
 * Relational Query Definitions
 *
 * Parent ↔ child relationships for Drizzle's relational query API (db.query).
 * Metadata only; the foreign keys themselves are created by the migrations.
 */

import { relations } from 'drizzle-orm';
import { orderProducts } from './order-products.js';
import { orders } from './orders.js';
import { products } from './products.js';
import { users } from './users.js';

export const usersRelations = relations(users, ({ one, many }) => ({
	referrer: one(users, {
		fields: [users.referrerId],
		references: [users.telegramId],
		relationName: 'referrals',
	}),
	referrals: many(users, { relationName: 'referrals' }),
	orders: many(orders),
}));

export const ordersRelations = relations(orders, ({ one, many }) => ({
	user: one(users, {
		fields: [orders.userId],
		references: [users.telegramId],
	}),
	lineItems: many(orderProducts),
}));

export const orderProductsRelations = relations(orderProducts, ({ one }) => ({
	order: one(orders, {
		fields: [orderProducts.orderId],
		references: [orders.orderId],
	}),
	product: one(products, {
		fields: [orderProducts.productId],
		references: [products.productId],
	}),
}));

export const productsRelations = relations(products, ({ many }) => ({
	lineItems: many(orderProducts),
}));
