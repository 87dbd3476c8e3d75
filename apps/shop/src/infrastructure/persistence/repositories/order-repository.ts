/**
 * Order Repository
 *
 * Orders and their line items.
 */

import { sql } from 'drizzle-orm';
import { expectRow, resolveDb } from '@storefront/persistence';
import { assertTelegramId, orderProducts, orders, type Order, type OrderProduct } from '../schema/index.js';
import type { ShopDatabase, ShopTransaction } from '../database.js';

export interface OrderRepository {
	/** Create an order for an existing user. */
	addOrder(userId: number, tx?: ShopTransaction): Promise<Order>;
	/**
	 * Put `quantity` of a product on an order. Setting the same product twice
	 * replaces the quantity; it is never added up.
	 */
	addOrderProduct(orderId: number, productId: number, quantity: number, tx?: ShopTransaction): Promise<OrderProduct>;
}

export function createOrderRepository(defaultDb: ShopDatabase): OrderRepository {
	const db = (tx?: ShopTransaction): ShopDatabase => resolveDb(defaultDb, tx);

	return {
		async addOrder(userId: number, tx?: ShopTransaction): Promise<Order> {
			const rows = await db(tx).insert(orders).values({ userId: assertTelegramId(userId) }).returning();
			return expectRow(rows, 'orders');
		},

		async addOrderProduct(
			orderId: number,
			productId: number,
			quantity: number,
			tx?: ShopTransaction,
		): Promise<OrderProduct> {
			const rows = await db(tx)
				.insert(orderProducts)
				.values({ orderId, productId, quantity })
				.onConflictDoUpdate({
					target: [orderProducts.orderId, orderProducts.productId],
					set: { quantity: sql`excluded.quantity` },
				})
				.returning();

			return expectRow(rows, 'orderproducts');
		},
	};
}
