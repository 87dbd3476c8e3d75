/**
 * Report Repository
 *
 * Read-only queries over a user's orders and per-user aggregates.
 * Grouped reports are ordered by Telegram id.
 */

import { asc, count, eq, sql, sum } from 'drizzle-orm';
import { resolveDb } from '@storefront/persistence';
import { orderProducts, orders, products, users, type Order, type Product, type User } from '../schema/index.js';
import type { ShopDatabase, ShopTransaction } from '../database.js';

export interface UserOrderRow {
	readonly order: Order;
	readonly user: User;
}

export interface UserOrderNameRow {
	readonly order: Order;
	readonly userName: string | null;
}

/**
 * One product on one of the user's orders.
 */
export interface UserOrderLine {
	readonly product: Product;
	readonly order: Order;
	readonly userName: string | null;
	readonly quantity: number;
}

/** Positional `[ordersCount, telegramId]` */
export type OrdersCountRow = readonly [ordersCount: number, telegramId: number];

export interface LabelledTotalRow {
	readonly quantity: number;
	/** The user's full name */
	readonly name: string;
}

export interface ReportRepository {
	getAllUserOrdersUserFull(telegramId: number, tx?: ShopTransaction): Promise<UserOrderRow[]>;
	getAllUserOrdersUserOnlyUserName(telegramId: number, tx?: ShopTransaction): Promise<UserOrderNameRow[]>;
	/** Line items of the user's orders, loaded through the relational query API. */
	getAllUserOrdersRelationships(telegramId: number, tx?: ShopTransaction): Promise<UserOrderLine[]>;
	/** Same rows as getAllUserOrdersRelationships, built from explicit joins. */
	getAllUserOrdersNoRelationships(telegramId: number, tx?: ShopTransaction): Promise<UserOrderLine[]>;
	getUserTotalNumberOfOrders(telegramId: number, tx?: ShopTransaction): Promise<number>;
	getTotalNumberOfOrdersByUser(tx?: ShopTransaction): Promise<OrdersCountRow[]>;
	getTotalNumberOfOrdersByUserWithLabels(tx?: ShopTransaction): Promise<LabelledTotalRow[]>;
	/** Total quantity of products ordered, per user. */
	getCountOfProductsByUser(tx?: ShopTransaction): Promise<LabelledTotalRow[]>;
	/**
	 * As getCountOfProductsByUser, keeping totals strictly above `greaterThan`.
	 * Rejects with RangeError when `greaterThan` is not an integer.
	 */
	getCountOfProductsGreaterThanXByUser(greaterThan: number, tx?: ShopTransaction): Promise<LabelledTotalRow[]>;
}

export function createReportRepository(defaultDb: ShopDatabase): ReportRepository {
	const db = (tx?: ShopTransaction): ShopDatabase => resolveDb(defaultDb, tx);

	const productTotals = (tx?: ShopTransaction) => {
		const quantity = sum(orderProducts.quantity).mapWith(Number);
		const query = db(tx)
			.select({ quantity, name: users.fullName })
			.from(orderProducts)
			.innerJoin(orders, eq(orders.orderId, orderProducts.orderId))
			.innerJoin(users, eq(users.telegramId, orders.userId))
			.groupBy(users.telegramId)
			.orderBy(asc(users.telegramId))
			.$dynamic();
		return { query, quantity };
	};

	return {
		async getAllUserOrdersUserFull(telegramId: number, tx?: ShopTransaction): Promise<UserOrderRow[]> {
			return db(tx)
				.select({ order: orders, user: users })
				.from(orders)
				.innerJoin(users, eq(users.telegramId, orders.userId))
				.where(eq(users.telegramId, telegramId))
				.orderBy(asc(orders.orderId));
		},

		async getAllUserOrdersUserOnlyUserName(telegramId: number, tx?: ShopTransaction): Promise<UserOrderNameRow[]> {
			return db(tx)
				.select({ order: orders, userName: users.userName })
				.from(orders)
				.innerJoin(users, eq(users.telegramId, orders.userId))
				.where(eq(users.telegramId, telegramId))
				.orderBy(asc(orders.orderId));
		},

		async getAllUserOrdersRelationships(telegramId: number, tx?: ShopTransaction): Promise<UserOrderLine[]> {
			const records = await db(tx).query.orders.findMany({
				where: (order, { eq }) => eq(order.userId, telegramId),
				orderBy: (order, { asc }) => [asc(order.orderId)],
				with: {
					user: { columns: { userName: true } },
					lineItems: {
						orderBy: (item, { asc }) => [asc(item.productId)],
						with: { product: true },
					},
				},
			});

			return records.flatMap(({ user, lineItems, ...order }) =>
				lineItems.map((item) => ({
					product: item.product,
					order,
					userName: user.userName,
					quantity: item.quantity,
				})),
			);
		},

		async getAllUserOrdersNoRelationships(telegramId: number, tx?: ShopTransaction): Promise<UserOrderLine[]> {
			return db(tx)
				.select({
					product: products,
					order: orders,
					userName: users.userName,
					quantity: orderProducts.quantity,
				})
				.from(products)
				.innerJoin(orderProducts, eq(orderProducts.productId, products.productId))
				.innerJoin(orders, eq(orders.orderId, orderProducts.orderId))
				.innerJoin(users, eq(users.telegramId, orders.userId))
				.where(eq(users.telegramId, telegramId))
				.orderBy(asc(orders.orderId), asc(products.productId));
		},

		async getUserTotalNumberOfOrders(telegramId: number, tx?: ShopTransaction): Promise<number> {
			const [record] = await db(tx)
				.select({ ordersCount: count(orders.orderId) })
				.from(orders)
				.where(eq(orders.userId, telegramId));
			return record?.ordersCount ?? 0;
		},

		async getTotalNumberOfOrdersByUser(tx?: ShopTransaction): Promise<OrdersCountRow[]> {
			const rows = await db(tx)
				.select({ ordersCount: count(orders.orderId), telegramId: users.telegramId })
				.from(orders)
				.innerJoin(users, eq(users.telegramId, orders.userId))
				.groupBy(users.telegramId)
				.orderBy(asc(users.telegramId));

			return rows.map((row) => [row.ordersCount, row.telegramId] as const);
		},

		async getTotalNumberOfOrdersByUserWithLabels(tx?: ShopTransaction): Promise<LabelledTotalRow[]> {
			return db(tx)
				.select({ quantity: count(orders.orderId), name: users.fullName })
				.from(orders)
				.innerJoin(users, eq(users.telegramId, orders.userId))
				.groupBy(users.telegramId)
				.orderBy(asc(users.telegramId));
		},

		async getCountOfProductsByUser(tx?: ShopTransaction): Promise<LabelledTotalRow[]> {
			return productTotals(tx).query;
		},

		async getCountOfProductsGreaterThanXByUser(
			greaterThan: number,
			tx?: ShopTransaction,
		): Promise<LabelledTotalRow[]> {
			if (!Number.isInteger(greaterThan)) {
				throw new RangeError(`Product threshold must be an integer, got ${greaterThan}`);
			}
			const { query, quantity } = productTotals(tx);
			return query.having(sql`${quantity} > ${greaterThan}`);
		},
	};
}
