/**
 * Product Repository
 */

import { sql } from 'drizzle-orm';
import { expectRow, resolveDb } from '@storefront/persistence';
import { products, type Product } from '../schema/index.js';
import type { ShopDatabase, ShopTransaction } from '../database.js';

export interface NewProductInput {
	readonly title: string;
	readonly description?: string | null;
	/** Decimal string; numbers are converted with String() */
	readonly price: string | number;
}

export interface ProductRepository {
	/**
	 * Insert a product, or update the price of the product with the same title.
	 * The description of an existing product is left as it is.
	 */
	addProduct(input: NewProductInput, tx?: ShopTransaction): Promise<Product>;
}

export function createProductRepository(defaultDb: ShopDatabase): ProductRepository {
	const db = (tx?: ShopTransaction): ShopDatabase => resolveDb(defaultDb, tx);

	return {
		async addProduct(input: NewProductInput, tx?: ShopTransaction): Promise<Product> {
			const rows = await db(tx)
				.insert(products)
				.values({
					title: input.title,
					description: input.description ?? null,
					price: String(input.price),
				})
				.onConflictDoUpdate({
					target: products.title,
					set: { price: sql`excluded.price` },
				})
				.returning();

			return expectRow(rows, 'products');
		},
	};
}
