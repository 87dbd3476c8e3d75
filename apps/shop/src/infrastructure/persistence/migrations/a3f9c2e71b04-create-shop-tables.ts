/**
 * Create users, products, orders and order products, and the trigger that
 * keeps updated_at current.
 */

import { sql } from 'drizzle-orm';
import type { Migration } from '@storefront/persistence';

const AUDITED_TABLES = ['users', 'products', 'orders'] as const;

export const createShopTables: Migration = {
	revision: 'a3f9c2e71b04',
	downRevision: null,
	description: 'create shop tables',

	async upgrade(op) {
		await op.execute(sql`
			CREATE FUNCTION set_updated_at() RETURNS trigger LANGUAGE plpgsql AS $$
			BEGIN
				NEW.updated_at = now();
				RETURN NEW;
			END;
			$$
		`);

		await op.execute(sql`
			CREATE TABLE users (
				telegram_id bigint PRIMARY KEY,
				full_name varchar(255) NOT NULL,
				user_name varchar(255),
				language_code varchar(10) NOT NULL,
				referrer_id bigint REFERENCES users (telegram_id) ON DELETE SET NULL,
				created_at timestamptz NOT NULL DEFAULT now(),
				updated_at timestamptz NOT NULL DEFAULT now()
			)
		`);

		await op.execute(sql`
			CREATE TABLE products (
				product_id serial PRIMARY KEY,
				title varchar(255) NOT NULL,
				description varchar(3000),
				price numeric(16, 4) NOT NULL,
				created_at timestamptz NOT NULL DEFAULT now(),
				updated_at timestamptz NOT NULL DEFAULT now()
			)
		`);

		await op.execute(sql`
			CREATE TABLE orders (
				order_id serial PRIMARY KEY,
				user_id bigint NOT NULL REFERENCES users (telegram_id) ON DELETE CASCADE,
				created_at timestamptz NOT NULL DEFAULT now(),
				updated_at timestamptz NOT NULL DEFAULT now()
			)
		`);

		await op.execute(sql`
			CREATE TABLE orderproducts (
				order_id integer NOT NULL REFERENCES orders (order_id) ON DELETE CASCADE,
				product_id integer NOT NULL REFERENCES products (product_id) ON DELETE RESTRICT,
				quantity integer NOT NULL,
				CONSTRAINT orderproducts_pkey PRIMARY KEY (order_id, product_id)
			)
		`);

		for (const table of AUDITED_TABLES) {
			await op.execute(sql`
				CREATE TRIGGER ${sql.identifier(`${table}_set_updated_at`)}
				BEFORE UPDATE ON ${sql.identifier(table)}
				FOR EACH ROW EXECUTE FUNCTION set_updated_at()
			`);
		}
	},

	async downgrade(op) {
		await op.execute(sql`DROP TABLE orderproducts`);
		await op.execute(sql`DROP TABLE orders`);
		await op.execute(sql`DROP TABLE products`);
		await op.execute(sql`DROP TABLE users`);
		await op.execute(sql`DROP FUNCTION set_updated_at()`);
	},
};
