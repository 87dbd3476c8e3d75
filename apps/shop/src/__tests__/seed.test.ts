import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createLogger } from '@storefront/logging';
import { seedFakeData } from '../seed.js';
import { createShopTestDatabase, silentLogger, type ShopTestDatabase } from './support/shop-database.js';

describe('seedFakeData', () => {
	let shop: ShopTestDatabase;

	beforeEach(async () => {
		shop = await createShopTestDatabase();
	});

	afterEach(async () => {
		await shop.close();
	});

	it('should create users, orders, products and line items', async () => {
		const summary = await seedFakeData(shop.repository, { logger: silentLogger() });

		expect(summary.users).toHaveLength(10);
		expect(summary.orders).toHaveLength(10);
		expect(summary.products.length).toBeGreaterThanOrEqual(3);
		expect(summary.lineItems).toBe(30);
		expect(await shop.repository.getAllUsers()).toHaveLength(10);

		const total = (await shop.repository.getTotalNumberOfOrdersByUser()).reduce((sum, [count]) => sum + count, 0);
		expect(total).toBe(10);
	});

	it('should chain every new user to the one created before it', async () => {
		const { users } = await seedFakeData(shop.repository, { logger: silentLogger() });

		expect(users[0]?.referrerId).toBeNull();
		for (let i = 1; i < users.length; i++) {
			expect(users[i]?.referrerId).toBe(users[i - 1]?.telegramId);
		}
		expect(await shop.repository.selectAllInvitedUsers()).toHaveLength(9);
	});

	it('should refer the first new user to the last existing one', async () => {
		await shop.repository.addUser({ telegramId: 10_000, fullName: 'Founder', languageCode: 'en' });

		const { users } = await seedFakeData(shop.repository, { users: 2, orders: 0, products: 0, logger: silentLogger() });

		expect(users.map((u) => u.referrerId)).toEqual([10_000, users[0]?.telegramId]);
	});

	it('should write the same users for the same seed', async () => {
		const other = await createShopTestDatabase();
		try {
			const options = { seed: 7, orders: 0, products: 0, logger: silentLogger() };
			const first = await seedFakeData(shop.repository, options);
			const second = await seedFakeData(other.repository, options);

			expect(second.users.map((u) => [u.telegramId, u.fullName])).toEqual(
				first.users.map((u) => [u.telegramId, u.fullName]),
			);
		} finally {
			await other.close();
		}
	});

	it('should log the summary from the seeder component', async () => {
		const lines: Array<Record<string, unknown>> = [];
		const logger = createLogger({
			level: 'info',
			serviceName: 'test',
			destination: { write: (msg: string) => lines.push(JSON.parse(msg) as Record<string, unknown>) },
		});

		await seedFakeData(shop.repository, { users: 1, orders: 1, products: 3, logger });

		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({
			component: 'seeder',
			service: 'test',
			msg: 'Seeded fake data',
			users: 1,
			orders: 1,
		});
	});

	it('should skip orders when there are no users', async () => {
		const summary = await seedFakeData(shop.repository, { users: 0, logger: silentLogger() });

		expect(summary.orders).toEqual([]);
		expect(summary.lineItems).toBe(0);
		expect(summary.products.length).toBeGreaterThan(0);
	});
});
