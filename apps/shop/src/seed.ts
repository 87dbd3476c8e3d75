/**
 * Fake Data Seeder
 *
 * Fills the shop with reproducible fake users, orders, products and line items.
 * The same seed against the same starting data writes the same rows.
 */

import { Faker, base, en } from '@faker-js/faker';
import { createChildLogger, getLogger, type Logger } from '@storefront/logging';
import type { Order, Product, User } from './infrastructure/persistence/schema/index.js';
import type { ShopRepository } from './infrastructure/persistence/repositories/index.js';

const LANGUAGE_CODES = ['en', 'uk', 'de', 'fr', 'es', 'it', 'pl'] as const;

export interface SeedOptions {
	/** Generator seed (default: 0) */
	readonly seed?: number;
	readonly users?: number;
	readonly orders?: number;
	readonly products?: number;
	/** Distinct products put on every order (default: 3) */
	readonly productsPerOrder?: number;
	readonly logger?: Logger;
}

export interface SeedSummary {
	readonly users: User[];
	readonly orders: Order[];
	readonly products: Product[];
	readonly lineItems: number;
}

/**
 * Seed the shop through the repository.
 *
 * Every new user gets an unused Telegram id and is referred by the user
 * created just before it; the first one by the last user already stored, if
 * any. Orders go to random users, existing ones included.
 */
export async function seedFakeData(repository: ShopRepository, options: SeedOptions = {}): Promise<SeedSummary> {
	const logger = createChildLogger(options.logger ?? getLogger(), { component: 'seeder' });
	const faker = new Faker({ locale: [en, base] });
	faker.seed(options.seed ?? 0);

	const users = await repository.getAllUsers();
	const existingUsers = users.length;
	const takenIds = new Set(users.map((u) => u.telegramId));

	for (let i = 0; i < (options.users ?? 10); i++) {
		let telegramId = faker.number.int({ min: 1, max: 9999 });
		while (takenIds.has(telegramId)) {
			telegramId = faker.number.int({ min: 1, max: 9999 });
		}
		takenIds.add(telegramId);

		const user = await repository.addUserCombined({
			telegramId,
			fullName: faker.person.fullName(),
			languageCode: faker.helpers.arrayElement(LANGUAGE_CODES),
			userName: faker.internet.username(),
			phoneNumber: faker.phone.number(),
			referrerId: users.at(-1)?.telegramId ?? null,
		});
		users.push(user);
	}

	const orders: Order[] = [];
	const orderCount = options.orders ?? 10;
	if (users.length === 0 && orderCount > 0) {
		logger.warn('No users to place orders for, skipping orders');
	} else {
		for (let i = 0; i < orderCount; i++) {
			orders.push(await repository.addOrder(faker.helpers.arrayElement(users).telegramId));
		}
	}

	const products = new Map<number, Product>();
	for (let i = 0; i < (options.products ?? 10); i++) {
		const product = await repository.addProduct({
			title: faker.word.noun(),
			description: faker.lorem.sentence(),
			price: faker.finance.amount({ min: 1, max: 99_999, dec: 4 }),
		});
		// a repeated title updates the existing product
		products.set(product.productId, product);
	}

	let lineItems = 0;
	const catalogue = [...products.values()];
	for (const order of orders) {
		for (const product of faker.helpers.arrayElements(catalogue, options.productsPerOrder ?? 3)) {
			await repository.addOrderProduct(order.orderId, product.productId, faker.number.int({ min: 1, max: 100 }));
			lineItems++;
		}
	}

	logger.info(
		{
			users: users.length - existingUsers,
			orders: orders.length,
			products: catalogue.length,
			lineItems,
		},
		'Seeded fake data',
	);

	return { users: users.slice(existingUsers), orders, products: catalogue, lineItems };
}
