/**
 * Shop Repository
 *
 * Single entry point over the shop's repositories. Every method runs one
 * statement and auto-commits unless a transaction context is passed.
 */

import type { ShopDatabase } from '../database.js';
import { createOrderRepository, type OrderRepository } from './order-repository.js';
import { createProductRepository, type ProductRepository } from './product-repository.js';
import { createReportRepository, type ReportRepository } from './report-repository.js';
import { createUserRepository, type UserRepository } from './user-repository.js';

export type ShopRepository = UserRepository & ProductRepository & OrderRepository & ReportRepository;

export function createShopRepository(db: ShopDatabase): ShopRepository {
	return {
		...createUserRepository(db),
		...createProductRepository(db),
		...createOrderRepository(db),
		...createReportRepository(db),
	};
}
