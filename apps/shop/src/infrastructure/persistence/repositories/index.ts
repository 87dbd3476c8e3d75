export {
	ADVANCED_LANGUAGE_CODES,
	createUserRepository,
	type InvitedUserRow,
	type NewUserInput,
	type UserRepository,
	type UserWithOrders,
} from './user-repository.js';
export { createProductRepository, type NewProductInput, type ProductRepository } from './product-repository.js';
export { createOrderRepository, type OrderRepository } from './order-repository.js';
export {
	createReportRepository,
	type LabelledTotalRow,
	type OrdersCountRow,
	type ReportRepository,
	type UserOrderLine,
	type UserOrderNameRow,
	type UserOrderRow,
} from './report-repository.js';
export { createShopRepository, type ShopRepository } from './shop-repository.js';
