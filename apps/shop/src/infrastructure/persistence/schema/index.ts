/**
 * Database Schema
 *
 * All table and relation definitions for the shop.
 */

export { assertTelegramId, users, type User, type NewUser } from './users.js';
export { products, type Product, type NewProduct } from './products.js';
export { orders, type Order, type NewOrder } from './orders.js';
export { orderProducts, type OrderProduct, type NewOrderProduct } from './order-products.js';
export { usersRelations, ordersRelations, orderProductsRelations, productsRelations } from './relations.js';
