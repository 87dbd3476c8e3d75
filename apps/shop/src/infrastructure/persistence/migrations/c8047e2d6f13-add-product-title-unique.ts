import type { Migration } from '@storefront/persistence';

export const addProductTitleUnique: Migration = {
	revision: 'c8047e2d6f13',
	downRevision: '5d1e8b0c9a27',
	description: 'add unique title constraint to products',

	async upgrade(op) {
		await op.createUniqueConstraint('products_title_key', 'products', ['title']);
	},

	async downgrade(op) {
		await op.dropConstraint('products_title_key', 'products');
	},
};
