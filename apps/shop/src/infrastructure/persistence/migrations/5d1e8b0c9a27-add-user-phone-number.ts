import type { Migration } from '@storefront/persistence';

export const addUserPhoneNumber: Migration = {
	revision: '5d1e8b0c9a27',
	downRevision: 'a3f9c2e71b04',
	description: 'add user phone number',

	async upgrade(op) {
		await op.addColumn('users', 'phone_number', 'varchar(50)');
	},

	async downgrade(op) {
		await op.dropColumn('users', 'phone_number');
	},
};
