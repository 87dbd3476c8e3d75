/**
 * Shop migration history, base first.
 */

import type { Migration } from '@storefront/persistence';
import { createShopTables } from './a3f9c2e71b04-create-shop-tables.js';
import { addUserPhoneNumber } from './5d1e8b0c9a27-add-user-phone-number.js';
import { addProductTitleUnique } from './c8047e2d6f13-add-product-title-unique.js';

export const shopMigrations: readonly Migration[] = [createShopTables, addUserPhoneNumber, addProductTitleUnique];

export { createShopTables, addUserPhoneNumber, addProductTitleUnique };
