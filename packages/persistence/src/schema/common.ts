/**
 * Common Schema Definitions
 *
 * Shared column definitions and naming used across all database tables.
 */

import { timestamp } from 'drizzle-orm/pg-core';

/**
 * Table name for an entity: lower-cased entity name with a trailing "s".
 *
 * @example
 * ```typescript
 * tableName('OrderProduct'); // 'orderproducts'
 * ```
 */
export function tableName<TEntity extends string>(entityName: TEntity): `${Lowercase<TEntity>}s`;
export function tableName(entityName: string): string {
	return `${entityName.toLowerCase()}s`;
}

/**
 * Standard timestamp column with timezone.
 */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

/**
 * Audit columns shared by entity tables.
 * Both default to now() on insert; updated_at is refreshed by the
 * set_updated_at() trigger installed with the table.
 */
export const auditColumns = {
	createdAt: timestampColumn('created_at').notNull().defaultNow(),
	updatedAt: timestampColumn('updated_at').notNull().defaultNow(),
};

