/**
 * Users Database Schema
 *
 * Telegram users. The primary key is the Telegram id assigned by the caller;
 * the store never generates it.
 */

import { bigint, pgTable, varchar, type AnyPgColumn } from 'drizzle-orm/pg-core';
import { auditColumns, tableName } from '@storefront/persistence';

export const users = pgTable(tableName('User'), {
	telegramId: bigint('telegram_id', { mode: 'number' }).primaryKey(),
	fullName: varchar('full_name', { length: 255 }).notNull(),
	userName: varchar('user_name', { length: 255 }),
	phoneNumber: varchar('phone_number', { length: 50 }),
	languageCode: varchar('language_code', { length: 10 }).notNull(),
	/** Weak reference to the inviting user; cleared when the referrer is deleted */
	referrerId: bigint('referrer_id', { mode: 'number' }).references((): AnyPgColumn => users.telegramId, {
		onDelete: 'set null',
	}),
	...auditColumns,
});

/**
 * Telegram ids are read as JS numbers. Telegram keeps them below 2^52, so
 * anything outside the safe integer range is a caller error.
 *
 * @throws RangeError for ids that would lose precision
 */
export function assertTelegramId(id: number): number {
	if (!Number.isSafeInteger(id)) {
		throw new RangeError(`Telegram id ${id} is not a safe integer`);
	}
	return id;
}

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
