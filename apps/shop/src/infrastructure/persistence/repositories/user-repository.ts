/**
 * User Repository
 *
 * Data access for Telegram users and their referral links.
 */

import { and, asc, desc, eq, gt, ilike, inArray } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import { expectRow, resolveDb } from '@storefront/persistence';
import { assertTelegramId, users, type Order, type Product, type User } from '../schema/index.js';
import type { ShopDatabase, ShopTransaction } from '../database.js';

/**
 * Input for creating a user. The Telegram id is assigned by the caller.
 */
export interface NewUserInput {
	readonly telegramId: number;
	readonly fullName: string;
	readonly languageCode: string;
	readonly userName?: string | null;
	readonly phoneNumber?: string | null;
	readonly referrerId?: number | null;
}

/**
 * A user that was invited by another user.
 */
export interface InvitedUserRow {
	readonly parentName: string;
	readonly referralName: string;
}

export interface UserWithOrders extends User {
	readonly orders: Array<Order & { readonly lineItems: Array<{ readonly quantity: number; readonly product: Product }> }>;
}

/** Language codes accepted by getAllUsersAdvanced */
export const ADVANCED_LANGUAGE_CODES = ['en', 'uk'] as const;

export interface UserRepository {
	/**
	 * Insert a user. Rejects with the driver's unique violation when the
	 * Telegram id already exists.
	 */
	addUser(input: NewUserInput, tx?: ShopTransaction): Promise<void>;
	/**
	 * Insert a user, or refresh `userName` and `fullName` of an existing one,
	 * and return the stored row in the same statement.
	 *
	 * `languageCode`, `phoneNumber` and `referrerId` are written on insert only.
	 */
	addUserCombined(input: NewUserInput, tx?: ShopTransaction): Promise<User>;
	getUserById(telegramId: number, tx?: ShopTransaction): Promise<User | undefined>;
	getAllUsers(tx?: ShopTransaction): Promise<User[]>;
	getUserLanguageCode(telegramId: number, tx?: ShopTransaction): Promise<string | undefined>;
	/**
	 * Up to 10 most recently created users speaking English or Ukrainian whose
	 * username contains "john" (any case), with a positive Telegram id.
	 */
	getAllUsersAdvanced(tx?: ShopTransaction): Promise<User[]>;
	/** Referrer and referee full names for every user that has a referrer. */
	selectAllInvitedUsers(tx?: ShopTransaction): Promise<InvitedUserRow[]>;
	/** Every user with their orders, line items and products. */
	getAllUsersWithOrders(tx?: ShopTransaction): Promise<UserWithOrders[]>;
}

/**
 * Create a User repository.
 */
export function createUserRepository(defaultDb: ShopDatabase): UserRepository {
	const db = (tx?: ShopTransaction): ShopDatabase => resolveDb(defaultDb, tx);

	return {
		async addUser(input: NewUserInput, tx?: ShopTransaction): Promise<void> {
			await db(tx).insert(users).values(toRecord(input));
		},

		async addUserCombined(input: NewUserInput, tx?: ShopTransaction): Promise<User> {
			const rows = await db(tx)
				.insert(users)
				.values(toRecord(input))
				.onConflictDoUpdate({
					target: users.telegramId,
					set: {
						userName: input.userName ?? null,
						fullName: input.fullName,
					},
				})
				.returning();

			return expectRow(rows, 'users');
		},

		async getUserById(telegramId: number, tx?: ShopTransaction): Promise<User | undefined> {
			const [record] = await db(tx).select().from(users).where(eq(users.telegramId, telegramId)).limit(1);
			return record;
		},

		async getAllUsers(tx?: ShopTransaction): Promise<User[]> {
			return db(tx).select().from(users).orderBy(asc(users.createdAt), asc(users.telegramId));
		},

		async getUserLanguageCode(telegramId: number, tx?: ShopTransaction): Promise<string | undefined> {
			const [record] = await db(tx)
				.select({ languageCode: users.languageCode })
				.from(users)
				.where(eq(users.telegramId, telegramId))
				.limit(1);
			return record?.languageCode;
		},

		async getAllUsersAdvanced(tx?: ShopTransaction): Promise<User[]> {
			return db(tx)
				.select()
				.from(users)
				.where(
					and(
						inArray(users.languageCode, [...ADVANCED_LANGUAGE_CODES]),
						ilike(users.userName, '%john%'),
						gt(users.telegramId, 0),
					),
				)
				.orderBy(desc(users.createdAt))
				.limit(10);
		},

		async selectAllInvitedUsers(tx?: ShopTransaction): Promise<InvitedUserRow[]> {
			const parent = alias(users, 'parent');
			const referral = alias(users, 'referral');

			return db(tx)
				.select({
					parentName: parent.fullName,
					referralName: referral.fullName,
				})
				.from(parent)
				.innerJoin(referral, eq(referral.referrerId, parent.telegramId))
				.orderBy(asc(referral.telegramId));
		},

		async getAllUsersWithOrders(tx?: ShopTransaction): Promise<UserWithOrders[]> {
			return db(tx).query.users.findMany({
				orderBy: (user, { asc }) => [asc(user.createdAt), asc(user.telegramId)],
				with: {
					orders: {
						orderBy: (order, { asc }) => [asc(order.orderId)],
						with: {
							lineItems: {
								columns: { quantity: true },
								orderBy: (item, { asc }) => [asc(item.productId)],
								with: { product: true },
							},
						},
					},
				},
			});
		},
	};
}

/**
 * @throws RangeError when an id is outside the safe integer range
 */
function toRecord(input: NewUserInput) {
	const referrerId = input.referrerId ?? null;
	return {
		telegramId: assertTelegramId(input.telegramId),
		fullName: input.fullName,
		userName: input.userName ?? null,
		phoneNumber: input.phoneNumber ?? null,
		languageCode: input.languageCode,
		referrerId: referrerId === null ? null : assertTelegramId(referrerId),
	};
}
