/**
 * Persistence Errors
 *
 * Store errors are never translated: constraint violations reach the caller
 * exactly as the driver raised them. These helpers only classify them.
 */

/**
 * Integrity constraint classes, keyed by PostgreSQL SQLSTATE.
 */
const CONSTRAINT_VIOLATIONS = {
	'23502': 'not_null_violation',
	'23503': 'foreign_key_violation',
	'23505': 'unique_violation',
	'23514': 'check_violation',
} as const;

export type ConstraintViolation = (typeof CONSTRAINT_VIOLATIONS)[keyof typeof CONSTRAINT_VIOLATIONS];

/**
 * Thrown when a write that must return a row (INSERT ... RETURNING) returns none.
 */
export class PersistenceError extends Error {
	constructor(
		message: string,
		public readonly table: string,
	) {
		super(message);
		this.name = 'PersistenceError';
	}
}

/**
 * Find the SQLSTATE of a database error. Looks through the `cause` chain,
 * since Drizzle wraps driver errors.
 */
export function sqlStateOf(error: unknown): string | undefined {
	let current: unknown = error;
	for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
		if ('code' in current && typeof current.code === 'string') {
			return current.code;
		}
		current = 'cause' in current ? current.cause : undefined;
	}
	return undefined;
}

/**
 * Classify an error as an integrity constraint violation.
 *
 * @returns undefined for anything that is not a constraint violation
 */
export function constraintViolationOf(error: unknown): ConstraintViolation | undefined {
	const state = sqlStateOf(error);
	if (state === undefined || !isConstraintState(state)) return undefined;
	return CONSTRAINT_VIOLATIONS[state];
}

function isConstraintState(state: string): state is keyof typeof CONSTRAINT_VIOLATIONS {
	return Object.hasOwn(CONSTRAINT_VIOLATIONS, state);
}

/**
 * Take the single row of a RETURNING write.
 */
export function expectRow<T>(rows: readonly T[], table: string): T {
	const [row] = rows;
	if (row === undefined) {
		throw new PersistenceError(`Write to ${table} returned no row`, table);
	}
	return row;
}
