/**
 * Structured error types for database operations.
 *
 * All database errors extend DatabaseError, which includes an error code
 * for programmatic error handling. Errors raised by drivers are passed
 * through unmodified.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type DatabaseErrorCode =
	| "CONFIGURATION_ERROR"
	| "NO_ROWS"
	| "UNSUPPORTED_VALUE"
	| "RECORD_DEFINITION_ERROR"
	| "QUEUE_ERROR";

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all database errors.
 *
 * Includes an error code for programmatic handling.
 */
export class DatabaseError extends Error {
	readonly code: DatabaseErrorCode;

	constructor(
		code: DatabaseErrorCode,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "DatabaseError";
		this.code = code;

		// Maintains proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

// ============================================================================
// Specific Error Types
// ============================================================================

/**
 * Thrown when a statement or database is configured in a way that cannot
 * be rendered or executed (empty table, empty values, whole-table
 * UPDATE/DELETE without unsafe(), invalid options).
 */
export class ConfigurationError extends DatabaseError {
	readonly issues: Record<string, string[]>;

	constructor(
		message: string,
		issues: Record<string, string[]> = {},
		options?: ErrorOptions,
	) {
		super("CONFIGURATION_ERROR", message, options);
		this.name = "ConfigurationError";
		this.issues = issues;
	}
}

/**
 * Thrown by single-row entry points when the query returned nothing.
 */
export class NoRowsError extends DatabaseError {
	readonly sql?: string;

	constructor(sql?: string, options?: ErrorOptions) {
		super("NO_ROWS", "no rows in result set", options);
		this.name = "NoRowsError";
		this.sql = sql;
	}
}

/**
 * Thrown when a value cannot be written as an SQL literal.
 */
export class UnsupportedValueError extends DatabaseError {
	readonly valueType: string;
	readonly value: unknown;
	readonly sql: string;

	constructor(value: unknown, sql: string, options?: ErrorOptions) {
		const valueType = describeType(value);
		super(
			"UNSUPPORTED_VALUE",
			`invalid sql argument type: ${valueType} => ${String(value)} (sql: ${sql})`,
			options,
		);
		this.name = "UnsupportedValueError";
		this.valueType = valueType;
		this.value = value;
		this.sql = sql;
	}
}

/**
 * Thrown when a record definition is invalid.
 */
export class RecordDefinitionError extends DatabaseError {
	readonly fieldName?: string;

	constructor(message: string, fieldName?: string, options?: ErrorOptions) {
		super("RECORD_DEFINITION_ERROR", message, options);
		this.name = "RecordDefinitionError";
		this.fieldName = fieldName;
	}
}

/**
 * Thrown when the execution queue is used after it was stopped.
 */
export class QueueError extends DatabaseError {
	constructor(message: string, options?: ErrorOptions) {
		super("QUEUE_ERROR", message, options);
		this.name = "QueueError";
	}
}

function describeType(value: unknown): string {
	if (value === null) return "null";
	if (typeof value === "object") {
		return value.constructor?.name ?? "object";
	}
	return typeof value;
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a DatabaseError.
 */
export function isDatabaseError(error: unknown): error is DatabaseError {
	return error instanceof DatabaseError;
}

/**
 * Check if an error has a specific error code.
 */
export function hasErrorCode(
	error: unknown,
	code: DatabaseErrorCode,
): error is DatabaseError {
	return isDatabaseError(error) && error.code === code;
}
