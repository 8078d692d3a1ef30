/**
 * SQL rendering utilities for all dialects.
 *
 * This is the single source of truth for dialect-specific SQL rendering:
 * - Identifier quoting
 * - Placeholder syntax
 * - Clause support
 */

// ============================================================================
// Types
// ============================================================================

export type SQLDialect = "sqlite" | "postgresql" | "mysql";

// ============================================================================
// Core Helpers
// ============================================================================

/**
 * Quote an identifier based on dialect.
 * MySQL uses backticks, PostgreSQL/SQLite use double quotes.
 */
export function quoteIdent(name: string, dialect: SQLDialect): string {
	if (dialect === "mysql") {
		return `\`${name.replace(/`/g, "``")}\``;
	}
	return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Get placeholder syntax based on dialect.
 * PostgreSQL uses $1, $2, etc. MySQL/SQLite use ?.
 */
export function placeholder(index: number, dialect: SQLDialect): string {
	if (dialect === "postgresql") {
		return `$${index}`;
	}
	return "?";
}

/**
 * Whether statements render their LIMIT clause for this dialect.
 *
 * Limit fragments use MySQL's `offset,count` form, so only MySQL gets them.
 */
export function supportsLimit(dialect: SQLDialect): boolean {
	return dialect === "mysql";
}
