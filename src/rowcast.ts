/**
 * rowcast - Build SQL. Get typed rows.
 *
 * Statement builder, literal inliner and row conversion for MySQL,
 * PostgreSQL and SQLite drivers.
 */

// ============================================================================
// Database
// ============================================================================

export {
	// Classes
	Database,

	// Driver types
	type Driver,
	type RowCursor,
	type ExecSummary,
	type ColumnType,
	type ColumnCategory,
} from "./impl/database.js";

export {
	type DatabaseOptions,
	type ResolvedOptions,
	DEFAULT_QUEUE_INTERVAL,
	resolveOptions,
} from "./impl/options.js";

// ============================================================================
// Statements
// ============================================================================

export {
	Statement,

	// Unbound constructors
	insert,
	del,
	update,
	select,
	insertOrUpdate,

	// Types
	type StatementKind,
	type RenderedStatement,
	type ExecResult,
} from "./impl/statement.js";

export {inlineSQL, formatLiteral} from "./impl/literal.js";

export {
	type SQLDialect,
	quoteIdent,
	placeholder,
	supportsLimit,
} from "./impl/sql.js";

// ============================================================================
// Values
// ============================================================================

export {
	type SQLValue,
	type RawValue,
	type Values,
	values,
	getString,
	getNumber,
	getInt,
	getBigInt,
	isSQLValue,
} from "./impl/values.js";

// ============================================================================
// Records and Conversion
// ============================================================================

export {
	defineRecord,
	resolveBindings,
	zeroValue,
	type RecordDefinition,
	type RecordShape,
	type RecordOf,
	type FieldBinding,
	type FieldKind,
	type FieldValue,
	type FieldValues,
} from "./impl/record.js";

export {
	materializeRecord,
	materializeMap,
	materializeText,
	readRecord,
	readRecords,
	readMap,
	readMaps,
	readTextRows,
	type RowMap,
	type TextRow,
} from "./impl/materialize.js";

export {
	rawText,
	coerceBoolean,
	coerceString,
	coerceFloat,
	coerceInteger,
	coerceBytes,
	parseFloatOrZero,
	parseIntOrZero,
} from "./impl/coerce.js";

// ============================================================================
// Queue and Cache
// ============================================================================

export {
	ExecutionQueue,
	type QueueItem,
	type QueueExecutor,
	type QueueOptions,
	type StopOptions,
} from "./impl/queue.js";

export {Cache, DEFAULT_GROUP} from "./impl/cache.js";

// ============================================================================
// Logging
// ============================================================================

export {
	createConsoleLogger,
	type Logger,
	type LogLevel,
	type ConsoleLoggerOptions,
} from "./impl/logger.js";

// ============================================================================
// Errors
// ============================================================================

export {
	// Base error
	DatabaseError,
	isDatabaseError,
	hasErrorCode,

	// Statement errors
	ConfigurationError,
	UnsupportedValueError,
	RecordDefinitionError,

	// Query errors
	NoRowsError,

	// Queue errors
	QueueError,

	// Error types
	type DatabaseErrorCode,
} from "./impl/errors.js";
