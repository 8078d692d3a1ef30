/**
 * Record definitions: statically declared column bindings for typed rows.
 *
 * A record is described by a Zod object shape. Each field's schema decides
 * how a cell is coerced, and its column name is the field name unless
 * overridden with `.meta({column: "..."})`. Metadata is extracted once at
 * defineRecord() call time.
 *
 * @example
 * const User = defineRecord({
 *   id: z.number().int(),
 *   name: z.string().meta({column: "user_name"}),
 *   score: z.number(),
 *   active: z.boolean(),
 *   avatar: z.instanceof(Uint8Array),
 * });
 * type User = RecordOf<typeof User>;
 */

import {z} from "zod";

import {RecordDefinitionError} from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export type FieldKind = "boolean" | "string" | "float" | "integer" | "bytes";

export type FieldValue = boolean | string | number | Uint8Array;

/**
 * Binding of one record field to one result column.
 */
export interface FieldBinding {
	readonly field: string;
	readonly column: string;
	readonly kind: FieldKind;
}

export type RecordShape = Record<string, z.ZodType>;

/**
 * Field values of a record under construction.
 */
export type FieldValues = Record<string, FieldValue>;

export interface RecordDefinition<TShape extends RecordShape = RecordShape> {
	readonly schema: z.ZodObject<TShape>;
	/** Bindings in declaration order */
	readonly fields: readonly FieldBinding[];
	/** Zero-valued field values: false, "", 0, 0, empty bytes */
	create(): FieldValues;
	/** Validate materialized field values into the record type */
	parse(values: FieldValues): z.infer<z.ZodObject<TShape>>;
}

export type RecordOf<TDefinition> =
	TDefinition extends RecordDefinition<infer TShape>
		? z.infer<z.ZodObject<TShape>>
		: never;

// ============================================================================
// Definition
// ============================================================================

export function defineRecord<TShape extends RecordShape>(
	shape: TShape,
): RecordDefinition<TShape> {
	const schema = z.object(shape);
	const fields: FieldBinding[] = [];
	const byColumn = new Map<string, string>();

	for (const [field, fieldSchema] of Object.entries(shape)) {
		const binding = extractBinding(field, fieldSchema);
		const existing = byColumn.get(binding.column);
		if (existing !== undefined) {
			throw new RecordDefinitionError(
				`Column "${binding.column}" is bound to both "${existing}" and "${field}"`,
				field,
			);
		}
		byColumn.set(binding.column, field);
		fields.push(binding);
	}

	return {
		schema,
		fields,
		create() {
			const values: FieldValues = {};
			for (const binding of fields) {
				values[binding.field] = zeroValue(binding.kind);
			}
			return values;
		},
		parse(values) {
			return schema.parse(values);
		},
	};
}

/**
 * Map result columns to the bindings that receive them.
 *
 * The returned array is indexed like `columns`. Columns without a binding
 * map to undefined and are skipped; bindings without a column are unused.
 */
export function resolveBindings(
	definition: RecordDefinition,
	columns: readonly {readonly name: string}[],
): (FieldBinding | undefined)[] {
	const byColumn = new Map<string, FieldBinding>();
	for (const binding of definition.fields) {
		byColumn.set(binding.column, binding);
	}
	return columns.map((column) => byColumn.get(column.name));
}

export function zeroValue(kind: FieldKind): FieldValue {
	switch (kind) {
		case "boolean":
			return false;
		case "string":
			return "";
		case "float":
		case "integer":
			return 0;
		case "bytes":
			return new Uint8Array(0);
	}
}

// ============================================================================
// Field Metadata Extraction (using only public Zod APIs)
// ============================================================================

function extractBinding(field: string, schema: z.ZodType): FieldBinding {
	let core: z.core.$ZodType = schema;
	let column: string | undefined;

	// Outer .meta() wins over inner layers
	while (true) {
		const meta = z.globalRegistry.get(core);
		const declared: unknown = meta?.["column"];
		if (column === undefined && typeof declared === "string") {
			column = declared;
		}

		if (
			core instanceof z.ZodOptional ||
			core instanceof z.ZodNullable ||
			core instanceof z.ZodDefault
		) {
			core = core.unwrap();
			continue;
		}

		break;
	}

	return {field, column: column ?? field, kind: inferKind(field, core)};
}

function inferKind(field: string, core: z.core.$ZodType): FieldKind {
	if (core instanceof z.ZodBoolean) return "boolean";
	if (core instanceof z.ZodString) return "string";
	if (core instanceof z.ZodNumber) return core.isInt ? "integer" : "float";
	if (
		core instanceof z.ZodCustom &&
		core.safeParse(new Uint8Array(0)).success
	) {
		return "bytes";
	}

	throw new RecordDefinitionError(
		`Field "${field}" must be a boolean, string, number or Uint8Array schema`,
		field,
	);
}
