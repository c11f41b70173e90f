/**
 * rowframe - in-memory, column-typed, row-oriented tables
 *
 * Tables hold typed, formatted columns over rows of cell values. They are
 * filtered and joined through lazily built expressions, reshaped by column
 * algebra, identified by a content digest and stored in a binary format.
 */

// Tables
export { Table } from './table/table.js';
export type {
	AddColumnOptions,
	ColumnSource,
	PrintTarget,
	RowFunction,
	StoreOptions,
	TableOptions,
	ToTableOptions,
} from './table/table.js';
export { mergeTables } from './table/merge.js';
export type { MergeOptions } from './table/merge.js';
export type { RenderOptions } from './table/render.js';

// Expressions
export { Expr, ColumnHandle, lit, and, or, not, when, toExpression } from './expr/builders.js';
export type { ApplyOptions, ExprLike } from './expr/builders.js';
export type {
	Expression,
	AggregateFunction,
	BinaryOperator,
	UnaryOperator,
} from './expr/ast.js';
export { neededColumns, walkExpression } from './expr/ast.js';
export { evaluate, isTruthy } from './expr/evaluate.js';
export type { ColumnData, ContextProvider, EvalContext } from './expr/context.js';
export { expressionToString } from './expr/stringify.js';

// Common data types and errors
export { StatusCode, metaKey, parseMetaKey, isHashable } from './common/types.js';
export type { CellValue, CellRecord, Hashable, Meta, MetaKey, Row, TableRef } from './common/types.js';
export {
	TableError,
	SchemaError,
	ShapeMismatchError,
	TypeMismatchError,
	NameCollisionError,
	LoadError,
	ArgumentError,
} from './common/errors.js';

// Column types
export type { ColumnType } from './types/column-type.js';
export {
	INT_TYPE,
	FLOAT_TYPE,
	STR_TYPE,
	BOOL_TYPE,
	BYTES_TYPE,
	LIST_TYPE,
	DICT_TYPE,
	OBJECT_TYPE,
	TABLE_TYPE,
	BLOB_TYPE,
	hashableType,
} from './types/builtin-types.js';
export { typeRegistry, registerType, getType, resolveColumnType } from './types/registry.js';
export type { ColumnTypeSpec } from './types/registry.js';
export { commonTypeFor, typeOfValue } from './types/inference.js';
export { Blob } from './types/blob.js';

// Formats
export { registerFormatter, guessFormatFor, cellToString, interpolate } from './util/format.js';
export type { ColumnFormat, NamedFormatter } from './util/format.js';

// Persistence and interchange
export { registerObjectCodec, encodeValue, decodeValue } from './io/codec.js';
export type { ObjectCodec, DecodeSession } from './io/codec.js';
export { FORMAT_VERSION } from './io/table-file.js';
export { loadCSV, storeCSV, bestConvert } from './io/csv.js';
export type { LoadCSVOptions, StoreCSVOptions } from './io/csv.js';
export { toColumns, fromColumns, fromMatrix } from './io/columnar.js';
export type { ColumnarData, FromColumnsOptions } from './io/columnar.js';

// Configuration and logging
export { tableOptions, createTableOptions, TableOptionsManager } from './core/options.js';
export type { OptionDefinition, OptionValue, OptionChangeEvent } from './core/options.js';
export { createLogger, enableLogging, disableLogging } from './common/logger.js';
