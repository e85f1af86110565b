/**
 * Input document parsing
 *
 * Table schemas and hint tables usually arrive as JSON files. Both are
 * checked with Ajv before they reach RowGenerator. Only the document
 * structure is checked here: whether a column type is a real type, or a hint
 * has a recognized shape, is decided at generation time (unknown types and
 * unrecognized hints are warnings there, not errors).
 */

import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';

import { ErrorCode } from '../errors/codes.js';
import type { ColumnSpec, TableSchema } from '../types/column.js';
import { SchemaError } from '../types/errors.js';
import type { HintTable } from '../types/hints.js';
import { type Result, err, ok } from '../types/result.js';

interface ColumnDocument {
  name: string;
  type: string;
}

type TableSchemaDocument = ColumnDocument[] | { columns: ColumnDocument[] };

const COLUMN_SCHEMA = {
  type: 'object',
  required: ['name', 'type'],
  properties: {
    name: { type: 'string', minLength: 1 },
    type: { type: 'string', minLength: 1 },
  },
} as const;

// A bare column array, or an object wrapping it (the shape of a
// `DESCRIBE TABLE ... FORMAT JSON` result trimmed to its columns)
const TABLE_SCHEMA_DOCUMENT = {
  oneOf: [
    { type: 'array', items: COLUMN_SCHEMA },
    {
      type: 'object',
      required: ['columns'],
      properties: { columns: { type: 'array', items: COLUMN_SCHEMA } },
    },
  ],
} as const;

const HINT_TABLE_DOCUMENT = {
  type: 'object',
  propertyNames: { type: 'string', minLength: 1 },
} as const;

let validators:
  | {
      tableSchema: ValidateFunction<TableSchemaDocument>;
      hintTable: ValidateFunction<Record<string, unknown>>;
    }
  | undefined;

function getValidators(): NonNullable<typeof validators> {
  if (!validators) {
    const ajv = new Ajv({ allErrors: false, strict: true });
    validators = {
      tableSchema: ajv.compile<TableSchemaDocument>(TABLE_SCHEMA_DOCUMENT),
      hintTable: ajv.compile<Record<string, unknown>>(HINT_TABLE_DOCUMENT),
    };
  }
  return validators;
}

function describeAjvError(
  errors: ErrorObject[] | null | undefined
): { message: string; path: string } {
  // oneOf reports its own failure last; the branch errors before it are more specific
  const first =
    errors?.find((e) => e.keyword !== 'oneOf') ?? errors?.[0] ?? undefined;
  if (!first) return { message: 'document is invalid', path: '' };
  return {
    message: `${first.instancePath || '/'} ${first.message ?? 'is invalid'}`,
    path: first.instancePath,
  };
}

/**
 * Validate a table schema document and return its columns in order.
 * Extra column properties (comments, default expressions) are dropped.
 */
export function parseTableSchema(
  input: unknown
): Result<TableSchema, SchemaError> {
  const { tableSchema } = getValidators();
  if (!tableSchema(input)) {
    const { message, path } = describeAjvError(tableSchema.errors);
    return err(
      new SchemaError({
        message: `Invalid table schema: ${message}`,
        errorCode: ErrorCode.INVALID_TABLE_SCHEMA,
        context: {
          path,
          suggestion:
            'Provide an array of {"name", "type"} objects or {"columns": [...]}',
        },
      })
    );
  }

  const wrapped = !Array.isArray(input);
  const documents = Array.isArray(input) ? input : input.columns;
  const columns: ColumnSpec[] = [];
  const seen = new Set<string>();

  for (const [index, { name, type }] of documents.entries()) {
    if (seen.has(name)) {
      return err(
        new SchemaError({
          message: `Duplicate column name '${name}'`,
          errorCode: ErrorCode.DUPLICATE_COLUMN,
          context: {
            column: name,
            path: `${wrapped ? '/columns' : ''}/${index}/name`,
          },
        })
      );
    }
    seen.add(name);
    columns.push({ name, type });
  }
  return ok(columns);
}

/**
 * Validate a hint table document: an object keyed by column name.
 * Individual hint values are passed through untouched.
 */
export function parseHintTable(input: unknown): Result<HintTable, SchemaError> {
  const { hintTable } = getValidators();
  if (!hintTable(input)) {
    const { message, path } = describeAjvError(hintTable.errors);
    return err(
      new SchemaError({
        message: `Invalid hint table: ${message}`,
        errorCode: ErrorCode.INVALID_HINT_TABLE,
        context: {
          path,
          suggestion: 'Provide an object mapping column names to hints',
        },
      })
    );
  }
  return ok(input);
}
