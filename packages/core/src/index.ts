// @rowsmith/core entry point
//
// Public API:
// - RowGenerator is the main entry point: construct it with a table schema and
//   options, then call generateRow() / generateByType() / rows().
// - parseTableSchema() / parseHintTable() validate JSON input documents.
// - TypeRegistry and the primitive generators allow extending or replacing the
//   type table.
// - toJsonSafeRow() converts generated rows for JSON output.

// Generator
export {
  RowGenerator,
  type ColumnPlanSummary,
} from './generator/row-generator.js';
export {
  TypeRegistry,
  resolveBaseType,
  type GeneratorContext,
  type TypeGenerator,
  type TypeLookup,
} from './generator/type-registry.js';
export * from './generator/types/index.js';
export { signedInteger, unsignedInteger } from './generator/types/integer-generator.js';
export { drawFromHint, resolveHint } from './generator/hint-resolver.js';

// Input documents
export {
  parseHintTable,
  parseTableSchema,
} from './parser/table-schema-parser.js';

// Types
export type {
  ColumnSpec,
  ColumnValue,
  GeneratedRow,
  TableSchema,
} from './types/column.js';
export type {
  ColumnHint,
  DateRangeHint,
  DrawableHint,
  EnumHint,
  EnumValue,
  HintTable,
  NumericRangeHint,
  ResolvedHint,
  TaggedHint,
  UntaggedHint,
} from './types/hints.js';
export {
  DEFAULT_OPTIONS,
  isUint32,
  resolveOptions,
  type ResolvedOptions,
  type RowGeneratorOptions,
} from './types/options.js';
export {
  Err,
  Ok,
  err,
  isErr,
  isOk,
  ok,
  type Result,
} from './types/result.js';

// Errors
export { ErrorCode, EXIT_CODES, type Severity, getExitCode } from './errors/codes.js';
export {
  ConfigError,
  EncodingError,
  HintError,
  ParseError,
  RowsmithError,
  SchemaError,
  isRowsmithError,
  type ErrorContext,
  type RowsmithErrorParams,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';

// Diagnostics
export {
  WARNING_CODES,
  isWarningCode,
  type WarningCode,
} from './diag/codes.js';
export {
  CollectingWarningLogger,
  consoleWarningLogger,
  formatWarning,
  type GenerationWarning,
  type WarningLogger,
} from './diag/logger.js';

// Utilities
export {
  formatDateTime,
  jsonSafeReplacer,
  stringifyJsonRow,
  toJsonSafeRow,
  toJsonSafeValue,
  type BigintJsonEncoding,
  type JsonSafeOptions,
  type JsonSafeRow,
  type JsonScalar,
} from './util/json-safe.js';
export { SplitMix64, XorShift32, fnv1a32 } from './util/rng.js';
export {
  MS_PER_DAY,
  MS_PER_SECOND,
  SECONDS_PER_DAY,
  formatCalendarDate,
  parseIsoDateTime,
  truncateToSeconds,
} from './util/time.js';
