#!/usr/bin/env node

// CLI entry point
// - Command name: `rowsmith` with subcommands `generate` and `types`.
// - `generate` reads a table schema (and optionally a hint table) from JSON files, builds a
//   RowGenerator from @rowsmith/core and prints the rows as JSON or NDJSON on stdout.
//   Warnings go to stderr; errors are rendered through ErrorPresenter and mapped to exit codes.
// - `types` lists the base types the default registry can generate.

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ErrorCode,
  ErrorPresenter,
  ParseError,
  RowGenerator,
  RowsmithError,
  defaultTypeRegistry,
  formatWarning,
  isErr,
  isRowsmithError,
  parseHintTable,
  parseTableSchema,
  stringifyJsonRow,
  toJsonSafeRow,
  type HintTable,
  type JsonSafeRow,
  type TableSchema,
  type WarningLogger,
} from '@rowsmith/core';
import { renderCLIView } from './render.js';
import {
  resolveBigintEncoding,
  resolveNow,
  resolveOutputFormat,
  resolveRowCount,
  resolveSeed,
  type CliOptions,
  type OutputFormat,
} from './flags.js';

const program = new Command();

const stderrLogger: WarningLogger = {
  warn(warning) {
    process.stderr.write(`${formatWarning(warning)}\n`);
  },
};

program
  .name('rowsmith')
  .description('Generate synthetic rows for ClickHouse table schemas')
  .version('0.1.0');

program
  .command('generate')
  .description('Generate rows for a table schema')
  .option('-s, --schema <file>', 'Table schema JSON file ([{"name","type"}] or {"columns": [...]})')
  .option('--hints <file>', 'Hint table JSON file (column name -> hint)')
  .option('-c, --count <number>', 'Number of rows to generate (default: 10)')
  .option('-r, --rows <number>', 'Alias for --count')
  .option('-n, --n <number>', 'Alias for --count')
  .option('--seed <number>', 'Deterministic seed', '424242')
  .option('--now <iso>', 'Reference time for default Date/DateTime windows')
  .option('--out <format>', 'Output format: json|ndjson', 'json')
  .option(
    '--encoding-bigint-json <mode>',
    'BigInt JSON encoding: string|number|error',
    'string'
  )
  .option('--print-config', 'Print effective configuration to stderr')
  .action(async (options: CliOptions) => {
    const schemaPath = options.schema;
    if (!schemaPath) {
      throw new ParseError({ message: 'Missing --schema <file>' });
    }

    const schema = loadTableSchema(schemaPath);
    const hints = options.hints ? loadHintTable(options.hints) : {};
    const count = resolveRowCount({
      rows: options.rows,
      count: options.count,
      n: options.n,
    });
    const seed = resolveSeed(options.seed);
    const now = resolveNow(options.now);
    const outFormat = resolveOutputFormat(options.out);
    const bigint = resolveBigintEncoding(options.encodingBigintJson);

    const generator = new RowGenerator(schema, {
      hints,
      seed,
      now,
      logger: stderrLogger,
    });

    if (options.printConfig) {
      const config = {
        seed: generator.seed,
        count,
        now: now?.toISOString() ?? null,
        out: outFormat,
        encodingBigintJson: bigint,
        columns: generator.describeColumns(),
      };
      process.stderr.write(
        `[rowsmith] effective config: ${JSON.stringify(config, null, 2)}\n`
      );
    }

    const rows = Array.from(generator.rows(count), (row) =>
      toJsonSafeRow(row, { bigint })
    );
    writeRows(rows, outFormat);
  });

program
  .command('types')
  .description('List the column base types rowsmith can generate')
  .action(() => {
    process.stdout.write(`${defaultTypeRegistry.types().join('\n')}\n`);
  });

function readJsonFile(file: string, label: string): unknown {
  const abs = path.resolve(process.cwd(), file);
  if (!fs.existsSync(abs)) {
    throw new ParseError({ message: `${label} file not found: ${abs}`, file });
  }
  let raw: string;
  try {
    raw = fs.readFileSync(abs, 'utf8');
  } catch (error) {
    throw new ParseError({
      message: `${label} file could not be read: ${abs}`,
      file,
      cause: error instanceof Error ? error : undefined,
    });
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new ParseError({
      message: `${label} file is not valid JSON: ${abs}`,
      file,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

function loadTableSchema(file: string): TableSchema {
  const result = parseTableSchema(readJsonFile(file, 'Schema'));
  if (isErr(result)) throw result.error;
  return result.value;
}

function loadHintTable(file: string): HintTable {
  const result = parseHintTable(readJsonFile(file, 'Hints'));
  if (isErr(result)) throw result.error;
  return result.value;
}

function writeRows(rows: JsonSafeRow[], outFormat: OutputFormat): void {
  if (outFormat === 'ndjson') {
    const lines = rows.map((row) => stringifyJsonRow(row));
    if (lines.length > 0) {
      process.stdout.write(lines.join('\n') + '\n');
    }
  } else if (rows.length === 0) {
    process.stdout.write('[]\n');
  } else {
    const items = rows.map((row) => `  ${stringifyJsonRow(row, '  ', '  ')}`);
    process.stdout.write(`[\n${items.join(',\n')}\n]\n`);
  }
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: RowsmithError;
  if (isRowsmithError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new (class extends RowsmithError {})({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
