import { describe, it, expect, vi } from 'vitest';

import { CollectingWarningLogger } from '../../diag/logger.js';
import type { ColumnValue, GeneratedRow, TableSchema } from '../../types/column.js';
import { ConfigError, HintError } from '../../types/errors.js';
import { RowGenerator } from '../row-generator.js';
import { defaultTypeRegistry } from '../types/index.js';

const NOW = new Date(Date.UTC(2024, 5, 15, 12, 0, 0));

const EVENTS: TableSchema = [
  { name: 'id', type: 'UInt64' },
  { name: 'user', type: 'LowCardinality(String)' },
  { name: 'age', type: 'Int32' },
  { name: 'score', type: 'Float64' },
  { name: 'day', type: 'Date' },
  { name: 'created_at', type: "DateTime64(3, 'UTC')" },
  { name: 'active', type: 'Bool' },
];

function columnValues(
  rows: Iterable<GeneratedRow>,
  name: string
): Array<ColumnValue | undefined> {
  return Array.from(rows, (row) => row.get(name));
}

function quietGenerator(
  schema: TableSchema,
  options: ConstructorParameters<typeof RowGenerator>[1] = {}
): { generator: RowGenerator; logger: CollectingWarningLogger } {
  const logger = new CollectingWarningLogger();
  const generator = new RowGenerator(schema, { now: NOW, seed: 1, logger, ...options });
  return { generator, logger };
}

describe('RowGenerator.generateRow', () => {
  it('yields exactly the schema columns in order', () => {
    const { generator } = quietGenerator(EVENTS);
    expect([...generator.generateRow().keys()]).toEqual([
      'id',
      'user',
      'age',
      'score',
      'day',
      'created_at',
      'active',
    ]);
  });

  it('keeps integer-like column names in schema order', () => {
    const { generator } = quietGenerator([
      { name: 'b', type: 'String' },
      { name: '1', type: 'UInt8' },
      { name: '2024', type: 'UInt8' },
      { name: 'a', type: 'UInt8' },
    ]);
    expect([...generator.generateRow().keys()]).toEqual(['b', '1', '2024', 'a']);
  });

  it('keeps a column named __proto__ as an ordinary entry', () => {
    const { generator } = quietGenerator(
      [
        { name: '__proto__', type: 'String' },
        { name: 'a', type: 'UInt8' },
      ],
      { hints: JSON.parse('{"__proto__": ["x"]}') }
    );
    const row = generator.generateRow();
    expect([...row.keys()]).toEqual(['__proto__', 'a']);
    expect(row.get('__proto__')).toBe('x');
  });

  it('yields an empty row for an empty schema', () => {
    const { generator, logger } = quietGenerator([]);
    expect(generator.generateRow().size).toBe(0);
    expect(logger.warnings).toEqual([]);
  });

  it('is deterministic for the same schema, hints, seed and now', () => {
    const hints = { user: ['ann', 'bob'] };
    const a = quietGenerator(EVENTS, { hints, seed: 99 }).generator;
    const b = quietGenerator(EVENTS, { hints, seed: 99 }).generator;
    for (let i = 0; i < 20; i++) {
      expect(a.generateRow()).toEqual(b.generateRow());
    }
  });

  it('different seeds give different sequences', () => {
    const a = quietGenerator(EVENTS, { seed: 1 }).generator;
    const b = quietGenerator(EVENTS, { seed: 2 }).generator;
    const rowsA = [...a.rows(5)];
    const rowsB = [...b.rows(5)];
    expect(rowsA).not.toEqual(rowsB);
  });

  it('produces values of each column type', () => {
    const { generator } = quietGenerator(EVENTS);
    const row = generator.generateRow();
    expect(typeof row.get('id')).toBe('bigint');
    expect(row.get('user')).toMatch(/^[A-Za-z0-9]{5,15}$/);
    expect(Number.isInteger(row.get('age'))).toBe(true);
    expect(typeof row.get('score')).toBe('number');
    expect(row.get('day')).toMatch(/^\d{4}-\d{2}-\d{2}$/);
    expect(row.get('created_at')).toBeInstanceOf(Date);
    expect(typeof row.get('active')).toBe('boolean');
  });

  it('draws enum-hinted columns only from the value set', () => {
    const { generator } = quietGenerator([{ name: 'status', type: 'String' }], {
      hints: { status: ['new', 'paid', 'shipped'] },
    });
    for (const row of generator.rows(500)) {
      expect(['new', 'paid', 'shipped']).toContain(row.get('status'));
    }
  });

  it('keeps a numeric range [18, 30] inclusive on Int32', () => {
    const { generator } = quietGenerator([{ name: 'age', type: 'Int32' }], {
      hints: { age: { kind: 'numericRange', low: 18, high: 30 } },
    });
    for (const age of columnValues(generator.rows(1_000), 'age')) {
      expect(Number.isInteger(age)).toBe(true);
      expect(age).toBeGreaterThanOrEqual(18);
      expect(age).toBeLessThanOrEqual(30);
    }
  });

  it('keeps a date range within its window on DateTime', () => {
    const { generator } = quietGenerator([{ name: 'ts', type: 'DateTime' }], {
      hints: { ts: { start: '2020-01-01T00:00:00', end: '2020-01-02T00:00:00' } },
    });
    for (const ts of columnValues(generator.rows(1_000), 'ts')) {
      expect(ts).toBeInstanceOf(Date);
      if (ts instanceof Date) {
        expect(ts.getTime()).toBeGreaterThanOrEqual(Date.UTC(2020, 0, 1));
        expect(ts.getTime()).toBeLessThanOrEqual(Date.UTC(2020, 0, 2));
      }
    }
  });

  it('yields calendar dates for date ranges on Date columns', () => {
    const { generator } = quietGenerator([{ name: 'd', type: 'Date' }], {
      hints: { d: { kind: 'dateRange', start: '2020-02-28', end: '2020-03-01' } },
    });
    for (const d of columnValues(generator.rows(200), 'd')) {
      expect(['2020-02-28', '2020-02-29', '2020-03-01']).toContain(d);
    }
  });

  it('yields null and warns once for an unknown type', () => {
    const warn = vi.fn();
    const generator = new RowGenerator([{ name: 'x', type: 'Weird42' }], {
      seed: 1,
      logger: { warn },
    });
    expect(generator.generateRow()).toEqual(new Map([['x', null]]));
    expect(generator.generateRow()).toEqual(new Map([['x', null]]));
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith({
      code: 'UNKNOWN_COLUMN_TYPE',
      column: 'x',
      message: "Unknown column type 'Weird42' for column 'x'; yielding null",
      details: { type: 'Weird42', baseType: 'Weird42' },
    });
  });

  it('generates LowCardinality(String) with the String generator', () => {
    const { generator, logger } = quietGenerator([
      { name: 'tag', type: 'LowCardinality(String)' },
    ]);
    for (const tag of columnValues(generator.rows(100), 'tag')) {
      expect(tag).toMatch(/^[A-Za-z0-9]{5,15}$/);
    }
    expect(logger.warnings).toEqual([]);
  });

  it('falls back to type generation for an unrecognized hint', () => {
    const { generator, logger } = quietGenerator([{ name: 'n', type: 'UInt8' }], {
      hints: { n: [] },
    });
    const n = generator.generateRow().get('n');
    expect(Number.isInteger(n)).toBe(true);
    expect(logger.warnings).toEqual([
      {
        code: 'UNRECOGNIZED_HINT',
        column: 'n',
        message: "Unrecognized hint for column 'n' (value set is empty); generating by type",
        details: { reason: 'value set is empty' },
      },
    ]);
  });

  it('ignores hints for columns absent from the schema', () => {
    const { generator, logger } = quietGenerator([{ name: 'a', type: 'UInt8' }], {
      hints: { b: ['x'] },
    });
    expect([...generator.generateRow().keys()]).toEqual(['a']);
    expect(logger.warnings).toEqual([]);
  });

  it('a recognized hint never consults the type generator', () => {
    const { generator, logger } = quietGenerator([{ name: 'geo', type: 'Point' }], {
      hints: { geo: ['(0,0)'] },
    });
    expect(generator.generateRow()).toEqual(new Map([['geo', '(0,0)']]));
    expect(logger.countByCode('UNKNOWN_COLUMN_TYPE')).toBe(0);
  });

  it('raises HintError from the constructor for malformed hint payloads', () => {
    expect(() =>
      quietGenerator([{ name: 'ts', type: 'DateTime' }], {
        hints: { ts: { start: '2020-01-01', end: 'soon' } },
      })
    ).toThrow(HintError);
  });

  it('does not see later changes to the schema array', () => {
    const schema = [{ name: 'a', type: 'UInt8' }];
    const { generator } = quietGenerator(schema);
    schema.push({ name: 'b', type: 'UInt8' });
    expect([...generator.generateRow().keys()]).toEqual(['a']);
    expect(generator.schema).toHaveLength(1);
  });
});

describe('RowGenerator.generateByType', () => {
  it('UInt8 stays in [0, 255] over 10 000 trials', () => {
    const { generator } = quietGenerator([]);
    for (let i = 0; i < 10_000; i++) {
      const v = generator.generateByType('UInt8');
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThanOrEqual(255);
    }
  });

  it('Bool yields both values over 1000 trials', () => {
    const { generator } = quietGenerator([]);
    const seen = new Set(
      Array.from({ length: 1_000 }, () => generator.generateByType('Bool'))
    );
    expect(seen).toEqual(new Set([true, false]));
  });

  it('unwraps Nullable and parametric types', () => {
    const { generator } = quietGenerator([]);
    expect(generator.generateByType('Nullable(DateTime64(6))')).toBeInstanceOf(Date);
  });

  it('returns null and warns on every call for unknown types', () => {
    const { generator, logger } = quietGenerator([]);
    expect(generator.generateByType('UUID')).toBeNull();
    expect(generator.generateByType('UUID')).toBeNull();
    expect(logger.warnings).toHaveLength(2);
    expect(logger.warnings[0]?.message).toBe(
      "Unknown column type 'UUID'; yielding null"
    );
    expect(logger.warnings[0]?.column).toBeUndefined();
  });
});

describe('RowGenerator options', () => {
  it('exposes the effective seed', () => {
    expect(quietGenerator([], { seed: 424242 }).generator.seed).toBe(424242);
  });

  it('draws a uint32 seed when none is given', () => {
    const generator = new RowGenerator([], { logger: new CollectingWarningLogger() });
    expect(Number.isInteger(generator.seed)).toBe(true);
    expect(generator.seed).toBeGreaterThanOrEqual(0);
    expect(generator.seed).toBeLessThan(2 ** 32);
  });

  it('reproduces rows from an exposed seed', () => {
    const first = new RowGenerator(EVENTS, {
      now: NOW,
      logger: new CollectingWarningLogger(),
    });
    const replay = quietGenerator(EVENTS, { seed: first.seed }).generator;
    expect(replay.generateRow()).toEqual(first.generateRow());
  });

  it('anchors default date windows at now', () => {
    const { generator } = quietGenerator([{ name: 'd', type: 'Date' }]);
    for (const d of columnValues(generator.rows(500), 'd')) {
      expect(typeof d === 'string' && d >= '2023-06-16' && d <= '2024-06-15').toBe(
        true
      );
    }
  });

  it('uses a custom registry', () => {
    const registry = defaultTypeRegistry
      .clone()
      .register({ type: 'IPv4', generate: () => '10.0.0.1' });
    const { generator, logger } = quietGenerator([{ name: 'ip', type: 'IPv4' }], {
      registry,
    });
    expect(generator.generateRow()).toEqual(new Map([['ip', '10.0.0.1']]));
    expect(logger.warnings).toEqual([]);
  });

  it('rejects a non-integer seed', () => {
    expect(() => quietGenerator([], { seed: 1.5 })).toThrow(ConfigError);
  });

  it('rejects an invalid now', () => {
    expect(() => quietGenerator([], { now: new Date('nope') })).toThrow(
      'now must be a valid Date'
    );
  });
});

describe('RowGenerator.rows', () => {
  it('yields the requested number of rows', () => {
    const { generator } = quietGenerator(EVENTS);
    expect([...generator.rows(3)]).toHaveLength(3);
    expect([...generator.rows(0)]).toEqual([]);
  });

  it('continues the same sequence as generateRow', () => {
    const a = quietGenerator(EVENTS).generator;
    const b = quietGenerator(EVENTS).generator;
    expect([...a.rows(2)]).toEqual([b.generateRow(), b.generateRow()]);
  });

  it('rejects negative or fractional counts', () => {
    const { generator } = quietGenerator(EVENTS);
    expect(() => [...generator.rows(-1)]).toThrow(ConfigError);
    expect(() => [...generator.rows(1.5)]).toThrow(ConfigError);
  });
});

describe('RowGenerator.describeColumns', () => {
  it('reports how each column is generated', () => {
    const { generator } = quietGenerator(
      [
        { name: 'status', type: 'LowCardinality(String)' },
        { name: 'age', type: 'UInt8' },
        { name: 'ts', type: 'DateTime' },
        { name: 'blob', type: 'Array(UInt8)' },
      ],
      {
        hints: {
          status: ['a'],
          ts: { start: '2020-01-01', end: '2020-01-02' },
        },
      }
    );
    expect(generator.describeColumns()).toEqual([
      { name: 'status', type: 'LowCardinality(String)', baseType: 'String', source: 'enum' },
      { name: 'age', type: 'UInt8', baseType: 'UInt8', source: 'type' },
      { name: 'ts', type: 'DateTime', baseType: 'DateTime', source: 'dateRange' },
      { name: 'blob', type: 'Array(UInt8)', baseType: 'Array', source: 'null' },
    ]);
  });
});
