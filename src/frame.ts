/**
 * RecordFrame - an in-memory tabular engine over JSON records, used to run
 * unpacking plans without a dataframe library.
 */

import { Field, JsonValue, ScalarKind, SchemaType, StructType, TabularEngine } from './types';
import { RecordParsingError } from './errors';

type Row = ReadonlyMap<string, JsonValue>;
type JsonObject = { [key: string]: JsonValue };

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class RecordFrame {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
  private readonly dtypes: ReadonlyMap<string, ScalarKind>;

  constructor(columns: readonly string[], rows: readonly Row[], dtypes: ReadonlyMap<string, ScalarKind> = new Map()) {
    this.columns = columns;
    this.rows = rows;
    this.dtypes = dtypes;
  }

  /** Object records give their keys as columns; any other value lands in the anonymous column. */
  public static fromRecords(records: readonly JsonValue[]): RecordFrame {
    const columns: string[] = [];
    const rows = records.map(record => {
      const entries: Array<[string, JsonValue]> = isJsonObject(record) ? Object.entries(record) : [['', record]];
      for (const [key] of entries) {
        if (!columns.includes(key)) {
          columns.push(key);
        }
      }
      return new Map(entries);
    });
    return new RecordFrame(columns, rows);
  }

  /** Newline-delimited JSON: one document per non-blank line. */
  public static fromNdjson(content: string): RecordFrame {
    const records: JsonValue[] = [];
    content.split(/\r?\n/).forEach((line, index) => {
      if (!line.trim()) {
        return;
      }
      try {
        const record: JsonValue = JSON.parse(line);
        records.push(record);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new RecordParsingError(`Invalid JSON on line ${index + 1}: ${reason}`, index + 1, error);
      }
    });
    return RecordFrame.fromRecords(records);
  }

  public get height(): number {
    return this.rows.length;
  }

  public dtypeOf(column: string): ScalarKind | undefined {
    return this.dtypes.get(column);
  }

  public explode(column: string): RecordFrame {
    this.requireColumn(column);
    const rows: Row[] = [];
    for (const row of this.rows) {
      const value = row.get(column) ?? null;
      if (Array.isArray(value) && value.length > 0) {
        for (const element of value) {
          rows.push(new Map(row).set(column, element));
        }
      } else if (value === null || Array.isArray(value)) {
        rows.push(new Map(row).set(column, null));
      } else {
        throw new TypeError(`Column "${column}" does not hold lists`);
      }
    }
    return new RecordFrame(this.columns, rows, this.dtypes);
  }

  public unnest(column: string, prefix: string, fields: readonly string[]): RecordFrame {
    this.requireColumn(column);
    const unnested = fields.map(field => `${prefix}${field}`);
    for (const name of unnested) {
      if (name !== column && this.columns.includes(name)) {
        throw new Error(`Column "${name}" already exists`);
      }
    }

    const columns = this.columns.flatMap(existing => (existing === column ? unnested : [existing]));
    const rows = this.rows.map(row => {
      const value = row.get(column) ?? null;
      if (value !== null && !isJsonObject(value)) {
        throw new TypeError(`Column "${column}" does not hold structs`);
      }
      const struct: JsonObject = isJsonObject(value) ? value : {};
      const next = new Map<string, JsonValue>();
      for (const existing of this.columns) {
        if (existing !== column) {
          next.set(existing, row.get(existing) ?? null);
          continue;
        }
        for (const field of fields) {
          const present = Object.prototype.hasOwnProperty.call(struct, field);
          next.set(`${prefix}${field}`, present ? struct[field] ?? null : null);
        }
      }
      return next;
    });
    return new RecordFrame(columns, rows, this.dtypes);
  }

  public rename(mapping: ReadonlyMap<string, string>): RecordFrame {
    const columns = this.columns.map(column => mapping.get(column) ?? column);
    const duplicate = columns.find((column, index) => columns.indexOf(column) !== index);
    if (duplicate !== undefined) {
      throw new Error(`Renaming produces duplicate column "${duplicate}"`);
    }
    const rows = this.rows.map(row => {
      const next = new Map<string, JsonValue>();
      for (const [key, value] of row) {
        next.set(mapping.get(key) ?? key, value);
      }
      return next;
    });
    const dtypes = new Map<string, ScalarKind>();
    for (const [column, dtype] of this.dtypes) {
      dtypes.set(mapping.get(column) ?? column, dtype);
    }
    return new RecordFrame(columns, rows, dtypes);
  }

  public select(columns: readonly string[]): RecordFrame {
    for (const column of columns) {
      this.requireColumn(column);
    }
    const rows = this.rows.map(row => new Map(columns.map((column): [string, JsonValue] => [column, row.get(column) ?? null])));
    return new RecordFrame([...columns], rows, this.dtypes);
  }

  public withNullColumn(name: string, dtype: ScalarKind): RecordFrame {
    if (this.columns.includes(name)) {
      throw new Error(`Column "${name}" already exists`);
    }
    const rows = this.rows.map(row => new Map(row).set(name, null));
    return new RecordFrame([...this.columns, name], rows, new Map(this.dtypes).set(name, dtype));
  }

  public toRecords(): Array<Record<string, JsonValue>> {
    // fromEntries defines own properties, so a `__proto__` column stays a column
    return this.rows.map(row => Object.fromEntries(this.columns.map((column): [string, JsonValue] => [column, row.get(column) ?? null])));
  }

  private requireColumn(column: string): void {
    if (!this.columns.includes(column)) {
      throw new Error(`Unknown column "${column}"`);
    }
  }
}

export const recordEngine: TabularEngine<RecordFrame> = {
  columns: frame => [...frame.columns],
  explode: (frame, column) => frame.explode(column),
  unnest: (frame, column, prefix, fields) => frame.unnest(column, prefix, fields),
  rename: (frame, mapping) => frame.rename(mapping),
  select: (frame, columns) => frame.select(columns),
  withNullColumn: (frame, name, dtype) => frame.withNullColumn(name, dtype),
};

// ============================================================================
// Schema inference - an authoring aid to get a head start on a schema
// ============================================================================

export function inferType(records: readonly JsonValue[]): StructType {
  const root: StructType = { kind: 'struct', fields: [] };
  for (const record of records) {
    if (isJsonObject(record)) {
      mergeObject(root, record);
    } else {
      mergeField(root, '', record);
    }
  }
  return root;
}

function mergeObject(struct: StructType, value: JsonObject): void {
  for (const [key, item] of Object.entries(value)) {
    mergeField(struct, key, item);
  }
}

function mergeField(struct: StructType, name: string, value: JsonValue): void {
  const index = struct.fields.findIndex(field => field.name === name);
  const existing = index === -1 ? undefined : struct.fields[index];
  const merged = mergeValue(existing?.type, value, name);
  if (merged === undefined) {
    return;
  }
  const field: Field = { name, type: merged };
  if (index === -1) {
    struct.fields.push(field);
  } else {
    struct.fields[index] = field;
  }
}

// Returns undefined while only nulls and empty lists have been seen.
function mergeValue(current: SchemaType | undefined, value: JsonValue, name: string): SchemaType | undefined {
  if (value === null) {
    return current;
  }
  if (typeof value === 'boolean') {
    throw new TypeError(`Cannot infer a datatype for boolean values of "${name}"`);
  }
  if (typeof value === 'number') {
    const dtype: ScalarKind = Number.isInteger(value) ? 'int64' : 'float64';
    if (current === undefined) {
      return { kind: 'scalar', dtype };
    }
    if (current.kind === 'scalar' && (current.dtype === 'int64' || current.dtype === 'float64')) {
      return { kind: 'scalar', dtype: current.dtype === 'float64' ? 'float64' : dtype };
    }
    throw new TypeError(`Conflicting datatypes for "${name}"`);
  }
  if (typeof value === 'string') {
    if (current === undefined || (current.kind === 'scalar' && current.dtype === 'utf8')) {
      return { kind: 'scalar', dtype: 'utf8' };
    }
    throw new TypeError(`Conflicting datatypes for "${name}"`);
  }
  if (Array.isArray(value)) {
    if (current !== undefined && current.kind !== 'list') {
      throw new TypeError(`Conflicting datatypes for "${name}"`);
    }
    let element = current?.kind === 'list' ? current.element : undefined;
    for (const item of value) {
      element = mergeValue(element, item, name);
    }
    return element === undefined ? current : { kind: 'list', element };
  }
  if (current !== undefined && current.kind !== 'struct') {
    throw new TypeError(`Conflicting datatypes for "${name}"`);
  }
  const struct: StructType = { kind: 'struct', fields: current ? [...current.fields] : [] };
  mergeObject(struct, value);
  return struct;
}
