/**
 * Type definitions for the nestflat schema compiler and unpacking planner
 */

// Primitive column types
export type ScalarKind =
  | 'int8'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'uint8'
  | 'uint16'
  | 'uint32'
  | 'uint64'
  | 'float32'
  | 'float64'
  | 'utf8';

export type ContainerKind = 'list' | 'struct';

export interface ScalarType {
  kind: 'scalar';
  dtype: ScalarKind;
}

export interface ListType {
  kind: 'list';
  element: SchemaType;
}

export interface StructType {
  kind: 'struct';
  fields: Field[];
}

export type SchemaType = ScalarType | ListType | StructType;

// An empty name marks an anonymous entry (lone type at root or inside a struct)
export interface Field {
  name: string;
  type: SchemaType;
}

export interface CompiledSchema {
  root: StructType;
  // json path -> output column, in declaration order
  bindings: Map<string, string>;
  columns: string[];
  dtypes: ScalarKind[];
  separator: string;
}

// JSON values handled by the in-memory record engine
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type RenameStrategy = 'eager' | 'deferred';

export type UnpackStep =
  | { op: 'explode'; column: string }
  | { op: 'unnest'; column: string; prefix: string; fields: string[] };

export interface LeafColumn {
  column: string;
  path: string;
  dtype: ScalarKind;
}

export interface UnpackPlan {
  strategy: RenameStrategy;
  // top-level entries the source frame is expected to provide
  root: StructType;
  steps: UnpackStep[];
  leaves: LeafColumn[];
  rename: Map<string, string>;
  select: string[];
}

/**
 * Operations a tabular engine provides to execute an {@link UnpackPlan}.
 * Frames are treated as immutable values: every operation returns a new frame.
 */
export interface TabularEngine<F> {
  columns(frame: F): string[];
  explode(frame: F, column: string): F;
  /** Replaces a struct column by one column per listed field, named `prefix + field`. */
  unnest(frame: F, column: string, prefix: string, fields: readonly string[]): F;
  rename(frame: F, mapping: ReadonlyMap<string, string>): F;
  select(frame: F, columns: readonly string[]): F;
  withNullColumn(frame: F, name: string, dtype: ScalarKind): F;
}
