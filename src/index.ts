/**
 * nestflat - compiles a compact nested-data schema grammar into a typed tree,
 * json path bindings and a plan to flatten nested records.
 */

export { SchemaParser, compile } from './parser';
export { SchemaLexer, SchemaToken } from './lexer';
export { lookupType, isContainerName, displayName, RegisteredType } from './registry';
export { formatDiagnostic, locateIssue, IssueLocation } from './diagnostics';
export {
  SchemaError,
  SchemaParsingError,
  UnknownDataTypeError,
  DuplicateColumnError,
  PathRenamingError,
  UnpackPlanningError,
  RecordParsingError,
} from './errors';
export { UnpackPlanner, planUnpack, missingColumns, sourceColumns } from './planner';
export { unpackFrame, unpackRecords, unpackNdjson } from './unpack';
export { RecordFrame, recordEngine, inferType } from './frame';
export { printSchema } from './printer';
export { CompileOptions, PlanOptions, UnpackOptions } from './options';
export * from './types';

// Default export for convenience
export { compile as default } from './parser';
