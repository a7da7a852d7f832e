import { formatDiagnostic, locateIssue } from './diagnostics';

export interface SchemaErrorLocation {
  source: string;
  offset: number;
  unparsed: string;
  sourceName?: string | undefined;
}

/**
 * Base class for every schema compilation failure. The message starts with the
 * location and reason, followed by a rendered excerpt of the schema source.
 */
export class SchemaError extends Error {
  sourceName?: string | undefined;
  row: number;
  column: number;
  offset: number;
  lineText: string;
  diagnostic: string;

  constructor(message: string, location: SchemaErrorLocation) {
    const issue = locateIssue(location.source, location.offset);
    const diagnostic = formatDiagnostic(location.source, location.unparsed, location.offset);
    const prefix = location.sourceName ? `${location.sourceName}:` : '';
    super(`${prefix}${issue.line}:${issue.column} - ${message}\n\n${diagnostic}`);
    this.name = 'SchemaError';
    this.sourceName = location.sourceName;
    this.row = issue.line;
    this.column = issue.column;
    this.offset = issue.start;
    this.lineText = issue.lineText;
    this.diagnostic = diagnostic;
  }
}

/** Unexpected content that cannot be parsed. */
export class SchemaParsingError extends SchemaError {
  constructor(message: string, location: SchemaErrorLocation) {
    super(message, location);
    this.name = 'SchemaParsingError';
  }
}

/** Unknown or unsupported datatype. */
export class UnknownDataTypeError extends SchemaError {
  constructor(message: string, location: SchemaErrorLocation) {
    super(message, location);
    this.name = 'UnknownDataTypeError';
  }
}

/** A column (or attribute, or json path) declared more than once. */
export class DuplicateColumnError extends SchemaError {
  constructor(message: string, location: SchemaErrorLocation) {
    super(message, location);
    this.name = 'DuplicateColumnError';
  }
}

/** A parent in the json path (list or struct) being renamed. */
export class PathRenamingError extends SchemaError {
  constructor(message: string, location: SchemaErrorLocation) {
    super(message, location);
    this.name = 'PathRenamingError';
  }
}

/** A line of newline-delimited JSON that does not parse. */
export class RecordParsingError extends Error {
  line: number;
  cause: unknown;

  constructor(message: string, line: number, cause: unknown) {
    super(message);
    this.name = 'RecordParsingError';
    this.line = line;
    this.cause = cause;
  }
}

export class UnpackPlanningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnpackPlanningError';
  }
}
