/**
 * BuildContext - per-call state of the schema tree builder: the stack of open
 * containers, the root fields and the bindings registered so far.
 */

import { CompiledSchema, ContainerKind, Field, ScalarKind, SchemaType } from './types';
import { ResolvedCompileOptions } from './options';
import { SourceFragment } from './source';
import { DuplicateColumnError, SchemaError, SchemaErrorLocation, SchemaParsingError } from './errors';

type SchemaErrorClass = new (message: string, location: SchemaErrorLocation) => SchemaError;

interface FrameBase {
  name: string;
  opened: boolean;
  keyword: SourceFragment;
}

interface StructFrame extends FrameBase {
  kind: 'struct';
  fields: Field[];
  names: Set<string>;
}

interface ListFrame extends FrameBase {
  kind: 'list';
  element: SchemaType | null;
}

type OpenFrame = StructFrame | ListFrame;

export class BuildContext {
  private readonly source: string;
  private readonly options: ResolvedCompileOptions;
  private readonly frames: OpenFrame[] = [];
  private readonly rootFields: Field[] = [];
  private readonly rootNames: Set<string> = new Set();
  private readonly bindings: Map<string, string> = new Map();
  private readonly columns: string[] = [];
  private readonly dtypes: ScalarKind[] = [];

  constructor(source: string, options: ResolvedCompileOptions) {
    this.source = source;
    this.options = options;
  }

  raise(errorClass: SchemaErrorClass, message: string, fragment: SourceFragment): never {
    throw new errorClass(message, {
      source: this.source,
      offset: fragment.offset,
      unparsed: fragment.text,
      sourceName: this.options.sourceName,
    });
  }

  /** A container keyword must be followed by its opening delimiter before anything else. */
  expectOpened(fragment: SourceFragment): void {
    const frame = this.current();
    if (frame && !frame.opened) {
      this.raise(SchemaParsingError, `Expected an opening delimiter after ${frame.keyword.text}`, fragment);
    }
  }

  pushContainer(kind: ContainerKind, keyword: SourceFragment, name?: SourceFragment): void {
    this.reserveSlot(name ?? keyword, name?.text ?? '');
    const base = { name: name?.text ?? '', opened: false, keyword };
    if (kind === 'struct') {
      this.frames.push({ ...base, kind, fields: [], names: new Set() });
    } else {
      this.frames.push({ ...base, kind, element: null });
    }
  }

  openContainer(delimiter: SourceFragment): void {
    const frame = this.current();
    if (!frame || frame.opened) {
      this.raise(SchemaParsingError, `Unexpected opening delimiter ${delimiter.text}`, delimiter);
    }
    frame.opened = true;
  }

  closeContainer(delimiter: SourceFragment): void {
    const frame = this.current();
    if (!frame) {
      this.raise(SchemaParsingError, `Unexpected closing delimiter ${delimiter.text}`, delimiter);
    }
    this.expectOpened(delimiter);
    this.frames.pop();

    let type: SchemaType;
    if (frame.kind === 'list') {
      if (frame.element === null) {
        this.raise(SchemaParsingError, `Missing element type in ${frame.keyword.text}`, delimiter);
      }
      type = { kind: 'list', element: frame.element };
    } else {
      type = { kind: 'struct', fields: frame.fields };
    }
    this.attach(frame.name, type);
  }

  addLeaf(dtype: ScalarKind, at: SourceFragment, name?: SourceFragment, renamedTo?: SourceFragment): void {
    const attrName = name?.text ?? '';
    this.reserveListSlot(name ?? at, attrName);
    const segments = this.frames.map(frame => frame.name).filter(segment => segment !== '');
    const path = [...segments, attrName].filter(segment => segment !== '').join(this.options.separator);
    const column = renamedTo?.text ?? (attrName || (segments[segments.length - 1] ?? ''));

    if (this.columns.includes(column)) {
      this.raise(DuplicateColumnError, `Duplicate column: ${column}`, renamedTo ?? name ?? at);
    }
    if (this.bindings.has(path)) {
      this.raise(DuplicateColumnError, `Duplicate json path: ${path}`, name ?? at);
    }
    this.reserveName(name ?? at, attrName);

    this.bindings.set(path, column);
    this.columns.push(column);
    this.dtypes.push(dtype);
    this.attach(attrName, { kind: 'scalar', dtype });
  }

  finish(): CompiledSchema {
    const frame = this.current();
    if (frame) {
      if (!frame.opened) {
        this.raise(SchemaParsingError, `Expected an opening delimiter after ${frame.keyword.text}`, frame.keyword);
      }
      this.raise(SchemaParsingError, `Unterminated ${frame.keyword.text}: ${this.frames.length} container(s) left open`, frame.keyword);
    }
    return {
      root: { kind: 'struct', fields: this.rootFields },
      bindings: this.bindings,
      columns: this.columns,
      dtypes: this.dtypes,
      separator: this.options.separator,
    };
  }

  private current(): OpenFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  // Checks that the innermost container can take one more entry named `name`.
  private reserveSlot(fragment: SourceFragment, name: string): void {
    this.reserveListSlot(fragment, name);
    this.reserveName(fragment, name);
  }

  private reserveListSlot(fragment: SourceFragment, name: string): void {
    const frame = this.current();
    if (frame?.kind !== 'list') {
      return;
    }
    if (name !== '') {
      this.raise(SchemaParsingError, `List elements cannot be named: ${name}`, fragment);
    }
    if (frame.element !== null) {
      this.raise(SchemaParsingError, `${frame.keyword.text} holds a single element type`, fragment);
    }
  }

  private reserveName(fragment: SourceFragment, name: string): void {
    const frame = this.current();
    if (frame?.kind === 'list') {
      return;
    }
    const names = frame ? frame.names : this.rootNames;
    if (names.has(name)) {
      const where = frame?.name ? ` in ${frame.name}` : '';
      this.raise(DuplicateColumnError, `Duplicate attribute${where}: ${name || '(anonymous)'}`, fragment);
    }
    names.add(name);
  }

  private attach(name: string, type: SchemaType): void {
    const frame = this.current();
    if (!frame) {
      this.rootFields.push({ name, type });
    } else if (frame.kind === 'list') {
      frame.element = type;
    } else {
      frame.fields.push({ name, type });
    }
  }
}
