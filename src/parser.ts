/**
 * Schema parser - folds the lexer's tokens into a typed tree, the json path
 * bindings and the expected output columns.
 *
 * Main entry point: compile(source)
 *
 * ```text
 * attribute: Utf8
 * nested: Struct(
 *     foo: Float32
 *     bar=bax: Int16
 *     vector: List[UInt8]
 * )
 * ```
 *
 * Any of `(`, `[`, `{`, `<` opens a nested type and any of `)`, `]`, `}`, `>`
 * closes it; the bracket families do not need to match.
 */

import { CompiledSchema } from './types';
import { CompileOptions, ResolvedCompileOptions, compileOptionsSchema } from './options';
import { BuildContext } from './context';
import { SchemaLexer, SchemaToken } from './lexer';
import { RegisteredType, isContainerName, lookupType } from './registry';
import { SourceFragment, fragmentFromSource } from './source';
import { PathRenamingError, UnknownDataTypeError } from './errors';

export class SchemaParser {
  private readonly options: ResolvedCompileOptions;

  constructor(options: CompileOptions = {}) {
    this.options = compileOptionsSchema.parse(options);
  }

  public static parse(source: string, options?: CompileOptions): CompiledSchema {
    const parser = new SchemaParser(options);
    return parser.parse(source);
  }

  public parse(source: string): CompiledSchema {
    const fragment = fragmentFromSource(source);
    const context = new BuildContext(fragment.text, this.options);
    const lexer = new SchemaLexer(fragment, this.options.sourceName);

    for (let token = lexer.next(); token !== null; token = lexer.next()) {
      this.apply(context, token);
    }

    return context.finish();
  }

  private apply(context: BuildContext, token: SchemaToken): void {
    switch (token.type) {
      case 'renamed_attribute': {
        context.expectOpened(token.name);
        // renaming part of the json path is not supported
        if (isContainerName(token.dtype.text)) {
          context.raise(
            PathRenamingError,
            `Cannot rename ${token.dtype.text} attribute ${token.name.text} to ${token.renamedTo.text}`,
            token.renamedTo
          );
        }
        const registered = this.resolveType(context, token.dtype);
        if (registered.kind === 'scalar') {
          context.addLeaf(registered.dtype, token.dtype, token.name, token.renamedTo);
        }
        break;
      }
      case 'attribute': {
        context.expectOpened(token.name);
        const registered = this.resolveType(context, token.dtype);
        if (registered.kind === 'scalar') {
          context.addLeaf(registered.dtype, token.dtype, token.name);
        } else {
          context.pushContainer(registered.kind, token.dtype, token.name);
        }
        break;
      }
      case 'lone_type': {
        context.expectOpened(token.dtype);
        const registered = this.resolveType(context, token.dtype);
        if (registered.kind === 'scalar') {
          context.addLeaf(registered.dtype, token.dtype);
        } else {
          context.pushContainer(registered.kind, token.dtype);
        }
        break;
      }
      case 'open':
        context.openContainer(token.delimiter);
        break;
      case 'close':
        context.closeContainer(token.delimiter);
        break;
    }
  }

  private resolveType(context: BuildContext, dtype: SourceFragment): RegisteredType {
    const registered = lookupType(dtype.text);
    if (!registered) {
      context.raise(UnknownDataTypeError, `Unknown datatype: ${dtype.text}`, dtype);
    }
    return registered;
  }
}

export function compile(source: string, options?: CompileOptions): CompiledSchema {
  return SchemaParser.parse(source, options);
}
