/**
 * Schema lexer - matches the remaining schema text against an ordered set of
 * rules and hands out one token at a time.
 */

import { SourceFragment } from './source';
import { SchemaParsingError } from './errors';

export type SchemaToken =
  | { type: 'renamed_attribute'; name: SourceFragment; renamedTo: SourceFragment; dtype: SourceFragment }
  | { type: 'attribute'; name: SourceFragment; dtype: SourceFragment }
  | { type: 'lone_type'; dtype: SourceFragment }
  | { type: 'open'; delimiter: SourceFragment }
  | { type: 'close'; delimiter: SourceFragment };

export class SchemaLexer {
  private static IRE = '([A-Za-z0-9_]+)';  // identifier regex
  private static RENAMED_ATTR_REGEX = new RegExp(
    `^${SchemaLexer.IRE}([ \\t]*=[ \\t]*)${SchemaLexer.IRE}([ \\t]*:[ \\t]*)${SchemaLexer.IRE}`
  );
  private static ATTR_REGEX = new RegExp(`^${SchemaLexer.IRE}([ \\t]*:[ \\t]*)${SchemaLexer.IRE}`);
  private static LONE_TYPE_REGEX = new RegExp(`^${SchemaLexer.IRE}`);
  private static OPEN_REGEX = /^[([{<]/;
  private static CLOSE_REGEX = /^[)\]}>]/;
  private static IGNORED_REGEX = /^[,\s]+/;

  private remaining: SourceFragment;
  private readonly source: string;
  private readonly sourceName: string | undefined;

  constructor(fragment: SourceFragment, sourceName?: string) {
    this.remaining = fragment;
    this.source = fragment.text;
    this.sourceName = sourceName;
  }

  /** Returns the next significant token, or null once the source is exhausted. */
  next(): SchemaToken | null {
    while (this.remaining.length > 0) {
      const text = this.remaining.text;

      const renamed = text.match(SchemaLexer.RENAMED_ATTR_REGEX);
      if (renamed) {
        const [whole, name = '', equals = '', renamedTo = '', colon = ''] = renamed;
        const token: SchemaToken = {
          type: 'renamed_attribute',
          name: this.remaining.slice(0, name.length),
          renamedTo: this.remaining.slice(name.length + equals.length, name.length + equals.length + renamedTo.length),
          dtype: this.remaining.slice(name.length + equals.length + renamedTo.length + colon.length, whole.length),
        };
        this.consume(whole.length);
        return token;
      }

      const attr = text.match(SchemaLexer.ATTR_REGEX);
      if (attr) {
        const [whole, name = '', colon = ''] = attr;
        const token: SchemaToken = {
          type: 'attribute',
          name: this.remaining.slice(0, name.length),
          dtype: this.remaining.slice(name.length + colon.length, whole.length),
        };
        this.consume(whole.length);
        return token;
      }

      const lone = text.match(SchemaLexer.LONE_TYPE_REGEX);
      if (lone) {
        const token: SchemaToken = { type: 'lone_type', dtype: this.remaining.slice(0, lone[0].length) };
        this.consume(lone[0].length);
        return token;
      }

      if (SchemaLexer.OPEN_REGEX.test(text)) {
        const token: SchemaToken = { type: 'open', delimiter: this.remaining.slice(0, 1) };
        this.consume(1);
        return token;
      }

      if (SchemaLexer.CLOSE_REGEX.test(text)) {
        const token: SchemaToken = { type: 'close', delimiter: this.remaining.slice(0, 1) };
        this.consume(1);
        return token;
      }

      const ignored = text.match(SchemaLexer.IGNORED_REGEX);
      if (ignored) {
        this.consume(ignored[0].length);
        continue;
      }

      throw new SchemaParsingError(`Unexpected content: ${text.split('\n', 1)[0] ?? text}`, {
        source: this.source,
        offset: this.remaining.offset,
        unparsed: text,
        sourceName: this.sourceName,
      });
    }
    return null;
  }

  tokenize(): SchemaToken[] {
    const tokens: SchemaToken[] = [];
    for (let token = this.next(); token !== null; token = this.next()) {
      tokens.push(token);
    }
    return tokens;
  }

  private consume(length: number): void {
    this.remaining = this.remaining.slice(length);
  }
}
