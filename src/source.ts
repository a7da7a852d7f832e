export interface SourceFragmentInit {
  offset?: number | undefined;
  row?: number | undefined;
  column?: number | undefined;
}

/**
 * A span of schema source text that remembers where it starts, so tokens and
 * errors can point back at the original text.
 */
export class SourceFragment {
  readonly text: string;
  readonly offset: number;
  readonly row: number;
  readonly column: number;

  constructor(text: string, init: SourceFragmentInit = {}) {
    this.text = text;
    this.offset = init.offset ?? 0;
    this.row = init.row ?? 1;
    this.column = init.column ?? 1;
  }

  get length(): number {
    return this.text.length;
  }

  toString(): string {
    return this.text;
  }

  slice(start = 0, end?: number): SourceFragment {
    const actualStart = clamp(start, 0, this.text.length);
    const actualEnd = clamp(end ?? this.text.length, actualStart, this.text.length);
    const { row, column } = this.advance(actualStart);
    return new SourceFragment(this.text.slice(actualStart, actualEnd), {
      offset: this.offset + actualStart,
      row,
      column,
    });
  }

  advance(offset: number): { row: number; column: number } {
    let row = this.row;
    let column = this.column;
    const length = Math.min(Math.max(offset, 0), this.text.length);
    for (let i = 0; i < length; i += 1) {
      if (this.text[i] === '\n') {
        row += 1;
        column = 1;
      } else {
        column += 1;
      }
    }
    return { row, column };
  }
}

export function fragmentFromSource(source: string): SourceFragment {
  return new SourceFragment(source.replace(/\r\n/g, '\n'));
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}
