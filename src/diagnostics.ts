/**
 * Diagnostics - renders the schema lines leading to an issue, with carets
 * underlining the offending span:
 *
 *   Tripped on line 2
 *
 *        1 │ headers: Struct(
 *        2 │     timestamp: Foo
 *        ? │                ^^^
 */

export interface IssueLocation {
  start: number;
  end: number;
  line: number;
  column: number;
  lineText: string;
}

const SPAN_END_REGEX = /[()[\]{}<>\n]/;

export function locateIssue(source: string, start: number): IssueLocation {
  const issueStart = Math.min(Math.max(start, 0), source.length);
  const spanEnd = source.slice(issueStart).search(SPAN_END_REGEX);
  const end = spanEnd === -1 ? source.length : issueStart + spanEnd;

  const lineStart = source.lastIndexOf('\n', issueStart - 1) + 1;
  const nextNewline = source.indexOf('\n', issueStart);
  const lineEnd = nextNewline === -1 ? source.length : nextNewline;

  let line = 1;
  for (let i = 0; i < issueStart; i += 1) {
    if (source[i] === '\n') {
      line += 1;
    }
  }

  return {
    start: issueStart,
    end,
    line,
    column: issueStart - lineStart + 1,
    lineText: source.slice(lineStart, lineEnd),
  };
}

export function formatDiagnostic(source: string, unparsed: string, start = source.indexOf(unparsed)): string {
  const issue = locateIssue(source, start === -1 ? 0 : start);
  const lines = source.split('\n').slice(0, issue.line);

  const rendered = [`Tripped on line ${issue.line}`, ''];
  lines.forEach((text, index) => {
    rendered.push(`   ${String(index + 1).padStart(3)} │ ${text}`);
  });
  const pointer = `${' '.repeat(issue.column - 1)}${'^'.repeat(Math.max(issue.end - issue.start, 1))}`;
  rendered.push(`     ? │ ${pointer}`);

  return rendered.join('\n');
}
