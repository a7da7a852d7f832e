/**
 * Renders a schema tree back into the schema grammar:
 *
 * ```text
 * attribute: Utf8
 * nested: Struct(
 *     foo: Float64
 *     vector: List(
 *         Int64
 *     )
 * )
 * ```
 */

import { SchemaType, StructType } from './types';
import { displayName } from './registry';

export function printSchema(root: StructType, indent = '    '): string {
  const lines: string[] = [];
  for (const field of root.fields) {
    printEntry(lines, field.name ? `${field.name}: ` : '', field.type, '', indent);
  }
  return lines.join('\n');
}

function printEntry(lines: string[], label: string, type: SchemaType, depth: string, indent: string): void {
  switch (type.kind) {
    case 'scalar':
      lines.push(`${depth}${label}${displayName(type.dtype)}`);
      break;
    case 'list':
      lines.push(`${depth}${label}List(`);
      printEntry(lines, '', type.element, depth + indent, indent);
      lines.push(`${depth})`);
      break;
    case 'struct':
      lines.push(`${depth}${label}Struct(`);
      for (const field of type.fields) {
        printEntry(lines, field.name ? `${field.name}: ` : '', field.type, depth + indent, indent);
      }
      lines.push(`${depth})`);
      break;
  }
}
