/**
 * String helpers shared by error messages
 */

export function singleQuote(value: string): string {
  return `'${value}'`;
}

/**
 * Indent every line after the first, so multi-line details line up under a heading
 */
export function indentLines(lines: readonly string[], indent = '  '): string {
  return lines.join(`\n${indent}`);
}
