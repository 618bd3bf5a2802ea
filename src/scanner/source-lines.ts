/**
 * Source line splitting
 *
 * Lines keep their terminators so untouched lines are written back
 * byte-for-byte.
 *
 * @since 2026-10-19
 */

export function splitSourceLines(content: string): string[] {
  return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Terminator used for inserted lines: CRLF when the input uses it
 */
export function detectLineEnding(lines: readonly string[]): string {
  return lines.some(line => line.endsWith('\r\n')) ? '\r\n' : '\n';
}
