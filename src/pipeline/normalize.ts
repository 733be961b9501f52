// Studio captions come NUL-terminated; tabs and other whitespace are left alone
const EDGE_NOISE = /^[\r\n \u0000]+|[\r\n \u0000]+$/g;

export function normalizeLine(text: string): string {
  return text.replace(EDGE_NOISE, '');
}

/**
 * The broadcast shows two scrolling caption rows, so every line is emitted
 * twice in a row. Only the first occurrence is kept; non-adjacent repeats pass.
 */
export class DuplicateFilter {
  private lastLine = '';

  accept(line: string): boolean {
    if (line === this.lastLine) return false;
    this.lastLine = line;
    return true;
  }
}
