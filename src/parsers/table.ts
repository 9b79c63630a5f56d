export const DEFAULT_HEADER_TOKENS = ['Name', '名前'];

const SEPARATOR = '-';
const RULER = /^-+$/;

export interface TableOptions {
  headerTokens?: string[];
}

/**
 * Spinner frames are redrawn in place with a bare carriage return, so only the
 * text after the last one on a line is what ends up on screen.
 */
function visibleText(line: string): string {
  const cr = line.lastIndexOf('\r');
  return cr === -1 ? line : line.slice(cr + 1);
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/).map(visibleText);
}

export function tokenize(line: string): string[] {
  return line.trim().split(/\s+/).filter(Boolean);
}

/**
 * Returns the data lines of a column-aligned table: everything after the
 * header row (and its dashed ruler), minus blank and separator lines.
 * Output without a recognisable header yields an empty list.
 */
export function extractDataLines(text: string, options: TableOptions = {}): string[] {
  const headerTokens = options.headerTokens ?? DEFAULT_HEADER_TOKENS;
  const lines = splitLines(text);

  const headerIndex = lines.findIndex((line) => headerTokens.some((token) => line.includes(token)));
  if (headerIndex === -1) return [];

  let start = headerIndex + 1;
  if (start < lines.length && RULER.test(lines[start].trim())) {
    start++;
  }

  return lines
    .slice(start)
    .filter((line) => line.trim() !== '' && !line.startsWith(SEPARATOR));
}
