/**
 * Lexer Helper Functions
 * Character classification and marker-run detection
 */

export function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && ch !== '' && /\s/.test(ch);
}

/**
 * Length of the run of `ch` starting `line`, capped at `max`.
 * Returns 0 when the run is shorter than `min`.
 */
export function markerRun(
  line: string,
  ch: string,
  min: number,
  max: number
): number {
  let n = 0;
  while (n < line.length && n < max && line[n] === ch) n++;
  return n >= min ? n : 0;
}

/**
 * Depth of a `marker` run of 1..6 characters followed by whitespace,
 * or 0 when the line does not start with such a marker.
 */
export function markerLevel(line: string, marker: string): number {
  const n = markerRun(line, marker, 1, 6);
  return n > 0 && isWhitespace(line[n]) ? n : 0;
}

/** Number of trailing `ch` characters */
export function trailingRun(line: string, ch: string): number {
  let n = 0;
  while (n < line.length && line[line.length - 1 - n] === ch) n++;
  return n;
}
