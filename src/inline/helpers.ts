/**
 * Inline Scanner Helpers
 * Character classes and delimiter lookup
 */

/** Schemes that start an autolink */
export const URL_SCHEMES = ['http:', 'https:', 'ftp:', 'irc:', 'mailto:'] as const;

/** An autolink must run past this many characters from the scheme start */
export const MIN_AUTOLINK_LENGTH = 6;

export function startsWithUrlScheme(text: string, index: number): boolean {
  return URL_SCHEMES.some((scheme) => text.startsWith(scheme, index));
}

/** Letters, digits, `_` and `-` */
export function isMacroNameChar(ch: string): boolean {
  return /^[\p{L}\p{N}_-]$/u.test(ch);
}

export function isWhitespace(ch: string): boolean {
  return /^\s$/.test(ch);
}

/** Ends an autolink */
export function isUrlTerminator(ch: string): boolean {
  return isWhitespace(ch) || ch === '[' || ch === ']';
}

/**
 * Find the close of a `delim ... delim` pair opened at `index`.
 * Returns the index of the closing delimiter, or -1 when it is missing or
 * the enclosed text would be empty.
 */
export function findClose(text: string, index: number, delim: string): number {
  const contentStart = index + delim.length;
  const close = text.indexOf(delim, contentStart);
  return close > contentStart ? close : -1;
}

// ============================================================
// MACRO LOOKAHEAD
// ============================================================

/**
 * Next index at or after a position whose character passes `test`, or -1.
 * Positions passed to `from` never decrease, so each search resumes at the
 * last hit.
 */
class ForwardSearch {
  private hit: number | null = null;

  constructor(
    private readonly text: string,
    private readonly test: (ch: string) => boolean
  ) {}

  from(pos: number): number {
    if (this.hit !== null && (this.hit < 0 || this.hit >= pos)) {
      return this.hit;
    }
    let k = pos;
    while (k < this.text.length && !this.test(this.text[k] ?? '')) k++;
    this.hit = k < this.text.length ? k : -1;
    return this.hit;
  }
}

/**
 * Lookups for `name:target[inner]` shared by every position of one scan.
 * Scan positions only grow, which keeps the searches linear in the text.
 */
export class MacroLookahead {
  private readonly colons: ForwardSearch;
  private readonly opens: ForwardSearch;
  private readonly closes: ForwardSearch;
  private readonly blanks: ForwardSearch;
  private nameColon = -1;
  private nameStart = 0;

  constructor(private readonly text: string) {
    this.colons = new ForwardSearch(text, (ch) => ch === ':');
    this.opens = new ForwardSearch(text, (ch) => ch === '[');
    this.closes = new ForwardSearch(text, (ch) => ch === ']');
    this.blanks = new ForwardSearch(text, isWhitespace);
  }

  nextColon(pos: number): number {
    return this.colons.from(pos);
  }

  nextOpen(pos: number): number {
    return this.opens.from(pos);
  }

  nextClose(pos: number): number {
    return this.closes.from(pos);
  }

  nextWhitespace(pos: number): number {
    return this.blanks.from(pos);
  }

  /** Start of the run of macro name characters that ends at `colon` */
  nameStartBefore(colon: number): number {
    if (colon !== this.nameColon) {
      let k = colon;
      while (k > 0 && isMacroNameChar(this.text[k - 1] ?? '')) k--;
      this.nameColon = colon;
      this.nameStart = k;
    }
    return this.nameStart;
  }
}
