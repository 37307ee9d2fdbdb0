/**
 * Extractable infobox fields
 *
 * One entry per answerable attribute: the pattern applied to cleaned infobox
 * text, the capture group holding the answer, and the message raised when the
 * pattern misses. Patterns are deliberately loose; the trailing-word-run
 * captures can run on into the next infobox label.
 */

export const INFOBOX_FIELDS = [
  'name',
  'term',
  'party',
  'birth',
  'predecessor',
  'successor',
] as const;

export type InfoboxField = (typeof INFOBOX_FIELDS)[number];

export interface FieldPattern {
  /** Matched with the `i` and `s` flags; never `g` or `y`, so `exec` keeps no state */
  readonly pattern: RegExp;
  /** Capture group index or name holding the answer */
  readonly group: number | string;
  /** Message of the FieldNotFoundError raised on a miss */
  readonly errorText: string;
}

/**
 * Freeze an entry and its pattern. A frozen RegExp cannot update
 * `lastIndex`, so a stateful flag added later fails on first use.
 */
function fieldPattern(pattern: RegExp, group: number | string, errorText: string): FieldPattern {
  return Object.freeze({ pattern: Object.freeze(pattern), group, errorText });
}

export const FIELD_PATTERNS: Readonly<Record<InfoboxField, FieldPattern>> = Object.freeze({
  name: fieldPattern(
    /(?:President)(?:.*?)(?<president>[\w\s]+)(?:.*?)/is,
    'president',
    'Page infobox has no president information'
  ),
  term: fieldPattern(
    /(?:Term\s*of\s*office\s*).*?(\d{4}-\d{4})/is,
    1,
    'Page infobox has no term information'
  ),
  party: fieldPattern(
    /(?:Political\s*party\s*).*?([\w\s]+)/is,
    1,
    'Page infobox has no political party information'
  ),
  birth: fieldPattern(
    /(?:Born\D*)(?<birth>\d{4}-\d{2}-\d{2})/is,
    'birth',
    'Page infobox has no birth information (at least none in xxxx-xx-xx format)'
  ),
  predecessor: fieldPattern(
    /(?:Predecessor\s*).*?([\w\s]+)/is,
    1,
    'Page infobox has no predecessor information'
  ),
  successor: fieldPattern(
    /(?:Successor\s*).*?([\w\s]+)/is,
    1,
    'Page infobox has no successor information'
  ),
});
