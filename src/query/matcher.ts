/**
 * Token Pattern Matcher
 *
 * Matches a tokenized query against a template of literal tokens and
 * wildcards:
 * - `%` binds one or more consecutive tokens (greedy, backtracking so that
 *   literals after it can still match)
 * - `_` binds exactly one token
 *
 * Bindings are returned in template order, multi-token bindings joined with
 * single spaces.
 */

import { MULTI_WILDCARD, SINGLE_WILDCARD } from '../lib/constants.js';

/**
 * Match `source` against `pattern`
 *
 * @returns The wildcard bindings, or null when the shapes disagree
 */
export function match(pattern: readonly string[], source: readonly string[]): string[] | null {
  return matchFrom(pattern, 0, source, 0);
}

function matchFrom(
  pattern: readonly string[],
  pi: number,
  source: readonly string[],
  si: number
): string[] | null {
  const token = pattern[pi];
  if (token === undefined) {
    return si === source.length ? [] : null;
  }

  if (token === MULTI_WILDCARD) {
    // Longest span first
    for (let end = source.length; end > si; end--) {
      const rest = matchFrom(pattern, pi + 1, source, end);
      if (rest) {
        return [source.slice(si, end).join(' '), ...rest];
      }
    }
    return null;
  }

  const word = source[si];
  if (word === undefined) {
    return null;
  }

  if (token === SINGLE_WILDCARD) {
    const rest = matchFrom(pattern, pi + 1, source, si + 1);
    return rest ? [word, ...rest] : null;
  }

  return token === word ? matchFrom(pattern, pi + 1, source, si + 1) : null;
}
