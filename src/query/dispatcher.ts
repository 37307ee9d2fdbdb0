/**
 * Query dispatcher
 *
 * Normalizes a line of input, finds the first template that matches and
 * runs its action. Errors from the action propagate to the caller.
 */

import { NO_ANSWERS_RESPONSE, NO_MATCH_RESPONSE } from '../lib/constants.js';
import { generateRequestId, loggers, withRequestContextAsync } from '../lib/logger.js';
import { match } from './matcher.js';
import type { PatternAction } from './templates.js';

/**
 * Remove `?`, lowercase, split on whitespace
 */
export function normalizeQuery(line: string): string[] {
  return line
    .replace(/\?/g, '')
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

export class QueryDispatcher {
  constructor(private readonly patternActions: readonly PatternAction[]) {}

  /**
   * Answer an already-normalized query
   */
  async answer(tokens: readonly string[]): Promise<string[]> {
    for (const { pattern, action } of this.patternActions) {
      const bindings = match(pattern, tokens);
      if (bindings !== null) {
        loggers.matcher.debug('Pattern matched', { pattern: pattern.join(' '), bindings });
        const answers = await action(bindings);
        return answers.length > 0 ? answers : [NO_ANSWERS_RESPONSE];
      }
    }

    loggers.matcher.debug('No pattern matched', { tokens });
    return [NO_MATCH_RESPONSE];
  }

  /**
   * Normalize and answer one line of input; log lines emitted while
   * answering share a request ID
   */
  async ask(line: string): Promise<string[]> {
    return withRequestContextAsync(
      { requestId: generateRequestId(), fields: { query: line } },
      () => this.answer(normalizeQuery(line))
    );
  }
}
