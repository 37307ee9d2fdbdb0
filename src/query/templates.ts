/**
 * Query templates
 *
 * The recognized questions, in priority order, and the pattern-action
 * registry built from them. `%` marks the subject (a country name).
 */

import type { FieldExtractor } from '../extract/extractor.js';
import type { InfoboxField } from '../extract/fields.js';

/** Receives the wildcard bindings of a matched pattern */
export type Action = (bindings: readonly string[]) => Promise<string[]>;

export interface PatternAction {
  readonly pattern: readonly string[];
  readonly action: Action;
}

export interface QueryTemplate {
  readonly question: string;
  readonly field: InfoboxField;
}

export const QUERY_TEMPLATES: readonly QueryTemplate[] = [
  { question: 'who is the president of %', field: 'name' },
  { question: 'what is the term of the president of %', field: 'term' },
  { question: 'what is the political party of the president of %', field: 'party' },
  { question: 'when was the president of % born', field: 'birth' },
  { question: 'who was the predecessor of the president of %', field: 'predecessor' },
  { question: 'who is the successor of the president of %', field: 'successor' },
];

/**
 * Build the pattern-action registry, each action answering its template's
 * field about the bound subject
 */
export function buildPatternActions(
  extractor: FieldExtractor,
  templates: readonly QueryTemplate[] = QUERY_TEMPLATES
): readonly PatternAction[] {
  return templates.map(({ question, field }): PatternAction => ({
    pattern: question.split(' '),
    action: async ([subject]) => (subject === undefined ? [] : [await extractor.extract(subject, field)]),
  }));
}

/**
 * Human-readable list of recognized questions, subject shown as <country>
 */
export function describeTemplates(templates: readonly QueryTemplate[] = QUERY_TEMPLATES): string[] {
  return templates.map(({ question }) => `${question.replace('%', '<country>')}?`);
}
