/**
 * infobot - Main Library Entry Point
 *
 * Re-exports the query pipeline and wires its parts together for
 * programmatic use.
 */

import { InfoboxExtractor } from './extract/extractor.js';
import { QueryDispatcher } from './query/dispatcher.js';
import { buildPatternActions } from './query/templates.js';
import { WikipediaClient, type WikipediaClientOptions } from './wikipedia/client.js';

// ============================================================================
// QUERY MATCHING
// ============================================================================
export { match } from './query/matcher.js';
export { QueryDispatcher, normalizeQuery } from './query/dispatcher.js';
export {
  QUERY_TEMPLATES,
  buildPatternActions,
  describeTemplates,
} from './query/templates.js';
export type { Action, PatternAction, QueryTemplate } from './query/templates.js';

// ============================================================================
// INFOBOX EXTRACTION
// ============================================================================
export { InfoboxExtractor } from './extract/extractor.js';
export type { FieldExtractor, PageSource } from './extract/extractor.js';
export { cleanText, extractField, getFirstInfoboxText } from './extract/infobox.js';
export { FIELD_PATTERNS, INFOBOX_FIELDS } from './extract/fields.js';
export type { FieldPattern, InfoboxField } from './extract/fields.js';

// ============================================================================
// WIKIPEDIA
// ============================================================================
export { WikipediaClient, apiUrlForLang } from './wikipedia/client.js';
export type { WikipediaClientOptions } from './wikipedia/client.js';

// ============================================================================
// ERRORS
// ============================================================================
export {
  NotFoundError,
  MissingInfoboxError,
  FieldNotFoundError,
  UpstreamError,
  ValidationError,
  isTypedError,
} from './lib/errors.js';
export type { ErrorKind, TypedError } from './lib/errors.js';

/** A wired-up query pipeline */
export interface Infobot {
  client: WikipediaClient;
  extractor: InfoboxExtractor;
  dispatcher: QueryDispatcher;
}

/**
 * Wire the Wikipedia client, extractor and dispatcher together
 */
export function createInfobot(options: WikipediaClientOptions = {}): Infobot {
  const client = new WikipediaClient(options);
  const extractor = new InfoboxExtractor(client);
  const dispatcher = new QueryDispatcher(buildPatternActions(extractor));
  return { client, extractor, dispatcher };
}
