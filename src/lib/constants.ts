/**
 * Centralized constants for infobot
 */

// ============================================================================
// Wikipedia
// ============================================================================

/** Default Wikipedia language edition */
export const DEFAULT_LANG = 'en';

/** User-Agent sent with Wikipedia API requests */
export const DEFAULT_USER_AGENT = 'infobot/0.1 (command-line president lookup)';

/** Number of search hits requested; only the first is used */
export const SEARCH_LIMIT = 10;

// ============================================================================
// Query matching
// ============================================================================

/** Wildcard that binds one or more tokens */
export const MULTI_WILDCARD = '%';

/** Wildcard that binds exactly one token */
export const SINGLE_WILDCARD = '_';

/** Response when no template matches */
export const NO_MATCH_RESPONSE = "I don't understand";

/** Response when a template matches but its action returns nothing */
export const NO_ANSWERS_RESPONSE = 'No answers';

// ============================================================================
// REPL
// ============================================================================

export const WELCOME_MESSAGE = 'Welcome to the President Info Bot!';

export const PROMPT = 'Your query? ';

export const FAREWELL_MESSAGE = 'Goodbye!';
