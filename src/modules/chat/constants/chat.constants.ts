/**
 * Configuration constants for the chat engine
 */

/**
 * Messages kept per session before the oldest are dropped
 */
export const DEFAULT_HISTORY_CAPACITY = 40;

/**
 * Sentences requested from the enrichment source in knowledge mode
 */
export const DEFAULT_ENRICHMENT_SENTENCES = 4;

/**
 * Live sessions kept in memory before the oldest is evicted
 */
export const DEFAULT_MAX_SESSIONS = 1000;

/**
 * Characters of the last user message echoed by the local fallback
 */
export const FALLBACK_ECHO_LENGTH = 400;

export const FALLBACK_PREFIX = "[Local fallback] I can't reach the model. Echo: ";

/**
 * Upper bounds enforced on request bodies
 */
export const MAX_MESSAGE_LENGTH = 10000;
export const MAX_MODE_LABEL_LENGTH = 100;
export const MAX_PROMPT_LENGTH = 10000;
