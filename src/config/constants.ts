/**
 * Application-wide constants.
 */

/**
 * Navigation loop configuration
 */
export const NAVIGATION = {
  /** Default iteration cap of the think/act/observe loop */
  MAX_ITERATIONS: 10,

  /** Characters of a single observation kept in the transcript */
  MAX_OBSERVATION_CHARS: 6000,
} as const;

/**
 * Completion service configuration
 */
export const COMPLETION = {
  TIMEOUT_MS: 120 * 1000, // 2 minutes
  MAX_RETRIES: 2,
  INITIAL_RETRY_DELAY_MS: 1000,
} as const;

/**
 * Answer grading configuration
 */
export const EVALUATION = {
  TIMEOUT_MS: 60 * 1000, // 1 minute
  MAX_RETRIES: 2,
  INITIAL_RETRY_DELAY_MS: 1000,
} as const;

/**
 * Segmentation configuration
 */
export const SEGMENTATION = {
  /** Cache file, relative to the workspace */
  CACHE_PATH: '.tocnav/segments.json',

  /** Character budget of the numbered text sent for extraction */
  MAX_CHARS: 200_000,

  TIMEOUT_MS: 180 * 1000, // 3 minutes
  MAX_RETRIES: 2,

  /** Title of the single section used when extraction fails */
  FALLBACK_TITLE: 'Full Document',
} as const;

/**
 * Multi-pass search configuration
 */
export const SEARCH = {
  /** Candidate sections read by the primary pass */
  MAX_CANDIDATES: 3,

  /** Maximum characters per evidence snippet */
  SNIPPET_CHARS: 240,

  /** Evidence items carried into the answer */
  MAX_EVIDENCE: 12,

  /** Answer given when no pass finds evidence */
  NOT_FOUND_ANSWER: 'The requested information is not found in this document.',
} as const;

/**
 * Constrained command tool configuration
 */
export const SHELL_TOOL = {
  ALLOWLIST: ['ls', 'find', 'wc'],
  TIMEOUT_MS: 30 * 1000, // 30 seconds
  MAX_OUTPUT_CHARS: 4000,
} as const;

/**
 * Read tool configuration
 */
export const READ_TOOL = {
  /** Lines returned by one read_lines call */
  MAX_LINES: 400,
} as const;

/**
 * Batch runner configuration
 */
export const BATCH = {
  CONCURRENCY: 2,
} as const;

/**
 * Document search tool configuration
 */
export const SEARCH_TOOL = {
  DEFAULT_CONTEXT: 2,
  MAX_CONTEXT: 10,
  /** Matches listed by one search_document call */
  MAX_MATCHES: 20,
} as const;
