/** Maximum number of suggestions a query returns. */
export const DEFAULT_SUGGESTION_LIMIT = 10;

/** Largest edit distance a spelling correction may have. */
export const DEFAULT_MAX_EDIT_DISTANCE = 2;

/** Longest word accepted at the boundary. */
export const DEFAULT_MAX_WORD_LENGTH = 99;
