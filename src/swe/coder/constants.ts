export const SEARCH_MARKER = '<<<<<<< SEARCH';
export const DIVIDER_MARKER = '=======';
export const REPLACE_MARKER = '>>>>>>> REPLACE';

export const DEFAULT_CONTINUE_SIGNAL = '[CONTINUE]';

/** Number of lines of a file included in failure feedback */
export const SNAPSHOT_MAX_LINES = 200;
