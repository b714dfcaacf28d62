/**
 * Error codes and recovery messages for the perception engine.
 */

/** Standard error codes raised by extraction and action-space queries */
export type ErrorCode =
  | 'NOT_FOUND'
  | 'EMPTY_SPACE'
  | 'INVALID_OPTIONS'
  | 'INVALID_ACTION_SPACE'
  | 'NO_ROOT';

/** Map of error codes to human-readable recovery suggestions */
export const ERROR_RECOVERY: Record<ErrorCode, string> = {
  NOT_FOUND:
    'The action ID is not part of this action space. Take a new snapshot or pick an ID from the rendered listing.',
  EMPTY_SPACE:
    'No action matches the requested role or category. Relax the filter or extend the snapshot after the page changes.',
  INVALID_OPTIONS:
    'The extraction options are invalid. viewportExpansion must be an integer >= -1 and indices must be >= 0.',
  INVALID_ACTION_SPACE:
    'The action space data is malformed. Take a fresh snapshot instead of extending this one.',
  NO_ROOT:
    'The page has no body or root element to walk. Wait for the document to load and try again.',
};
