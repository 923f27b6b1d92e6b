/**
 * Error codes for structured error reporting
 */

export enum ErrorCode {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  PAGE_EVALUATION_FAILED = 'PAGE_EVALUATION_FAILED',
  INVALID_TREE_PAYLOAD = 'INVALID_TREE_PAYLOAD',
  BROWSER_LAUNCH_FAILED = 'BROWSER_LAUNCH_FAILED',
  NAVIGATION_FAILED = 'NAVIGATION_FAILED',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}
