/**
 * Time units and budgets for external calls.
 */

export const MS_PER_SECOND = 1000;

/** Budget for `git diff` when collecting diff context. */
export const GIT_DIFF_TIMEOUT_MS = 30 * MS_PER_SECOND;
