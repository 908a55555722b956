/**
 * Process exit codes
 */

export const EXIT_SUCCESS = 0;
export const EXIT_VIOLATIONS = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERRUPTED = 130;
