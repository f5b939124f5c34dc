/**
 * Process exit codes for the clusterbox CLI.
 */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID = 2;
export const EXIT_ENGINE_UNAVAILABLE = 3;
export const EXIT_NOT_FOUND = 4;
export const EXIT_PARTIAL_FAILURE = 5;
export const EXIT_ROLLBACK_FAILED = 6;
