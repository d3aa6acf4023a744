/**
 * CLI contracts and exit codes
 */

/**
 * Standard exit codes
 */
export const EXIT_CODE = {
  /** Success */
  SUCCESS: 0,
  /** Internal error */
  INTERNAL_ERROR: 1,
  /** Benchmark verification failed */
  VERIFICATION_FAILED: 2,
  /** Invalid arguments */
  INVALID_ARGS: 3,
} as const;

/**
 * CLI invariants:
 *
 * 1. Exit codes:
 *    - 0: Success (every subject populated, verified and read)
 *    - 1: Internal error (unexpected error, bug)
 *    - 2: Verification failed (a subject returned a wrong value or window)
 *    - 3: Invalid arguments (validation failed)
 *
 * 2. Output format:
 *    - --json flag: stdout carries a single JSON document
 *    - Without --json: human-readable progress and per-block lines
 *    - Errors always go to stderr
 *
 * 3. Environment:
 *    - TRIMSEQ_SEED: default seed for the random workload
 *    - TRIMSEQ_BLOCK_SIZE: default items per block
 *    - TRIMSEQ_CLI_DEBUG=1: emit timing metrics on stderr
 *
 * 4. Determinism:
 *    - The same seed and options reproduce the same workload and read targets
 */
