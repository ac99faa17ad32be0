/**
 * Conservative limits enforced by the engine layer.
 */

export const SAFE_DEFAULTS = {
  /** Hard billing ceiling for any real execution (1 GB) */
  maxBytesBilled: 1_000_000_000,
  /** Hard cap on returned rows regardless of query LIMIT */
  maxRows: 5000,
  /** Server-side job timeout in milliseconds */
  jobTimeoutMs: 60_000,
} as const;
