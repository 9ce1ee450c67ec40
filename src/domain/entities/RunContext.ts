/**
 * Per-run switches handed to every component that talks to the remote directory
 */
export interface RunContext {
  /** Log mutating calls instead of sending them */
  dryRun: boolean;
  /** Report deletions as successful without sending them */
  doNotDelete: boolean;
}

