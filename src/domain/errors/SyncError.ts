/**
 * Error types shared by the directory adapters, the mutation executor and the CLI
 */

/**
 * Missing or invalid configuration. Fatal: raised before any network activity.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Network-level failure (DNS, connection reset, timeout) reported by a transport
 */
export class TransportError extends Error {
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.url = url;
  }
}

/**
 * A directory listing answered with a non-2xx status
 */
export class DirectoryReadError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'DirectoryReadError';
    this.statusCode = statusCode;
  }
}

export type MutationFailureReason =
  /** The request never produced a response */
  | 'transport'
  /** The remote answered with a non-2xx status */
  | 'status'
  /** The remote accepted a delete but the target still exists */
  | 'inconsistent'
  /** The existence check itself could not be completed */
  | 'check-failed';

/**
 * A mutating operation that failed after its retry budget was spent
 */
export class MutationError extends Error {
  readonly reason: MutationFailureReason;
  readonly attempts: number;
  readonly statusCode?: number;

  constructor(details: {
    message: string;
    reason: MutationFailureReason;
    attempts: number;
    statusCode?: number;
  }) {
    super(details.message);
    this.name = 'MutationError';
    this.reason = details.reason;
    this.attempts = details.attempts;
    this.statusCode = details.statusCode;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
