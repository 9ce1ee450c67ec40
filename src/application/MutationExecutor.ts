import type { IClock } from '../domain/ports/IClock.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { MutationResult } from '../domain/ports/IDirectoryWriter.js';
import {
  isSuccessStatus,
  type ITransport,
  type TransportRequest,
} from '../domain/ports/ITransport.js';
import type { RunContext } from '../domain/entities/RunContext.js';
import {
  MutationError,
  errorMessage,
  type MutationFailureReason,
} from '../domain/errors/SyncError.js';

export type MutationKind = 'delete-entity' | 'create-group' | 'update-group' | 'delete-group';

/**
 * Outcome of a post-delete existence check.
 * `pending`: the target still answers (remote not consistent yet).
 * `failed`: the check itself could not be answered.
 */
export type ExistenceCheck =
  | { status: 'confirmed' }
  | { status: 'pending'; statusCode: number }
  | { status: 'failed'; detail: string };

export interface MutationSpec {
  kind: MutationKind;
  /** Human-readable target for logs (entity or group name) */
  target: string;
  request: TransportRequest;
  /** Decoded body, logged on dry-run */
  payload?: unknown;
  /** Post-condition; a 2xx answer only counts once this confirms */
  verify?: () => Promise<ExistenceCheck>;
}

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
};

const EXISTENCE_CHECK_TIMEOUT_MS = 10000;

const ACTION_LABELS: Record<MutationKind, string> = {
  'delete-entity': 'DELETE entity',
  'create-group': 'CREATE group',
  'update-group': 'UPDATE group',
  'delete-group': 'DELETE group',
};

interface AttemptFailure {
  reason: MutationFailureReason;
  message: string;
  statusCode?: number;
}

export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  if (attempt <= 1) return 0;
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 2));
}

/**
 * Envelope shared by every mutating call: dry-run, do-not-delete, bounded retries
 * with exponential backoff, and verification of deletions.
 *
 * Retry state lives in the `execute` call, so one executor can serve any number of
 * operations.
 */
export class MutationExecutor {
  private readonly logger: ILogger;

  constructor(
    private readonly transport: ITransport,
    private readonly clock: IClock,
    private readonly context: RunContext,
    logger: ILogger,
    private readonly retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY
  ) {
    this.logger = logger.child({ component: 'MutationExecutor' });
  }

  async execute(spec: MutationSpec): Promise<MutationResult> {
    const label = ACTION_LABELS[spec.kind];
    const isDeletion = spec.kind === 'delete-entity' || spec.kind === 'delete-group';

    if (this.context.dryRun) {
      this.logger.info(`[DRY RUN] Would ${label}`, {
        target: spec.target,
        method: spec.request.method,
        url: spec.request.url,
        payload: spec.payload,
      });
      return { ok: true, simulated: true, suppressed: false, attempts: 0 };
    }

    if (isDeletion && this.context.doNotDelete) {
      this.logger.info(`Skipping ${label} (do-not-delete is enabled)`, { target: spec.target });
      return { ok: true, simulated: false, suppressed: true, attempts: 0 };
    }

    const attempts = Math.max(1, this.retryPolicy.attempts);
    let accepted = false;
    let lastFailure: AttemptFailure = { reason: 'transport', message: 'No attempt was made' };

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const delayMs = backoffDelayMs(this.retryPolicy, attempt);
      if (delayMs > 0) {
        this.logger.debug('Retrying after backoff', { target: spec.target, attempt, delayMs });
        await this.clock.sleep(delayMs);
      }

      // Once a delete has been accepted only the existence check is repeated
      if (!accepted) {
        const sent = await this.send(spec);
        if ('reason' in sent) {
          lastFailure = sent;
          this.logger.warn(`${label} attempt failed`, {
            target: spec.target,
            attempt,
            reason: sent.reason,
            message: sent.message,
          });
          continue;
        }

        if (!spec.verify) {
          this.logger.debug(`${label} succeeded`, { target: spec.target, attempt, statusCode: sent.statusCode });
          return { ok: true, simulated: false, suppressed: false, attempts: attempt };
        }
        accepted = true;
      }

      const check = await this.runCheck(spec);
      if (check.status === 'confirmed') {
        this.logger.debug(`${label} confirmed`, { target: spec.target, attempt });
        return { ok: true, simulated: false, suppressed: false, attempts: attempt };
      }

      lastFailure =
        check.status === 'pending'
          ? {
              reason: 'inconsistent',
              message: `${spec.target} still exists (HTTP ${check.statusCode})`,
              statusCode: check.statusCode,
            }
          : { reason: 'check-failed', message: check.detail };
      this.logger.warn(`${label} not confirmed yet`, {
        target: spec.target,
        attempt,
        reason: lastFailure.reason,
        message: lastFailure.message,
      });
    }

    const error = new MutationError({
      message: `${label} ${spec.target} failed after ${attempts} attempts: ${lastFailure.message}`,
      reason: lastFailure.reason,
      attempts,
      statusCode: lastFailure.statusCode,
    });
    this.logger.error(`${label} gave up`, error, { target: spec.target });
    return { ok: false, error, attempts };
  }

  /**
   * GET the target and expect a 404
   */
  async checkAbsent(url: string, headers: Record<string, string>): Promise<ExistenceCheck> {
    try {
      const response = await this.transport.send({
        method: 'GET',
        url,
        headers,
        timeoutMs: EXISTENCE_CHECK_TIMEOUT_MS,
      });
      if (response.statusCode === 404) return { status: 'confirmed' };
      if (isSuccessStatus(response.statusCode)) {
        return { status: 'pending', statusCode: response.statusCode };
      }
      return { status: 'failed', detail: `Existence check answered HTTP ${response.statusCode}` };
    } catch (error) {
      return { status: 'failed', detail: `Existence check failed: ${errorMessage(error)}` };
    }
  }

  private async send(spec: MutationSpec): Promise<{ statusCode: number } | AttemptFailure> {
    try {
      const response = await this.transport.send(spec.request);
      if (!isSuccessStatus(response.statusCode)) {
        return {
          reason: 'status',
          message: `HTTP ${response.statusCode}: ${response.bodyText.slice(0, 200)}`,
          statusCode: response.statusCode,
        };
      }
      return { statusCode: response.statusCode };
    } catch (error) {
      return { reason: 'transport', message: errorMessage(error) };
    }
  }

  private async runCheck(spec: MutationSpec): Promise<ExistenceCheck> {
    if (!spec.verify) return { status: 'confirmed' };
    try {
      return await spec.verify();
    } catch (error) {
      return { status: 'failed', detail: errorMessage(error) };
    }
  }
}
