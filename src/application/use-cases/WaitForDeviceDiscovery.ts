import type { IAlexaDirectory } from '../../domain/ports/IAlexaDirectory.js';
import type { IHomeAssistantClient } from '../../domain/ports/IHomeAssistantClient.js';
import type { IClock } from '../../domain/ports/IClock.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { RunContext } from '../../domain/entities/RunContext.js';
import { errorMessage } from '../../domain/errors/SyncError.js';

/**
 * `awaiting-increase`: discovery was triggered, the count has not grown yet.
 * `stabilizing`: the count grew; `window` holds the latest counts since then.
 */
export type DiscoveryState =
  | { phase: 'awaiting-increase'; baseline: number }
  | { phase: 'stabilizing'; baseline: number; window: number[] }
  | { phase: 'converged'; baseline: number; count: number };

/**
 * Feed one poll result into the state machine
 */
export function advanceDiscovery(state: DiscoveryState, count: number, stableRequired: number): DiscoveryState {
  const required = Math.max(1, stableRequired);

  switch (state.phase) {
    case 'converged':
      return state;
    case 'awaiting-increase':
      if (count <= state.baseline) return state;
      return required === 1
        ? { phase: 'converged', baseline: state.baseline, count }
        : { phase: 'stabilizing', baseline: state.baseline, window: [count] };
    case 'stabilizing': {
      const window = [...state.window, count].slice(-required);
      if (window.length === required && window.every((value) => value === count)) {
        return { phase: 'converged', baseline: state.baseline, count };
      }
      return { phase: 'stabilizing', baseline: state.baseline, window };
    }
  }
}

export interface DiscoverySettings {
  timeoutMs: number;
  pollIntervalMs: number;
  stablePolls: number;
  /** Echo media player to ask; the last-called device is used when unset */
  mediaPlayerEntityId?: string;
}

export const DEFAULT_DISCOVERY_SETTINGS: DiscoverySettings = {
  timeoutMs: 120000,
  pollIntervalMs: 5000,
  stablePolls: 3,
};

export type DiscoveryResult =
  | { status: 'converged'; initialCount: number; finalCount: number; polls: number; simulated: boolean }
  | { status: 'timed-out'; initialCount: number; lastCount: number; polls: number }
  | { status: 'interrupted'; initialCount: number; lastCount: number; polls: number }
  | { status: 'failed'; reason: string };

/**
 * Use case for triggering Alexa device discovery and waiting for the entity count to settle
 */
export class WaitForDeviceDiscovery {
  private readonly logger: ILogger;

  constructor(
    private readonly directory: IAlexaDirectory,
    private readonly haClient: IHomeAssistantClient,
    private readonly clock: IClock,
    private readonly context: RunContext,
    logger: ILogger,
    private readonly settings: DiscoverySettings = DEFAULT_DISCOVERY_SETTINGS,
    private readonly signal?: AbortSignal
  ) {
    this.logger = logger.child({ component: 'WaitForDeviceDiscovery' });
  }

  async execute(): Promise<DiscoveryResult> {
    if (this.context.dryRun) {
      this.logger.info('[DRY RUN] Would trigger device discovery and wait for it to finish');
      return { status: 'converged', initialCount: 0, finalCount: 0, polls: 0, simulated: true };
    }

    let initialCount: number;
    try {
      initialCount = (await this.directory.listEntities()).length;
    } catch (error) {
      this.logger.error('Could not read the initial entity count', error);
      return { status: 'failed', reason: `Initial entity count unavailable: ${errorMessage(error)}` };
    }

    const target = await this.resolveTarget();
    if (!target) {
      return { status: 'failed', reason: 'No Echo device to run discovery on' };
    }

    let accepted: boolean;
    try {
      accepted = await this.haClient.triggerDiscovery(target);
    } catch (error) {
      this.logger.error('Discovery trigger failed', error, { target });
      return { status: 'failed', reason: `Discovery trigger failed: ${errorMessage(error)}` };
    }
    if (!accepted) {
      return { status: 'failed', reason: `Discovery trigger was rejected for ${target}` };
    }

    this.logger.info('Discovery triggered, waiting for new devices', {
      target,
      initialCount,
      timeoutMs: this.settings.timeoutMs,
    });

    // The initial read counts as the first poll
    let polls = 1;
    let lastCount = initialCount;
    let state: DiscoveryState = { phase: 'awaiting-increase', baseline: initialCount };
    const deadline = this.clock.now() + this.settings.timeoutMs;

    while (this.clock.now() < deadline) {
      if (this.signal?.aborted) {
        this.logger.warn('Discovery interrupted', { initialCount, lastCount, polls });
        return { status: 'interrupted', initialCount, lastCount, polls };
      }
      await this.clock.sleep(this.settings.pollIntervalMs);

      let count: number;
      try {
        count = (await this.directory.listEntities()).length;
      } catch (error) {
        this.logger.warn('Discovery poll failed, retrying', { error: errorMessage(error) });
        continue;
      }

      polls++;
      lastCount = count;
      state = advanceDiscovery(state, count, this.settings.stablePolls);
      this.logger.debug('Discovery poll', { count, phase: state.phase, polls });

      if (state.phase === 'converged') {
        this.logger.info('Discovery converged', { initialCount, finalCount: state.count, polls });
        return { status: 'converged', initialCount, finalCount: state.count, polls, simulated: false };
      }
    }

    this.logger.warn('Discovery timed out', { initialCount, lastCount, polls, phase: state.phase });
    return { status: 'timed-out', initialCount, lastCount, polls };
  }

  private async resolveTarget(): Promise<string | null> {
    if (this.settings.mediaPlayerEntityId) {
      return this.settings.mediaPlayerEntityId;
    }

    try {
      const lastCalled = await this.haClient.getLastCalledDevice();
      if (!lastCalled) {
        this.logger.error('No last-called Echo device found and ALEXA_ENTITY_ID is not set');
      }
      return lastCalled;
    } catch (error) {
      this.logger.error('Could not look up the last-called Echo device', error);
      return null;
    }
  }
}
