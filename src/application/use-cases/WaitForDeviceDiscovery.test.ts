import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { WaitForDeviceDiscovery, advanceDiscovery, type DiscoverySettings } from './WaitForDeviceDiscovery.js';
import type { IAlexaDirectory } from '../../domain/ports/IAlexaDirectory.js';
import type { IHomeAssistantClient } from '../../domain/ports/IHomeAssistantClient.js';
import type { IClock } from '../../domain/ports/IClock.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { createAlexaEntity, type AlexaEntity } from '../../domain/entities/AlexaEntity.js';

class FakeClock implements IClock {
  current = 0;

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.current += ms;
  }
}

function entities(count: number): AlexaEntity[] {
  return Array.from({ length: count }, (_, index) =>
    createAlexaEntity({ id: `e${index}`, displayName: `Device ${index}`, description: `light.d${index}` })
  );
}

describe('advanceDiscovery', () => {
  it('should wait for the first increase', () => {
    const state = advanceDiscovery({ phase: 'awaiting-increase', baseline: 2 }, 2, 3);
    expect(state).toEqual({ phase: 'awaiting-increase', baseline: 2 });
  });

  it('should start stabilizing on the first increase', () => {
    const state = advanceDiscovery({ phase: 'awaiting-increase', baseline: 2 }, 3, 3);
    expect(state).toEqual({ phase: 'stabilizing', baseline: 2, window: [3] });
  });

  it('should converge once the window holds identical counts', () => {
    let state = advanceDiscovery({ phase: 'stabilizing', baseline: 2, window: [3] }, 3, 3);
    expect(state).toEqual({ phase: 'stabilizing', baseline: 2, window: [3, 3] });
    state = advanceDiscovery(state, 3, 3);
    expect(state).toEqual({ phase: 'converged', baseline: 2, count: 3 });
  });

  it('should keep a sliding window when the count moves again', () => {
    const state = advanceDiscovery({ phase: 'stabilizing', baseline: 2, window: [3, 3] }, 4, 3);
    expect(state).toEqual({ phase: 'stabilizing', baseline: 2, window: [3, 3, 4] });
    expect(advanceDiscovery(state, 4, 3)).toEqual({ phase: 'stabilizing', baseline: 2, window: [3, 4, 4] });
  });
});

describe('WaitForDeviceDiscovery', () => {
  let listEntities: Mock<() => Promise<AlexaEntity[]>>;
  let triggerDiscovery: Mock<(entityId: string) => Promise<boolean>>;
  let getLastCalledDevice: Mock<() => Promise<string | null>>;
  let mockDirectory: IAlexaDirectory;
  let mockHaClient: IHomeAssistantClient;
  let mockLogger: ILogger;
  let clock: FakeClock;

  const settings: DiscoverySettings = {
    timeoutMs: 120000,
    pollIntervalMs: 5000,
    stablePolls: 3,
    mediaPlayerEntityId: 'media_player.kitchen_echo',
  };

  function countsInOrder(counts: number[]): void {
    for (const count of counts) {
      listEntities.mockResolvedValueOnce(entities(count));
    }
  }

  beforeEach(() => {
    listEntities = vi.fn<() => Promise<AlexaEntity[]>>();
    triggerDiscovery = vi.fn<(entityId: string) => Promise<boolean>>().mockResolvedValue(true);
    getLastCalledDevice = vi.fn<() => Promise<string | null>>().mockResolvedValue('media_player.office_dot');
    mockDirectory = { listEntities, listEndpoints: vi.fn(), listGroups: vi.fn() };
    mockHaClient = { getAreas: vi.fn(), getLastCalledDevice, triggerDiscovery };
    clock = new FakeClock();
    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };
  });

  function useCase(
    dryRun = false,
    overrides: Partial<DiscoverySettings> = {},
    signal?: AbortSignal
  ): WaitForDeviceDiscovery {
    return new WaitForDeviceDiscovery(
      mockDirectory,
      mockHaClient,
      clock,
      { dryRun, doNotDelete: false },
      mockLogger,
      { ...settings, ...overrides },
      signal
    );
  }

  it('should converge on the fifth count read for [2, 2, 3, 3, 3]', async () => {
    countsInOrder([2, 2, 3, 3, 3]);

    const result = await useCase().execute();

    expect(result).toEqual({ status: 'converged', initialCount: 2, finalCount: 3, polls: 5, simulated: false });
    expect(listEntities).toHaveBeenCalledTimes(5);
    expect(triggerDiscovery).toHaveBeenCalledWith('media_player.kitchen_echo');
    expect(clock.now()).toBe(20000);
  });

  it('should time out when the count never grows', async () => {
    listEntities.mockResolvedValue(entities(2));

    const result = await useCase(false, { timeoutMs: 20000 }).execute();

    expect(result).toEqual({ status: 'timed-out', initialCount: 2, lastCount: 2, polls: 5 });
  });

  it('should retry failed polls inside the loop', async () => {
    listEntities
      .mockResolvedValueOnce(entities(1))
      .mockRejectedValueOnce(new Error('network down'))
      .mockResolvedValueOnce(entities(2))
      .mockResolvedValueOnce(entities(2))
      .mockResolvedValueOnce(entities(2));

    const result = await useCase().execute();

    expect(result).toEqual({ status: 'converged', initialCount: 1, finalCount: 2, polls: 4, simulated: false });
    expect(mockLogger.warn).toHaveBeenCalledWith('Discovery poll failed, retrying', { error: 'network down' });
  });

  it('should not touch the network in dry-run', async () => {
    const result = await useCase(true).execute();

    expect(result).toEqual({ status: 'converged', initialCount: 0, finalCount: 0, polls: 0, simulated: true });
    expect(listEntities).not.toHaveBeenCalled();
    expect(triggerDiscovery).not.toHaveBeenCalled();
  });

  it('should use the last-called Echo when no media player is configured', async () => {
    countsInOrder([0, 1]);

    await useCase(false, { mediaPlayerEntityId: undefined, stablePolls: 1 }).execute();

    expect(getLastCalledDevice).toHaveBeenCalledTimes(1);
    expect(triggerDiscovery).toHaveBeenCalledWith('media_player.office_dot');
  });

  it('should fail when there is no Echo to ask', async () => {
    countsInOrder([0]);
    getLastCalledDevice.mockResolvedValue(null);

    const result = await useCase(false, { mediaPlayerEntityId: undefined }).execute();

    expect(result).toEqual({ status: 'failed', reason: 'No Echo device to run discovery on' });
    expect(triggerDiscovery).not.toHaveBeenCalled();
  });

  it('should fail when the trigger is rejected', async () => {
    countsInOrder([0]);
    triggerDiscovery.mockResolvedValue(false);

    const result = await useCase().execute();

    expect(result).toEqual({
      status: 'failed',
      reason: 'Discovery trigger was rejected for media_player.kitchen_echo',
    });
  });

  it('should stop polling once interrupted', async () => {
    const controller = new AbortController();
    listEntities.mockResolvedValueOnce(entities(2)).mockImplementationOnce(async () => {
      controller.abort();
      return entities(3);
    });

    const result = await useCase(false, {}, controller.signal).execute();

    expect(result).toEqual({ status: 'interrupted', initialCount: 2, lastCount: 3, polls: 2 });
    expect(listEntities).toHaveBeenCalledTimes(2);
    expect(clock.now()).toBe(5000);
  });
});
