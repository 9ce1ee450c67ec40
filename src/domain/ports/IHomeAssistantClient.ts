import type { HaAreaMap } from '../entities/Area.js';

/**
 * Home Assistant REST API as used by the sync tool
 */
export interface IHomeAssistantClient {
  /**
   * Areas and their entity ids, rendered through the template endpoint.
   * An unparseable answer resolves with `{}`.
   */
  getAreas(): Promise<HaAreaMap>;

  /**
   * Media player entity of the Echo device that was spoken to last, if any
   */
  getLastCalledDevice(): Promise<string | null>;

  /**
   * Ask an Echo device to run device discovery. Resolves with whether the call was accepted.
   */
  triggerDiscovery(mediaPlayerEntityId: string): Promise<boolean>;
}
