import type { AlexaEntity } from '../entities/AlexaEntity.js';
import type { ApplianceGroup } from '../entities/ApplianceGroup.js';

/**
 * Read side of the Alexa smart home directory.
 *
 * Transport failures and non-2xx statuses reject; bodies that cannot be parsed
 * resolve with an empty list after being logged.
 */
export interface IAlexaDirectory {
  /** Skill entities (`/api/behaviors/entities`) */
  listEntities(): Promise<AlexaEntity[]>;

  /** Endpoints from the GraphQL listing, with appliance ids */
  listEndpoints(): Promise<AlexaEntity[]>;

  listGroups(): Promise<ApplianceGroup[]>;
}
