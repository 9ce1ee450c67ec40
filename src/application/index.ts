export { MutationExecutor, DEFAULT_RETRY_POLICY, backoffDelayMs } from './MutationExecutor.js';
export type { ExistenceCheck, MutationKind, MutationSpec, RetryPolicy } from './MutationExecutor.js';
export { runBatch } from './BatchRunner.js';
export type { BatchFailure, BatchOptions, BatchResult } from './BatchRunner.js';
export { BuildCrossReference } from './use-cases/BuildCrossReference.js';
export type { BuildCrossReferenceOutput } from './use-cases/BuildCrossReference.js';
export { DeleteEntities } from './use-cases/DeleteEntities.js';
export type { DeleteEntitiesInput, DeletionOptions, DeletionReport } from './use-cases/DeleteEntities.js';
export { DeleteGroups } from './use-cases/DeleteGroups.js';
export { SyncAreasToGroups } from './use-cases/SyncAreasToGroups.js';
export type { SyncAreasToGroupsInput, SyncAreasToGroupsOptions } from './use-cases/SyncAreasToGroups.js';
export {
  WaitForDeviceDiscovery,
  advanceDiscovery,
  DEFAULT_DISCOVERY_SETTINGS,
} from './use-cases/WaitForDeviceDiscovery.js';
export type { DiscoveryResult, DiscoverySettings, DiscoveryState } from './use-cases/WaitForDeviceDiscovery.js';
