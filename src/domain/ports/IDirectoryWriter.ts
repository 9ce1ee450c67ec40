import type { AlexaEntity } from '../entities/AlexaEntity.js';
import type {
  ApplianceGroup,
  CreateGroupPayload,
  UpdateGroupPayload,
} from '../entities/ApplianceGroup.js';
import type { MutationError } from '../errors/SyncError.js';

export type MutationResult =
  | {
      ok: true;
      /** Dry-run: nothing was sent */
      simulated: boolean;
      /** Do-not-delete: the deletion was skipped on purpose */
      suppressed: boolean;
      attempts: number;
    }
  | { ok: false; error: MutationError; attempts: number };

/**
 * Write side of the Alexa directory. Every operation goes through the mutation
 * envelope (dry-run, retries, verification) and never rejects.
 */
export interface IDirectoryWriter {
  deleteEntity(entity: AlexaEntity): Promise<MutationResult>;
  createGroup(payload: CreateGroupPayload): Promise<MutationResult>;
  updateGroup(payload: UpdateGroupPayload): Promise<MutationResult>;
  deleteGroup(group: ApplianceGroup): Promise<MutationResult>;
}
