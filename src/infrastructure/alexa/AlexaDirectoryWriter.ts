import type { IDirectoryWriter, MutationResult } from '../../domain/ports/IDirectoryWriter.js';
import type { AlexaEntity } from '../../domain/entities/AlexaEntity.js';
import type {
  ApplianceGroup,
  CreateGroupPayload,
  UpdateGroupPayload,
} from '../../domain/entities/ApplianceGroup.js';
import type { MutationExecutor } from '../../application/MutationExecutor.js';
import type { AlexaEndpoints } from './AlexaEndpoints.js';

const DELETE_TIMEOUT_MS = 10000;
const WRITE_TIMEOUT_MS = 15000;

/**
 * Alexa mutations expressed as executor specs
 */
export class AlexaDirectoryWriter implements IDirectoryWriter {
  constructor(
    private readonly endpoints: AlexaEndpoints,
    private readonly executor: MutationExecutor
  ) {}

  deleteEntity(entity: AlexaEntity): Promise<MutationResult> {
    const url = this.endpoints.applianceDeleteUrl(entity.deleteId);
    return this.executor.execute({
      kind: 'delete-entity',
      target: `${entity.displayName} (${entity.id})`,
      request: { method: 'DELETE', url, headers: this.endpoints.headers(), timeoutMs: DELETE_TIMEOUT_MS },
      verify: () =>
        this.executor.checkAbsent(this.endpoints.deviceControlUrl(entity.id), this.endpoints.headers()),
    });
  }

  createGroup(payload: CreateGroupPayload): Promise<MutationResult> {
    return this.executor.execute({
      kind: 'create-group',
      target: payload.name,
      request: {
        method: 'POST',
        url: this.endpoints.groupsUrl(),
        headers: this.endpoints.headers(),
        body: JSON.stringify(payload),
        timeoutMs: WRITE_TIMEOUT_MS,
      },
      payload,
    });
  }

  updateGroup(payload: UpdateGroupPayload): Promise<MutationResult> {
    return this.executor.execute({
      kind: 'update-group',
      target: payload.name,
      request: {
        method: 'PUT',
        url: this.endpoints.groupUrl(payload.id),
        headers: this.endpoints.headers(),
        body: JSON.stringify(payload),
        timeoutMs: WRITE_TIMEOUT_MS,
      },
      payload,
    });
  }

  deleteGroup(group: ApplianceGroup): Promise<MutationResult> {
    const url = this.endpoints.groupUrl(group.id);
    return this.executor.execute({
      kind: 'delete-group',
      target: `${group.name} (${group.id})`,
      request: { method: 'DELETE', url, headers: this.endpoints.headers(), timeoutMs: DELETE_TIMEOUT_MS },
      verify: () => this.executor.checkAbsent(url, this.endpoints.headers()),
    });
  }
}
