import { haEntityIdFromDescription, normalizeApplianceId, toDeleteId } from './Identifiers.js';

/**
 * A device known to the Alexa smart home directory
 */
export interface AlexaEntity {
  /** Entity id (behaviors listing) or appliance key (endpoint listing) */
  id: string;
  displayName: string;
  /** Free text; the Home Assistant skill writes `<ha entity id> via Home Assistant` */
  description: string;
  /** Home Assistant entity id recovered from the description, lower-cased */
  haEntityId: string;
  /** Path segment for the appliance delete endpoint */
  deleteId: string;
  /** Only present on entities coming from the endpoint (GraphQL) listing */
  applianceId?: string;
  manufacturerName?: string;
}

export interface AlexaEntityInit {
  id: string;
  displayName: string;
  description: string;
  applianceId?: string;
  manufacturerName?: string;
}

/**
 * Build an entity, deriving the Home Assistant id and delete id.
 * When the description carries no id, the appliance id suffix is used instead.
 */
export function createAlexaEntity(init: AlexaEntityInit): AlexaEntity {
  const fromDescription = haEntityIdFromDescription(init.description);
  const haEntityId =
    fromDescription.length > 0 || !init.applianceId ? fromDescription : normalizeApplianceId(init.applianceId);

  return {
    id: init.id,
    displayName: init.displayName,
    description: init.description,
    haEntityId,
    deleteId: toDeleteId(haEntityId),
    ...(init.applianceId ? { applianceId: init.applianceId } : {}),
    ...(init.manufacturerName ? { manufacturerName: init.manufacturerName } : {}),
  };
}

/**
 * Entities whose description or manufacturer mentions the filter text
 */
export function matchesDescriptionFilter(entity: AlexaEntity, filterText: string): boolean {
  if (!filterText) return true;
  return entity.description.includes(filterText) || (entity.manufacturerName ?? '').includes(filterText);
}
