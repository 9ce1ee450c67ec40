/**
 * An Alexa appliance group as returned by the groups listing.
 * Every field is required by the update endpoint, so unused ones are carried along untouched.
 */
export interface ApplianceGroup {
  id: string;
  name: string;
  entityId: string;
  entityType: string;
  groupType: string;
  childIds: string[];
  defaults: unknown[];
  associatedUnitIds: string[];
  defaultMetadataByType: Record<string, unknown>;
  implicitTargetingByType: Record<string, unknown>;
  applianceIds: string[];
}

export const DEFAULT_ENTITY_TYPE = 'GROUP';
export const DEFAULT_GROUP_TYPE = 'APPLIANCE';

/**
 * Wire shape shared by the create and update endpoints. Key order is fixed.
 */
interface GroupPayloadFields {
  entityId: string;
  id: string;
  name: string;
  entityType: string;
  groupType: string;
  childIds: string[];
  defaults: unknown[];
  associatedUnitIds: string[];
  defaultMetadataByType: Record<string, unknown>;
  implicitTargetingByType: Record<string, unknown>;
  applianceIds: string[];
}

/** POST body for a new group: no ids yet */
export interface CreateGroupPayload extends GroupPayloadFields {
  entityId: '';
  id: '';
}

/** PUT body for an existing group */
export type UpdateGroupPayload = GroupPayloadFields;

export function buildCreateGroupPayload(name: string, applianceIds: readonly string[]): CreateGroupPayload {
  return {
    entityId: '',
    id: '',
    name,
    entityType: DEFAULT_ENTITY_TYPE,
    groupType: DEFAULT_GROUP_TYPE,
    childIds: [],
    defaults: [],
    associatedUnitIds: [],
    defaultMetadataByType: {},
    implicitTargetingByType: {},
    applianceIds: [...applianceIds],
  };
}

export function buildUpdateGroupPayload(
  group: ApplianceGroup,
  applianceIds: readonly string[]
): UpdateGroupPayload {
  return {
    entityId: group.entityId,
    id: group.id,
    name: group.name,
    entityType: group.entityType,
    groupType: group.groupType,
    childIds: [...group.childIds],
    defaults: [...group.defaults],
    associatedUnitIds: [...group.associatedUnitIds],
    defaultMetadataByType: { ...group.defaultMetadataByType },
    implicitTargetingByType: { ...group.implicitTargetingByType },
    applianceIds: [...applianceIds],
  };
}
