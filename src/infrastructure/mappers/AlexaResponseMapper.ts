import { createAlexaEntity, type AlexaEntity } from '../../domain/entities/AlexaEntity.js';
import {
  DEFAULT_ENTITY_TYPE,
  DEFAULT_GROUP_TYPE,
  type ApplianceGroup,
} from '../../domain/entities/ApplianceGroup.js';

/**
 * Items that were present in a listing but could not be mapped
 */
export interface SkippedItem {
  item: unknown;
  reason: string;
}

export interface Mapped<T> {
  items: T[];
  skipped: SkippedItem[];
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: JsonRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function unknownList(value: unknown): unknown[] {
  return Array.isArray(value) ? [...value] : [];
}

function recordField(record: JsonRecord, key: string): JsonRecord {
  const value = record[key];
  return isRecord(value) ? { ...value } : {};
}

/**
 * Group members arrive either as plain ids or as `{ "applianceId": "..." }` objects
 */
function applianceIdList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const ids: string[] = [];
  for (const entry of value) {
    if (typeof entry === 'string') {
      ids.push(entry);
    } else if (isRecord(entry)) {
      const id = stringField(entry, 'applianceId');
      if (id) ids.push(id);
    }
  }
  return ids;
}

/**
 * Maps raw Alexa API JSON into domain entities.
 * Each method returns null when the top-level shape is wrong.
 */
export class AlexaResponseMapper {
  /**
   * `GET /api/behaviors/entities`: an array of `{ id, displayName, description }`
   */
  static mapEntities(raw: unknown): Mapped<AlexaEntity> | null {
    if (!Array.isArray(raw)) return null;
    const entries: unknown[] = raw;

    const result: Mapped<AlexaEntity> = { items: [], skipped: [] };
    for (const item of entries) {
      if (!isRecord(item)) {
        result.skipped.push({ item, reason: 'not an object' });
        continue;
      }
      const missing = ['id', 'displayName', 'description'].filter((key) => stringField(item, key) === undefined);
      if (missing.length > 0) {
        result.skipped.push({ item, reason: `missing keys: ${missing.join(', ')}` });
        continue;
      }
      result.items.push(
        createAlexaEntity({
          id: stringField(item, 'id') ?? '',
          displayName: stringField(item, 'displayName') ?? '',
          description: stringField(item, 'description') ?? '',
        })
      );
    }
    return result;
  }

  /**
   * GraphQL `endpoints` query: `{ data: { endpoints: { items: [...] } } }`
   */
  static mapEndpoints(raw: unknown): Mapped<AlexaEntity> | null {
    if (!isRecord(raw)) return null;
    const data = raw['data'];
    const endpoints = isRecord(data) ? data['endpoints'] : undefined;
    const items = isRecord(endpoints) ? endpoints['items'] : undefined;
    if (!Array.isArray(items)) return null;
    const entries: unknown[] = items;

    const result: Mapped<AlexaEntity> = { items: [], skipped: [] };
    for (const item of entries) {
      const legacy = isRecord(item) ? item['legacyAppliance'] : undefined;
      if (!isRecord(item) || !isRecord(legacy)) {
        result.skipped.push({ item, reason: 'missing legacyAppliance' });
        continue;
      }
      const applianceKey = stringField(legacy, 'applianceKey');
      const applianceId = stringField(legacy, 'applianceId');
      if (!applianceKey && !applianceId) {
        result.skipped.push({ item, reason: 'missing applianceKey and applianceId' });
        continue;
      }
      result.items.push(
        createAlexaEntity({
          id: applianceKey ?? applianceId ?? '',
          displayName: stringField(item, 'friendlyName') ?? stringField(legacy, 'friendlyName') ?? '',
          description: stringField(legacy, 'friendlyDescription') ?? '',
          applianceId,
          manufacturerName: stringField(legacy, 'manufacturerName'),
        })
      );
    }
    return result;
  }

  /**
   * `GET /api/phoenix/group`: `{ applianceGroups: [...] }`
   */
  static mapGroups(raw: unknown): Mapped<ApplianceGroup> | null {
    const groups = isRecord(raw) ? raw['applianceGroups'] : undefined;
    if (!Array.isArray(groups)) return null;
    const entries: unknown[] = groups;

    const result: Mapped<ApplianceGroup> = { items: [], skipped: [] };
    for (const item of entries) {
      if (!isRecord(item)) {
        result.skipped.push({ item, reason: 'not an object' });
        continue;
      }
      const name = stringField(item, 'name');
      const id = stringField(item, 'groupId') ?? stringField(item, 'id');
      if (name === undefined || !id) {
        result.skipped.push({ item, reason: 'missing name or groupId' });
        continue;
      }
      result.items.push({
        id,
        name,
        entityId: stringField(item, 'entityId') ?? '',
        entityType: stringField(item, 'entityType') ?? DEFAULT_ENTITY_TYPE,
        groupType: stringField(item, 'groupType') ?? DEFAULT_GROUP_TYPE,
        childIds: stringList(item['childIds']),
        defaults: unknownList(item['defaults']),
        associatedUnitIds: stringList(item['associatedUnitIds']),
        defaultMetadataByType: recordField(item, 'defaultMetadataByType'),
        implicitTargetingByType: recordField(item, 'implicitTargetingByType'),
        applianceIds: applianceIdList(item['applianceIds']),
      });
    }
    return result;
  }
}
