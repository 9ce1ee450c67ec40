import type { AlexaEntity } from '../../domain/entities/AlexaEntity.js';
import type { CrossReference, HaAreaMap } from '../../domain/entities/Area.js';
import { normalizeApplianceId, normalizeHaEntityId } from '../../domain/entities/Identifiers.js';

/**
 * Maps Home Assistant areas onto Alexa appliance ids
 */
export class AreaMapper {
  /**
   * Normalized appliance id → original appliance id.
   * Entries without an appliance id cannot be grouped and are left out.
   */
  static indexAppliances(directory: readonly AlexaEntity[]): Map<string, string> {
    const index = new Map<string, string>();
    for (const entity of directory) {
      if (!entity.applianceId) continue;
      const key = normalizeApplianceId(entity.applianceId);
      if (!index.has(key)) {
        index.set(key, entity.applianceId);
      }
    }
    return index;
  }

  /**
   * Exact matches only: `sensor.lamp` never matches `sensor.lamp2`.
   * Every area appears in `appliances` (possibly empty); only areas with misses appear in `unmatched`.
   */
  static matchAreasToAppliances(areas: HaAreaMap, directory: readonly AlexaEntity[]): CrossReference {
    const index = AreaMapper.indexAppliances(directory);
    const appliances: Record<string, string[]> = {};
    const unmatched: Record<string, string[]> = {};

    for (const [area, entityIds] of Object.entries(areas)) {
      const matched: string[] = [];
      const missed: string[] = [];

      for (const entityId of entityIds) {
        const applianceId = index.get(normalizeHaEntityId(entityId));
        if (applianceId === undefined) {
          missed.push(entityId);
        } else {
          matched.push(applianceId);
        }
      }

      appliances[area] = matched;
      if (missed.length > 0) {
        unmatched[area] = missed;
      }
    }

    return { appliances, unmatched };
  }
}
