/**
 * Home Assistant areas keyed by area name, each with its entity ids in registry order
 */
export type HaAreaMap = Record<string, string[]>;

/**
 * Result of matching Home Assistant entity ids against the Alexa directory for one run
 */
export interface CrossReference {
  /** Area name → matched Alexa appliance ids, in the area's entity order */
  appliances: Record<string, string[]>;
  /** Area name → Home Assistant ids with no exact match (only areas with misses appear) */
  unmatched: Record<string, string[]>;
}
