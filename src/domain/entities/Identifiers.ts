/**
 * Canonical forms for identifiers coming from the two directories.
 *
 * Alexa appliance ids look like `<skill-prefix>==_sensor#soil_temp`, Home Assistant
 * entity ids look like `sensor.soil_temp`; both normalize to `sensor.soil_temp`.
 * Every normalizer here is idempotent.
 */

const SKILL_PREFIX_SEPARATOR = '==_';
const AREA_SEPARATOR = '_';

/**
 * Strip the skill prefix (up to and including the last `==_`) and turn `#` into `.`
 */
export function normalizeApplianceId(applianceId: string): string {
  const separatorIndex = applianceId.lastIndexOf(SKILL_PREFIX_SEPARATOR);
  const unprefixed =
    separatorIndex >= 0 ? applianceId.slice(separatorIndex + SKILL_PREFIX_SEPARATOR.length) : applianceId;
  return unprefixed.replace(/#/g, '.').toLowerCase();
}

/**
 * Home Assistant ids only ever differ by case
 */
export function normalizeHaEntityId(entityId: string): string {
  return entityId.toLowerCase();
}

/**
 * `Living Room`, `living_room` and ` LIVING  room ` all become `living_room`
 */
export function normalizeAreaName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_]+/g, AREA_SEPARATOR);
}

/**
 * Inverse of {@link normalizeAreaName} for plain ASCII words: `living_room` → `Living Room`.
 * Mixed-case words (`TV`) come back as `Tv`.
 */
export function prettifyAreaName(name: string): string {
  return name
    .split(/[\s_]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Descriptions written by the Home Assistant skill read `sensor.soil_temp via Home Assistant`
 */
export function haEntityIdFromDescription(description: string): string {
  const viaIndex = description.search(/\s+via\s+/i);
  const head = viaIndex >= 0 ? description.slice(0, viaIndex) : description;
  return normalizeHaEntityId(head.trim());
}

/**
 * Path segment used by the appliance delete endpoint (`sensor%23soil_temp`)
 */
export function toDeleteId(haEntityId: string): string {
  return haEntityId.replace(/\./g, '%23');
}
