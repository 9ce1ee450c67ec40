/**
 * Parse the object literal that the Home Assistant area template renders.
 *
 * The template emits `"area":[...], "other":[...],` (a trailing comma and no
 * enclosing braces), so both are repaired before handing the text to JSON.parse.
 * Throws a SyntaxError when the repaired text is still not JSON.
 */
export function parseLenientJsonObject(text: string): unknown {
  let repaired = text.trim();
  if (repaired.endsWith(',')) {
    repaired = repaired.slice(0, -1).trimEnd();
  }
  if (!(repaired.startsWith('{') && repaired.endsWith('}'))) {
    repaired = `{${repaired}}`;
  }
  return JSON.parse(repaired);
}
