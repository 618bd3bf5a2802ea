/**
 * Name-to-prose heuristic for brief descriptions
 *
 * `getValue` -> "Gets the value", `set_value` -> "Sets the value",
 * `customFunc` -> "Custom func".
 *
 * @since 2026-10-19
 */

/**
 * Verb prefixes, checked in order against the lowercased name; the first
 * match wins and the rest of the name follows the phrase.
 */
const BRIEF_PREFIXES: ReadonlyArray<readonly [string, string]> = [
  ['get', 'Gets the'],
  ['set', 'Sets the'],
  ['is', 'Checks if'],
  ['has', 'Checks if has'],
  ['create', 'Creates a new'],
  ['init', 'Initializes the'],
  ['update', 'Updates the'],
  ['delete', 'Deletes the'],
  ['remove', 'Removes the'],
  ['add', 'Adds a new'],
  ['find', 'Finds the'],
  ['calculate', 'Calculates the'],
  ['compute', 'Computes the'],
];

/**
 * Split camelCase and snake_case into lowercase words
 */
export function splitIdentifier(name: string): string {
  return name
    .replace(/([A-Z])/g, ' $1')
    .replace(/_/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

export function humanizeName(name: string): string {
  const lower = name.toLowerCase();

  for (const [prefix, phrase] of BRIEF_PREFIXES) {
    if (lower.startsWith(prefix)) {
      const remainder = splitIdentifier(name.slice(prefix.length));
      return remainder ? `${phrase} ${remainder}` : phrase;
    }
  }

  const readable = splitIdentifier(name);
  return readable.charAt(0).toUpperCase() + readable.slice(1);
}
