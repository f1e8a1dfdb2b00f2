/** Every run of capitals gets an underscore in front of it. */
const CAPITAL_RUNS = /([A-Z]+)/g;

/**
 * Converts a camelCased or UpperCased wire name into its snake_cased alias.
 *
 * @example
 * toSnake('firstName'); // 'first_name'
 * toSnake('vanID'); // 'van_id'
 */
export function toSnake(name: string): string {
  if (!name) {
    return name;
  }

  return name[0].toLowerCase() + name.slice(1).replace(CAPITAL_RUNS, '_$1').toLowerCase();
}

/**
 * Prepends a prefix to a camelCased name, capitalizing the name's first letter.
 *
 * @example
 * prefixName('van', 'id'); // 'vanId'
 */
export function prefixName(prefix: string, name: string): string {
  if (!name) {
    return prefix;
  }

  return prefix + name[0].toUpperCase() + name.slice(1);
}
