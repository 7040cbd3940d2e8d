/**
 * String manipulation utilities.
 */

/**
 * Convert a camelCase or PascalCase identifier to kebab-case.
 *
 * @example toKebabCase('dryRun') // 'dry-run'
 * @example toKebabCase('maxHTTPRetries') // 'max-http-retries'
 */
export function toKebabCase(identifier: string): string {
  return identifier
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1-$2')
    .replace(/_/g, '-')
    .toLowerCase();
}
