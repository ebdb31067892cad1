/**
 * Glob pattern translation
 * @module services/cache-engine/utils/glob
 */

const REGEX_SPECIAL_CHARS = /[.+^${}()|[\]\\]/g;

/**
 * Translate a glob into an anchored regular expression.
 * `*` matches any run of characters, `?` exactly one; everything else is literal.
 */
export function toGlobRegExp(pattern: string, flags = 'i'): RegExp {
  const source = pattern
    .replace(REGEX_SPECIAL_CHARS, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');

  return new RegExp(`^${source}$`, flags);
}
