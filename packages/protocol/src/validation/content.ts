// Content format checks
//
// Pure predicates over page payloads. The runtime calls these before it
// accepts new content or a new thumbnail; it never inspects the payload
// any further.

/**
 * Markers and prefixes an accepted payload must carry.
 */
export type ContentFormatRules = {
  /** Content must start with this marker (after leading whitespace) */
  contentPrefix: string;
  /** Content must end with this marker (before trailing whitespace) */
  contentSuffix: string;
  /** Thumbnails must start with one of these */
  thumbnailPrefixes: readonly string[];
};

export const DEFAULT_CONTENT_FORMAT: ContentFormatRules = {
  contentPrefix: '<html>',
  contentSuffix: '</html>',
  thumbnailPrefixes: ['https://', 'ipfs://', 'ar://', 'data:image/'],
};

/**
 * Predicate pair the runtime consults.
 */
export type ContentValidator = {
  content(value: string): boolean;
  thumbnail(value: string): boolean;
};

export function isValidContent(
  value: string,
  rules: ContentFormatRules = DEFAULT_CONTENT_FORMAT
): boolean {
  const trimmed = value.trim();
  if (trimmed.length < rules.contentPrefix.length + rules.contentSuffix.length) {
    return false;
  }
  return trimmed.startsWith(rules.contentPrefix) && trimmed.endsWith(rules.contentSuffix);
}

export function isValidThumbnail(
  value: string,
  rules: ContentFormatRules = DEFAULT_CONTENT_FORMAT
): boolean {
  return rules.thumbnailPrefixes.some(
    (prefix) => value.startsWith(prefix) && value.length > prefix.length
  );
}

/**
 * Build a validator from format rules.
 *
 * @example
 * ```typescript
 * const validator = createContentValidator({
 *   ...DEFAULT_CONTENT_FORMAT,
 *   thumbnailPrefixes: ['https://'],
 * });
 * validator.thumbnail('ipfs://cid'); // false
 * ```
 */
export function createContentValidator(
  rules: ContentFormatRules = DEFAULT_CONTENT_FORMAT
): ContentValidator {
  return {
    content: (value) => isValidContent(value, rules),
    thumbnail: (value) => isValidThumbnail(value, rules),
  };
}
