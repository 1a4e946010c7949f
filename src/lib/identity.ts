/**
 * Identity and naming helpers
 *
 * The identity key is the only equality used for deduplication across scans.
 */

/**
 * Normalized identity of a change: trimmed, lower-cased `source:title`
 *
 * @example
 * ```ts
 * identityKey('Homebrew', ' JQ ') // 'homebrew:jq'
 * ```
 */
export function identityKey(source: string, title: string): string {
  return `${source.trim().toLowerCase()}:${title.trim().toLowerCase()}`
}

/**
 * Filesystem-safe slug: lowercase ASCII alphanumerics, other runs become '-'
 */
export function slugify(input: string): string {
  return input
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
}

/**
 * Slug that is never empty, for use as a path segment
 */
export function safeSegment(input: string, fallback: string = 'unknown'): string {
  return slugify(input) || fallback
}

/**
 * Trim, lower-case, drop empties, deduplicate and sort tags
 */
export function normalizeTags(tags: readonly string[] | undefined): string[] {
  if (!tags) return []
  const set = new Set<string>()
  for (const tag of tags) {
    const normalized = tag.trim().toLowerCase()
    if (normalized) set.add(normalized)
  }
  return [...set].sort()
}

/**
 * Split a comma-separated tag argument
 */
export function parseTagList(value: string | undefined): string[] {
  if (!value) return []
  return normalizeTags(value.split(','))
}

/**
 * Order changes by source then title, independent of arrival order
 */
export function compareBySourceTitle(
  a: { source: string; title: string },
  b: { source: string; title: string }
): number {
  const bySource = a.source.localeCompare(b.source)
  if (bySource !== 0) return bySource
  return a.title.localeCompare(b.title)
}
