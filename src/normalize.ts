/**
 * Decoration that YouTube uploaders add to titles and that only hurts catalog matching.
 * Applied in order, case-insensitively.
 */
const DECORATION_PATTERNS: readonly RegExp[] = [
  /\(Official.*?\)/gi,
  /\[Official.*?\]/gi,
  /\(Audio\)/gi,
  /\[Audio\]/gi,
  /\(Lyric.*?\)/gi,
  /\[Lyric.*?\]/gi,
  /\(.*?Video\)/gi,
  /\[.*?Video\]/gi,
  /[([]\s*(?:HD|HQ|4K)\s*[)\]]/gi,
  /\bHD\b/gi,
  /\bHQ\b/gi,
  /\b4K\b/gi,
  /\(\s*\)|\[\s*\]/g,
  /\|.*$/g,
];

const applyOnce = (title: string): string => {
  let cleaned = title;
  for (const pattern of DECORATION_PATTERNS) {
    cleaned = cleaned.replace(pattern, '');
  }
  return cleaned
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/\s*-\s*$/u, '');
};

/**
 * Strips video decoration ("(Official Video)", "[HD]", "| Label", ...) from a title so it
 * can be used as a catalog query. Retained text keeps its case.
 *
 * Runs until the title stops changing: removing one token can expose another
 * (`"(Off(Audio)icial)"`, `"Song - -"`), and the result must be a fixed point.
 */
export const normalizeTitle = (title: string): string => {
  let current = title;
  for (;;) {
    const next = applyOnce(current);
    if (next === current) {
      return next;
    }
    current = next;
  }
};

/**
 * Query sent to the catalog: the normalized title, or the trimmed raw title if
 * normalization removed everything.
 */
export const buildSearchQuery = (title: string): string => normalizeTitle(title) || title.trim();
