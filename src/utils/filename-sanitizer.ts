export const MAX_TITLE_LENGTH = 100;
export const FALLBACK_TITLE = 'media_file';

/**
 * Make a media title safe for file names and captions
 *
 * Drops characters Windows rejects, control characters and trailing dots,
 * collapses whitespace and caps the length. An empty result becomes "media_file".
 */
export function sanitizeFilename(name: string | null | undefined): string {
  if (!name) {
    return FALLBACK_TITLE;
  }

  const cleaned = name
    // Windows illegal characters: < > : " / \ | ? *
    .replace(/[<>:"/\\|?*]/g, '')
    // biome-ignore lint/suspicious/noControlCharactersInRegex: Needed to strip control characters
    .replace(/[\x00-\x1F]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_TITLE_LENGTH)
    .replace(/[\s.]+$/, '');

  return cleaned || FALLBACK_TITLE;
}
