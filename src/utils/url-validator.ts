/**
 * Platform domains the bot accepts. Matched as substrings of the lower-cased host,
 * so subdomains like m.youtube.com or vm.tiktok.com pass too.
 */
export const SUPPORTED_DOMAINS = [
  'youtube.com',
  'youtu.be',
  'music.youtube.com',
  'instagram.com',
  'facebook.com',
  'fb.watch',
  'tiktok.com',
  'vm.tiktok.com',
  'twitter.com',
  'x.com',
  'soundcloud.com',
  'vimeo.com',
  'dailymotion.com',
] as const;

/**
 * Human-readable platform list for instructions and rejection messages
 */
export const SUPPORTED_PLATFORMS = [
  'YouTube',
  'Instagram',
  'TikTok',
  'Facebook',
  'Twitter/X',
  'SoundCloud',
  'Vimeo',
  'DailyMotion',
] as const;

/**
 * Prefix https:// when the input has no http(s) scheme
 */
function withScheme(raw: string): string {
  return /^https?:\/\//i.test(raw) ? raw : `https://${raw}`;
}

/**
 * Check whether a raw string points at a supported platform
 *
 * Never throws: anything that does not parse as a URL is unsupported.
 *
 * @example
 * ```ts
 * isSupportedUrl('youtu.be/abc'); // true
 * isSupportedUrl('example.com/video'); // false
 * ```
 */
export function isSupportedUrl(raw: string): boolean {
  try {
    const trimmed = raw.trim();
    if (!trimmed) return false;

    const host = new URL(withScheme(trimmed)).hostname.toLowerCase();
    return SUPPORTED_DOMAINS.some((domain) => host.includes(domain));
  } catch {
    return false;
  }
}

/**
 * Canonical form of a media URL: scheme added, fragment dropped
 *
 * @throws Error if the input does not parse as a URL
 */
export function normalizeMediaUrl(raw: string): string {
  try {
    const url = new URL(withScheme(raw.trim()));
    url.hash = '';
    return url.toString();
  } catch {
    throw new Error(`Invalid URL: "${raw}"`);
  }
}
