import { normalizeMediaUrl } from '../utils/url-validator.js';
import type { MediaType, QualityProfile } from './media-type.js';

/**
 * Chat identity of whoever sent the request
 */
export type RequesterId = number;

/**
 * Media type + quality tier picked from the menu
 */
export type Profile = {
  mediaType: MediaType;
  quality: QualityProfile;
};

/**
 * Immutable description of one accepted request
 */
export type RequestContext = Readonly<
  Profile & {
    requesterId: RequesterId;
    /** Canonical URL (scheme added, fragment removed) */
    url: string;
  }
>;

/**
 * Metadata returned by the engine's pre-flight probe
 */
export type MediaMetadata = {
  title: string;
  duration?: number;
  uploader?: string;
  webpageUrl?: string;
};

/**
 * Verified file in the shared storage area
 */
export type StoredPayload = {
  path: string;
  size: number;
  /** Uniqueness token embedded in the file name */
  token: string;
};

/**
 * Build a frozen request context from a raw URL
 *
 * @throws Error if the URL does not parse
 */
export function createRequestContext(requesterId: RequesterId, rawUrl: string, profile: Profile): RequestContext {
  return Object.freeze({
    requesterId,
    url: normalizeMediaUrl(rawUrl),
    mediaType: profile.mediaType,
    quality: profile.quality,
  });
}
