import type { MediaMetadata } from '../types/media.types.js';
import { escapeHtml, formatMediaDuration, formatSize } from '../utils/format-utils.js';

/**
 * HTML caption sent with a delivered file
 *
 * @example
 * ```ts
 * buildCaption({ title: 'Clip', uploader: 'Someone', duration: 75 }, 5000);
 * // ✅ <b>Download Complete!</b>
 * //
 * // 🎬 <b>Title:</b> Clip
 * // 👤 <b>Uploader:</b> Someone
 * // ⏱️ <b>Duration:</b> 1:15
 * // 📊 <b>Size:</b> 4.9 KB
 * ```
 */
export function buildCaption(metadata: MediaMetadata, size: number): string {
  return [
    '✅ <b>Download Complete!</b>',
    '',
    `🎬 <b>Title:</b> ${escapeHtml(metadata.title)}`,
    `👤 <b>Uploader:</b> ${escapeHtml(metadata.uploader ?? 'Unknown')}`,
    `⏱️ <b>Duration:</b> ${formatMediaDuration(metadata.duration)}`,
    `📊 <b>Size:</b> ${formatSize(size)}`,
  ].join('\n');
}
