import { MediaType, QualityProfile } from '../types/media-type.js';
import type { Profile } from '../types/media.types.js';
import type { FormatDirective } from './types.js';

function format(label: string, selector: string, ...extra: string[]): FormatDirective {
  return { label, args: ['-f', selector, ...extra] };
}

const VIDEO_DIRECTIVES: Record<QualityProfile, FormatDirective[]> = {
  [QualityProfile.FAST]: [
    format('fast ≤480p', 'best[height<=480]/best[height<=360]/worst'),
    format('fast worst', 'worst'),
  ],
  [QualityProfile.BEST]: [
    format('best ≤720p', 'best[height<=720]/best[height<=480]/best'),
    format('best ≤480p', 'best[height<=480]/worst'),
  ],
  [QualityProfile.HD]: [
    format('hd ≤1080p', 'best[height<=1080]/best[height<=720]/best'),
    format('hd ≤720p', 'best[height<=720]/best'),
  ],
};

/**
 * Ordered format directives for a profile
 *
 * The first entry is the preferred one; later entries are alternates tried after
 * the source blocks a request. Audio is transcoded to mp3 when ffmpeg is present,
 * otherwise an m4a track is requested as is.
 */
export function getFormatDirectives(profile: Profile, canTranscode: boolean): FormatDirective[] {
  if (profile.mediaType === MediaType.AUDIO) {
    const primary = canTranscode
      ? format(
          'audio mp3',
          'bestaudio/best',
          '--extract-audio',
          '--audio-format',
          'mp3',
          '--audio-quality',
          '192K',
          '--embed-metadata',
        )
      : format('audio m4a', 'bestaudio[ext=m4a]/bestaudio/best');

    return [primary, format('audio any', 'bestaudio/best')];
  }

  return VIDEO_DIRECTIVES[profile.quality];
}

/**
 * Directive for the given attempt variant, sticking to the last one once exhausted
 */
export function pickDirective(directives: FormatDirective[], variant: number): FormatDirective {
  const directive = directives[Math.min(variant, directives.length - 1)];
  if (!directive) {
    throw new Error('No format directives configured');
  }
  return directive;
}
