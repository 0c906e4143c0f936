import type { MediaEngine, SearchEntry } from '../engine/types.js';
import { SearchError } from '../errors/custom-errors.js';
import type { Notifier } from '../notifications/notifier.js';
import { NotificationLevel } from '../notifications/notifier.js';
import type { RequestPipeline, SentOutcome } from '../pipeline/request-pipeline.js';
import { MediaType, QualityProfile } from '../types/media-type.js';
import type { RequesterId } from '../types/media.types.js';
import { createRequestContext } from '../types/media.types.js';
import { escapeHtml, formatMediaDuration } from '../utils/format-utils.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';

/**
 * Search hit that passed the duration filter
 */
export type SearchCandidate = SearchEntry & { duration: number };

export const SEARCH_RESULT_LIMIT = 3;
/** Anything this long or longer is not a song */
export const MAX_CANDIDATE_DURATION = 1800;

function isCandidate(entry: SearchEntry): entry is SearchCandidate {
  return entry.duration !== undefined && entry.duration < MAX_CANDIDATE_DURATION;
}

/**
 * Numbered result list shown before the first hit is downloaded
 */
export function formatCandidates(candidates: SearchCandidate[]): string {
  const lines = candidates.map(
    (candidate, index) => `${index + 1}. ${escapeHtml(candidate.title)}\n   ⏱️ ${formatMediaDuration(candidate.duration)}`,
  );
  return `<b>Top Results:</b>\n\n${lines.join('\n\n')}\n\n⬇️ <b>Downloading first result...</b>`;
}

/**
 * Music search on top of the engine's flat search
 */
export class SearchAdapter {
  private readonly logger: Logger;

  constructor(
    private readonly engine: MediaEngine,
    private readonly pipeline: RequestPipeline,
    logger?: Logger,
  ) {
    this.logger = logger ?? defaultLogger.child('search');
  }

  /**
   * Ranked candidates for a free-text query
   *
   * @throws SearchError if no entry with a known duration under 30 minutes came back
   */
  async search(query: string): Promise<SearchCandidate[]> {
    const entries = await this.engine.search(query, SEARCH_RESULT_LIMIT);
    const candidates = entries.filter(isCandidate);

    this.logger.debug(`"${query}": ${entries.length} result(s), ${candidates.length} usable`);

    if (candidates.length === 0) {
      throw new SearchError(`No results found for "${query}"`, query);
    }
    return candidates;
  }

  /**
   * Show the ranked list to the requester, then fetch the first hit as audio
   */
  async searchAndFetch(requesterId: RequesterId, query: string, notifier: Notifier): Promise<SentOutcome> {
    await notifier.notify(NotificationLevel.INFO, `<b>Searching for:</b> <code>${escapeHtml(query)}</code>`);

    const candidates = await this.search(query);
    await notifier.notify(NotificationLevel.HIGHLIGHT, formatCandidates(candidates));

    const [first] = candidates;
    if (!first) {
      throw new SearchError(`No results found for "${query}"`, query);
    }

    const ctx = createRequestContext(requesterId, first.url, {
      mediaType: MediaType.AUDIO,
      quality: QualityProfile.BEST,
    });
    return this.pipeline.run(ctx, notifier);
  }
}
