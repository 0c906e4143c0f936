import type { MediaMetadata } from '../types/media.types.js';

/**
 * Format/quality selection handed to the engine for one fetch
 */
export type FormatDirective = {
  /** Short label for logs, e.g. "best≤720p" */
  label: string;
  /** Engine arguments selecting format and post-processing */
  args: string[];
};

export type FetchResult = {
  /** File the engine reports as its final output, if it reported one */
  filename?: string;
};

/**
 * One flat search hit
 */
export type SearchEntry = {
  title: string;
  url: string;
  duration?: number;
  uploader?: string;
};

/**
 * External extraction/download engine
 *
 * Implementations throw AccessDeniedError for private/unavailable/forbidden
 * content and TransientFetchError for everything that may succeed on retry.
 */
export type MediaEngine = {
  /** Metadata only, nothing is downloaded */
  probe(url: string): Promise<MediaMetadata>;

  /**
   * Download the media, writing file(s) according to the output template
   * @param outputTemplate - Path template with %(title)s / %(ext)s placeholders
   * @param onProgress - Called for each transfer progress line
   */
  fetch(
    url: string,
    directive: FormatDirective,
    outputTemplate: string,
    onProgress?: (progress: string) => void,
  ): Promise<FetchResult>;

  search(query: string, limit: number): Promise<SearchEntry[]>;
};
