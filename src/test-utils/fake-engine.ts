import { writeFile } from 'node:fs/promises';
import type { FetchResult, FormatDirective, MediaEngine, SearchEntry } from '../engine/types.js';
import type { MediaMetadata } from '../types/media.types.js';

export type FakeFile = {
  size: number;
  /** Extension written in place of %(ext)s (default: "mp4") */
  ext?: string;
  /** Written next to the output with this suffix, e.g. ".part" */
  suffix?: string;
};

/**
 * Scripted outcome of one fetch call
 */
export type FetchStep = {
  files?: FakeFile[];
  error?: Error;
  /** Report the first file as the engine's output (default: true) */
  report?: boolean;
};

export type FetchCall = { url: string; directive: FormatDirective; outputTemplate: string };

const DEFAULT_STEP: FetchStep = { files: [{ size: 4096 }] };

/**
 * In-process MediaEngine writing deterministic files into the output template
 */
export class FakeEngine implements MediaEngine {
  metadata: MediaMetadata = { title: 'Test Clip', duration: 125, uploader: 'Tester' };
  probeError?: Error;
  /** Probe waits for this promise, keeping a request in flight */
  holdProbe?: Promise<void>;
  searchResults: SearchEntry[] = [];
  searchError?: Error;

  readonly probeCalls: string[] = [];
  readonly fetchCalls: FetchCall[] = [];
  readonly searchCalls: Array<{ query: string; limit: number }> = [];

  private readonly steps: FetchStep[] = [];

  /** Queue fetch outcomes; once used up every fetch behaves like the default step */
  script(...steps: FetchStep[]): this {
    this.steps.push(...steps);
    return this;
  }

  async probe(url: string): Promise<MediaMetadata> {
    this.probeCalls.push(url);
    if (this.holdProbe) {
      await this.holdProbe;
    }
    if (this.probeError) {
      throw this.probeError;
    }
    return this.metadata;
  }

  async fetch(
    url: string,
    directive: FormatDirective,
    outputTemplate: string,
    onProgress?: (progress: string) => void,
  ): Promise<FetchResult> {
    this.fetchCalls.push({ url, directive, outputTemplate });
    const step = this.steps.shift() ?? DEFAULT_STEP;

    const written: string[] = [];
    for (const file of step.files ?? []) {
      const path = `${this.render(outputTemplate, file.ext ?? 'mp4')}${file.suffix ?? ''}`;
      // biome-ignore lint/performance/noAwaitInLoops: Files are written in order
      await writeFile(path, Buffer.alloc(file.size, 7));
      written.push(path);
    }

    onProgress?.('50.0% of 4.00KiB at 1.00MiB/s ETA 00:00');
    onProgress?.('100.0% of 4.00KiB at 1.00MiB/s ETA 00:00');

    if (step.error) {
      throw step.error;
    }

    return { filename: step.report === false ? undefined : written[0] };
  }

  async search(query: string, limit: number): Promise<SearchEntry[]> {
    this.searchCalls.push({ query, limit });
    if (this.searchError) {
      throw this.searchError;
    }
    return this.searchResults.slice(0, limit);
  }

  private render(template: string, ext: string): string {
    return template.replace('%(title).80s', this.metadata.title.slice(0, 80)).replace('%(ext)s', ext);
  }
}
