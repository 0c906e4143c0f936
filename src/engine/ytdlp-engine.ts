import { execa } from 'execa';
import { z } from 'zod';
import { errorMessage } from '../errors/custom-errors.js';
import type { MediaMetadata } from '../types/media.types.js';
import { sanitizeFilename } from '../utils/filename-sanitizer.js';
import { classifyEngineFailure } from './engine-errors.js';
import type { FetchResult, FormatDirective, MediaEngine, SearchEntry } from './types.js';

/**
 * A started command: its merged stdout/stderr lines and its completion
 */
export type RunningCommand = {
  lines: AsyncIterable<string>;
  wait(): Promise<{ stdout: string }>;
};

export type CommandRunner = (file: string, args: string[]) => RunningCommand;

/**
 * Default runner on top of execa
 */
export const execaRunner: CommandRunner = (file, args) => {
  const subprocess = execa(file, args, { all: true });
  return {
    lines: subprocess.iterable({ from: 'all' }),
    wait: async () => {
      const result = await subprocess;
      return { stdout: result.stdout };
    },
  };
};

export type YtdlpEngineOptions = {
  /** yt-dlp executable (default: "yt-dlp") */
  binary?: string;
  /** Path to cookie file (Netscape format) */
  cookieFile?: string;
  /** Socket timeout in seconds */
  socketTimeout?: number;
  /** Additional yt-dlp CLI arguments appended to every call */
  extraArgs?: string[];
  /** Callback for engine log lines */
  onLog?: (message: string) => void;
  runner?: CommandRunner;
};

const ProbeSchema = z.object({
  title: z.string().nullish(),
  duration: z.number().nullish(),
  uploader: z.string().nullish(),
  channel: z.string().nullish(),
  webpage_url: z.string().nullish(),
});

const SearchEntrySchema = z.object({
  id: z.string().nullish(),
  url: z.string().nullish(),
  title: z.string().nullish(),
  duration: z.number().nullish(),
  uploader: z.string().nullish(),
  channel: z.string().nullish(),
});

const SearchResultSchema = z.object({
  entries: z.array(SearchEntrySchema.nullable()).nullish(),
});

const PROGRESS_PATTERN = /\[download\]\s+(\d+\.?\d*)%\s+of\s+~?\s*([\d.]+\w+)\s+at\s+~?\s*([\d.]+\w+\/s)\s+ETA\s+(\S+)/;

const OUTPUT_PATTERNS = [
  /\[download\] Destination:\s*(.+)/,
  /\[ExtractAudio\] Destination:\s*(.+)/,
  /\[merge\] Merging formats into "(.*)"/,
  /\[download\]\s+(.+) has already been downloaded/,
];

/**
 * MediaEngine backed by the yt-dlp CLI
 */
export class YtdlpEngine implements MediaEngine {
  private readonly binary: string;
  private readonly runner: CommandRunner;
  private readonly baseArgs: string[];
  private readonly onLog?: (message: string) => void;

  constructor(options: YtdlpEngineOptions = {}) {
    this.binary = options.binary ?? 'yt-dlp';
    this.runner = options.runner ?? execaRunner;
    this.onLog = options.onLog;

    this.baseArgs = [
      '--no-warnings',
      '--no-playlist',
      '--socket-timeout',
      String(options.socketTimeout ?? 60),
      '--force-ipv4',
      ...(options.cookieFile ? ['--cookies', options.cookieFile] : []),
      ...(options.extraArgs ?? []),
    ];
  }

  async probe(url: string): Promise<MediaMetadata> {
    const stdout = await this.runJson([...this.baseArgs, '--dump-single-json', '--skip-download', url], url);
    const info = ProbeSchema.parse(JSON.parse(stdout));

    return {
      title: sanitizeFilename(info.title),
      duration: info.duration ?? undefined,
      uploader: info.uploader ?? info.channel ?? undefined,
      webpageUrl: info.webpage_url ?? undefined,
    };
  }

  async fetch(
    url: string,
    directive: FormatDirective,
    outputTemplate: string,
    onProgress?: (progress: string) => void,
  ): Promise<FetchResult> {
    const args = [
      ...this.baseArgs,
      '--newline',
      '--no-mtime',
      '--retries',
      '20',
      '--fragment-retries',
      '20',
      '-o',
      outputTemplate,
      ...directive.args,
      url,
    ];

    let filename: string | undefined;
    const outputBuffer: string[] = [];

    const consume = async (lines: AsyncIterable<string>): Promise<void> => {
      for await (const line of lines) {
        const text = line.trim();
        if (!text) continue;

        outputBuffer.push(text);

        for (const pattern of OUTPUT_PATTERNS) {
          const match = text.match(pattern);
          if (match?.[1]) {
            filename = match[1];
          }
        }

        const progressMatch = text.match(PROGRESS_PATTERN);
        if (progressMatch) {
          const [, percentage, totalSize, speed, eta] = progressMatch;
          onProgress?.(`${percentage}% of ${totalSize} at ${speed} ETA ${eta}`);
          continue;
        }

        this.onLog?.(text);
      }
    };

    try {
      const command = this.runner(this.binary, args);
      await Promise.all([consume(command.lines), command.wait()]);
      return { filename };
    } catch (error) {
      throw classifyEngineFailure(`${errorMessage(error)}\n${outputBuffer.join('\n')}`, url);
    }
  }

  async search(query: string, limit: number): Promise<SearchEntry[]> {
    const target = `ytsearch${limit}:${query}`;
    const stdout = await this.runJson(
      ['--no-warnings', '--flat-playlist', '--dump-single-json', '--socket-timeout', '15', target],
      target,
    );
    const result = SearchResultSchema.parse(JSON.parse(stdout));

    const entries: SearchEntry[] = [];
    for (const entry of result.entries ?? []) {
      if (!entry) continue;

      const url = entry.url ?? (entry.id ? `https://www.youtube.com/watch?v=${entry.id}` : undefined);
      if (!url) continue;

      entries.push({
        title: entry.title ?? 'Unknown Title',
        url,
        duration: entry.duration ?? undefined,
        uploader: entry.uploader ?? entry.channel ?? undefined,
      });
    }
    return entries;
  }

  /**
   * Run a metadata-only command and return its stdout
   */
  private async runJson(args: string[], url: string): Promise<string> {
    try {
      const { stdout } = await this.runner(this.binary, args).wait();
      return stdout;
    } catch (error) {
      throw classifyEngineFailure(errorMessage(error), url);
    }
  }

  /**
   * Check if yt-dlp is installed
   */
  static async checkInstalled(binary = 'yt-dlp'): Promise<boolean> {
    try {
      await execa(binary, ['--version']);
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Check if ffmpeg is installed (enables audio transcoding)
 */
export async function checkFfmpegInstalled(): Promise<boolean> {
  try {
    await execa('ffmpeg', ['-version']);
    return true;
  } catch {
    return false;
  }
}
