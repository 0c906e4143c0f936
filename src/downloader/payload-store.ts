import { randomBytes } from 'node:crypto';
import * as fsPromises from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { errorMessage } from '../errors/custom-errors.js';
import type { RequesterId, StoredPayload } from '../types/media.types.js';
import { formatSize } from '../utils/format-utils.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';

/**
 * Files at or below this size are never a valid payload
 */
export const MIN_PAYLOAD_SIZE = 1024;

/**
 * Extensions the engine uses for unfinished downloads
 */
const PARTIAL_EXTENSIONS = ['.part', '.ytdl', '.temp'];

export type StorageUsage = {
  files: number;
  bytes: number;
};

export type PayloadStoreOptions = {
  minSize?: number;
  logger?: Logger;
};

let tokenSequence = 0;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Shared storage directory for fetched media
 *
 * Every request writes files whose names start with its own uniqueness token,
 * so concurrent requests never pick up or delete each other's files.
 */
export class PayloadStore {
  readonly directory: string;
  private readonly minSize: number;
  private readonly logger: Logger;

  constructor(directory: string, options: PayloadStoreOptions = {}) {
    this.directory = resolve(directory);
    this.minSize = options.minSize ?? MIN_PAYLOAD_SIZE;
    this.logger = options.logger ?? defaultLogger.child('storage');
  }

  async ensureDirectory(): Promise<void> {
    await fsPromises.mkdir(this.directory, { recursive: true });
  }

  /**
   * Unique file-name prefix for one request:
   * `dl_<base36 time>_<requester id>_<sequence>_<random hex>`
   */
  createToken(requesterId: RequesterId): string {
    tokenSequence++;
    return `dl_${Date.now().toString(36)}_${requesterId}_${tokenSequence}_${randomBytes(4).toString('hex')}`;
  }

  /**
   * Engine output template for a token; the title is cut to 80 characters
   */
  outputTemplate(token: string): string {
    return join(this.directory, `${token}_%(title).80s.%(ext)s`);
  }

  /**
   * Find the payload a fetch produced for the token
   *
   * The file reported by the engine is checked first, then every other file
   * carrying the token. Files at or below the size threshold are deleted.
   * Once a file is accepted, every other file carrying the token is purged.
   *
   * @returns The accepted payload, or undefined when no file passed
   */
  async discover(token: string, reportedPath?: string): Promise<StoredPayload | undefined> {
    const candidates = await this.listTokenFiles(token, { includePartial: false });
    const reported = reportedPath ? resolve(reportedPath) : undefined;

    if (reported && candidates.includes(reported)) {
      candidates.splice(candidates.indexOf(reported), 1);
      candidates.unshift(reported);
    }

    let accepted: StoredPayload | undefined;

    for (const path of candidates) {
      // biome-ignore lint/performance/noAwaitInLoops: Candidates are checked in priority order
      const size = await this.sizeOf(path);
      if (size === undefined) continue;

      if (size <= this.minSize) {
        this.logger.debug(`Deleting undersized file ${basename(path)} (${size} bytes)`);
        await this.remove(path);
        continue;
      }

      accepted = { path, size, token };
      break;
    }

    if (accepted) {
      await this.purge(token, accepted.path);
      this.logger.debug(`Accepted ${basename(accepted.path)} (${formatSize(accepted.size)})`);
    }

    return accepted;
  }

  /**
   * Size of a payload that is still present and above the threshold
   */
  async verify(path: string): Promise<number | undefined> {
    const size = await this.sizeOf(path);
    return size !== undefined && size > this.minSize ? size : undefined;
  }

  /**
   * Delete every file carrying the token, except `keepPath`
   *
   * @returns Number of deleted files
   */
  async purge(token: string, keepPath?: string): Promise<number> {
    const keep = keepPath ? resolve(keepPath) : undefined;
    const files = await this.listTokenFiles(token, { includePartial: true });
    let deleted = 0;

    for (const path of files) {
      if (path === keep) continue;
      // biome-ignore lint/performance/noAwaitInLoops: Deletions are few and sequential
      if (await this.remove(path)) {
        deleted++;
      }
    }

    if (deleted > 0) {
      this.logger.debug(`Purged ${deleted} file(s) for ${token}`);
    }
    return deleted;
  }

  /**
   * Delete one file; a missing file is not an error
   *
   * @returns Whether a file was deleted
   */
  async remove(path: string): Promise<boolean> {
    try {
      await fsPromises.unlink(path);
      return true;
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warning(`Failed to delete ${path}: ${errorMessage(error)}`);
      }
      return false;
    }
  }

  /**
   * Count and total size of regular files in the storage directory
   */
  async usage(): Promise<StorageUsage> {
    const names = await this.readNames();
    const sizes = await Promise.all(names.map((name) => this.sizeOf(join(this.directory, name))));

    return sizes.reduce<StorageUsage>(
      (usage, size) => (size === undefined ? usage : { files: usage.files + 1, bytes: usage.bytes + size }),
      { files: 0, bytes: 0 },
    );
  }

  private async listTokenFiles(token: string, options: { includePartial: boolean }): Promise<string[]> {
    const prefix = `${token}_`;
    const names = await this.readNames();

    return names
      .filter((name) => name.startsWith(prefix))
      .filter((name) => options.includePartial || !PARTIAL_EXTENSIONS.some((ext) => name.endsWith(ext)))
      .sort()
      .map((name) => join(this.directory, name));
  }

  private async readNames(): Promise<string[]> {
    try {
      return await fsPromises.readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }

  private async sizeOf(path: string): Promise<number | undefined> {
    try {
      const stats = await fsPromises.stat(path);
      return stats.isFile() ? stats.size : undefined;
    } catch {
      return undefined;
    }
  }
}
