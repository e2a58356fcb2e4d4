/**
 * Fetch-and-cache for remote OWNERS files
 *
 * getOrFetch returns the cached content for a key, fetching and storing it
 * on first use. An unreachable file is cached as missing (null) so it is
 * not requested again. There is no time-based invalidation: a fresh work
 * directory forces a full reload.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ReportLogger } from './types.js';
import { MalformedDataError, errorMessage } from './errors.js';

/**
 * Retrieves a remote file; null when it does not exist or cannot be reached
 */
export type Fetcher = (uri: string) => Promise<string | null>;

export interface RemoteFileCache {
  getOrFetch(key: string, uri: string): Promise<string | null>;
}

/**
 * Fetcher over HTTP(S) using the global fetch
 *
 * Tabs are replaced with spaces; some OWNERS files indent with them, which
 * YAML rejects.
 */
export function createHttpFetcher(log: ReportLogger): Fetcher {
  return async (uri: string) => {
    try {
      const response = await fetch(uri);
      if (!response.ok) {
        log.verbose(`${uri}: HTTP ${response.status}`);
        return null;
      }
      const text = await response.text();
      return text.replace(/\t/g, ' ');
    } catch (error) {
      log.warn(`Failed to fetch ${uri}: ${errorMessage(error)}`);
      return null;
    }
  };
}

/**
 * Cache stored as plain files below a work directory
 *
 * key org/repo/OWNERS -> <workdir>/org/repo/OWNERS
 * missing files leave a <file>.missing marker
 */
export class DirectoryFileCache implements RemoteFileCache {
  private readonly root: string;

  constructor(
    workdir: string,
    private readonly fetcher: Fetcher,
    private readonly log?: ReportLogger
  ) {
    this.root = path.resolve(workdir);
  }

  private fileFor(key: string): string {
    const resolved = path.resolve(this.root, key);
    if (!resolved.startsWith(this.root + path.sep)) {
      throw new MalformedDataError(key, 'cache key escapes the work directory');
    }
    return resolved;
  }

  async getOrFetch(key: string, uri: string): Promise<string | null> {
    const file = this.fileFor(key);
    const marker = `${file}.missing`;
    this.log?.verbose(`local: ${file}, remote: ${uri}`);

    if (fs.existsSync(file)) {
      return fs.readFileSync(file, 'utf-8');
    }
    if (fs.existsSync(marker)) {
      return null;
    }

    const content = await this.fetcher(uri);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    if (content === null) {
      fs.writeFileSync(marker, uri + '\n');
    } else {
      fs.writeFileSync(file, content);
    }
    return content;
  }
}

/**
 * In-memory cache, for tests and one-off runs
 */
export class MemoryFileCache implements RemoteFileCache {
  private readonly entries = new Map<string, string | null>();
  /** Number of calls that reached the fetcher */
  fetches = 0;

  constructor(private readonly fetcher: Fetcher) {}

  async getOrFetch(key: string, uri: string): Promise<string | null> {
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      return cached;
    }
    this.fetches++;
    const content = await this.fetcher(uri);
    this.entries.set(key, content);
    return content;
  }
}
