import fs from 'fs';
import path from 'path';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';

export type Clock = () => number;

/**
 * One JSON file per (league, item type) holding the raw `lines` array of the
 * last successful response. Freshness comes from the file's mtime.
 */
export class ListingCache {
  private readonly dir: string;

  constructor(
    dir: string,
    private ttlMs: number,
    private logger: Logger,
    private now: Clock = Date.now,
  ) {
    this.dir = path.resolve(dir);
  }

  filePath(league: string, itemType: string) {
    const safeLeague = league.replace(/[^\w.-]+/g, '-');
    return path.join(this.dir, `${safeLeague}_${itemType}.json`);
  }

  /** Cached lines when present and younger than the TTL, otherwise null. */
  read(league: string, itemType: string): unknown[] | null {
    const file = this.filePath(league, itemType);
    try {
      const { mtimeMs } = fs.statSync(file);
      if (this.now() - mtimeMs >= this.ttlMs) {
        this.logger.debug('Cache entry expired', { file });
        return null;
      }
      const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
      if (!Array.isArray(parsed)) {
        this.logger.warn('Ignoring malformed cache entry', { file });
        return null;
      }
      return parsed;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        this.logger.warn('Failed to read listing cache', { file, error: errorMessage(error) });
      }
      return null;
    }
  }

  write(league: string, itemType: string, lines: readonly unknown[]) {
    this.ensureDir();
    fs.writeFileSync(this.filePath(league, itemType), JSON.stringify(lines));
  }

  private ensureDir() {
    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }
  }
}
