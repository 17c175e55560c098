/**
 * Content-hash keyed store of section forests.
 *
 * Lifecycle: `open()` loads the persisted file once at startup, every new
 * entry is flushed right after it is written, and entries are never
 * updated in place. The cache is the only state shared between
 * concurrently running questions, so misses are serialized per key: the
 * first caller computes, later callers for the same key await the same
 * promise.
 *
 * @module segmentation/cache
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { parseStoredForest } from '../document/forest.js';
import type { SectionForest } from '../types/document.js';

const logger = createLogger('SegmentationCache');

const CACHE_VERSION = 1;

const CacheFileSchema = z.object({
  version: z.literal(CACHE_VERSION),
  entries: z.record(z.object({
    createdAt: z.string(),
    forest: z.unknown(),
  })),
});

export interface CacheEntry {
  readonly forest: SectionForest;
  /** ISO timestamp */
  readonly createdAt: string;
}

/**
 * Result of a cache-miss computation.
 */
export interface ComputedForest {
  forest: SectionForest;
  /** False for results that should be recomputed next time (e.g. fallbacks) */
  cacheable: boolean;
}

export class SegmentationCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<SectionForest>>();
  private writeChain: Promise<void> = Promise.resolve();

  /**
   * @param filePath - Persisted mapping file; omit for an in-memory cache
   * @param now - Clock used for createdAt
   */
  constructor(
    readonly filePath?: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Create a cache and load its persisted entries.
   */
  static async open(filePath?: string): Promise<SegmentationCache> {
    const cache = new SegmentationCache(filePath);
    await cache.load();
    return cache;
  }

  get size(): number {
    return this.entries.size;
  }

  has(hash: string): boolean {
    return this.entries.has(hash);
  }

  get(hash: string): CacheEntry | undefined {
    return this.entries.get(hash);
  }

  /**
   * Load entries from disk. A missing file is an empty cache; an unreadable
   * or foreign file is logged and ignored, as are individual invalid entries.
   */
  async load(): Promise<void> {
    if (!this.filePath) {
      return;
    }

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.debug({ filePath: this.filePath }, 'No cache file yet');
        return;
      }
      logger.warn({ err: error, filePath: this.filePath }, 'Failed to read cache file, starting empty');
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      logger.warn({ err: error, filePath: this.filePath }, 'Cache file is not valid JSON, starting empty');
      return;
    }

    const parsed = CacheFileSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn({ filePath: this.filePath }, 'Cache file has an unknown layout, starting empty');
      return;
    }

    let skipped = 0;
    for (const [hash, entry] of Object.entries(parsed.data.entries)) {
      const forest = parseStoredForest(entry.forest);
      if (forest) {
        this.entries.set(hash, { forest, createdAt: entry.createdAt });
      } else {
        skipped++;
      }
    }

    logger.info({ filePath: this.filePath, entries: this.entries.size, skipped }, 'Segmentation cache loaded');
  }

  /**
   * Return the cached forest for `hash`, computing it on a miss.
   *
   * Concurrent calls for the same hash share one computation. A cacheable
   * result is stored and flushed before it is returned; a flush failure is
   * logged and the forest is still returned.
   */
  async getOrCompute(hash: string, compute: () => Promise<ComputedForest>): Promise<SectionForest> {
    const existing = this.entries.get(hash);
    if (existing) {
      logger.debug({ hash }, 'Cache hit');
      return existing.forest;
    }

    const pending = this.inFlight.get(hash);
    if (pending) {
      logger.debug({ hash }, 'Joining in-flight segmentation');
      return pending;
    }

    logger.info({ hash }, 'Cache miss');
    const task = this.computeAndStore(hash, compute).finally(() => {
      this.inFlight.delete(hash);
    });
    this.inFlight.set(hash, task);
    return task;
  }

  private async computeAndStore(hash: string, compute: () => Promise<ComputedForest>): Promise<SectionForest> {
    const { forest, cacheable } = await compute();
    if (!cacheable) {
      return forest;
    }

    this.entries.set(hash, { forest, createdAt: this.now().toISOString() });
    try {
      await this.flush();
    } catch (error) {
      logger.warn({ err: error, filePath: this.filePath }, 'Failed to persist segmentation cache');
    }
    return forest;
  }

  /**
   * Write all entries to disk. Writes are serialized and atomic
   * (temporary file plus rename).
   */
  flush(): Promise<void> {
    const { filePath } = this;
    if (!filePath) {
      return Promise.resolve();
    }

    const write = async (): Promise<void> => {
      const payload = {
        version: CACHE_VERSION,
        entries: Object.fromEntries(this.entries),
      };
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      const tmp = `${filePath}.${process.pid}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(payload, null, 2), 'utf-8');
      await fs.rename(tmp, filePath);
      logger.debug({ filePath, entries: this.entries.size }, 'Segmentation cache flushed');
    };

    const next = this.writeChain.then(write, write);
    // Keep the chain alive after a failed write; the caller sees the failure
    this.writeChain = next.catch(() => undefined);
    return next;
  }
}
