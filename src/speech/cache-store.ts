import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { EventBus } from '../kernel/event-bus.js';
import { createLogger, formatError } from '../kernel/logger.js';
import { CacheIOError, CancelledError, errorMessage } from './errors.js';
import {
  CacheIndexFileSchema,
  type CacheEntry,
  type CacheIndexFile,
  type CacheLease,
  type CachedArtifact,
  type CacheStats,
  type PersistedCacheEntry,
  type StoreMetadata,
} from './types.js';

const log = createLogger('cache-store');

// ═══════════════════════════════════════════════════════════════════════════════
// CACHE STORE
// ═══════════════════════════════════════════════════════════════════════════════

export const INDEX_FILE = 'cache_index.json';
export const DEFAULT_MAX_CACHE_FILES = 50;
export const DEFAULT_RETENTION_MS = 168 * 60 * 60 * 1000; // 1 week

const PREVIEW_LENGTH = 50;

export interface CacheStoreOptions {
  cacheDir: string;
  maxFiles?: number;
  retentionMs?: number;
  now?: () => number;
  eventBus?: EventBus;
}

type EvictionReason = 'expired' | 'capacity';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && Reflect.get(error, 'code') === 'ENOENT';
}

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/**
 * Content-addressed audio cache: one artifact file per entry plus a JSON
 * index that is the source of truth.
 *
 * - Index mutations run one at a time on a promise chain; reads never wait.
 * - The in-memory index is swapped only after the index file is written, so
 *   a lookup never observes an uncommitted store.
 * - Artifact files are written before the index commit; an entry whose file
 *   has gone missing is a miss and is dropped from the index.
 * - A leased file outlives its entry: eviction, overwrite and clear defer the
 *   unlink until the last lease on that file is released.
 */
export class CacheStore {
  readonly cacheDir: string;
  readonly maxFiles: number;
  readonly retentionMs: number;
  private readonly indexPath: string;
  private readonly now: () => number;
  private readonly eventBus: EventBus | null;
  private index: Map<string, CacheEntry> = new Map();
  private mutation: Promise<void> = Promise.resolve();
  private readonly leases = new Map<string, number>();
  private readonly pendingUnlinks = new Set<string>();

  private constructor(options: CacheStoreOptions) {
    this.cacheDir = options.cacheDir;
    this.maxFiles = options.maxFiles ?? DEFAULT_MAX_CACHE_FILES;
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.indexPath = path.join(this.cacheDir, INDEX_FILE);
    this.now = options.now ?? Date.now;
    this.eventBus = options.eventBus ?? null;
  }

  static async open(options: CacheStoreOptions): Promise<CacheStore> {
    const store = new CacheStore(options);
    await store.load();
    return store;
  }

  // ── Reads ──────────────────────────────────────────────────────────

  /**
   * Artifact for `key`, or null on a miss. Expired entries miss (eviction
   * removes them); an entry whose file is gone misses and is removed now.
   * Read errors are logged and count as a miss.
   */
  async lookup(key: string): Promise<CachedArtifact | null> {
    const entry = this.index.get(key);
    if (!entry || this.isExpired(entry)) return null;
    return this.read(key, entry);
  }

  /**
   * Like `lookup`, but the artifact file stays on disk until `release` is
   * called, even if the entry is evicted or replaced in the meantime.
   */
  async acquire(key: string): Promise<CacheLease | null> {
    const entry = this.index.get(key);
    if (!entry || this.isExpired(entry)) return null;

    // Taken before the first await so no concurrent unlink can slip in
    const release = this.lease(entry.filePath);
    const artifact = await this.read(key, entry);
    if (!artifact) {
      await release();
      return null;
    }
    return { ...artifact, release };
  }

  private async read(key: string, entry: CacheEntry): Promise<CachedArtifact | null> {
    try {
      const audio = await readFile(entry.filePath);
      return { entry: { ...entry }, audio };
    } catch (error) {
      if (isNotFound(error)) {
        log.warn({ key, filePath: entry.filePath }, 'Cached file missing, dropping index entry');
        await this.removeStale(key, entry);
      } else {
        log.warn({ key, err: formatError(error) }, 'Cache read failed, treating as miss');
        this.eventBus?.emit('cache:io_error', { operation: 'read', error: errorMessage(error) });
      }
      return null;
    }
  }

  get size(): number {
    return this.index.size;
  }

  /** Snapshot of all entries, newest first. */
  list(): CacheEntry[] {
    return [...this.index.values()]
      .sort((a, b) => b.createdAt - a.createdAt)
      .map((entry) => ({ ...entry }));
  }

  stats(): CacheStats {
    const entries = [...this.index.values()];
    const stats: CacheStats = {
      entries: entries.length,
      totalBytes: entries.reduce((sum, e) => sum + e.sizeBytes, 0),
    };
    if (entries.length > 0) {
      const created = entries.map((e) => e.createdAt);
      stats.oldestCreatedAt = Math.min(...created);
      stats.newestCreatedAt = Math.max(...created);
    }
    return stats;
  }

  // ── Mutations ──────────────────────────────────────────────────────

  /**
   * Write the artifact, commit its entry to the index, then evict.
   * Throws CacheIOError when the artifact or index cannot be written, and
   * CancelledError when `signal` aborts before the commit; in both cases the
   * new file is removed and the index is unchanged.
   */
  async store(
    key: string,
    audio: Buffer,
    metadata: StoreMetadata = {},
    signal?: AbortSignal,
  ): Promise<CacheEntry> {
    const { entry, release } = await this.put(key, audio, metadata, signal);
    await release();
    return entry;
  }

  /** `store`, returning a lease on the new artifact file. */
  async storeAndAcquire(
    key: string,
    audio: Buffer,
    metadata: StoreMetadata = {},
    signal?: AbortSignal,
  ): Promise<CacheLease> {
    const { entry, release } = await this.put(key, audio, metadata, signal);
    return { entry, audio, release };
  }

  private async put(
    key: string,
    audio: Buffer,
    metadata: StoreMetadata,
    signal: AbortSignal | undefined,
  ): Promise<{ entry: CacheEntry; release: () => Promise<void> }> {
    const fileName = `${key}.${randomUUID().slice(0, 8)}.mp3`;
    const filePath = path.join(this.cacheDir, fileName);

    try {
      await mkdir(this.cacheDir, { recursive: true });
      await writeFile(filePath, audio);
    } catch (error) {
      await this.unlinkQuiet(filePath);
      this.eventBus?.emit('cache:io_error', { operation: 'write', error: errorMessage(error) });
      throw new CacheIOError(`Failed to write cache artifact: ${errorMessage(error)}`, 'write', error);
    }

    return this.withIndexLock(async () => {
      if (signal?.aborted) {
        await this.unlinkQuiet(filePath);
        throw new CancelledError('Request cancelled before cache commit');
      }

      const entry: CacheEntry = {
        key,
        filePath,
        createdAt: this.now(),
        sizeBytes: audio.length,
        playCount: 0,
      };
      if (metadata.voiceId !== undefined) entry.voiceId = metadata.voiceId;
      if (metadata.text !== undefined) entry.textPreview = preview(metadata.text);

      const next = new Map(this.index);
      const previous = next.get(key);
      next.delete(key);
      next.set(key, entry);

      try {
        await this.persist(next);
      } catch (error) {
        await this.unlinkQuiet(filePath);
        this.eventBus?.emit('cache:io_error', { operation: 'index', error: errorMessage(error) });
        throw new CacheIOError(`Failed to write cache index: ${errorMessage(error)}`, 'index', error);
      }

      this.index = next;
      const release = this.lease(filePath);
      if (previous) {
        await this.discard(previous.filePath);
      }

      log.debug({ key, sizeBytes: entry.sizeBytes }, 'Cache entry stored');
      this.eventBus?.emit('cache:stored', { key, sizeBytes: entry.sizeBytes });

      try {
        await this.evictLocked();
      } catch (error) {
        log.warn({ err: formatError(error) }, 'Eviction after store failed');
      }

      return { entry: { ...entry }, release };
    });
  }

  /**
   * Enforce retention then capacity. Idempotent; returns the removed entries.
   */
  evict(): Promise<CacheEntry[]> {
    return this.withIndexLock(() => this.evictLocked());
  }

  /** Bump play statistics. Never throws; false when nothing was recorded. */
  recordPlayback(key: string): Promise<boolean> {
    return this.withIndexLock(async () => {
      const entry = this.index.get(key);
      if (!entry) return false;

      const next = new Map(this.index);
      next.set(key, { ...entry, playCount: entry.playCount + 1, lastPlayedAt: this.now() });

      try {
        await this.persist(next);
      } catch (error) {
        log.warn({ key, err: formatError(error) }, 'Failed to record playback');
        return false;
      }

      this.index = next;
      return true;
    });
  }

  /** Remove every entry and artifact. Returns the number of entries removed. */
  clear(): Promise<number> {
    return this.withIndexLock(async () => {
      const removed = [...this.index.values()];
      for (const entry of removed) {
        await this.discard(entry.filePath);
      }

      const next = new Map<string, CacheEntry>();
      this.index = next;
      try {
        await this.persist(next);
      } catch (error) {
        throw new CacheIOError(`Failed to write cache index: ${errorMessage(error)}`, 'index', error);
      }

      for (const entry of removed) {
        this.eventBus?.emit('cache:evicted', { key: entry.key, reason: 'cleared' });
      }
      log.info({ count: removed.length }, 'Cache cleared');
      return removed.length;
    });
  }

  // ── Leases ─────────────────────────────────────────────────────────

  /** Hold `filePath` on disk; the returned function drops the hold once. */
  private lease(filePath: string): () => Promise<void> {
    this.leases.set(filePath, (this.leases.get(filePath) ?? 0) + 1);
    let released = false;

    return async () => {
      if (released) return;
      released = true;

      const remaining = (this.leases.get(filePath) ?? 1) - 1;
      if (remaining > 0) {
        this.leases.set(filePath, remaining);
        return;
      }
      this.leases.delete(filePath);
      if (this.pendingUnlinks.delete(filePath)) {
        await this.unlinkQuiet(filePath);
      }
    };
  }

  /** Unlink a file the index no longer references, deferred while leased. */
  private async discard(filePath: string): Promise<void> {
    if (this.leases.has(filePath)) {
      this.pendingUnlinks.add(filePath);
      return;
    }
    await this.unlinkQuiet(filePath);
  }

  // ── Internals ──────────────────────────────────────────────────────

  private withIndexLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.mutation.then(fn);
    this.mutation = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.createdAt > this.retentionMs;
  }

  private async evictLocked(): Promise<CacheEntry[]> {
    const now = this.now();
    const next = new Map(this.index);
    const removed: Array<{ entry: CacheEntry; reason: EvictionReason }> = [];

    for (const [key, entry] of next) {
      if (now - entry.createdAt > this.retentionMs) {
        next.delete(key);
        removed.push({ entry, reason: 'expired' });
      }
    }

    if (next.size > this.maxFiles) {
      const oldestFirst = [...next.values()].sort((a, b) => a.createdAt - b.createdAt);
      for (const entry of oldestFirst.slice(0, next.size - this.maxFiles)) {
        next.delete(entry.key);
        removed.push({ entry, reason: 'capacity' });
      }
    }

    if (removed.length === 0) return [];

    // Files first, index last: a crash in between leaves entries whose files
    // are gone, which lookup drops.
    for (const { entry } of removed) {
      await this.discard(entry.filePath);
    }
    this.index = next;

    try {
      await this.persist(next);
    } catch (error) {
      throw new CacheIOError(`Failed to write cache index: ${errorMessage(error)}`, 'index', error);
    }

    for (const { entry, reason } of removed) {
      this.eventBus?.emit('cache:evicted', { key: entry.key, reason });
    }
    log.info(
      { removed: removed.length, remaining: next.size },
      'Cache eviction completed',
    );

    return removed.map(({ entry }) => ({ ...entry }));
  }

  private removeStale(key: string, stale: CacheEntry): Promise<void> {
    return this.withIndexLock(async () => {
      // A store may have replaced the entry since the failed read
      if (this.index.get(key) !== stale) return;

      const next = new Map(this.index);
      next.delete(key);
      this.index = next;
      this.eventBus?.emit('cache:evicted', { key, reason: 'missing_file' });

      try {
        await this.persist(next);
      } catch (error) {
        log.warn({ key, err: formatError(error) }, 'Failed to persist index after dropping stale entry');
      }
    });
  }

  private async load(): Promise<void> {
    try {
      await mkdir(this.cacheDir, { recursive: true });
    } catch (error) {
      log.warn({ cacheDir: this.cacheDir, err: formatError(error) }, 'Cannot create cache directory');
    }

    let raw: string;
    try {
      raw = await readFile(this.indexPath, 'utf-8');
    } catch (error) {
      if (!isNotFound(error)) {
        log.warn({ err: formatError(error) }, 'Cannot read cache index, starting empty');
      }
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.warn({ err: formatError(error) }, 'Cache index is not valid JSON, starting empty');
      return;
    }

    const result = CacheIndexFileSchema.safeParse(parsed);
    if (!result.success) {
      log.warn({ issues: result.error.issues.length }, 'Cache index failed validation, starting empty');
      return;
    }

    for (const persisted of result.data.entries) {
      const entry = this.fromPersisted(persisted);
      this.index.set(entry.key, entry);
    }
    log.debug({ entries: this.index.size }, 'Cache index loaded');
  }

  private async persist(entries: Map<string, CacheEntry>): Promise<void> {
    const data: CacheIndexFile = {
      version: 1,
      entries: [...entries.values()].map((entry) => this.toPersisted(entry)),
    };
    const tmpPath = `${this.indexPath}.${process.pid}.tmp`;
    await mkdir(this.cacheDir, { recursive: true });
    await writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
    await rename(tmpPath, this.indexPath);
  }

  private toPersisted(entry: CacheEntry): PersistedCacheEntry {
    const persisted: PersistedCacheEntry = {
      key: entry.key,
      file: path.basename(entry.filePath),
      createdAt: new Date(entry.createdAt).toISOString(),
      sizeBytes: entry.sizeBytes,
      playCount: entry.playCount,
    };
    if (entry.voiceId !== undefined) persisted.voiceId = entry.voiceId;
    if (entry.textPreview !== undefined) persisted.textPreview = entry.textPreview;
    if (entry.lastPlayedAt !== undefined) persisted.lastPlayedAt = new Date(entry.lastPlayedAt).toISOString();
    return persisted;
  }

  private fromPersisted(persisted: PersistedCacheEntry): CacheEntry {
    const entry: CacheEntry = {
      key: persisted.key,
      filePath: path.join(this.cacheDir, persisted.file),
      createdAt: Date.parse(persisted.createdAt),
      sizeBytes: persisted.sizeBytes,
      playCount: persisted.playCount,
    };
    if (persisted.voiceId !== undefined) entry.voiceId = persisted.voiceId;
    if (persisted.textPreview !== undefined) entry.textPreview = persisted.textPreview;
    if (persisted.lastPlayedAt !== undefined) entry.lastPlayedAt = Date.parse(persisted.lastPlayedAt);
    return entry;
  }

  private async unlinkQuiet(filePath: string): Promise<void> {
    try {
      await unlink(filePath);
    } catch (error) {
      if (!isNotFound(error)) {
        log.warn({ filePath, err: formatError(error) }, 'Failed to delete cache file');
      }
    }
  }
}
