import { randomUUID } from 'node:crypto';
import { copyFile, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { EventBus } from '../kernel/event-bus.js';
import { createLogger, formatError } from '../kernel/logger.js';
import { ok, type Result } from '../types/index.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import type { RetryExecutor } from '../utils/retry.js';
import type { AudioMerger } from './audio-merger.js';
import { cacheKey } from './cache-key.js';
import type { CacheStore } from './cache-store.js';
import type { Chunker } from './chunker.js';
import {
  CancelledError,
  InvalidInputError,
  MergeError,
  OutputWriteError,
  SpeechError,
  TransientNetworkError,
  errorMessage,
  isRetryable,
  type PlaybackError,
  type SpeechErrorCode,
} from './errors.js';
import type { AudioPlayer, StopOutcome } from './playback.js';
import type { SynthesisClient } from './synthesis-client.js';
import { TextRequestSchema, type CacheLease, type MergeMode, type Segment } from './types.js';

const log = createLogger('speech-pipeline');

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type SpeechState =
  | 'RECEIVED'
  | 'CHUNKED'
  | 'CACHE_HIT'
  | 'SYNTHESIZING'
  | 'MERGED'
  | 'CACHED'
  | 'DELIVERED'
  | 'FAILED';

export type SpeechStage = 'validation' | 'synthesis' | 'merge' | 'delivery';

export interface PlaybackReport {
  status: 'completed' | 'stopped' | 'failed' | 'skipped';
  error?: string;
}

export interface SpeechReport {
  requestId: string;
  state: 'DELIVERED' | 'FAILED';
  transitions: SpeechState[];
  code: 'DELIVERED' | SpeechErrorCode;
  stage: SpeechStage;
  message: string;
  voiceId: string;
  cacheKey: string | null;
  cacheHit: boolean;
  /** The merged artifact was committed to the cache */
  cached: boolean;
  segmentCount: number;
  segmentCacheHits: number;
  synthesisCalls: number;
  mergeMode: MergeMode | null;
  /** Where the artifact can be found after the call; null when nothing was kept */
  artifactPath: string | null;
  playback: PlaybackReport;
}

export interface SpeakOptions {
  /** Hand the artifact to the player (default: true) */
  play?: boolean;
  /** Also copy the artifact here */
  outputPath?: string;
  signal?: AbortSignal;
}

export interface SpeechPipelineDeps {
  chunker: Chunker;
  cache: CacheStore;
  client: SynthesisClient;
  retry: RetryExecutor;
  merger: AudioMerger;
  player?: AudioPlayer | null;
  eventBus?: EventBus;
  /** Parallel segment syntheses per request (default: 2) */
  maxConcurrency?: number;
  /** Cache each synthesized segment of a multi-segment request (default: true) */
  storeSegments?: boolean;
  /** Where uncached artifacts are staged for playback (default: OS temp dir) */
  tempDir?: string;
}

interface RunContext {
  requestId: string;
  voiceId: string;
  stage: SpeechStage;
  transitions: SpeechState[];
  cacheKey: string | null;
  cacheHit: boolean;
  cached: boolean;
  segmentCount: number;
  segmentCacheHits: number;
  synthesisCalls: number;
  mergeMode: MergeMode | null;
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SPEECH PIPELINE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Per-request state machine:
 *
 *   RECEIVED ─┬─ CACHE_HIT ──────────────────────────────────┬─ DELIVERED
 *             └─ CHUNKED ─ SYNTHESIZING ─ MERGED ─ [CACHED] ─┘
 *
 * Any state may move to FAILED. `speak` never throws: every outcome is a
 * SpeechReport carrying the final state, the stage reached and a code.
 */
export class SpeechPipeline {
  private readonly chunker: Chunker;
  private readonly cache: CacheStore;
  private readonly client: SynthesisClient;
  private readonly retry: RetryExecutor;
  private readonly merger: AudioMerger;
  private readonly player: AudioPlayer | null;
  private readonly eventBus: EventBus | null;
  private readonly maxConcurrency: number;
  private readonly storeSegments: boolean;
  private readonly tempDir: string;

  constructor(deps: SpeechPipelineDeps) {
    this.chunker = deps.chunker;
    this.cache = deps.cache;
    this.client = deps.client;
    this.retry = deps.retry;
    this.merger = deps.merger;
    this.player = deps.player ?? null;
    this.eventBus = deps.eventBus ?? null;
    this.maxConcurrency = deps.maxConcurrency ?? 2;
    this.storeSegments = deps.storeSegments ?? true;
    this.tempDir = deps.tempDir ?? tmpdir();
  }

  async speak(request: { text: string; voiceId: string }, options: SpeakOptions = {}): Promise<SpeechReport> {
    const { signal } = options;
    const ctx: RunContext = {
      requestId: randomUUID(),
      voiceId: request.voiceId,
      stage: 'validation',
      transitions: [],
      cacheKey: null,
      cacheHit: false,
      cached: false,
      segmentCount: 0,
      segmentCacheHits: 0,
      synthesisCalls: 0,
      mergeMode: null,
    };
    this.transition(ctx, 'RECEIVED');

    try {
      const parsed = TextRequestSchema.safeParse(request);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid request';
        return this.fail(ctx, new InvalidInputError(`Invalid request (${detail})`));
      }
      const { text, voiceId } = parsed.data;
      ctx.voiceId = voiceId;
      throwIfCancelled(signal);

      // ── Whole-text lookup ──────────────────────────────────────────
      const key = cacheKey(text, voiceId);
      ctx.cacheKey = key;
      // Leased so a concurrent request cannot evict the file mid-delivery
      const hit = await this.cache.acquire(key);
      if (hit) {
        try {
          ctx.cacheHit = true;
          this.transition(ctx, 'CACHE_HIT');
          ctx.stage = 'delivery';
          return await this.deliver(ctx, hit.entry.filePath, false, options);
        } finally {
          await hit.release();
        }
      }

      // ── Chunk + synthesize ─────────────────────────────────────────
      const segments = this.chunker.split(text);
      ctx.segmentCount = segments.length;
      this.transition(ctx, 'CHUNKED');

      ctx.stage = 'synthesis';
      this.transition(ctx, 'SYNTHESIZING');
      const parts = await this.synthesizeSegments(ctx, segments, voiceId, signal);
      throwIfCancelled(signal);

      // ── Merge ──────────────────────────────────────────────────────
      ctx.stage = 'merge';
      const merged = await this.merger.mergeDetailed(parts, signal);
      ctx.mergeMode = merged.mode;
      this.transition(ctx, 'MERGED');
      throwIfCancelled(signal);

      // ── Cache ──────────────────────────────────────────────────────
      ctx.stage = 'delivery';
      let lease: CacheLease | null = null;
      try {
        lease = await this.cache.storeAndAcquire(key, merged.audio, { voiceId, text }, signal);
      } catch (error) {
        if (error instanceof CancelledError || signal?.aborted) throw error;
        log.warn({ requestId: ctx.requestId, err: formatError(error) }, 'Cache write failed, delivering uncached audio');
      }
      if (lease) {
        try {
          ctx.cached = true;
          this.transition(ctx, 'CACHED');
          return await this.deliver(ctx, lease.entry.filePath, false, options);
        } finally {
          await lease.release();
        }
      }

      const tempPath = path.join(this.tempDir, `voxpipe-${ctx.requestId}.mp3`);
      try {
        await mkdir(this.tempDir, { recursive: true });
        await writeFile(tempPath, merged.audio);
      } catch (error) {
        throw new OutputWriteError(`Failed to stage audio for playback: ${errorMessage(error)}`, error);
      }
      try {
        return await this.deliver(ctx, tempPath, true, options);
      } finally {
        await rm(tempPath, { force: true });
      }
    } catch (error) {
      return this.fail(ctx, this.toSpeechError(error, ctx.stage, signal));
    }
  }

  /** Stop the current playback; the cached artifact is untouched. */
  async stop(): Promise<Result<StopOutcome, PlaybackError>> {
    if (!this.player) return ok('idle');
    return this.player.stop();
  }

  // ── Synthesis ──────────────────────────────────────────────────────

  /**
   * Segment audio in segment order. The first failing segment aborts its
   * siblings and fails the whole request.
   */
  private async synthesizeSegments(
    ctx: RunContext,
    segments: readonly Segment[],
    voiceId: string,
    signal?: AbortSignal,
  ): Promise<Buffer[]> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(new CancelledError());
    if (signal?.aborted) onAbort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const multiSegment = segments.length > 1;

    try {
      const parts = await mapWithConcurrency(segments, this.maxConcurrency, async (segment) => {
        try {
          return await this.synthesizeSegment(ctx, segment, voiceId, multiSegment, controller.signal);
        } catch (error) {
          if (!controller.signal.aborted) {
            controller.abort(new CancelledError('Sibling segment failed'));
          }
          throw error;
        }
      });
      return parts.filter((part): part is Buffer => part !== null);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async synthesizeSegment(
    ctx: RunContext,
    segment: Segment,
    voiceId: string,
    multiSegment: boolean,
    signal: AbortSignal,
  ): Promise<Buffer | null> {
    if (segment.content.trim().length === 0) return null;

    // A single segment is the whole text, already looked up
    const segmentKey = multiSegment ? cacheKey(segment.content, voiceId) : null;
    if (segmentKey) {
      const hit = await this.cache.lookup(segmentKey);
      if (hit) {
        ctx.segmentCacheHits++;
        this.eventBus?.emit('speech:segment_synthesized', {
          requestId: ctx.requestId,
          segmentIndex: segment.index,
          bytes: hit.audio.length,
          fromCache: true,
        });
        return hit.audio;
      }
    }
    throwIfCancelled(signal);

    const audio = await this.retry.execute(
      () => {
        ctx.synthesisCalls++;
        return this.client.synthesize(segment.content, voiceId, { signal });
      },
      {
        signal,
        retryIf: isRetryable,
        onRetry: ({ attempt, delayMs, error }) => {
          log.warn(
            { requestId: ctx.requestId, segment: segment.index, attempt, delayMs, error: errorMessage(error) },
            'Segment synthesis failed, retrying',
          );
          this.eventBus?.emit('speech:retry', {
            requestId: ctx.requestId,
            segmentIndex: segment.index,
            attempt,
            delayMs,
            error: errorMessage(error),
          });
        },
      },
    );

    this.eventBus?.emit('speech:segment_synthesized', {
      requestId: ctx.requestId,
      segmentIndex: segment.index,
      bytes: audio.length,
      fromCache: false,
    });

    if (segmentKey && this.storeSegments) {
      try {
        await this.cache.store(segmentKey, audio, { voiceId, text: segment.content }, signal);
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        log.warn({ requestId: ctx.requestId, segment: segment.index, err: formatError(error) }, 'Segment cache write failed');
      }
    }

    return audio;
  }

  // ── Delivery ───────────────────────────────────────────────────────

  private async deliver(
    ctx: RunContext,
    artifactPath: string,
    temporary: boolean,
    options: SpeakOptions,
  ): Promise<SpeechReport> {
    const { signal } = options;
    throwIfCancelled(signal);

    if (options.outputPath) {
      try {
        await mkdir(path.dirname(options.outputPath), { recursive: true });
        await copyFile(artifactPath, options.outputPath);
      } catch (error) {
        throw new OutputWriteError(`Failed to write ${options.outputPath}: ${errorMessage(error)}`, error);
      }
    }

    const playback = await this.play(ctx, artifactPath, options);

    this.transition(ctx, 'DELIVERED');
    const keptPath = temporary ? options.outputPath ?? null : artifactPath;
    this.eventBus?.emit('speech:delivered', {
      requestId: ctx.requestId,
      cacheHit: ctx.cacheHit,
      synthesisCalls: ctx.synthesisCalls,
      artifactPath: keptPath ?? '',
    });
    log.info(
      {
        requestId: ctx.requestId,
        cacheHit: ctx.cacheHit,
        segments: ctx.segmentCount,
        synthesisCalls: ctx.synthesisCalls,
        playback: playback.status,
      },
      'Speech delivered',
    );

    return {
      ...this.baseReport(ctx),
      state: 'DELIVERED',
      code: 'DELIVERED',
      stage: 'delivery',
      message: ctx.cacheHit ? 'Delivered cached audio' : 'Delivered synthesized audio',
      artifactPath: keptPath,
      playback,
    };
  }

  private async play(ctx: RunContext, artifactPath: string, options: SpeakOptions): Promise<PlaybackReport> {
    const player = this.player;
    if (options.play === false || !player) {
      return { status: 'skipped' };
    }

    const { signal } = options;
    const onAbort = (): void => {
      void player.stop();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await player.play(artifactPath);
      if (!result.success) {
        return { status: 'failed', error: result.error.message };
      }
      if (result.data === 'completed' && ctx.cacheKey && (ctx.cacheHit || ctx.cached)) {
        await this.cache.recordPlayback(ctx.cacheKey);
      }
      return { status: result.data };
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  // ── State + reporting ──────────────────────────────────────────────

  private transition(ctx: RunContext, state: SpeechState): void {
    ctx.transitions.push(state);
    log.debug({ requestId: ctx.requestId, state }, 'Speech state');
    this.eventBus?.emit('speech:state', {
      requestId: ctx.requestId,
      state,
      timestamp: new Date().toISOString(),
    });
  }

  private fail(ctx: RunContext, error: SpeechError): SpeechReport {
    this.transition(ctx, 'FAILED');
    this.eventBus?.emit('speech:failed', {
      requestId: ctx.requestId,
      stage: ctx.stage,
      code: error.code,
      message: error.message,
    });
    log.warn(
      { requestId: ctx.requestId, stage: ctx.stage, code: error.code, err: formatError(error) },
      'Speech request failed',
    );

    return {
      ...this.baseReport(ctx),
      state: 'FAILED',
      code: error.code,
      stage: ctx.stage,
      message: error.message,
      artifactPath: null,
      playback: { status: 'skipped' },
    };
  }

  private baseReport(ctx: RunContext): Omit<SpeechReport, 'state' | 'code' | 'stage' | 'message' | 'artifactPath' | 'playback'> {
    return {
      requestId: ctx.requestId,
      transitions: [...ctx.transitions],
      voiceId: ctx.voiceId,
      cacheKey: ctx.cacheKey,
      cacheHit: ctx.cacheHit,
      cached: ctx.cached,
      segmentCount: ctx.segmentCount,
      segmentCacheHits: ctx.segmentCacheHits,
      synthesisCalls: ctx.synthesisCalls,
      mergeMode: ctx.mergeMode,
    };
  }

  private toSpeechError(error: unknown, stage: SpeechStage, signal?: AbortSignal): SpeechError {
    if (signal?.aborted) {
      return error instanceof CancelledError ? error : new CancelledError();
    }
    if (error instanceof SpeechError) return error;

    const message = errorMessage(error);
    switch (stage) {
      case 'validation':
        return new InvalidInputError(message);
      case 'synthesis':
        return new TransientNetworkError(message, undefined, error);
      case 'merge':
        return new MergeError(message, error);
      case 'delivery':
        return new OutputWriteError(message, error);
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// USER-FACING SUMMARY
// ═══════════════════════════════════════════════════════════════════════════════

export function describeReport(report: SpeechReport): string {
  const voice = `(voice: ${report.voiceId})`;

  if (report.state === 'FAILED') {
    return `Speech failed during ${report.stage} [${report.code}]: ${report.message}`;
  }

  const { playback } = report;
  const where = report.artifactPath ? `: ${report.artifactPath}` : '';

  if (report.cacheHit) {
    switch (playback.status) {
      case 'completed':
        return `Playing cached audio ${voice}`;
      case 'stopped':
        return `Playback of cached audio stopped ${voice}`;
      case 'failed':
        return `Found cached audio but playback failed ${voice}: ${playback.error ?? 'unknown error'}`;
      case 'skipped':
        return `Cached audio ready ${voice}${where}`;
    }
  }

  switch (playback.status) {
    case 'completed':
      return `Playing generated audio ${voice}`;
    case 'stopped':
      return `Playback of generated audio stopped ${voice}`;
    case 'failed':
      return `Audio generated but playback failed ${voice}: ${playback.error ?? 'unknown error'}`;
    case 'skipped':
      return `Audio generated ${voice}${where}`;
  }
}
