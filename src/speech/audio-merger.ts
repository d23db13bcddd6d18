import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { createLogger, formatError } from '../kernel/logger.js';
import type { Config } from '../types/index.js';
import { execFileNoThrow } from '../utils/execFileNoThrow.js';
import { CancelledError, MergeError, errorMessage } from './errors.js';
import type { MergeMode } from './types.js';

const log = createLogger('audio-merger');

// ═══════════════════════════════════════════════════════════════════════════════
// MERGE STRATEGIES
// ═══════════════════════════════════════════════════════════════════════════════

export interface MergeStrategy {
  readonly mode: MergeMode;
  merge(segments: readonly Buffer[], signal?: AbortSignal): Promise<Buffer>;
}

/** Byte-level concatenation: no gap, no re-encode. */
export class ConcatMergeStrategy implements MergeStrategy {
  readonly mode = 'concat' as const;

  merge(segments: readonly Buffer[]): Promise<Buffer> {
    return Promise.resolve(Buffer.concat(segments));
  }
}

export interface FfmpegMergeOptions {
  ffmpegPath?: string;
  gapMs?: number;
  timeoutMs?: number;
}

/**
 * ffmpeg filter graph: every input but the last is padded with `gapMs` of
 * silence, then all are concatenated into one stream.
 */
export function buildConcatFilter(inputCount: number, gapMs: number): string {
  const gapSeconds = gapMs / 1000;
  const parts: string[] = [];
  const labels: string[] = [];
  for (let i = 0; i < inputCount; i++) {
    const filter = i < inputCount - 1 ? `apad=pad_dur=${gapSeconds}` : 'anull';
    parts.push(`[${i}:a]${filter}[a${i}]`);
    labels.push(`[a${i}]`);
  }
  parts.push(`${labels.join('')}concat=n=${inputCount}:v=0:a=1[out]`);
  return parts.join(';');
}

/** Decode, join with silence gaps, re-encode once to MP3. */
export class FfmpegMergeStrategy implements MergeStrategy {
  readonly mode = 'high-quality' as const;
  private readonly ffmpegPath: string;
  private readonly gapMs: number;
  private readonly timeoutMs: number;

  constructor(options: FfmpegMergeOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.gapMs = options.gapMs ?? 200;
    this.timeoutMs = options.timeoutMs ?? 120_000;
  }

  async merge(segments: readonly Buffer[], signal?: AbortSignal): Promise<Buffer> {
    const workDir = await mkdtemp(path.join(tmpdir(), 'voxpipe-merge-'));
    try {
      const inputArgs: string[] = [];
      for (const [index, segment] of segments.entries()) {
        const segmentPath = path.join(workDir, `segment-${index}.mp3`);
        await writeFile(segmentPath, segment);
        inputArgs.push('-i', segmentPath);
      }

      const outputPath = path.join(workDir, 'merged.mp3');
      const args = [
        '-hide_banner',
        '-loglevel', 'error',
        ...inputArgs,
        '-filter_complex', buildConcatFilter(segments.length, this.gapMs),
        '-map', '[out]',
        '-c:a', 'libmp3lame',
        '-y',
        outputPath,
      ];

      log.debug({ segments: segments.length }, 'Running ffmpeg merge');
      const result = await execFileNoThrow(this.ffmpegPath, args, { timeoutMs: this.timeoutMs, signal });
      if (result.status !== 0) {
        throw new MergeError(`ffmpeg exited with code ${result.status}: ${result.stderr.slice(-2000)}`);
      }

      return await readFile(outputPath);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CAPABILITY CHECK
// ═══════════════════════════════════════════════════════════════════════════════

export async function isFfmpegAvailable(ffmpegPath = 'ffmpeg'): Promise<boolean> {
  const result = await execFileNoThrow(ffmpegPath, ['-version'], { timeoutMs: 10_000 });
  return result.status === 0;
}

/**
 * Pick the merge strategy once at startup. `auto` probes for ffmpeg;
 * the other modes force a strategy.
 */
export async function detectMergeStrategy(merge: Config['merge']): Promise<MergeStrategy> {
  const hq = (): MergeStrategy => new FfmpegMergeStrategy({ ffmpegPath: merge.ffmpeg_path, gapMs: merge.gap_ms });

  switch (merge.mode) {
    case 'concat':
      return new ConcatMergeStrategy();
    case 'high-quality':
      return hq();
    case 'auto': {
      const available = await isFfmpegAvailable(merge.ffmpeg_path);
      log.info({ ffmpeg: available }, available ? 'Using high-quality merge' : 'ffmpeg not found, using concat merge');
      return available ? hq() : new ConcatMergeStrategy();
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// AUDIO MERGER
// ═══════════════════════════════════════════════════════════════════════════════

export interface MergedAudio {
  audio: Buffer;
  /** null when nothing needed merging */
  mode: MergeMode | null;
}

export class AudioMerger {
  private readonly fallback: MergeStrategy = new ConcatMergeStrategy();

  constructor(private readonly strategy: MergeStrategy) {}

  get mode(): MergeMode {
    return this.strategy.mode;
  }

  async merge(segments: readonly Buffer[], signal?: AbortSignal): Promise<Buffer> {
    const { audio } = await this.mergeDetailed(segments, signal);
    return audio;
  }

  /**
   * Segments are joined in the order given. A failing strategy falls back
   * to concatenation for this call only.
   */
  async mergeDetailed(segments: readonly Buffer[], signal?: AbortSignal): Promise<MergedAudio> {
    if (segments.length === 0) return { audio: Buffer.alloc(0), mode: null };
    if (segments.length === 1 && segments[0]) return { audio: segments[0], mode: null };

    try {
      return { audio: await this.strategy.merge(segments, signal), mode: this.strategy.mode };
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      if (this.strategy.mode === this.fallback.mode) {
        throw new MergeError(`Audio merge failed: ${errorMessage(error)}`, error);
      }
      log.warn({ err: formatError(error) }, 'High-quality merge failed, falling back to concat');
    }

    try {
      return { audio: await this.fallback.merge(segments), mode: this.fallback.mode };
    } catch (error) {
      throw new MergeError(`Audio merge failed: ${errorMessage(error)}`, error);
    }
  }
}
