import { describe, it, expect, vi, beforeEach } from 'vitest';
import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ExecOptions, ExecResult } from '../../../src/utils/execFileNoThrow.js';

const { execMock } = vi.hoisted(() => ({
  execMock: vi.fn<(file: string, args: string[], options?: ExecOptions) => Promise<ExecResult>>(),
}));

vi.mock('../../../src/utils/execFileNoThrow.js', () => ({
  execFileNoThrow: execMock,
}));

import {
  AudioMerger,
  ConcatMergeStrategy,
  FfmpegMergeStrategy,
  buildConcatFilter,
  detectMergeStrategy,
  isFfmpegAvailable,
  type MergeStrategy,
} from '../../../src/speech/audio-merger.js';
import { CancelledError, MergeError } from '../../../src/speech/errors.js';

const segments = [Buffer.from('one'), Buffer.from('two'), Buffer.from('three')];

/** Stands in for ffmpeg: writes a fixed payload to the output path (last arg). */
async function fakeFfmpeg(_file: string, args: string[]): Promise<ExecResult> {
  const outputPath = args[args.length - 1];
  if (outputPath && outputPath.endsWith('.mp3')) {
    await writeFile(outputPath, 'merged-by-ffmpeg');
  }
  return { stdout: '', stderr: '', status: 0 };
}

function failingStrategy(mode: MergeStrategy['mode']): MergeStrategy {
  return {
    mode,
    merge: () => Promise.reject(new Error('encoder crashed')),
  };
}

describe('buildConcatFilter', () => {
  it('should pad every input but the last', () => {
    expect(buildConcatFilter(3, 200)).toBe(
      '[0:a]apad=pad_dur=0.2[a0];[1:a]apad=pad_dur=0.2[a1];[2:a]anull[a2];[a0][a1][a2]concat=n=3:v=0:a=1[out]',
    );
  });

  it('should support a zero gap', () => {
    expect(buildConcatFilter(2, 0)).toBe('[0:a]apad=pad_dur=0[a0];[1:a]anull[a1];[a0][a1]concat=n=2:v=0:a=1[out]');
  });
});

describe('ConcatMergeStrategy', () => {
  it('should join bytes in order', async () => {
    const merged = await new ConcatMergeStrategy().merge(segments);
    expect(merged.toString()).toBe('onetwothree');
  });
});

describe('FfmpegMergeStrategy', () => {
  beforeEach(() => {
    execMock.mockImplementation(fakeFfmpeg);
  });

  it('should run ffmpeg over the segments and return its output', async () => {
    const strategy = new FfmpegMergeStrategy({ ffmpegPath: '/opt/ffmpeg', gapMs: 300 });

    const merged = await strategy.merge(segments);

    expect(merged.toString()).toBe('merged-by-ffmpeg');
    expect(execMock).toHaveBeenCalledTimes(1);
    expect(execMock.mock.calls[0]?.[0]).toBe('/opt/ffmpeg');
    const args = execMock.mock.calls[0]?.[1] ?? [];
    expect(args.filter((arg) => arg === '-i')).toHaveLength(3);
    expect(args[args.indexOf('-filter_complex') + 1]).toBe(buildConcatFilter(3, 300));
    expect(args.slice(-4, -1)).toEqual(['-c:a', 'libmp3lame', '-y']);
  });

  it('should remove its work directory', async () => {
    await new FfmpegMergeStrategy().merge(segments);

    const args = execMock.mock.calls[0]?.[1] ?? [];
    const outputPath = args[args.length - 1] ?? '';
    expect(path.basename(outputPath)).toBe('merged.mp3');
    expect(existsSync(path.dirname(outputPath))).toBe(false);
  });

  it('should raise MergeError on a non-zero exit', async () => {
    execMock.mockResolvedValue({ stdout: '', stderr: 'Invalid data found', status: 1 });

    const outcome = new FfmpegMergeStrategy().merge(segments);

    await expect(outcome).rejects.toBeInstanceOf(MergeError);
    await expect(outcome).rejects.toThrow('ffmpeg exited with code 1: Invalid data found');
  });
});

describe('AudioMerger', () => {
  it('should return an empty buffer for no segments', async () => {
    const merger = new AudioMerger(new ConcatMergeStrategy());

    const result = await merger.mergeDetailed([]);

    expect(result.audio.length).toBe(0);
    expect(result.mode).toBeNull();
  });

  it('should pass a single segment through untouched', async () => {
    const merge = vi.fn();
    const merger = new AudioMerger({ mode: 'high-quality', merge });
    const only = Buffer.from('solo');

    const result = await merger.mergeDetailed([only]);

    expect(result.audio).toBe(only);
    expect(result.mode).toBeNull();
    expect(merge).not.toHaveBeenCalled();
  });

  it('should report the mode that produced the audio', async () => {
    const merger = new AudioMerger(new ConcatMergeStrategy());

    const result = await merger.mergeDetailed(segments);

    expect(result).toEqual({ audio: Buffer.from('onetwothree'), mode: 'concat' });
    expect(merger.mode).toBe('concat');
  });

  it('should fall back to concatenation when the high-quality merge fails', async () => {
    const merger = new AudioMerger(failingStrategy('high-quality'));

    const result = await merger.mergeDetailed(segments);

    expect(result.audio.toString()).toBe('onetwothree');
    expect(result.mode).toBe('concat');
  });

  it('should raise MergeError when concatenation itself fails', async () => {
    const merger = new AudioMerger(failingStrategy('concat'));

    const outcome = merger.merge(segments);

    await expect(outcome).rejects.toBeInstanceOf(MergeError);
    await expect(outcome).rejects.toThrow('Audio merge failed: encoder crashed');
  });

  it('should report cancellation instead of falling back', async () => {
    const controller = new AbortController();
    controller.abort();
    const merger = new AudioMerger(failingStrategy('high-quality'));

    await expect(merger.merge(segments, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('detectMergeStrategy', () => {
  const mergeConfig = { gap_ms: 200, ffmpeg_path: 'ffmpeg' };

  it('should honour a forced concat mode without probing', async () => {
    const strategy = await detectMergeStrategy({ ...mergeConfig, mode: 'concat' });

    expect(strategy.mode).toBe('concat');
    expect(execMock).not.toHaveBeenCalled();
  });

  it('should honour a forced high-quality mode without probing', async () => {
    const strategy = await detectMergeStrategy({ ...mergeConfig, mode: 'high-quality' });

    expect(strategy).toBeInstanceOf(FfmpegMergeStrategy);
    expect(execMock).not.toHaveBeenCalled();
  });

  it('should pick high-quality when ffmpeg is found', async () => {
    execMock.mockResolvedValue({ stdout: 'ffmpeg version 6.1', stderr: '', status: 0 });

    const strategy = await detectMergeStrategy({ ...mergeConfig, mode: 'auto' });

    expect(strategy.mode).toBe('high-quality');
    expect(execMock).toHaveBeenCalledWith('ffmpeg', ['-version'], { timeoutMs: 10_000 });
  });

  it('should pick concat when ffmpeg is missing', async () => {
    execMock.mockResolvedValue({ stdout: '', stderr: 'not found', status: 127 });

    const strategy = await detectMergeStrategy({ ...mergeConfig, mode: 'auto' });

    expect(strategy.mode).toBe('concat');
  });
});

describe('isFfmpegAvailable', () => {
  it('should probe the configured binary', async () => {
    execMock.mockResolvedValue({ stdout: '', stderr: '', status: 0 });

    await expect(isFfmpegAvailable('/usr/local/bin/ffmpeg')).resolves.toBe(true);
    expect(execMock).toHaveBeenCalledWith('/usr/local/bin/ffmpeg', ['-version'], { timeoutMs: 10_000 });
  });
});
