import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMA
// ═══════════════════════════════════════════════════════════════════════════

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const MergeModeSchema = z.enum(['auto', 'high-quality', 'concat']);
export type MergeModeSetting = z.infer<typeof MergeModeSchema>;

export const ChunkingConfigSchema = z.object({
  max_chunk_size: z.number().int().positive().default(1200),
  min_chunk_size: z.number().int().nonnegative().default(50),
}).refine((c) => c.min_chunk_size <= c.max_chunk_size, {
  message: 'min_chunk_size must not exceed max_chunk_size',
});

export const CacheConfigSchema = z.object({
  dir: z.string().optional(),
  max_files: z.number().int().positive().default(50),
  retention_hours: z.number().positive().default(168),
  store_segments: z.boolean().default(true),
});

export const RetryConfigSchema = z.object({
  max_attempts: z.number().int().min(1).default(3),
  base_delay_ms: z.number().int().nonnegative().default(1000),
  max_delay_ms: z.number().int().nonnegative().default(10_000),
  jitter_ms: z.number().int().nonnegative().default(1000),
});

export const SynthesisConfigSchema = z.object({
  region: z.string().min(1).default('eastus'),
  endpoint: z.string().url().optional(),
  output_format: z.string().default('audio-24khz-48kbitrate-mono-mp3'),
  timeout_ms: z.number().int().positive().default(30_000),
  max_concurrency: z.number().int().min(1).default(2),
});

export const VoiceConfigSchema = z.object({
  default_voice: z.string().default('en-US-AriaNeural'),
  catalog_ttl_ms: z.number().int().nonnegative().default(3_600_000),
});

export const MergeConfigSchema = z.object({
  mode: MergeModeSchema.default('auto'),
  gap_ms: z.number().int().nonnegative().default(200),
  ffmpeg_path: z.string().default('ffmpeg'),
});

export const PlaybackConfigSchema = z.object({
  timeout_ms: z.number().int().positive().default(300_000),
});

export const ConfigSchema = z.object({
  chunking: ChunkingConfigSchema,
  cache: CacheConfigSchema,
  retry: RetryConfigSchema,
  synthesis: SynthesisConfigSchema,
  voice: VoiceConfigSchema,
  merge: MergeConfigSchema,
  playback: PlaybackConfigSchema,
  paths: z.object({
    base_dir: z.string(),
    cache_dir: z.string().default('cache'),
    config_file: z.string().default('config.json'),
  }),
  logging: z.object({
    level: LogLevelSchema.default('info'),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { success: true; data: T } {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is { success: false; error: E } {
  return !result.success;
}
