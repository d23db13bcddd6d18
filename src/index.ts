/**
 * voxpipe — Main Exports
 *
 * Public API surface for the voxpipe library.
 *
 * @module voxpipe
 * @version 1.0.0
 */

// Types
export {
  type Config,
  type Result,
  ConfigSchema,
  ok,
  err,
  isOk,
  isErr,
} from './types/index.js';

// Config
export {
  getConfig,
  loadConfig,
  DEFAULT_CONFIG,
  getBaseDir,
  getCacheDir,
} from './config/config.js';

// Kernel
export { EventBus, type EventMap } from './kernel/event-bus.js';
export { createLogger, redact, formatError, type Logger } from './kernel/logger.js';

// Utilities
export { RetryExecutor, withRetry, computeBackoffDelay, type RetryOptions, type RetryInfo } from './utils/retry.js';

// Speech pipeline
export { SpeechService, type SpeechServiceDeps, type HealthReport, type HealthCheck } from './speech/service.js';
export {
  SpeechPipeline,
  describeReport,
  type SpeechReport,
  type SpeechState,
  type SpeechStage,
  type SpeakOptions,
  type PlaybackReport,
} from './speech/pipeline.js';
export { Chunker, splitText, type ChunkerOptions } from './speech/chunker.js';
export { cacheKey, normalizeText } from './speech/cache-key.js';
export { CacheStore, type CacheStoreOptions } from './speech/cache-store.js';
export {
  AudioMerger,
  ConcatMergeStrategy,
  FfmpegMergeStrategy,
  detectMergeStrategy,
  type MergeStrategy,
} from './speech/audio-merger.js';
export { AzureSpeechClient, type SynthesisClient, type VoiceSource } from './speech/synthesis-client.js';
export { VoiceCatalog, formatVoiceList } from './speech/voice-catalog.js';
export { SystemAudioPlayer, type AudioPlayer } from './speech/playback.js';
export * from './speech/errors.js';
export type { TextRequest, Segment, CacheEntry, CacheLease, CacheStats, VoiceInfo, MergeMode } from './speech/types.js';
