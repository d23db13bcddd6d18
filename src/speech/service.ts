import { checkDirectoryAccess, getCacheDir, getConfig } from '../config/config.js';
import { EventBus } from '../kernel/event-bus.js';
import { createLogger } from '../kernel/logger.js';
import type { Config, Result } from '../types/index.js';
import { RetryExecutor } from '../utils/retry.js';
import { AudioMerger, detectMergeStrategy, type MergeStrategy } from './audio-merger.js';
import { CacheStore } from './cache-store.js';
import { Chunker } from './chunker.js';
import { ConfigurationError, type PlaybackError } from './errors.js';
import { SpeechPipeline, type SpeechReport } from './pipeline.js';
import { SystemAudioPlayer, type AudioPlayer, type StopOutcome } from './playback.js';
import { AzureSpeechClient, type SynthesisClient, type VoiceSource } from './synthesis-client.js';
import type { CacheEntry, CacheStats, VoiceInfo } from './types.js';
import { VoiceCatalog } from './voice-catalog.js';

const log = createLogger('speech-service');

// ═══════════════════════════════════════════════════════════════════════════════
// SPEECH SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

export type ServiceStatus = 'registered' | 'active' | 'shutdown';

export interface SpeechServiceDeps {
  config?: Config;
  env?: NodeJS.ProcessEnv;
  eventBus?: EventBus;
  /** Replaces the REST client for synthesis */
  client?: SynthesisClient;
  /** Replaces the REST client for voice listing */
  voiceSource?: VoiceSource;
  /** null disables playback */
  player?: AudioPlayer | null;
  /** Skips the ffmpeg probe */
  mergeStrategy?: MergeStrategy;
}

export interface ServiceSpeakOptions {
  /** Defaults to `voice.default_voice` */
  voiceId?: string;
  play?: boolean;
  outputPath?: string;
  signal?: AbortSignal;
}

export interface HealthCheck {
  name: string;
  ok: boolean;
  /** A failing required check makes the service unhealthy */
  required: boolean;
  details: string;
}

export interface HealthReport {
  healthy: boolean;
  checks: HealthCheck[];
}

interface Components {
  config: Config;
  env: NodeJS.ProcessEnv;
  eventBus: EventBus;
  cache: CacheStore;
  merger: AudioMerger;
  player: AudioPlayer | null;
  catalog: VoiceCatalog;
  pipeline: SpeechPipeline;
}

/**
 * Wires config, cache, synthesis, merge and playback once and exposes the
 * operations the CLI and library callers use.
 */
export class SpeechService {
  private status: ServiceStatus = 'registered';
  private components: Components | null = null;

  // ── Lifecycle ──────────────────────────────────────────────────────

  async initialize(deps: SpeechServiceDeps = {}): Promise<void> {
    const config = deps.config ?? getConfig();
    const env = deps.env ?? process.env;
    const eventBus = deps.eventBus ?? new EventBus();

    const remote = AzureSpeechClient.fromConfig(config, env);
    const client = deps.client ?? remote;
    const voiceSource = deps.voiceSource ?? remote;

    const cache = await CacheStore.open({
      cacheDir: getCacheDir(config),
      maxFiles: config.cache.max_files,
      retentionMs: config.cache.retention_hours * 60 * 60 * 1000,
      eventBus,
    });

    const merger = new AudioMerger(deps.mergeStrategy ?? (await detectMergeStrategy(config.merge)));
    const player =
      deps.player === undefined
        ? new SystemAudioPlayer({ timeoutMs: config.playback.timeout_ms, eventBus })
        : deps.player;

    const retry = new RetryExecutor({
      maxAttempts: config.retry.max_attempts,
      baseDelayMs: config.retry.base_delay_ms,
      maxDelayMs: config.retry.max_delay_ms,
      jitterMs: config.retry.jitter_ms,
    });

    const pipeline = new SpeechPipeline({
      chunker: new Chunker({
        maxChunkSize: config.chunking.max_chunk_size,
        minChunkSize: config.chunking.min_chunk_size,
      }),
      cache,
      client,
      retry,
      merger,
      player,
      eventBus,
      maxConcurrency: config.synthesis.max_concurrency,
      storeSegments: config.cache.store_segments,
    });

    this.components = {
      config,
      env,
      eventBus,
      cache,
      merger,
      player,
      catalog: new VoiceCatalog(voiceSource, config.voice.catalog_ttl_ms),
      pipeline,
    };
    this.status = 'active';
    log.info({ cacheDir: cache.cacheDir, mergeMode: merger.mode, entries: cache.size }, 'Speech service initialized');
  }

  async shutdown(): Promise<void> {
    if (this.components?.player) {
      await this.components.player.stop();
    }
    this.components = null;
    this.status = 'shutdown';
  }

  getStatus(): ServiceStatus {
    return this.status;
  }

  get eventBus(): EventBus {
    return this.require().eventBus;
  }

  // ── Public API ─────────────────────────────────────────────────────

  speak(text: string, options: ServiceSpeakOptions = {}): Promise<SpeechReport> {
    const { config, pipeline } = this.require();
    const { voiceId = config.voice.default_voice, ...speakOptions } = options;
    return pipeline.speak({ text, voiceId }, speakOptions);
  }

  stop(): Promise<Result<StopOutcome, PlaybackError>> {
    return this.require().pipeline.stop();
  }

  listVoices(languageFilter?: string): Promise<VoiceInfo[]> {
    return this.require().catalog.listVoices(languageFilter);
  }

  cacheEntries(): CacheEntry[] {
    return this.require().cache.list();
  }

  cacheStats(): CacheStats {
    return this.require().cache.stats();
  }

  pruneCache(): Promise<CacheEntry[]> {
    return this.require().cache.evict();
  }

  clearCache(): Promise<number> {
    return this.require().cache.clear();
  }

  async healthCheck(): Promise<HealthReport> {
    const { env, cache, merger, player } = this.require();
    const checks: HealthCheck[] = [];

    const hasKey = Boolean(env.AZURE_SPEECH_KEY);
    checks.push({
      name: 'synthesis key',
      ok: hasKey,
      required: true,
      details: hasKey ? 'AZURE_SPEECH_KEY configured' : 'AZURE_SPEECH_KEY not set',
    });

    const access = checkDirectoryAccess(cache.cacheDir);
    checks.push({
      name: 'cache directory',
      ok: access.success,
      required: true,
      details: access.success ? `${cache.cacheDir} writable` : access.error.message,
    });

    checks.push({
      name: 'merge mode',
      ok: merger.mode === 'high-quality',
      required: false,
      details:
        merger.mode === 'high-quality'
          ? 'ffmpeg available (high-quality merge)'
          : 'concat merge (install ffmpeg for gap-separated, re-encoded output)',
    });

    if (player) {
      const available = await player.isAvailable();
      checks.push({
        name: 'audio player',
        ok: available,
        required: false,
        details: available ? 'system player found' : 'system player not found; use --no-play or --output',
      });
    } else {
      checks.push({ name: 'audio player', ok: false, required: false, details: 'playback disabled' });
    }

    return {
      healthy: checks.every((check) => check.ok || !check.required),
      checks,
    };
  }

  // ── Internals ──────────────────────────────────────────────────────

  private require(): Components {
    if (!this.components) {
      throw new ConfigurationError('Speech service not initialized');
    }
    return this.components;
  }
}
