import { TTLCache } from '../utils/cache.js';
import type { VoiceSource } from './synthesis-client.js';
import type { VoiceInfo } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// VOICE CATALOG
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_CATALOG_TTL_MS = 60 * 60 * 1000;
export const VOICE_REPORT_LIMIT = 20;

const ALL_VOICES = 'all';

/**
 * Cached view over the remote voice listing. The full list is fetched at most
 * once per TTL; language filtering happens locally.
 */
export class VoiceCatalog {
  private readonly cache: TTLCache<string, VoiceInfo[]>;

  constructor(
    private readonly source: VoiceSource,
    ttlMs: number = DEFAULT_CATALOG_TTL_MS,
    now: () => number = Date.now,
  ) {
    this.cache = new TTLCache(ttlMs, now);
  }

  /** Case-insensitive substring match on the locale, e.g. `en` or `en-GB`. */
  async listVoices(languageFilter?: string): Promise<VoiceInfo[]> {
    const voices = await this.cache.getOrLoad(ALL_VOICES, () => this.source.fetchVoices());
    const filter = languageFilter?.trim().toLowerCase();
    if (!filter) return [...voices];
    return voices.filter((voice) => voice.language.toLowerCase().includes(filter));
  }
}

export function formatVoiceList(
  voices: readonly VoiceInfo[],
  languageFilter?: string,
  limit: number = VOICE_REPORT_LIMIT,
): string {
  if (voices.length === 0) {
    return languageFilter ? `No voices found for language: ${languageFilter}` : 'No voices available';
  }

  const lines = [`Available voices (${voices.length} total):`];
  for (const voice of voices.slice(0, limit)) {
    lines.push(`- ${voice.id}: ${voice.displayName} (${voice.gender}, ${voice.language})`);
  }
  if (voices.length > limit) {
    lines.push(`... and ${voices.length - limit} more voices`);
  }
  return lines.join('\n');
}
