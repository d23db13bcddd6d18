import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// SPEECH PIPELINE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Locale-prefixed neural voice name: `en-US-AriaNeural`,
 * `zh-CN-liaoning-XiaobeiNeural`, `sr-Latn-RS-NicholasNeural`.
 */
export const VOICE_ID_PATTERN = /^[a-z]{2,3}-[A-Za-z]{2,4}(?:-[A-Za-z0-9]+)*-[A-Za-z0-9]+Neural$/;

export const VoiceIdSchema = z.string().trim().regex(VOICE_ID_PATTERN, 'unrecognized voice identifier');

export const TextRequestSchema = z.object({
  text: z.string().refine((t) => t.trim().length > 0, 'text must not be empty'),
  voiceId: VoiceIdSchema,
});
export type TextRequest = Readonly<z.infer<typeof TextRequestSchema>>;

export interface Segment {
  readonly index: number;
  readonly content: string;
}

// ── Cache ─────────────────────────────────────────────────────────────────────

export interface CacheEntry {
  key: string;
  /** Absolute path of the artifact file */
  filePath: string;
  /** Epoch milliseconds */
  createdAt: number;
  sizeBytes: number;
  voiceId?: string;
  textPreview?: string;
  playCount: number;
  lastPlayedAt?: number;
}

/** On-disk shape of one entry; `file` is relative to the cache dir. */
export const PersistedCacheEntrySchema = z.object({
  key: z.string().regex(/^[0-9a-f]{64}$/),
  file: z.string().min(1).refine((f) => !f.includes('/') && !f.includes('\\'), 'file must be a bare name'),
  createdAt: z.string().datetime(),
  sizeBytes: z.number().int().nonnegative(),
  voiceId: z.string().optional(),
  textPreview: z.string().optional(),
  playCount: z.number().int().nonnegative().default(0),
  lastPlayedAt: z.string().datetime().optional(),
});
export type PersistedCacheEntry = z.infer<typeof PersistedCacheEntrySchema>;

export const CacheIndexFileSchema = z.object({
  version: z.literal(1),
  entries: z.array(PersistedCacheEntrySchema),
});
export type CacheIndexFile = z.infer<typeof CacheIndexFileSchema>;

export interface CachedArtifact {
  entry: CacheEntry;
  audio: Buffer;
}

/** A cached artifact whose file is held on disk until `release` resolves. */
export interface CacheLease extends CachedArtifact {
  release(): Promise<void>;
}

export interface CacheStats {
  entries: number;
  totalBytes: number;
  oldestCreatedAt?: number;
  newestCreatedAt?: number;
}

export interface StoreMetadata {
  voiceId?: string;
  text?: string;
}

// ── Voices ────────────────────────────────────────────────────────────────────

export interface VoiceInfo {
  id: string;
  displayName: string;
  language: string;
  gender: string;
}

// ── Merge ─────────────────────────────────────────────────────────────────────

export type MergeMode = 'high-quality' | 'concat';
