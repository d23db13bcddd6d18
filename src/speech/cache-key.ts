import { createHash } from 'node:crypto';

/**
 * NFC, whitespace runs collapsed to one space, trimmed. Two texts that read
 * the same aloud share a key.
 */
export function normalizeText(text: string): string {
  return text.normalize('NFC').replace(/\s+/g, ' ').trim();
}

/**
 * SHA-256 of the normalized (voice, text) pair, hex encoded. Whole texts and
 * single segments use the same composition, so a segment that equals an
 * earlier whole text reuses its artifact.
 */
export function cacheKey(text: string, voiceId: string): string {
  return createHash('sha256')
    .update(`${voiceId.trim()}\u0000${normalizeText(text)}`)
    .digest('hex');
}
