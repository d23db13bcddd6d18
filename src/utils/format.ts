/**
 * Text formatting utilities for CLI output
 */

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB'];

/**
 * Human-readable size with one decimal above bytes: 512 B, 1.5 KB, 2.0 MB.
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

/** `2026-01-02 03:04` in UTC */
export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 16).replace('T', ' ');
}

/**
 * Pad or cut to exactly `width` characters, marking cuts with `…`.
 */
export function fitColumn(text: string, width: number): string {
  if (text.length > width) {
    return `${text.slice(0, Math.max(0, width - 1))}…`;
  }
  return text.padEnd(width);
}
