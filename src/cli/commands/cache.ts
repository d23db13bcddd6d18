import type { Command } from 'commander';
import type { SpeechService } from '../../speech/service.js';
import type { CacheEntry } from '../../speech/types.js';
import { fitColumn, formatBytes, formatTimestamp } from '../../utils/format.js';
import { errorText, openService, type ServiceFactory } from '../service.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CACHE CLI COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

export function formatCacheEntry(entry: CacheEntry): string {
  const plays = entry.lastPlayedAt !== undefined
    ? `${entry.playCount} plays, last ${formatTimestamp(entry.lastPlayedAt)}`
    : `${entry.playCount} plays`;
  return [
    entry.key.slice(0, 12),
    fitColumn(entry.voiceId ?? '-', 24),
    formatBytes(entry.sizeBytes).padStart(9),
    formatTimestamp(entry.createdAt),
    plays,
    entry.textPreview ? `"${entry.textPreview}"` : '',
  ].join('  ').trimEnd();
}

async function withService(
  getService: ServiceFactory,
  fn: (service: SpeechService) => Promise<void> | void,
): Promise<void> {
  try {
    const service = await getService({ player: null });
    try {
      await fn(service);
    } finally {
      await service.shutdown();
    }
  } catch (error) {
    console.error(`Error: ${errorText(error)}`);
    process.exitCode = 1;
  }
}

export function registerCacheCommand(program: Command, getService: ServiceFactory = openService): void {
  const cacheCmd = program.command('cache').description('Inspect and maintain the audio cache');

  cacheCmd
    .command('list')
    .description('List cached audio, newest first')
    .action(() =>
      withService(getService, (service) => {
        const entries = service.cacheEntries();
        if (entries.length === 0) {
          console.log('Cache is empty');
          return;
        }
        const stats = service.cacheStats();
        console.log(`Cached audio (${stats.entries} entries, ${formatBytes(stats.totalBytes)}):`);
        for (const entry of entries) {
          console.log(`  ${formatCacheEntry(entry)}`);
        }
      }),
    );

  cacheCmd
    .command('prune')
    .description('Evict entries past retention or over capacity')
    .action(() =>
      withService(getService, async (service) => {
        const removed = await service.pruneCache();
        console.log(`Pruned ${removed.length} ${removed.length === 1 ? 'entry' : 'entries'}`);
      }),
    );

  cacheCmd
    .command('clear')
    .description('Remove every cached artifact')
    .action(() =>
      withService(getService, async (service) => {
        const count = await service.clearCache();
        console.log(`Removed ${count} ${count === 1 ? 'entry' : 'entries'}`);
      }),
    );
}
