import type { Command } from 'commander';
import { formatVoiceList } from '../../speech/voice-catalog.js';
import { errorText, openService, type ServiceFactory } from '../service.js';

// ═══════════════════════════════════════════════════════════════════════════════
// VOICES CLI COMMAND
// ═══════════════════════════════════════════════════════════════════════════════

export function registerVoicesCommand(program: Command, getService: ServiceFactory = openService): void {
  program
    .command('voices [language]')
    .description('List available voices, optionally filtered by locale (e.g. en, en-GB)')
    .action(async (language: string | undefined) => {
      try {
        const service = await getService({ player: null });
        try {
          const voices = await service.listVoices(language);
          console.log(formatVoiceList(voices, language));
        } finally {
          await service.shutdown();
        }
      } catch (error) {
        console.error(`Error: ${errorText(error)}`);
        process.exitCode = 1;
      }
    });
}
