import type { Command } from 'commander';
import { describeReport } from '../../speech/pipeline.js';
import { errorText, openService, type ServiceFactory } from '../service.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SPEAK CLI COMMAND
// ═══════════════════════════════════════════════════════════════════════════════

interface SpeakCommandOptions {
  voice?: string;
  output?: string;
  play: boolean;
}

export function registerSpeakCommand(program: Command, getService: ServiceFactory = openService): void {
  program
    .command('speak <text...>')
    .description('Convert text to speech and play it')
    .option('-v, --voice <voiceId>', 'Neural voice name, e.g. en-US-AriaNeural')
    .option('-o, --output <path>', 'Save audio to file')
    .option('--no-play', 'Skip playback')
    .action(async (textParts: string[], options: SpeakCommandOptions) => {
      try {
        const service = await getService();
        const controller = new AbortController();
        const onInterrupt = (): void => {
          controller.abort();
          void service.stop();
        };
        process.once('SIGINT', onInterrupt);

        try {
          const report = await service.speak(textParts.join(' '), {
            voiceId: options.voice,
            play: options.play,
            outputPath: options.output,
            signal: controller.signal,
          });

          console.log(describeReport(report));
          if (report.state === 'FAILED') {
            process.exitCode = 1;
          } else if (options.output) {
            console.log(`Audio saved to: ${options.output}`);
          }
        } finally {
          process.removeListener('SIGINT', onInterrupt);
          await service.shutdown();
        }
      } catch (error) {
        console.error(`Error: ${errorText(error)}`);
        process.exitCode = 1;
      }
    });
}
