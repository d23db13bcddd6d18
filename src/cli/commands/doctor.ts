import type { Command } from 'commander';
import { errorText, openService, type ServiceFactory } from '../service.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DOCTOR CLI COMMAND
// ═══════════════════════════════════════════════════════════════════════════════

export function registerDoctorCommand(program: Command, getService: ServiceFactory = openService): void {
  program
    .command('doctor')
    .description('Check synthesis key, cache directory, ffmpeg and audio player')
    .action(async () => {
      process.stdout.write('voxpipe doctor\n');
      process.stdout.write('==============\n\n');

      try {
        const service = await getService();
        try {
          const report = await service.healthCheck();
          for (const check of report.checks) {
            const tag = check.ok ? 'PASS' : check.required ? 'FAIL' : 'WARN';
            process.stdout.write(`  [${tag}] ${check.name}: ${check.details}\n`);
          }
          process.stdout.write(report.healthy ? '\nAll required checks passed.\n' : '\nSome required checks failed.\n');
          if (!report.healthy) {
            process.exitCode = 1;
          }
        } finally {
          await service.shutdown();
        }
      } catch (error) {
        process.stderr.write(`Error: ${errorText(error)}\n`);
        process.exitCode = 1;
      }
    });
}
