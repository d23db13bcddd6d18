import { Command } from 'commander';
import { registerCacheCommand } from './commands/cache.js';
import { registerDoctorCommand } from './commands/doctor.js';
import { registerSpeakCommand } from './commands/speak.js';
import { registerVoicesCommand } from './commands/voices.js';
import { openService, type ServiceFactory } from './service.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM SETUP
// ═══════════════════════════════════════════════════════════════════════════

export function createProgram(getService: ServiceFactory = openService): Command {
  const program = new Command();

  program
    .name('voxpipe')
    .description('Long-form text to speech with caching, retries and seamless merging')
    .version('1.0.0');

  registerSpeakCommand(program, getService);
  registerVoicesCommand(program, getService);
  registerCacheCommand(program, getService);
  registerDoctorCommand(program, getService);

  return program;
}
