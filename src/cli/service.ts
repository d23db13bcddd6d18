import { SpeechService, type SpeechServiceDeps } from '../speech/service.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CLI SERVICE FACTORY
// ═══════════════════════════════════════════════════════════════════════════════

export type ServiceFactory = (deps?: SpeechServiceDeps) => Promise<SpeechService>;

export const openService: ServiceFactory = async (deps = {}) => {
  const service = new SpeechService();
  await service.initialize(deps);
  return service;
};

export function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
