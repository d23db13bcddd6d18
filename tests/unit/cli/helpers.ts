import { DEFAULT_CONFIG } from '../../../src/config/config.js';
import type { ServiceFactory } from '../../../src/cli/service.js';
import { ConcatMergeStrategy } from '../../../src/speech/audio-merger.js';
import { SpeechService, type SpeechServiceDeps } from '../../../src/speech/service.js';
import type { VoiceInfo } from '../../../src/speech/types.js';

export const TEST_VOICES: VoiceInfo[] = [
  { id: 'en-US-AriaNeural', displayName: 'Aria', language: 'en-US', gender: 'Female' },
  { id: 'de-DE-ConradNeural', displayName: 'Conrad', language: 'de-DE', gender: 'Male' },
];

/**
 * Service factory over a temp base dir: synthesis echoes the text as audio,
 * merging concatenates and playback is off unless a test supplies a player.
 */
export function createTestFactory(baseDir: string, defaults: Partial<SpeechServiceDeps> = {}): ServiceFactory {
  return async (deps = {}) => {
    const service = new SpeechService();
    await service.initialize({
      config: { ...DEFAULT_CONFIG, paths: { ...DEFAULT_CONFIG.paths, base_dir: baseDir } },
      env: { AZURE_SPEECH_KEY: 'test-secret' },
      client: { synthesize: async (text: string) => Buffer.from(text) },
      voiceSource: { fetchVoices: async () => TEST_VOICES },
      player: null,
      mergeStrategy: new ConcatMergeStrategy(),
      ...defaults,
      ...deps,
    });
    return service;
  };
}

export function output(calls: ReadonlyArray<readonly unknown[]>): string[] {
  return calls.map((args) => args.map(String).join(' '));
}
