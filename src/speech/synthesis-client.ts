import { z } from 'zod';
import { createLogger, redact } from '../kernel/logger.js';
import type { Config } from '../types/index.js';
import {
  CancelledError,
  ConfigurationError,
  RemoteRejectedError,
  TransientNetworkError,
  UnsupportedVoiceError,
  errorMessage,
} from './errors.js';
import type { VoiceInfo } from './types.js';

const log = createLogger('synthesis-client');

// ═══════════════════════════════════════════════════════════════════════════════
// SYNTHESIS CLIENT (Azure neural voices REST API)
// ═══════════════════════════════════════════════════════════════════════════════

export interface SynthesizeOptions {
  signal?: AbortSignal;
}

/** One network call per segment; raw audio bytes or a classified failure. */
export interface SynthesisClient {
  synthesize(text: string, voiceId: string, options?: SynthesizeOptions): Promise<Buffer>;
}

export interface VoiceSource {
  fetchVoices(signal?: AbortSignal): Promise<VoiceInfo[]>;
}

export interface AzureSpeechClientOptions {
  apiKey?: string;
  region: string;
  /** Overrides `https://<region>.tts.speech.microsoft.com` */
  endpoint?: string;
  outputFormat: string;
  timeoutMs: number;
}

const RemoteVoiceSchema = z.object({
  ShortName: z.string(),
  DisplayName: z.string().optional(),
  Locale: z.string(),
  Gender: z.string().optional(),
});

const RemoteVoiceListSchema = z.array(RemoteVoiceSchema);

const MAX_DETAIL_LENGTH = 200;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** `en-US-AriaNeural` → `en-US` */
export function voiceLocale(voiceId: string): string {
  return voiceId.split('-').slice(0, 2).join('-');
}

export function buildSsml(text: string, voiceId: string): string {
  return (
    `<speak version='1.0' xml:lang='${voiceLocale(voiceId)}'>` +
    `<voice name='${escapeXml(voiceId)}'>${escapeXml(text)}</voice>` +
    `</speak>`
  );
}

export class AzureSpeechClient implements SynthesisClient, VoiceSource {
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly outputFormat: string;
  private readonly timeoutMs: number;

  constructor(options: AzureSpeechClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.endpoint ?? `https://${options.region}.tts.speech.microsoft.com`).replace(/\/+$/, '');
    this.outputFormat = options.outputFormat;
    this.timeoutMs = options.timeoutMs;
  }

  static fromConfig(config: Config, env: NodeJS.ProcessEnv = process.env): AzureSpeechClient {
    const options: AzureSpeechClientOptions = {
      apiKey: env.AZURE_SPEECH_KEY,
      region: config.synthesis.region,
      endpoint: config.synthesis.endpoint,
      outputFormat: config.synthesis.output_format,
      timeoutMs: config.synthesis.timeout_ms,
    };
    log.debug(redact({ ...options }), 'Synthesis client configured');
    return new AzureSpeechClient(options);
  }

  // ── Synthesis ──────────────────────────────────────────────────────

  async synthesize(text: string, voiceId: string, options: SynthesizeOptions = {}): Promise<Buffer> {
    const apiKey = this.requireKey();
    const response = await this.send(
      `${this.baseUrl}/cognitiveservices/v1`,
      {
        method: 'POST',
        headers: {
          'Ocp-Apim-Subscription-Key': apiKey,
          'Content-Type': 'application/ssml+xml',
          'X-Microsoft-OutputFormat': this.outputFormat,
          'User-Agent': 'voxpipe',
        },
        body: buildSsml(text, voiceId),
      },
      options.signal,
    );

    if (!response.ok) {
      const detail = await readDetail(response);
      throw classifyFailure(response.status, detail, voiceId);
    }

    const audio = Buffer.from(await response.arrayBuffer());
    if (audio.length === 0) {
      throw new TransientNetworkError('Synthesis service returned no audio', response.status);
    }

    log.debug({ voiceId, chars: text.length, bytes: audio.length }, 'Segment synthesized');
    return audio;
  }

  // ── Voices ─────────────────────────────────────────────────────────

  async fetchVoices(signal?: AbortSignal): Promise<VoiceInfo[]> {
    const apiKey = this.requireKey();
    const response = await this.send(
      `${this.baseUrl}/cognitiveservices/voices/list`,
      {
        method: 'GET',
        headers: { 'Ocp-Apim-Subscription-Key': apiKey },
      },
      signal,
    );

    if (!response.ok) {
      const detail = await readDetail(response);
      if (isTransientStatus(response.status)) {
        throw new TransientNetworkError(`Voice list request failed: ${response.status} ${detail}`.trim(), response.status);
      }
      throw new RemoteRejectedError(`Voice list request rejected: ${response.status} ${detail}`.trim(), response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RemoteRejectedError(`Voice list is not valid JSON: ${errorMessage(error)}`, response.status);
    }

    const parsed = RemoteVoiceListSchema.safeParse(body);
    if (!parsed.success) {
      throw new RemoteRejectedError('Voice list has an unexpected format', response.status);
    }

    return parsed.data.map((voice) => ({
      id: voice.ShortName,
      displayName: voice.DisplayName ?? voice.ShortName,
      language: voice.Locale,
      gender: voice.Gender ?? 'Unknown',
    }));
  }

  // ── Internals ──────────────────────────────────────────────────────

  private requireKey(): string {
    if (!this.apiKey) {
      throw new ConfigurationError('Speech key not configured. Set AZURE_SPEECH_KEY environment variable.');
    }
    return this.apiKey;
  }

  private async send(url: string, init: RequestInit, signal?: AbortSignal): Promise<Response> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    try {
      return await fetch(url, {
        ...init,
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      if (timeout.aborted) {
        throw new TransientNetworkError(`Synthesis request timed out after ${this.timeoutMs}ms`, undefined, error);
      }
      throw new TransientNetworkError(`Synthesis request failed: ${errorMessage(error)}`, undefined, error);
    }
  }
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

async function readDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  return text.trim().slice(0, MAX_DETAIL_LENGTH);
}

export function classifyFailure(status: number, detail: string, voiceId: string): Error {
  if (isTransientStatus(status)) {
    return new TransientNetworkError(`Synthesis service returned ${status}${detail ? `: ${detail}` : ''}`, status);
  }
  if (status === 404 || (status === 400 && /voice/i.test(detail))) {
    return new UnsupportedVoiceError(voiceId, detail || `service returned ${status}`);
  }
  return new RemoteRejectedError(`Synthesis request rejected with ${status}${detail ? `: ${detail}` : ''}`, status);
}
