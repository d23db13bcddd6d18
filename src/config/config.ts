/**
 * voxpipe — Configuration Management
 *
 * Handles loading, validation, and path resolution for all configuration.
 * Environment variables override the config file, which overrides defaults.
 *
 * @module config
 * @version 1.0.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { type Config, ConfigSchema, type Result, ok, err, LogLevelSchema, MergeModeSchema } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_BASE_DIR = path.join(os.homedir(), '.voxpipe');

export const DEFAULT_CONFIG: Config = {
  chunking: {
    max_chunk_size: 1200,
    min_chunk_size: 50,
  },
  cache: {
    max_files: 50,
    retention_hours: 168,
    store_segments: true,
  },
  retry: {
    max_attempts: 3,
    base_delay_ms: 1000,
    max_delay_ms: 10_000,
    jitter_ms: 1000,
  },
  synthesis: {
    region: 'eastus',
    output_format: 'audio-24khz-48kbitrate-mono-mp3',
    timeout_ms: 30_000,
    max_concurrency: 2,
  },
  voice: {
    default_voice: 'en-US-AriaNeural',
    catalog_ttl_ms: 3_600_000,
  },
  merge: {
    mode: 'auto',
    gap_ms: 200,
    ffmpeg_path: 'ffmpeg',
  },
  playback: {
    timeout_ms: 300_000,
  },
  paths: {
    base_dir: DEFAULT_BASE_DIR,
    cache_dir: 'cache',
    config_file: 'config.json',
  },
  logging: {
    level: 'info',
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

export function getBaseDir(config?: Partial<Config>): string {
  const fromEnv = process.env.VOXPIPE_HOME;
  if (config?.paths?.base_dir === undefined && fromEnv) {
    return expandPath(fromEnv);
  }
  return expandPath(config?.paths?.base_dir ?? DEFAULT_CONFIG.paths.base_dir);
}

export function getPath(relativePath: string, config?: Partial<Config>): string {
  return path.join(getBaseDir(config), relativePath);
}

export function getConfigPath(config?: Partial<Config>): string {
  return getPath(config?.paths?.config_file ?? DEFAULT_CONFIG.paths.config_file, config);
}

/**
 * Audio cache directory. `cache.dir` wins when set; a relative value is
 * resolved against the base dir like every other path.
 */
export function getCacheDir(config?: Partial<Config>): string {
  const explicit = config?.cache?.dir;
  if (explicit !== undefined) {
    const expanded = expandPath(explicit);
    return path.isAbsolute(expanded) ? expanded : getPath(expanded, config);
  }
  return getPath(config?.paths?.cache_dir ?? DEFAULT_CONFIG.paths.cache_dir, config);
}

// ═══════════════════════════════════════════════════════════════════════════
// DIRECTORY ACCESS
// ═══════════════════════════════════════════════════════════════════════════

export function checkDirectoryAccess(dir: string): Result<void, Error> {
  try {
    if (!fs.existsSync(dir)) {
      return err(new Error(`Directory does not exist: ${dir}`));
    }

    const testFile = path.join(dir, `.write-test-${Date.now()}`);
    fs.writeFileSync(testFile, 'test', { mode: 0o600 });
    fs.unlinkSync(testFile);

    return ok(undefined);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Environment overrides, applied after the file and before validation.
 */
export function applyEnvOverrides(config: PlainObject, env: NodeJS.ProcessEnv = process.env): PlainObject {
  const overrides: PlainObject = {};

  if (env.VOXPIPE_HOME) {
    overrides.paths = { base_dir: env.VOXPIPE_HOME };
  }

  const level = LogLevelSchema.safeParse(env.VOXPIPE_LOG_LEVEL);
  if (level.success) {
    overrides.logging = { level: level.data };
  }

  if (env.AZURE_SPEECH_REGION) {
    overrides.synthesis = { region: env.AZURE_SPEECH_REGION };
  }

  const mergeMode = MergeModeSchema.safeParse(env.VOXPIPE_MERGE_MODE);
  if (mergeMode.success) {
    overrides.merge = { mode: mergeMode.data };
  }

  return deepMerge(config, overrides);
}

/**
 * Load configuration from file, merge with defaults and environment.
 */
export function loadConfig(customPath?: string, env: NodeJS.ProcessEnv = process.env): Result<Config, Error> {
  try {
    const configPath = customPath ?? getConfigPath();
    const expandedPath = expandPath(configPath);

    let userConfig: PlainObject = {};

    if (fs.existsSync(expandedPath)) {
      const content = fs.readFileSync(expandedPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (!isPlainObject(parsed)) {
        return err(new Error(`Invalid configuration: ${expandedPath} must contain a JSON object`));
      }
      userConfig = parsed;
    }

    const merged = applyEnvOverrides(deepMerge({ ...DEFAULT_CONFIG }, userConfig), env);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      return err(new Error(`Invalid configuration: ${result.error.message}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLETON PATTERN
// ═══════════════════════════════════════════════════════════════════════════

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig === null) {
    const result = loadConfig();
    cachedConfig = result.success ? result.data : DEFAULT_CONFIG;
  }
  return cachedConfig;
}
