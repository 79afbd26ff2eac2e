import { homedir, platform } from 'os';
import { join, dirname } from 'path';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { fileURLToPath } from 'url';
import YAML from 'yaml';
import { z } from 'zod';
import { isLogLevel, LOG_LEVELS } from './utils/logger.js';

function getPackageVersion(): string {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = dirname(__filename);
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    const parsed = z.object({ version: z.string() }).safeParse(pkg);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export const VERSION = getPackageVersion();

const MediaAnalyzerSchema = z.object({
  enabled: z.boolean().default(true),
  model: z.string().default('default'),
  maxDurationSeconds: z.number().positive().default(600),
});

const ConfigSchema = z.object({
  version: z.number().default(1),
  logging: z.object({
    level: z.enum(LOG_LEVELS).default('info'),
  }).default({}),
  analysis: z.object({
    execution: z.enum(['inline', 'background']).default('inline'),
    maxTextLength: z.number().int().positive().default(1_000_000),
    maxFileSize: z.number().int().positive().default(100 * 1024 * 1024),
  }).default({}),
  analyzers: z.object({
    text: z.object({
      enabled: z.boolean().default(true),
      model: z.string().default('heuristic'),
    }).default({}),
    audio: MediaAnalyzerSchema.default({}),
    video: MediaAnalyzerSchema.extend({
      keyFrameCount: z.number().int().min(0).default(5),
    }).default({}),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export type ExecutionMode = Config['analysis']['execution'];

export interface AppPaths {
  configDir: string;
  configFile: string;
}

export function getAppPaths(): AppPaths {
  let configDir: string;

  if (platform() === 'win32') {
    const appData = process.env.APPDATA || join(homedir(), 'AppData', 'Roaming');
    configDir = join(appData, 'contentlens');
  } else {
    configDir = join(process.env.XDG_CONFIG_HOME || join(homedir(), '.config'), 'contentlens');
  }

  return {
    configDir,
    configFile: join(configDir, 'config.yaml'),
  };
}

export function parseConfig(input: unknown): Config {
  return ConfigSchema.parse(input ?? {});
}

/**
 * Load configuration from YAML. A missing file yields defaults; a file that
 * exists but does not validate is an error.
 */
export function loadConfig(configFile = getAppPaths().configFile): Config {
  if (!existsSync(configFile)) {
    return applyEnvOverrides(parseConfig({}));
  }

  const content = readFileSync(configFile, 'utf-8');
  const parsed: unknown = YAML.parse(content);
  return applyEnvOverrides(parseConfig(parsed));
}

export function saveConfig(config: Config, configFile = getAppPaths().configFile): void {
  const dir = dirname(configFile);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(configFile, YAML.stringify(config), 'utf-8');
}

/**
 * Environment overrides: CONTENTLENS_LOG_LEVEL, CONTENTLENS_EXECUTION and
 * CONTENTLENS_MAX_DURATION (audio and video).
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const result: Config = {
    ...config,
    logging: { ...config.logging },
    analysis: { ...config.analysis },
    analyzers: {
      text: { ...config.analyzers.text },
      audio: { ...config.analyzers.audio },
      video: { ...config.analyzers.video },
    },
  };

  const level = env.CONTENTLENS_LOG_LEVEL?.toLowerCase();
  if (level) {
    if (!isLogLevel(level)) {
      throw new Error(`Invalid CONTENTLENS_LOG_LEVEL: ${env.CONTENTLENS_LOG_LEVEL}`);
    }
    result.logging.level = level;
  }

  const execution = env.CONTENTLENS_EXECUTION?.toLowerCase();
  if (execution) {
    if (execution !== 'inline' && execution !== 'background') {
      throw new Error(`Invalid CONTENTLENS_EXECUTION: ${env.CONTENTLENS_EXECUTION}`);
    }
    result.analysis.execution = execution;
  }

  if (env.CONTENTLENS_MAX_DURATION) {
    const seconds = Number(env.CONTENTLENS_MAX_DURATION);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new Error(`Invalid CONTENTLENS_MAX_DURATION: ${env.CONTENTLENS_MAX_DURATION}`);
    }
    result.analyzers.audio.maxDurationSeconds = seconds;
    result.analyzers.video.maxDurationSeconds = seconds;
  }

  return result;
}

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
