/**
 * Configuration Manager
 *
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { ConfigError } from '../types/errors.js';

// ============================================================================
// Types
// ============================================================================

export interface SwitchboardConfig {
  llm: {
    baseUrl: string;
    model: string;
    timeoutMs: number;
    temperature: number;
  };
  adapters: {
    jsonplaceholderBaseUrl: string;
    timeoutMs: number;
  };
  agent: {
    synthesize: boolean;
    systemPromptFile?: string;
  };
  session: {
    ttlMs: number;
    historyTurns: number;
  };
  paths: {
    homeDir: string;
    appDir: string;
    projectRoot: string;
  };
}

const positiveInt = z.number().int().positive();

const SettingsFileSchema = z
  .object({
    llm: z
      .object({
        baseUrl: z.string().url(),
        model: z.string().min(1),
        timeoutMs: positiveInt,
        temperature: z.number().min(0).max(2)
      })
      .partial(),
    adapters: z
      .object({
        jsonplaceholderBaseUrl: z.string().url(),
        timeoutMs: positiveInt
      })
      .partial(),
    agent: z
      .object({
        synthesize: z.boolean(),
        systemPromptFile: z.string().min(1)
      })
      .partial(),
    session: z
      .object({
        ttlMs: positiveInt,
        historyTurns: z.number().int().min(0)
      })
      .partial()
  })
  .partial();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  projectRoot?: string;
}

// ============================================================================
// Defaults
// ============================================================================

const DEFAULTS: Omit<SwitchboardConfig, 'paths'> = {
  llm: {
    baseUrl: 'http://localhost:11434',
    model: 'mistral',
    timeoutMs: 60_000,
    temperature: 0
  },
  adapters: {
    jsonplaceholderBaseUrl: 'https://jsonplaceholder.typicode.com',
    timeoutMs: 5_000
  },
  agent: {
    synthesize: true
  },
  session: {
    ttlMs: 30 * 60 * 1000,
    historyTurns: 6
  }
};

// ============================================================================
// Singleton Config
// ============================================================================

let config: SwitchboardConfig | null = null;
let projectRoot: string | null = null;

/**
 * Set the project root directory
 * Called once at startup before anything reads config
 */
export function setProjectRoot(root: string): void {
  projectRoot = path.resolve(root);
}

/**
 * Get the project root directory
 */
export function getProjectRoot(): string {
  if (!projectRoot) {
    projectRoot = process.cwd();
  }
  return projectRoot;
}

/**
 * Get Switchboard home directory (~/.switchboard)
 */
export function getAppDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.switchboard');
}

/**
 * Directory the JSONL session logs go to
 */
export function getLogsDir(cfg: SwitchboardConfig): string {
  return path.join(cfg.paths.projectRoot, '.switchboard', 'logs');
}

/**
 * Ensure Switchboard directories exist
 */
export function ensureAppDirs(cfg: SwitchboardConfig): void {
  for (const dir of [cfg.paths.appDir, getLogsDir(cfg)]) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}

/**
 * Load and validate a settings file. A missing file yields null.
 */
function loadSettingsFile(filePath: string): SettingsFile | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`${filePath} is not valid JSON`, { cause: error });
  }

  const parsed = SettingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid settings in ${filePath}: ${issues}`);
  }
  return parsed.data;
}

function applySettings(target: SwitchboardConfig, settings: SettingsFile, baseDir: string): void {
  Object.assign(target.llm, settings.llm);
  Object.assign(target.adapters, settings.adapters);
  Object.assign(target.session, settings.session);

  if (settings.agent?.synthesize !== undefined) {
    target.agent.synthesize = settings.agent.synthesize;
  }
  if (settings.agent?.systemPromptFile) {
    target.agent.systemPromptFile = path.resolve(baseDir, settings.agent.systemPromptFile);
  }
}

function readEnvUrl(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  if (!value) return undefined;
  if (!z.string().url().safeParse(value).success) {
    throw new ConfigError(`${name} must be a valid URL, got "${value}"`);
  }
  return value;
}

function readEnvMs(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer (milliseconds), got "${value}"`);
  }
  return parsed;
}

function applyEnv(target: SwitchboardConfig, env: NodeJS.ProcessEnv): void {
  target.llm.baseUrl = readEnvUrl(env, 'LLM_BASE_URL') ?? target.llm.baseUrl;
  target.llm.model = env.LLM_MODEL || target.llm.model;
  target.llm.timeoutMs = readEnvMs(env, 'LLM_TIMEOUT_MS') ?? target.llm.timeoutMs;
  target.adapters.jsonplaceholderBaseUrl =
    readEnvUrl(env, 'JSONPLACEHOLDER_BASE_URL') ?? target.adapters.jsonplaceholderBaseUrl;
  target.adapters.timeoutMs = readEnvMs(env, 'ADAPTER_TIMEOUT_MS') ?? target.adapters.timeoutMs;
  if (env.SYSTEM_PROMPT_FILE) {
    target.agent.systemPromptFile = path.resolve(target.paths.projectRoot, env.SYSTEM_PROMPT_FILE);
  }
}

/**
 * Load configuration
 * Priority: env > project .switchboard/config.json > ~/.switchboard/settings.json > defaults
 */
export function loadConfig(options: LoadConfigOptions = {}): SwitchboardConfig {
  const homeDir = options.homeDir ?? os.homedir();
  const appDir = getAppDir(homeDir);
  const root = options.projectRoot ? path.resolve(options.projectRoot) : getProjectRoot();
  const env = options.env ?? process.env;

  const next: SwitchboardConfig = {
    llm: { ...DEFAULTS.llm },
    adapters: { ...DEFAULTS.adapters },
    agent: { ...DEFAULTS.agent },
    session: { ...DEFAULTS.session },
    paths: {
      homeDir,
      appDir,
      projectRoot: root
    }
  };

  const userSettings = loadSettingsFile(path.join(appDir, 'settings.json'));
  if (userSettings) {
    applySettings(next, userSettings, appDir);
  }

  const projectDir = path.join(root, '.switchboard');
  const projectConfig = loadSettingsFile(path.join(projectDir, 'config.json'));
  if (projectConfig) {
    applySettings(next, projectConfig, projectDir);
  }

  applyEnv(next, env);

  config = next;
  return config;
}

/**
 * Get current config (loads if not already loaded)
 */
export function getConfig(): SwitchboardConfig {
  return config ?? loadConfig();
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  config = null;
  projectRoot = null;
}
