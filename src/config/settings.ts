/**
 * Settings Loader
 *
 * Loads and caches application configuration from app_settings.yaml. Searches
 * for the config file starting from the current directory up to root. Provides
 * helpers to resolve per-role model configs and system prompt overrides.
 *
 * Dependencies:
 * - yaml: YAML parser for reading configuration files
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { SettingsError } from '../errors.js';
import { AppSettingsSchema, type AppSettings, type ModelConfig, type ModelRole } from './schema.js';

export const DEFAULT_SETTINGS_FILENAME = 'app_settings.yaml';

let cachedSettings: AppSettings | null = null;
let settingsPath: string | null = null;

export function findSettingsFile(startDir: string = process.cwd()): string | null {
  let dir = resolve(startDir);

  for (;;) {
    const candidate = resolve(dir, DEFAULT_SETTINGS_FILENAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Validate an already-parsed settings document.
 */
export function parseSettings(raw: unknown, source = 'settings'): AppSettings {
  const result = AppSettingsSchema.safeParse(raw ?? {});

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new SettingsError(`Invalid configuration in ${source}:\n${errors}`);
  }

  return result.data;
}

/**
 * Load settings from `path`, or from the nearest app_settings.yaml. Without a
 * file the schema defaults apply.
 */
export function loadSettings(path?: string): AppSettings {
  const configPath = path ?? findSettingsFile();

  if (!configPath) {
    return defaultSettings();
  }

  if (cachedSettings && settingsPath === configPath) {
    return cachedSettings;
  }

  if (!existsSync(configPath)) {
    throw new SettingsError(`Configuration file not found: ${configPath}`);
  }

  const content = readFileSync(configPath, 'utf-8');
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new SettingsError(
      `Invalid YAML in ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const settings = parseSettings(raw, configPath);
  cachedSettings = settings;
  settingsPath = configPath;

  return settings;
}

export function defaultSettings(): AppSettings {
  return AppSettingsSchema.parse({});
}

export function getModelConfig(role: ModelRole, settings: AppSettings): ModelConfig {
  const override = settings.models.roles[role];
  return {
    name: override?.name ?? settings.models.default.name,
    temperature: override?.temperature ?? settings.models.default.temperature,
  };
}

export function getAgentPrompt(
  role: ModelRole,
  settings: AppSettings,
  variables?: Record<string, string>
): string | undefined {
  let prompt = settings.agent_prompts[role];

  if (prompt && variables) {
    for (const [key, value] of Object.entries(variables)) {
      prompt = prompt.replace(new RegExp(`\\{${key}\\}`, 'g'), value);
    }
  }

  return prompt;
}

export function clearSettingsCache(): void {
  cachedSettings = null;
  settingsPath = null;
}

/**
 * Get the settings file path in use, if any
 */
export function getSettingsPath(): string | null {
  return settingsPath ?? findSettingsFile();
}
