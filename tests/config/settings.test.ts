import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  clearSettingsCache,
  defaultSettings,
  findSettingsFile,
  getAgentPrompt,
  getModelConfig,
  loadSettings,
  parseSettings,
} from '../../src/config/settings.js';
import { SettingsError } from '../../src/errors.js';

describe('Settings', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kitchen-settings-'));
    clearSettingsCache();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    clearSettingsCache();
  });

  describe('loadSettings', () => {
    it('should read and validate a YAML file', () => {
      const path = join(dir, 'app_settings.yaml');
      writeFileSync(
        path,
        [
          'models:',
          '  default:',
          '    name: qwen2.5:7b',
          'orchestration:',
          '  max_retries: 1',
          '  parallel_dispatch: true',
        ].join('\n')
      );

      const settings = loadSettings(path);

      expect(settings.models.default).toEqual({ name: 'qwen2.5:7b', temperature: 0 });
      expect(settings.orchestration.max_retries).toBe(1);
      expect(settings.orchestration.parallel_dispatch).toBe(true);
      expect(settings.shopping.currency).toBe('INR');
    });

    it('should cache settings per path', () => {
      const path = join(dir, 'app_settings.yaml');
      writeFileSync(path, 'intent:\n  history_turns: 2\n');

      const first = loadSettings(path);
      writeFileSync(path, 'intent:\n  history_turns: 9\n');

      expect(loadSettings(path)).toBe(first);
      clearSettingsCache();
      expect(loadSettings(path).intent.history_turns).toBe(9);
    });

    it('should throw for a missing explicit path', () => {
      const path = join(dir, 'missing.yaml');
      expect(() => loadSettings(path)).toThrow(`Configuration file not found: ${path}`);
    });

    it('should throw for invalid YAML', () => {
      const path = join(dir, 'app_settings.yaml');
      writeFileSync(path, 'models: [unclosed');

      expect(() => loadSettings(path)).toThrow(SettingsError);
    });

    it('should list every invalid field', () => {
      const path = join(dir, 'app_settings.yaml');
      writeFileSync(path, 'orchestration:\n  max_retries: -1\n');

      expect(() => loadSettings(path)).toThrow(
        `Invalid configuration in ${path}:\n  - orchestration.max_retries: Number must be greater than or equal to 0`
      );
    });
  });

  describe('findSettingsFile', () => {
    it('should search parent directories', () => {
      const nested = join(dir, 'a', 'b');
      mkdirSync(nested, { recursive: true });
      writeFileSync(join(dir, 'app_settings.yaml'), '{}');

      expect(findSettingsFile(nested)).toBe(join(dir, 'app_settings.yaml'));
    });
  });

  describe('parseSettings', () => {
    it('should treat null as an empty document', () => {
      expect(parseSettings(null)).toEqual(defaultSettings());
    });
  });

  describe('getModelConfig', () => {
    it('should merge role overrides over the default model', () => {
      const settings = parseSettings({
        models: {
          default: { name: 'base', temperature: 0.2 },
          roles: { intent_resolver: { temperature: 0 }, shopping: { name: 'fast' } },
        },
      });

      expect(getModelConfig('intent_resolver', settings)).toEqual({ name: 'base', temperature: 0 });
      expect(getModelConfig('shopping', settings)).toEqual({ name: 'fast', temperature: 0.2 });
      expect(getModelConfig('recipe', settings)).toEqual({ name: 'base', temperature: 0.2 });
    });
  });

  describe('getAgentPrompt', () => {
    it('should substitute variables', () => {
      const settings = parseSettings({
        agent_prompts: { shopping: 'Compare prices in {currency}. Always {currency}.' },
      });

      expect(getAgentPrompt('shopping', settings, { currency: 'INR' })).toBe(
        'Compare prices in INR. Always INR.'
      );
      expect(getAgentPrompt('recipe', settings)).toBeUndefined();
    });
  });
});
