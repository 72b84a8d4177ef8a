import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigManager } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('ConfigManager', () => {
  let root: string;
  let globalDir: string;
  let projectDir: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'cadence-config-'));
    globalDir = join(root, 'global');
    projectDir = join(root, 'project');
    mkdirSync(globalDir);
    mkdirSync(projectDir);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function manager(env: NodeJS.ProcessEnv = {}): ConfigManager {
    return new ConfigManager({ globalDir, projectDir, env });
  }

  it('falls back to defaults when no files exist', () => {
    const config = manager().load();

    expect(config.timing).toEqual({ highLoadThreshold: 0.8, minSpacingMinutes: 30, dailyCap: 8 });
    expect(config.selection.weights).toEqual({
      personalityFit: 0.3,
      cognitiveCost: 0.3,
      learnedWeight: 0.3,
      recency: 0.1,
    });
    expect(config.feedback).toEqual({ alpha: 0.3, signal: 'effectiveness' });
    expect(config.storage.driver).toBe('memory');
    expect(config.api.port).toBe(4310);
  });

  it('layers project config over global config', () => {
    writeFileSync(join(globalDir, 'config.yaml'), 'timing:\n  dailyCap: 5\n  minSpacingMinutes: 10\n');
    writeFileSync(join(projectDir, '.cadence.yaml'), 'timing:\n  dailyCap: 3\n');

    const config = manager().load();

    expect(config.timing.dailyCap).toBe(3);
    expect(config.timing.minSpacingMinutes).toBe(10);
  });

  it('applies environment variables', () => {
    const config = manager({
      CADENCE_PORT: '5050',
      CADENCE_API_KEY: 'test-secret',
      CADENCE_DB_PATH: '/tmp/cadence-test.db',
      CADENCE_LOG_LEVEL: 'warn',
    }).load();

    expect(config.api.port).toBe(5050);
    expect(config.api.apiKey).toBe('test-secret');
    expect(config.storage).toEqual({ driver: 'sqlite', dbPath: '/tmp/cadence-test.db' });
    expect(config.logging.level).toBe('warn');
  });

  it('lets explicit overrides win over the environment', () => {
    const config = manager({ CADENCE_PORT: '5050' }).load({ api: { port: 6060 } });
    expect(config.api.port).toBe(6060);
  });

  it('rejects a non-numeric port', () => {
    expect(() => manager({ CADENCE_PORT: 'abc' }).load()).toThrow(ConfigError);
  });

  it('rejects selection weights that do not sum to 1', () => {
    writeFileSync(
      join(projectDir, '.cadence.yaml'),
      'selection:\n  weights:\n    personalityFit: 0.5\n    cognitiveCost: 0.5\n    learnedWeight: 0.5\n    recency: 0.1\n',
    );

    expect(() => manager().load()).toThrow(/selection\.weights: selection weights must sum to 1/);
  });

  it('wraps unparseable YAML in a ConfigError', () => {
    writeFileSync(join(projectDir, '.cadence.yaml'), 'timing: [unclosed\n');

    expect(() => manager().load()).toThrow(/Failed to parse project config/);
  });

  it('caches the loaded config', () => {
    const cm = manager();
    const first = cm.load();
    expect(cm.get()).toBe(first);
  });
});
