import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { CadenceConfigSchema, type CadenceConfig, type CadenceConfigInput } from './types.js';
import { ConfigError } from './errors.js';

export interface ConfigManagerOptions {
  projectDir?: string;
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: CadenceConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.cadence');
    this.projectDir = options.projectDir ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: CadenceConfigInput): CadenceConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.cadence.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = CadenceConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): CadenceConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  private readYaml(path: string, scope: string): Record<string, unknown> {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isPlainObject(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${scope} config at ${path}`,
        err instanceof Error ? err : undefined,
      );
    }
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const api = isPlainObject(raw.api) ? { ...raw.api } : {};
    const storage = isPlainObject(raw.storage) ? { ...raw.storage } : {};
    const logging = isPlainObject(raw.logging) ? { ...raw.logging } : {};

    if (this.env.CADENCE_PORT) {
      const port = Number(this.env.CADENCE_PORT);
      if (!Number.isInteger(port)) {
        throw new ConfigError(`CADENCE_PORT must be an integer, got "${this.env.CADENCE_PORT}"`);
      }
      api.port = port;
    }
    if (this.env.CADENCE_API_KEY) {
      api.apiKey = this.env.CADENCE_API_KEY;
    }
    if (this.env.CADENCE_DB_PATH) {
      storage.driver = 'sqlite';
      storage.dbPath = this.env.CADENCE_DB_PATH;
    }
    if (this.env.CADENCE_LOG_LEVEL) {
      logging.level = this.env.CADENCE_LOG_LEVEL;
    }

    return { ...raw, api, storage, logging };
  }

  private deepMerge(target: Record<string, unknown>, source: object): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };
    for (const [key, value] of Object.entries(source)) {
      const existing = result[key];
      if (isPlainObject(value) && isPlainObject(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
