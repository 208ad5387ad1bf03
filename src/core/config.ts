import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import {
  HealthPulseConfigSchema,
  type HealthPulseConfig,
  type HealthPulseConfigOverrides,
} from './types.js';
import { ConfigError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.healthpulse.yaml';

export interface ConfigManagerOptions {
  /** Directory holding the user-wide config.yaml */
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: HealthPulseConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.healthpulse');
    this.projectDir = projectDir || process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: HealthPulseConfigOverrides): HealthPulseConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, PROJECT_CONFIG_FILE), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    try {
      this.config = HealthPulseConfigSchema.parse(raw);
    } catch (err) {
      if (err instanceof ZodError) {
        const details = err.issues
          .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        throw new ConfigError(`Invalid configuration: ${details}`, err);
      }
      throw new ConfigError('Invalid configuration', err);
    }

    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): HealthPulseConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /**
   * Write a commented default project config. Returns false when one exists.
   */
  createDefaultConfig(): boolean {
    const configPath = join(this.projectDir, PROJECT_CONFIG_FILE);
    if (existsSync(configPath)) {
      return false;
    }
    if (!existsSync(this.projectDir)) {
      mkdirSync(this.projectDir, { recursive: true });
    }

    const defaultConfig = `# healthpulse project configuration
paths:
  sourceDir: src

orchestrator:
  parallel: false
  intervalSeconds: 3600

monitors:
  performance:
    thresholds:
      cpu: 80
      memory: 80
      disk: 90
    logSizeLimitMb: 100
  security:
    secretsFile: .env

logging:
  level: info
`;
    writeFileSync(configPath, defaultConfig, 'utf-8');
    return true;
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, err);
    }
    // An empty file parses to null
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Expected a mapping in ${label} config at ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const env: RawConfig = {};

    if (this.env.HEALTHPULSE_LOG_LEVEL) {
      env.logging = { level: this.env.HEALTHPULSE_LOG_LEVEL };
    }
    if (this.env.HEALTHPULSE_PARALLEL) {
      const value = this.env.HEALTHPULSE_PARALLEL.toLowerCase();
      env.orchestrator = { parallel: value === 'true' || value === '1' };
    }
    if (this.env.HEALTHPULSE_SOURCE_DIR) {
      env.paths = { sourceDir: this.env.HEALTHPULSE_SOURCE_DIR };
    }

    return this.deepMerge(raw, env);
  }

  private deepMerge(target: RawConfig, source: unknown): RawConfig {
    if (!isRecord(source)) {
      return target;
    }
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (incoming === undefined) {
        continue;
      }
      if (isRecord(incoming) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }
}
