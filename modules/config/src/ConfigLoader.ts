import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ConfigValidator, formatValidationErrors } from './ConfigValidator.js';
import type { ConfigLoaderOptions, DeepPartial, HarvestConfig, ValidationResult } from './types.js';

export const DEFAULT_CONFIG_FILENAME = 'harvest.config.json';

export interface LoadOptions {
  /** Applied after the file and the environment; CLI flags land here. */
  overrides?: DeepPartial<HarvestConfig>;
  /** Fail instead of falling back to defaults when the file is missing. */
  requireFile?: boolean;
}

type PlainRecord = Record<string, unknown>;

function isPlainRecord(value: unknown): value is PlainRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isPlainRecord(base) || !isPlainRecord(override)) return override;
  const out: PlainRecord = { ...base };
  for (const [key, value] of Object.entries(override)) {
    out[key] = deepMerge(base[key], value);
  }
  return out;
}

function errorCode(err: unknown): string {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return '';
}

function parseNumber(raw: string): number | string {
  const value = Number(raw);
  return raw.trim() !== '' && Number.isFinite(value) ? value : raw;
}

function parseBoolean(raw: string): boolean | string {
  const value = raw.trim().toLowerCase();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return raw;
}

/**
 * Environment overrides. Unparseable values are passed through untouched so
 * schema validation reports them against the right path.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PlainRecord {
  const out: PlainRecord = {};
  const outputDir = String(env.HARVEST_OUTPUT_DIR || '').trim();
  if (outputDir) out.outputDir = outputDir;
  if (env.HARVEST_WORKERS) out.workers = parseNumber(env.HARVEST_WORKERS);
  if (env.HARVEST_MAX_REVIEWS) out.maxReviews = parseNumber(env.HARVEST_MAX_REVIEWS);
  if (env.HARVEST_HEADLESS) out.browser = { headless: parseBoolean(env.HARVEST_HEADLESS) };
  return out;
}

/**
 * Loads, validates and caches the harvest configuration.
 *
 * Precedence, lowest first: built-in defaults, the JSON file, environment
 * variables, then `overrides` passed to `load()`.
 */
export class ConfigLoader {
  private validator: ConfigValidator;
  private configPath: string;
  private env: NodeJS.ProcessEnv;
  private config: HarvestConfig | null = null;
  private cacheEnabled: boolean;

  constructor(options: ConfigLoaderOptions = {}) {
    this.validator = new ConfigValidator();
    this.cacheEnabled = options.cache !== false;
    this.env = options.env ?? process.env;
    this.configPath = path.resolve(
      options.configPath || this.env.HARVEST_CONFIG_PATH || path.join(process.cwd(), DEFAULT_CONFIG_FILENAME),
    );
  }

  async load(options: LoadOptions = {}): Promise<HarvestConfig> {
    if (this.cacheEnabled && this.config && !options.overrides) {
      return this.config;
    }

    const fileContent = await this.readFile(options.requireFile === true);
    let merged = deepMerge(this.validator.getDefaultConfig(), fileContent);
    merged = deepMerge(merged, readEnvOverrides(this.env));
    merged = deepMerge(merged, options.overrides);

    const config = this.assertValid(merged);
    this.config = config;
    return config;
  }

  /**
   * Writes the default configuration when no file exists yet.
   * @returns true when a file was created
   */
  async ensureExists(): Promise<boolean> {
    try {
      await fs.access(this.configPath);
      return false;
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') throw err;
      await this.save(this.validator.getDefaultConfig());
      return true;
    }
  }

  async save(config: HarvestConfig): Promise<void> {
    const checked = this.assertValid(config);
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, `${JSON.stringify(checked, null, 2)}\n`, 'utf-8');
    this.config = checked;
  }

  async reload(): Promise<HarvestConfig> {
    this.config = null;
    return this.load();
  }

  get(): HarvestConfig | null {
    return this.config;
  }

  /** Validates the file on disk on its own, without defaults merged in. */
  async validate(): Promise<ValidationResult> {
    return this.validator.validateFile(this.configPath);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getDefaultConfig(): HarvestConfig {
    return this.validator.getDefaultConfig();
  }

  private async readFile(required: boolean): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT' && !required) return undefined;
      if (errorCode(err) === 'ENOENT') {
        throw new Error(`Config file not found: ${this.configPath}; run ensureExists() to create one`);
      }
      throw err;
    }
    try {
      return JSON.parse(content);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Config file is not valid JSON (${this.configPath}): ${reason}`);
    }
  }

  private assertValid(candidate: unknown): HarvestConfig {
    if (this.validator.isHarvestConfig(candidate)) {
      return candidate;
    }
    const result = this.validator.validate(candidate);
    throw new Error(`Invalid configuration (${this.configPath}):\n${formatValidationErrors(result)}`);
  }
}
