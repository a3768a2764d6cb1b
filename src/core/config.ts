import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { RightsizerConfigSchema, type RightsizerConfig, type RightsizerConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';
import type { ScoringPolicy } from '../rightsizing/types.js';

type RawConfig = Record<string, unknown>;

/** Environment variable → config path, with the parser applied to the raw string */
const ENV_BINDINGS: Array<{ env: string; path: [string, string]; parse: (v: string) => unknown }> = [
  { env: 'ANTHROPIC_API_KEY', path: ['ai', 'anthropicApiKey'], parse: v => v },
  { env: 'OPENAI_API_KEY', path: ['ai', 'openaiApiKey'], parse: v => v },
  { env: 'AI_PROVIDER', path: ['ai', 'provider'], parse: v => v.toLowerCase() },
  { env: 'AI_MODEL', path: ['ai', 'model'], parse: v => v },
  { env: 'LOOKBACK_DAYS', path: ['analysis', 'lookbackDays'], parse: Number },
  { env: 'CPU_THRESHOLD_LOW', path: ['analysis', 'cpuThresholdLow'], parse: Number },
  { env: 'CPU_THRESHOLD_HIGH', path: ['analysis', 'cpuThresholdHigh'], parse: Number },
  { env: 'GENERATION_LEAP', path: ['generation', 'leap'], parse: Number },
  { env: 'RIGHTSIZER_WORKERS', path: ['concurrency', 'workers'], parse: Number },
];

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: RightsizerConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, env: NodeJS.ProcessEnv = process.env, globalDir?: string) {
    this.globalDir = globalDir || join(homedir(), '.rightsizer');
    this.projectDir = projectDir || process.cwd();
    this.env = env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: RightsizerConfigInput): RightsizerConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.rightsizer.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides && isRecord(overrides)) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = RightsizerConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): RightsizerConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const result: RawConfig = { ...raw };
    for (const binding of ENV_BINDINGS) {
      const value = this.env[binding.env];
      if (value === undefined || value === '') continue;

      const [section, key] = binding.path;
      const current = result[section];
      result[section] = { ...(isRecord(current) ? current : {}), [key]: binding.parse(value) };
    }
    return result;
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result: RawConfig = { ...target };
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      const targetValue = target[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        result[key] = this.deepMerge(targetValue, sourceValue);
      } else {
        result[key] = sourceValue;
      }
    }
    return result;
  }
}

/**
 * Derive the candidate-scoring policy from a loaded configuration.
 */
export function toScoringPolicy(config: RightsizerConfig): ScoringPolicy {
  return {
    cpuThresholdLow: config.analysis.cpuThresholdLow,
    cpuThresholdHigh: config.analysis.cpuThresholdHigh,
    lowUtilizationFactor: config.analysis.lowUtilizationFactor,
    highUtilizationFactor: config.analysis.highUtilizationFactor,
    checkDiskRequirements: config.filters.checkDiskRequirements,
    checkNetworkRequirements: config.filters.checkNetworkRequirements,
    sameFamilyOnly: config.filters.sameFamilyOnly,
    allowBurstable: config.filters.allowBurstable,
    generation: {
      enabled: config.generation.evolveEnabled,
      leap: config.generation.leap,
      fallback: config.generation.fallback,
    },
    weights: { ...config.weights },
  };
}
