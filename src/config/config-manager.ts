import { z } from 'zod';
import { readFile } from 'node:fs/promises';
import { isNotFound } from '../logging/logger.js';
import { atomicWrite } from '../storage/atomic-write.js';

/**
 * Configuration schema. Every field has a default, so `{}` is a valid config.
 */
export const TutorCommandConfigSchema = z.object({
  gateway: z.object({
    port: z.number().int().min(1).max(65535).default(8000),
    host: z.string().min(1).default('127.0.0.1'),
    /** How long stop() waits for in-flight commands */
    shutdownTimeoutMs: z.number().int().min(0).default(10_000),
  }).default({}),

  capability: z.object({
    cliPath: z.string().min(1).default('claude'),
    model: z.string().min(1).default('sonnet'),
    timeoutMs: z.number().int().min(1).default(60_000),
  }).default({}),

  store: z.object({
    /** Collection directory, relative to the workspace unless absolute */
    dataDir: z.string().min(1).default('data'),
  }).default({}),

  resolver: z.object({
    acceptThreshold: z.number().min(0).max(1).default(0.6),
    ambiguityMargin: z.number().min(0).max(1).default(0.1),
  }).default({}),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    /** File name inside the workspace logs directory */
    file: z.string().min(1).regex(/^[^/\\]+$/, 'must be a file name').default('tutor-command.log'),
    maxSize: z.number().int().min(1024).default(10 * 1024 * 1024), // 10MB
    maxFiles: z.number().int().min(1).max(100).default(5),
  }).default({}),
});

export type TutorCommandConfig = z.infer<typeof TutorCommandConfigSchema>;

/**
 * User overrides, as written in config.json
 */
export type PartialTutorCommandConfig = z.input<typeof TutorCommandConfigSchema>;

export const DEFAULT_CONFIG: TutorCommandConfig = TutorCommandConfigSchema.parse({});

const ENV_PREFIX = 'TUTOR_COMMAND_';

type EnvValueType = 'int' | 'float' | 'string';

/**
 * Environment variables and the config paths they override
 */
const ENV_MAPPINGS: Record<string, { path: [string, string]; type: EnvValueType }> = {
  [`${ENV_PREFIX}GATEWAY_PORT`]: { path: ['gateway', 'port'], type: 'int' },
  [`${ENV_PREFIX}GATEWAY_HOST`]: { path: ['gateway', 'host'], type: 'string' },
  [`${ENV_PREFIX}GATEWAY_SHUTDOWN_TIMEOUT_MS`]: { path: ['gateway', 'shutdownTimeoutMs'], type: 'int' },
  [`${ENV_PREFIX}CAPABILITY_CLI_PATH`]: { path: ['capability', 'cliPath'], type: 'string' },
  [`${ENV_PREFIX}CAPABILITY_MODEL`]: { path: ['capability', 'model'], type: 'string' },
  [`${ENV_PREFIX}CAPABILITY_TIMEOUT_MS`]: { path: ['capability', 'timeoutMs'], type: 'int' },
  [`${ENV_PREFIX}STORE_DATA_DIR`]: { path: ['store', 'dataDir'], type: 'string' },
  [`${ENV_PREFIX}RESOLVER_ACCEPT_THRESHOLD`]: { path: ['resolver', 'acceptThreshold'], type: 'float' },
  [`${ENV_PREFIX}RESOLVER_AMBIGUITY_MARGIN`]: { path: ['resolver', 'ambiguityMargin'], type: 'float' },
  [`${ENV_PREFIX}LOGGING_LEVEL`]: { path: ['logging', 'level'], type: 'string' },
  [`${ENV_PREFIX}LOGGING_FILE`]: { path: ['logging', 'file'], type: 'string' },
  [`${ENV_PREFIX}LOGGING_MAX_SIZE`]: { path: ['logging', 'maxSize'], type: 'int' },
  [`${ENV_PREFIX}LOGGING_MAX_FILES`]: { path: ['logging', 'maxFiles'], type: 'int' },
};

export interface ConfigValidationResult {
  success: boolean;
  config?: TutorCommandConfig;
  errors?: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merges two plain objects; values from `overrides` win
 */
function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const existing = result[key];
    result[key] = isRecord(value) && isRecord(existing) ? deepMerge(existing, value) : value;
  }
  return result;
}

function setPath(target: Record<string, unknown>, path: string[], value: unknown): void {
  let current = target;
  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  const last = path[path.length - 1];
  if (last !== undefined) {
    current[last] = value;
  }
}

/**
 * ConfigManager - Loads, validates and persists configuration
 *
 * Precedence is defaults, then the JSON file, then TUTOR_COMMAND_*
 * environment variables. Saves go through an atomic write.
 */
export class ConfigManager {
  private configPath: string;
  private currentConfig: TutorCommandConfig;

  constructor(configPath: string) {
    this.configPath = configPath;
    this.currentConfig = DEFAULT_CONFIG;
  }

  get config(): TutorCommandConfig {
    return this.currentConfig;
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Loads configuration with precedence: defaults → file → environment
   */
  async load(env: NodeJS.ProcessEnv = process.env): Promise<ConfigValidationResult> {
    let fileConfig: Record<string, unknown> = {};

    try {
      const parsed: unknown = JSON.parse(await readFile(this.configPath, 'utf-8'));
      if (!isRecord(parsed)) {
        return { success: false, errors: [`Config file ${this.configPath} must contain a JSON object`] };
      }
      fileConfig = parsed;
    } catch (error) {
      if (!isNotFound(error)) {
        const reason = error instanceof Error ? error.message : String(error);
        return { success: false, errors: [`Failed to read config file: ${reason}`] };
      }
    }

    const { overrides, errors } = this.getEnvironmentOverrides(env);
    if (errors.length > 0) {
      return { success: false, errors };
    }

    return this.validate(deepMerge(fileConfig, overrides));
  }

  /**
   * Validates a partial configuration and, if valid, makes it current
   */
  validate(partialConfig: unknown): ConfigValidationResult {
    const result = TutorCommandConfigSchema.safeParse(partialConfig);

    if (result.success) {
      this.currentConfig = result.data;
      return { success: true, config: result.data };
    }

    const errors = result.error.issues.map(issue => {
      const path = issue.path.join('.');
      return `Configuration error at '${path}': ${issue.message}`;
    });
    return { success: false, errors };
  }

  /**
   * Validates and writes the configuration (mode 600)
   */
  async save(config?: PartialTutorCommandConfig): Promise<void> {
    const configToSave = config ?? this.currentConfig;

    const validation = this.validate(configToSave);
    if (!validation.success) {
      throw new Error(`Invalid configuration: ${validation.errors?.join(', ')}`);
    }

    await atomicWrite(this.configPath, JSON.stringify(configToSave, null, 2) + '\n', { mode: 0o600 });
  }

  /**
   * Value at a dotted path, or undefined when the path does not exist
   */
  get(path: string): unknown {
    let current: unknown = this.currentConfig;
    for (const part of path.split('.')) {
      if (!isRecord(current)) {
        return undefined;
      }
      current = current[part];
    }
    return current;
  }

  /**
   * Sets the value at a dotted path; the change is kept only if the result
   * validates
   */
  set(path: string, value: unknown): ConfigValidationResult {
    const next: Record<string, unknown> = structuredClone({ ...this.currentConfig });
    setPath(next, path.split('.'), value);
    return this.validate(next);
  }

  private getEnvironmentOverrides(env: NodeJS.ProcessEnv): { overrides: Record<string, unknown>; errors: string[] } {
    const overrides: Record<string, unknown> = {};
    const errors: string[] = [];

    for (const [name, mapping] of Object.entries(ENV_MAPPINGS)) {
      const raw = env[name];
      if (raw === undefined) continue;

      const value = this.parseEnvValue(raw, mapping.type);
      if (value === undefined) {
        errors.push(`Invalid numeric value for ${name}: ${raw}`);
        continue;
      }
      setPath(overrides, mapping.path, value);
    }

    return { overrides, errors };
  }

  private parseEnvValue(value: string, type: EnvValueType): string | number | undefined {
    switch (type) {
      case 'int': {
        const num = Number(value);
        return value.trim() !== '' && Number.isInteger(num) ? num : undefined;
      }
      case 'float': {
        const num = Number(value);
        return value.trim() !== '' && Number.isFinite(num) ? num : undefined;
      }
      case 'string':
        return value;
    }
  }
}
