/**
 * Configuration Management Module
 *
 * Defaults, then an optional YAML file, then environment variables. Read once at
 * startup; the resulting configuration is frozen.
 */

import fs from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, toErrorMessage } from '../error-handling';
import { LogLevel, parseLogLevel } from '../logging/logger';
import { isValidTimezone } from '../scheduler/next-fire';
import { EnvReader } from './env';
import { KNOWN_LANGUAGES } from './languages';

export const DEFAULT_CONFIG_PATH = './config/delivery.yaml';

const ConfigSchema = z.object({
  scheduler: z.object({
    hour: z.number().int().min(0).max(23),
    minute: z.number().int().min(0).max(59),
    timezone: z.string().min(1),
    catchUpPolicy: z.enum(['skip'])
  }),
  database: z.object({
    path: z.string().min(1)
  }),
  catalog: z.object({
    file: z.string().min(1)
  }),
  generation: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive(),
    timeoutMs: z.number().int().positive()
  }),
  email: z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    secure: z.boolean(),
    user: z.string().optional(),
    password: z.string().optional(),
    from: z.string().optional()
  }),
  delivery: z.object({
    concurrency: z.number().int().min(1).max(50),
    runTimeoutMs: z.number().int().min(1000),
    selectionPolicy: z.enum(['lowest-id', 'random']),
    embellishmentFailurePolicy: z.enum(['degrade', 'fail']),
    embellisher: z.enum(['templates', 'llm'])
  }),
  languages: z.array(z.enum(KNOWN_LANGUAGES)).min(1),
  logLevel: z.nativeEnum(LogLevel)
});

const FileConfigSchema = ConfigSchema.deepPartial();

export type DeliveryConfig = z.infer<typeof ConfigSchema>;

export interface ConfigRequirements {
  /** Credentials for the text-generation capability */
  generation?: boolean;
  /** SMTP credentials and sender address */
  email?: boolean;
}

export interface ConfigManagerOptions {
  /** YAML file; when given explicitly it must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export const REDACTED = '***';

export class ConfigManager {
  private config: DeliveryConfig;
  private problems: string[] = [];
  private readonly configPath: string;
  private readonly explicitPath: boolean;
  private readonly env: EnvReader;

  constructor(options: ConfigManagerOptions = {}) {
    this.configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
    this.explicitPath = options.configPath !== undefined;
    this.env = new EnvReader(options.env ?? process.env);
    this.config = this.loadConfig();
  }

  /**
   * The effective configuration
   */
  getConfig(): Readonly<DeliveryConfig> {
    return this.config;
  }

  /**
   * Problems found while loading plus semantic checks, empty when valid
   */
  validate(requirements: ConfigRequirements = {}): string[] {
    const errors = [...this.problems];
    const config = this.config;

    if (!isValidTimezone(config.scheduler.timezone)) {
      errors.push(`scheduler.timezone: not a valid IANA timezone "${config.scheduler.timezone}"`);
    }

    if (requirements.generation && !config.generation.apiKey) {
      errors.push('generation.apiKey: GENERATION_API_KEY is required');
    }

    if (requirements.email) {
      if (!config.email.user) {
        errors.push('email.user: SMTP_USER is required');
      }
      if (!config.email.password) {
        errors.push('email.password: SMTP_PASSWORD is required');
      }
      const from = this.getSenderAddress();
      if (!from || !from.includes('@')) {
        errors.push('email.from: EMAIL_FROM (or SMTP_USER) must be an email address');
      }
    }

    return errors;
  }

  /**
   * Throw ConfigurationError listing every problem
   */
  assertValid(requirements: ConfigRequirements = {}): void {
    const errors = this.validate(requirements);
    if (errors.length > 0) {
      throw new ConfigurationError(`Invalid configuration:\n  - ${errors.join('\n  - ')}`, errors);
    }
  }

  getSenderAddress(): string | undefined {
    return this.config.email.from ?? this.config.email.user;
  }

  /**
   * Configuration with secrets masked, for display
   */
  getRedactedConfig(): DeliveryConfig {
    const config = this.config;
    return {
      ...config,
      generation: { ...config.generation, apiKey: redact(config.generation.apiKey) },
      email: { ...config.email, password: redact(config.email.password) },
      scheduler: { ...config.scheduler },
      database: { ...config.database },
      catalog: { ...config.catalog },
      delivery: { ...config.delivery },
      languages: [...config.languages]
    };
  }

  getConfigPath(): string {
    return this.configPath;
  }

  private loadConfig(): DeliveryConfig {
    const defaults = ConfigManager.loadDefaultConfig();
    let merged: Record<string, unknown> = defaults;

    const fileConfig = this.loadFileConfig();
    if (fileConfig) {
      merged = mergeConfig(merged, fileConfig);
    }
    merged = mergeConfig(merged, this.readEnvironment());

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
      this.problems.push(...formatIssues(parsed.error.issues));
      return deepFreeze(defaults);
    }
    return deepFreeze(parsed.data);
  }

  /**
   * YAML file overrides. A missing default file is fine; a missing explicit one is not.
   */
  private loadFileConfig(): z.infer<typeof FileConfigSchema> | null {
    if (!fs.existsSync(this.configPath)) {
      if (this.explicitPath) {
        this.problems.push(`config file not found: ${this.configPath}`);
      }
      return null;
    }

    let document: unknown;
    try {
      document = yaml.load(fs.readFileSync(this.configPath, 'utf8'));
    } catch (error) {
      this.problems.push(`config file ${this.configPath} is not valid YAML: ${toErrorMessage(error)}`);
      return null;
    }
    if (document === undefined || document === null) {
      return null;
    }

    const parsed = FileConfigSchema.safeParse(document);
    if (!parsed.success) {
      this.problems.push(...formatIssues(parsed.error.issues).map(issue => `${this.configPath}: ${issue}`));
      return null;
    }
    return parsed.data;
  }

  /**
   * Environment overrides; unset variables leave the value alone
   */
  private readEnvironment(): Record<string, unknown> {
    const env = this.env;
    const logLevelName = env.get('LOG_LEVEL');
    let logLevel: unknown = logLevelName === undefined ? undefined : parseLogLevel(logLevelName) ?? logLevelName;
    if (env.getBoolean('DEBUG')) {
      logLevel = LogLevel.DEBUG;
    }

    return {
      scheduler: {
        hour: env.getNumber('SCHEDULER_HOUR'),
        minute: env.getNumber('SCHEDULER_MINUTE'),
        timezone: env.get('SCHEDULER_TIMEZONE'),
        catchUpPolicy: env.get('SCHEDULER_CATCH_UP_POLICY')
      },
      database: { path: env.get('DATABASE_PATH') },
      catalog: { file: env.get('CATALOG_FILE') },
      generation: {
        apiKey: env.get('GENERATION_API_KEY'),
        baseUrl: env.get('GENERATION_BASE_URL'),
        model: env.get('GENERATION_MODEL'),
        temperature: env.getNumber('GENERATION_TEMPERATURE'),
        maxTokens: env.getNumber('GENERATION_MAX_TOKENS'),
        timeoutMs: env.getNumber('GENERATION_TIMEOUT_MS')
      },
      email: {
        host: env.get('SMTP_HOST'),
        port: env.getNumber('SMTP_PORT'),
        secure: env.getBoolean('SMTP_SECURE'),
        user: env.get('SMTP_USER'),
        password: env.get('SMTP_PASSWORD'),
        from: env.get('EMAIL_FROM')
      },
      delivery: {
        concurrency: env.getNumber('DELIVERY_CONCURRENCY'),
        runTimeoutMs: env.getNumber('DELIVERY_RUN_TIMEOUT_MS'),
        selectionPolicy: env.get('DELIVERY_SELECTION_POLICY'),
        embellishmentFailurePolicy: env.get('DELIVERY_EMBELLISHMENT_FAILURE_POLICY'),
        embellisher: env.get('DELIVERY_EMBELLISHER')
      },
      languages: env.getArray('SUPPORTED_LANGUAGES')?.map(language => language.toLowerCase()),
      logLevel
    };
  }

  static loadDefaultConfig(): DeliveryConfig {
    return {
      scheduler: {
        hour: 9,
        minute: 0,
        timezone: 'UTC',
        catchUpPolicy: 'skip'
      },
      database: {
        path: 'data/daily-problems.db'
      },
      catalog: {
        file: 'data/problems.json'
      },
      generation: {
        baseUrl: 'https://api.groq.com/openai/v1',
        model: 'llama-3.1-8b-instant',
        temperature: 0.3,
        maxTokens: 2000,
        timeoutMs: 60000
      },
      email: {
        host: 'smtp.gmail.com',
        port: 587,
        secure: false
      },
      delivery: {
        concurrency: 3,
        runTimeoutMs: 30 * 60 * 1000,
        selectionPolicy: 'lowest-id',
        embellishmentFailurePolicy: 'degrade',
        embellisher: 'templates'
      },
      languages: [...KNOWN_LANGUAGES],
      logLevel: LogLevel.INFO
    };
  }
}

function redact(value: string | undefined): string | undefined {
  return value ? REDACTED : undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge where `undefined` in the override keeps the base value and arrays replace.
 */
export function mergeConfig(base: Record<string, unknown>, override: unknown): Record<string, unknown> {
  if (!isPlainObject(override)) {
    return base;
  }

  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? mergeConfig(current, value) : value;
  }
  return result;
}

function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
