/**
 * Unified configuration manager
 *
 * Sources, lowest priority first: defaults, config file, environment, runtime overrides.
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import {
  AppConfig,
  ConfigSource,
  ConfigSourceInfo,
  ConfigValidationError,
  ConfigValidationResult,
  Environment
} from './config-types';
import { EnvLoader, EnvSource } from './env';
import { defaultLogger } from '../utils/logger';
import { AppError } from '../utils/error-handler';

const logger = defaultLogger.createSubLogger('config');

/**
 * Built-in defaults
 */
export function createDefaultConfig(cwd: string = process.cwd()): AppConfig {
  return {
    general: {
      environment: 'development',
      logLevel: 'info',
      appName: 'make-arjo-work',
      appVersion: '1.0.0'
    },
    server: {
      port: 5001,
      domain: 'http://localhost:5001',
      sessionSecret: crypto.randomBytes(32).toString('hex'),
      sessionMaxAgeDays: 30,
      cookieSecure: false,
      maintenanceToken: ''
    },
    database: {
      dialect: 'sqlite',
      sqlitePath: path.join(cwd, 'data', 'tasks.db'),
      postgres: {
        host: 'localhost',
        port: 5432,
        user: 'appuser',
        password: '',
        database: 'makearjowork',
        connectionString: '',
        maxConnections: 10
      }
    },
    auth: {
      allowedEmailDomain: 'fydy.ai',
      magicLinkTtlMinutes: 15
    },
    mail: {
      smtpHost: 'smtp.gmail.com',
      smtpPort: 587,
      smtpUser: '',
      smtpPass: '',
      fromEmail: ''
    },
    assistant: {
      provider: 'anthropic',
      apiKey: '',
      model: '',
      baseUrl: '',
      temperature: 0.7,
      maxOutputTokens: 2048,
      maxToolRounds: 5,
      historyLimit: 20,
      contextLimit: 20,
      personaPath: path.join(cwd, 'config', 'persona.json'),
      timeoutMs: 60000
    },
    calendar: {
      credentials: '',
      calendarId: 'primary',
      lookaheadDays: 5
    },
    paperSearch: {
      endpoint: 'http://export.arxiv.org/api/query',
      timeoutMs: 10000,
      retries: 2,
      retryDelayMs: 500
    }
  };
}

const overridesSchema = z.object({
  general: z
    .object({
      environment: z.enum(['development', 'production', 'testing']),
      logLevel: z.enum(['debug', 'info', 'warn', 'error']),
      appName: z.string(),
      appVersion: z.string()
    })
    .partial()
    .optional(),
  server: z
    .object({
      port: z.number().int(),
      domain: z.string(),
      sessionSecret: z.string(),
      sessionMaxAgeDays: z.number(),
      cookieSecure: z.boolean(),
      maintenanceToken: z.string()
    })
    .partial()
    .optional(),
  database: z
    .object({
      dialect: z.enum(['sqlite', 'postgres']),
      sqlitePath: z.string(),
      postgres: z
        .object({
          host: z.string(),
          port: z.number().int(),
          user: z.string(),
          password: z.string(),
          database: z.string(),
          connectionString: z.string(),
          maxConnections: z.number().int()
        })
        .partial()
        .optional()
    })
    .partial()
    .optional(),
  auth: z
    .object({
      allowedEmailDomain: z.string(),
      magicLinkTtlMinutes: z.number()
    })
    .partial()
    .optional(),
  mail: z
    .object({
      smtpHost: z.string(),
      smtpPort: z.number().int(),
      smtpUser: z.string(),
      smtpPass: z.string(),
      fromEmail: z.string()
    })
    .partial()
    .optional(),
  assistant: z
    .object({
      provider: z.enum(['anthropic', 'openai']),
      apiKey: z.string(),
      model: z.string(),
      baseUrl: z.string(),
      temperature: z.number(),
      maxOutputTokens: z.number().int(),
      maxToolRounds: z.number().int(),
      historyLimit: z.number().int(),
      contextLimit: z.number().int(),
      personaPath: z.string(),
      timeoutMs: z.number()
    })
    .partial()
    .optional(),
  calendar: z
    .object({
      credentials: z.string(),
      calendarId: z.string(),
      lookaheadDays: z.number()
    })
    .partial()
    .optional(),
  paperSearch: z
    .object({
      endpoint: z.string(),
      timeoutMs: z.number(),
      retries: z.number().int(),
      retryDelayMs: z.number()
    })
    .partial()
    .optional()
});

export type ConfigOverrides = z.infer<typeof overridesSchema>;

/**
 * Drop keys whose value is undefined so they do not mask lower-priority sources
 */
function compact<T extends object>(value: T | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!value) {
    return result;
  }
  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

/**
 * Merge overrides onto a complete configuration
 */
export function applyOverrides(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    general: { ...base.general, ...compact(overrides.general) },
    server: { ...base.server, ...compact(overrides.server) },
    database: {
      ...base.database,
      ...compact(overrides.database),
      postgres: { ...base.database.postgres, ...compact(overrides.database?.postgres) }
    },
    auth: { ...base.auth, ...compact(overrides.auth) },
    mail: { ...base.mail, ...compact(overrides.mail) },
    assistant: { ...base.assistant, ...compact(overrides.assistant) },
    calendar: { ...base.calendar, ...compact(overrides.calendar) },
    paperSearch: { ...base.paperSearch, ...compact(overrides.paperSearch) }
  };
}

function normalizeEnvironment(value: string | undefined): string | undefined {
  switch (value) {
    case 'prod':
      return 'production';
    case 'test':
      return 'testing';
    case 'dev':
      return 'development';
    default:
      return value;
  }
}

/**
 * Environment variables as an unvalidated overrides object
 */
function readEnvironment(env: EnvLoader): Record<string, unknown> {
  const environment = normalizeEnvironment(env.get('NODE_ENV'));
  const provider = env.get('LLM_PROVIDER');
  const cloudSqlConnection = env.get('CLOUD_SQL_CONNECTION');
  const providerKey = provider === 'openai' ? env.get('OPENAI_API_KEY') : env.get('ANTHROPIC_API_KEY');

  return {
    general: {
      environment,
      logLevel: env.get('LOG_LEVEL')?.toLowerCase(),
      appName: env.get('APP_NAME'),
      appVersion: env.get('APP_VERSION')
    },
    server: {
      port: env.getNumber('PORT'),
      domain: env.get('DOMAIN'),
      sessionSecret: env.get('SECRET_KEY'),
      sessionMaxAgeDays: env.getNumber('SESSION_MAX_AGE_DAYS'),
      cookieSecure: env.getBoolean('SESSION_COOKIE_SECURE', environment === 'production' ? true : undefined),
      maintenanceToken: env.get('MAINTENANCE_TOKEN')
    },
    database: {
      dialect: env.getBoolean('USE_CLOUD_SQL') ? 'postgres' : env.get('DATABASE_DIALECT'),
      sqlitePath: env.get('DATABASE'),
      postgres: {
        host: cloudSqlConnection ? `/cloudsql/${cloudSqlConnection}` : env.get('DB_HOST'),
        port: env.getNumber('DB_PORT'),
        user: env.get('DB_USER'),
        password: env.get('DB_PASS'),
        database: env.get('DB_NAME'),
        connectionString: env.get('DATABASE_URL'),
        maxConnections: env.getNumber('DB_MAX_CONNECTIONS')
      }
    },
    auth: {
      allowedEmailDomain: env.get('ALLOWED_EMAIL_DOMAIN'),
      magicLinkTtlMinutes: env.getNumber('MAGIC_LINK_TTL_MINUTES')
    },
    mail: {
      smtpHost: env.get('SMTP_HOST'),
      smtpPort: env.getNumber('SMTP_PORT'),
      smtpUser: env.get('SMTP_USER'),
      smtpPass: env.get('SMTP_PASS'),
      fromEmail: env.get('FROM_EMAIL') ?? env.get('SMTP_USER')
    },
    assistant: {
      provider,
      apiKey: env.get('LLM_API_KEY') ?? providerKey,
      model: env.get('LLM_MODEL'),
      baseUrl: env.get('LLM_BASE_URL'),
      temperature: env.getNumber('LLM_TEMPERATURE'),
      maxOutputTokens: env.getNumber('LLM_MAX_OUTPUT_TOKENS'),
      maxToolRounds: env.getNumber('ASSISTANT_MAX_TOOL_ROUNDS'),
      historyLimit: env.getNumber('ASSISTANT_HISTORY_LIMIT'),
      contextLimit: env.getNumber('ASSISTANT_CONTEXT_LIMIT'),
      personaPath: env.get('PERSONA_FILE'),
      timeoutMs: env.getNumber('LLM_TIMEOUT_MS')
    },
    calendar: {
      credentials: env.get('GOOGLE_CALENDAR_CREDENTIALS'),
      calendarId: env.get('GOOGLE_CALENDAR_ID'),
      lookaheadDays: env.getNumber('CALENDAR_LOOKAHEAD_DAYS')
    },
    paperSearch: {
      endpoint: env.get('ARXIV_ENDPOINT'),
      timeoutMs: env.getNumber('ARXIV_TIMEOUT_MS'),
      retries: env.getNumber('ARXIV_RETRIES'),
      retryDelayMs: env.getNumber('ARXIV_RETRY_DELAY_MS')
    }
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
}

export interface ConfigManagerOptions {
  /** Directory searched for config.yaml / config.yml / config.json */
  configDir?: string;

  /** Variables to read instead of process.env */
  env?: EnvSource;

  /** Load .env files first; only applies when reading process.env */
  loadDotenv?: boolean;

  cwd?: string;
}

/**
 * Unified configuration manager
 */
export class UnifiedConfigManager {
  private static instance: UnifiedConfigManager | undefined;
  private config: AppConfig;
  private sources: ConfigSourceInfo[] = [];
  private readonly env: EnvLoader;
  private readonly options: ConfigManagerOptions;
  private generatedSecret = false;

  constructor(options: ConfigManagerOptions = {}) {
    this.options = options;

    if (!options.env && options.loadDotenv !== false) {
      EnvLoader.initialize(options.cwd);
    }

    this.env = new EnvLoader(options.env ?? process.env);
    this.config = this.loadConfig();
  }

  /**
   * Process-wide instance reading process.env
   */
  public static getInstance(): UnifiedConfigManager {
    if (!UnifiedConfigManager.instance) {
      UnifiedConfigManager.instance = new UnifiedConfigManager();
    }
    return UnifiedConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    this.sources = [{ source: ConfigSource.DEFAULT, timestamp: new Date() }];

    const defaults = createDefaultConfig(this.options.cwd);
    let config = this.loadConfigFile(defaults);
    config = this.loadEnvironmentVariables(config);

    this.generatedSecret = config.server.sessionSecret === defaults.server.sessionSecret;
    this.assertValid(config);

    return config;
  }

  private loadConfigFile(config: AppConfig): AppConfig {
    const configDir = this.options.configDir || this.env.get('CONFIG_DIR') || path.join(this.options.cwd || process.cwd(), 'config');
    const candidates = ['config.yaml', 'config.yml', 'config.json'].map(name => path.join(configDir, name));

    for (const configFile of candidates) {
      if (!fs.existsSync(configFile)) {
        continue;
      }

      try {
        const fileContent = fs.readFileSync(configFile, 'utf-8');
        const data: unknown = configFile.endsWith('.json') ? JSON.parse(fileContent) : yaml.load(fileContent);
        const parsed = overridesSchema.safeParse(data ?? {});

        if (!parsed.success) {
          logger.error(`Ignoring invalid configuration file ${configFile}: ${describeIssues(parsed.error)}`);
          return config;
        }

        this.sources.push({
          source: ConfigSource.FILE,
          path: configFile,
          timestamp: fs.statSync(configFile).mtime
        });
        logger.debug(`Loaded configuration from: ${configFile}`);
        return applyOverrides(config, parsed.data);
      } catch (error) {
        logger.error(`Failed to load configuration file ${configFile}`, error);
        return config;
      }
    }

    return config;
  }

  private loadEnvironmentVariables(config: AppConfig): AppConfig {
    const parsed = overridesSchema.safeParse(readEnvironment(this.env));
    if (!parsed.success) {
      throw AppError.configuration(`Invalid environment variables: ${describeIssues(parsed.error)}`, 'loadConfig');
    }

    this.sources.push({ source: ConfigSource.ENV, timestamp: new Date() });
    return applyOverrides(config, parsed.data);
  }

  /**
   * Check ranges and required values
   */
  public validateConfig(config: AppConfig): ConfigValidationResult {
    const errors: ConfigValidationError[] = [];
    const warnings: string[] = [];

    if (config.database.dialect === 'sqlite' && !config.database.sqlitePath) {
      errors.push({ field: 'database.sqlitePath', message: 'SQLite path is required' });
    }

    if (config.server.port < 1 || config.server.port > 65535) {
      errors.push({
        field: 'server.port',
        message: 'Port must be between 1 and 65535',
        value: config.server.port,
        expected: '1-65535'
      });
    }

    if (config.assistant.temperature < 0 || config.assistant.temperature > 1) {
      errors.push({
        field: 'assistant.temperature',
        message: 'Temperature must be between 0 and 1',
        value: config.assistant.temperature,
        expected: '0-1'
      });
    }

    const positiveFields: Array<[string, number]> = [
      ['assistant.maxToolRounds', config.assistant.maxToolRounds],
      ['assistant.historyLimit', config.assistant.historyLimit],
      ['assistant.contextLimit', config.assistant.contextLimit],
      ['assistant.maxOutputTokens', config.assistant.maxOutputTokens],
      ['auth.magicLinkTtlMinutes', config.auth.magicLinkTtlMinutes],
      ['server.sessionMaxAgeDays', config.server.sessionMaxAgeDays]
    ];
    for (const [field, value] of positiveFields) {
      if (!(value > 0)) {
        errors.push({ field, message: `${field} must be positive`, value, expected: '> 0' });
      }
    }

    if (!config.auth.allowedEmailDomain) {
      errors.push({ field: 'auth.allowedEmailDomain', message: 'Allowed email domain is required' });
    }

    if (config.general.environment === 'production') {
      if (this.generatedSecret) {
        warnings.push('SECRET_KEY is not set; sessions will not survive a restart');
      }
      if (!config.server.cookieSecure) {
        warnings.push('Session cookies are sent without the Secure attribute');
      }
    }

    if (!config.assistant.apiKey) {
      warnings.push('No assistant API key configured; chat requests will fail');
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings
    };
  }

  private assertValid(config: AppConfig): void {
    const result = this.validateConfig(config);

    for (const warning of result.warnings) {
      logger.debug(warning);
    }

    if (result.errors.length > 0) {
      throw AppError.configuration(
        `Invalid configuration: ${result.errors.map(e => `${e.field}: ${e.message}`).join(', ')}`,
        'loadConfig'
      );
    }
  }

  public getConfig(): AppConfig {
    return this.config;
  }

  public getEnvironment(): Environment {
    return this.config.general.environment;
  }

  /**
   * Apply runtime overrides (highest priority)
   */
  public updateConfig(overrides: ConfigOverrides): AppConfig {
    const next = applyOverrides(this.config, overrides);
    this.assertValid(next);

    this.sources.push({ source: ConfigSource.RUNTIME, timestamp: new Date() });
    this.config = next;
    return this.config;
  }

  public getSources(): ConfigSourceInfo[] {
    return [...this.sources];
  }

  public reload(): AppConfig {
    this.config = this.loadConfig();
    return this.config;
  }

  /**
   * Configuration with secrets replaced by asterisks
   */
  public getMaskedConfig(): AppConfig {
    const mask = (value: string) => (value ? '********' : '');
    const config = this.config;

    return {
      ...config,
      server: {
        ...config.server,
        sessionSecret: mask(config.server.sessionSecret),
        maintenanceToken: mask(config.server.maintenanceToken)
      },
      database: {
        ...config.database,
        postgres: {
          ...config.database.postgres,
          password: mask(config.database.postgres.password),
          connectionString: mask(config.database.postgres.connectionString)
        }
      },
      mail: { ...config.mail, smtpPass: mask(config.mail.smtpPass) },
      assistant: { ...config.assistant, apiKey: mask(config.assistant.apiKey) },
      calendar: { ...config.calendar, credentials: mask(config.calendar.credentials) }
    };
  }

  public exportToJSON(): string {
    return JSON.stringify(this.getMaskedConfig(), null, 2);
  }

  public exportToYAML(): string {
    return yaml.dump(this.getMaskedConfig());
  }
}
