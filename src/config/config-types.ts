/**
 * Configuration type definitions
 */

export type Environment = 'development' | 'production' | 'testing';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export type DatabaseDialect = 'sqlite' | 'postgres';

export type LLMProvider = 'anthropic' | 'openai';

export interface GeneralConfig {
  environment: Environment;
  logLevel: LogLevelName;
  appName: string;
  appVersion: string;
}

export interface ServerConfig {
  port: number;

  /** Public base URL used in login links */
  domain: string;

  /** Cookie signing key */
  sessionSecret: string;

  sessionMaxAgeDays: number;

  /** Send cookies with the Secure attribute */
  cookieSecure: boolean;

  /** Token for the maintenance endpoint; empty disables it */
  maintenanceToken: string;
}

export interface PostgresConfig {
  /** Hostname, or a unix socket directory such as /cloudsql/<connection> */
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;

  /** Takes precedence over the discrete fields when set */
  connectionString: string;

  maxConnections: number;
}

export interface DatabaseConfig {
  dialect: DatabaseDialect;

  /** SQLite file, or :memory: */
  sqlitePath: string;

  postgres: PostgresConfig;
}

export interface AuthConfig {
  /** Only addresses ending in @<domain> may log in */
  allowedEmailDomain: string;
  magicLinkTtlMinutes: number;
}

export interface MailConfig {
  smtpHost: string;
  smtpPort: number;
  smtpUser: string;
  smtpPass: string;
  fromEmail: string;
}

export interface AssistantConfig {
  provider: LLMProvider;
  apiKey: string;

  /** Empty means the provider's default model */
  model: string;

  baseUrl: string;
  temperature: number;
  maxOutputTokens: number;

  /** Upper bound on model round trips per chat message */
  maxToolRounds: number;

  /** Prior chat messages sent with each request */
  historyLimit: number;

  /** Tasks and reads listed in the system prompt */
  contextLimit: number;

  personaPath: string;
  timeoutMs: number;
}

export interface CalendarConfig {
  /** Base64-encoded service-account JSON; empty disables the integration */
  credentials: string;
  calendarId: string;
  lookaheadDays: number;
}

export interface PaperSearchConfig {
  endpoint: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
}

export interface AppConfig {
  general: GeneralConfig;
  server: ServerConfig;
  database: DatabaseConfig;
  auth: AuthConfig;
  mail: MailConfig;
  assistant: AssistantConfig;
  calendar: CalendarConfig;
  paperSearch: PaperSearchConfig;
}

/**
 * Configuration source, lowest priority first
 */
export enum ConfigSource {
  DEFAULT = 'default',
  FILE = 'file',
  ENV = 'env',
  RUNTIME = 'runtime'
}

export interface ConfigSourceInfo {
  source: ConfigSource;
  path?: string;
  timestamp: Date;
}

export interface ConfigValidationError {
  field: string;
  message: string;
  value?: unknown;
  expected?: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  warnings: string[];
}

