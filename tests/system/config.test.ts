import fs from 'fs';
import os from 'os';
import path from 'path';
import { UnifiedConfigManager, applyOverrides, createDefaultConfig } from '../../src/config/unified-config';
import { ConfigSource } from '../../src/config/config-types';
import { EnvSource } from '../../src/config/env';

describe('UnifiedConfigManager', () => {
  let workDir: string;

  const createManager = (env: EnvSource = {}) =>
    new UnifiedConfigManager({ env, loadDotenv: false, configDir: workDir, cwd: workDir });

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  describe('default configuration', () => {
    it('should load defaults when nothing is set', () => {
      const config = createManager().getConfig();

      expect(config.general.environment).toBe('development');
      expect(config.server.port).toBe(5001);
      expect(config.server.domain).toBe('http://localhost:5001');
      expect(config.database.dialect).toBe('sqlite');
      expect(config.database.sqlitePath).toBe(path.join(workDir, 'data', 'tasks.db'));
      expect(config.auth.allowedEmailDomain).toBe('fydy.ai');
      expect(config.auth.magicLinkTtlMinutes).toBe(15);
      expect(config.assistant.provider).toBe('anthropic');
      expect(config.assistant.maxToolRounds).toBe(5);
      expect(config.assistant.historyLimit).toBe(20);
      expect(config.assistant.contextLimit).toBe(20);
      expect(config.calendar.lookaheadDays).toBe(5);
      expect(config.paperSearch.endpoint).toBe('http://export.arxiv.org/api/query');
    });

    it('should generate a session secret when none is given', () => {
      const config = createManager().getConfig();

      expect(config.server.sessionSecret).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should record default and environment sources', () => {
      const sources = createManager().getSources().map(info => info.source);

      expect(sources).toEqual([ConfigSource.DEFAULT, ConfigSource.ENV]);
    });
  });

  describe('environment variable overrides', () => {
    it('should normalize short environment names', () => {
      expect(createManager({ NODE_ENV: 'prod' }).getEnvironment()).toBe('production');
      expect(createManager({ NODE_ENV: 'test' }).getEnvironment()).toBe('testing');
      expect(createManager({ NODE_ENV: 'dev' }).getEnvironment()).toBe('development');
    });

    it('should secure cookies in production unless told otherwise', () => {
      expect(createManager({ NODE_ENV: 'production' }).getConfig().server.cookieSecure).toBe(true);
      expect(
        createManager({ NODE_ENV: 'production', SESSION_COOKIE_SECURE: 'false' }).getConfig().server.cookieSecure
      ).toBe(false);
    });

    it('should read server and auth settings', () => {
      const config = createManager({
        PORT: '8080',
        DOMAIN: 'https://tasks.example.com',
        SECRET_KEY: 'test-secret',
        ALLOWED_EMAIL_DOMAIN: 'example.com',
        MAGIC_LINK_TTL_MINUTES: '30'
      }).getConfig();

      expect(config.server.port).toBe(8080);
      expect(config.server.domain).toBe('https://tasks.example.com');
      expect(config.server.sessionSecret).toBe('test-secret');
      expect(config.auth.allowedEmailDomain).toBe('example.com');
      expect(config.auth.magicLinkTtlMinutes).toBe(30);
    });

    it('should switch to postgres through a Cloud SQL socket', () => {
      const config = createManager({
        USE_CLOUD_SQL: 'true',
        CLOUD_SQL_CONNECTION: 'project:region:instance',
        DB_USER: 'tester',
        DB_PASS: 'test-password',
        DB_NAME: 'tasks'
      }).getConfig();

      expect(config.database.dialect).toBe('postgres');
      expect(config.database.postgres.host).toBe('/cloudsql/project:region:instance');
      expect(config.database.postgres.user).toBe('tester');
      expect(config.database.postgres.password).toBe('test-password');
      expect(config.database.postgres.database).toBe('tasks');
      expect(config.database.postgres.port).toBe(5432);
    });

    it('should pick the API key of the selected provider', () => {
      const config = createManager({
        LLM_PROVIDER: 'openai',
        OPENAI_API_KEY: 'test-openai-key',
        ANTHROPIC_API_KEY: 'test-anthropic-key'
      }).getConfig();

      expect(config.assistant.provider).toBe('openai');
      expect(config.assistant.apiKey).toBe('test-openai-key');
    });

    it('should prefer LLM_API_KEY over provider keys', () => {
      const config = createManager({
        ANTHROPIC_API_KEY: 'test-anthropic-key',
        LLM_API_KEY: 'test-shared-key'
      }).getConfig();

      expect(config.assistant.apiKey).toBe('test-shared-key');
    });

    it('should fall back to the SMTP user as sender', () => {
      const config = createManager({ SMTP_USER: 'mailer@example.com' }).getConfig();

      expect(config.mail.fromEmail).toBe('mailer@example.com');
    });

    it('should treat empty variables as unset', () => {
      const config = createManager({ PORT: '', ALLOWED_EMAIL_DOMAIN: '' }).getConfig();

      expect(config.server.port).toBe(5001);
      expect(config.auth.allowedEmailDomain).toBe('fydy.ai');
    });

    it('should reject unknown log levels', () => {
      expect(() => createManager({ LOG_LEVEL: 'verbose' })).toThrow(
        /Invalid environment variables: general\.logLevel/
      );
    });

    it('should reject out of range ports', () => {
      expect(() => createManager({ PORT: '70000' })).toThrow(
        'Invalid configuration: server.port: Port must be between 1 and 65535'
      );
    });
  });

  describe('configuration file', () => {
    it('should apply a YAML file below the environment', () => {
      fs.writeFileSync(
        path.join(workDir, 'config.yaml'),
        ['server:', '  port: 8080', 'assistant:', '  maxToolRounds: 3', ''].join('\n')
      );

      const manager = createManager({ PORT: '9000' });
      const config = manager.getConfig();

      expect(config.server.port).toBe(9000);
      expect(config.assistant.maxToolRounds).toBe(3);
      expect(manager.getSources().map(info => info.source)).toEqual([
        ConfigSource.DEFAULT,
        ConfigSource.FILE,
        ConfigSource.ENV
      ]);
    });

    it('should ignore a file that does not match the schema', () => {
      fs.writeFileSync(path.join(workDir, 'config.json'), JSON.stringify({ server: { port: 'eighty' } }));

      const manager = createManager();

      expect(manager.getConfig().server.port).toBe(5001);
      expect(manager.getSources().map(info => info.source)).toEqual([ConfigSource.DEFAULT, ConfigSource.ENV]);
    });
  });

  describe('runtime updates', () => {
    it('should apply valid overrides', () => {
      const manager = createManager();

      manager.updateConfig({ assistant: { maxToolRounds: 2 } });

      expect(manager.getConfig().assistant.maxToolRounds).toBe(2);
      expect(manager.getConfig().assistant.historyLimit).toBe(20);
    });

    it('should reject invalid overrides and keep the old config', () => {
      const manager = createManager();

      expect(() => manager.updateConfig({ assistant: { temperature: 2 } })).toThrow(
        'Invalid configuration: assistant.temperature: Temperature must be between 0 and 1'
      );
      expect(manager.getConfig().assistant.temperature).toBe(0.7);
    });
  });

  describe('validation', () => {
    it('should warn when no assistant key is configured', () => {
      const manager = createManager();
      const result = manager.validateConfig(manager.getConfig());

      expect(result.valid).toBe(true);
      expect(result.warnings).toContain('No assistant API key configured; chat requests will fail');
    });

    it('should require positive limits', () => {
      const manager = createManager();
      const config = applyOverrides(createDefaultConfig(workDir), { assistant: { historyLimit: 0 } });
      const result = manager.validateConfig(config);

      expect(result.valid).toBe(false);
      expect(result.errors.map(error => error.field)).toEqual(['assistant.historyLimit']);
    });
  });

  describe('masking', () => {
    it('should hide secrets', () => {
      const manager = createManager({
        SECRET_KEY: 'test-secret',
        SMTP_PASS: 'test-password',
        LLM_API_KEY: 'test-key'
      });
      const masked = manager.getMaskedConfig();

      expect(masked.server.sessionSecret).toBe('********');
      expect(masked.mail.smtpPass).toBe('********');
      expect(masked.assistant.apiKey).toBe('********');
      expect(masked.server.maintenanceToken).toBe('');
      expect(JSON.parse(manager.exportToJSON()).assistant.apiKey).toBe('********');
    });
  });
});
