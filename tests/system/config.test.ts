import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigManager, REDACTED, mergeConfig } from '../../src/system/config';
import { EnvLoader, EnvReader } from '../../src/system/config/env';
import { ConfigurationError } from '../../src/system/error-handling';
import { LogLevel } from '../../src/system/logging/logger';

describe('ConfigManager', () => {
  let tempDir: string;

  const writeConfig = (content: string): string => {
    const file = path.join(tempDir, 'delivery.yaml');
    fs.writeFileSync(file, content);
    return file;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'delivery-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('default configuration', () => {
    it('should load defaults without a file or environment', () => {
      const manager = new ConfigManager({ configPath: writeConfig(''), env: {} });
      const config = manager.getConfig();

      expect(config.scheduler).toEqual({ hour: 9, minute: 0, timezone: 'UTC', catchUpPolicy: 'skip' });
      expect(config.delivery).toEqual({
        concurrency: 3,
        runTimeoutMs: 1800000,
        selectionPolicy: 'lowest-id',
        embellishmentFailurePolicy: 'degrade',
        embellisher: 'templates'
      });
      expect(config.languages).toEqual(['python', 'java', 'cpp', 'javascript', 'go', 'rust']);
      expect(config.logLevel).toBe(LogLevel.INFO);
      expect(manager.validate()).toEqual([]);
    });

    it('should freeze the configuration', () => {
      const config = new ConfigManager({ configPath: writeConfig(''), env: {} }).getConfig();
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.scheduler)).toBe(true);
    });
  });

  describe('file and environment overrides', () => {
    it('should apply the YAML file over the defaults', () => {
      const file = writeConfig([
        'scheduler:',
        '  hour: 7',
        '  timezone: Europe/Berlin',
        'delivery:',
        '  concurrency: 5',
        'languages: [python, go]'
      ].join('\n'));
      const config = new ConfigManager({ configPath: file, env: {} }).getConfig();

      expect(config.scheduler.hour).toBe(7);
      expect(config.scheduler.minute).toBe(0);
      expect(config.scheduler.timezone).toBe('Europe/Berlin');
      expect(config.delivery.concurrency).toBe(5);
      expect(config.delivery.embellisher).toBe('templates');
      expect(config.languages).toEqual(['python', 'go']);
    });

    it('should apply the environment over the file', () => {
      const file = writeConfig('scheduler:\n  hour: 7\n');
      const config = new ConfigManager({
        configPath: file,
        env: {
          SCHEDULER_HOUR: '6',
          SCHEDULER_MINUTE: '30',
          DELIVERY_EMBELLISHER: 'llm',
          SMTP_SECURE: 'true',
          SUPPORTED_LANGUAGES: 'Python, Go'
        }
      }).getConfig();

      expect(config.scheduler.hour).toBe(6);
      expect(config.scheduler.minute).toBe(30);
      expect(config.delivery.embellisher).toBe('llm');
      expect(config.email.secure).toBe(true);
      expect(config.languages).toEqual(['python', 'go']);
    });

    it('should read the log level, with DEBUG taking precedence', () => {
      const configPath = writeConfig('');
      expect(new ConfigManager({ configPath, env: { LOG_LEVEL: 'WARN' } }).getConfig().logLevel).toBe(LogLevel.WARN);
      expect(new ConfigManager({ configPath, env: { LOG_LEVEL: 'warn', DEBUG: 'true' } }).getConfig().logLevel).toBe(LogLevel.DEBUG);
    });
  });

  describe('validation', () => {
    it('should report an explicit file that does not exist', () => {
      const missing = path.join(tempDir, 'missing.yaml');
      const manager = new ConfigManager({ configPath: missing, env: {} });
      expect(manager.validate()).toEqual([`config file not found: ${missing}`]);
    });

    it('should report out-of-range values and fall back to defaults', () => {
      const manager = new ConfigManager({ configPath: writeConfig(''), env: { SCHEDULER_HOUR: '25' } });

      expect(manager.validate()).toEqual(['scheduler.hour: Number must be less than or equal to 23']);
      expect(manager.getConfig().scheduler.hour).toBe(9);
    });

    it('should report a value that is not a number', () => {
      const manager = new ConfigManager({ configPath: writeConfig(''), env: { DELIVERY_CONCURRENCY: 'many' } });
      expect(manager.validate()).toEqual(['delivery.concurrency: Expected number, received nan']);
    });

    it('should report an unknown timezone', () => {
      const manager = new ConfigManager({ configPath: writeConfig(''), env: { SCHEDULER_TIMEZONE: 'Mars/Olympus' } });
      expect(manager.validate()).toEqual(['scheduler.timezone: not a valid IANA timezone "Mars/Olympus"']);
    });

    it('should report malformed YAML', () => {
      const file = writeConfig('scheduler: [unclosed');
      const problems = new ConfigManager({ configPath: file, env: {} }).validate();

      expect(problems).toHaveLength(1);
      expect(problems[0].startsWith(`config file ${file} is not valid YAML:`)).toBe(true);
    });

    it('should require credentials only when asked', () => {
      const manager = new ConfigManager({ configPath: writeConfig(''), env: {} });

      expect(manager.validate()).toEqual([]);
      expect(manager.validate({ generation: true, email: true })).toEqual([
        'generation.apiKey: GENERATION_API_KEY is required',
        'email.user: SMTP_USER is required',
        'email.password: SMTP_PASSWORD is required',
        'email.from: EMAIL_FROM (or SMTP_USER) must be an email address'
      ]);
    });

    it('should throw a ConfigurationError listing every problem', () => {
      const manager = new ConfigManager({ configPath: writeConfig(''), env: { SMTP_USER: 'sender@example.com' } });

      let caught: unknown;
      try {
        manager.assertValid({ email: true });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught instanceof ConfigurationError && caught.problems).toEqual(['email.password: SMTP_PASSWORD is required']);
    });
  });

  describe('sender and redaction', () => {
    const env = {
      GENERATION_API_KEY: 'test-secret',
      SMTP_USER: 'sender@example.com',
      SMTP_PASSWORD: 'test-password'
    };

    it('should prefer EMAIL_FROM over SMTP_USER', () => {
      const configPath = writeConfig('');
      expect(new ConfigManager({ configPath, env }).getSenderAddress()).toBe('sender@example.com');
      expect(new ConfigManager({ configPath, env: { ...env, EMAIL_FROM: 'daily@example.com' } }).getSenderAddress())
        .toBe('daily@example.com');
    });

    it('should mask secrets', () => {
      const manager = new ConfigManager({ configPath: writeConfig(''), env });
      const redacted = manager.getRedactedConfig();

      expect(redacted.generation.apiKey).toBe(REDACTED);
      expect(redacted.email.password).toBe(REDACTED);
      expect(redacted.email.user).toBe('sender@example.com');
      expect(manager.getConfig().generation.apiKey).toBe('test-secret');
      expect(JSON.stringify(redacted)).not.toContain('test-password');
    });
  });

  describe('mergeConfig', () => {
    it('should merge deeply, skip undefined and replace arrays', () => {
      const merged = mergeConfig(
        { a: { b: 1, c: 2 }, list: [1, 2], keep: 'x' },
        { a: { c: 3 }, list: [9], keep: undefined }
      );
      expect(merged).toEqual({ a: { b: 1, c: 3 }, list: [9], keep: 'x' });
    });
  });
});

describe('EnvReader', () => {
  const reader = new EnvReader({
    BLANK: '  ',
    PORT: ' 587 ',
    FLAG: 'Yes',
    LIST: 'a, b,,c'
  });

  it('should treat blank values as unset', () => {
    expect(reader.get('BLANK')).toBeUndefined();
    expect(reader.get('MISSING')).toBeUndefined();
  });

  it('should parse typed values', () => {
    expect(reader.getNumber('PORT')).toBe(587);
    expect(reader.getBoolean('FLAG')).toBe(true);
    expect(reader.getArray('LIST')).toEqual(['a', 'b', 'c']);
  });
});

describe('EnvLoader', () => {
  it('should load .env.local before .env without overriding', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'delivery-env-'));
    fs.writeFileSync(path.join(dir, '.env.local'), 'DELIVERY_TEST_VALUE=local\n');
    fs.writeFileSync(path.join(dir, '.env'), 'DELIVERY_TEST_VALUE=shared\nDELIVERY_TEST_OTHER=shared\n');

    try {
      const loaded = EnvLoader.initialize(dir);
      expect(loaded).toEqual([path.join(dir, '.env.local'), path.join(dir, '.env')]);
      expect(process.env.DELIVERY_TEST_VALUE).toBe('local');
      expect(process.env.DELIVERY_TEST_OTHER).toBe('shared');
    } finally {
      delete process.env.DELIVERY_TEST_VALUE;
      delete process.env.DELIVERY_TEST_OTHER;
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
