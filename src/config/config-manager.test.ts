/**
 * Tests for ConfigManager class
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager, ConfigValidationFailure } from './config-manager';
import { ErrorCategory, NetworkMonitoringError } from '../error-handling';

function validationFields(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigValidationFailure) {
      return error.errors.map(err => err.field);
    }
    throw error;
  }
  return [];
}

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;
  let configManager: ConfigManager;
  const originalPort = process.env.PORT;

  beforeEach(async () => {
    delete process.env.PORT;
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'netstatus-config-'));
    configPath = path.join(tempDir, 'config.json');
    configManager = new ConfigManager(configPath);
  });

  afterEach(async () => {
    if (originalPort === undefined) {
      delete process.env.PORT;
    } else {
      process.env.PORT = originalPort;
    }
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('Configuration Validation', () => {
    it('should fill in defaults for an empty object', () => {
      expect(configManager.validateConfig({})).toEqual(configManager.getDefaultConfig());
    });

    it('should accept a complete configuration', () => {
      const config = configManager.validateConfig({
        gateway: { name: 'Router', address: '10.0.0.1' },
        internet: { name: 'Resolver', address: '1.1.1.1' },
        probe_timeout_ms: 1500,
        check_interval_seconds: 10,
        history_capacity: 100,
        anomaly_state: 'UP',
        log_file: '',
        alerts: { enabled: true, webhook_url: 'https://hooks.example.test/a', timeout_ms: 2000, subject: 'Lab' },
        dashboard: { host: '127.0.0.1', port: 8080, recent_limit: 20 }
      });

      expect(config.gateway).toEqual({ name: 'Router', address: '10.0.0.1' });
      expect(config.anomaly_state).toBe('UP');
      expect(config.log_file).toBe('');
      expect(config.alerts.enabled).toBe(true);
      expect(config.dashboard).toEqual({ host: '127.0.0.1', port: 8080, recent_limit: 20 });
    });

    it('should reject out-of-range numbers', () => {
      expect(validationFields(() => configManager.validateConfig({
        probe_timeout_ms: 50,
        check_interval_seconds: 0,
        history_capacity: 20000,
        dashboard: { port: 70000, recent_limit: 0 }
      }))).toEqual([
        'probe_timeout_ms',
        'check_interval_seconds',
        'history_capacity',
        'dashboard.port',
        'dashboard.recent_limit'
      ]);
    });

    it('should reject addresses that could be read as ping options', () => {
      expect(validationFields(() => configManager.validateConfig({
        gateway: { name: 'Gateway', address: '-f' },
        internet: { name: 'Internet', address: '8.8.8.8 -c 100' }
      }))).toEqual(['gateway.address', 'internet.address']);
    });

    it('should require a webhook URL when alerts are enabled', () => {
      expect(validationFields(() => configManager.validateConfig({
        alerts: { enabled: true, webhook_url: 'ftp://hooks.example.test' }
      }))).toEqual(['alerts.webhook_url']);
    });

    it('should reject an unknown anomaly state', () => {
      expect(validationFields(() => configManager.validateConfig({ anomaly_state: 'INTERNET_DOWN' })))
        .toEqual(['anomaly_state']);
    });

    it('should reject a non-object configuration', () => {
      expect(validationFields(() => configManager.validateConfig([]))).toEqual(['(root)']);
    });

    it('should accept fractional intervals of at least one second', () => {
      expect(configManager.validateConfig({ check_interval_seconds: 1.5 }).check_interval_seconds).toBe(1.5);
      expect(validationFields(() => configManager.validateConfig({ check_interval_seconds: 0.5 })))
        .toEqual(['check_interval_seconds']);
      expect(validationFields(() => configManager.validateConfig({ check_interval_seconds: '30' })))
        .toEqual(['check_interval_seconds']);
    });

    it('should raise configuration errors in the monitoring error taxonomy', () => {
      let caught: unknown;
      try {
        configManager.validateConfig({ history_capacity: 0 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(NetworkMonitoringError);
      if (caught instanceof ConfigValidationFailure) {
        expect(caught.category).toBe(ErrorCategory.CONFIGURATION);
        expect(caught.component).toBe('ConfigManager');
        expect(caught.details).toEqual({ fields: ['history_capacity'] });
      }
    });
  });

  describe('Configuration Loading', () => {
    it('should create the default configuration when the file is missing', async () => {
      const config = await configManager.loadConfig();

      expect(config).toEqual(configManager.getDefaultConfig());
      const written: unknown = JSON.parse(await fs.readFile(configPath, 'utf-8'));
      expect(written).toEqual(configManager.getDefaultConfig());
      expect(configManager.getCurrentConfig()).toEqual(config);
    });

    it('should load and validate an existing file', async () => {
      await fs.writeFile(configPath, JSON.stringify({ check_interval_seconds: 5, gateway: { name: 'Lab', address: '10.1.1.1' } }));

      const config = await configManager.loadConfig();

      expect(config.check_interval_seconds).toBe(5);
      expect(config.gateway).toEqual({ name: 'Lab', address: '10.1.1.1' });
      expect(config.internet.address).toBe('8.8.8.8');
    });

    it('should report invalid JSON', async () => {
      await fs.writeFile(configPath, '{ not json');

      await expect(configManager.loadConfig()).rejects.toBeInstanceOf(ConfigValidationFailure);
      expect(configManager.getCurrentConfig()).toBeNull();
    });

    it('should let PORT override the dashboard port', async () => {
      process.env.PORT = '8123';

      const config = await configManager.loadConfig();

      expect(config.dashboard.port).toBe(8123);
    });

    it('should reject an invalid PORT', async () => {
      process.env.PORT = 'eighty';

      await expect(configManager.loadConfig()).rejects.toThrow('PORT must be an integer between 0 and 65535');
    });
  });
});
