/**
 * Configuration manager for the network status monitor
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { AlertConfig, AnomalyState, DashboardConfig, NetworkStatusConfig, ProbeTarget } from '../types';
import { Logger } from '../utils/logger';
import { ErrorCategory, ErrorSeverity, NetworkMonitoringError } from '../error-handling';

export interface ConfigValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export class ConfigValidationFailure extends NetworkMonitoringError {
  readonly errors: ConfigValidationError[];

  constructor(errors: ConfigValidationError[]) {
    super(
      `Configuration validation failed: ${errors.map(err => `${err.field}: ${err.message}`).join('; ')}`,
      ErrorCategory.CONFIGURATION,
      ErrorSeverity.CRITICAL,
      'ConfigManager',
      undefined,
      { fields: errors.map(err => err.field) }
    );
    this.name = 'ConfigValidationFailure';
    this.errors = errors;
  }
}

const ANOMALY_STATES: readonly AnomalyState[] = ['GATEWAY_DOWN', 'UP'];

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isIntegerInRange(value: unknown, min: number, max: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max;
}

export class ConfigManager {
  private logger: Logger;
  private configPath: string;
  private currentConfig: NetworkStatusConfig | null = null;

  constructor(configPath?: string) {
    this.logger = new Logger('ConfigManager');
    this.configPath = configPath || process.env.CONFIG_PATH || path.resolve('config.json');
  }

  /**
   * Read and validate the configuration file, writing the defaults first if
   * it does not exist yet. Environment overrides are applied afterwards.
   */
  async loadConfig(): Promise<NetworkStatusConfig> {
    this.logger.info(`Loading configuration from ${this.configPath}`);

    let config: NetworkStatusConfig;
    if (!(await this.fileExists(this.configPath))) {
      this.logger.info('Config file not found, creating default configuration');
      config = this.getDefaultConfig();
      await this.saveConfig(config);
    } else {
      const configData = await fs.readFile(this.configPath, 'utf-8');
      let parsedConfig: unknown;
      try {
        parsedConfig = JSON.parse(configData);
      } catch (error) {
        throw new ConfigValidationFailure([{
          field: '(file)',
          message: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`
        }]);
      }
      config = this.validateConfig(parsedConfig);
    }

    config = this.applyEnvironmentOverrides(config);
    this.currentConfig = config;
    this.logger.info('Configuration loaded and validated successfully');

    return config;
  }

  async saveConfig(config: NetworkStatusConfig): Promise<void> {
    const validatedConfig = this.validateConfig(config);

    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(validatedConfig, null, 2), 'utf-8');

    this.logger.info('Configuration saved successfully');
  }

  getCurrentConfig(): NetworkStatusConfig | null {
    return this.currentConfig;
  }

  /**
   * Validate a parsed configuration; missing optional fields take defaults.
   * All problems are collected and reported in one error.
   */
  validateConfig(config: unknown): NetworkStatusConfig {
    if (!isObject(config)) {
      throw new ConfigValidationFailure([{ field: '(root)', message: 'configuration must be an object', value: config }]);
    }

    const defaults = this.getDefaultConfig();
    const errors: ConfigValidationError[] = [];

    const gateway = this.validateTarget(config.gateway, 'gateway', defaults.gateway, errors);
    const internet = this.validateTarget(config.internet, 'internet', defaults.internet, errors);

    const probeTimeout = config.probe_timeout_ms ?? defaults.probe_timeout_ms;
    if (!isIntegerInRange(probeTimeout, 100, 30000)) {
      errors.push({
        field: 'probe_timeout_ms',
        message: 'probe_timeout_ms must be an integer between 100 and 30000',
        value: probeTimeout
      });
    }

    const interval = config.check_interval_seconds ?? defaults.check_interval_seconds;
    if (!this.isValidInterval(interval)) {
      errors.push({
        field: 'check_interval_seconds',
        message: 'check_interval_seconds must be a number between 1 and 3600',
        value: interval
      });
    }

    const capacity = config.history_capacity ?? defaults.history_capacity;
    if (!isIntegerInRange(capacity, 1, 10000)) {
      errors.push({
        field: 'history_capacity',
        message: 'history_capacity must be an integer between 1 and 10000',
        value: capacity
      });
    }

    const anomalyState = config.anomaly_state ?? defaults.anomaly_state;
    if (!ANOMALY_STATES.some(state => state === anomalyState)) {
      errors.push({
        field: 'anomaly_state',
        message: `anomaly_state must be one of ${ANOMALY_STATES.join(', ')}`,
        value: anomalyState
      });
    }

    const logFile = config.log_file ?? defaults.log_file;
    if (typeof logFile !== 'string') {
      errors.push({
        field: 'log_file',
        message: 'log_file must be a string (empty to disable)',
        value: logFile
      });
    }

    const alerts = this.validateAlerts(config.alerts, defaults.alerts, errors);
    const dashboard = this.validateDashboard(config.dashboard, defaults.dashboard, errors);

    if (errors.length > 0) {
      throw new ConfigValidationFailure(errors);
    }

    return {
      gateway,
      internet,
      probe_timeout_ms: Number(probeTimeout),
      check_interval_seconds: Number(interval),
      history_capacity: Number(capacity),
      anomaly_state: anomalyState === 'UP' ? 'UP' : 'GATEWAY_DOWN',
      log_file: String(logFile),
      alerts,
      dashboard
    };
  }

  getDefaultConfig(): NetworkStatusConfig {
    return {
      gateway: {
        name: 'Gateway',
        address: '192.168.0.1'
      },
      internet: {
        name: 'Internet',
        address: '8.8.8.8'
      },
      probe_timeout_ms: 2000,
      check_interval_seconds: 30,
      history_capacity: 500,
      anomaly_state: 'GATEWAY_DOWN',
      log_file: 'network_status.log',
      alerts: {
        enabled: false,
        webhook_url: '',
        timeout_ms: 10000,
        subject: 'Network Monitor Alert'
      },
      dashboard: {
        host: '0.0.0.0',
        port: 5000,
        recent_limit: 50
      }
    };
  }

  private validateTarget(
    raw: unknown,
    field: string,
    fallback: ProbeTarget,
    errors: ConfigValidationError[]
  ): ProbeTarget {
    if (raw === undefined) {
      return { ...fallback };
    }
    if (!isObject(raw)) {
      errors.push({ field, message: `${field} must be an object with name and address`, value: raw });
      return { ...fallback };
    }

    const name = raw.name ?? fallback.name;
    if (typeof name !== 'string' || name.trim() === '') {
      errors.push({ field: `${field}.name`, message: 'name must be a non-empty string', value: name });
    }

    const address = raw.address;
    if (typeof address !== 'string' || address.trim() === '') {
      errors.push({ field: `${field}.address`, message: 'address must be a non-empty string', value: address });
    } else if (address.startsWith('-') || /\s/.test(address)) {
      errors.push({ field: `${field}.address`, message: 'address must be a host name or IP address', value: address });
    }

    return {
      name: typeof name === 'string' ? name.trim() : fallback.name,
      address: typeof address === 'string' ? address.trim() : fallback.address
    };
  }

  private validateAlerts(raw: unknown, fallback: AlertConfig, errors: ConfigValidationError[]): AlertConfig {
    if (raw === undefined) {
      return { ...fallback };
    }
    if (!isObject(raw)) {
      errors.push({ field: 'alerts', message: 'alerts must be an object', value: raw });
      return { ...fallback };
    }

    const enabled = raw.enabled ?? fallback.enabled;
    if (typeof enabled !== 'boolean') {
      errors.push({ field: 'alerts.enabled', message: 'enabled must be a boolean', value: enabled });
    }

    const webhookUrl = raw.webhook_url ?? fallback.webhook_url;
    if (typeof webhookUrl !== 'string') {
      errors.push({ field: 'alerts.webhook_url', message: 'webhook_url must be a string', value: webhookUrl });
    } else if (enabled === true && !this.isHttpUrl(webhookUrl)) {
      errors.push({
        field: 'alerts.webhook_url',
        message: 'webhook_url must be an http(s) URL when alerts are enabled',
        value: webhookUrl
      });
    }

    const timeoutMs = raw.timeout_ms ?? fallback.timeout_ms;
    if (!isIntegerInRange(timeoutMs, 100, 60000)) {
      errors.push({
        field: 'alerts.timeout_ms',
        message: 'timeout_ms must be an integer between 100 and 60000',
        value: timeoutMs
      });
    }

    const subject = raw.subject ?? fallback.subject;
    if (typeof subject !== 'string' || subject.trim() === '') {
      errors.push({ field: 'alerts.subject', message: 'subject must be a non-empty string', value: subject });
    }

    return {
      enabled: enabled === true,
      webhook_url: typeof webhookUrl === 'string' ? webhookUrl : '',
      timeout_ms: Number(timeoutMs),
      subject: typeof subject === 'string' ? subject : fallback.subject
    };
  }

  private validateDashboard(raw: unknown, fallback: DashboardConfig, errors: ConfigValidationError[]): DashboardConfig {
    if (raw === undefined) {
      return { ...fallback };
    }
    if (!isObject(raw)) {
      errors.push({ field: 'dashboard', message: 'dashboard must be an object', value: raw });
      return { ...fallback };
    }

    const host = raw.host ?? fallback.host;
    if (typeof host !== 'string' || host.trim() === '') {
      errors.push({ field: 'dashboard.host', message: 'host must be a non-empty string', value: host });
    }

    const port = raw.port ?? fallback.port;
    if (!isIntegerInRange(port, 0, 65535)) {
      errors.push({ field: 'dashboard.port', message: 'port must be an integer between 0 and 65535', value: port });
    }

    const recentLimit = raw.recent_limit ?? fallback.recent_limit;
    if (!isIntegerInRange(recentLimit, 1, 1000)) {
      errors.push({
        field: 'dashboard.recent_limit',
        message: 'recent_limit must be an integer between 1 and 1000',
        value: recentLimit
      });
    }

    return {
      host: typeof host === 'string' ? host : fallback.host,
      port: Number(port),
      recent_limit: Number(recentLimit)
    };
  }

  private applyEnvironmentOverrides(config: NetworkStatusConfig): NetworkStatusConfig {
    const portOverride = process.env.PORT;
    if (portOverride === undefined || portOverride === '') {
      return config;
    }

    const port = Number(portOverride);
    if (!isIntegerInRange(port, 0, 65535)) {
      throw new ConfigValidationFailure([{ field: 'PORT', message: 'PORT must be an integer between 0 and 65535', value: portOverride }]);
    }

    this.logger.info(`Dashboard port overridden by PORT=${port}`);
    return { ...config, dashboard: { ...config.dashboard, port } };
  }

  private isValidInterval(interval: unknown): boolean {
    return typeof interval === 'number' && interval >= 1 && interval <= 3600;
  }

  private isHttpUrl(value: string): boolean {
    try {
      const url = new URL(value);
      return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
      return false;
    }
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
