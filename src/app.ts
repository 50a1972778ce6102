/**
 * Main application class for the network status monitor
 */

import path from 'path';
import { AlertNotifier, CheckRecord, NetworkStatusConfig } from './types';
import { Logger } from './utils/logger';
import { ConfigManager } from './config/config-manager';
import { HistoryStore } from './storage/history-store';
import { CheckLogSink, FileCheckLog } from './storage/check-log';
import { ConnectivityMonitor, PingProber, Prober } from './monitoring';
import { WebhookNotifier } from './alerts/webhook-notifier';
import { APIServer, DashboardService, HealthReport } from './dashboard';
import { ErrorHandler } from './error-handling';

export interface NetworkStatusAppOptions {
  configPath?: string;
  /** Replaces the ping prober, e.g. in tests */
  prober?: Prober;
  staticPath?: string;
}

interface Components {
  config: NetworkStatusConfig;
  history: HistoryStore;
  monitor: ConnectivityMonitor;
  dashboard: DashboardService;
  apiServer: APIServer;
}

export class NetworkStatusApp {
  private logger: Logger;
  private configManager: ConfigManager;
  private errorHandler: ErrorHandler;
  private options: NetworkStatusAppOptions;
  private components: Components | null = null;
  private isRunning = false;
  private startedAt: Date | null = null;

  constructor(options: NetworkStatusAppOptions = {}) {
    this.logger = new Logger('NetworkStatusApp');
    this.options = options;
    this.configManager = new ConfigManager(options.configPath);
    this.errorHandler = new ErrorHandler();
  }

  /**
   * Load configuration and build all components
   */
  async initialize(): Promise<void> {
    if (this.components) {
      this.logger.warn('App is already initialized');
      return;
    }

    this.logger.info('Initializing network status monitor...');

    const config = await this.configManager.loadConfig();
    const targets = { gateway: config.gateway, internet: config.internet };

    const history = new HistoryStore(config.history_capacity);

    const prober = this.options.prober ?? new PingProber({
      timeoutMs: config.probe_timeout_ms,
      errorHandler: this.errorHandler
    });

    const notifier = this.createNotifier(config);
    const checkLog = this.createCheckLog(config);

    const monitor = new ConnectivityMonitor({
      prober,
      history,
      targets,
      intervalMs: config.check_interval_seconds * 1000,
      anomalyState: config.anomaly_state,
      errorHandler: this.errorHandler,
      alertSubject: config.alerts.subject,
      ...(notifier !== undefined && { notifier }),
      ...(checkLog !== undefined && { checkLog })
    });

    const dashboard = new DashboardService(history, {
      targets,
      recentLimit: config.dashboard.recent_limit
    });

    const apiServer = new APIServer(
      {
        dashboard,
        getConfig: () => this.configManager.getCurrentConfig(),
        getHealth: () => this.healthCheck()
      },
      this.logger.child('API'),
      {
        port: config.dashboard.port,
        host: config.dashboard.host,
        staticPath: this.options.staticPath ?? path.resolve(__dirname, '..', 'public'),
        enableCors: true
      }
    );

    this.components = { config, history, monitor, dashboard, apiServer };
    this.setupEventHandlers(this.components);

    this.logger.info('App initialization completed successfully');
  }

  /**
   * Start the API server, then the monitoring loop
   */
  async start(): Promise<void> {
    if (!this.components) {
      throw new Error('App must be initialized before starting');
    }
    if (this.isRunning) {
      this.logger.warn('App is already running');
      return;
    }

    await this.components.apiServer.start();
    this.components.monitor.start();

    this.isRunning = true;
    this.startedAt = new Date();
    this.logger.info('Network status monitor started');
  }

  /**
   * Stop monitoring (letting an in-flight tick finish) and close the server
   */
  async stop(): Promise<void> {
    if (!this.components || !this.isRunning) {
      this.logger.warn('App is not running');
      return;
    }

    this.logger.info('Stopping network status monitor...');
    await this.components.monitor.stop();
    await this.components.apiServer.stop();

    this.isRunning = false;
    this.logger.info('Network status monitor stopped');
  }

  getMonitor(): ConnectivityMonitor | null {
    return this.components?.monitor ?? null;
  }

  getDashboard(): DashboardService | null {
    return this.components?.dashboard ?? null;
  }

  getAPIServer(): APIServer | null {
    return this.components?.apiServer ?? null;
  }

  healthCheck(): HealthReport {
    const system = this.errorHandler.getSystemHealth();

    let status: HealthReport['status'] = 'healthy';
    if (!this.isRunning) {
      status = 'unhealthy';
    } else if (system.overall_status !== 'healthy') {
      status = 'degraded';
    }

    return {
      status,
      uptime_seconds: this.startedAt ? Math.floor((Date.now() - this.startedAt.getTime()) / 1000) : 0,
      scheduler: this.components ? this.components.monitor.getSchedulerStatus() : null,
      system
    };
  }

  private setupEventHandlers(components: Components): void {
    const { monitor, dashboard, apiServer } = components;

    monitor.on('check', (record: CheckRecord) => {
      try {
        apiServer.broadcastUpdate({
          type: 'check',
          record,
          current_state: record.state,
          stats: dashboard.getStats()
        });
      } catch (error) {
        this.logger.error('Error broadcasting check result:', error);
      }
    });
  }

  private createNotifier(config: NetworkStatusConfig): AlertNotifier | undefined {
    if (!config.alerts.enabled) {
      this.logger.info('Alerts disabled');
      return undefined;
    }

    this.logger.info('Webhook alerts enabled');
    return new WebhookNotifier({
      url: config.alerts.webhook_url,
      timeoutMs: config.alerts.timeout_ms,
      subject: config.alerts.subject,
      targets: { gateway: config.gateway, internet: config.internet }
    });
  }

  private createCheckLog(config: NetworkStatusConfig): CheckLogSink | undefined {
    if (config.log_file === '') {
      this.logger.info('Check log file disabled');
      return undefined;
    }

    const logPath = path.resolve(config.log_file);
    this.logger.info(`Writing check log to ${logPath}`);
    return new FileCheckLog(logPath);
  }
}
