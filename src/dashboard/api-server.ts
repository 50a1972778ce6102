/**
 * Express.js API server for the dashboard
 * Serves status, statistics, history and chart data, plus live updates over WebSocket
 */

import express, { Request, Response, NextFunction } from 'express';
import { Server as WebSocketServer, WebSocket, RawData } from 'ws';
import { createServer, Server } from 'http';
import { Logger, NetworkStatusConfig, APIResponse, DashboardData } from '../types';
import { SystemHealth } from '../error-handling';
import { SchedulerStatus } from '../monitoring/scheduler';
import { DashboardService } from './dashboard-service';

export interface APIServerConfig {
  port: number;
  host: string;
  staticPath?: string;
  enableCors?: boolean;
}

export interface HealthReport {
  status: 'healthy' | 'degraded' | 'unhealthy';
  uptime_seconds: number;
  scheduler: SchedulerStatus | null;
  system: SystemHealth;
}

export interface APIServerDependencies {
  dashboard: DashboardService;
  getConfig: () => NetworkStatusConfig | null;
  getHealth: () => HealthReport;
}

type ClientMessage = { type: 'snapshot' } | { type: 'ping' };

function parseClientMessage(raw: RawData): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.toString());
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) {
    return null;
  }
  const type = parsed.type;
  return type === 'snapshot' || type === 'ping' ? { type } : null;
}

/**
 * Parse a `limit` query value; anything that is not a whole number falls
 * back to the default, whole numbers are clamped to 1..max
 */
export function parseLimit(raw: unknown, fallback: number, max: number): number {
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) {
    return fallback;
  }
  return Math.min(Math.max(parseInt(raw, 10), 1), max);
}

export function redactConfig(config: NetworkStatusConfig): NetworkStatusConfig {
  return {
    ...config,
    alerts: {
      ...config.alerts,
      webhook_url: config.alerts.webhook_url === '' ? '' : '[redacted]'
    }
  };
}

export class APIServer {
  private app: express.Application;
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private deps: APIServerDependencies;
  private logger: Logger;
  private config: APIServerConfig;

  constructor(deps: APIServerDependencies, logger: Logger, config: APIServerConfig) {
    this.app = express();
    this.deps = deps;
    this.logger = logger;
    this.config = config;

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    // Enable CORS if configured
    if (this.config.enableCors) {
      this.app.use((req: Request, res: Response, next: NextFunction) => {
        res.header('Access-Control-Allow-Origin', '*');
        res.header('Access-Control-Allow-Methods', 'GET, OPTIONS');
        res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept');

        if (req.method === 'OPTIONS') {
          res.sendStatus(200);
          return;
        }
        next();
      });
    }

    // Request logging
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger.debug(`${req.method} ${req.path} - ${req.ip}`);
      next();
    });

    // Serve the dashboard page at root
    if (this.config.staticPath) {
      this.app.use(express.static(this.config.staticPath));
    }
  }

  private setupRoutes(): void {
    this.app.get('/api/health', this.handleHealthCheck.bind(this));
    this.app.get('/api/dashboard', this.handleGetDashboardData.bind(this));
    this.app.get('/api/status', this.handleGetStatus.bind(this));
    this.app.get('/api/stats', this.handleGetStats.bind(this));
    this.app.get('/api/history', this.handleGetHistory.bind(this));
    this.app.get('/api/chart', this.handleGetChart.bind(this));
    this.app.get('/api/config', this.handleGetConfig.bind(this));

    // 404 handler - only for API routes
    this.app.use('/api', (_req: Request, res: Response) => {
      this.sendError(res, 404, 'API endpoint not found');
    });

    // Error handling middleware
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      this.logger.error('API Error:', err);
      this.sendError(res, 500, 'Internal server error');
    });
  }

  private handleHealthCheck(_req: Request, res: Response): void {
    try {
      const health = this.deps.getHealth();
      res.status(health.status === 'unhealthy' ? 503 : 200);
      this.sendData(res, health);
    } catch (error) {
      this.logger.error('Health check failed:', error);
      this.sendError(res, 500, 'Health check failed');
    }
  }

  private handleGetDashboardData(_req: Request, res: Response): void {
    try {
      this.sendData<DashboardData>(res, this.deps.dashboard.getDashboardData());
    } catch (error) {
      this.logger.error('Failed to get dashboard data:', error);
      this.sendError(res, 500, 'Failed to retrieve dashboard data');
    }
  }

  private handleGetStatus(_req: Request, res: Response): void {
    try {
      this.sendData(res, this.deps.dashboard.getCurrentStatus());
    } catch (error) {
      this.logger.error('Failed to get status:', error);
      this.sendError(res, 500, 'Failed to retrieve status');
    }
  }

  private handleGetStats(_req: Request, res: Response): void {
    try {
      this.sendData(res, this.deps.dashboard.getStats());
    } catch (error) {
      this.logger.error('Failed to get stats:', error);
      this.sendError(res, 500, 'Failed to retrieve stats');
    }
  }

  private handleGetHistory(req: Request, res: Response): void {
    try {
      const dashboard = this.deps.dashboard;
      const limit = parseLimit(req.query.limit, dashboard.getRecentLimit(), dashboard.getHistoryCapacity());
      this.sendData(res, dashboard.getRecentChecks(limit));
    } catch (error) {
      this.logger.error('Failed to get history:', error);
      this.sendError(res, 500, 'Failed to retrieve history');
    }
  }

  private handleGetChart(_req: Request, res: Response): void {
    try {
      this.sendData(res, this.deps.dashboard.getChartSeries());
    } catch (error) {
      this.logger.error('Failed to get chart series:', error);
      this.sendError(res, 500, 'Failed to retrieve chart series');
    }
  }

  private handleGetConfig(_req: Request, res: Response): void {
    const config = this.deps.getConfig();
    if (!config) {
      this.sendError(res, 503, 'No configuration loaded');
      return;
    }
    this.sendData(res, redactConfig(config));
  }

  private sendData<T>(res: Response, data: T): void {
    const body: APIResponse<T> = {
      success: true,
      data,
      timestamp: new Date()
    };
    res.json(body);
  }

  private sendError(res: Response, status: number, error: string): void {
    const body: APIResponse = {
      success: false,
      error,
      timestamp: new Date()
    };
    res.status(status).json(body);
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer(this.app);
      this.server = server;

      // WebSocket server for real-time updates; it re-emits http server errors
      const wss = new WebSocketServer({ server });
      wss.on('error', (error: Error) => {
        this.logger.debug('WebSocket server error:', error);
      });
      this.wss = wss;
      this.setupWebSocketHandlers(wss);

      server.once('error', (error: Error) => {
        this.logger.error('Server error:', error);
        this.server = null;
        this.wss = null;
        wss.close();
        reject(error);
      });

      server.listen(this.config.port, this.config.host, () => {
        this.logger.info(`API server started on ${this.config.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const wss = this.wss;
    this.wss = null;
    if (wss) {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>(resolve => wss.close(() => resolve()));
    }

    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('API server stopped');
        resolve();
      });
    });
  }

  /**
   * Port the server is bound to (useful when configured with port 0)
   */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }

  getConnectionCount(): number {
    return this.wss ? this.wss.clients.size : 0;
  }

  private setupWebSocketHandlers(wss: WebSocketServer): void {
    wss.on('connection', (ws: WebSocket) => {
      this.logger.debug('WebSocket client connected');

      // Protocol violations (e.g. unmasked frames) surface here; ws closes the socket itself
      ws.on('error', (error: Error) => {
        this.logger.warn('WebSocket client error:', error);
      });

      ws.on('message', (message: RawData) => {
        const data = parseClientMessage(message);
        if (!data) {
          ws.send(JSON.stringify({
            type: 'error',
            message: 'Invalid message format'
          }));
          return;
        }
        this.handleWebSocketMessage(ws, data);
      });

      ws.on('close', () => {
        this.logger.debug('WebSocket client disconnected');
      });

      // Send initial connection confirmation
      ws.send(JSON.stringify({
        type: 'connected',
        timestamp: new Date()
      }));
    });
  }

  private handleWebSocketMessage(ws: WebSocket, data: ClientMessage): void {
    switch (data.type) {
      case 'snapshot':
        ws.send(JSON.stringify({
          type: 'snapshot',
          data: this.deps.dashboard.getDashboardData(),
          timestamp: new Date()
        }));
        break;

      case 'ping':
        ws.send(JSON.stringify({ type: 'pong', timestamp: new Date() }));
        break;
    }
  }

  /**
   * Broadcast update to all connected clients
   */
  broadcastUpdate(data: unknown): void {
    if (!this.wss) return;

    const message = JSON.stringify({
      type: 'update',
      data,
      timestamp: new Date()
    });

    this.wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    });
  }
}
