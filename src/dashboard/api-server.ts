/**
 * Express.js API server for alert and threshold data
 * Provides REST endpoints for active alerts, threshold management and health, plus a WebSocket push channel
 */

import express, { Request, Response, NextFunction } from 'express';
import { WebSocket, WebSocketServer } from 'ws';
import { createServer, Server } from 'http';
import { ErrorHandler } from '../error-handling';
import { Logger } from '../utils/logger';
import { ThresholdMonitor } from '../alerts/threshold-monitor';
import {
  ActiveAlertsResponse,
  AlertSeverity,
  AlertType,
  APIResponse,
  ComparisonDirection,
  isMetricKey,
  MonitorName,
  RealtimeMessage,
  ThresholdConfig,
  ThresholdListing,
  ThresholdOptions
} from '../types';

export interface APIServerConfig {
  port: number;
  host: string;
  enableCors?: boolean;
}

export type ThresholdControl = Pick<
  ThresholdMonitor<unknown>,
  'getActiveAlerts' | 'getThresholds' | 'setThreshold' | 'getStatus'
>;

export type MonitorMap = Partial<Record<MonitorName, ThresholdControl>>;

export interface APIResult<T> {
  status: number;
  body: APIResponse<T>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEnumValue<T extends Record<string, string>>(enumObject: T, value: unknown): value is T[keyof T] {
  return typeof value === 'string' && Object.values(enumObject).includes(value);
}

export class APIServer {
  private app: express.Application;
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private monitors: MonitorMap;
  private errorHandler: ErrorHandler;
  private logger: Logger;
  private config: APIServerConfig;
  private startTime: Date;

  constructor(monitors: MonitorMap, errorHandler: ErrorHandler, config: APIServerConfig) {
    this.app = express();
    this.monitors = monitors;
    this.errorHandler = errorHandler;
    this.logger = new Logger('APIServer');
    this.config = config;
    this.startTime = new Date();

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    if (this.config.enableCors) {
      this.app.use((req: Request, res: Response, next: NextFunction) => {
        res.header('Access-Control-Allow-Origin', '*');
        res.header('Access-Control-Allow-Methods', 'GET, PUT, OPTIONS');
        res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept');

        if (req.method === 'OPTIONS') {
          res.sendStatus(200);
          return;
        }
        next();
      });
    }

    this.app.use(express.json({ limit: '1mb' }));

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      this.logger.debug(`${req.method} ${req.path} - ${req.ip}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/api/health', (req: Request, res: Response) => {
      this.send(res, this.getHealth());
    });

    this.app.get('/api/alerts', (req: Request, res: Response) => {
      this.send(res, this.getActiveAlerts());
    });

    this.app.get('/api/thresholds', (req: Request, res: Response) => {
      this.send(res, this.getThresholds());
    });

    this.app.put('/api/thresholds/:monitor/:name', (req: Request, res: Response) => {
      this.send(res, this.updateThreshold(req.params.monitor, req.params.name, req.body));
    });

    this.app.get('/api/system/health', (req: Request, res: Response) => {
      this.send(res, this.getSystemHealth());
    });

    this.app.use('/api/*', (req: Request, res: Response) => {
      this.send(res, this.failure(404, 'API endpoint not found'));
    });

    this.app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
      this.logger.error('API Error:', err);
      if (res.headersSent) {
        next(err);
        return;
      }
      this.send(res, this.failure(500, 'Internal server error'));
    });
  }

  getHealth(): APIResult<{ status: string; uptime: number; monitors: ReturnType<ThresholdControl['getStatus']>[] }> {
    const uptime = Math.floor((Date.now() - this.startTime.getTime()) / 1000);
    return this.success({
      status: 'healthy',
      uptime,
      monitors: this.entries().map(([, monitor]) => monitor.getStatus())
    });
  }

  getActiveAlerts(): APIResult<ActiveAlertsResponse> {
    const alerts: ActiveAlertsResponse['alerts'] = {};

    for (const [name, monitor] of this.entries()) {
      for (const [key, alert] of Object.entries(monitor.getActiveAlerts())) {
        alerts[key] = { ...alert, monitor: name };
      }
    }

    return this.success({ alerts, count: Object.keys(alerts).length });
  }

  getThresholds(): APIResult<ThresholdListing[]> {
    return this.success(this.entries().map(([name, monitor]) => ({
      monitor: name,
      thresholds: monitor.getThresholds()
    })));
  }

  /**
   * Apply a threshold update from a request body. Unknown monitors are 404, rejected updates 400.
   */
  updateThreshold(monitorName: string, thresholdName: string, body: unknown): APIResult<ThresholdConfig> {
    const monitor = this.findMonitor(monitorName);
    if (!monitor) {
      return this.failure(404, `Unknown monitor: ${monitorName}`);
    }
    if (!isRecord(body)) {
      return this.failure(400, 'Request body must be a JSON object');
    }

    const { threshold, duration_seconds: durationSeconds } = body;
    if (typeof threshold !== 'number' || typeof durationSeconds !== 'number') {
      return this.failure(400, 'threshold and duration_seconds must be numbers');
    }

    const options: ThresholdOptions = {
      ...(isMetricKey(body.metric) && { metric: body.metric }),
      ...(isEnumValue(AlertType, body.alert_type) && { alert_type: body.alert_type }),
      ...(isEnumValue(ComparisonDirection, body.direction) && { direction: body.direction }),
      ...(typeof body.cooldown_seconds === 'number' && { cooldown_seconds: body.cooldown_seconds }),
      ...(typeof body.check_interval_seconds === 'number' && { check_interval_seconds: body.check_interval_seconds })
    };

    const config = monitor.setThreshold(
      thresholdName,
      threshold,
      durationSeconds,
      isEnumValue(AlertSeverity, body.severity) ? body.severity : undefined,
      typeof body.alert_message === 'string' ? body.alert_message : undefined,
      options
    );

    if (!config) {
      return this.failure(400, `Threshold ${thresholdName} was rejected; a new threshold needs a supported metric and an alert_type`);
    }

    this.logger.info(`Threshold ${monitorName}/${thresholdName} updated via API`);
    return this.success(config);
  }

  getSystemHealth(): APIResult<ReturnType<ErrorHandler['getSystemHealth']>> {
    return this.success(this.errorHandler.getSystemHealth());
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer(this.app);
      this.server = server;

      this.wss = new WebSocketServer({ server });
      this.setupWebSocketHandlers(this.wss);

      server.once('error', (error: Error) => {
        this.logger.error('Server error:', error);
        reject(error);
      });

      server.listen(this.config.port, this.config.host, () => {
        this.logger.info(`API server started on ${this.config.host}:${this.config.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.wss) {
        for (const client of this.wss.clients) {
          client.terminate();
        }
        this.wss.close();
        this.wss = null;
      }

      const server = this.server;
      this.server = null;
      if (server) {
        server.close(() => {
          this.logger.info('API server stopped');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  /**
   * Send a message to every connected WebSocket client
   */
  broadcast(message: RealtimeMessage): number {
    if (!this.wss) {
      return 0;
    }

    const payload = JSON.stringify(message);
    let delivered = 0;

    this.wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
        delivered++;
      }
    });

    return delivered;
  }

  getConnectionCount(): number {
    return this.wss ? this.wss.clients.size : 0;
  }

  private setupWebSocketHandlers(wss: WebSocketServer): void {
    wss.on('connection', (ws: WebSocket) => {
      this.logger.debug('WebSocket client connected');

      ws.on('close', () => {
        this.logger.debug('WebSocket client disconnected');
      });

      ws.on('error', (error: Error) => {
        this.logger.warn('WebSocket client error:', error);
      });

      const connected: RealtimeMessage = { type: 'connected', timestamp: new Date() };
      ws.send(JSON.stringify(connected));
    });
  }

  private findMonitor(name: string): ThresholdControl | undefined {
    return this.entries().find(([monitorName]) => monitorName === name)?.[1];
  }

  private entries(): Array<[MonitorName, ThresholdControl]> {
    const entries: Array<[MonitorName, ThresholdControl]> = [];
    if (this.monitors.cpu) {
      entries.push(['cpu', this.monitors.cpu]);
    }
    if (this.monitors.network) {
      entries.push(['network', this.monitors.network]);
    }
    return entries;
  }

  private success<T>(data: T): APIResult<T> {
    return { status: 200, body: { success: true, data, timestamp: new Date() } };
  }

  private failure<T>(status: number, error: string): APIResult<T> {
    return { status, body: { success: false, error, timestamp: new Date() } };
  }

  private send<T>(res: Response, result: APIResult<T>): void {
    res.status(result.status).json(result.body);
  }
}
