/**
 * Main application class for syswatch
 */

import { MonitorName, SystemMonitorConfig, ThresholdOverride, MetricUpdateEvent } from './types';
import { Logger } from './utils/logger';
import { ConfigManager } from './config/config-manager';
import { ErrorHandler } from './error-handling';
import { MetricsEventDispatcher, Subscription } from './events/event-dispatcher';
import { CpuMetricSource, NetworkMetricSource } from './metrics/metric-source';
import { SystemMetricSource } from './metrics/system-metric-source';
import { ThresholdMonitor } from './alerts/threshold-monitor';
import { CpuThresholdMonitor } from './alerts/cpu-threshold-monitor';
import { NetworkThresholdMonitor } from './alerts/network-threshold-monitor';
import { WebhookNotifier } from './alerts/webhook-notifier';
import { APIServer } from './dashboard/api-server';
import { RealtimeService } from './dashboard/realtime-service';
import { ConsoleDashboard } from './dashboard/console-dashboard';

export interface SystemMonitorAppOptions {
  configManager?: ConfigManager;
  cpuSource?: CpuMetricSource;
  networkSource?: NetworkMetricSource;
  clock?: () => number;
}

const ERROR_CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

export class SystemMonitorApp {
  private logger: Logger;
  private configManager: ConfigManager;
  private errorHandler: ErrorHandler;
  private dispatcher: MetricsEventDispatcher;
  private cpuSource: CpuMetricSource;
  private networkSource: NetworkMetricSource;
  private clock: () => number;

  private cpuMonitor: CpuThresholdMonitor | null = null;
  private networkMonitor: NetworkThresholdMonitor | null = null;
  private webhookNotifier: WebhookNotifier | null = null;
  private webhookSubscription: Subscription | null = null;
  private apiServer: APIServer | null = null;
  private realtimeService: RealtimeService | null = null;
  private consoleDashboard: ConsoleDashboard | null = null;

  private config: SystemMonitorConfig | null = null;
  private appliedOverrides: Map<string, string> = new Map();
  private isRunning = false;
  private isInitialized = false;
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(options: SystemMonitorAppOptions = {}) {
    this.logger = new Logger('SystemMonitorApp');
    this.configManager = options.configManager ?? new ConfigManager();
    this.errorHandler = new ErrorHandler();
    this.dispatcher = new MetricsEventDispatcher({ errorHandler: this.errorHandler });
    this.clock = options.clock ?? Date.now;

    const systemSource = options.cpuSource && options.networkSource ? undefined : new SystemMetricSource();
    this.cpuSource = options.cpuSource ?? systemSource ?? new SystemMetricSource();
    this.networkSource = options.networkSource ?? systemSource ?? new SystemMetricSource();
  }

  /**
   * Initialize all components
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) {
      this.logger.warn('App is already initialized');
      return;
    }

    this.logger.info('Initializing syswatch...');

    const config = await this.configManager.loadConfig();
    this.config = config;
    this.logger.info('Configuration loaded successfully');

    const monitorOptions = {
      errorHandler: this.errorHandler,
      clock: this.clock,
      sourceTimeoutMs: config.source_timeout_ms,
      ...(config.check_interval_seconds !== undefined && { checkIntervalSeconds: config.check_interval_seconds })
    };

    if (config.monitors.cpu) {
      this.cpuMonitor = new CpuThresholdMonitor(this.cpuSource, this.dispatcher, monitorOptions);
    }
    if (config.monitors.network) {
      this.networkMonitor = new NetworkThresholdMonitor(this.networkSource, this.dispatcher, monitorOptions);
    }

    this.applyThresholdOverrides(config.threshold_overrides);
    this.configureWebhook(config);

    if (config.api.enabled) {
      this.apiServer = new APIServer(
        {
          ...(this.cpuMonitor && { cpu: this.cpuMonitor }),
          ...(this.networkMonitor && { network: this.networkMonitor })
        },
        this.errorHandler,
        { port: config.api.port, host: config.api.host, enableCors: config.api.enable_cors }
      );
      if (config.alerts_enabled) {
        this.realtimeService = new RealtimeService(this.dispatcher, this.apiServer);
      }
    }

    if (config.dashboard.enabled) {
      this.consoleDashboard = new ConsoleDashboard(this.dispatcher, config.dashboard, {
        updateIntervalSeconds: config.update_interval_seconds,
        showAlerts: config.alerts_enabled,
        clock: this.clock
      });
    }

    this.setupEventHandlers();

    this.isInitialized = true;
    this.logger.info('syswatch initialized successfully');
  }

  private setupEventHandlers(): void {
    this.configManager.on('configChanged', (newConfig: SystemMonitorConfig) => {
      this.logger.info('Configuration updated, applying changes...');
      this.applyConfigurationChanges(newConfig);
    });

    this.configManager.on('configError', (error: unknown) => {
      this.logger.warn('Keeping the current configuration:', error);
    });

    this.errorHandler.on('component_recovered', (component: string) => {
      this.logger.info(`Component recovered: ${component}`);
    });
  }

  /**
   * Start all monitoring services
   */
  async start(): Promise<void> {
    if (!this.isInitialized) {
      throw new Error('App must be initialized before starting');
    }

    if (this.isRunning) {
      this.logger.warn('App is already running');
      return;
    }

    this.logger.info('Starting syswatch...');

    try {
      this.dispatcher.start();

      if (this.apiServer) {
        await this.apiServer.start();
      }
      if (this.realtimeService) {
        this.realtimeService.start();
      }
      if (this.consoleDashboard) {
        this.consoleDashboard.start();
      }

      await Promise.all(this.getMonitors().map(([, monitor]) => monitor.start()));
      this.configManager.startConfigWatcher();

      this.cleanupInterval = setInterval(() => {
        this.errorHandler.clearOldErrors();
      }, ERROR_CLEANUP_INTERVAL_MS);

      this.isRunning = true;
      this.logger.info('syswatch started successfully');

    } catch (error) {
      this.logger.error('Failed to start app:', error);
      throw error;
    }
  }

  /**
   * Stop all monitoring services gracefully
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      this.logger.warn('App is not running');
      return;
    }

    this.logger.info('Stopping syswatch...');

    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }

    await this.configManager.stopConfigWatcher();

    await Promise.all(this.getMonitors().map(([, monitor]) => monitor.stop()));

    await this.dispatcher.drain();
    await this.dispatcher.stop();

    if (this.consoleDashboard) {
      this.consoleDashboard.stop();
    }
    if (this.realtimeService) {
      this.realtimeService.stop();
    }
    if (this.webhookSubscription) {
      this.webhookSubscription.unsubscribe();
      this.webhookSubscription = null;
    }
    if (this.apiServer) {
      await this.apiServer.stop();
    }

    this.isRunning = false;
    this.logger.info('syswatch stopped successfully');
  }

  /**
   * Push threshold overrides into the monitors. Overrides identical to the last applied ones are skipped.
   */
  applyThresholdOverrides(overrides: ThresholdOverride[]): number {
    let applied = 0;

    for (const override of overrides) {
      const key = `${override.monitor}/${override.name}`;
      const serialized = JSON.stringify(override);
      if (this.appliedOverrides.get(key) === serialized) {
        continue;
      }

      const monitor = this.getMonitor(override.monitor);
      if (!monitor) {
        this.logger.warn(`Ignoring override ${key}: ${override.monitor} monitor is disabled`);
        continue;
      }

      const config = monitor.setThreshold(
        override.name,
        override.threshold,
        override.duration_seconds,
        override.severity,
        override.alert_message,
        {
          metric: override.metric,
          alert_type: override.alert_type,
          direction: override.direction,
          cooldown_seconds: override.cooldown_seconds
        }
      );

      if (config) {
        this.appliedOverrides.set(key, serialized);
        applied++;
      }
    }

    if (applied > 0) {
      this.logger.info(`Applied ${applied} threshold overrides`);
    }
    return applied;
  }

  /**
   * Apply configuration changes without full restart
   */
  private applyConfigurationChanges(newConfig: SystemMonitorConfig): void {
    this.config = newConfig;
    this.applyThresholdOverrides(newConfig.threshold_overrides);
    this.configureWebhook(newConfig);
    this.logger.info('Configuration changes applied successfully');
  }

  private configureWebhook(config: SystemMonitorConfig): void {
    if (this.webhookSubscription) {
      this.webhookSubscription.unsubscribe();
      this.webhookSubscription = null;
    }
    this.webhookNotifier = null;

    if (!config.alerts_enabled || !config.webhook.enabled) {
      return;
    }

    this.webhookNotifier = new WebhookNotifier(config.webhook);
    this.webhookSubscription = this.dispatcher.subscribe(this.webhookNotifier, [MetricUpdateEvent.THRESHOLD_EXCEEDED]);
    this.logger.info(`Webhook notifications enabled (min severity ${config.webhook.min_severity})`);
  }

  getMonitor(name: MonitorName): ThresholdMonitor<unknown> | null {
    return name === 'cpu' ? this.cpuMonitor : this.networkMonitor;
  }

  getDispatcher(): MetricsEventDispatcher {
    return this.dispatcher;
  }

  /**
   * Get application status
   */
  getStatus(): {
    running: boolean;
    initialized: boolean;
    config: SystemMonitorConfig | null;
    components: {
      cpuMonitor: boolean;
      networkMonitor: boolean;
      webhook: boolean;
      apiServer: boolean;
      dashboard: boolean;
    };
  } {
    return {
      running: this.isRunning,
      initialized: this.isInitialized,
      config: this.config,
      components: {
        cpuMonitor: this.cpuMonitor !== null,
        networkMonitor: this.networkMonitor !== null,
        webhook: this.webhookNotifier !== null,
        apiServer: this.apiServer !== null,
        dashboard: this.consoleDashboard !== null
      }
    };
  }

  private getMonitors(): Array<[MonitorName, ThresholdMonitor<unknown>]> {
    const monitors: Array<[MonitorName, ThresholdMonitor<unknown>]> = [];
    if (this.cpuMonitor) {
      monitors.push(['cpu', this.cpuMonitor]);
    }
    if (this.networkMonitor) {
      monitors.push(['network', this.networkMonitor]);
    }
    return monitors;
  }
}
