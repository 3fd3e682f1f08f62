/**
 * Configuration manager for syswatch
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { EventEmitter } from 'events';
import {
  AlertSeverity,
  AlertType,
  ApiConfig,
  ComparisonDirection,
  DashboardConfig,
  isMetricKey,
  MonitorName,
  SystemMonitorConfig,
  ThresholdOverride,
  WebhookConfig
} from '../types';
import { Logger } from '../utils/logger';

export interface ConfigValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export type ConfigUpdate = Partial<Omit<SystemMonitorConfig, 'monitors' | 'api' | 'webhook' | 'dashboard'>> & {
  monitors?: Partial<SystemMonitorConfig['monitors']>;
  api?: Partial<ApiConfig>;
  webhook?: Partial<WebhookConfig>;
  dashboard?: Partial<DashboardConfig>;
};

const MONITOR_NAMES: readonly MonitorName[] = ['cpu', 'network'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEnumValue<T extends Record<string, string>>(enumObject: T, value: unknown): value is T[keyof T] {
  return typeof value === 'string' && Object.values(enumObject).includes(value);
}

function isMonitorName(value: unknown): value is MonitorName {
  return MONITOR_NAMES.some(name => name === value);
}

export class ConfigManager extends EventEmitter {
  private logger: Logger;
  private configPath: string;
  private backupPath: string;
  private currentConfig: SystemMonitorConfig | null = null;
  private configWatcher: AbortController | null = null;
  private watchLoop: Promise<void> | null = null;

  constructor(configPath?: string) {
    super();
    this.logger = new Logger('ConfigManager');
    this.configPath = configPath || process.env.CONFIG_PATH || './syswatch.config.json';
    this.backupPath = this.configPath + '.backup';
  }

  async loadConfig(): Promise<SystemMonitorConfig> {
    this.logger.info('Loading configuration...');

    try {
      const configExists = await this.fileExists(this.configPath);

      if (!configExists) {
        this.logger.info('Config file not found, creating default configuration');
        const defaultConfig = this.getDefaultConfig();
        await this.saveConfig(defaultConfig);
        return defaultConfig;
      }

      const configData = await fs.readFile(this.configPath, 'utf-8');
      const parsedConfig: unknown = JSON.parse(configData);

      const validatedConfig = this.validateConfig(parsedConfig);
      this.currentConfig = validatedConfig;
      this.logger.info('Configuration loaded and validated successfully');

      return validatedConfig;

    } catch (error) {
      this.logger.error('Failed to load configuration:', error);
      throw new Error(`Configuration loading failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  async saveConfig(config: SystemMonitorConfig): Promise<void> {
    this.logger.info('Saving configuration...');

    try {
      const validatedConfig = this.validateConfig(config);

      if (await this.fileExists(this.configPath)) {
        await this.createBackup();
      }

      const configDir = path.dirname(this.configPath);
      await fs.mkdir(configDir, { recursive: true });

      const configJson = JSON.stringify(validatedConfig, null, 2);
      await fs.writeFile(this.configPath, configJson, 'utf-8');

      this.currentConfig = validatedConfig;
      this.logger.info('Configuration saved successfully');

      this.emit('configChanged', validatedConfig);

    } catch (error) {
      this.logger.error('Failed to save configuration:', error);
      throw new Error(`Configuration saving failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  async updateConfig(partialConfig: ConfigUpdate): Promise<SystemMonitorConfig> {
    this.logger.info('Updating configuration...');

    if (!this.currentConfig) {
      throw new Error('No current configuration loaded. Call loadConfig() first.');
    }

    const updatedConfig: SystemMonitorConfig = {
      ...this.currentConfig,
      ...partialConfig,
      monitors: { ...this.currentConfig.monitors, ...(partialConfig.monitors || {}) },
      api: { ...this.currentConfig.api, ...(partialConfig.api || {}) },
      webhook: { ...this.currentConfig.webhook, ...(partialConfig.webhook || {}) },
      dashboard: { ...this.currentConfig.dashboard, ...(partialConfig.dashboard || {}) }
    };

    await this.saveConfig(updatedConfig);
    return updatedConfig;
  }

  getCurrentConfig(): SystemMonitorConfig | null {
    return this.currentConfig;
  }

  async createBackup(): Promise<void> {
    try {
      if (await this.fileExists(this.configPath)) {
        await fs.copyFile(this.configPath, this.backupPath);
        this.logger.info('Configuration backup created');
      }
    } catch (error) {
      this.logger.warn('Failed to create configuration backup:', error);
    }
  }

  /**
   * Reload the file after it changed on disk. Emits `configChanged` with the new
   * configuration, or `configError` when the file no longer validates.
   */
  async reloadConfig(): Promise<SystemMonitorConfig | null> {
    this.logger.info('Configuration file changed, reloading...');

    try {
      const newConfig = await this.loadConfig();
      this.emit('configChanged', newConfig);
      return newConfig;
    } catch (error) {
      this.logger.error('Failed to reload configuration after file change:', error);
      this.emit('configError', error);
      return null;
    }
  }

  startConfigWatcher(): void {
    if (this.configWatcher) {
      this.logger.warn('Config watcher already started');
      return;
    }

    const controller = new AbortController();
    this.configWatcher = controller;
    this.watchLoop = this.watchConfigFile(controller.signal);
    this.logger.info(`Watching ${this.configPath} for changes`);
  }

  async stopConfigWatcher(): Promise<void> {
    if (!this.configWatcher) {
      return;
    }

    this.configWatcher.abort();
    this.configWatcher = null;

    const loop = this.watchLoop;
    this.watchLoop = null;
    if (loop) {
      await loop;
    }
    this.logger.info('Config watcher stopped');
  }

  /**
   * Validate a parsed config, filling defaults for absent fields. Throws listing every invalid field.
   */
  validateConfig(config: unknown): SystemMonitorConfig {
    if (!isRecord(config)) {
      throw new Error('Configuration must be an object');
    }

    const errors: ConfigValidationError[] = [];
    const defaults = this.getDefaultConfig();

    const monitors = this.section(config.monitors, 'monitors', errors);
    const api = this.section(config.api, 'api', errors);
    const webhook = this.section(config.webhook, 'webhook', errors);
    const dashboard = this.section(config.dashboard, 'dashboard', errors);

    const validated: SystemMonitorConfig = {
      update_interval_seconds: this.numberField(errors, 'update_interval_seconds', config.update_interval_seconds, 1, 60, defaults.update_interval_seconds),
      alerts_enabled: this.booleanField(errors, 'alerts_enabled', config.alerts_enabled, defaults.alerts_enabled),
      monitors: {
        cpu: this.booleanField(errors, 'monitors.cpu', monitors.cpu, defaults.monitors.cpu),
        network: this.booleanField(errors, 'monitors.network', monitors.network, defaults.monitors.network)
      },
      source_timeout_ms: this.numberField(errors, 'source_timeout_ms', config.source_timeout_ms, 100, 60000, defaults.source_timeout_ms),
      threshold_overrides: this.validateThresholdOverrides(config.threshold_overrides, errors),
      api: {
        enabled: this.booleanField(errors, 'api.enabled', api.enabled, defaults.api.enabled),
        host: this.stringField(errors, 'api.host', api.host, defaults.api.host),
        port: this.numberField(errors, 'api.port', api.port, 1, 65535, defaults.api.port),
        enable_cors: this.booleanField(errors, 'api.enable_cors', api.enable_cors, defaults.api.enable_cors)
      },
      webhook: this.validateWebhook(webhook, defaults.webhook, errors),
      dashboard: {
        enabled: this.booleanField(errors, 'dashboard.enabled', dashboard.enabled, defaults.dashboard.enabled),
        detailed_view: this.booleanField(errors, 'dashboard.detailed_view', dashboard.detailed_view, defaults.dashboard.detailed_view),
        alert_display_seconds: this.numberField(errors, 'dashboard.alert_display_seconds', dashboard.alert_display_seconds, 1, 3600, defaults.dashboard.alert_display_seconds)
      }
    };

    if (config.check_interval_seconds !== undefined) {
      validated.check_interval_seconds = this.numberField(errors, 'check_interval_seconds', config.check_interval_seconds, 1, 600, 5);
    }

    if (errors.length > 0) {
      const errorMessage = errors.map(err => `${err.field}: ${err.message}`).join('; ');
      throw new Error(`Configuration validation failed: ${errorMessage}`);
    }

    return validated;
  }

  getDefaultConfig(): SystemMonitorConfig {
    return {
      update_interval_seconds: 2,
      alerts_enabled: true,
      monitors: {
        cpu: true,
        network: true
      },
      source_timeout_ms: 5000,
      threshold_overrides: [],
      api: {
        enabled: true,
        host: '127.0.0.1',
        port: 8099,
        enable_cors: false
      },
      webhook: {
        enabled: false,
        url: '',
        min_severity: AlertSeverity.WARNING
      },
      dashboard: {
        enabled: true,
        detailed_view: false,
        alert_display_seconds: 120
      }
    };
  }

  private validateThresholdOverrides(overrides: unknown, errors: ConfigValidationError[]): ThresholdOverride[] {
    if (overrides === undefined) {
      return [];
    }
    if (!Array.isArray(overrides)) {
      errors.push({ field: 'threshold_overrides', message: 'threshold_overrides must be an array', value: overrides });
      return [];
    }

    const validated: ThresholdOverride[] = [];

    overrides.forEach((override: unknown, index: number) => {
      const prefix = `threshold_overrides[${index}]`;
      if (!isRecord(override)) {
        errors.push({ field: prefix, message: 'override must be an object', value: override });
        return;
      }

      const before = errors.length;

      if (!isMonitorName(override.monitor)) {
        errors.push({ field: `${prefix}.monitor`, message: `monitor must be one of ${MONITOR_NAMES.join(', ')}`, value: override.monitor });
      }
      if (typeof override.name !== 'string' || override.name.trim() === '') {
        errors.push({ field: `${prefix}.name`, message: 'name must be a non-empty string', value: override.name });
      }
      if (typeof override.threshold !== 'number' || !Number.isFinite(override.threshold)) {
        errors.push({ field: `${prefix}.threshold`, message: 'threshold must be a finite number', value: override.threshold });
      }
      if (typeof override.duration_seconds !== 'number' || override.duration_seconds < 0) {
        errors.push({ field: `${prefix}.duration_seconds`, message: 'duration_seconds must be a non-negative number', value: override.duration_seconds });
      }
      if (override.severity !== undefined && !isEnumValue(AlertSeverity, override.severity)) {
        errors.push({ field: `${prefix}.severity`, message: `severity must be one of ${Object.values(AlertSeverity).join(', ')}`, value: override.severity });
      }
      if (override.alert_message !== undefined && typeof override.alert_message !== 'string') {
        errors.push({ field: `${prefix}.alert_message`, message: 'alert_message must be a string', value: override.alert_message });
      }
      if (override.metric !== undefined && !isMetricKey(override.metric)) {
        errors.push({ field: `${prefix}.metric`, message: 'metric is not a known metric', value: override.metric });
      }
      if (override.alert_type !== undefined && !isEnumValue(AlertType, override.alert_type)) {
        errors.push({ field: `${prefix}.alert_type`, message: 'alert_type is not a known alert type', value: override.alert_type });
      }
      if (override.direction !== undefined && !isEnumValue(ComparisonDirection, override.direction)) {
        errors.push({ field: `${prefix}.direction`, message: 'direction must be above or below', value: override.direction });
      }
      if (override.cooldown_seconds !== undefined && (typeof override.cooldown_seconds !== 'number' || override.cooldown_seconds < 0)) {
        errors.push({ field: `${prefix}.cooldown_seconds`, message: 'cooldown_seconds must be a non-negative number', value: override.cooldown_seconds });
      }

      if (errors.length > before
        || !isMonitorName(override.monitor)
        || typeof override.name !== 'string'
        || typeof override.threshold !== 'number'
        || typeof override.duration_seconds !== 'number') {
        return;
      }

      validated.push({
        monitor: override.monitor,
        name: override.name,
        threshold: override.threshold,
        duration_seconds: override.duration_seconds,
        ...(isEnumValue(AlertSeverity, override.severity) && { severity: override.severity }),
        ...(typeof override.alert_message === 'string' && { alert_message: override.alert_message }),
        ...(isMetricKey(override.metric) && { metric: override.metric }),
        ...(isEnumValue(AlertType, override.alert_type) && { alert_type: override.alert_type }),
        ...(isEnumValue(ComparisonDirection, override.direction) && { direction: override.direction }),
        ...(typeof override.cooldown_seconds === 'number' && { cooldown_seconds: override.cooldown_seconds })
      });
    });

    return validated;
  }

  private validateWebhook(webhook: Record<string, unknown>, defaults: WebhookConfig, errors: ConfigValidationError[]): WebhookConfig {
    const validated: WebhookConfig = {
      enabled: this.booleanField(errors, 'webhook.enabled', webhook.enabled, defaults.enabled),
      url: this.stringField(errors, 'webhook.url', webhook.url, defaults.url),
      min_severity: defaults.min_severity
    };

    if (webhook.min_severity !== undefined) {
      if (isEnumValue(AlertSeverity, webhook.min_severity)) {
        validated.min_severity = webhook.min_severity;
      } else {
        errors.push({ field: 'webhook.min_severity', message: `min_severity must be one of ${Object.values(AlertSeverity).join(', ')}`, value: webhook.min_severity });
      }
    }

    if (webhook.token !== undefined) {
      validated.token = this.stringField(errors, 'webhook.token', webhook.token, '');
    }

    if (validated.enabled && !/^https?:\/\/\S+$/.test(validated.url)) {
      errors.push({ field: 'webhook.url', message: 'url must be an http(s) URL when the webhook is enabled', value: validated.url });
    }

    return validated;
  }

  private section(value: unknown, field: string, errors: ConfigValidationError[]): Record<string, unknown> {
    if (value === undefined) {
      return {};
    }
    if (!isRecord(value)) {
      errors.push({ field, message: `${field} must be an object`, value });
      return {};
    }
    return value;
  }

  private numberField(errors: ConfigValidationError[], field: string, value: unknown, min: number, max: number, fallback: number): number {
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value < min || value > max) {
      errors.push({ field, message: `${field} must be a number between ${min} and ${max}`, value });
      return fallback;
    }
    return value;
  }

  private booleanField(errors: ConfigValidationError[], field: string, value: unknown, fallback: boolean): boolean {
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'boolean') {
      errors.push({ field, message: `${field} must be a boolean`, value });
      return fallback;
    }
    return value;
  }

  private stringField(errors: ConfigValidationError[], field: string, value: unknown, fallback: string): string {
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'string') {
      errors.push({ field, message: `${field} must be a string`, value });
      return fallback;
    }
    return value;
  }

  private async watchConfigFile(signal: AbortSignal): Promise<void> {
    try {
      const watcher = fs.watch(this.configPath, { persistent: false, signal });

      for await (const event of watcher) {
        if (event.eventType === 'change') {
          await this.reloadConfig();
        }
      }
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      this.logger.error('Config watcher failed:', error);
      this.emit('configError', error);
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
