/**
 * Tests for ConfigManager class
 */

import * as fs from 'fs/promises';
import { ConfigManager } from './config-manager';
import { AlertSeverity, ComparisonDirection, SystemMonitorConfig } from '../types';

jest.mock('fs/promises');
const mockFs = jest.mocked(fs);

describe('ConfigManager', () => {
  let configManager: ConfigManager;
  let tempConfigPath: string;

  beforeEach(() => {
    tempConfigPath = '/tmp/test-syswatch.json';
    configManager = new ConfigManager(tempConfigPath);
    jest.clearAllMocks();
  });

  describe('Configuration Validation', () => {
    it('should fill defaults for an empty configuration', () => {
      const config = configManager.validateConfig({});

      expect(config).toEqual(configManager.getDefaultConfig());
    });

    it('should keep valid values', () => {
      const config = configManager.validateConfig({
        update_interval_seconds: 5,
        check_interval_seconds: 10,
        monitors: { cpu: true, network: false },
        api: { port: 9000 },
        dashboard: { detailed_view: true }
      });

      expect(config.update_interval_seconds).toBe(5);
      expect(config.check_interval_seconds).toBe(10);
      expect(config.monitors).toEqual({ cpu: true, network: false });
      expect(config.api.port).toBe(9000);
      expect(config.api.host).toBe('127.0.0.1');
      expect(config.dashboard.detailed_view).toBe(true);
      expect(config.dashboard.alert_display_seconds).toBe(120);
    });

    it('should reject out-of-range numbers', () => {
      const invalidConfigs = [
        { update_interval_seconds: 0 },
        { update_interval_seconds: 61 },
        { source_timeout_ms: 50 },
        { api: { port: 70000 } },
        { check_interval_seconds: 601 }
      ];

      invalidConfigs.forEach(config => {
        expect(() => configManager.validateConfig(config)).toThrow(/Configuration validation failed/);
      });
    });

    it('should reject wrong types', () => {
      expect(() => configManager.validateConfig({ alerts_enabled: 'yes' }))
        .toThrow('Configuration validation failed: alerts_enabled: alerts_enabled must be a boolean');
      expect(() => configManager.validateConfig({ monitors: [] }))
        .toThrow('Configuration validation failed: monitors: monitors must be an object');
      expect(() => configManager.validateConfig(null)).toThrow('Configuration must be an object');
    });

    it('should list every invalid field', () => {
      expect(() => configManager.validateConfig({ update_interval_seconds: 0, api: { enable_cors: 1 } }))
        .toThrow('Configuration validation failed: update_interval_seconds: update_interval_seconds must be a number between 1 and 60; api.enable_cors: api.enable_cors must be a boolean');
    });

    it('should validate threshold overrides', () => {
      const config = configManager.validateConfig({
        threshold_overrides: [
          { monitor: 'cpu', name: 'cpu_usage_high', threshold: 75, duration_seconds: 30, severity: 'critical' },
          { monitor: 'network', name: 'wifi_weak', threshold: -80, duration_seconds: 60, metric: 'wifi_signal', alert_type: 'wifi_signal_low', direction: 'below' }
        ]
      });

      expect(config.threshold_overrides).toEqual([
        { monitor: 'cpu', name: 'cpu_usage_high', threshold: 75, duration_seconds: 30, severity: AlertSeverity.CRITICAL },
        {
          monitor: 'network',
          name: 'wifi_weak',
          threshold: -80,
          duration_seconds: 60,
          metric: 'wifi_signal',
          alert_type: 'wifi_signal_low',
          direction: ComparisonDirection.BELOW
        }
      ]);
    });

    it('should reject invalid threshold overrides', () => {
      const invalidOverrides = [
        { monitor: 'disk', name: 'x', threshold: 1, duration_seconds: 1 },
        { monitor: 'cpu', name: '', threshold: 1, duration_seconds: 1 },
        { monitor: 'cpu', name: 'x', threshold: 'high', duration_seconds: 1 },
        { monitor: 'cpu', name: 'x', threshold: 1, duration_seconds: -1 },
        { monitor: 'cpu', name: 'x', threshold: 1, duration_seconds: 1, severity: 'fatal' },
        { monitor: 'cpu', name: 'x', threshold: 1, duration_seconds: 1, metric: 'disk_usage' },
        { monitor: 'cpu', name: 'x', threshold: 1, duration_seconds: 1, direction: 'sideways' }
      ];

      invalidOverrides.forEach(override => {
        expect(() => configManager.validateConfig({ threshold_overrides: [override] })).toThrow(/threshold_overrides\[0\]/);
      });
    });

    it('should require a URL for an enabled webhook', () => {
      expect(() => configManager.validateConfig({ webhook: { enabled: true } }))
        .toThrow('webhook.url: url must be an http(s) URL when the webhook is enabled');

      const config = configManager.validateConfig({
        webhook: { enabled: true, url: 'http://localhost:9999/hook', token: 'test-secret', min_severity: 'critical' }
      });
      expect(config.webhook).toEqual({
        enabled: true,
        url: 'http://localhost:9999/hook',
        token: 'test-secret',
        min_severity: AlertSeverity.CRITICAL
      });
    });
  });

  describe('Default Configuration', () => {
    it('should provide a valid default configuration', () => {
      const defaultConfig = configManager.getDefaultConfig();

      expect(() => configManager.validateConfig(defaultConfig)).not.toThrow();
    });

    it('should have reasonable default values', () => {
      const defaultConfig = configManager.getDefaultConfig();

      expect(defaultConfig.update_interval_seconds).toBe(2);
      expect(defaultConfig.alerts_enabled).toBe(true);
      expect(defaultConfig.monitors).toEqual({ cpu: true, network: true });
      expect(defaultConfig.source_timeout_ms).toBe(5000);
      expect(defaultConfig.threshold_overrides).toEqual([]);
      expect(defaultConfig.api.port).toBe(8099);
      expect(defaultConfig.webhook.enabled).toBe(false);
      expect(defaultConfig.webhook.min_severity).toBe(AlertSeverity.WARNING);
      expect(defaultConfig.check_interval_seconds).toBeUndefined();
    });
  });

  describe('Configuration Loading and Saving', () => {
    it('should create default config when file does not exist', async () => {
      mockFs.access.mockRejectedValue(new Error('File not found'));
      mockFs.mkdir.mockResolvedValue(undefined);
      mockFs.writeFile.mockResolvedValue(undefined);

      const config = await configManager.loadConfig();

      expect(config).toEqual(configManager.getDefaultConfig());
      expect(mockFs.writeFile).toHaveBeenCalledWith(
        tempConfigPath,
        JSON.stringify(configManager.getDefaultConfig(), null, 2),
        'utf-8'
      );
      expect(mockFs.copyFile).not.toHaveBeenCalled();
    });

    it('should load existing configuration file', async () => {
      mockFs.access.mockResolvedValue(undefined);
      mockFs.readFile.mockResolvedValue(JSON.stringify({ update_interval_seconds: 3, monitors: { network: false } }));

      const config = await configManager.loadConfig();

      expect(config.update_interval_seconds).toBe(3);
      expect(config.monitors).toEqual({ cpu: true, network: false });
      expect(configManager.getCurrentConfig()).toEqual(config);
    });

    it('should save configuration with backup', async () => {
      const testConfig: SystemMonitorConfig = configManager.getDefaultConfig();

      mockFs.access.mockResolvedValue(undefined);
      mockFs.copyFile.mockResolvedValue(undefined);
      mockFs.mkdir.mockResolvedValue(undefined);
      mockFs.writeFile.mockResolvedValue(undefined);

      await configManager.saveConfig(testConfig);

      expect(mockFs.copyFile).toHaveBeenCalledWith(tempConfigPath, tempConfigPath + '.backup');
      expect(mockFs.mkdir).toHaveBeenCalledWith('/tmp', { recursive: true });
      expect(mockFs.writeFile).toHaveBeenCalled();
    });

    it('should merge nested sections on update and emit configChanged', async () => {
      mockFs.access.mockResolvedValue(undefined);
      mockFs.readFile.mockResolvedValue(JSON.stringify({ api: { port: 9000 } }));
      await configManager.loadConfig();

      mockFs.copyFile.mockResolvedValue(undefined);
      mockFs.mkdir.mockResolvedValue(undefined);
      mockFs.writeFile.mockResolvedValue(undefined);

      const changed = jest.fn();
      configManager.on('configChanged', changed);

      const updatedConfig = await configManager.updateConfig({
        api: { enable_cors: true },
        threshold_overrides: [{ monitor: 'cpu', name: 'cpu_usage_high', threshold: 70, duration_seconds: 60 }]
      });

      expect(updatedConfig.api).toEqual({ enabled: true, host: '127.0.0.1', port: 9000, enable_cors: true });
      expect(updatedConfig.threshold_overrides).toHaveLength(1);
      expect(changed).toHaveBeenCalledWith(updatedConfig);
    });

    it('should refuse to update before loading', async () => {
      await expect(configManager.updateConfig({ alerts_enabled: false }))
        .rejects.toThrow('No current configuration loaded. Call loadConfig() first.');
    });
  });

  describe('Error Handling', () => {
    it('should handle file system errors', async () => {
      mockFs.access.mockResolvedValue(undefined);
      mockFs.readFile.mockRejectedValue(new Error('Cannot read file'));

      await expect(configManager.loadConfig()).rejects.toThrow('Configuration loading failed: Cannot read file');
    });

    it('should handle JSON parsing errors', async () => {
      mockFs.access.mockResolvedValue(undefined);
      mockFs.readFile.mockResolvedValue('invalid json');

      await expect(configManager.loadConfig()).rejects.toThrow(/Configuration loading failed/);
    });

    it('should not write an invalid configuration', async () => {
      const invalid = { ...configManager.getDefaultConfig(), update_interval_seconds: 0 };

      await expect(configManager.saveConfig(invalid)).rejects.toThrow(/Configuration saving failed/);
      expect(mockFs.writeFile).not.toHaveBeenCalled();
    });
  });

  describe('File Watching', () => {
    async function* changes(count: number): AsyncGenerator<fs.FileChangeInfo<string>, undefined, undefined> {
      for (let i = 0; i < count; i++) {
        yield { eventType: 'change', filename: 'test-syswatch.json' };
      }
      return undefined;
    }

    beforeEach(() => {
      jest.spyOn(console, 'log').mockImplementation(() => undefined);
      jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should reload and emit configChanged when the file changes', async () => {
      mockFs.watch.mockReturnValue(changes(1));
      mockFs.access.mockResolvedValue(undefined);
      mockFs.readFile.mockResolvedValue(JSON.stringify({ update_interval_seconds: 7 }));

      const changed = new Promise<SystemMonitorConfig>(resolve => configManager.once('configChanged', resolve));
      configManager.startConfigWatcher();
      const config = await changed;
      await configManager.stopConfigWatcher();

      expect(config.update_interval_seconds).toBe(7);
      expect(configManager.getCurrentConfig()).toEqual(config);
      expect(mockFs.watch).toHaveBeenCalledWith(tempConfigPath, expect.objectContaining({ persistent: false }));
    });

    it('should report a changed file that no longer validates and keep the current config', async () => {
      mockFs.access.mockResolvedValue(undefined);
      mockFs.readFile.mockResolvedValue(JSON.stringify({ update_interval_seconds: 5 }));
      const current = await configManager.loadConfig();

      mockFs.watch.mockReturnValue(changes(1));
      mockFs.readFile.mockResolvedValue(JSON.stringify({ update_interval_seconds: 0 }));
      const changed = jest.fn();
      configManager.on('configChanged', changed);

      const failed = new Promise<unknown>(resolve => configManager.once('configError', resolve));
      configManager.startConfigWatcher();
      const error = await failed;
      await configManager.stopConfigWatcher();

      expect(error).toBeInstanceOf(Error);
      expect(changed).not.toHaveBeenCalled();
      expect(configManager.getCurrentConfig()).toEqual(current);
    });

    it('should warn when the watcher is started twice', async () => {
      mockFs.watch.mockReturnValue(changes(0));

      configManager.startConfigWatcher();
      configManager.startConfigWatcher();
      await configManager.stopConfigWatcher();

      expect(mockFs.watch).toHaveBeenCalledTimes(1);
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Config watcher already started'));
    });
  });

  describe('Backup', () => {
    it('should create backup successfully', async () => {
      mockFs.access.mockResolvedValue(undefined);
      mockFs.copyFile.mockResolvedValue(undefined);

      await configManager.createBackup();

      expect(mockFs.copyFile).toHaveBeenCalledWith(tempConfigPath, tempConfigPath + '.backup');
    });
  });
});
