/**
 * Application wiring tests
 */

import { SystemMonitorApp } from './app';
import { ConfigManager } from './config/config-manager';
import { CpuMetricSource, NetworkMetricSource } from './metrics/metric-source';
import { AlertSeverity, AlertType, SystemMonitorConfig } from './types';
import { BandwidthUsage } from './types/metrics';

class StaticConfigManager extends ConfigManager {
  watching = false;

  constructor(private readonly config: SystemMonitorConfig) {
    super('/tmp/syswatch-test.config.json');
  }

  async loadConfig(): Promise<SystemMonitorConfig> {
    return this.config;
  }

  startConfigWatcher(): void {
    this.watching = true;
  }

  async stopConfigWatcher(): Promise<void> {
    this.watching = false;
  }
}

class QuietCpuSource implements CpuMetricSource {
  async getOverallUsage(): Promise<number> {
    return 5;
  }
}

class QuietNetworkSource implements NetworkMetricSource {
  async getBandwidth(): Promise<BandwidthUsage> {
    return { rx_bytes_per_sec: 0, tx_bytes_per_sec: 0 };
  }
}

function testConfig(overrides: Partial<SystemMonitorConfig> = {}): SystemMonitorConfig {
  const defaults = new ConfigManager('/tmp/unused.json').getDefaultConfig();
  return {
    ...defaults,
    api: { ...defaults.api, enabled: false },
    dashboard: { ...defaults.dashboard, enabled: false },
    check_interval_seconds: 600,
    ...overrides
  };
}

describe('SystemMonitorApp', () => {
  let app: SystemMonitorApp;
  let configManager: StaticConfigManager;

  function createApp(config: SystemMonitorConfig): SystemMonitorApp {
    configManager = new StaticConfigManager(config);
    return new SystemMonitorApp({
      configManager,
      cpuSource: new QuietCpuSource(),
      networkSource: new QuietNetworkSource()
    });
  }

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    if (app.getStatus().running) {
      await app.stop();
    }
    jest.restoreAllMocks();
  });

  it('should create only the enabled components', async () => {
    app = createApp(testConfig({ monitors: { cpu: true, network: false } }));
    await app.initialize();

    expect(app.getStatus().components).toEqual({
      cpuMonitor: true,
      networkMonitor: false,
      webhook: false,
      apiServer: false,
      dashboard: false
    });
    expect(app.getMonitor('network')).toBeNull();
  });

  it('should apply threshold overrides from the configuration', async () => {
    app = createApp(testConfig({
      threshold_overrides: [
        { monitor: 'cpu', name: 'cpu_usage_high', threshold: 65, duration_seconds: 20 },
        { monitor: 'network', name: 'wifi_signal_low', threshold: -70, duration_seconds: 60, severity: AlertSeverity.CRITICAL }
      ]
    }));
    await app.initialize();

    const cpuThreshold = app.getMonitor('cpu')?.getThresholds().find(config => config.name === 'cpu_usage_high');
    const wifiThreshold = app.getMonitor('network')?.getThresholds().find(config => config.name === 'wifi_signal_low');
    expect(cpuThreshold).toMatchObject({ threshold: 65, duration_seconds: 20 });
    expect(wifiThreshold).toMatchObject({ threshold: -70, severity: AlertSeverity.CRITICAL });
  });

  it('should skip overrides that were already applied', async () => {
    const overrides = [{ monitor: 'cpu' as const, name: 'cpu_usage_high', threshold: 65, duration_seconds: 20 }];
    app = createApp(testConfig({ threshold_overrides: overrides }));
    await app.initialize();

    expect(app.applyThresholdOverrides(overrides)).toBe(0);
    expect(app.applyThresholdOverrides([{ ...overrides[0], threshold: 60 }])).toBe(1);
  });

  it('should ignore overrides for a disabled monitor', async () => {
    app = createApp(testConfig({ monitors: { cpu: true, network: false } }));
    await app.initialize();

    expect(app.applyThresholdOverrides([
      { monitor: 'network', name: 'bandwidth_usage_high', threshold: 1, duration_seconds: 1 }
    ])).toBe(0);
  });

  it('should apply new overrides when the configuration changes', async () => {
    const config = testConfig();
    app = createApp(config);
    await app.initialize();

    configManager.emit('configChanged', {
      ...config,
      threshold_overrides: [{
        monitor: 'cpu',
        name: 'cpu_usage_spike',
        threshold: 99,
        duration_seconds: 0,
        metric: 'cpu_usage',
        alert_type: AlertType.CPU_USAGE_VERY_HIGH
      }]
    });

    expect(app.getMonitor('cpu')?.getThresholds().map(threshold => threshold.name)).toContain('cpu_usage_spike');
    expect(app.getStatus().config?.threshold_overrides).toHaveLength(1);
  });

  it('should enable the webhook notifier only when alerts are enabled', async () => {
    const config = testConfig({ alerts_enabled: false });
    app = createApp({ ...config, webhook: { enabled: true, url: 'http://127.0.0.1:9/hook', min_severity: AlertSeverity.WARNING } });
    await app.initialize();

    expect(app.getStatus().components.webhook).toBe(false);
  });

  it('should run the monitors between start and stop', async () => {
    app = createApp(testConfig());

    await expect(app.start()).rejects.toThrow('App must be initialized before starting');

    await app.initialize();
    await app.start();

    expect(app.getStatus().running).toBe(true);
    expect(app.getMonitor('cpu')?.running).toBe(true);
    expect(app.getDispatcher().getStats().running).toBe(true);
    expect(configManager.watching).toBe(true);

    await app.stop();

    expect(app.getStatus().running).toBe(false);
    expect(configManager.watching).toBe(false);
    expect(app.getMonitor('cpu')?.running).toBe(false);
    expect(app.getDispatcher().getStats()).toMatchObject({ running: false, queued: 0 });
  });
});
