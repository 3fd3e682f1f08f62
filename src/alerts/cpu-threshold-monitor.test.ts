/**
 * CPU threshold monitor tests
 */

import { CpuThresholdMonitor } from './cpu-threshold-monitor';
import { CpuMetricSource } from '../metrics/metric-source';
import { MetricsEventDispatcher } from '../events/event-dispatcher';
import { ErrorHandler, ErrorCategory } from '../error-handling';
import { CoreUsage, ProcessUsage } from '../types/metrics';
import { MetricEvent, MetricEventObserver, MetricUpdateEvent, ThresholdAlertEvent } from '../types/events';
import { AlertSeverity, AlertType } from '../types/alerts';

const SECOND = 1000;
const T0 = 1_700_000_000_000;

class FakeCpuSource implements CpuMetricSource {
  overall = 10;
  cores: CoreUsage[] = [];
  processes: ProcessUsage[] = [];
  overallFailure: Error | null = null;
  coreFailure: Error | null = null;
  hang = false;

  getOverallUsage(): Promise<number> {
    if (this.hang) {
      return new Promise<number>(() => undefined);
    }
    if (this.overallFailure) {
      return Promise.reject(this.overallFailure);
    }
    return Promise.resolve(this.overall);
  }

  async getPerCoreUsage(): Promise<CoreUsage[]> {
    if (this.coreFailure) {
      throw this.coreFailure;
    }
    return this.cores;
  }

  async getTopProcesses(limit?: number): Promise<ProcessUsage[]> {
    return this.processes.slice(0, limit);
  }
}

class RecordingObserver implements MetricEventObserver {
  received: MetricEvent[] = [];

  update(event: MetricEvent): void {
    this.received.push(event);
  }
}

describe('CpuThresholdMonitor', () => {
  let now: number;
  let source: FakeCpuSource;
  let dispatcher: MetricsEventDispatcher;
  let errorHandler: ErrorHandler;
  let monitor: CpuThresholdMonitor;
  let alerts: ThresholdAlertEvent[];

  async function tickAt(offsetSeconds: number): Promise<void> {
    now = T0 + offsetSeconds * SECOND;
    await monitor.checkNow();
  }

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    now = T0;
    source = new FakeCpuSource();
    dispatcher = new MetricsEventDispatcher();
    errorHandler = new ErrorHandler();
    monitor = new CpuThresholdMonitor(source, dispatcher, {
      errorHandler,
      clock: () => now,
      checkIntervalSeconds: 60,
      sourceTimeoutMs: 50
    });
    alerts = [];
    monitor.on('alert', (event: ThresholdAlertEvent) => alerts.push(event));
  });

  afterEach(async () => {
    await monitor.stop();
    jest.restoreAllMocks();
  });

  describe('Overall usage', () => {
    it('should raise each threshold once its own duration has passed', async () => {
      source.overall = 95;

      await tickAt(0);
      expect(alerts).toHaveLength(0);

      await tickAt(30);
      expect(alerts.map(alert => alert.data.threshold_name)).toEqual(['cpu_usage_very_high']);
      expect(alerts[0].message).toBe('CPU usage critically high: 95.0% for 0.5 minutes');
      expect(alerts[0].data.severity).toBe(AlertSeverity.CRITICAL);

      await tickAt(60);
      expect(alerts.map(alert => alert.data.threshold_name)).toEqual(['cpu_usage_very_high', 'cpu_usage_high']);
      expect(alerts[1].message).toBe('CPU usage above 80.0% for 1.0 minutes (current: 95.0%)');

      await tickAt(120);
      expect(alerts).toHaveLength(2);
    });

    it('should publish the alert and the overall reading to the dispatcher', async () => {
      const observer = new RecordingObserver();
      const subscription = dispatcher.subscribe(observer, [
        MetricUpdateEvent.THRESHOLD_EXCEEDED,
        MetricUpdateEvent.CPU_OVERALL_UPDATED
      ]);
      source.overall = 92;

      await tickAt(0);
      await tickAt(30);
      await dispatcher.drain();

      expect(observer.received.map(event => event.event_type)).toEqual([
        MetricUpdateEvent.CPU_OVERALL_UPDATED,
        MetricUpdateEvent.THRESHOLD_EXCEEDED,
        MetricUpdateEvent.CPU_OVERALL_UPDATED
      ]);
      expect(observer.received[1].data).toEqual({
        threshold_name: 'cpu_usage_very_high',
        threshold: 90,
        current_value: 92,
        duration_seconds: 30,
        alert_type: AlertType.CPU_USAGE_VERY_HIGH,
        severity: AlertSeverity.CRITICAL
      });
      expect(observer.received[2].data).toEqual({ usage: 92 });
      subscription.unsubscribe();
    });

    it('should emit alert_resolved when usage drops', async () => {
      const resolved = jest.fn();
      monitor.on('alert_resolved', resolved);
      source.overall = 95;

      await tickAt(0);
      await tickAt(30);
      source.overall = 20;
      await tickAt(31);

      expect(resolved).toHaveBeenCalledTimes(1);
      expect(resolved.mock.calls[0][0]).toMatchObject({ alert_key: 'cpu_usage_very_high', current_value: 20 });
      expect(monitor.getActiveAlerts()).toEqual({});
    });
  });

  describe('Per-core usage', () => {
    it('should key alerts by core and fill the core id into the message', async () => {
      source.cores = [{ core_id: 0, usage: 20 }, { core_id: 3, usage: 97 }];

      await tickAt(0);
      await tickAt(75);

      expect(alerts.map(alert => alert.message)).toEqual(['Core 3 usage above 90.0% for 1.3 minutes']);
      expect(alerts[0].data.core_id).toBe(3);

      const active = monitor.getActiveAlerts();
      expect(Object.keys(active)).toEqual(['core_3_core_usage_high']);
      expect(active.core_3_core_usage_high).toEqual({
        threshold_name: 'core_usage_high',
        type: AlertType.CPU_CORE_USAGE_HIGH,
        severity: AlertSeverity.WARNING,
        threshold: 90,
        current_value: 97,
        duration_seconds: 75,
        message: 'Core 3 usage above 90.0% for 1.3 minutes',
        core_id: 3
      });
    });

    it('should forget a vanished core that is not alerting', async () => {
      source.cores = [{ core_id: 0, usage: 95 }, { core_id: 1, usage: 95 }];
      await tickAt(0);
      // overall usage thresholds plus one state per core
      expect(monitor.getStatus().tracked_states).toBe(4);

      source.cores = [{ core_id: 0, usage: 95 }];
      await tickAt(10);
      expect(monitor.getStatus().tracked_states).toBe(3);
    });

    it('should keep an alerting core that is missing from one snapshot', async () => {
      source.cores = [{ core_id: 0, usage: 95 }, { core_id: 1, usage: 95 }];
      await tickAt(0);
      await tickAt(60);
      expect(Object.keys(monitor.getActiveAlerts())).toEqual(['core_0_core_usage_high', 'core_1_core_usage_high']);

      source.cores = [{ core_id: 0, usage: 95 }];
      await tickAt(70);
      expect(monitor.getStatus().tracked_states).toBe(4);
      expect(Object.keys(monitor.getActiveAlerts())).toHaveLength(2);
    });

    it('should not prune on an empty snapshot', async () => {
      source.cores = [{ core_id: 0, usage: 95 }];
      await tickAt(0);

      source.cores = [];
      await tickAt(10);
      expect(monitor.getStatus().tracked_states).toBe(3);
    });
  });

  describe('Per-process usage', () => {
    it('should alert on a process that stays above its threshold', async () => {
      source.processes = [{ pid: 4242, name: 'stress', cpu_percent: 75 }, { pid: 7, name: 'idle', cpu_percent: 1 }];

      await tickAt(0);
      await tickAt(120);

      expect(alerts.map(alert => alert.message)).toEqual(['Process stress (PID 4242) using 75.0% CPU for 2.0 minutes']);
      expect(Object.keys(monitor.getActiveAlerts())).toEqual(['process_4242_process_cpu_high']);
    });

    it('should forget a process that exits while not alerting', async () => {
      source.processes = [{ pid: 4242, name: 'stress', cpu_percent: 75 }, { pid: 7, name: 'idle', cpu_percent: 1 }];
      await tickAt(0);
      // two overall usage states plus one per process
      expect(monitor.getStatus().tracked_states).toBe(4);

      source.processes = [{ pid: 4242, name: 'stress', cpu_percent: 75 }];
      await tickAt(10);
      expect(monitor.getStatus().tracked_states).toBe(3);
    });

    it('should keep an alerting process that is missing from the latest list', async () => {
      source.processes = [{ pid: 4242, name: 'stress', cpu_percent: 75 }, { pid: 7, name: 'idle', cpu_percent: 1 }];
      await tickAt(0);
      await tickAt(120);

      source.processes = [{ pid: 7, name: 'idle', cpu_percent: 1 }];
      await tickAt(130);

      expect(monitor.getStatus().tracked_states).toBe(4);
      expect(Object.keys(monitor.getActiveAlerts())).toEqual(['process_4242_process_cpu_high']);
    });
  });

  describe('Sustained usage', () => {
    it('should evaluate the windowed average once ten samples exist', async () => {
      monitor.setThreshold('cpu_usage_sustained', 70, 0);
      source.overall = 75;

      for (let i = 0; i < 9; i++) {
        await tickAt(i);
      }
      expect(alerts).toHaveLength(0);

      await tickAt(9);
      expect(alerts.map(alert => alert.message)).toEqual([
        'Sustained CPU usage above 70.0% for 0.0 minutes (average: 75.0%)'
      ]);
      expect(monitor.getHistory().length).toBe(10);
    });

    it('should leave an open sustained alert alone while usage cannot be read', async () => {
      monitor.setThreshold('cpu_usage_sustained', 70, 0);
      source.overall = 75;
      for (let i = 0; i < 10; i++) {
        await tickAt(i);
      }
      expect(Object.keys(monitor.getActiveAlerts())).toEqual(['cpu_usage_sustained']);

      source.overallFailure = new Error('usage unavailable');
      await tickAt(11 * 60);

      expect(Object.keys(monitor.getActiveAlerts())).toEqual(['cpu_usage_sustained']);
      expect(errorHandler.getComponentHealth('CpuThresholdMonitor:overall_usage')?.consecutive_failures).toBe(1);
    });
  });

  describe('Check isolation', () => {
    it('should run the remaining checks when one source call fails', async () => {
      source.overall = 95;
      source.coreFailure = new Error('cannot read cores');
      source.processes = [{ pid: 1, name: 'busy', cpu_percent: 60 }];

      await tickAt(0);
      await tickAt(120);

      expect(alerts.map(alert => alert.data.threshold_name)).toEqual([
        'cpu_usage_high',
        'cpu_usage_very_high',
        'process_cpu_high'
      ]);
      const health = errorHandler.getComponentHealth('CpuThresholdMonitor:core_usage');
      expect(health?.consecutive_failures).toBe(2);
      expect(errorHandler.getComponentHealth('CpuThresholdMonitor:overall_usage')?.status).toBe('healthy');
    });

    it('should record a timeout when the source does not answer', async () => {
      source.hang = true;

      await tickAt(0);

      const errors = errorHandler.getSystemHealth().recent_errors;
      expect(errors).toHaveLength(1);
      expect(errors[0].category).toBe(ErrorCategory.TIMEOUT);
      expect(errors[0].component).toBe('CpuThresholdMonitor:overall_usage');
    });
  });

  describe('setThreshold', () => {
    it('should reset the pending breach of the updated threshold', async () => {
      source.overall = 85;
      await tickAt(0);

      const config = monitor.setThreshold('cpu_usage_high', 80, 60);
      expect(config?.threshold).toBe(80);

      await tickAt(60);
      expect(alerts).toHaveLength(0);

      await tickAt(120);
      expect(alerts.map(alert => alert.data.threshold_name)).toEqual(['cpu_usage_high']);
    });

    it('should add a new threshold on a supported metric', async () => {
      const config = monitor.setThreshold('cpu_usage_low', 50, 0, AlertSeverity.INFO, 'CPU at {value}%', {
        metric: 'cpu_usage',
        alert_type: AlertType.CPU_USAGE_HIGH
      });
      expect(config).not.toBeNull();

      source.overall = 55;
      await tickAt(0);

      expect(alerts.map(alert => alert.message)).toEqual(['CPU at 55.0%']);
    });

    it('should reject a new threshold without a metric', () => {
      expect(monitor.setThreshold('unknown_threshold', 1, 1)).toBeNull();
      expect(monitor.getThresholds()).toHaveLength(5);
    });
  });

  describe('Lifecycle', () => {
    it('should run the first pass on start and stop cleanly', async () => {
      source.overall = 42;

      await monitor.start();
      expect(monitor.running).toBe(true);
      expect(monitor.getHistory().length).toBe(1);

      await monitor.stop();
      await monitor.stop();
      expect(monitor.running).toBe(false);
      expect(monitor.getStatus()).toEqual({
        source: 'CpuThresholdMonitor',
        running: false,
        check_interval_seconds: 60,
        thresholds: 5,
        tracked_states: 2,
        active_alerts: 0
      });
    });

    it('should cancel a source call that hangs when stopped', async () => {
      source.hang = true;
      const slow = new CpuThresholdMonitor(source, dispatcher, { errorHandler, clock: () => now, checkIntervalSeconds: 60 });

      const firstPass = slow.start();
      const stopping = Date.now();
      await slow.stop();
      await firstPass;

      expect(Date.now() - stopping).toBeLessThan(1000);
      expect(slow.running).toBe(false);
      expect(errorHandler.getSystemHealth().recent_errors).toHaveLength(0);
    });

    it('should share a pass that is already in flight', async () => {
      const first = monitor.checkNow();
      const second = monitor.checkNow();

      expect(second).toBe(first);
      await first;
      expect(monitor.getHistory().length).toBe(1);
    });
  });
});
