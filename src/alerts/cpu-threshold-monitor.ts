/**
 * CPU threshold monitor
 * Overall, per-core, per-process and sustained CPU load checks
 */

import { AlertSeverity, AlertType, MetricKey } from '../types/alerts';
import { MetricUpdateEvent } from '../types/events';
import { CpuMetricSource } from '../metrics/metric-source';
import { MetricsEventDispatcher } from '../events/event-dispatcher';
import { SampleHistory } from './sample-history';
import { ThresholdDefinition } from './threshold-registry';
import { ThresholdMonitor, ThresholdMonitorOptions } from './threshold-monitor';

export const CPU_METRICS: readonly MetricKey[] = ['cpu_usage', 'cpu_usage_sustained', 'core_usage', 'process_cpu'];

export const DEFAULT_CPU_THRESHOLDS: ThresholdDefinition[] = [
  {
    name: 'cpu_usage_high',
    metric: 'cpu_usage',
    threshold: 80,
    duration_seconds: 60,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.CPU_USAGE_HIGH,
    alert_message: 'CPU usage above {threshold}% for {duration} minutes (current: {value}%)'
  },
  {
    name: 'cpu_usage_very_high',
    metric: 'cpu_usage',
    threshold: 90,
    duration_seconds: 30,
    severity: AlertSeverity.CRITICAL,
    alert_type: AlertType.CPU_USAGE_VERY_HIGH,
    alert_message: 'CPU usage critically high: {value}% for {duration} minutes'
  },
  {
    name: 'cpu_usage_sustained',
    metric: 'cpu_usage_sustained',
    threshold: 70,
    duration_seconds: 600,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.CPU_USAGE_SUSTAINED,
    alert_message: 'Sustained CPU usage above {threshold}% for {duration} minutes (average: {value}%)'
  },
  {
    name: 'core_usage_high',
    metric: 'core_usage',
    threshold: 90,
    duration_seconds: 60,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.CPU_CORE_USAGE_HIGH,
    alert_message: 'Core {core_id} usage above {threshold}% for {duration} minutes'
  },
  {
    name: 'process_cpu_high',
    metric: 'process_cpu',
    threshold: 50,
    duration_seconds: 120,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.PROCESS_CPU_USAGE_HIGH,
    alert_message: 'Process {process_name} (PID {pid}) using {value}% CPU for {duration} minutes'
  }
];

const TOP_PROCESS_LIMIT = 10;

export class CpuThresholdMonitor extends ThresholdMonitor<CpuMetricSource> {
  private history = new SampleHistory();

  constructor(source: CpuMetricSource, dispatcher: MetricsEventDispatcher, options: ThresholdMonitorOptions = {}) {
    super('CpuThresholdMonitor', source, dispatcher, DEFAULT_CPU_THRESHOLDS, CPU_METRICS, options);
  }

  protected async runChecks(): Promise<void> {
    const sampled = await this.runCheck('overall_usage', () => this.checkOverallUsage());
    await this.runCheck('core_usage', () => this.checkCoreUsage());
    await this.runCheck('process_usage', () => this.checkProcessUsage());
    // no fresh sample: leave the sustained state as it is
    if (sampled) {
      await this.runCheck('sustained_usage', async () => this.evaluateSustained('cpu_usage_sustained', this.history));
    }
  }

  private async checkOverallUsage(): Promise<void> {
    const usage = await this.fetch('getOverallUsage', () => this.source.getOverallUsage());

    this.history.record(this.clock(), usage);
    this.evaluateMetric('cpu_usage', usage);

    this.dispatcher.publish({
      event_type: MetricUpdateEvent.CPU_OVERALL_UPDATED,
      timestamp: new Date(this.clock()),
      source: this.sourceName,
      data: { usage },
      message: `CPU usage ${usage.toFixed(1)}%`
    });
  }

  private async checkCoreUsage(): Promise<void> {
    const source = this.source;
    if (!source.getPerCoreUsage) {
      return;
    }

    const cores = await this.fetch('getPerCoreUsage', () => source.getPerCoreUsage?.() ?? Promise.resolve([]));
    if (cores.length === 0) {
      return;
    }

    for (const core of cores) {
      this.evaluateMetric('core_usage', core.usage, {
        scope: 'core',
        key: String(core.core_id),
        core_id: core.core_id
      });
    }

    this.pruneEntities('core', cores.map(core => String(core.core_id)));

    this.dispatcher.publish({
      event_type: MetricUpdateEvent.CPU_CORES_UPDATED,
      timestamp: new Date(this.clock()),
      source: this.sourceName,
      data: { cores: cores.map(core => core.usage) },
      message: `${cores.length} cores updated`
    });
  }

  private async checkProcessUsage(): Promise<void> {
    const source = this.source;
    if (!source.getTopProcesses) {
      return;
    }

    const processes = await this.fetch('getTopProcesses', () => source.getTopProcesses?.(TOP_PROCESS_LIMIT) ?? Promise.resolve([]));
    if (processes.length === 0) {
      return;
    }

    for (const proc of processes) {
      this.evaluateMetric('process_cpu', proc.cpu_percent, {
        scope: 'process',
        key: String(proc.pid),
        pid: proc.pid,
        process_name: proc.name
      });
    }

    this.pruneEntities('process', processes.map(proc => String(proc.pid)));
  }

  getHistory(): SampleHistory {
    return this.history;
  }
}
