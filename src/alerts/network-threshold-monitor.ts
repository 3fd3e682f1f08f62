/**
 * Network threshold monitor
 * Bandwidth, connection count, per-interface, per-process and WiFi signal checks
 */

import { AlertSeverity, AlertType, ComparisonDirection, EntityContext, MetricKey } from '../types/alerts';
import { MetricUpdateEvent } from '../types/events';
import { NetworkMetricSource } from '../metrics/metric-source';
import { MetricsEventDispatcher } from '../events/event-dispatcher';
import { SampleHistory } from './sample-history';
import { ThresholdDefinition } from './threshold-registry';
import { ThresholdMonitor, ThresholdMonitorOptions } from './threshold-monitor';

export const NETWORK_METRICS: readonly MetricKey[] = [
  'bandwidth_total',
  'bandwidth_rx',
  'bandwidth_tx',
  'bandwidth_sustained',
  'connection_count',
  'interface_bandwidth',
  'interface_errors',
  'process_bandwidth',
  'wifi_signal'
];

export const DEFAULT_NETWORK_THRESHOLDS: ThresholdDefinition[] = [
  {
    name: 'bandwidth_usage_high',
    metric: 'bandwidth_total',
    threshold: 50_000_000,
    duration_seconds: 60,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.BANDWIDTH_USAGE_HIGH,
    alert_message: 'Total bandwidth above {threshold} for {duration} minutes (current: {value})'
  },
  {
    name: 'bandwidth_usage_very_high',
    metric: 'bandwidth_total',
    threshold: 80_000_000,
    duration_seconds: 30,
    severity: AlertSeverity.CRITICAL,
    alert_type: AlertType.BANDWIDTH_USAGE_VERY_HIGH,
    alert_message: 'Total bandwidth critically high: {value} for {duration} minutes'
  },
  {
    name: 'download_rate_high',
    metric: 'bandwidth_rx',
    threshold: 40_000_000,
    duration_seconds: 60,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.DOWNLOAD_RATE_HIGH,
    alert_message: 'Download rate above {threshold} for {duration} minutes (current: {value})'
  },
  {
    name: 'upload_rate_high',
    metric: 'bandwidth_tx',
    threshold: 20_000_000,
    duration_seconds: 60,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.UPLOAD_RATE_HIGH,
    alert_message: 'Upload rate above {threshold} for {duration} minutes (current: {value})'
  },
  {
    name: 'bandwidth_usage_sustained',
    metric: 'bandwidth_sustained',
    threshold: 10_000_000,
    duration_seconds: 600,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.TOTAL_BANDWIDTH_SUSTAINED,
    alert_message: 'Sustained bandwidth above {threshold} for {duration} minutes (average: {value})'
  },
  {
    name: 'connection_count_high',
    metric: 'connection_count',
    threshold: 1000,
    duration_seconds: 120,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.CONNECTION_COUNT_HIGH,
    alert_message: 'Connection count above {threshold} for {duration} minutes (current: {value})'
  },
  {
    name: 'interface_bandwidth_high',
    metric: 'interface_bandwidth',
    threshold: 40_000_000,
    duration_seconds: 60,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.BANDWIDTH_USAGE_HIGH,
    alert_message: 'Interface {interface_name} bandwidth above {threshold} for {duration} minutes'
  },
  {
    name: 'interface_error_rate_high',
    metric: 'interface_errors',
    threshold: 100,
    duration_seconds: 300,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.INTERFACE_ERROR_RATE_HIGH,
    alert_message: 'Interface {interface_name} reports {value} errors for {duration} minutes'
  },
  {
    name: 'process_bandwidth_high',
    metric: 'process_bandwidth',
    threshold: 10_000_000,
    duration_seconds: 120,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.PROCESS_BANDWIDTH_HIGH,
    alert_message: 'Process {process_name} using {value} for {duration} minutes'
  },
  {
    name: 'wifi_signal_low',
    metric: 'wifi_signal',
    threshold: -75,
    duration_seconds: 300,
    severity: AlertSeverity.WARNING,
    alert_type: AlertType.WIFI_SIGNAL_LOW,
    alert_message: 'WiFi signal on {interface_name} at or below {threshold} dBm for {duration} minutes (current: {value} dBm)',
    direction: ComparisonDirection.BELOW
  }
];

export class NetworkThresholdMonitor extends ThresholdMonitor<NetworkMetricSource> {
  private history = new SampleHistory();

  constructor(source: NetworkMetricSource, dispatcher: MetricsEventDispatcher, options: ThresholdMonitorOptions = {}) {
    super('NetworkThresholdMonitor', source, dispatcher, DEFAULT_NETWORK_THRESHOLDS, NETWORK_METRICS, options);
  }

  protected async runChecks(): Promise<void> {
    const sampled = await this.runCheck('bandwidth', () => this.checkBandwidth());
    await this.runCheck('interfaces', () => this.checkInterfaces());
    await this.runCheck('process_bandwidth', () => this.checkProcessBandwidth());
    await this.runCheck('wifi_signal', () => this.checkWifiSignal());
    if (sampled) {
      await this.runCheck('sustained_bandwidth', async () => this.evaluateSustained('bandwidth_sustained', this.history));
    }
    await this.runCheck('connections', () => this.checkConnections());
  }

  private async checkBandwidth(): Promise<void> {
    const bandwidth = await this.fetch('getBandwidth', () => this.source.getBandwidth());
    const total = bandwidth.rx_bytes_per_sec + bandwidth.tx_bytes_per_sec;

    this.history.record(this.clock(), total);
    this.evaluateMetric('bandwidth_total', total);
    this.evaluateMetric('bandwidth_rx', bandwidth.rx_bytes_per_sec);
    this.evaluateMetric('bandwidth_tx', bandwidth.tx_bytes_per_sec);

    this.dispatcher.publish({
      event_type: MetricUpdateEvent.NETWORK_UPDATED,
      timestamp: new Date(this.clock()),
      source: this.sourceName,
      data: { ...bandwidth, total_bytes_per_sec: total },
      message: `Bandwidth ${total.toFixed(0)} bytes/s`
    });
  }

  private async checkInterfaces(): Promise<void> {
    const source = this.source;
    if (!source.getInterfaceDetails) {
      return;
    }

    const interfaces = await this.fetch('getInterfaceDetails', () => source.getInterfaceDetails?.() ?? Promise.resolve([]));
    const active = interfaces.filter(iface => iface.status === 'active');
    if (active.length === 0) {
      return;
    }

    for (const iface of active) {
      const entity: EntityContext = { scope: 'interface', key: iface.name, interface_name: iface.name };
      this.evaluateMetric('interface_bandwidth', iface.rx_bytes_per_sec + iface.tx_bytes_per_sec, entity);
      this.evaluateMetric('interface_errors', iface.errors, entity);
    }

    this.pruneEntities('interface', active.map(iface => iface.name));
  }

  private async checkProcessBandwidth(): Promise<void> {
    const source = this.source;
    if (!source.getNetworkProcesses) {
      return;
    }

    const processes = await this.fetch('getNetworkProcesses', () => source.getNetworkProcesses?.() ?? Promise.resolve([]));
    if (processes.length === 0) {
      return;
    }

    for (const proc of processes) {
      this.evaluateMetric('process_bandwidth', proc.bandwidth, {
        scope: 'process',
        key: proc.name,
        process_name: proc.name,
        ...(proc.pid !== undefined && { pid: proc.pid })
      });
    }

    this.pruneEntities('process', processes.map(proc => proc.name));
  }

  private async checkWifiSignal(): Promise<void> {
    const source = this.source;
    if (!source.getWifiDetails) {
      return;
    }

    const wifi = await this.fetch('getWifiDetails', () => source.getWifiDetails?.() ?? Promise.resolve(null));
    if (!wifi || !wifi.connected) {
      return;
    }

    const interfaceName = wifi.interface_name ?? 'wifi';
    this.evaluateMetric('wifi_signal', wifi.signal_strength, {
      scope: 'wifi',
      key: interfaceName,
      interface_name: interfaceName
    });
    this.pruneEntities('wifi', [interfaceName]);

    this.dispatcher.publish({
      event_type: MetricUpdateEvent.NETWORK_UPDATED,
      timestamp: new Date(this.clock()),
      source: this.sourceName,
      data: { wifi_signal: wifi.signal_strength, wifi_interface: interfaceName },
      message: `WiFi ${interfaceName} at ${wifi.signal_strength} dBm`
    });
  }

  private async checkConnections(): Promise<void> {
    const source = this.source;
    if (!source.getConnectionStats) {
      return;
    }

    const stats = await this.fetch('getConnectionStats', () => source.getConnectionStats?.() ?? Promise.resolve(null));
    if (!stats) {
      return;
    }

    this.evaluateMetric('connection_count', stats.total);

    this.dispatcher.publish({
      event_type: MetricUpdateEvent.NETWORK_UPDATED,
      timestamp: new Date(this.clock()),
      source: this.sourceName,
      data: { connections: stats.total, established: stats.established, listening: stats.listening },
      message: `${stats.total} connections`
    });
  }

  getHistory(): SampleHistory {
    return this.history;
  }
}
