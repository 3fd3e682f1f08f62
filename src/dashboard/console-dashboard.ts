/**
 * Terminal dashboard
 * Redraws live CPU and network readings and an "Active Alerts" section fed by the event dispatcher
 */

import { MetricsEventDispatcher, Subscription } from '../events/event-dispatcher';
import {
  AlertSeverity,
  DashboardConfig,
  isThresholdAlertEvent,
  MetricEvent,
  MetricEventObserver,
  MetricUpdateEvent,
  ThresholdAlertEvent
} from '../types';
import { Logger } from '../utils/logger';
import { formatNumber, formatValueWithUnit, renderBar } from '../utils/format';

export interface ConsoleDashboardOptions {
  updateIntervalSeconds?: number;
  /** When false the Active Alerts section is not subscribed */
  showAlerts?: boolean;
  color?: boolean;
  clock?: () => number;
  write?: (output: string) => void;
}

interface DisplayedAlert {
  event: ThresholdAlertEvent;
  received_at: number;
}

interface LiveReadings {
  cpu_usage?: number;
  cores: number[];
  rx_bytes_per_sec?: number;
  tx_bytes_per_sec?: number;
  connections?: number;
  wifi_signal?: number;
  wifi_interface?: string;
}

const ANSI = {
  clear: '\x1b[2J\x1b[H',
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m'
};

const SEVERITY_COLORS: Record<AlertSeverity, string> = {
  [AlertSeverity.CRITICAL]: ANSI.red,
  [AlertSeverity.WARNING]: ANSI.yellow,
  [AlertSeverity.INFO]: ANSI.cyan
};

function numberField(data: Readonly<Record<string, unknown>>, key: string): number | undefined {
  const value = data[key];
  return typeof value === 'number' ? value : undefined;
}

export class ConsoleDashboard implements MetricEventObserver {
  private dispatcher: MetricsEventDispatcher;
  private config: DashboardConfig;
  private logger: Logger;
  private updateIntervalSeconds: number;
  private showAlerts: boolean;
  private color: boolean;
  private clock: () => number;
  private write: (output: string) => void;

  private subscription: Subscription | null = null;
  private timer: NodeJS.Timeout | null = null;
  private alerts: Map<string, DisplayedAlert> = new Map();
  private readings: LiveReadings = { cores: [] };

  constructor(dispatcher: MetricsEventDispatcher, config: DashboardConfig, options: ConsoleDashboardOptions = {}) {
    this.dispatcher = dispatcher;
    this.config = config;
    this.logger = new Logger('ConsoleDashboard');
    this.updateIntervalSeconds = options.updateIntervalSeconds ?? 2;
    this.showAlerts = options.showAlerts ?? true;
    this.color = options.color ?? true;
    this.clock = options.clock ?? Date.now;
    this.write = options.write ?? ((output: string) => {
      process.stdout.write(output);
    });
  }

  /**
   * Subscribe to metric and alert events and start redrawing
   */
  start(): void {
    if (this.subscription) {
      this.logger.warn('Console dashboard is already running');
      return;
    }

    const eventTypes = [
      MetricUpdateEvent.CPU_OVERALL_UPDATED,
      MetricUpdateEvent.CPU_CORES_UPDATED,
      MetricUpdateEvent.NETWORK_UPDATED
    ];
    if (this.showAlerts) {
      eventTypes.push(MetricUpdateEvent.THRESHOLD_EXCEEDED);
    }
    this.subscription = this.dispatcher.subscribe(this, eventTypes);

    this.timer = setInterval(() => this.redraw(), this.updateIntervalSeconds * 1000);
    this.redraw();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.subscription) {
      this.subscription.unsubscribe();
      this.subscription = null;
    }
  }

  update(event: MetricEvent): void {
    if (isThresholdAlertEvent(event)) {
      this.alerts.set(this.alertId(event), { event, received_at: this.clock() });
      return;
    }

    const data = event.data;
    switch (event.event_type) {
      case MetricUpdateEvent.CPU_OVERALL_UPDATED:
        this.readings.cpu_usage = numberField(data, 'usage') ?? this.readings.cpu_usage;
        break;
      case MetricUpdateEvent.CPU_CORES_UPDATED: {
        const cores = data.cores;
        if (Array.isArray(cores)) {
          this.readings.cores = cores.filter((usage): usage is number => typeof usage === 'number');
        }
        break;
      }
      case MetricUpdateEvent.NETWORK_UPDATED:
        this.readings.rx_bytes_per_sec = numberField(data, 'rx_bytes_per_sec') ?? this.readings.rx_bytes_per_sec;
        this.readings.tx_bytes_per_sec = numberField(data, 'tx_bytes_per_sec') ?? this.readings.tx_bytes_per_sec;
        this.readings.connections = numberField(data, 'connections') ?? this.readings.connections;
        this.readings.wifi_signal = numberField(data, 'wifi_signal') ?? this.readings.wifi_signal;
        if (typeof data.wifi_interface === 'string') {
          this.readings.wifi_interface = data.wifi_interface;
        }
        break;
      default:
        break;
    }
  }

  /**
   * Build one frame, dropping alerts older than the display window
   */
  render(): string {
    const now = this.clock();
    this.expireAlerts(now);

    const lines: string[] = [];
    lines.push(this.paint(ANSI.bold, 'syswatch') + `  ${new Date(now).toISOString()}`);
    lines.push('');

    if (this.readings.cpu_usage !== undefined) {
      lines.push(`CPU      [${renderBar(this.readings.cpu_usage)}] ${formatNumber(this.readings.cpu_usage)}%`);
    }
    if (this.config.detailed_view) {
      this.readings.cores.forEach((usage, coreId) => {
        lines.push(`  Core ${String(coreId).padEnd(2)} [${renderBar(usage, 20)}] ${formatNumber(usage)}%`);
      });
    }
    if (this.readings.rx_bytes_per_sec !== undefined && this.readings.tx_bytes_per_sec !== undefined) {
      lines.push(`Network  down ${formatValueWithUnit(this.readings.rx_bytes_per_sec)}  up ${formatValueWithUnit(this.readings.tx_bytes_per_sec)}`);
    }
    if (this.readings.connections !== undefined) {
      lines.push(`Connections ${this.readings.connections}`);
    }
    if (this.readings.wifi_signal !== undefined) {
      lines.push(`WiFi     ${this.readings.wifi_interface ?? ''} ${formatNumber(this.readings.wifi_signal)} dBm`.replace(/\s+/g, ' '));
    }

    if (this.alerts.size > 0) {
      lines.push('');
      lines.push(this.paint(ANSI.bold, 'Active Alerts'));
      const sorted = Array.from(this.alerts.values()).sort((a, b) => b.received_at - a.received_at);
      for (const alert of sorted) {
        const severity = alert.event.data.severity;
        const age = Math.floor((now - alert.received_at) / 1000);
        lines.push(`  ${this.paint(SEVERITY_COLORS[severity], `[${severity.toUpperCase()}]`)} ${alert.event.message} (${age}s ago)`);
      }
    }

    return lines.join('\n') + '\n';
  }

  getDisplayedAlertCount(): number {
    this.expireAlerts(this.clock());
    return this.alerts.size;
  }

  private redraw(): void {
    this.write((this.color ? ANSI.clear : '') + this.render());
  }

  private expireAlerts(now: number): void {
    const maxAgeMs = this.config.alert_display_seconds * 1000;
    for (const [id, alert] of this.alerts) {
      if (now - alert.received_at > maxAgeMs) {
        this.alerts.delete(id);
      }
    }
  }

  private alertId(event: ThresholdAlertEvent): string {
    const data = event.data;
    const entity = data.core_id ?? data.pid ?? data.interface_name ?? data.process_name;
    return entity !== undefined ? `${data.threshold_name}:${entity}` : data.threshold_name;
  }

  private paint(code: string, text: string): string {
    return this.color ? `${code}${text}${ANSI.reset}` : text;
  }
}
