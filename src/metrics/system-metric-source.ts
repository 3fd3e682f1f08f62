/**
 * Metric source backed by the local Linux host
 * CPU from os.cpus() deltas, processes from ps, network from procfs and sysfs
 */

import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  BandwidthUsage,
  ConnectionStats,
  CoreUsage,
  InterfaceDetails,
  ProcessUsage,
  WifiDetails
} from '../types/metrics';
import { MonitoringError, ErrorCategory, ErrorSeverity } from '../error-handling';
import { Logger } from '../utils/logger';
import { CpuMetricSource, NetworkMetricSource } from './metric-source';
import {
  computeCoreUsage,
  CpuTimes,
  InterfaceCounters,
  parseNetDev,
  parsePsOutput,
  parseSocketTable,
  parseWireless
} from './proc-parsers';

export interface SystemMetricSourceOptions {
  procRoot?: string;
  sysRoot?: string;
  /** CPU and interface samples younger than this are reused */
  minSampleIntervalMs?: number;
  /** Process listing command; its output must match `ps -eo pid=,pcpu=,comm=` */
  processCommand?: CommandSpec;
  /** A command still running after this long is killed */
  commandTimeoutMs?: number;
  clock?: () => number;
}

export interface CommandSpec {
  command: string;
  args: string[];
}

interface CpuSample {
  timestamp: number;
  cores: number[];
}

interface CounterSample {
  timestamp: number;
  counters: Map<string, InterfaceCounters>;
  details: InterfaceDetails[];
}

const COMPONENT = 'SystemMetricSource';
const LOOPBACK = 'lo';
const KILL_GRACE_MS = 2000;

export class SystemMetricSource implements CpuMetricSource, NetworkMetricSource {
  private logger: Logger;
  private procRoot: string;
  private sysRoot: string;
  private minSampleIntervalMs: number;
  private processCommand: CommandSpec;
  private commandTimeoutMs: number;
  private clock: () => number;
  private processListing: Promise<string> | null = null;

  private previousCpuTimes: CpuTimes[] = [];
  private cpuSample: CpuSample | null = null;
  private previousCounters: CounterSample | null = null;

  constructor(options: SystemMetricSourceOptions = {}) {
    this.logger = new Logger(COMPONENT);
    this.procRoot = options.procRoot ?? '/proc';
    this.sysRoot = options.sysRoot ?? '/sys';
    this.minSampleIntervalMs = options.minSampleIntervalMs ?? 250;
    this.processCommand = options.processCommand ?? { command: 'ps', args: ['-eo', 'pid=,pcpu=,comm='] };
    this.commandTimeoutMs = options.commandTimeoutMs ?? 5000;
    this.clock = options.clock ?? Date.now;
  }

  async getOverallUsage(): Promise<number> {
    const cores = this.sampleCpu().cores;
    if (cores.length === 0) {
      return 0;
    }
    return cores.reduce((sum, usage) => sum + usage, 0) / cores.length;
  }

  async getPerCoreUsage(): Promise<CoreUsage[]> {
    return this.sampleCpu().cores.map((usage, coreId) => ({ core_id: coreId, usage }));
  }

  /**
   * Callers that arrive while a listing is running share it
   */
  async getTopProcesses(limit: number = 10): Promise<ProcessUsage[]> {
    if (!this.processListing) {
      const { command, args } = this.processCommand;
      this.processListing = this.runCommand(command, args).finally(() => {
        this.processListing = null;
      });
    }
    const output = await this.processListing;
    return parsePsOutput(output, limit);
  }

  async getBandwidth(): Promise<BandwidthUsage> {
    const interfaces = await this.getInterfaceDetails();
    return interfaces
      .filter(iface => iface.name !== LOOPBACK)
      .reduce<BandwidthUsage>((total, iface) => ({
        rx_bytes_per_sec: total.rx_bytes_per_sec + iface.rx_bytes_per_sec,
        tx_bytes_per_sec: total.tx_bytes_per_sec + iface.tx_bytes_per_sec
      }), { rx_bytes_per_sec: 0, tx_bytes_per_sec: 0 });
  }

  /**
   * Interface counters with rates since the previous call. The first call reports zero rates.
   */
  async getInterfaceDetails(): Promise<InterfaceDetails[]> {
    const previous = this.previousCounters;
    if (previous && this.clock() - previous.timestamp < this.minSampleIntervalMs) {
      return previous.details;
    }

    const content = await this.readProcFile('net/dev');
    const now = this.clock();
    const counters = parseNetDev(content);
    const elapsedSeconds = previous ? (now - previous.timestamp) / 1000 : 0;

    const details: InterfaceDetails[] = [];
    for (const iface of counters) {
      const before = previous?.counters.get(iface.name);
      const rate = (current: number, earlier: number | undefined): number =>
        earlier !== undefined && elapsedSeconds > 0 ? Math.max(0, (current - earlier) / elapsedSeconds) : 0;

      details.push({
        name: iface.name,
        status: await this.readOperState(iface.name),
        rx_bytes: iface.rx_bytes,
        tx_bytes: iface.tx_bytes,
        rx_bytes_per_sec: rate(iface.rx_bytes, before?.rx_bytes),
        tx_bytes_per_sec: rate(iface.tx_bytes, before?.tx_bytes),
        errors: iface.errors
      });
    }

    this.previousCounters = {
      timestamp: now,
      counters: new Map(counters.map(iface => [iface.name, iface])),
      details
    };

    return details;
  }

  async getConnectionStats(): Promise<ConnectionStats> {
    const [tcp4, tcp6, udp4, udp6] = await Promise.all(
      ['net/tcp', 'net/tcp6', 'net/udp', 'net/udp6'].map(file => this.readProcFile(file, ''))
    );

    const tcp = [parseSocketTable(tcp4), parseSocketTable(tcp6)];
    const udp = [parseSocketTable(udp4), parseSocketTable(udp6)];
    const tcpTotal = tcp.reduce((sum, counts) => sum + counts.total, 0);
    const udpTotal = udp.reduce((sum, counts) => sum + counts.total, 0);

    return {
      tcp: tcpTotal,
      udp: udpTotal,
      total: tcpTotal + udpTotal,
      established: tcp.reduce((sum, counts) => sum + counts.established, 0),
      listening: tcp.reduce((sum, counts) => sum + counts.listening, 0)
    };
  }

  async getWifiDetails(): Promise<WifiDetails> {
    const readings = parseWireless(await this.readProcFile('net/wireless', ''));
    const reading = readings[0];
    if (!reading) {
      return { connected: false, signal_strength: 0 };
    }

    return {
      connected: true,
      interface_name: reading.interface_name,
      signal_strength: reading.signal_strength,
      link_quality: reading.link_quality,
      noise: reading.noise
    };
  }

  private sampleCpu(): CpuSample {
    const now = this.clock();
    if (this.cpuSample && now - this.cpuSample.timestamp < this.minSampleIntervalMs) {
      return this.cpuSample;
    }

    const current = os.cpus().map(cpu => cpu.times);
    this.cpuSample = { timestamp: now, cores: computeCoreUsage(this.previousCpuTimes, current) };
    this.previousCpuTimes = current;
    return this.cpuSample;
  }

  private async readOperState(interfaceName: string): Promise<InterfaceDetails['status']> {
    try {
      const state = await fs.readFile(path.join(this.sysRoot, 'class/net', interfaceName, 'operstate'), 'utf8');
      return state.trim() === 'up' ? 'active' : 'inactive';
    } catch (error) {
      this.logger.debug(`No operstate for ${interfaceName}:`, error);
      return 'inactive';
    }
  }

  /**
   * Read a procfs file. With a fallback, a missing file yields the fallback instead of an error.
   */
  private async readProcFile(relativePath: string, fallback?: string): Promise<string> {
    const filePath = path.join(this.procRoot, relativePath);
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (fallback !== undefined && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return fallback;
      }
      throw new MonitoringError(
        `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCategory.METRIC_SOURCE,
        ErrorSeverity.MEDIUM,
        COMPONENT,
        filePath
      );
    }
  }

  private runCommand(command: string, args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args);
      let stdout = '';
      let stderr = '';

      const timeout = setTimeout(() => {
        if (!child.killed) {
          child.kill('SIGTERM');

          // Force kill if SIGTERM is ignored
          setTimeout(() => {
            if (child.exitCode === null && child.signalCode === null) {
              child.kill('SIGKILL');
            }
          }, KILL_GRACE_MS).unref();
        }

        reject(new MonitoringError(
          `${command} timed out after ${this.commandTimeoutMs}ms`,
          ErrorCategory.TIMEOUT,
          ErrorSeverity.MEDIUM,
          COMPONENT,
          command,
          { args, timeoutMs: this.commandTimeoutMs }
        ));
      }, this.commandTimeoutMs);

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error: Error) => {
        clearTimeout(timeout);
        reject(new MonitoringError(
          `${command} process error: ${error.message}`,
          ErrorCategory.METRIC_SOURCE,
          ErrorSeverity.MEDIUM,
          COMPONENT,
          command,
          { args }
        ));
      });

      child.on('close', (code: number | null) => {
        clearTimeout(timeout);
        if (code === 0) {
          resolve(stdout);
        } else {
          reject(new MonitoringError(
            `${command} exited with code ${code}: ${stderr.trim()}`,
            ErrorCategory.METRIC_SOURCE,
            ErrorSeverity.MEDIUM,
            COMPONENT,
            command,
            { args, exitCode: code }
          ));
        }
      });
    });
  }
}
