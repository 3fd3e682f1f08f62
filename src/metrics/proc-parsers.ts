/**
 * Parsers for Linux procfs tables and `ps` output
 */

import { ProcessUsage } from '../types/metrics';

export interface CpuTimes {
  user: number;
  nice: number;
  sys: number;
  idle: number;
  irq: number;
}

export interface InterfaceCounters {
  name: string;
  rx_bytes: number;
  tx_bytes: number;
  errors: number;
}

export interface SocketCounts {
  total: number;
  established: number;
  listening: number;
}

export interface WirelessReading {
  interface_name: string;
  link_quality: number;
  signal_strength: number;
  noise: number;
}

const TCP_ESTABLISHED = '01';
const TCP_LISTEN = '0A';

/**
 * Busy percentage of each core between two `os.cpus()` samples.
 * A core missing from `previous` is measured since boot.
 */
export function computeCoreUsage(previous: CpuTimes[], current: CpuTimes[]): number[] {
  return current.map((times, index) => {
    const before = previous[index];
    const idle = times.idle - (before ? before.idle : 0);
    const total = totalTime(times) - (before ? totalTime(before) : 0);

    if (total <= 0) {
      return 0;
    }
    return Math.min(100, Math.max(0, (1 - idle / total) * 100));
  });
}

function totalTime(times: CpuTimes): number {
  return times.user + times.nice + times.sys + times.idle + times.irq;
}

/**
 * Parse /proc/net/dev. Errors are receive plus transmit errors.
 */
export function parseNetDev(content: string): InterfaceCounters[] {
  const interfaces: InterfaceCounters[] = [];

  for (const line of content.split('\n')) {
    const separator = line.indexOf(':');
    if (separator === -1) {
      continue;
    }

    const name = line.slice(0, separator).trim();
    const fields = line.slice(separator + 1).trim().split(/\s+/).map(Number);
    if (!name || fields.length < 11 || fields.some(field => Number.isNaN(field))) {
      continue;
    }

    interfaces.push({
      name,
      rx_bytes: fields[0],
      tx_bytes: fields[8],
      errors: fields[2] + fields[10]
    });
  }

  return interfaces;
}

/**
 * Count sockets in a /proc/net/{tcp,tcp6,udp,udp6} table
 */
export function parseSocketTable(content: string): SocketCounts {
  const counts: SocketCounts = { total: 0, established: 0, listening: 0 };

  const lines = content.split('\n').slice(1);
  for (const line of lines) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 4) {
      continue;
    }

    counts.total++;
    const state = fields[3].toUpperCase();
    if (state === TCP_ESTABLISHED) {
      counts.established++;
    } else if (state === TCP_LISTEN) {
      counts.listening++;
    }
  }

  return counts;
}

/**
 * Parse /proc/net/wireless. Link, level and noise carry a trailing '.' in that file.
 */
export function parseWireless(content: string): WirelessReading[] {
  const readings: WirelessReading[] = [];

  for (const line of content.split('\n').slice(2)) {
    const separator = line.indexOf(':');
    if (separator === -1) {
      continue;
    }

    const interfaceName = line.slice(0, separator).trim();
    const fields = line.slice(separator + 1).trim().split(/\s+/);
    if (fields.length < 4) {
      continue;
    }

    const [linkQuality, signal, noise] = fields.slice(1, 4).map(field => parseFloat(field));
    if (Number.isNaN(signal)) {
      continue;
    }

    readings.push({
      interface_name: interfaceName,
      link_quality: linkQuality,
      signal_strength: signal,
      noise
    });
  }

  return readings;
}

/**
 * Parse `ps -eo pid=,pcpu=,comm=` output, highest CPU first
 */
export function parsePsOutput(output: string, limit?: number): ProcessUsage[] {
  const processes: ProcessUsage[] = [];

  for (const line of output.split('\n')) {
    const match = line.trim().match(/^(\d+)\s+([\d.]+)\s+(.+)$/);
    if (!match) {
      continue;
    }

    processes.push({
      pid: parseInt(match[1], 10),
      cpu_percent: parseFloat(match[2]),
      name: match[3].trim()
    });
  }

  processes.sort((a, b) => b.cpu_percent - a.cpu_percent);
  return limit !== undefined ? processes.slice(0, limit) : processes;
}
