/**
 * Metric snapshot interfaces returned by metric sources
 */

export interface CoreUsage {
  core_id: number;
  usage: number;
}

export interface ProcessUsage {
  pid: number;
  name: string;
  cpu_percent: number;
}

export interface BandwidthUsage {
  rx_bytes_per_sec: number;
  tx_bytes_per_sec: number;
}

export interface InterfaceDetails {
  name: string;
  status: 'active' | 'inactive';
  rx_bytes: number;
  tx_bytes: number;
  rx_bytes_per_sec: number;
  tx_bytes_per_sec: number;
  errors: number;
}

export interface ConnectionStats {
  tcp: number;
  udp: number;
  total: number;
  established: number;
  listening: number;
}

export interface WifiDetails {
  connected: boolean;
  interface_name?: string;
  signal_strength: number;
  link_quality?: number;
  noise?: number;
}

export interface NetworkProcessUsage {
  name: string;
  bandwidth: number;
  pid?: number;
}
