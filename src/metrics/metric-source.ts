/**
 * Contracts the threshold monitors read metrics through.
 * Optional methods are capabilities; a source without one makes the matching check not applicable.
 */

import {
  BandwidthUsage,
  ConnectionStats,
  CoreUsage,
  InterfaceDetails,
  NetworkProcessUsage,
  ProcessUsage,
  WifiDetails
} from '../types/metrics';

export interface CpuMetricSource {
  /** Overall CPU usage, 0-100 */
  getOverallUsage(): Promise<number>;
  getPerCoreUsage?(): Promise<CoreUsage[]>;
  getTopProcesses?(limit?: number): Promise<ProcessUsage[]>;
}

export interface NetworkMetricSource {
  getBandwidth(): Promise<BandwidthUsage>;
  getInterfaceDetails?(): Promise<InterfaceDetails[]>;
  getConnectionStats?(): Promise<ConnectionStats>;
  getWifiDetails?(): Promise<WifiDetails>;
  getNetworkProcesses?(): Promise<NetworkProcessUsage[]>;
}
