import * as si from 'systeminformation';

export interface NetworkRate {
  iface: string;
  sentBytesPerSec: number;
  receivedBytesPerSec: number;
}

export interface ProcessSample {
  pid: number;
  name: string;
  cpuPercent: number;
  memPercent: number;
}

/**
 * OS counters read by the metrics collector. Rates (CPU load, network bytes/sec)
 * are measured between consecutive calls, so the first call only primes them.
 */
export interface SystemCounterSource {
  readCpuPercent(): Promise<number>;
  readTotalMemoryBytes(): Promise<number>;
  readAvailableMemoryBytes(): Promise<number>;
  listNetworkInterfaces(): Promise<string[]>;
  readNetworkRates(ifaces: readonly string[]): Promise<NetworkRate[]>;
  listProcesses(): Promise<ProcessSample[]>;
}

function finiteOr(value: number | null | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * systeminformation-backed counters.
 */
export class SystemInformationCounters implements SystemCounterSource {
  public async readCpuPercent(): Promise<number> {
    const load = await si.currentLoad();
    return load.currentLoad;
  }

  public async readTotalMemoryBytes(): Promise<number> {
    const mem = await si.mem();
    return mem.total;
  }

  public async readAvailableMemoryBytes(): Promise<number> {
    const mem = await si.mem();
    return mem.available;
  }

  public async listNetworkInterfaces(): Promise<string[]> {
    const result = await si.networkInterfaces();
    const interfaces = Array.isArray(result) ? result : [result];
    return interfaces.filter(nic => !nic.internal).map(nic => nic.iface);
  }

  public async readNetworkRates(ifaces: readonly string[]): Promise<NetworkRate[]> {
    if (ifaces.length === 0) {
      return [];
    }
    const stats = await si.networkStats(ifaces.join(','));
    return stats.map(entry => ({
      iface: entry.iface,
      sentBytesPerSec: finiteOr(entry.tx_sec, 0),
      receivedBytesPerSec: finiteOr(entry.rx_sec, 0),
    }));
  }

  public async listProcesses(): Promise<ProcessSample[]> {
    const { list } = await si.processes();
    return list.map(proc => ({
      pid: proc.pid,
      name: proc.name,
      cpuPercent: finiteOr(proc.cpu, 0),
      memPercent: finiteOr(proc.mem, 0),
    }));
  }
}
