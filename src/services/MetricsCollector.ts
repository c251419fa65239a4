import { setTimeout as sleep } from 'timers/promises';
import { CpuTempResult, HardwareMetrics, MetricsSnapshot, TopProcess } from '../types/metrics';
import { RingBuffer } from '../utils/ringBuffer';
import { log } from '../utils/logger';
import { CpuTempProvider, unavailableResult } from './cpuTempProviders';
import { RuntimeStats } from './RuntimeStats';
import { ProcessSample, SystemCounterSource } from './SystemCounters';

export const SERIES_LENGTH = 60;
export const TOP_PROCESS_COUNT = 5;

const BYTES_PER_MB = 1024 * 1024;
const NET_SENT_LABEL = 'Bytes Sent/sec';
const NET_RECEIVED_LABEL = 'Bytes Received/sec';

export interface MetricsCollectorOptions {
  metricsIntervalMs: number;
  metricsIntervalNoClientsMs: number;
  adaptiveUpdateNoClients: boolean;
  topProcessesEnabled: boolean;
  processIntervalMs: number;
  networkSampleWindowMs?: number;
  now?: () => number;
}

export type HardwareMetricsSource = { getLatestMetrics(): Readonly<HardwareMetrics> };

interface RamMetrics {
  ramUsagePercent: number | null;
  ramUsedMb: number | null;
  ramTotalMb: number | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * bytes/s -> kilobits/s, rounded and never negative. Non-finite input reads as 0.
 */
export function toKbps(bytesPerSecond: number): number {
  const kbps = (bytesPerSecond * 8) / 1000;
  if (!Number.isFinite(kbps)) {
    return 0;
  }
  return Math.round(Math.max(0, kbps));
}

/**
 * GPU % desc (absent as 0), CPU % desc, RAM % desc, then name.
 */
export function compareTopProcesses(a: TopProcess, b: TopProcess): number {
  return (
    (b.gpuPercent ?? 0) - (a.gpuPercent ?? 0) ||
    b.cpuPercent - a.cpuPercent ||
    b.ramPercent - a.ramPercent ||
    a.name.localeCompare(b.name)
  );
}

export function selectTopProcesses(samples: readonly ProcessSample[], count = TOP_PROCESS_COUNT): TopProcess[] {
  return samples
    .map(sample => ({
      pid: sample.pid,
      name: sample.name,
      cpuPercent: Math.round(sample.cpuPercent * 10) / 10,
      ramPercent: Math.round(sample.memPercent * 10) / 10,
      gpuPercent: null,
    }))
    .sort(compareTopProcesses)
    .slice(0, count);
}

/**
 * Metrics Collector
 *
 * Periodic aggregation loop: reads the OS counters and the configured CPU
 * temperature provider, merges the hardware monitor's GPU readings and publishes
 * one frozen MetricsSnapshot per tick. Network throughput is also kept in two
 * 60-slot ring buffers for the dashboard charts.
 */
export class MetricsCollector {
  private readonly netSend = new RingBuffer<number>(SERIES_LENGTH);
  private readonly netRecv = new RingBuffer<number>(SERIES_LENGTH);
  private readonly now: () => number;

  private cpuCounterAvailable = false;
  private memoryCounterAvailable = false;
  private totalMemoryMb: number | null = null;
  private totalMemoryError: string | null = null;
  private networkInterface: string | null = null;

  private topProcesses: TopProcess[] | null = null;
  private lastProcessRead: number | null = null;

  private latest: Readonly<MetricsSnapshot>;

  private isRunning = false;
  private abort: AbortController | null = null;
  private timer: NodeJS.Timeout | null = null;
  private loop: Promise<void> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly counters: SystemCounterSource,
    private readonly hardwareMonitor: HardwareMetricsSource,
    private readonly cpuTempProvider: CpuTempProvider,
    private readonly runtimeStats: RuntimeStats,
    private readonly options: MetricsCollectorOptions
  ) {
    this.now = options.now ?? Date.now;
    this.latest = Object.freeze({
      cpuPercent: null,
      cpuTempC: null,
      cpuTempSource: null,
      cpuTempStatus: unavailableResult(cpuTempProvider.kind).status,
      cpuTempProvider: cpuTempProvider.kind,
      cpuTempHint: null,
      cpuTempDetails: null,
      gpuUsagePercent: null,
      gpuTempC: null,
      ramUsagePercent: null,
      ramUsedMb: null,
      ramTotalMb: null,
      netSendKbps: 0,
      netReceiveKbps: 0,
      topProcesses: null,
      series: null,
      errors: [],
    });
  }

  /**
   * Copy of the latest snapshot. The series is only built when asked for.
   */
  public getLatestSnapshot(includeSeries = false): MetricsSnapshot {
    const snapshot = this.latest;
    return {
      ...snapshot,
      topProcesses: snapshot.topProcesses ? snapshot.topProcesses.map(proc => ({ ...proc })) : null,
      series: includeSeries
        ? { netSend60: this.netSend.toPaddedArray(0), netRecv60: this.netRecv.toPaddedArray(0) }
        : null,
      errors: [...snapshot.errors],
    };
  }

  public start(): void {
    if (this.isRunning) {
      log.warn('Metrics collector already running', 'MetricsCollector');
      return;
    }

    this.isRunning = true;
    this.abort = new AbortController();
    log.info(`Starting metrics collector (interval: ${this.options.metricsIntervalMs}ms)`, 'MetricsCollector');
    this.loop = this.run(this.abort.signal);
  }

  /**
   * Cancels the pending wait, including the startup sampling window, and waits
   * for a tick in progress to finish.
   */
  public async stop(): Promise<void> {
    this.isRunning = false;
    this.abort?.abort();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.loop;
    await this.inFlight;
    log.info('Metrics collector stopped', 'MetricsCollector');
  }

  /**
   * Prepare the counters. Returns the errors to report with the first snapshot.
   */
  public async initialize(signal?: AbortSignal): Promise<string[]> {
    const errors: string[] = [];

    try {
      await this.counters.readCpuPercent();
      this.cpuCounterAvailable = true;
    } catch (error) {
      errors.push(`CPU counter unavailable: ${errorMessage(error)}`);
      log.warn('CPU counter unavailable', 'MetricsCollector', error);
    }

    try {
      await this.counters.readAvailableMemoryBytes();
      this.memoryCounterAvailable = true;
    } catch (error) {
      errors.push(`RAM counter unavailable: ${errorMessage(error)}`);
      log.warn('RAM counter unavailable', 'MetricsCollector', error);
    }

    try {
      const totalMb = Math.round((await this.counters.readTotalMemoryBytes()) / BYTES_PER_MB);
      this.totalMemoryMb = Number.isFinite(totalMb) && totalMb > 0 ? totalMb : null;
    } catch (error) {
      this.totalMemoryError = `Total RAM unavailable: ${errorMessage(error)}`;
      log.warn('Total RAM unavailable', 'MetricsCollector', error);
    }

    this.networkInterface = await this.selectNetworkInterface(errors, signal);
    return errors;
  }

  /**
   * Run one collection and publish the snapshot. Never rejects.
   */
  public async collect(initialErrors: readonly string[] = []): Promise<void> {
    const startedAt = this.now();
    const errors = [...initialErrors];

    const cpuPercent = await this.readCpuPercent(errors);
    const { sendKbps, receiveKbps } = await this.readNetworkKbps(errors);
    const hardware = this.hardwareMonitor.getLatestMetrics();
    const cpuTemp = await this.readCpuTemp(errors);
    const ram = await this.readRam(errors);
    const topProcesses = await this.readTopProcesses(errors);

    this.netSend.push(sendKbps);
    this.netRecv.push(receiveKbps);

    const isNative = cpuTemp.provider === 'native';
    this.latest = Object.freeze({
      cpuPercent,
      cpuTempC: cpuTemp.tempC,
      cpuTempSource: isNative ? cpuTemp.source : null,
      cpuTempStatus: cpuTemp.status,
      cpuTempProvider: cpuTemp.provider,
      cpuTempHint: cpuTemp.hint,
      cpuTempDetails: isNative ? cpuTemp.details : null,
      gpuUsagePercent: hardware.gpuUsagePercent,
      gpuTempC: hardware.gpuTempC,
      ...ram,
      netSendKbps: sendKbps,
      netReceiveKbps: receiveKbps,
      topProcesses,
      series: null,
      errors: Object.freeze(errors),
    });

    this.runtimeStats.recordTick(new Date(), this.now() - startedAt);
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      const initErrors = await this.initialize(signal);
      if (signal.aborted) {
        return;
      }
      await this.collect(initErrors);
      this.scheduleNext();
    } catch (error) {
      if (!signal.aborted) {
        log.error('Metrics collector failed to start', 'MetricsCollector', error);
      }
    }
  }

  private currentInterval(): number {
    if (this.options.adaptiveUpdateNoClients && this.runtimeStats.webSocketClients === 0) {
      return this.options.metricsIntervalNoClientsMs;
    }
    return this.options.metricsIntervalMs;
  }

  private scheduleNext(): void {
    if (!this.isRunning) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.collect().finally(() => {
        this.inFlight = null;
        this.scheduleNext();
      });
    }, this.currentInterval());
  }

  /**
   * Pick the interface with the most traffic over the sampling window.
   */
  private async selectNetworkInterface(errors: string[], signal?: AbortSignal): Promise<string | null> {
    let interfaces: string[];
    try {
      interfaces = await this.counters.listNetworkInterfaces();
      if (interfaces.length === 0) {
        errors.push('No network interfaces found.');
        return null;
      }
      await this.counters.readNetworkRates(interfaces);
    } catch (error) {
      errors.push(`Network counters unavailable: ${errorMessage(error)}`);
      log.warn('Network counters unavailable', 'MetricsCollector', error);
      return null;
    }

    // Rejects with AbortError when stopped during the window
    await sleep(this.options.networkSampleWindowMs ?? 2000, undefined, { signal });

    let best: string | null = null;
    let bestTotal = 0;
    try {
      for (const rate of await this.counters.readNetworkRates(interfaces)) {
        const total = rate.sentBytesPerSec + rate.receivedBytesPerSec;
        if (total > bestTotal) {
          best = rate.iface;
          bestTotal = total;
        }
      }
    } catch (error) {
      errors.push(`Network counters unavailable: ${errorMessage(error)}`);
      log.warn('Network counters unavailable', 'MetricsCollector', error);
      return null;
    }

    if (best === null) {
      errors.push('No active network interface detected; using first available.');
      best = interfaces[0];
    }
    log.info(`Network interface: ${best}`, 'MetricsCollector');
    return best;
  }

  private async readCpuPercent(errors: string[]): Promise<number | null> {
    if (!this.cpuCounterAvailable) {
      errors.push('CPU counter not available.');
      return null;
    }
    try {
      return Math.round(await this.counters.readCpuPercent());
    } catch (error) {
      errors.push(`CPU read failed: ${errorMessage(error)}`);
      log.debug('CPU read failed', 'MetricsCollector', error);
      return null;
    }
  }

  private async readNetworkKbps(errors: string[]): Promise<{ sendKbps: number; receiveKbps: number }> {
    if (this.networkInterface === null) {
      errors.push(`${NET_SENT_LABEL} counter not available.`, `${NET_RECEIVED_LABEL} counter not available.`);
      return { sendKbps: 0, receiveKbps: 0 };
    }

    try {
      const rates = await this.counters.readNetworkRates([this.networkInterface]);
      const rate = rates.find(entry => entry.iface === this.networkInterface);
      if (!rate) {
        throw new Error(`interface ${this.networkInterface} not reported`);
      }
      return { sendKbps: toKbps(rate.sentBytesPerSec), receiveKbps: toKbps(rate.receivedBytesPerSec) };
    } catch (error) {
      const message = errorMessage(error);
      errors.push(`${NET_SENT_LABEL} read failed: ${message}`, `${NET_RECEIVED_LABEL} read failed: ${message}`);
      log.debug('Network read failed', 'MetricsCollector', error);
      return { sendKbps: 0, receiveKbps: 0 };
    }
  }

  private async readCpuTemp(errors: string[]): Promise<CpuTempResult> {
    try {
      return await this.cpuTempProvider.getTemperature();
    } catch (error) {
      errors.push(`CPU temp provider failed: ${errorMessage(error)}`);
      return unavailableResult(this.cpuTempProvider.kind);
    }
  }

  private async readRam(errors: string[]): Promise<RamMetrics> {
    const totalMb = this.totalMemoryMb;
    if (totalMb === null) {
      errors.push(this.totalMemoryError ?? 'Total RAM unavailable.');
      return { ramUsagePercent: null, ramUsedMb: null, ramTotalMb: null };
    }

    const availableMb = await this.readAvailableMemoryMb(errors);
    if (availableMb === null) {
      return { ramUsagePercent: null, ramUsedMb: null, ramTotalMb: totalMb };
    }

    const usedMb = Math.max(0, totalMb - availableMb);
    const percent = Math.min(100, Math.max(0, Math.round((usedMb / totalMb) * 100)));
    return { ramUsagePercent: percent, ramUsedMb: usedMb, ramTotalMb: totalMb };
  }

  private async readAvailableMemoryMb(errors: string[]): Promise<number | null> {
    if (!this.memoryCounterAvailable) {
      errors.push('RAM counter not available.');
      return null;
    }
    try {
      const availableMb = (await this.counters.readAvailableMemoryBytes()) / BYTES_PER_MB;
      if (!Number.isFinite(availableMb)) {
        errors.push('RAM read returned invalid value.');
        return null;
      }
      return Math.round(Math.max(0, availableMb));
    } catch (error) {
      errors.push(`RAM read failed: ${errorMessage(error)}`);
      log.debug('RAM read failed', 'MetricsCollector', error);
      return null;
    }
  }

  private async readTopProcesses(errors: string[]): Promise<TopProcess[] | null> {
    if (!this.options.topProcessesEnabled) {
      return null;
    }

    const now = this.now();
    if (this.lastProcessRead !== null && now - this.lastProcessRead < this.options.processIntervalMs) {
      return this.topProcesses;
    }

    this.lastProcessRead = now;
    try {
      this.topProcesses = selectTopProcesses(await this.counters.listProcesses());
    } catch (error) {
      errors.push(`Process list failed: ${errorMessage(error)}`);
      log.debug('Process list failed', 'MetricsCollector', error);
      this.topProcesses = null;
    }
    return this.topProcesses;
  }
}
