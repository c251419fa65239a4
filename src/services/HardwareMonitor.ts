import { HardwareBackend } from '../hardware/HardwareBackend';
import { CimQuery, powershellCimQuery, readThermalSensorSnapshots } from '../hardware/thermalZones';
import { CpuTempDebugSnapshot, CpuTempResult, HardwareMetrics } from '../types/metrics';
import { HardwareNode, SensorHandle, SensorSnapshot } from '../types/sensors';
import { formatRawValue, roundTo1 } from '../utils/temperature';
import { log } from '../utils/logger';
import { CpuTempEvaluation, CpuTempStateMachine } from './CpuTempStateMachine';
import { EMPTY_SCAN, ScanResult, findSensor, isSelectionIncomplete, scanSensors } from './SensorScanner';

export const RESCAN_INTERVAL_MS = 30_000;

const HARDWARE_TYPE_NAMES: Record<HardwareNode['category'], string> = {
  cpu: 'Cpu',
  gpu: 'Gpu',
  motherboard: 'Motherboard',
  other: 'Other',
};

export interface HardwareMonitorOptions {
  intervalMs: number;
  isAdmin?: boolean;
  thermalQuery?: CimQuery;
  now?: () => number;
}

function finiteOrNull(value: number | null | undefined): number | null {
  return value !== null && value !== undefined && Number.isFinite(value) ? value : null;
}

/**
 * Hardware Monitor
 *
 * Owns the hardware backend. Every tick it (re)opens the backend if needed, decides
 * whether to rescan, feeds the selected sensor values through the CPU temperature
 * state machine and publishes a frozen HardwareMetrics object.
 */
export class HardwareMonitor {
  private readonly stateMachine: CpuTempStateMachine;
  private readonly thermalQuery: CimQuery;
  private readonly now: () => number;

  private backendOpen = false;
  private scan: ScanResult = EMPTY_SCAN;
  private lastScanAt: number | null = null;
  private latest: Readonly<HardwareMetrics>;

  private isRunning = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(private readonly backend: HardwareBackend, private readonly options: HardwareMonitorOptions) {
    this.stateMachine = new CpuTempStateMachine(options.isAdmin ?? false);
    this.thermalQuery = options.thermalQuery ?? powershellCimQuery;
    this.now = options.now ?? Date.now;
    this.latest = this.buildMetrics(this.stateMachine.blocked(), null, null);
  }

  public getLatestMetrics(): Readonly<HardwareMetrics> {
    return this.latest;
  }

  public getLatestCpuTempResult(): Readonly<CpuTempResult> {
    return this.latest.cpuTemp;
  }

  public getCpuTempDebugSnapshot(): CpuTempDebugSnapshot {
    const { tempC, source, status, provider, hint, details } = this.latest.cpuTemp;
    return { tempC, source, status, provider, hint, details };
  }

  /**
   * Start polling. The sensor selection is made once before the first tick.
   */
  public async start(): Promise<void> {
    if (this.isRunning) {
      log.warn('Hardware monitor already running', 'HardwareMonitor');
      return;
    }

    this.isRunning = true;
    log.info(`Starting hardware monitor (backend: ${this.backend.name}, interval: ${this.options.intervalMs}ms)`, 'HardwareMonitor');

    try {
      if (await this.ensureOpen()) {
        await this.rescan(await this.backend.read());
      }
    } catch (error) {
      this.markClosed(error);
    }

    this.scheduleNext();
  }

  public async stop(): Promise<void> {
    this.isRunning = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    if (this.backendOpen) {
      this.backendOpen = false;
      await this.backend.close();
    }
    log.info('Hardware monitor stopped', 'HardwareMonitor');
  }

  /**
   * One hardware tick. Never rejects.
   */
  public async tick(): Promise<void> {
    try {
      if (!(await this.ensureOpen())) {
        this.latest = this.buildMetrics(this.stateMachine.blocked(), null, null);
        return;
      }

      let tree = await this.backend.read();
      if (this.shouldRescan()) {
        tree = await this.rescan(tree);
      }

      const { cpuTemp, distance, gpuTemp, gpuLoad } = this.scan;
      const evaluation = this.stateMachine.evaluate(
        this.currentValue(tree, cpuTemp?.sensor),
        this.currentValue(tree, distance?.sensor)
      );

      const gpuTempValue = this.currentValue(tree, gpuTemp);
      const gpuLoadValue = this.currentValue(tree, gpuLoad);
      this.latest = this.buildMetrics(
        evaluation,
        gpuLoadValue === null ? null : roundTo1(gpuLoadValue),
        gpuTempValue === null ? null : roundTo1(gpuTempValue)
      );
    } catch (error) {
      this.markClosed(error);
    }
  }

  /**
   * Debug listing of CPU, GPU and motherboard sensors from a fresh read, followed
   * by the OS thermal sources. Backend failures leave only the thermal rows.
   */
  public async getSensorSnapshots(): Promise<SensorSnapshot[]> {
    const rows: SensorSnapshot[] = [];

    try {
      if (await this.ensureOpen()) {
        const tree = await this.backend.read();
        for (const hardware of tree.filter(hw => hw.category !== 'other')) {
          await this.activate(hardware);
        }
        const fresh = this.backend.activateSensors ? await this.backend.read() : tree;
        for (const hardware of fresh.filter(hw => hw.category !== 'other')) {
          rows.push(...this.describeHardware(hardware));
        }
      }
    } catch (error) {
      this.markClosed(error);
    }

    rows.push(...(await readThermalSensorSnapshots(this.thermalQuery)));
    return rows;
  }

  private describeHardware(hardware: HardwareNode): SensorSnapshot[] {
    const own = hardware.sensors.map(sensor => ({
      hardwareName: hardware.name,
      hardwareType: HARDWARE_TYPE_NAMES[hardware.category],
      sensorName: sensor.name,
      sensorType: sensor.sensorCategory,
      value: finiteOrNull(sensor.value),
      hasValue: sensor.value !== null,
      rawValue: sensor.rawValue ?? formatRawValue(sensor.value),
      identifier: sensor.identifier,
    }));
    return [...own, ...hardware.subHardware.flatMap(sub => this.describeHardware(sub))];
  }

  private scheduleNext(): void {
    if (!this.isRunning) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick().finally(() => {
        this.inFlight = null;
        this.scheduleNext();
      });
    }, this.options.intervalMs);
  }

  private async ensureOpen(): Promise<boolean> {
    if (this.backendOpen) {
      return true;
    }
    try {
      await this.backend.open();
      this.backendOpen = true;
      return true;
    } catch (error) {
      log.debug(`${this.backend.name} unavailable: ${error instanceof Error ? error.message : String(error)}`, 'HardwareMonitor');
      return false;
    }
  }

  private markClosed(error: unknown): void {
    if (this.backendOpen) {
      log.warn(`${this.backend.name} read failed; reopening on next tick`, 'HardwareMonitor', error);
    } else {
      log.debug('Hardware monitor tick failed', 'HardwareMonitor', error);
    }
    this.backendOpen = false;
  }

  private shouldRescan(): boolean {
    if (this.lastScanAt === null || this.stateMachine.needsRescan) {
      return true;
    }
    // Incomplete selections are retried on the same cadence as the periodic rescan
    return this.now() - this.lastScanAt >= RESCAN_INTERVAL_MS;
  }

  private async activate(hardware: HardwareNode): Promise<void> {
    if (this.backend.activateSensors && (hardware.category === 'cpu' || hardware.category === 'motherboard')) {
      await this.backend.activateSensors(hardware);
    }
  }

  private async rescan(tree: HardwareNode[]): Promise<HardwareNode[]> {
    this.lastScanAt = this.now();

    let current = tree;
    if (this.backend.activateSensors) {
      for (const hardware of tree) {
        await this.activate(hardware);
      }
      current = await this.backend.read();
    }

    this.scan = scanSensors(current);
    this.stateMachine.reset(this.scan);

    const { cpuTemp, distance, sensorsFound, sensorsWithValue } = this.scan;
    log.debug(
      `Sensor scan: ${sensorsFound} CPU temperature sensors (${sensorsWithValue} with value), ` +
        `primary: ${cpuTemp?.source ?? 'none'}, derived: ${distance?.source ?? 'none'}`,
      'HardwareMonitor'
    );
    if (isSelectionIncomplete(this.scan)) {
      log.debug(`Sensor selection incomplete; retrying in ${RESCAN_INTERVAL_MS / 1000}s`, 'HardwareMonitor');
    }

    return current;
  }

  private currentValue(tree: readonly HardwareNode[], sensor: SensorHandle | null | undefined): number | null {
    if (!sensor) {
      return null;
    }
    return finiteOrNull(findSensor(tree, sensor.identifier)?.value);
  }

  private buildMetrics(
    evaluation: CpuTempEvaluation,
    gpuUsagePercent: number | null,
    gpuTempC: number | null
  ): Readonly<HardwareMetrics> {
    const cpuTemp: CpuTempResult = Object.freeze({
      tempC: evaluation.reading.value,
      status: evaluation.status,
      hint: evaluation.hint,
      provider: 'native',
      source: evaluation.reading.source,
      details: evaluation.diagnostics,
    });
    return Object.freeze({ cpuTemp, gpuUsagePercent, gpuTempC });
  }
}
