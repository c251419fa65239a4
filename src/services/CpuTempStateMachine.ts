import { CpuTempDiagnostics, CpuTempReading, CpuTempStatus } from '../types/metrics';
import { roundTo1, validTemperature } from '../utils/temperature';
import { EMPTY_SCAN, ScanResult } from './SensorScanner';

export const CPU_TEMP_WARMUP_TICKS = 5;
export const CPU_TEMP_INVALID_THRESHOLD = 5;
export const CPU_TEMP_NO_VALUE_THRESHOLD = 10;

export const CPU_TEMP_WARMUP_HINT = 'Sensor value not available yet.';
export const CPU_TEMP_NO_VALUE_HINT = 'Sensor value not available yet. Try running as administrator.';

const NO_VALUES_SOURCE = 'CPU sensors present but no values';

export interface CpuTempEvaluation {
  reading: CpuTempReading;
  status: CpuTempStatus;
  hint: string | null;
  diagnostics: Readonly<CpuTempDiagnostics>;
}

/**
 * CPU Temperature State Machine
 *
 * Tracks validity of the selected CPU sensors across hardware ticks. Counters are
 * reset on every rescan except the last valid value, which is kept for diagnostics.
 *
 * Per tick: read value -> update invalid-tick counter -> update history -> status.
 */
export class CpuTempStateMachine {
  private selection: ScanResult = EMPTY_SCAN;
  private sensorsFound = 0;
  private sensorsWithValue = 0;
  private invalidTickCount = 0;
  private warmupTicksRemaining = CPU_TEMP_WARMUP_TICKS;
  private ticksSinceValid = 0;
  private lastValidCpuTempC: number | null = null;
  private lastPrimaryValue: number | null = null;
  private lastDistanceValue: number | null = null;

  constructor(private readonly isAdmin: boolean = false) {}

  /**
   * Consecutive invalid ticks since warm-up ended (only counted once a valid value
   * has been seen). Reaching CPU_TEMP_INVALID_THRESHOLD asks for a rescan.
   */
  public get invalidTicks(): number {
    return this.invalidTickCount;
  }

  public get needsRescan(): boolean {
    return this.invalidTickCount >= CPU_TEMP_INVALID_THRESHOLD;
  }

  public reset(scan: ScanResult): void {
    this.selection = scan;
    this.sensorsFound = scan.sensorsFound;
    this.sensorsWithValue = scan.sensorsWithValue;
    this.invalidTickCount = 0;
    this.warmupTicksRemaining = CPU_TEMP_WARMUP_TICKS;
    this.ticksSinceValid = 0;
    this.lastPrimaryValue = null;
    this.lastDistanceValue = null;
  }

  /**
   * Advance one tick with the current raw values of the selected primary and
   * distance-to-TjMax sensors (null when absent or not selected).
   */
  public evaluate(primaryValue: number | null, distanceValue: number | null): CpuTempEvaluation {
    const reading = this.readValue(primaryValue, distanceValue);
    this.updateInvalidTicks(reading.valid);
    this.updateHistory(reading);
    const { status, hint } = this.statusFor(reading);

    return {
      reading,
      status,
      hint,
      diagnostics: this.buildDiagnostics(hint),
    };
  }

  /**
   * Result published while the hardware backend cannot be opened.
   */
  public blocked(): CpuTempEvaluation {
    return {
      reading: { value: null, source: null, valid: false },
      status: 'no_sensors',
      hint: null,
      diagnostics: this.buildDiagnostics(null),
    };
  }

  private readValue(primaryValue: number | null, distanceValue: number | null): CpuTempReading {
    const { cpuTemp, distance } = this.selection;
    this.lastPrimaryValue = cpuTemp && primaryValue !== null && Number.isFinite(primaryValue) ? primaryValue : null;
    this.lastDistanceValue = distance && distanceValue !== null && Number.isFinite(distanceValue) ? distanceValue : null;

    const primary = cpuTemp ? validTemperature(this.lastPrimaryValue) : null;
    if (cpuTemp && primary !== null) {
      this.markSensorsPresent();
      return { value: roundTo1(primary), source: cpuTemp.source, valid: true };
    }

    if (distance && this.lastDistanceValue !== null) {
      const derived = validTemperature(distance.tjMax - this.lastDistanceValue);
      if (derived !== null) {
        this.markSensorsPresent();
        return { value: roundTo1(derived), source: distance.source, valid: true };
      }
    }

    if (this.sensorsFound > 0) {
      return {
        value: null,
        source: cpuTemp?.source ?? distance?.source ?? NO_VALUES_SOURCE,
        valid: false,
      };
    }

    return { value: null, source: null, valid: false };
  }

  // A valid reading proves at least one sensor exists even if the scan saw none
  private markSensorsPresent(): void {
    if (this.sensorsFound === 0) {
      this.sensorsFound = 1;
    }
    if (this.sensorsWithValue === 0) {
      this.sensorsWithValue = 1;
    }
  }

  private updateInvalidTicks(valid: boolean): void {
    if (this.selection.cpuTemp === null && this.selection.distance === null) {
      this.invalidTickCount = 0;
      return;
    }
    if (valid) {
      this.invalidTickCount = 0;
      return;
    }
    if (this.warmupTicksRemaining > 0 || this.lastValidCpuTempC === null) {
      return;
    }
    this.invalidTickCount++;
  }

  private updateHistory(reading: CpuTempReading): void {
    if (reading.valid && reading.value !== null) {
      this.ticksSinceValid = 0;
      this.lastValidCpuTempC = reading.value;
      this.warmupTicksRemaining = 0;
      return;
    }

    if (this.warmupTicksRemaining > 0) {
      this.warmupTicksRemaining--;
      return;
    }

    if (this.ticksSinceValid < Number.MAX_SAFE_INTEGER) {
      this.ticksSinceValid++;
    }
  }

  private statusFor(reading: CpuTempReading): { status: CpuTempStatus; hint: string | null } {
    if (reading.valid && reading.value !== null) {
      return { status: 'ok', hint: null };
    }
    if (this.sensorsFound <= 0) {
      return { status: 'no_sensors', hint: null };
    }
    if (this.warmupTicksRemaining > 0) {
      return { status: 'warming_up', hint: CPU_TEMP_WARMUP_HINT };
    }
    if (this.ticksSinceValid >= CPU_TEMP_NO_VALUE_THRESHOLD) {
      return { status: 'no_values', hint: CPU_TEMP_NO_VALUE_HINT };
    }
    return { status: 'warming_up', hint: CPU_TEMP_WARMUP_HINT };
  }

  private buildDiagnostics(hint: string | null): Readonly<CpuTempDiagnostics> {
    const { cpuTemp, distance } = this.selection;
    return Object.freeze({
      isAdmin: this.isAdmin,
      cpuTempSensorsFound: this.sensorsFound,
      cpuTempSensorsWithValue: this.sensorsWithValue,
      lastValidCpuTempC: this.lastValidCpuTempC,
      ticksSinceValid: this.ticksSinceValid,
      warmupTicksRemaining: this.warmupTicksRemaining,
      selectedSensorName: cpuTemp?.sensor.name ?? null,
      selectedSensorIdentifier: cpuTemp?.sensor.identifier ?? null,
      selectedSensorValue: this.lastPrimaryValue,
      derivedSensorName: distance?.sensor.name ?? null,
      derivedSensorIdentifier: distance?.sensor.identifier ?? null,
      derivedSensorValue: this.lastDistanceValue,
      derivedSensorTjMax: distance?.tjMax ?? null,
      hint,
    });
  }
}
