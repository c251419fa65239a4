import { CpuTempResult } from '../../types/metrics';
import { CimQuery, powershellCimQuery, readMaxThermalZoneC } from '../../hardware/thermalZones';
import { log } from '../../utils/logger';
import { CpuTempProvider, unavailableResult } from './CpuTempProvider';

export const THERMAL_ZONE_HINT = 'Thermal zone readings are often inaccurate; use only as a last resort.';

export interface ThermalZoneProviderOptions {
  cacheMs: number;
  query?: CimQuery;
  now?: () => number;
}

/**
 * ACPI thermal zone temperature (hottest zone). Results are cached for `cacheMs`,
 * normally the hardware poll interval, since each query spawns PowerShell.
 */
export class ThermalZoneCpuTempProvider implements CpuTempProvider {
  public readonly kind = 'thermal_zone' as const;

  private readonly query: CimQuery;
  private readonly now: () => number;
  private cached: CpuTempResult = unavailableResult('thermal_zone', THERMAL_ZONE_HINT);
  private lastReadAt: number | null = null;
  private pending: Promise<CpuTempResult> | null = null;

  constructor(private readonly options: ThermalZoneProviderOptions) {
    this.query = options.query ?? powershellCimQuery;
    this.now = options.now ?? Date.now;
  }

  public async getTemperature(): Promise<CpuTempResult> {
    if (this.pending) {
      return this.pending;
    }
    const now = this.now();
    if (this.lastReadAt !== null && now - this.lastReadAt < this.options.cacheMs) {
      return this.cached;
    }

    this.lastReadAt = now;
    this.pending = this.read().finally(() => {
      this.pending = null;
    });
    this.cached = await this.pending;
    return this.cached;
  }

  private async read(): Promise<CpuTempResult> {
    let tempC: number | null = null;
    try {
      tempC = await readMaxThermalZoneC(this.query);
    } catch (error) {
      log.debug(`Thermal zone query failed: ${error instanceof Error ? error.message : String(error)}`, 'ThermalZoneCpuTempProvider');
    }
    return { ...unavailableResult('thermal_zone', THERMAL_ZONE_HINT), tempC };
  }
}
