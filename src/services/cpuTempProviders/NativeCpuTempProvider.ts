import { CpuTempResult } from '../../types/metrics';
import { HardwareMonitor } from '../HardwareMonitor';
import { CpuTempProvider } from './CpuTempProvider';

export type CpuTempResultSource = Pick<HardwareMonitor, 'getLatestCpuTempResult'>;

/**
 * Hands out the hardware monitor's latest result, including the source label,
 * the derived distance-to-TjMax path and the diagnostics.
 */
export class NativeCpuTempProvider implements CpuTempProvider {
  public readonly kind = 'native' as const;

  constructor(private readonly monitor: CpuTempResultSource) {}

  public async getTemperature(): Promise<CpuTempResult> {
    return { ...this.monitor.getLatestCpuTempResult() };
  }
}
