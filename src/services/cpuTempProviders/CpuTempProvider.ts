import { CpuTempProviderKind, CpuTempResult, CpuTempStatus } from '../../types/metrics';

/**
 * Interchangeable source of the CPU temperature. Selected once at startup;
 * providers never fall back to each other.
 */
export interface CpuTempProvider {
  readonly kind: CpuTempProviderKind;
  /**
   * Latest result for this provider. Never rejects.
   */
  getTemperature(): Promise<CpuTempResult>;
}

// Status reported when a provider produces nothing usable
export const UNAVAILABLE_STATUS: Record<CpuTempProviderKind, CpuTempStatus> = {
  native: 'no_values',
  thermal_zone: 'wmi_approx',
  external: 'external_not_configured',
};

export function unavailableResult(kind: CpuTempProviderKind, hint: string | null = null): CpuTempResult {
  return {
    tempC: null,
    status: UNAVAILABLE_STATUS[kind],
    hint,
    provider: kind,
    source: null,
    details: null,
  };
}
