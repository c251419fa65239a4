import { CpuTempProviderKind } from '../../types/metrics';
import { CimQuery } from '../../hardware/thermalZones';
import { log } from '../../utils/logger';
import { CpuTempProvider } from './CpuTempProvider';
import { CpuTempResultSource, NativeCpuTempProvider } from './NativeCpuTempProvider';
import { ThermalZoneCpuTempProvider } from './ThermalZoneCpuTempProvider';
import { ExternalCpuTempProvider } from './ExternalCpuTempProvider';

export * from './CpuTempProvider';
export { NativeCpuTempProvider } from './NativeCpuTempProvider';
export { ThermalZoneCpuTempProvider, THERMAL_ZONE_HINT } from './ThermalZoneCpuTempProvider';
export { ExternalCpuTempProvider, EXTERNAL_PROVIDER_HINT } from './ExternalCpuTempProvider';

export interface CpuTempProviderDeps {
  hardwareMonitor: CpuTempResultSource;
  hardwareIntervalMs: number;
  thermalQuery?: CimQuery;
}

export function createCpuTempProvider(kind: CpuTempProviderKind, deps: CpuTempProviderDeps): CpuTempProvider {
  log.info(`CPU temperature provider: ${kind}`, 'CpuTempProvider');

  switch (kind) {
    case 'native':
      return new NativeCpuTempProvider(deps.hardwareMonitor);
    case 'thermal_zone':
      return new ThermalZoneCpuTempProvider({ cacheMs: deps.hardwareIntervalMs, query: deps.thermalQuery });
    case 'external':
      return new ExternalCpuTempProvider();
  }
}
