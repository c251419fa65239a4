import { CpuTempResult } from '../../types/metrics';
import { CpuTempProvider, unavailableResult } from './CpuTempProvider';

export const EXTERNAL_PROVIDER_HINT =
  'Configure an external provider (e.g. a shared-memory sensor feed) in a later phase.';

/**
 * Placeholder for an out-of-process sensor feed. Always reports that it is not configured.
 */
export class ExternalCpuTempProvider implements CpuTempProvider {
  public readonly kind = 'external' as const;

  public async getTemperature(): Promise<CpuTempResult> {
    return unavailableResult('external', EXTERNAL_PROVIDER_HINT);
  }
}
