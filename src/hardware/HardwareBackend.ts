import { HardwareNode } from '../types/sensors';

/**
 * Source of the hardware sensor tree.
 *
 * `open()` rejects when the backend cannot be reached; callers retry it on their
 * own schedule. `read()` returns a fresh tree each call, so handles from an
 * earlier read are never updated in place.
 */
export interface HardwareBackend {
  readonly name: string;
  open(): Promise<void>;
  read(): Promise<HardwareNode[]>;
  close(): Promise<void>;
  /**
   * Ask the backend to start producing values for a device's sensors.
   * Backends without such a capability leave this undefined.
   */
  activateSensors?(hardware: HardwareNode): Promise<void>;
}
