// Hardware sensor tree type definitions

export type HardwareCategory = 'cpu' | 'gpu' | 'motherboard' | 'other';

/**
 * Sensor kinds as the hardware backend names them.
 */
export type SensorCategory =
  | 'Temperature'
  | 'Load'
  | 'Voltage'
  | 'Current'
  | 'Power'
  | 'Clock'
  | 'Frequency'
  | 'Fan'
  | 'Flow'
  | 'Control'
  | 'Level'
  | 'Factor'
  | 'Data'
  | 'SmallData'
  | 'Throughput'
  | 'TimeSpan'
  | 'Energy'
  | 'Noise'
  | 'Unknown';

/**
 * Immutable description of one hardware-exposed measurement point,
 * captured from a single read of the sensor tree.
 */
export interface SensorHandle {
  readonly identifier: string;
  readonly name: string;
  readonly hardwareName: string;
  readonly hardwareCategory: HardwareCategory;
  readonly sensorCategory: SensorCategory;
  readonly value: number | null; // null when the backend reports no reading
  readonly rawValue: string | null; // reading as the backend formatted it
  readonly parameters: Readonly<Record<string, number>>; // e.g. { 'TJMax': 100 }
}

export interface HardwareNode {
  readonly identifier: string;
  readonly name: string;
  readonly category: HardwareCategory;
  readonly sensors: readonly SensorHandle[];
  readonly subHardware: readonly HardwareNode[];
}

/**
 * Row of the /api/sensors debug listing
 */
export interface SensorSnapshot {
  hardwareName: string;
  hardwareType: string;
  sensorName: string;
  sensorType: string;
  value: number | null;
  hasValue: boolean;
  rawValue: string | null;
  identifier: string | null;
}
