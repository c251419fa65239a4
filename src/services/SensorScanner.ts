import { HardwareNode, SensorHandle } from '../types/sensors';
import { roundTo1, validTemperature, validTjMax } from '../utils/temperature';

/**
 * Sensor Scanner
 *
 * Pure selection logic over one read of the sensor tree. The hardware monitor
 * calls `scanSensors` on (re)scan and keeps the result until the next one; values
 * for the selected sensors are looked up by identifier on every tick.
 */

export interface CpuTempCandidate {
  sensor: SensorHandle;
  source: string;
}

export interface DistanceCandidate {
  sensor: SensorHandle;
  tjMax: number;
  source: string; // "<name> (TJMax <tjMax>C)"
}

export interface ScanResult {
  cpuTemp: CpuTempCandidate | null;
  distance: DistanceCandidate | null;
  sensorsFound: number;
  sensorsWithValue: number;
  gpuTemp: SensorHandle | null;
  gpuLoad: SensorHandle | null;
}

export const EMPTY_SCAN: Readonly<ScanResult> = Object.freeze({
  cpuTemp: null,
  distance: null,
  sensorsFound: 0,
  sensorsWithValue: 0,
  gpuTemp: null,
  gpuLoad: null,
});

function nameContains(sensor: SensorHandle, token: string): boolean {
  return sensor.name.toLowerCase().includes(token.toLowerCase());
}

/**
 * Sensors of a device and all of its sub-hardware, depth first.
 */
export function collectSensors(hardware: HardwareNode): SensorHandle[] {
  return [...hardware.sensors, ...hardware.subHardware.flatMap(collectSensors)];
}

export function findSensor(tree: readonly HardwareNode[], identifier: string): SensorHandle | null {
  for (const hardware of tree) {
    const match = collectSensors(hardware).find(sensor => sensor.identifier === identifier);
    if (match) {
      return match;
    }
  }
  return null;
}

export function isDistanceToTjMaxSensor(sensor: SensorHandle): boolean {
  return sensor.sensorCategory === 'Temperature' && nameContains(sensor, 'Distance') && nameContains(sensor, 'TJMax');
}

function pickHottestValid(sensors: readonly SensorHandle[]): SensorHandle | null {
  let best: SensorHandle | null = null;
  let bestValue = -Infinity;
  for (const sensor of sensors) {
    const value = validTemperature(sensor.value);
    if (value !== null && value > bestValue) {
      bestValue = value;
      best = sensor;
    }
  }
  return best;
}

/**
 * Primary CPU temperature candidate by name tier:
 *
 * 1. "Package"
 * 2. "Tctl" / "Tdie"
 * 3. "Core Max" / "CCD"  (hottest valid, else first)
 * 4. "Core"              (hottest valid, else first)
 * 5. anything            (hottest valid, else first)
 *
 * A higher tier wins even when its sensor currently has no value.
 */
export function pickPreferredCpuSensor(sensors: readonly SensorHandle[]): SensorHandle | null {
  if (sensors.length === 0) {
    return null;
  }

  const firstMatch = sensors.find(sensor => nameContains(sensor, 'Package'))
    ?? sensors.find(sensor => nameContains(sensor, 'Tctl') || nameContains(sensor, 'Tdie'));
  if (firstMatch) {
    return firstMatch;
  }

  const tiered: Array<(sensor: SensorHandle) => boolean> = [
    sensor => nameContains(sensor, 'Core Max') || nameContains(sensor, 'CCD'),
    sensor => nameContains(sensor, 'Core'),
  ];
  for (const matches of tiered) {
    const group = sensors.filter(matches);
    if (group.length > 0) {
      return pickHottestValid(group) ?? group[0];
    }
  }

  return pickHottestValid(sensors) ?? sensors[0];
}

export function readTjMax(sensor: SensorHandle): number | null {
  const key = Object.keys(sensor.parameters).find(name => name.toLowerCase().includes('tjmax'));
  return key === undefined ? null : validTjMax(sensor.parameters[key]);
}

export function formatTjMax(tjMax: number): string {
  return String(roundTo1(tjMax));
}

const DISTANCE_SUFFIX = /\s*distance to tjmax$/i;

/**
 * Ceiling implied by a distance sensor and the absolute sensor of the same name on
 * the same hardware ("CPU Core #1" / "CPU Core #1 Distance to TjMax"): absolute + distance.
 */
export function inferTjMax(distance: SensorHandle, sensors: readonly SensorHandle[]): number | null {
  const baseName = distance.name.replace(DISTANCE_SUFFIX, '').toLowerCase();
  if (baseName === distance.name.toLowerCase()) {
    return null;
  }

  const absolute = sensors.find(
    sensor =>
      sensor !== distance &&
      sensor.sensorCategory === 'Temperature' &&
      sensor.hardwareName === distance.hardwareName &&
      !isDistanceToTjMaxSensor(sensor) &&
      sensor.name.toLowerCase() === baseName
  );
  const absoluteValue = validTemperature(absolute?.value);
  if (absoluteValue === null || distance.value === null || !Number.isFinite(distance.value)) {
    return null;
  }
  return validTjMax(roundTo1(absoluteValue + distance.value));
}

function distanceCandidate(sensor: SensorHandle, tjMax: number): DistanceCandidate {
  return { sensor, tjMax, source: `${sensor.name} (TJMax ${formatTjMax(tjMax)}C)` };
}

/**
 * Distance-to-TjMax sensor with a usable ceiling. A "Core Max" sensor is preferred;
 * when it has no ceiling the first distance sensor that does is used. The ceiling
 * comes from a TJMax parameter, else from the paired absolute sensor.
 */
export function selectDistanceToTjMaxSensor(sensors: readonly SensorHandle[]): DistanceCandidate | null {
  const distanceSensors = sensors.filter(isDistanceToTjMaxSensor);
  if (distanceSensors.length === 0) {
    return null;
  }

  const ceilingOf = (sensor: SensorHandle): number | null => readTjMax(sensor) ?? inferTjMax(sensor, sensors);

  const preferred = distanceSensors.find(sensor => nameContains(sensor, 'Core Max')) ?? distanceSensors[0];
  const preferredTjMax = ceilingOf(preferred);
  if (preferredTjMax !== null) {
    return distanceCandidate(preferred, preferredTjMax);
  }

  for (const sensor of distanceSensors) {
    const tjMax = ceilingOf(sensor);
    if (tjMax !== null) {
      return distanceCandidate(sensor, tjMax);
    }
  }
  return null;
}

export function pickGpuTempSensor(hardware: HardwareNode): SensorHandle | null {
  const sensors = collectSensors(hardware).filter(sensor => sensor.sensorCategory === 'Temperature');
  return sensors.find(sensor => nameContains(sensor, 'GPU')) ?? sensors[0] ?? null;
}

export function pickGpuLoadSensor(hardware: HardwareNode): SensorHandle | null {
  const sensors = collectSensors(hardware).filter(sensor => sensor.sensorCategory === 'Load');
  for (const token of ['GPU Core', 'Core', 'GPU']) {
    const match = sensors.find(sensor => nameContains(sensor, token));
    if (match) {
      return match;
    }
  }
  return sensors[0] ?? null;
}

export function scanSensors(tree: readonly HardwareNode[]): ScanResult {
  const temperatureSensors = tree
    .filter(hardware => hardware.category === 'cpu' || hardware.category === 'motherboard')
    .flatMap(collectSensors)
    .filter(sensor => sensor.sensorCategory === 'Temperature');

  const primary = pickPreferredCpuSensor(temperatureSensors.filter(sensor => !isDistanceToTjMaxSensor(sensor)));

  let gpuTemp: SensorHandle | null = null;
  let gpuLoad: SensorHandle | null = null;
  for (const hardware of tree.filter(hw => hw.category === 'gpu')) {
    const temp = pickGpuTempSensor(hardware);
    const load = pickGpuLoadSensor(hardware);
    if (temp || load) {
      gpuTemp = temp;
      gpuLoad = load;
      break;
    }
  }

  return {
    cpuTemp: primary ? { sensor: primary, source: primary.name } : null,
    distance: selectDistanceToTjMaxSensor(temperatureSensors),
    sensorsFound: temperatureSensors.length,
    sensorsWithValue: temperatureSensors.filter(sensor => validTemperature(sensor.value) !== null).length,
    gpuTemp,
    gpuLoad,
  };
}

/**
 * A selection missing the CPU sensor or either GPU sensor is worth retrying.
 */
export function isSelectionIncomplete(scan: ScanResult): boolean {
  return scan.cpuTemp === null || scan.gpuTemp === null || scan.gpuLoad === null;
}
