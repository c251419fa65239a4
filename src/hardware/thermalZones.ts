import { execFile } from 'child_process';
import { promisify } from 'util';
import { SensorSnapshot } from '../types/sensors';
import { convertRawTemperature, formatRawValue, roundTo1 } from '../utils/temperature';
import { log } from '../utils/logger';

const execFileAsync = promisify(execFile);

export type CimRow = Record<string, unknown>;

/**
 * Runs one CIM class query and returns its rows with the requested properties.
 * Rejects when the query cannot run at all (non-Windows host, missing class, ...).
 */
export type CimQuery = (namespace: string, className: string, properties: readonly string[]) => Promise<CimRow[]>;

const CIM_QUERY_TIMEOUT_MS = 10000;

/**
 * ConvertTo-Json emits a bare object for a single result and nothing at all for none.
 */
export function parseCimJson(stdout: string): CimRow[] {
  const text = stdout.trim();
  if (!text) {
    return [];
  }

  const parsed: unknown = JSON.parse(text);
  const rows = Array.isArray(parsed) ? parsed : [parsed];
  return rows.filter((row): row is CimRow => typeof row === 'object' && row !== null && !Array.isArray(row));
}

export const powershellCimQuery: CimQuery = async (namespace, className, properties) => {
  if (process.platform !== 'win32') {
    throw new Error('CIM queries are only available on Windows');
  }

  const command =
    `Get-CimInstance -Namespace ${namespace} -ClassName ${className} -ErrorAction Stop` +
    ` | Select-Object ${properties.join(',')} | ConvertTo-Json -Compress`;

  const { stdout } = await execFileAsync('powershell', ['-NoProfile', '-NonInteractive', '-Command', command], {
    timeout: CIM_QUERY_TIMEOUT_MS,
    windowsHide: true,
  });
  return parseCimJson(stdout);
};

/**
 * Hottest ACPI thermal zone in °C (1 decimal), or null when no zone reports a
 * usable value. Query failures propagate.
 */
export async function readMaxThermalZoneC(query: CimQuery): Promise<number | null> {
  const rows = await query('root/WMI', 'MSAcpi_ThermalZoneTemperature', ['CurrentTemperature', 'InstanceName']);

  let max: number | null = null;
  for (const row of rows) {
    const celsius = convertRawTemperature(row.CurrentTemperature);
    if (celsius !== null && (max === null || celsius > max)) {
      max = celsius;
    }
  }

  return max === null ? null : roundTo1(max);
}

interface ThermalSource {
  namespace: string;
  className: string;
  hardwareName: string;
  valueProperty: string;
  nameProperties: string[];
  defaultName: string;
}

const THERMAL_SOURCES: ThermalSource[] = [
  {
    namespace: 'root/WMI',
    className: 'MSAcpi_ThermalZoneTemperature',
    hardwareName: 'WMI Thermal Zone',
    valueProperty: 'CurrentTemperature',
    nameProperties: ['InstanceName'],
    defaultName: 'Thermal Zone',
  },
  {
    namespace: 'root/CIMV2',
    className: 'Win32_PerfFormattedData_Counters_ThermalZoneInformation',
    hardwareName: 'WMI Thermal Zone Info',
    valueProperty: 'Temperature',
    nameProperties: ['InstanceName', 'Name'],
    defaultName: 'Thermal Zone Info',
  },
  {
    namespace: 'root/CIMV2',
    className: 'Win32_TemperatureProbe',
    hardwareName: 'WMI Temperature Probe',
    valueProperty: 'CurrentReading',
    nameProperties: ['Name', 'Description'],
    defaultName: 'Temperature Probe',
  },
];

function rowName(row: CimRow, source: ThermalSource): string {
  for (const property of source.nameProperties) {
    const value = row[property];
    if (typeof value === 'string' && value.trim() !== '') {
      return value;
    }
  }
  return source.defaultName;
}

/**
 * Debug rows for every OS thermal source. Each source is queried independently;
 * one that fails is left out.
 */
export async function readThermalSensorSnapshots(query: CimQuery): Promise<SensorSnapshot[]> {
  const snapshots: SensorSnapshot[] = [];

  for (const source of THERMAL_SOURCES) {
    let rows: CimRow[];
    try {
      rows = await query(source.namespace, source.className, [source.valueProperty, ...source.nameProperties]);
    } catch (error) {
      log.debug(`Skipping ${source.className}: ${error instanceof Error ? error.message : String(error)}`, 'ThermalZones');
      continue;
    }

    for (const row of rows) {
      const celsius = convertRawTemperature(row[source.valueProperty]);
      if (celsius === null) {
        continue;
      }

      const name = rowName(row, source);
      snapshots.push({
        hardwareName: source.hardwareName,
        hardwareType: 'Wmi',
        sensorName: name,
        sensorType: 'Temperature',
        value: roundTo1(celsius),
        hasValue: true,
        rawValue: formatRawValue(celsius),
        identifier: `${source.className}/${name}`,
      });
    }
  }

  return snapshots;
}
