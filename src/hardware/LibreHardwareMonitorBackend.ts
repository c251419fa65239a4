import axios, { AxiosInstance } from 'axios';
import { HardwareBackend } from './HardwareBackend';
import { HardwareCategory, HardwareNode, SensorCategory, SensorHandle } from '../types/sensors';
import { log } from '../utils/logger';

/**
 * LibreHardwareMonitor backend
 *
 * Reads the sensor tree served by LibreHardwareMonitor's remote web server
 * (Options > Remote Web Server, `/data.json`). The JSON is a generic node tree:
 *
 *   { Text, Children, ImageURL?, HardwareId?, SensorId?, Type?, Value? }
 *
 * Hardware nodes carry a HardwareId, sensor nodes a SensorId, and grouping nodes
 * ("Temperatures", "Load", ...) carry neither. Older releases omit the ids, in which
 * case hardware is recognised by its icon and sensors by their Value field.
 */

const SENSOR_CATEGORIES: Record<string, SensorCategory> = {
  temperature: 'Temperature',
  load: 'Load',
  voltage: 'Voltage',
  current: 'Current',
  power: 'Power',
  clock: 'Clock',
  frequency: 'Frequency',
  fan: 'Fan',
  flow: 'Flow',
  control: 'Control',
  level: 'Level',
  factor: 'Factor',
  data: 'Data',
  smalldata: 'SmallData',
  throughput: 'Throughput',
  timespan: 'TimeSpan',
  energy: 'Energy',
  noise: 'Noise',
};

const HARDWARE_ICONS: Record<string, HardwareCategory> = {
  'cpu.png': 'cpu',
  'nvidia.png': 'gpu',
  'ati.png': 'gpu',
  'amd.png': 'gpu',
  'intel.png': 'gpu',
  'mainboard.png': 'motherboard',
  'chip.png': 'motherboard',
  'ram.png': 'other',
  'hdd.png': 'other',
  'nic.png': 'other',
  'battery.png': 'other',
};

type JsonNode = Record<string, unknown>;

function isJsonNode(value: unknown): value is JsonNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(node: JsonNode, key: string): string | null {
  const value = node[key];
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

function children(node: JsonNode): JsonNode[] {
  const value = node.Children;
  return Array.isArray(value) ? value.filter(isJsonNode) : [];
}

/**
 * Parse a formatted reading such as "45.3 °C", "12,5 %" or "1200 RPM".
 * Returns null for "-", empty text or anything without a number.
 */
export function parseSensorValue(raw: string | null): number | null {
  if (raw === null) {
    return null;
  }
  const match = raw.match(/-?\d+(?:[.,]\d+)?/);
  if (!match) {
    return null;
  }
  const value = Number(match[0].replace(',', '.'));
  return Number.isFinite(value) ? value : null;
}

export function categorizeHardware(hardwareId: string | null, imageUrl: string | null): HardwareCategory | null {
  if (hardwareId) {
    const id = hardwareId.toLowerCase();
    if (id.startsWith('/amdcpu') || id.startsWith('/intelcpu') || id.startsWith('/cpu')) return 'cpu';
    if (id.startsWith('/gpu')) return 'gpu';
    if (id.startsWith('/lpc') || id.startsWith('/motherboard') || id.startsWith('/mainboard')) return 'motherboard';
    return 'other';
  }

  if (imageUrl) {
    const icon = imageUrl.toLowerCase().split('/').pop() ?? '';
    return HARDWARE_ICONS[icon] ?? null;
  }

  return null;
}

function sensorCategoryFrom(type: string | null, sensorId: string | null, groupName: string | null): SensorCategory {
  if (type && SENSOR_CATEGORIES[type.toLowerCase()]) {
    return SENSOR_CATEGORIES[type.toLowerCase()];
  }

  // "/amdcpu/0/temperature/2"
  const segment = sensorId?.split('/').filter(Boolean).slice(-2, -1)[0];
  if (segment && SENSOR_CATEGORIES[segment.toLowerCase()]) {
    return SENSOR_CATEGORIES[segment.toLowerCase()];
  }

  if (groupName) {
    const group = groupName.toLowerCase().replace(/\s+/g, '');
    const singular = group.endsWith('s') ? group.slice(0, -1) : group;
    return SENSOR_CATEGORIES[group] ?? SENSOR_CATEGORIES[singular] ?? 'Unknown';
  }

  return 'Unknown';
}

interface HardwareScope {
  identifier: string;
  name: string;
  category: HardwareCategory;
}

interface HardwareBuilder extends HardwareScope {
  sensors: SensorHandle[];
  subHardware: HardwareBuilder[];
}

function freezeHardware(builder: HardwareBuilder): HardwareNode {
  return Object.freeze({
    identifier: builder.identifier,
    name: builder.name,
    category: builder.category,
    sensors: Object.freeze([...builder.sensors]),
    subHardware: Object.freeze(builder.subHardware.map(freezeHardware)),
  });
}

function isSensorNode(node: JsonNode): boolean {
  return stringField(node, 'SensorId') !== null || (children(node).length === 0 && stringField(node, 'Value') !== null);
}

/**
 * Convert a `data.json` document into hardware nodes. Anything that does not look
 * like the expected tree yields an empty list.
 */
export function parseSensorTree(json: unknown): HardwareNode[] {
  if (!isJsonNode(json)) {
    return [];
  }

  const roots: HardwareBuilder[] = [];

  const visit = (node: JsonNode, owner: HardwareBuilder | null, groupName: string | null, path: string): void => {
    const text = stringField(node, 'Text') ?? '';

    if (owner && isSensorNode(node)) {
      const rawValue = stringField(node, 'Value');
      const sensorId = stringField(node, 'SensorId');
      const sensor: SensorHandle = Object.freeze({
        identifier: sensorId ?? `${owner.identifier}/${groupName ?? 'sensor'}/${text}`,
        name: text,
        hardwareName: owner.name,
        hardwareCategory: owner.category,
        sensorCategory: sensorCategoryFrom(stringField(node, 'Type'), sensorId, groupName),
        value: parseSensorValue(rawValue),
        rawValue,
        parameters: Object.freeze({}),
      });
      owner.sensors.push(sensor);
      return;
    }

    const hardwareId = stringField(node, 'HardwareId');
    const category = categorizeHardware(hardwareId, stringField(node, 'ImageURL'));

    if (category !== null) {
      const hardware: HardwareBuilder = {
        identifier: hardwareId ?? `${path}/${text}`,
        name: text,
        // Super-I/O chips and other sub-devices report under their parent's category
        category: owner ? owner.category : category,
        sensors: [],
        subHardware: [],
      };
      if (owner) {
        owner.subHardware.push(hardware);
      } else {
        roots.push(hardware);
      }
      for (const child of children(node)) {
        visit(child, hardware, null, hardware.identifier);
      }
      return;
    }

    for (const child of children(node)) {
      visit(child, owner, owner ? text : null, `${path}/${text}`);
    }
  };

  visit(json, null, null, '');
  return roots.map(freezeHardware);
}

export class LibreHardwareMonitorBackend implements HardwareBackend {
  public readonly name = 'LibreHardwareMonitor';
  private readonly client: AxiosInstance;

  constructor(private readonly url: string, timeoutMs: number) {
    this.client = axios.create({
      baseURL: url,
      timeout: timeoutMs,
      headers: { Accept: 'application/json' },
    });
  }

  public async open(): Promise<void> {
    try {
      await this.client.get('');
      log.info(`Connected to hardware backend at ${this.url}`, 'LibreHardwareMonitorBackend');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Hardware backend unavailable at ${this.url}: ${message}`);
    }
  }

  public async read(): Promise<HardwareNode[]> {
    const response = await this.client.get<unknown>('');
    return parseSensorTree(response.data);
  }

  public async close(): Promise<void> {
    // Stateless HTTP client; nothing to release
  }
}
