import { describe, expect, it } from 'vitest';
import { HardwareCategory, HardwareNode, SensorCategory, SensorHandle } from '../types/sensors';
import {
  findSensor,
  isSelectionIncomplete,
  pickGpuLoadSensor,
  pickGpuTempSensor,
  pickPreferredCpuSensor,
  scanSensors,
  selectDistanceToTjMaxSensor,
} from './SensorScanner';

function sensor(
  name: string,
  value: number | null,
  overrides: Partial<SensorHandle> = {}
): SensorHandle {
  const sensorCategory: SensorCategory = overrides.sensorCategory ?? 'Temperature';
  return {
    identifier: `/test/${sensorCategory.toLowerCase()}/${name}`,
    name,
    hardwareName: 'Test CPU',
    hardwareCategory: 'cpu',
    sensorCategory,
    value,
    rawValue: value === null ? null : `${value} °C`,
    parameters: {},
    ...overrides,
  };
}

function hardware(
  name: string,
  category: HardwareCategory,
  sensors: SensorHandle[],
  subHardware: HardwareNode[] = []
): HardwareNode {
  return { identifier: `/${name}`, name, category, sensors, subHardware };
}

describe('pickPreferredCpuSensor', () => {
  it('prefers a Package sensor even without a value', () => {
    const sensors = [sensor('Core #1', 55), sensor('CPU Package', null)];
    expect(pickPreferredCpuSensor(sensors)?.name).toBe('CPU Package');
  });

  it('prefers Tctl/Tdie over core sensors', () => {
    const sensors = [sensor('Core #1', 70), sensor('Core (Tctl/Tdie)', 48)];
    expect(pickPreferredCpuSensor(sensors)?.name).toBe('Core (Tctl/Tdie)');
  });

  it('takes the hottest valid Core Max/CCD sensor', () => {
    const sensors = [sensor('Core #0', 90), sensor('CCD1', 51), sensor('CCD2', 63)];
    expect(pickPreferredCpuSensor(sensors)?.name).toBe('CCD2');
  });

  it('takes the hottest valid core sensor, or the first one when none is valid', () => {
    expect(pickPreferredCpuSensor([sensor('Core #0', 50), sensor('Core #1', 61), sensor('Core #2', 130)])?.name).toBe(
      'Core #1'
    );
    expect(pickPreferredCpuSensor([sensor('Core #0', null), sensor('Core #1', null)])?.name).toBe('Core #0');
  });

  it('falls back to the hottest valid sensor of any name', () => {
    const sensors = [sensor('Temperature #1', 40), sensor('Temperature #2', 44), sensor('System', null)];
    expect(pickPreferredCpuSensor(sensors)?.name).toBe('Temperature #2');
  });

  it('returns null for an empty list', () => {
    expect(pickPreferredCpuSensor([])).toBeNull();
  });
});

describe('selectDistanceToTjMaxSensor', () => {
  it('prefers the Core Max distance sensor with a valid ceiling', () => {
    const sensors = [
      sensor('Core #0 Distance to TjMax', 40, { parameters: { TJMax: 100 } }),
      sensor('Core Max Distance to TjMax', 35, { parameters: { TJMax: 100 } }),
    ];

    const selected = selectDistanceToTjMaxSensor(sensors);
    expect(selected?.sensor.name).toBe('Core Max Distance to TjMax');
    expect(selected?.tjMax).toBe(100);
    expect(selected?.source).toBe('Core Max Distance to TjMax (TJMax 100C)');
  });

  it('uses the first distance sensor with a ceiling when the preferred one has none', () => {
    const sensors = [
      sensor('Core Max Distance to TjMax', 35, { parameters: { TJMax: 200 } }),
      sensor('Core #3 Distance to TjMax', 30, { parameters: { 'TjMax Temperature': 96.5 } }),
    ];

    const selected = selectDistanceToTjMaxSensor(sensors);
    expect(selected?.sensor.name).toBe('Core #3 Distance to TjMax');
    expect(selected?.source).toBe('Core #3 Distance to TjMax (TJMax 96.5C)');
  });

  it('returns null when no distance sensor has a ceiling', () => {
    expect(selectDistanceToTjMaxSensor([sensor('Core Max Distance to TjMax', 35)])).toBeNull();
  });

  it('infers the ceiling from the absolute sensor of the same name', () => {
    const sensors = [sensor('CPU Core #1', 62), sensor('CPU Core #1 Distance to TjMax', 38)];

    const selected = selectDistanceToTjMaxSensor(sensors);
    expect(selected?.sensor.name).toBe('CPU Core #1 Distance to TjMax');
    expect(selected?.tjMax).toBe(100);
    expect(selected?.source).toBe('CPU Core #1 Distance to TjMax (TJMax 100C)');
  });

  it('prefers a TJMax parameter over the inferred ceiling', () => {
    const sensors = [
      sensor('CPU Core #1', 62),
      sensor('CPU Core #1 Distance to TjMax', 38, { parameters: { TJMax: 105 } }),
    ];
    expect(selectDistanceToTjMaxSensor(sensors)?.tjMax).toBe(105);
  });

  it('does not pair sensors across hardware or accept an out-of-range ceiling', () => {
    expect(
      selectDistanceToTjMaxSensor([
        sensor('CPU Core #1', 62, { hardwareName: 'Other CPU' }),
        sensor('CPU Core #1 Distance to TjMax', 38),
      ])
    ).toBeNull();
    expect(
      selectDistanceToTjMaxSensor([sensor('CPU Core #1', 100), sensor('CPU Core #1 Distance to TjMax', 50)])
    ).toBeNull();
  });

  it('does not infer a ceiling while the absolute sensor has no value', () => {
    expect(selectDistanceToTjMaxSensor([sensor('CPU Core #1', null), sensor('CPU Core #1 Distance to TjMax', 38)])).toBeNull();
  });
});

describe('GPU sensor selection', () => {
  const gpu = hardware('gpu-nvidia/0', 'gpu', [
    sensor('Hot Spot', 70, { hardwareCategory: 'gpu' }),
    sensor('GPU Core', 61, { hardwareCategory: 'gpu' }),
    sensor('GPU Memory', 20, { hardwareCategory: 'gpu', sensorCategory: 'Load' }),
    sensor('GPU Core', 33, { hardwareCategory: 'gpu', sensorCategory: 'Load' }),
  ]);

  it('picks the first temperature sensor named GPU', () => {
    expect(pickGpuTempSensor(gpu)?.value).toBe(61);
  });

  it('picks the GPU Core load sensor', () => {
    expect(pickGpuLoadSensor(gpu)?.value).toBe(33);
  });

  it('falls back to the first sensor of each category', () => {
    const plain = hardware('gpu-intel/0', 'gpu', [
      sensor('Package', 45, { hardwareCategory: 'gpu' }),
      sensor('D3D 3D', 7, { hardwareCategory: 'gpu', sensorCategory: 'Load' }),
    ]);
    expect(pickGpuTempSensor(plain)?.name).toBe('Package');
    expect(pickGpuLoadSensor(plain)?.name).toBe('D3D 3D');
  });
});

describe('scanSensors', () => {
  const tree: HardwareNode[] = [
    hardware('amdcpu/0', 'cpu', [
      sensor('Core (Tctl/Tdie)', 48),
      sensor('CPU Total', 12, { sensorCategory: 'Load' }),
    ]),
    hardware('motherboard', 'motherboard', [], [
      hardware('lpc/nct6798d/0', 'motherboard', [sensor('CPU', null), sensor('System', 31)]),
    ]),
    hardware('gpu-nvidia/0', 'gpu', [
      sensor('GPU Core', 52, { hardwareCategory: 'gpu' }),
      sensor('GPU Core', 9, { hardwareCategory: 'gpu', sensorCategory: 'Load' }),
    ]),
  ];

  it('counts temperature sensors of CPU and motherboard hardware', () => {
    const scan = scanSensors(tree);
    expect(scan.sensorsFound).toBe(3);
    expect(scan.sensorsWithValue).toBe(2);
    expect(scan.cpuTemp?.sensor.name).toBe('Core (Tctl/Tdie)');
    expect(scan.cpuTemp?.source).toBe('Core (Tctl/Tdie)');
    expect(scan.gpuTemp?.value).toBe(52);
    expect(scan.gpuLoad?.value).toBe(9);
    expect(scan.distance).toBeNull();
    expect(isSelectionIncomplete(scan)).toBe(false);
  });

  it('never selects a distance sensor as the primary candidate', () => {
    const scan = scanSensors([
      hardware('intelcpu/0', 'cpu', [
        sensor('Core Max Distance to TjMax', 35, { parameters: { TJMax: 100 } }),
      ]),
    ]);
    expect(scan.sensorsFound).toBe(1);
    expect(scan.cpuTemp).toBeNull();
    expect(scan.distance?.tjMax).toBe(100);
    expect(isSelectionIncomplete(scan)).toBe(true);
  });

  it('finds nothing in an empty tree', () => {
    const scan = scanSensors([]);
    expect(scan.sensorsFound).toBe(0);
    expect(scan.cpuTemp).toBeNull();
    expect(scan.gpuTemp).toBeNull();
  });

  it('looks sensors up by identifier, including sub-hardware', () => {
    expect(findSensor(tree, '/test/temperature/System')?.value).toBe(31);
    expect(findSensor(tree, '/missing')).toBeNull();
  });
});
