import { describe, expect, it, vi } from 'vitest';
import { HardwareBackend } from '../hardware/HardwareBackend';
import { CimQuery } from '../hardware/thermalZones';
import { HardwareNode, SensorHandle } from '../types/sensors';
import { HardwareMonitor, RESCAN_INTERVAL_MS } from './HardwareMonitor';

function sensor(identifier: string, name: string, value: number | null, category: SensorHandle['sensorCategory'] = 'Temperature'): SensorHandle {
  return {
    identifier,
    name,
    hardwareName: 'Test',
    hardwareCategory: 'cpu',
    sensorCategory: category,
    value,
    rawValue: value === null ? null : `${value}`,
    parameters: {},
  };
}

function buildTree(cpuPackage: number | null): HardwareNode[] {
  return [
    {
      identifier: '/intelcpu/0',
      name: 'Test CPU',
      category: 'cpu',
      sensors: [sensor('/intelcpu/0/temperature/0', 'CPU Package', cpuPackage)],
      subHardware: [],
    },
    {
      identifier: '/gpu-nvidia/0',
      name: 'Test GPU',
      category: 'gpu',
      sensors: [
        sensor('/gpu-nvidia/0/temperature/0', 'GPU Core', 58.04),
        sensor('/gpu-nvidia/0/load/0', 'GPU Core', 17, 'Load'),
      ],
      subHardware: [],
    },
    {
      identifier: '/ram',
      name: 'Generic Memory',
      category: 'other',
      sensors: [sensor('/ram/load/0', 'Memory', 40, 'Load')],
      subHardware: [],
    },
  ];
}

class FakeBackend implements HardwareBackend {
  public readonly name = 'FakeBackend';
  public available = true;
  public tree: HardwareNode[] = buildTree(50);

  public open = vi.fn(async () => {
    if (!this.available) {
      throw new Error('backend not running');
    }
  });
  public read = vi.fn(async () => this.tree);
  public close = vi.fn(async () => undefined);
  public activateSensors = vi.fn(async (_hardware: HardwareNode) => undefined);
}

const noThermalZones: CimQuery = async () => {
  throw new Error('CIM queries are only available on Windows');
};

function createMonitor(backend: HardwareBackend, clock: { now: number }): HardwareMonitor {
  return new HardwareMonitor(backend, {
    intervalMs: 60_000,
    thermalQuery: noThermalZones,
    now: () => clock.now,
  });
}

describe('HardwareMonitor', () => {
  it('publishes no_sensors while the backend cannot be opened and recovers once it can', async () => {
    const backend = new FakeBackend();
    backend.available = false;
    const monitor = createMonitor(backend, { now: 0 });

    await monitor.tick();
    const blocked = monitor.getLatestCpuTempResult();
    expect(blocked.status).toBe('no_sensors');
    expect(blocked.tempC).toBeNull();
    expect(blocked.hint).toBeNull();
    expect(blocked.provider).toBe('native');
    expect(blocked.details?.cpuTempSensorsFound).toBe(0);
    expect(backend.read).not.toHaveBeenCalled();

    backend.available = true;
    await monitor.tick();

    expect(backend.open).toHaveBeenCalledTimes(2);
    expect(monitor.getLatestCpuTempResult().status).toBe('ok');
    expect(monitor.getLatestCpuTempResult().tempC).toBe(50);
  });

  it('merges GPU readings into the hardware metrics', async () => {
    const monitor = createMonitor(new FakeBackend(), { now: 0 });
    await monitor.tick();

    const metrics = monitor.getLatestMetrics();
    expect(metrics.gpuTempC).toBe(58);
    expect(metrics.gpuUsagePercent).toBe(17);
    expect(metrics.cpuTemp.source).toBe('CPU Package');
    expect(Object.isFrozen(metrics)).toBe(true);
  });

  it('rescans after five invalid ticks once a value has been seen', async () => {
    const backend = new FakeBackend();
    const monitor = createMonitor(backend, { now: 0 });

    await monitor.tick();
    expect(backend.activateSensors).toHaveBeenCalledTimes(1);
    expect(backend.activateSensors).toHaveBeenCalledWith(backend.tree[0]);

    backend.tree = buildTree(null);
    for (let i = 0; i < 5; i++) {
      await monitor.tick();
    }
    expect(backend.activateSensors).toHaveBeenCalledTimes(1);
    expect(monitor.getCpuTempDebugSnapshot().details?.lastValidCpuTempC).toBe(50);

    await monitor.tick();
    expect(backend.activateSensors).toHaveBeenCalledTimes(2);

    const snapshot = monitor.getCpuTempDebugSnapshot();
    expect(snapshot.status).toBe('warming_up');
    expect(snapshot.source).toBe('CPU Package');
    expect(snapshot.details?.warmupTicksRemaining).toBe(4);
  });

  it('keeps the Package sensor selected while it has no value even if a core sensor does', async () => {
    const backend = new FakeBackend();
    const [cpu, ...rest] = buildTree(null);
    backend.tree = [{ ...cpu, sensors: [...cpu.sensors, sensor('/intelcpu/0/temperature/1', 'Core #1', 47)] }, ...rest];
    const monitor = createMonitor(backend, { now: 0 });

    await monitor.tick();

    const result = monitor.getLatestCpuTempResult();
    expect(result.tempC).toBeNull();
    expect(result.status).toBe('warming_up');
    expect(result.source).toBe('CPU Package');

    const snapshot = monitor.getCpuTempDebugSnapshot();
    expect(snapshot.details?.selectedSensorName).toBe('CPU Package');
    expect(snapshot.details?.cpuTempSensorsWithValue).toBe(1);
  });

  it('rescans every 30 seconds', async () => {
    const backend = new FakeBackend();
    const clock = { now: 1_000 };
    const monitor = createMonitor(backend, clock);

    await monitor.tick();
    clock.now += RESCAN_INTERVAL_MS - 1;
    await monitor.tick();
    expect(backend.activateSensors).toHaveBeenCalledTimes(1);

    clock.now += 1;
    await monitor.tick();
    expect(backend.activateSensors).toHaveBeenCalledTimes(2);
  });

  it('reopens the backend after a failed read', async () => {
    const backend = new FakeBackend();
    const monitor = createMonitor(backend, { now: 0 });
    await monitor.tick();

    backend.read.mockRejectedValueOnce(new Error('socket hang up'));
    await monitor.tick();
    await monitor.tick();

    expect(backend.open).toHaveBeenCalledTimes(2);
    expect(monitor.getLatestCpuTempResult().status).toBe('ok');
  });

  it('lists CPU, GPU and motherboard sensors but not other hardware', async () => {
    const thermalQuery: CimQuery = async (_namespace, className) =>
      className === 'MSAcpi_ThermalZoneTemperature' ? [{ CurrentTemperature: 50, InstanceName: 'TZ00' }] : [];
    const monitor = new HardwareMonitor(new FakeBackend(), { intervalMs: 60_000, thermalQuery });

    const rows = await monitor.getSensorSnapshots();

    expect(rows.map(row => `${row.hardwareType}/${row.sensorType}/${row.sensorName}`)).toEqual([
      'Cpu/Temperature/CPU Package',
      'Gpu/Temperature/GPU Core',
      'Gpu/Load/GPU Core',
      'Wmi/Temperature/TZ00',
    ]);
    expect(rows[0]).toEqual({
      hardwareName: 'Test CPU',
      hardwareType: 'Cpu',
      sensorName: 'CPU Package',
      sensorType: 'Temperature',
      value: 50,
      hasValue: true,
      rawValue: '50',
      identifier: '/intelcpu/0/temperature/0',
    });
  });

  it('lists only thermal rows when the backend is unavailable', async () => {
    const backend = new FakeBackend();
    backend.available = false;
    const monitor = createMonitor(backend, { now: 0 });

    await expect(monitor.getSensorSnapshots()).resolves.toEqual([]);
  });

  it('scans on start and closes the backend on stop', async () => {
    const backend = new FakeBackend();
    const monitor = createMonitor(backend, { now: 0 });

    await monitor.start();
    expect(backend.read).toHaveBeenCalledTimes(2);
    expect(monitor.getLatestCpuTempResult().status).toBe('no_sensors');

    await monitor.stop();
    expect(backend.close).toHaveBeenCalledTimes(1);
  });
});
