import { describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS, loadSettings, parseProviderKind } from './settings';

describe('loadSettings', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({ ...DEFAULT_SETTINGS });
  });

  it('reads numbers, booleans and strings', () => {
    const settings = loadSettings({
      MONITOR_PORT: '9000',
      MONITOR_HOST: '127.0.0.1',
      MONITOR_METRICS_INTERVAL_MS: '500',
      MONITOR_ALLOW_LOCAL_NETWORK_CORS: 'yes',
      MONITOR_ADAPTIVE_NOCLIENTS: 'ON',
      MONITOR_TOP_PROCESSES: '1',
      MONITOR_STATIC_DIR: ' ./public ',
      LHM_URL: 'http://10.0.0.5:8085/data.json',
    });

    expect(settings.port).toBe(9000);
    expect(settings.host).toBe('127.0.0.1');
    expect(settings.metricsIntervalMs).toBe(500);
    expect(settings.allowLocalNetworkCors).toBe(true);
    expect(settings.adaptiveUpdateNoClients).toBe(true);
    expect(settings.topProcessesEnabled).toBe(true);
    expect(settings.staticDir).toBe('./public');
    expect(settings.lhmUrl).toBe('http://10.0.0.5:8085/data.json');
  });

  it('falls back to defaults for non-positive or malformed numbers', () => {
    const settings = loadSettings({
      MONITOR_PORT: '0',
      MONITOR_METRICS_INTERVAL_MS: '-250',
      MONITOR_HW_INTERVAL_MS: 'fast',
      MONITOR_PROCESS_INTERVAL_MS: '1.5',
    });

    expect(settings.port).toBe(8787);
    expect(settings.metricsIntervalMs).toBe(1000);
    expect(settings.hardwareIntervalMs).toBe(2000);
    expect(settings.processIntervalMs).toBe(5000);
  });

  it('treats any other boolean text as false', () => {
    expect(loadSettings({ MONITOR_TOP_PROCESSES: 'enabled' }).topProcessesEnabled).toBe(false);
  });
});

describe('parseProviderKind', () => {
  it('accepts the canonical names and legacy aliases', () => {
    expect(parseProviderKind('native')).toBe('native');
    expect(parseProviderKind('LHM')).toBe('native');
    expect(parseProviderKind('thermal_zone')).toBe('thermal_zone');
    expect(parseProviderKind('wmi')).toBe('thermal_zone');
    expect(parseProviderKind(' external ')).toBe('external');
  });

  it('defaults to native for unknown or missing values', () => {
    expect(parseProviderKind(undefined)).toBe('native');
    expect(parseProviderKind('hwinfo')).toBe('native');
  });
});
