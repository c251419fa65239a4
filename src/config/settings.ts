/**
 * Monitor Settings
 *
 * All runtime configuration comes from environment variables (a .env file is loaded
 * by dotenv in index.ts before this module runs). Values are parsed once at startup;
 * nothing here is hot-reloaded.
 */

import { CpuTempProviderKind } from '../types/metrics';

export interface MonitorSettings {
  port: number;
  host: string;
  metricsIntervalMs: number;
  metricsIntervalNoClientsMs: number;
  hardwareIntervalMs: number;
  allowLocalNetworkCors: boolean;
  adaptiveUpdateNoClients: boolean;
  cpuTempProvider: CpuTempProviderKind;
  topProcessesEnabled: boolean;
  processIntervalMs: number;
  lhmUrl: string;
  lhmTimeoutMs: number;
  staticDir: string | null;
}

export const DEFAULT_SETTINGS: Readonly<MonitorSettings> = Object.freeze({
  port: 8787,
  host: '0.0.0.0',
  metricsIntervalMs: 1000,
  metricsIntervalNoClientsMs: 2000,
  hardwareIntervalMs: 2000,
  allowLocalNetworkCors: false,
  adaptiveUpdateNoClients: false,
  cpuTempProvider: 'native',
  topProcessesEnabled: false,
  processIntervalMs: 5000,
  lhmUrl: 'http://127.0.0.1:8085/data.json',
  lhmTimeoutMs: 1500,
  staticDir: null,
});

// Older configuration files name the providers after their backends
const PROVIDER_ALIASES: Record<string, CpuTempProviderKind> = {
  native: 'native',
  lhm: 'native',
  thermal_zone: 'thermal_zone',
  thermalzone: 'thermal_zone',
  wmi: 'thermal_zone',
  external: 'external',
};

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw.trim());
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

export function parseProviderKind(raw: string | undefined): CpuTempProviderKind {
  if (!raw) {
    return DEFAULT_SETTINGS.cpuTempProvider;
  }
  return PROVIDER_ALIASES[raw.trim().toLowerCase()] ?? DEFAULT_SETTINGS.cpuTempProvider;
}

/**
 * Build settings from an environment map. Missing, malformed or non-positive
 * numbers fall back to their defaults; unknown providers fall back to native.
 */
export function loadSettings(env: Env = process.env): MonitorSettings {
  const staticDir = env.MONITOR_STATIC_DIR?.trim();

  return {
    port: readPositiveInt(env, 'MONITOR_PORT', DEFAULT_SETTINGS.port),
    host: readString(env, 'MONITOR_HOST', DEFAULT_SETTINGS.host),
    metricsIntervalMs: readPositiveInt(env, 'MONITOR_METRICS_INTERVAL_MS', DEFAULT_SETTINGS.metricsIntervalMs),
    metricsIntervalNoClientsMs: readPositiveInt(
      env,
      'MONITOR_METRICS_INTERVAL_NOCLIENT_MS',
      DEFAULT_SETTINGS.metricsIntervalNoClientsMs
    ),
    hardwareIntervalMs: readPositiveInt(env, 'MONITOR_HW_INTERVAL_MS', DEFAULT_SETTINGS.hardwareIntervalMs),
    allowLocalNetworkCors: readBool(env, 'MONITOR_ALLOW_LOCAL_NETWORK_CORS', DEFAULT_SETTINGS.allowLocalNetworkCors),
    adaptiveUpdateNoClients: readBool(env, 'MONITOR_ADAPTIVE_NOCLIENTS', DEFAULT_SETTINGS.adaptiveUpdateNoClients),
    cpuTempProvider: parseProviderKind(env.CPU_TEMP_PROVIDER),
    topProcessesEnabled: readBool(env, 'MONITOR_TOP_PROCESSES', DEFAULT_SETTINGS.topProcessesEnabled),
    processIntervalMs: readPositiveInt(env, 'MONITOR_PROCESS_INTERVAL_MS', DEFAULT_SETTINGS.processIntervalMs),
    lhmUrl: readString(env, 'LHM_URL', DEFAULT_SETTINGS.lhmUrl),
    lhmTimeoutMs: readPositiveInt(env, 'LHM_TIMEOUT_MS', DEFAULT_SETTINGS.lhmTimeoutMs),
    staticDir: staticDir ? staticDir : null,
  };
}
