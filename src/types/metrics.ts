/**
 * Metrics Types
 *
 * Shared between the hardware monitor, the temperature providers, the metrics
 * collector and the transport layer (HTTP routes and WebSocketHub).
 * Null fields are omitted when serialized, so every optional reading is `T | null`.
 */

export const CPU_TEMP_STATUSES = [
  'ok',
  'no_sensors',
  'warming_up',
  'no_values',
  'wmi_approx',
  'external_not_configured',
] as const;

export type CpuTempStatus = (typeof CPU_TEMP_STATUSES)[number];

export const CPU_TEMP_PROVIDER_KINDS = ['native', 'thermal_zone', 'external'] as const;

export type CpuTempProviderKind = (typeof CPU_TEMP_PROVIDER_KINDS)[number];

export interface CpuTempReading {
  value: number | null;
  source: string | null;
  valid: boolean;
}

export interface CpuTempDiagnostics {
  isAdmin: boolean;
  cpuTempSensorsFound: number;
  cpuTempSensorsWithValue: number;
  lastValidCpuTempC: number | null;
  ticksSinceValid: number;
  warmupTicksRemaining: number;
  selectedSensorName: string | null;
  selectedSensorIdentifier: string | null;
  selectedSensorValue: number | null;
  derivedSensorName: string | null;
  derivedSensorIdentifier: string | null;
  derivedSensorValue: number | null;
  derivedSensorTjMax: number | null;
  hint: string | null;
}

export interface CpuTempResult {
  tempC: number | null;
  status: CpuTempStatus;
  hint: string | null;
  provider: CpuTempProviderKind;
  source: string | null; // native provider only
  details: Readonly<CpuTempDiagnostics> | null; // native provider only
}

/**
 * Latest hardware loop output (CPU temperature pipeline + GPU sensors)
 */
export interface HardwareMetrics {
  cpuTemp: CpuTempResult;
  gpuUsagePercent: number | null;
  gpuTempC: number | null;
}

export interface CpuTempDebugSnapshot {
  tempC: number | null;
  source: string | null;
  status: CpuTempStatus;
  provider: CpuTempProviderKind;
  hint: string | null;
  details: Readonly<CpuTempDiagnostics> | null;
}

export interface TopProcess {
  pid: number;
  name: string;
  cpuPercent: number;
  ramPercent: number;
  gpuPercent: number | null;
}

export interface MetricsSeries {
  netSend60: number[];
  netRecv60: number[];
}

export interface MetricsSnapshot {
  cpuPercent: number | null;
  cpuTempC: number | null;
  cpuTempSource: string | null;
  cpuTempStatus: CpuTempStatus;
  cpuTempProvider: CpuTempProviderKind;
  cpuTempHint: string | null;
  cpuTempDetails: Readonly<CpuTempDiagnostics> | null;
  gpuUsagePercent: number | null;
  gpuTempC: number | null;
  ramUsagePercent: number | null;
  ramUsedMb: number | null;
  ramTotalMb: number | null;
  netSendKbps: number;
  netReceiveKbps: number;
  topProcesses: readonly TopProcess[] | null;
  series: MetricsSeries | null;
  errors: readonly string[];
}

export interface RuntimeStatsSnapshot {
  webSocketClients: number;
  lastTickTime: string | null;
  averageCollectionMs: number | null;
}

/**
 * Frame sent over /ws
 */
export interface WsEnvelope {
  type: 'init' | 'metrics' | 'series';
  data: MetricsSnapshot;
}
