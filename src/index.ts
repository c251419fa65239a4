// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';
dotenv.config();

import http from 'http';
import { createApp } from './app';
import { loadSettings } from './config/settings';
import { LibreHardwareMonitorBackend } from './hardware/LibreHardwareMonitorBackend';
import { createCpuTempProvider } from './services/cpuTempProviders';
import { HardwareMonitor } from './services/HardwareMonitor';
import { MetricsCollector } from './services/MetricsCollector';
import { RuntimeStats } from './services/RuntimeStats';
import { SystemInformationCounters } from './services/SystemCounters';
import { WebSocketHub } from './services/WebSocketHub';
import { log, logger } from './utils/logger';

const settings = loadSettings();
logger.setLogLevel(process.env.LOG_LEVEL || 'info');

// Only meaningful for the diagnostics hint; Windows has no uid to inspect
const isAdmin = typeof process.getuid === 'function' && process.getuid() === 0;

const runtimeStats = new RuntimeStats();
const hardwareMonitor = new HardwareMonitor(new LibreHardwareMonitorBackend(settings.lhmUrl, settings.lhmTimeoutMs), {
  intervalMs: settings.hardwareIntervalMs,
  isAdmin,
});
const cpuTempProvider = createCpuTempProvider(settings.cpuTempProvider, {
  hardwareMonitor,
  hardwareIntervalMs: settings.hardwareIntervalMs,
});
const metricsCollector = new MetricsCollector(
  new SystemInformationCounters(),
  hardwareMonitor,
  cpuTempProvider,
  runtimeStats,
  settings
);

const app = createApp({ metrics: metricsCollector, hardwareMonitor, runtimeStats }, settings);
const server = http.createServer(app);
const webSocketHub = new WebSocketHub(metricsCollector, runtimeStats, {
  metricsIntervalMs: settings.metricsIntervalMs,
});
webSocketHub.attach(server, '/ws');

async function startServer(): Promise<void> {
  log.important(`Starting telemetry agent (provider: ${settings.cpuTempProvider}, log level: ${logger.getLogLevelString()})`, 'index');

  // Backend failures are retried each tick, so startup never waits on the sensor service
  await hardwareMonitor.start();
  metricsCollector.start();

  server.once('error', error => {
    log.error(`Failed to listen on ${settings.host}:${settings.port}`, 'index', error);
    process.exit(1);
  });

  server.listen(settings.port, settings.host, () => {
    log.important(`Telemetry agent listening on http://${settings.host}:${settings.port}`, 'index');
    log.important(`WebSocket endpoint: ws://${settings.host}:${settings.port}/ws`, 'index');
  });
}

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.important(`Received ${signal}, shutting down telemetry agent...`, 'index');

  try {
    webSocketHub.cleanup();
    await metricsCollector.stop();
    await hardwareMonitor.stop();
    await new Promise<void>(resolve => server.close(() => resolve()));
    log.info('All services stopped', 'index');
  } catch (error) {
    log.error('Error during cleanup', 'index', error);
  }

  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

startServer().catch(error => {
  log.error('Failed to start telemetry agent', 'index', error);
  process.exit(1);
});
