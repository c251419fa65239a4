import { Router, Request, Response } from 'express';
import { HardwareMonitor } from '../services/HardwareMonitor';
import { RuntimeStats } from '../services/RuntimeStats';
import { SnapshotSource } from '../services/WebSocketHub';
import { log } from '../utils/logger';

export interface MetricsRouteDeps {
  metrics: SnapshotSource;
  hardwareMonitor: Pick<HardwareMonitor, 'getSensorSnapshots' | 'getCpuTempDebugSnapshot'>;
  runtimeStats: RuntimeStats;
}

/**
 * Read-only API under /api. Handlers only read published state, so the only
 * one that can fail is the sensor listing, which reads the backend directly.
 */
export function createMetricsRouter({ metrics, hardwareMonitor, runtimeStats }: MetricsRouteDeps): Router {
  const router = Router();

  // GET /api/health
  router.get('/health', (req: Request, res: Response) => {
    res.json({ ok: true, time: new Date().toISOString() });
  });

  // GET /api/metrics - latest snapshot, without the 60-sample series
  router.get('/metrics', (req: Request, res: Response) => {
    res.json(metrics.getLatestSnapshot(false));
  });

  // GET /api/sensors - raw sensor listing for debugging
  router.get('/sensors', async (req: Request, res: Response) => {
    try {
      const sensors = await hardwareMonitor.getSensorSnapshots();
      res.json({ ok: true, sensors });
    } catch (error) {
      log.error('Error listing sensors', 'metrics', error);
      res.status(500).json({ ok: false, error: error instanceof Error ? error.message : String(error) });
    }
  });

  // GET /api/cpu-temp-debug
  router.get('/cpu-temp-debug', (req: Request, res: Response) => {
    res.json({ ok: true, cpuTemp: hardwareMonitor.getCpuTempDebugSnapshot() });
  });

  // GET /api/stats
  router.get('/stats', (req: Request, res: Response) => {
    res.json(runtimeStats.getSnapshot());
  });

  return router;
}
