import { RuntimeStatsSnapshot } from '../types/metrics';
import { RollingAverage } from '../utils/ringBuffer';

const COLLECTION_WINDOW = 60;

/**
 * Process-wide counters shared by the metrics loop and the WebSocket hub.
 */
export class RuntimeStats {
  private clients = 0;
  private lastTick: Date | null = null;
  private readonly collectionMs = new RollingAverage(COLLECTION_WINDOW);

  public get webSocketClients(): number {
    return this.clients;
  }

  public clientConnected(): void {
    this.clients++;
  }

  public clientDisconnected(): void {
    this.clients = Math.max(0, this.clients - 1);
  }

  public recordTick(time: Date, durationMs: number): void {
    this.lastTick = time;
    if (Number.isFinite(durationMs)) {
      this.collectionMs.add(durationMs);
    }
  }

  public getSnapshot(): RuntimeStatsSnapshot {
    return {
      webSocketClients: this.clients,
      lastTickTime: this.lastTick ? this.lastTick.toISOString() : null,
      averageCollectionMs: this.collectionMs.getAverage(),
    };
  }
}
