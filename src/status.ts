import { APP_VERSION } from "./config";
import type { StartupReport } from "./registry";

/**
 * Mutable snapshot of server lifecycle state. Index counts are not stored
 * here; the health view reads them live from the registry.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  embeddingModel: string;
  generationModel: string;
  /** True once the registry has been bootstrapped. */
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  /** Slugs whose base or delta corpus failed to load at startup. */
  degraded: string[];
}

/** Health payload returned by the health operation and GET /health. */
export interface HealthReport extends ServerStatus {
  status: "ok";
  baseIndexes: number;
  deltaIndexes: number;
}

/**
 * Class wrapper around mutable server status state. Avoids ad-hoc mutation and
 * centralizes any future validation or side-effects.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      transport: initial?.transport ?? "unknown",
      embeddingModel: initial?.embeddingModel ?? "",
      generationModel: initial?.generationModel ?? "",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      degraded: initial?.degraded ?? [],
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setModels(embeddingModel: string, generationModel: string) {
    this.data.embeddingModel = embeddingModel;
    this.data.generationModel = generationModel;
  }

  /** Store the startup report and flip ready=false -> true. */
  public markReady(report: StartupReport) {
    this.data.degraded = [...report.degraded];
    this.data.ready = true;
  }

  /** Live reference to current status (treat as read-only). */
  public getStatus(): Readonly<ServerStatus> {
    return this.data;
  }
}
