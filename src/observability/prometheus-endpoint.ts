import type { Request, Response } from "express";
import type { CapabilityPoolSnapshot } from "../verification/capabilities/capability-pool";
import { TelemetryMetrics } from "./metrics-registry";

const METRICS_CACHE_CONTROL = "no-store, max-age=0";

/**
 * Builds the `/metrics` handler. Pool gauges are re-read from the live pools on
 * every scrape so an idle pool still reports its current state.
 */
export function createPrometheusMetricsHandler(
  poolSnapshots: () => readonly CapabilityPoolSnapshot[],
) {
  return async (_req: Request, res: Response): Promise<void> => {
    TelemetryMetrics.refreshEnvironment();
    for (const pool of poolSnapshots()) {
      TelemetryMetrics.setCapabilityQueueDepth(pool.capability, pool.queued);
      TelemetryMetrics.setCapabilityInFlight(pool.capability, pool.inFlight);
    }

    const registry = TelemetryMetrics.registry();
    res.setHeader("Content-Type", registry.contentType);
    res.setHeader("Cache-Control", METRICS_CACHE_CONTROL);
    res.send(await registry.metrics());
  };
}
