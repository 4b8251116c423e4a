import { Controller, Get } from "@nestjs/common";
import { getEnv } from "../../config/environment";
import { CapabilityLifecycleService } from "../../verification/capabilities/capability-lifecycle.service";

@Controller("health")
export class HealthController {
  constructor(private readonly capabilities: CapabilityLifecycleService) {}

  @Get()
  getHealthStatus() {
    const pools = this.capabilities.snapshots();
    const saturated = pools.filter(
      (pool) => pool.inFlight >= pool.maxConcurrent && pool.queued > 0,
    );

    return {
      status: pools.some((pool) => pool.closed)
        ? "unavailable"
        : saturated.length > 0
          ? "busy"
          : "ok",
      timestamp: new Date().toISOString(),
      environment: getEnv().service.nodeEnv,
      capabilities: pools.map((pool) => ({
        name: pool.capability,
        max_concurrent: pool.maxConcurrent,
        in_flight: pool.inFlight,
        queued: pool.queued,
        closed: pool.closed,
      })),
      uptime: process.uptime(),
      version: getEnv().service.configVersion,
    };
  }
}
