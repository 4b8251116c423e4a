import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from "prom-client";
import { hostname } from "os";
import { getEnv } from "../config/environment";
import type { PipelineStage } from "../common/errors/verification.errors";

export type CapabilityCallResult = "success" | "timeout" | "error";
export type VerificationResultLabel =
  | "AUTO_APPROVE"
  | "NEEDS_REVIEW"
  | "AUTO_REJECT"
  | "model_unavailable"
  | "pipeline_error";

type MetricDescriptor = {
  readonly name: string;
  readonly labelNames: readonly string[];
};

const STAGE_DURATION_BUCKETS_MS = [
  5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000,
] as const;

class TelemetryMetricsRegistry {
  private static instance: TelemetryMetricsRegistry | null = null;

  private readonly registry: Registry;
  private readonly metricDescriptors: MetricDescriptor[] = [];

  private environmentLabel: string;
  private instanceLabel: string;

  private readonly verificationCounter: Counter<string>;
  private readonly stageDurationHistogram: Histogram<string>;
  private readonly capabilityCallCounter: Counter<string>;
  private readonly capabilityQueueGauge: Gauge<string>;
  private readonly capabilityInFlightGauge: Gauge<string>;

  private constructor() {
    this.registry = new Registry();
    collectDefaultMetrics({
      register: this.registry,
      prefix: "achievement_verifier_",
    });

    this.environmentLabel = this.resolveEnvironmentLabel();
    this.instanceLabel = this.resolveInstanceLabel();

    this.verificationCounter = this.track(
      new Counter({
        name: "verification_decisions_total",
        help: "Verification requests by claimed document kind and result",
        labelNames: ["environment", "instance", "kind", "result"],
        registers: [this.registry],
      }),
      "verification_decisions_total",
      ["environment", "instance", "kind", "result"],
    );

    this.stageDurationHistogram = this.track(
      new Histogram({
        name: "verification_stage_duration_ms",
        help: "Duration of each verification pipeline stage in milliseconds",
        labelNames: ["environment", "instance", "stage"],
        buckets: [...STAGE_DURATION_BUCKETS_MS],
        registers: [this.registry],
      }),
      "verification_stage_duration_ms",
      ["environment", "instance", "stage"],
    );

    this.capabilityCallCounter = this.track(
      new Counter({
        name: "capability_calls_total",
        help: "Calls to external model capabilities by outcome",
        labelNames: ["environment", "instance", "capability", "result"],
        registers: [this.registry],
      }),
      "capability_calls_total",
      ["environment", "instance", "capability", "result"],
    );

    this.capabilityQueueGauge = this.track(
      new Gauge({
        name: "capability_queue_depth",
        help: "Calls waiting for a capability pool slot",
        labelNames: ["environment", "instance", "capability"],
        registers: [this.registry],
      }),
      "capability_queue_depth",
      ["environment", "instance", "capability"],
    );

    this.capabilityInFlightGauge = this.track(
      new Gauge({
        name: "capability_in_flight",
        help: "Calls currently holding a capability pool slot",
        labelNames: ["environment", "instance", "capability"],
        registers: [this.registry],
      }),
      "capability_in_flight",
      ["environment", "instance", "capability"],
    );
  }

  static getInstance(): TelemetryMetricsRegistry {
    if (!this.instance) {
      this.instance = new TelemetryMetricsRegistry();
    }
    return this.instance;
  }

  static refreshEnvironment(): void {
    const current = this.getInstance();
    current.environmentLabel = current.resolveEnvironmentLabel();
    current.instanceLabel = current.resolveInstanceLabel();
  }

  static describe(): MetricDescriptor[] {
    return this.getInstance().metricDescriptors.map((descriptor) => ({
      ...descriptor,
    }));
  }

  getRegistry(): Registry {
    return this.registry;
  }

  recordVerification(kind: string, result: VerificationResultLabel): void {
    this.verificationCounter
      .labels(this.environmentLabel, this.instanceLabel, kind, result)
      .inc();
  }

  observeStageDuration(stage: PipelineStage, durationMs: number): void {
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.stageDurationHistogram
      .labels(this.environmentLabel, this.instanceLabel, stage)
      .observe(safeDuration);
  }

  recordCapabilityCall(capability: string, result: CapabilityCallResult): void {
    this.capabilityCallCounter
      .labels(this.environmentLabel, this.instanceLabel, capability, result)
      .inc();
  }

  setCapabilityQueueDepth(capability: string, depth: number): void {
    this.capabilityQueueGauge
      .labels(this.environmentLabel, this.instanceLabel, capability)
      .set(Math.max(0, depth));
  }

  setCapabilityInFlight(capability: string, count: number): void {
    this.capabilityInFlightGauge
      .labels(this.environmentLabel, this.instanceLabel, capability)
      .set(Math.max(0, count));
  }

  private track<T>(
    metric: T,
    name: string,
    labelNames: readonly string[],
  ): T {
    this.metricDescriptors.push({ name, labelNames });
    return metric;
  }

  private resolveEnvironmentLabel(): string {
    try {
      return getEnv().service.nodeEnv;
    } catch {
      return process.env.NODE_ENV ?? "development";
    }
  }

  private resolveInstanceLabel(): string {
    return process.env.INSTANCE_ID ?? process.env.HOSTNAME ?? hostname();
  }
}

export class TelemetryMetrics {
  static registry(): Registry {
    return TelemetryMetricsRegistry.getInstance().getRegistry();
  }

  static refreshEnvironment(): void {
    TelemetryMetricsRegistry.refreshEnvironment();
  }

  static describe(): MetricDescriptor[] {
    return TelemetryMetricsRegistry.describe();
  }

  static recordVerification(
    kind: string,
    result: VerificationResultLabel,
  ): void {
    TelemetryMetricsRegistry.getInstance().recordVerification(kind, result);
  }

  static observeStageDuration(stage: PipelineStage, durationMs: number): void {
    TelemetryMetricsRegistry.getInstance().observeStageDuration(
      stage,
      durationMs,
    );
  }

  static recordCapabilityCall(
    capability: string,
    result: CapabilityCallResult,
  ): void {
    TelemetryMetricsRegistry.getInstance().recordCapabilityCall(
      capability,
      result,
    );
  }

  static setCapabilityQueueDepth(capability: string, depth: number): void {
    TelemetryMetricsRegistry.getInstance().setCapabilityQueueDepth(
      capability,
      depth,
    );
  }

  static setCapabilityInFlight(capability: string, count: number): void {
    TelemetryMetricsRegistry.getInstance().setCapabilityInFlight(
      capability,
      count,
    );
  }
}
