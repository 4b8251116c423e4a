import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
  OnModuleInit,
} from "@nestjs/common";
import {
  CAPTIONING_CAPABILITY,
  CAPTIONING_POOL,
  TEXT_EXTRACTION_CAPABILITY,
  TEXT_EXTRACTION_POOL,
  type Capability,
  type CaptioningCapability,
  type TextExtractionCapability,
} from "./capability.interfaces";
import { CapabilityPool, type CapabilityPoolSnapshot } from "./capability-pool";

/**
 * Opens both capabilities once at startup and closes them on shutdown,
 * after their pools stop admitting calls.
 */
@Injectable()
export class CapabilityLifecycleService
  implements OnModuleInit, OnApplicationShutdown
{
  private readonly logger = new Logger(CapabilityLifecycleService.name);

  constructor(
    @Inject(CAPTIONING_CAPABILITY)
    private readonly captioning: CaptioningCapability,
    @Inject(TEXT_EXTRACTION_CAPABILITY)
    private readonly textExtraction: TextExtractionCapability,
    @Inject(CAPTIONING_POOL)
    private readonly captioningPool: CapabilityPool,
    @Inject(TEXT_EXTRACTION_POOL)
    private readonly textExtractionPool: CapabilityPool,
  ) {}

  private get capabilities(): Capability[] {
    return [this.captioning, this.textExtraction];
  }

  snapshots(): CapabilityPoolSnapshot[] {
    return [this.captioningPool.snapshot(), this.textExtractionPool.snapshot()];
  }

  async onModuleInit(): Promise<void> {
    await Promise.all(this.capabilities.map((capability) => capability.open()));
    this.logger.log(
      `Capabilities open: ${this.capabilities.map((capability) => capability.name).join(", ")}`,
    );
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.captioningPool.close();
    this.textExtractionPool.close();

    const results = await Promise.allSettled(
      this.capabilities.map((capability) => capability.close()),
    );
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.error(
          `Failed to close ${this.capabilities[index].name}`,
          result.reason instanceof Error ? result.reason.stack : String(result.reason),
        );
      }
    });

    this.logger.log(`Capabilities closed${signal ? ` (${signal})` : ""}`);
  }
}
