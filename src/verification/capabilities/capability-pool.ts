import {
  ModelUnavailableError,
  type CapabilityStage,
} from "../../common/errors/verification.errors";
import { TelemetryMetrics } from "../../observability/metrics-registry";

interface Waiter {
  cancelled: boolean;
  grant(): void;
  abandon(error: ModelUnavailableError): void;
}

export interface CapabilityPoolSnapshot {
  readonly capability: string;
  readonly maxConcurrent: number;
  readonly inFlight: number;
  readonly queued: number;
  readonly closed: boolean;
}

/**
 * Counting semaphore in front of one shared model capability.
 *
 * Waiters are served FIFO. Each call carries a timeout that covers both the
 * wait for a slot and the call itself; on expiry the slot is handed on, the
 * call's AbortSignal fires and the caller gets a ModelUnavailableError.
 * Any other failure of the call is reported as ModelUnavailableError too.
 */
export class CapabilityPool {
  private available: number;
  private inFlight = 0;
  private closed = false;
  private readonly waiters: Waiter[] = [];

  constructor(
    readonly capability: string,
    readonly stage: CapabilityStage,
    readonly maxConcurrent: number,
  ) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error("CapabilityPool maxConcurrent must be at least 1");
    }
    this.available = maxConcurrent;
  }

  get queued(): number {
    return this.waiters.filter((waiter) => !waiter.cancelled).length;
  }

  snapshot(): CapabilityPoolSnapshot {
    return {
      capability: this.capability,
      maxConcurrent: this.maxConcurrent,
      inFlight: this.inFlight,
      queued: this.queued,
      closed: this.closed,
    };
  }

  run<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
  ): Promise<T> {
    if (this.closed) {
      return Promise.reject(new ModelUnavailableError(this.stage, "closed"));
    }
    if (!(timeoutMs > 0)) {
      TelemetryMetrics.recordCapabilityCall(this.capability, "timeout");
      return Promise.reject(new ModelUnavailableError(this.stage, "timeout"));
    }

    return new Promise<T>((resolve, reject) => {
      const controller = new AbortController();
      let settled = false;
      let holdsSlot = false;

      const settle = (complete: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (holdsSlot) {
          holdsSlot = false;
          this.release();
        }
        complete();
      };

      const start = (): void => {
        holdsSlot = true;
        this.inFlight++;
        this.publishGauges();

        let pending: Promise<T>;
        try {
          pending = task(controller.signal);
        } catch (error) {
          pending = Promise.reject(error);
        }

        pending.then(
          (value) =>
            settle(() => {
              TelemetryMetrics.recordCapabilityCall(this.capability, "success");
              resolve(value);
            }),
          (error: unknown) =>
            settle(() => {
              TelemetryMetrics.recordCapabilityCall(this.capability, "error");
              reject(
                error instanceof ModelUnavailableError
                  ? error
                  : new ModelUnavailableError(this.stage, "backend_error", error),
              );
            }),
        );
      };

      const waiter: Waiter = {
        cancelled: false,
        grant: start,
        abandon: (error) => settle(() => reject(error)),
      };

      const timer = setTimeout(() => {
        waiter.cancelled = true;
        controller.abort();
        settle(() => {
          TelemetryMetrics.recordCapabilityCall(this.capability, "timeout");
          reject(new ModelUnavailableError(this.stage, "timeout"));
        });
        this.publishGauges();
      }, timeoutMs);

      if (this.available > 0) {
        this.available--;
        start();
      } else {
        this.waiters.push(waiter);
        this.publishGauges();
      }
    });
  }

  /** Rejects queued calls and refuses new ones. Calls already running finish normally. */
  close(): void {
    this.closed = true;
    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      if (!waiter.cancelled) {
        waiter.cancelled = true;
        waiter.abandon(new ModelUnavailableError(this.stage, "closed"));
      }
    }
    this.publishGauges();
  }

  private release(): void {
    this.inFlight--;
    let next = this.waiters.shift();
    while (next && next.cancelled) {
      next = this.waiters.shift();
    }

    if (next) {
      // Slot passes straight to the next waiter.
      next.grant();
    } else {
      this.available++;
    }
    this.publishGauges();
  }

  private publishGauges(): void {
    TelemetryMetrics.setCapabilityQueueDepth(this.capability, this.queued);
    TelemetryMetrics.setCapabilityInFlight(this.capability, this.inFlight);
  }
}
