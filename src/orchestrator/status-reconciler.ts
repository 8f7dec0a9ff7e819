import { logger } from "../config/logger.js";
import type { ContainerState } from "../runtime/types.js";
import type { ConcurrentMap } from "./concurrent-map.js";
import { describeError } from "./errors.js";
import type { ImageUnit } from "./image-unit.js";
import type { ContainerChangeListener } from "./types.js";

export interface ReconcilerConfig {
  /** Delay between the end of one sweep and the start of the next. */
  intervalMs?: number;
  onContainerChange?: ContainerChangeListener;
  /** Fallback finish time when the runtime does not report one. */
  now?: () => Date;
}

/**
 * Polls the runtime for every running container and marks
 * the ones that have exited as finished.
 *
 * Images are checked one at a time, each under its own write lock. Inspect
 * failures are logged and retried on the next sweep.
 */
export class StatusReconciler {
  private readonly images: ConcurrentMap<string, ImageUnit>;
  private readonly onContainerChange: ContainerChangeListener | undefined;
  private readonly now: () => Date;
  private readonly INTERVAL_MS: number;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private sweep: Promise<void> | null = null;

  constructor(images: ConcurrentMap<string, ImageUnit>, config: ReconcilerConfig = {}) {
    this.images = images;
    this.onContainerChange = config.onContainerChange;
    this.now = config.now ?? (() => new Date());
    this.INTERVAL_MS = config.intervalMs ?? 2000;
  }

  get intervalMs(): number {
    return this.INTERVAL_MS;
  }

  /** Start sweeping. */
  start(): void {
    if (this.running) {
      logger.warn("Status reconciler already running");
      return;
    }
    this.running = true;
    logger.info("Starting status reconciler", { intervalMs: this.INTERVAL_MS });
    this.schedule();
  }

  /** Stop sweeping and wait for a sweep in progress to finish. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.sweep) {
      await this.sweep;
    }
    logger.info("Status reconciler stopped");
  }

  /** Check every image once. */
  async tick(): Promise<void> {
    for (const image of this.images.values()) {
      if (!this.needsCheck(image)) continue;
      await image.lock.withWrite(() => this.reconcile(image));
    }
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.sweep = this.tick()
        .catch((err) => {
          logger.error("Status reconciler sweep failed", { err });
        })
        .finally(() => {
          this.sweep = null;
          if (this.running) this.schedule();
        });
    }, this.INTERVAL_MS);
  }

  private needsCheck(image: ImageUnit): boolean {
    const record = image.container;
    return record !== null && record.id !== null && record.status === "running" && image.connection !== null;
  }

  private async reconcile(image: ImageUnit): Promise<void> {
    // The image may have changed while we waited for the lock.
    const record = image.container;
    const connection = image.connection;
    if (!record || record.id === null || record.status !== "running" || !connection) return;

    let state: ContainerState;
    try {
      state = await connection.runtime.inspectContainer(record.id);
    } catch (err) {
      logger.warn(`Error inspecting container ${record.id}: ${describeError(err)}`, { image: image.name });
      return;
    }

    if (state.status !== "exited") return;

    record.markFinished(state.finishedAt ?? this.now());
    logger.info(`Container ${record.name} of image ${image.name} finished`, {
      finishedAt: record.finishedAt?.toISOString(),
    });
    this.onContainerChange?.(image, record, connection.name);
  }
}
