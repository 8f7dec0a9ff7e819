import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import type { HostInfo } from "../config/hosts.js";
import { logger } from "../config/logger.js";
import type { RuntimeClient } from "../runtime/types.js";
import { ContainerRecord, type OutputSinks } from "./container-record.js";
import { describeError } from "./errors.js";
import type { ImageUnit } from "./image-unit.js";
import { RendezvousQueue } from "./rendezvous-queue.js";
import type { ContainerChangeListener, HostView } from "./types.js";

export interface HostConnectionOptions {
  onContainerChange?: ContainerChangeListener;
  /** Clock used for container names and timestamps. */
  now?: () => Date;
}

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

/** `<image>-YYYYMMDD-HHMMSS-mmm` in UTC. */
export function containerName(image: string, at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `${image}-${date}-${time}-${pad(at.getUTCMilliseconds(), 3)}`;
}

/** Open the per-run output files under the image's log directory. */
export async function openSinks(logDir: string, name: string): Promise<OutputSinks> {
  await mkdir(logDir, { recursive: true });
  const open = (stream: "stdout" | "stderr") => {
    const file = path.join(logDir, `${name}.${stream}.log`);
    const sink = createWriteStream(file, { flags: "a" });
    sink.on("error", (err) => {
      logger.warn(`Output sink ${file} failed`, { err });
    });
    return sink;
  };
  return { stdout: open("stdout"), stderr: open("stderr") };
}

/**
 * One live session to a host's container runtime, plus the run queue for that
 * host and the single worker that drains it.
 *
 * Runs on one host are set up one at a time, in the order they were queued.
 */
export class HostConnection {
  readonly name: string;
  readonly host: HostInfo;
  readonly runtime: RuntimeClient;

  private readonly queue = new RendezvousQueue<ImageUnit>();
  private readonly onContainerChange: ContainerChangeListener | undefined;
  private readonly now: () => Date;
  private readonly detach = new AbortController();
  private worker: Promise<void> | null = null;

  constructor(name: string, host: HostInfo, runtime: RuntimeClient, options: HostConnectionOptions = {}) {
    this.name = name;
    this.host = host;
    this.runtime = runtime;
    this.onContainerChange = options.onContainerChange;
    this.now = options.now ?? (() => new Date());
  }

  /** Hand an image to the worker. Settles once the worker has taken it, not when the run starts. */
  enqueue(image: ImageUnit): Promise<void> {
    return this.queue.send(image);
  }

  /** Start the worker. Later calls return the same worker. */
  startWorker(): Promise<void> {
    if (!this.worker) {
      this.worker = this.work();
    }
    return this.worker;
  }

  /**
   * Stop taking new runs, drop the attachment in progress, wait for the
   * worker to exit, then close the session. Containers keep running on the host.
   */
  async shutdown(): Promise<void> {
    this.queue.close();
    this.detach.abort();
    if (this.worker) {
      await this.worker;
    }
    await this.runtime.close();
  }

  toJSON(): HostView {
    return { name: this.name, protocol: this.host.protocol, host: this.host.host ?? null };
  }

  private async work(): Promise<void> {
    logger.info(`Worker for server ${this.name} started`);
    for await (const image of this.queue) {
      try {
        await this.process(image);
      } catch (err) {
        logger.error(`Worker for server ${this.name} failed to process image ${image.name}`, { err });
      }
    }
    logger.info(`Worker for server ${this.name} stopped`);
  }

  private async process(image: ImageUnit): Promise<void> {
    const record = await image.lock.withWrite(() => this.setUp(image));
    if (!record || record.id === null || !record.sinks) return;

    try {
      await this.runtime.attachContainer(record.id, record.sinks.stdout, record.sinks.stderr, this.detach.signal);
    } catch (err) {
      if (this.detach.signal.aborted) {
        logger.info(`Detached from container ${record.name}`, { image: image.name, server: this.name });
        record.closeSinks();
        return;
      }
      if (image.container !== record || record.status !== "running") return;
      // A rerun of this image may hold the lock until this worker takes it, so the worker must not wait here.
      image.lock
        .withWrite(() => this.failAttach(image, record, err))
        .catch((lockErr) => {
          logger.error(`Failed to record attach failure of container ${record.name}`, { err: lockErr });
        });
    }
  }

  private failAttach(image: ImageUnit, record: ContainerRecord, err: unknown): void {
    if (image.container !== record || record.status !== "running") return;
    logger.error(`Attach to container ${record.name} failed`, { image: image.name, err });
    record.markError();
    this.notify(image, record);
  }

  /** Create and start the container. Runs under the image's write lock. */
  private async setUp(image: ImageUnit): Promise<ContainerRecord | null> {
    const pending = image.container;
    if (!pending || pending.status !== "waiting") {
      logger.info(`Run of image ${image.name} was cancelled before it started`, { server: this.name });
      return null;
    }
    if (image.buildId === null || image.connection !== this) {
      logger.error(`Image ${image.name} has no build on server ${this.name}`);
      pending.markError();
      this.notify(image, pending);
      return null;
    }

    const createdAt = this.now();
    const name = containerName(image.name, createdAt);

    let id: string;
    try {
      id = await this.runtime.createContainer({ image: image.buildId, name });
    } catch (err) {
      logger.error(`Failed to create container ${name}: ${describeError(err)}`, { image: image.name, server: this.name });
      pending.name = name;
      pending.createdAt = createdAt;
      pending.markError();
      this.notify(image, pending);
      return null;
    }

    const record = new ContainerRecord({ id, name, status: "running", createdAt });
    image.container = record;

    try {
      record.sinks = await openSinks(image.logDir, name);
      await this.runtime.startContainer(id);
    } catch (err) {
      logger.error(`Failed to start container ${name}: ${describeError(err)}`, { image: image.name, server: this.name });
      record.markError();
      this.notify(image, record);
      return null;
    }

    logger.info(`Started container ${name} for image ${image.name} on server ${this.name}`, { containerId: id });
    this.notify(image, record);
    return record;
  }

  private notify(image: ImageUnit, record: ContainerRecord): void {
    this.onContainerChange?.(image, record, this.name);
  }
}
