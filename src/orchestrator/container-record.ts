import type { Writable } from "node:stream";
import type { ContainerStatus, ContainerView } from "./types.js";

/** Files a container's stdout and stderr are copied into. */
export interface OutputSinks {
  stdout: Writable;
  stderr: Writable;
}

export interface ContainerRecordInit {
  id?: string | null;
  name: string;
  status: ContainerStatus;
  createdAt: Date;
  sinks?: OutputSinks | null;
}

/** Local view of one remote container. Owned by exactly one image. */
export class ContainerRecord {
  /** Runtime-assigned id; null while the run is still queued. */
  id: string | null;
  name: string;
  status: ContainerStatus;
  createdAt: Date;
  finishedAt: Date | null = null;
  sinks: OutputSinks | null;

  constructor(init: ContainerRecordInit) {
    this.id = init.id ?? null;
    this.name = init.name;
    this.status = init.status;
    this.createdAt = init.createdAt;
    this.sinks = init.sinks ?? null;
  }

  /** Placeholder put on an image while its run waits for the host worker. */
  static waiting(now: Date): ContainerRecord {
    return new ContainerRecord({ name: "pending", status: "waiting", createdAt: now });
  }

  markError(): void {
    this.status = "error";
    this.closeSinks();
  }

  markFinished(at: Date): void {
    this.status = "finished";
    this.finishedAt = at;
    this.closeSinks();
  }

  markStopped(at: Date): void {
    this.status = "stopped";
    this.finishedAt = at;
    this.closeSinks();
  }

  closeSinks(): void {
    if (!this.sinks) return;
    this.sinks.stdout.end();
    this.sinks.stderr.end();
    this.sinks = null;
  }

  toJSON(): ContainerView {
    return {
      id: this.id,
      name: this.name,
      status: this.status,
      createdAt: this.createdAt.toISOString(),
      finishedAt: this.finishedAt ? this.finishedAt.toISOString() : null,
    };
  }
}
