import { desc, eq } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { containers } from "../db/schema/index.js";
import type { ContainerRecord } from "../orchestrator/container-record.js";
import type { ContainerStatus } from "../orchestrator/types.js";

/** A container as remembered after the fact. */
export interface RunHistoryEntry {
  id: string;
  imageName: string;
  host: string;
  name: string;
  status: ContainerStatus;
  createdAt: string;
  finishedAt: string | null;
  updatedAt: string;
}

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

/** Repository interface for run history. */
export interface IRunHistoryRepository {
  /** Insert or update the row for a created container. Records without a runtime id are ignored. */
  record(imageName: string, host: string, container: ContainerRecord): void;
  listForImage(imageName: string): RunHistoryEntry[];
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

const STATUSES: readonly ContainerStatus[] = ["waiting", "running", "error", "stopped", "finished"];

function toStatus(value: string): ContainerStatus {
  const status = STATUSES.find((s) => s === value);
  if (!status) throw new Error(`Unknown container status in history: ${value}`);
  return status;
}

function toEntry(row: typeof containers.$inferSelect): RunHistoryEntry {
  return { ...row, status: toStatus(row.status) };
}

/** Drizzle-backed implementation of IRunHistoryRepository. */
export class DrizzleRunHistoryRepository implements IRunHistoryRepository {
  constructor(
    private readonly db: DrizzleDb,
    private readonly now: () => Date = () => new Date(),
  ) {}

  record(imageName: string, host: string, container: ContainerRecord): void {
    if (container.id === null) return;

    const updatedAt = this.now().toISOString();
    const finishedAt = container.finishedAt ? container.finishedAt.toISOString() : null;

    this.db
      .insert(containers)
      .values({
        id: container.id,
        imageName,
        host,
        name: container.name,
        status: container.status,
        createdAt: container.createdAt.toISOString(),
        finishedAt,
        updatedAt,
      })
      .onConflictDoUpdate({
        target: containers.id,
        set: { status: container.status, finishedAt, updatedAt },
      })
      .run();
  }

  listForImage(imageName: string): RunHistoryEntry[] {
    return this.db
      .select()
      .from(containers)
      .where(eq(containers.imageName, imageName))
      .orderBy(desc(containers.createdAt))
      .all()
      .map(toEntry);
  }
}
