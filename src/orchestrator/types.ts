import type { ContainerRecord } from "./container-record.js";
import type { ImageUnit } from "./image-unit.js";

/**
 * Lifecycle of a container tracked for an image.
 *
 * - waiting:  queued on a host, not yet created
 * - running:  created and started
 * - error:    creation, start or attach failed
 * - stopped:  stopped on request
 * - finished: the runtime reported the container as exited
 */
export type ContainerStatus = "waiting" | "running" | "error" | "stopped" | "finished";

export const TERMINAL_STATUSES: readonly ContainerStatus[] = ["error", "stopped", "finished"];

export function isTerminal(status: ContainerStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/** Called after a container record changes status. `host` is the connection it runs on. */
export type ContainerChangeListener = (image: ImageUnit, record: ContainerRecord, host: string) => void;

/** Outcome classes the HTTP adapter maps onto status codes. */
export type FailureCode = "not_found" | "conflict" | "invalid" | "internal";

export type OperationResult<T> = { success: true; data: T } | { success: false; code: FailureCode; error: string };

export function ok<T>(data: T): OperationResult<T> {
  return { success: true, data };
}

export function fail<T = never>(code: FailureCode, error: string): OperationResult<T> {
  return { success: false, code, error };
}

/** JSON shape of a container record. */
export interface ContainerView {
  id: string | null;
  name: string;
  status: ContainerStatus;
  createdAt: string;
  finishedAt: string | null;
}

/** JSON shape of an image. `id` is the build identifier on the owning host. */
export interface ImageView {
  name: string;
  id: string | null;
  connection: { name: string } | null;
  container: ContainerView | null;
}

/** Public part of a host descriptor. Credentials never leave the process. */
export interface HostView {
  name: string;
  protocol: string;
  host: string | null;
}
