import { logger } from "../config/logger.js";
import { buildLocked } from "./build-coordinator.js";
import { ContainerRecord } from "./container-record.js";
import type { HostConnection } from "./host-connection.js";
import type { ImageUnit } from "./image-unit.js";
import { type ContainerChangeListener, isTerminal } from "./types.js";

export type DispatchOutcome = "queued" | "conflict";

/**
 * Queue an image to run on `connection`, building it there first when its
 * current build lives elsewhere or does not exist.
 *
 * The check, the implicit build and the hand-off to the host worker all happen
 * under one write-lock hold, so two run requests for the same image cannot
 * both get through. The image carries a `waiting` container from the moment
 * it is queued until the worker creates the real one.
 *
 * Throws BuildError when the implicit build fails and QueueClosedError when
 * the connection is shutting down.
 */
export async function dispatchRun(
  image: ImageUnit,
  connection: HostConnection,
  now: () => Date = () => new Date(),
): Promise<DispatchOutcome> {
  return image.lock.withWrite(async () => {
    const current = image.container;
    if (current && (current.status === "running" || current.status === "waiting")) {
      return "conflict";
    }

    if (image.buildId === null || image.connection !== connection) {
      await buildLocked(image, connection);
    }

    const pending = ContainerRecord.waiting(now());
    image.container = pending;
    try {
      await connection.enqueue(image);
    } catch (err) {
      if (image.container === pending) {
        image.container = current;
      }
      throw err;
    }

    logger.info(`Queued image ${image.name} on server ${connection.name}`);
    return "queued";
  });
}

/**
 * Stop an image's container and forget it.
 *
 * The container reference is cleared even when the runtime refuses the stop;
 * the runtime error is rethrown afterwards. A run that is still queued is
 * cancelled without contacting the host.
 */
export async function stopRun(
  image: ImageUnit,
  onContainerChange?: ContainerChangeListener,
  now: () => Date = () => new Date(),
): Promise<void> {
  await image.lock.withWrite(async () => {
    const connection = image.connection;
    const record = image.container;
    if (!connection || !record) return;

    if (record.id === null) {
      logger.info(`Cancelled queued run of image ${image.name}`);
      image.clearContainer();
      return;
    }

    try {
      await connection.runtime.stopContainer(record.id);
      logger.info(`Stopped container ${record.name} of image ${image.name}`);
    } finally {
      if (!isTerminal(record.status)) {
        record.markStopped(now());
        onContainerChange?.(image, record, connection.name);
      }
      image.clearContainer();
    }
  });
}
