import { logger } from "../config/logger.js";
import { BuildError, describeError } from "./errors.js";
import type { HostConnection } from "./host-connection.js";
import { type ImageUnit, LOG_DIR_NAME } from "./image-unit.js";

/** Tag given to every build of an image. Rebuilding replaces whatever carried it before. */
export function imageTag(name: string): string {
  return `maestro/${name.toLowerCase()}:latest`;
}

/**
 * Rebuild an image on `connection`, taking the image's write lock for the
 * whole operation. Concurrent builds of the same image run one after another.
 */
export async function buildImage(image: ImageUnit, connection: HostConnection): Promise<string> {
  return image.lock.withWrite(() => buildLocked(image, connection));
}

/**
 * Rebuild with the image's write lock already held.
 *
 * The previous container and build are removed from the host that owns them,
 * which may not be `connection`. Those removals are best effort and happen
 * before the new build, so a failed build leaves the image pointing at a build
 * that may no longer exist on its host.
 */
export async function buildLocked(image: ImageUnit, connection: HostConnection): Promise<string> {
  const previous = image.connection;

  if (image.container?.id && previous) {
    try {
      await previous.runtime.removeContainer(image.container.id, { volumes: true });
    } catch (err) {
      logger.warn(`Failed to remove container ${image.container.id} of image ${image.name}`, {
        server: previous.name,
        error: describeError(err),
      });
    }
  }

  if (image.buildId && previous) {
    try {
      await previous.runtime.removeImage(image.buildId);
    } catch (err) {
      logger.warn(`Failed to remove build ${image.buildId} of image ${image.name}`, {
        server: previous.name,
        error: describeError(err),
      });
    }
  }

  let buildId: string;
  try {
    buildId = await connection.runtime.buildImage({
      contextDir: image.sourceDir,
      tag: imageTag(image.name),
      exclude: [LOG_DIR_NAME],
    });
  } catch (err) {
    throw new BuildError(image.name, connection.name, err);
  }

  image.setBuild(buildId, connection);
  logger.info(`Built image ${image.name} on server ${connection.name}`, { buildId });
  return buildId;
}
