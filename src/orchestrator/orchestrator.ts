import type { HostInfo, HostsConfig } from "../config/hosts.js";
import { logger } from "../config/logger.js";
import type { IRunHistoryRepository, RunHistoryEntry } from "../history/run-history-repository.js";
import { openSession, type SessionOpener } from "../runtime/session.js";
import type { RuntimeClient } from "../runtime/types.js";
import { buildImage } from "./build-coordinator.js";
import { ConcurrentMap } from "./concurrent-map.js";
import type { ContainerRecord } from "./container-record.js";
import { BuildError, describeError, errnoCode, HostNotFoundError, ImageNotFoundError, InvalidNameError } from "./errors.js";
import { HostConnection } from "./host-connection.js";
import { ImageUnit } from "./image-unit.js";
import { dispatchRun, stopRun } from "./run-dispatcher.js";
import { isValidFileName, isValidImageName, type SourceFile, SourceStore } from "./source-store.js";
import { StatusReconciler } from "./status-reconciler.js";
import {
  type ContainerChangeListener,
  fail,
  type HostView,
  type ImageView,
  type OperationResult,
  ok,
} from "./types.js";

export interface OrchestratorOptions {
  store: SourceStore;
  history?: IRunHistoryRepository | null;
  reconcileIntervalMs?: number;
  now?: () => Date;
}

export interface BootstrapDeps extends Omit<OrchestratorOptions, "store"> {
  /** Opens the runtime session for each configured host. Defaults to a dockerode session. */
  openSession?: SessionOpener;
}

export interface UploadedFile {
  name: string;
  data: Uint8Array;
}

export interface FileContent {
  name: string;
  data: Buffer;
}

/**
 * Process-wide orchestration context: the image and host registries, the
 * source directories behind the images, and the reconciler keeping container
 * status current.
 *
 * Every public operation reports domain outcomes through OperationResult and
 * only throws on programming errors.
 */
export class Orchestrator {
  readonly images = new ConcurrentMap<string, ImageUnit>();
  readonly connections = new ConcurrentMap<string, HostConnection>();
  readonly store: SourceStore;
  readonly reconciler: StatusReconciler;

  private readonly history: IRunHistoryRepository | null;
  private readonly now: () => Date;
  private readonly onContainerChange: ContainerChangeListener;

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.history = options.history ?? null;
    this.now = options.now ?? (() => new Date());
    this.onContainerChange = (image, record, host) => this.recordHistory(image, record, host);
    this.reconciler = new StatusReconciler(this.images, {
      intervalMs: options.reconcileIntervalMs,
      onContainerChange: this.onContainerChange,
      now: this.now,
    });
  }

  /**
   * Register every image directory under `internalDir` and open a session to
   * every configured host. A host that cannot be reached aborts the whole
   * bootstrap after closing the sessions already opened.
   */
  static async bootstrap(hostsConfig: HostsConfig, deps: BootstrapDeps = {}): Promise<Orchestrator> {
    const open = deps.openSession ?? openSession;
    const orchestrator = new Orchestrator({ ...deps, store: new SourceStore(hostsConfig.internalDir) });

    for (const name of await orchestrator.store.scan()) {
      orchestrator.registerImage(name);
    }

    try {
      for (const [name, host] of Object.entries(hostsConfig.servers)) {
        orchestrator.addConnection(name, host, await open(name, host));
      }
    } catch (err) {
      await orchestrator.shutdown();
      throw err;
    }

    logger.info("Orchestrator ready", {
      images: orchestrator.images.len(),
      servers: orchestrator.connections.len(),
      internalDir: orchestrator.store.root,
    });
    return orchestrator;
  }

  registerImage(name: string): ImageUnit {
    const image = new ImageUnit(name, this.store.dirFor(name));
    this.images.store(name, image);
    return image;
  }

  addConnection(name: string, host: HostInfo, runtime: RuntimeClient): HostConnection {
    const connection = new HostConnection(name, host, runtime, {
      onContainerChange: this.onContainerChange,
      now: this.now,
    });
    this.connections.store(name, connection);
    return connection;
  }

  /** Start one worker per host and the status reconciler. */
  start(): void {
    for (const connection of this.connections.values()) {
      connection.startWorker().catch((err) => {
        logger.error(`Worker for server ${connection.name} exited with an error`, { err });
      });
    }
    this.reconciler.start();
  }

  async shutdown(): Promise<void> {
    await this.reconciler.stop();
    for (const connection of this.connections.values()) {
      try {
        await connection.shutdown();
      } catch (err) {
        logger.warn(`Failed to close session to server ${connection.name}`, { error: describeError(err) });
      }
    }
    logger.info("Orchestrator stopped");
  }

  // ---------------------------------------------------------------------------
  // Images
  // ---------------------------------------------------------------------------

  // Reads take no lock. A run waiting for a busy host worker holds its image's
  // write lock, and listing must not wait behind it.

  listImages(): OperationResult<Record<string, ImageView>> {
    const views: Record<string, ImageView> = {};
    const entries = [...this.images.pairs()].sort(([a], [b]) => a.localeCompare(b));
    for (const [name, image] of entries) {
      views[name] = image.toJSON();
    }
    return ok(views);
  }

  getImage(name: string): OperationResult<ImageView> {
    const { value: image, found } = this.images.load(name);
    if (!found) return notFound(new ImageNotFoundError(name));
    return ok(image.toJSON());
  }

  async createImage(name: string): Promise<OperationResult<ImageView>> {
    if (!isValidImageName(name)) return fail("invalid", new InvalidNameError("image", name).message);
    if (this.images.exists(name)) return fail("conflict", `Image ${name} already exists`);

    try {
      await this.store.create(name);
    } catch (err) {
      if (errnoCode(err) === "EEXIST") return fail("conflict", `Image ${name} already exists`);
      return internal(`Failed to create image ${name}`, err);
    }

    const image = this.registerImage(name);
    logger.info(`Created image ${name}`, { sourceDir: image.sourceDir });
    return ok(image.toJSON());
  }

  /**
   * Forget an image and delete its source directory. A queued run is
   * cancelled; containers and builds already on a host are left there.
   */
  async deleteImage(name: string): Promise<OperationResult<null>> {
    const { value: image, found } = this.images.load(name);
    if (!found) return notFound(new ImageNotFoundError(name));

    return image.lock.withWrite(async () => {
      this.images.delete(name);
      image.clearContainer();
      try {
        await this.store.remove(name);
      } catch (err) {
        return internal<null>(`Failed to delete image ${name}`, err);
      }
      logger.info(`Deleted image ${name}`);
      return ok(null);
    });
  }

  async buildImage(name: string, host: string): Promise<OperationResult<ImageView>> {
    const target = this.resolve(name, host);
    if (!target.success) return target;
    const { image, connection } = target.data;

    try {
      await buildImage(image, connection);
    } catch (err) {
      return internal(`Failed to build image ${name}`, err);
    }
    return ok(image.toJSON());
  }

  /** Queue an image to run on `host`, building it there first when needed. */
  async runImage(name: string, host: string): Promise<OperationResult<ImageView>> {
    const target = this.resolve(name, host);
    if (!target.success) return target;
    const { image, connection } = target.data;

    try {
      const outcome = await dispatchRun(image, connection, this.now);
      if (outcome === "conflict") return fail("conflict", `Image ${name} is already running`);
    } catch (err) {
      return internal(`Failed to run image ${name}`, err);
    }
    return ok(image.toJSON());
  }

  async stopImage(name: string): Promise<OperationResult<ImageView>> {
    const { value: image, found } = this.images.load(name);
    if (!found) return notFound(new ImageNotFoundError(name));

    try {
      await stopRun(image, this.onContainerChange, this.now);
    } catch (err) {
      return internal(`Failed to stop container of image ${name}`, err);
    }
    return ok(image.toJSON());
  }

  // ---------------------------------------------------------------------------
  // Source files
  // ---------------------------------------------------------------------------

  async listFiles(name: string): Promise<OperationResult<SourceFile[]>> {
    if (!this.images.exists(name)) return notFound(new ImageNotFoundError(name));
    try {
      return ok(await this.store.listFiles(name));
    } catch (err) {
      return internal(`Failed to list files of image ${name}`, err);
    }
  }

  /** Write uploaded files into an image's source directory, replacing files of the same name. */
  async writeFiles(name: string, files: UploadedFile[]): Promise<OperationResult<SourceFile[]>> {
    const { value: image, found } = this.images.load(name);
    if (!found) return notFound(new ImageNotFoundError(name));

    const invalid = files.find((file) => !isValidFileName(file.name));
    if (invalid) return fail("invalid", new InvalidNameError("file", invalid.name).message);

    return image.lock.withWrite(async () => {
      try {
        for (const file of files) {
          await this.store.writeFile(name, file.name, file.data);
        }
        logger.info(`Wrote ${files.length} file(s) to image ${name}`);
        return ok(await this.store.listFiles(name));
      } catch (err) {
        return internal<SourceFile[]>(`Failed to write files to image ${name}`, err);
      }
    });
  }

  async readFile(name: string, file: string): Promise<OperationResult<FileContent>> {
    if (!this.images.exists(name)) return notFound(new ImageNotFoundError(name));
    if (!isValidFileName(file)) return fail("invalid", new InvalidNameError("file", file).message);

    try {
      return ok({ name: file, data: await this.store.readFile(name, file) });
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOENT" || code === "EISDIR") return fail("not_found", `File ${file} not found in image ${name}`);
      return internal(`Failed to read file ${file} of image ${name}`, err);
    }
  }

  async deleteFile(name: string, file: string): Promise<OperationResult<null>> {
    const { value: image, found } = this.images.load(name);
    if (!found) return notFound(new ImageNotFoundError(name));
    if (!isValidFileName(file)) return fail("invalid", new InvalidNameError("file", file).message);

    return image.lock.withWrite(async () => {
      try {
        await this.store.deleteFile(name, file);
      } catch (err) {
        if (errnoCode(err) === "ENOENT") return fail<null>("not_found", `File ${file} not found in image ${name}`);
        return internal<null>(`Failed to delete file ${file} of image ${name}`, err);
      }
      return ok(null);
    });
  }

  // ---------------------------------------------------------------------------
  // Hosts and history
  // ---------------------------------------------------------------------------

  listHosts(): OperationResult<HostView[]> {
    const hosts = this.connections
      .values()
      .map((connection) => connection.toJSON())
      .sort((a, b) => a.name.localeCompare(b.name));
    return ok(hosts);
  }

  /** Past containers of an image, newest first. Empty when history is disabled. */
  runHistory(name: string): OperationResult<RunHistoryEntry[]> {
    if (!this.images.exists(name)) return notFound(new ImageNotFoundError(name));
    if (!this.history) return ok([]);
    try {
      return ok(this.history.listForImage(name));
    } catch (err) {
      return internal(`Failed to read run history of image ${name}`, err);
    }
  }

  private resolve(
    name: string,
    host: string,
  ): OperationResult<{ image: ImageUnit; connection: HostConnection }> {
    const image = this.images.load(name);
    if (!image.found) return notFound(new ImageNotFoundError(name));
    const connection = this.connections.load(host);
    if (!connection.found) return notFound(new HostNotFoundError(host));
    return ok({ image: image.value, connection: connection.value });
  }

  private recordHistory(image: ImageUnit, record: ContainerRecord, host: string): void {
    if (!this.history) return;
    try {
      this.history.record(image.name, host, record);
    } catch (err) {
      logger.error(`Failed to record run history for image ${image.name}`, { err });
    }
  }
}

function notFound<T>(err: ImageNotFoundError | HostNotFoundError): OperationResult<T> {
  return fail("not_found", err.message);
}

/** Build errors already name the image and host; anything else gets `context` prepended. */
function internal<T>(context: string, err: unknown): OperationResult<T> {
  const message = err instanceof BuildError ? err.message : `${context}: ${describeError(err)}`;
  logger.error(message, { err });
  return fail("internal", message);
}
