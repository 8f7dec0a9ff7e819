import path from "node:path";
import type { ContainerRecord } from "./container-record.js";
import type { HostConnection } from "./host-connection.js";
import { RwLock } from "./rw-lock.js";
import type { ImageView } from "./types.js";

/** Directory inside an image's sources where run output is written. Never sent to the builder. */
export const LOG_DIR_NAME = ".logs";

/**
 * A named source directory and what has been built and run from it.
 *
 * All mutable fields are guarded by `lock`. The build id and the owning
 * connection are only ever set together, so one is present exactly when the
 * other is.
 */
export class ImageUnit {
  readonly name: string;
  readonly sourceDir: string;
  readonly lock = new RwLock();

  container: ContainerRecord | null = null;

  private _buildId: string | null = null;
  private _connection: HostConnection | null = null;

  constructor(name: string, sourceDir: string) {
    this.name = name;
    this.sourceDir = sourceDir;
  }

  get buildId(): string | null {
    return this._buildId;
  }

  /** Connection the current build lives on. */
  get connection(): HostConnection | null {
    return this._connection;
  }

  get logDir(): string {
    return path.join(this.sourceDir, LOG_DIR_NAME);
  }

  setBuild(buildId: string, connection: HostConnection): void {
    this._buildId = buildId;
    this._connection = connection;
  }

  clearContainer(): void {
    this.container?.closeSinks();
    this.container = null;
  }

  toJSON(): ImageView {
    return {
      name: this.name,
      id: this._buildId,
      connection: this._connection ? { name: this._connection.name } : null,
      container: this.container ? this.container.toJSON() : null,
    };
  }
}
