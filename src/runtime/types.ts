import type { Writable } from "node:stream";

export interface BuildRequest {
  /** Directory sent to the builder as the build context. */
  contextDir: string;
  /** Tag applied to the built image. */
  tag: string;
  /** Top-level entries of the context directory that are not sent. */
  exclude?: string[];
}

export interface CreateContainerRequest {
  /** Build identifier the container is created from. */
  image: string;
  name: string;
}

/** Container state as reported by the runtime. */
export interface ContainerState {
  /** "running", "exited", or any other runtime-specific state. */
  status: string;
  startedAt: Date | null;
  finishedAt: Date | null;
}

/**
 * Operations the orchestrator needs from one host's container runtime.
 * One instance is bound to one host session for the life of the process.
 *
 * Removal and stop calls treat "no such object" as success.
 */
export interface RuntimeClient {
  /** Build an image from a source directory and return its identifier. */
  buildImage(request: BuildRequest): Promise<string>;

  removeImage(id: string): Promise<void>;

  /** Create a container and return the runtime-assigned id. */
  createContainer(request: CreateContainerRequest): Promise<string>;

  startContainer(id: string): Promise<void>;

  /** Stop with no grace period. */
  stopContainer(id: string): Promise<void>;

  removeContainer(id: string, options?: { volumes?: boolean }): Promise<void>;

  inspectContainer(id: string): Promise<ContainerState>;

  /**
   * Attach to a container's output and copy it into the given sinks.
   * Resolves when the remote stream ends. Aborting `signal` drops the
   * attachment and rejects; the container itself keeps running.
   */
  attachContainer(id: string, stdout: Writable, stderr: Writable, signal?: AbortSignal): Promise<void>;

  /** Check that the session is alive. */
  ping(): Promise<void>;

  close(): Promise<void>;
}
