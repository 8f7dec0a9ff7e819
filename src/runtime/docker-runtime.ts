import fs from "node:fs";
import { readdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable, type Writable } from "node:stream";
import { finished } from "node:stream/promises";
import Docker from "dockerode";
import { z } from "zod";
import type { HostInfo } from "../config/hosts.js";
import { logger } from "../config/logger.js";
import type { BuildRequest, ContainerState, CreateContainerRequest, RuntimeClient } from "./types.js";

/** One progress message from the build endpoint. Docker and Podman both emit `aux.ID` on success. */
const buildEventSchema = z
  .object({
    stream: z.string().optional(),
    error: z.string().optional(),
    errorDetail: z.object({ message: z.string().optional() }).optional(),
    aux: z.object({ ID: z.string().optional() }).optional(),
  })
  .passthrough();

type BuildEvent = z.infer<typeof buildEventSchema>;

const BUILT_LINE = /Successfully built ([0-9a-f]{12,64})/;

/** The runtime reports this for containers that never finished. */
const ZERO_TIME = "0001-01-01T00:00:00Z";

/** Extract the image id from build progress, or throw the first reported build error. */
export function buildIdFromEvents(events: unknown[]): string {
  let fromStream: string | null = null;
  let fromAux: string | null = null;

  for (const raw of events) {
    const parsed = buildEventSchema.safeParse(raw);
    if (!parsed.success) continue;
    const event: BuildEvent = parsed.data;

    if (event.error || event.errorDetail?.message) {
      throw new Error(event.error ?? event.errorDetail?.message);
    }
    if (event.aux?.ID) {
      fromAux = event.aux.ID;
    }
    const match = event.stream ? BUILT_LINE.exec(event.stream) : null;
    if (match) {
      fromStream = match[1];
    }
  }

  const id = fromAux ?? fromStream;
  if (!id) {
    throw new Error("Build finished without reporting an image id");
  }
  return id;
}

/** Relative paths of every file under `dir`, skipping the excluded top-level entries. */
export async function collectContextFiles(dir: string, exclude: string[] = []): Promise<string[]> {
  const files: string[] = [];

  async function walk(relative: string): Promise<void> {
    const entries = await readdir(path.join(dir, relative), { withFileTypes: true });
    for (const entry of entries) {
      const rel = relative ? `${relative}/${entry.name}` : entry.name;
      if (!relative && exclude.includes(entry.name)) continue;
      if (entry.isDirectory()) {
        await walk(rel);
      } else {
        files.push(rel);
      }
    }
  }

  await walk("");
  return files.sort();
}

function statusCodeOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
}

function parseRuntimeTime(value: string | undefined): Date | null {
  if (!value || value.startsWith(ZERO_TIME.slice(0, 10))) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function expandHome(file: string): string {
  return file === "~" || file.startsWith("~/") ? path.join(os.homedir(), file.slice(1)) : file;
}

/** Translate a host descriptor into dockerode connection options. */
export function dockerOptionsFor(host: HostInfo, readKey: (file: string) => Buffer = fs.readFileSync): Docker.DockerOptions {
  switch (host.protocol) {
    case "unix":
      return { socketPath: host.socketPath };
    case "ssh":
      return {
        protocol: "ssh",
        host: host.host,
        port: host.port ?? 22,
        username: host.username,
        sshOptions: host.identityFile ? { privateKey: readKey(expandHome(host.identityFile)) } : undefined,
      };
    default:
      return { protocol: host.protocol, host: host.host, port: host.port ?? (host.protocol === "https" ? 2376 : 2375) };
  }
}

/**
 * RuntimeClient over the Docker Engine API. Podman serves the same API, so
 * the same client drives either runtime.
 */
export class DockerRuntimeClient implements RuntimeClient {
  readonly docker: Docker;

  constructor(docker: Docker) {
    this.docker = docker;
  }

  async buildImage(request: BuildRequest): Promise<string> {
    const src = await collectContextFiles(request.contextDir, request.exclude);
    const stream = await this.docker.buildImage({ context: request.contextDir, src }, { t: request.tag, rm: true });

    const events = await new Promise<unknown[]>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null, output: unknown[]) => {
        if (err) reject(err);
        else resolve(output);
      });
    });

    return buildIdFromEvents(events);
  }

  async removeImage(id: string): Promise<void> {
    try {
      await this.docker.getImage(id).remove();
    } catch (err) {
      if (statusCodeOf(err) === 404) return;
      throw err;
    }
  }

  async createContainer(request: CreateContainerRequest): Promise<string> {
    const container = await this.docker.createContainer({ Image: request.image, name: request.name });
    return container.id;
  }

  async startContainer(id: string): Promise<void> {
    await this.docker.getContainer(id).start();
  }

  async stopContainer(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).stop({ t: 0 });
    } catch (err) {
      // 304: already stopped, 404: already gone
      const code = statusCodeOf(err);
      if (code === 304 || code === 404) return;
      throw err;
    }
  }

  async removeContainer(id: string, options: { volumes?: boolean } = {}): Promise<void> {
    try {
      await this.docker.getContainer(id).remove({ v: options.volumes ?? false, force: false });
    } catch (err) {
      if (statusCodeOf(err) === 404) return;
      throw err;
    }
  }

  async inspectContainer(id: string): Promise<ContainerState> {
    const info = await this.docker.getContainer(id).inspect();
    return {
      status: info.State.Status,
      startedAt: parseRuntimeTime(info.State.StartedAt),
      finishedAt: parseRuntimeTime(info.State.FinishedAt),
    };
  }

  async attachContainer(id: string, stdout: Writable, stderr: Writable, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const stream = await this.docker.getContainer(id).attach({ stream: true, stdout: true, stderr: true });
    this.docker.modem.demuxStream(stream, stdout, stderr);

    const detach = () => {
      if (stream instanceof Readable) stream.destroy();
    };
    if (signal?.aborted) {
      detach();
      signal.throwIfAborted();
    }
    signal?.addEventListener("abort", detach, { once: true });
    try {
      await finished(stream, { signal });
    } finally {
      signal?.removeEventListener("abort", detach);
    }
  }

  async ping(): Promise<void> {
    await this.docker.ping();
  }

  async close(): Promise<void> {
    // dockerode keeps no long-lived socket for unix/tcp hosts; ssh sessions are per request.
    logger.debug("Runtime client closed");
  }
}
