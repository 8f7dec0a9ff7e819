import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";
import type Docker from "dockerode";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildIdFromEvents, collectContextFiles, DockerRuntimeClient, dockerOptionsFor } from "./docker-runtime.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

// --- Mock helpers ---

function statusError(statusCode: number, message = "runtime error") {
  return Object.assign(new Error(message), { statusCode });
}

function mockContainer(overrides: Record<string, unknown> = {}) {
  return {
    id: "c-123",
    start: vi.fn().mockResolvedValue(undefined),
    stop: vi.fn().mockResolvedValue(undefined),
    remove: vi.fn().mockResolvedValue(undefined),
    inspect: vi.fn().mockResolvedValue({
      Id: "c-123",
      State: {
        Status: "exited",
        StartedAt: "2026-01-01T00:00:00Z",
        FinishedAt: "2026-01-01T00:05:00Z",
      },
    }),
    attach: vi.fn(),
    ...overrides,
  };
}

function mockDocker(container = mockContainer(), buildOutput: unknown[] = [{ aux: { ID: "sha256:abc" } }]) {
  const image = { remove: vi.fn().mockResolvedValue(undefined) };
  return {
    image,
    buildImage: vi.fn().mockResolvedValue("build-stream"),
    getImage: vi.fn().mockReturnValue(image),
    createContainer: vi.fn().mockResolvedValue(container),
    getContainer: vi.fn().mockReturnValue(container),
    ping: vi.fn().mockResolvedValue("OK"),
    modem: {
      followProgress: vi.fn((_stream: unknown, cb: (err: Error | null, output: unknown[]) => void) =>
        cb(null, buildOutput),
      ),
      demuxStream: vi.fn((stream: PassThrough) => stream.resume()),
    },
  };
}

describe("buildIdFromEvents", () => {
  it("prefers the aux image id", () => {
    const id = buildIdFromEvents([
      { stream: "Step 1/2 : FROM alpine\n" },
      { stream: "Successfully built 0123456789ab\n" },
      { aux: { ID: "sha256:feedface" } },
    ]);
    expect(id).toBe("sha256:feedface");
  });

  it("falls back to the 'Successfully built' line", () => {
    expect(buildIdFromEvents([{ stream: "Successfully built 0123456789ab\n" }])).toBe("0123456789ab");
  });

  it("throws the first reported error", () => {
    expect(() =>
      buildIdFromEvents([{ stream: "Step 1/2\n" }, { error: "COPY failed: no such file", errorDetail: {} }]),
    ).toThrow("COPY failed: no such file");
  });

  it("throws when no id was reported", () => {
    expect(() => buildIdFromEvents([{ stream: "Step 1/1\n" }])).toThrow("Build finished without reporting an image id");
  });

  it("skips values that are not progress objects", () => {
    expect(buildIdFromEvents(["garbage", null, { aux: { ID: "sha256:1" } }])).toBe("sha256:1");
  });
});

describe("collectContextFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "maestro-ctx-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("lists nested files and skips excluded top-level entries", async () => {
    fs.writeFileSync(path.join(dir, "Dockerfile"), "FROM alpine\n");
    fs.mkdirSync(path.join(dir, "app"));
    fs.writeFileSync(path.join(dir, "app", "main.py"), "print('hi')\n");
    fs.mkdirSync(path.join(dir, ".logs"));
    fs.writeFileSync(path.join(dir, ".logs", "run.stdout.log"), "old output\n");

    await expect(collectContextFiles(dir, [".logs"])).resolves.toEqual(["Dockerfile", "app/main.py"]);
  });
});

describe("dockerOptionsFor", () => {
  it("uses the socket path for unix hosts", () => {
    expect(dockerOptionsFor({ protocol: "unix", socketPath: "/var/run/docker.sock" })).toEqual({
      socketPath: "/var/run/docker.sock",
    });
  });

  it("reads the identity file for ssh hosts", () => {
    const readKey = vi.fn().mockReturnValue(Buffer.from("test-key"));
    const options = dockerOptionsFor(
      { protocol: "ssh", host: "build-1.internal", username: "builder", identityFile: "/keys/id" },
      readKey,
    );

    expect(readKey).toHaveBeenCalledWith("/keys/id");
    expect(options).toEqual({
      protocol: "ssh",
      host: "build-1.internal",
      port: 22,
      username: "builder",
      sshOptions: { privateKey: Buffer.from("test-key") },
    });
  });

  it("defaults the tcp port by protocol", () => {
    expect(dockerOptionsFor({ protocol: "http", host: "h" })).toEqual({ protocol: "http", host: "h", port: 2375 });
    expect(dockerOptionsFor({ protocol: "https", host: "h", port: 9443 })).toEqual({
      protocol: "https",
      host: "h",
      port: 9443,
    });
  });
});

describe("DockerRuntimeClient", () => {
  let dir: string;
  let container: ReturnType<typeof mockContainer>;
  let docker: ReturnType<typeof mockDocker>;
  let client: DockerRuntimeClient;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "maestro-build-"));
    container = mockContainer();
    docker = mockDocker(container);
    client = new DockerRuntimeClient(docker as unknown as Docker);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("builds from the context directory and returns the image id", async () => {
    fs.writeFileSync(path.join(dir, "Dockerfile"), "FROM alpine\n");

    const id = await client.buildImage({ contextDir: dir, tag: "maestro/demo:latest", exclude: [".logs"] });

    expect(id).toBe("sha256:abc");
    expect(docker.buildImage).toHaveBeenCalledWith(
      { context: dir, src: ["Dockerfile"] },
      { t: "maestro/demo:latest", rm: true },
    );
  });

  it("rejects when the build stream fails", async () => {
    docker.modem.followProgress.mockImplementationOnce((_s: unknown, cb: (err: Error | null, o: unknown[]) => void) =>
      cb(new Error("connection reset"), []),
    );

    await expect(client.buildImage({ contextDir: dir, tag: "t" })).rejects.toThrow("connection reset");
  });

  it("treats a missing image as removed", async () => {
    docker.image.remove.mockRejectedValueOnce(statusError(404));
    await expect(client.removeImage("sha256:gone")).resolves.toBeUndefined();
  });

  it("propagates other image removal failures", async () => {
    docker.image.remove.mockRejectedValueOnce(statusError(409, "image is in use"));
    await expect(client.removeImage("sha256:busy")).rejects.toThrow("image is in use");
  });

  it("creates a container from the build id", async () => {
    await expect(client.createContainer({ image: "sha256:abc", name: "demo-1" })).resolves.toBe("c-123");
    expect(docker.createContainer).toHaveBeenCalledWith({ Image: "sha256:abc", name: "demo-1" });
  });

  it("stops without a grace period and ignores already-stopped containers", async () => {
    await client.stopContainer("c-123");
    expect(container.stop).toHaveBeenCalledWith({ t: 0 });

    container.stop.mockRejectedValueOnce(statusError(304));
    await expect(client.stopContainer("c-123")).resolves.toBeUndefined();

    container.stop.mockRejectedValueOnce(statusError(404));
    await expect(client.stopContainer("c-123")).resolves.toBeUndefined();

    container.stop.mockRejectedValueOnce(statusError(500, "daemon error"));
    await expect(client.stopContainer("c-123")).rejects.toThrow("daemon error");
  });

  it("removes containers with their volumes on request and ignores missing ones", async () => {
    await client.removeContainer("c-123", { volumes: true });
    expect(container.remove).toHaveBeenCalledWith({ v: true, force: false });

    container.remove.mockRejectedValueOnce(statusError(404));
    await expect(client.removeContainer("c-123")).resolves.toBeUndefined();
  });

  it("maps inspect output to a container state", async () => {
    await expect(client.inspectContainer("c-123")).resolves.toEqual({
      status: "exited",
      startedAt: new Date("2026-01-01T00:00:00Z"),
      finishedAt: new Date("2026-01-01T00:05:00Z"),
    });
  });

  it("reports a zero finish time as null", async () => {
    container.inspect.mockResolvedValueOnce({
      State: { Status: "running", StartedAt: "2026-01-01T00:00:00Z", FinishedAt: "0001-01-01T00:00:00Z" },
    });

    const state = await client.inspectContainer("c-123");
    expect(state.status).toBe("running");
    expect(state.finishedAt).toBeNull();
  });

  it("copies attached output until the stream ends", async () => {
    const stream = new PassThrough();
    container.attach.mockResolvedValueOnce(stream);
    const stdout = new PassThrough();
    const stderr = new PassThrough();

    let done = false;
    const attached = client.attachContainer("c-123", stdout, stderr).then(() => {
      done = true;
    });
    await new Promise<void>((resolve) => setImmediate(resolve));
    expect(container.attach).toHaveBeenCalledWith({ stream: true, stdout: true, stderr: true });
    expect(docker.modem.demuxStream).toHaveBeenCalledWith(stream, stdout, stderr);
    expect(done).toBe(false);

    stream.end();
    await attached;
    expect(done).toBe(true);
  });

  it("drops the attachment when the signal aborts", async () => {
    const stream = new PassThrough();
    container.attach.mockResolvedValueOnce(stream);
    const controller = new AbortController();

    const attached = client.attachContainer("c-123", new PassThrough(), new PassThrough(), controller.signal);
    await vi.waitFor(() => expect(docker.modem.demuxStream).toHaveBeenCalled());
    controller.abort();

    await expect(attached).rejects.toMatchObject({ name: "AbortError" });
    expect(stream.destroyed).toBe(true);
  });

  it("does not attach when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      client.attachContainer("c-123", new PassThrough(), new PassThrough(), controller.signal),
    ).rejects.toMatchObject({ name: "AbortError" });
    expect(container.attach).not.toHaveBeenCalled();
  });

  it("ping delegates to the runtime", async () => {
    await client.ping();
    expect(docker.ping).toHaveBeenCalled();
  });
});
