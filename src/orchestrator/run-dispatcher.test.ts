import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeRuntimeClient } from "../test/fake-runtime.js";
import { ContainerRecord } from "./container-record.js";
import { BuildError } from "./errors.js";
import { HostConnection } from "./host-connection.js";
import { ImageUnit } from "./image-unit.js";
import { QueueClosedError } from "./rendezvous-queue.js";
import { dispatchRun, stopRun } from "./run-dispatcher.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const NOW = new Date("2026-03-01T12:00:00.000Z");
const now = () => NOW;

function runningRecord(id = "ctr-7"): ContainerRecord {
  return new ContainerRecord({ id, name: "demo-run", status: "running", createdAt: new Date(0) });
}

describe("run dispatcher", () => {
  let root: string;
  let r1: FakeRuntimeClient;
  let r2: FakeRuntimeClient;
  let h1: HostConnection;
  let h2: HostConnection;
  let image: ImageUnit;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "maestro-dispatch-"));
    r1 = new FakeRuntimeClient();
    r2 = new FakeRuntimeClient();
    h1 = new HostConnection("h1", { protocol: "unix", socketPath: "/run/h1.sock" }, r1, { now });
    h2 = new HostConnection("h2", { protocol: "unix", socketPath: "/run/h2.sock" }, r2, { now });
    image = new ImageUnit("demo", path.join(root, "demo"));
  });

  afterEach(async () => {
    await h1.shutdown();
    await h2.shutdown();
    await rm(root, { recursive: true, force: true });
  });

  describe("dispatchRun", () => {
    it("builds an image with no build, then hands it to the worker", async () => {
      r1.buildIds.push("img-1");
      void h1.startWorker();

      await expect(dispatchRun(image, h1, now)).resolves.toBe("queued");
      await vi.waitFor(() => expect(image.container?.status).toBe("running"));

      expect(image.buildId).toBe("img-1");
      expect(r1.callsTo("createContainer")).toEqual([[{ image: "img-1", name: "demo-20260301-120000-000" }]]);
    });

    it("does not rebuild when the image is already built on the connection", async () => {
      image.setBuild("img-1", h1);
      void h1.startWorker();

      await dispatchRun(image, h1, now);
      await vi.waitFor(() => expect(image.container?.status).toBe("running"));

      expect(r1.callsTo("buildImage")).toHaveLength(0);
    });

    it("rebuilds on the requested host when the build lives elsewhere", async () => {
      image.setBuild("img-1", h1);
      r2.buildIds.push("img-2");
      void h2.startWorker();

      await dispatchRun(image, h2, now);
      await vi.waitFor(() => expect(image.container?.status).toBe("running"));

      expect(r1.callsTo("removeImage")).toEqual([["img-1"]]);
      expect(image.connection).toBe(h2);
      expect(r2.callsTo("createContainer")).toEqual([[{ image: "img-2", name: "demo-20260301-120000-000" }]]);
    });

    it("reports a conflict for a running image and queues nothing", async () => {
      image.setBuild("img-1", h1);
      const record = runningRecord();
      image.container = record;

      await expect(dispatchRun(image, h1, now)).resolves.toBe("conflict");

      expect(image.container).toBe(record);
      expect(r1.calls).toHaveLength(0);
    });

    it("reports a conflict for an image whose run is still queued", async () => {
      image.setBuild("img-1", h1);
      image.container = ContainerRecord.waiting(NOW);

      await expect(dispatchRun(image, h1, now)).resolves.toBe("conflict");
      expect(r1.calls).toHaveLength(0);
    });

    it("runs a finished image again", async () => {
      image.setBuild("img-1", h1);
      image.container = new ContainerRecord({ id: "ctr-7", name: "old", status: "finished", createdAt: new Date(0) });
      void h1.startWorker();

      await expect(dispatchRun(image, h1, now)).resolves.toBe("queued");
      await vi.waitFor(() => expect(image.container?.id).toBe("ctr-1"));
    });

    it("creates at most one container for concurrent runs", async () => {
      r1.buildIds.push("img-1");
      void h1.startWorker();

      const outcomes = await Promise.all([dispatchRun(image, h1, now), dispatchRun(image, h1, now)]);
      await vi.waitFor(() => expect(image.container?.status).toBe("running"));

      expect(outcomes.sort()).toEqual(["conflict", "queued"]);
      expect(r1.callsTo("buildImage")).toHaveLength(1);
      expect(r1.callsTo("createContainer")).toHaveLength(1);
    });

    it("propagates a failed implicit build and leaves the image unqueued", async () => {
      r1.failOn("buildImage");

      await expect(dispatchRun(image, h1, now)).rejects.toBeInstanceOf(BuildError);

      expect(image.container).toBeNull();
      expect(image.buildId).toBeNull();
    });

    it("restores the previous container when the connection is shutting down", async () => {
      image.setBuild("img-1", h1);
      const previous = new ContainerRecord({ id: "ctr-7", name: "old", status: "finished", createdAt: new Date(0) });
      image.container = previous;
      await h1.shutdown();

      await expect(dispatchRun(image, h1, now)).rejects.toBeInstanceOf(QueueClosedError);
      expect(image.container).toBe(previous);
    });
  });

  describe("stopRun", () => {
    it("is a no-op for an image that was never built or run", async () => {
      await stopRun(image);
      await stopRun(image);

      expect(image.container).toBeNull();
    });

    it("is a no-op when the image has no container", async () => {
      image.setBuild("img-1", h1);

      await stopRun(image);
      await stopRun(image);

      expect(r1.calls).toHaveLength(0);
    });

    it("stops a running container, marks it stopped and clears it", async () => {
      image.setBuild("img-1", h1);
      const record = runningRecord();
      image.container = record;
      const onChange = vi.fn();

      await stopRun(image, onChange, now);

      expect(r1.callsTo("stopContainer")).toEqual([["ctr-7"]]);
      expect(record.status).toBe("stopped");
      expect(record.finishedAt).toEqual(NOW);
      expect(onChange).toHaveBeenCalledWith(image, record, "h1");
      expect(image.container).toBeNull();
    });

    it("cancels a queued run without contacting the host", async () => {
      image.setBuild("img-1", h1);
      image.container = ContainerRecord.waiting(NOW);

      await stopRun(image, undefined, now);

      expect(image.container).toBeNull();
      expect(r1.calls).toHaveLength(0);
    });

    it("clears the container even when the runtime refuses to stop it", async () => {
      image.setBuild("img-1", h1);
      const record = runningRecord();
      image.container = record;
      r1.failOn("stopContainer", new Error("daemon unavailable"));

      await expect(stopRun(image, undefined, now)).rejects.toThrow("daemon unavailable");

      expect(image.container).toBeNull();
      expect(record.status).toBe("stopped");
    });

    it("keeps the status of a container that already finished", async () => {
      image.setBuild("img-1", h1);
      const finishedAt = new Date("2026-03-01T11:00:00.000Z");
      const record = new ContainerRecord({ id: "ctr-7", name: "old", status: "running", createdAt: new Date(0) });
      record.markFinished(finishedAt);
      image.container = record;
      const onChange = vi.fn();

      await stopRun(image, onChange, now);

      expect(record.status).toBe("finished");
      expect(record.finishedAt).toEqual(finishedAt);
      expect(onChange).not.toHaveBeenCalled();
      expect(image.container).toBeNull();
    });
  });
});
