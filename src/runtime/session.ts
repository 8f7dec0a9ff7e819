import Docker from "dockerode";
import type { HostInfo } from "../config/hosts.js";
import { logger } from "../config/logger.js";
import { SessionError } from "../orchestrator/errors.js";
import { DockerRuntimeClient, dockerOptionsFor } from "./docker-runtime.js";
import type { RuntimeClient } from "./types.js";

export type SessionOpener = (name: string, host: HostInfo) => Promise<RuntimeClient>;

/** Open a runtime session for one configured host and check it answers. */
export const openSession: SessionOpener = async (name, host) => {
  let client: DockerRuntimeClient;
  try {
    client = new DockerRuntimeClient(new Docker(dockerOptionsFor(host)));
    await client.ping();
  } catch (err) {
    throw new SessionError(name, err);
  }
  logger.info(`Connected to server ${name}`, { protocol: host.protocol, host: host.host ?? host.socketPath });
  return client;
};
