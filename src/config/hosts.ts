import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

/** Host names double as URL query values, so keep them to a safe alphabet. */
const hostNameRegex = /^[a-zA-Z0-9][a-zA-Z0-9_.-]{0,62}$/;

/** How the control process reaches one host's container runtime. */
export const hostInfoSchema = z
  .object({
    protocol: z.enum(["ssh", "http", "https", "unix"]).default("ssh"),
    host: z.string().min(1).optional(),
    port: z.coerce.number().int().min(1).max(65535).optional(),
    username: z.string().min(1).optional(),
    /** Credential reference: path of the private key used for ssh sessions. */
    identityFile: z.string().min(1).optional(),
    /** Runtime API socket (Docker or Podman) on the host. */
    socketPath: z.string().min(1).optional(),
  })
  .superRefine((info, ctx) => {
    if (info.protocol === "unix" && !info.socketPath) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "socketPath is required for unix hosts" });
    }
    if (info.protocol !== "unix" && !info.host) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `host is required for ${info.protocol} hosts` });
    }
    if (info.protocol === "ssh" && !info.username) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "username is required for ssh hosts" });
    }
  });

export type HostInfo = z.infer<typeof hostInfoSchema>;

export const hostsConfigSchema = z.object({
  /** Root directory holding one subdirectory per image. */
  internalDir: z.string().min(1),
  servers: z.record(z.string().regex(hostNameRegex, "Invalid host name"), hostInfoSchema).default({}),
});

export type HostsConfig = z.infer<typeof hostsConfigSchema>;

export class ConfigError extends Error {
  readonly name = "ConfigError" as const;
}

/**
 * Parse and validate a hosts file. `internalDir` is resolved against `baseDir`
 * when relative.
 */
export function parseHostsConfig(content: string, source: string, baseDir: string): HostsConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in "${source}": ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = hostsConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid hosts config "${source}": ${result.error.message}`);
  }

  return { ...result.data, internalDir: path.resolve(baseDir, result.data.internalDir) };
}

/** Load the hosts file and check that the image root is a readable directory. */
export function loadHostsConfig(file: string): HostsConfig {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read hosts config "${file}": ${err instanceof Error ? err.message : String(err)}`);
  }

  const hostsConfig = parseHostsConfig(content, file, path.dirname(path.resolve(file)));

  try {
    fs.accessSync(hostsConfig.internalDir, fs.constants.R_OK);
    if (!fs.statSync(hostsConfig.internalDir).isDirectory()) {
      throw new Error("not a directory");
    }
  } catch (err) {
    throw new ConfigError(
      `Image root "${hostsConfig.internalDir}" is not a readable directory: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return hostsConfig;
}
