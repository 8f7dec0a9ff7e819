import { z } from "zod";

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3003),
  host: z.string().min(1).default("127.0.0.1"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Path of the YAML file describing the image root and the container hosts. */
  hostsFile: z.string().min(1).default("./config.yaml"),

  /** How often the status reconciler polls running containers. */
  reconcileIntervalMs: z.coerce.number().int().min(100).default(2000),

  /** SQLite file for run history. History is disabled when unset. */
  dbPath: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

/** Parse process settings from an environment map. Throws a ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    hostsFile: env.MAESTRO_CONFIG,
    reconcileIntervalMs: env.RECONCILE_INTERVAL_MS,
    dbPath: env.MAESTRO_DB_PATH || undefined,
  });
}
