import { index, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * One row per container a host worker created. Rows are upserted on every
 * status change, so a row always holds the latest known status.
 */
export const containers = sqliteTable(
  "containers",
  {
    /** Runtime-assigned container id */
    id: text("id").primaryKey(),
    /** Image the container was created from */
    imageName: text("image_name").notNull(),
    /** Host the container runs on */
    host: text("host").notNull(),
    /** Container name on the host */
    name: text("name").notNull(),
    /** running | error | stopped | finished */
    status: text("status").notNull(),
    /** ISO 8601 */
    createdAt: text("created_at").notNull(),
    /** ISO 8601, null until the container stops or finishes */
    finishedAt: text("finished_at"),
    /** ISO 8601 */
    updatedAt: text("updated_at").notNull(),
  },
  (table) => [index("idx_containers_image").on(table.imageName, table.createdAt)],
);
