import { z } from "zod";

// --- Schemas ---

export const SqliteDatabaseSchema = z.object({
  provider: z.literal("sqlite"),
  /** Bare path or `Data Source=...;Mode=...`; relative paths resolve against the config file */
  connectionString: z.string().trim().min(1),
});

export const DatabaseConfigSchema = z.discriminatedUnion("provider", [
  SqliteDatabaseSchema,
]);

export const LoggingConfigSchema = z.object({
  /** Discard all log output (default: false) */
  silent: z.boolean().optional(),
});

/** Store configuration schema */
export const StoreConfigSchema = z.object({
  database: DatabaseConfigSchema,
  logging: LoggingConfigSchema.optional(),
});

// --- Inferred Types ---

export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
