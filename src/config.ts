import { z } from "zod";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

// Unset and empty variables both take the default.
const fromEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema);

const EnvSchema = z.object({
  PORT: fromEnv(z.coerce.number().int().min(0).max(65535).default(3000)),
  DB_PATH: fromEnv(z.string().default("./data/ticketing.db")),
  LOG_LEVEL: fromEnv(z.enum(["debug", "info", "warn", "error", "silent"]).default("info")),
  // Upper bound for one encoded row, matching the storage page budget.
  MAX_ROW_BYTES: fromEnv(z.coerce.number().int().positive().default(1024)),
});

export interface Config {
  port: number;
  databasePath: string;
  logLevel: LogLevel;
  maxRowBytes: number;
}

/** Reads settings from the environment; throws naming every bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${problems}`);
  }

  const { PORT, DB_PATH, LOG_LEVEL, MAX_ROW_BYTES } = result.data;
  return {
    port: PORT,
    databasePath: DB_PATH,
    logLevel: LOG_LEVEL,
    maxRowBytes: MAX_ROW_BYTES,
  };
}

export const config = loadConfig(process.env);

export const API_CONFIG = {
  current: "v1",
  supported: ["v1"],
} as const;
