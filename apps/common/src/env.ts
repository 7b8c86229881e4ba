import "dotenv/config";
import { z } from "zod";

function booleanFlag(defaultValue: boolean) {
  return z.preprocess((value) => {
    if (value === undefined || value === null || value === "") {
      return defaultValue;
    }

    if (typeof value === "boolean") {
      return value;
    }

    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (["1", "true", "yes", "on"].includes(normalized)) {
        return true;
      }
      if (["0", "false", "no", "off"].includes(normalized)) {
        return false;
      }
    }

    return value;
  }, z.boolean());
}

function optionalString() {
  return z.preprocess(
    (value) => {
      if (typeof value === "string" && value.trim() === "") {
        return undefined;
      }
      return value;
    },
    z.string().optional(),
  );
}

// Largest delay setTimeout accepts; anything above fires after 1 ms.
export const MAX_TIMER_MS = 2_147_483_647;

const EnvSchema = z.object({
  DATABASE_URL: optionalString(),
  DB_HOST: z.string().min(1).default("db"),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  POSTGRES_USER: z.string().min(1).default("user"),
  POSTGRES_PASSWORD: z.string().default("password"),
  POSTGRES_DB: z.string().min(1).default("flight_booking"),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(5000),
  DB_WAIT_INTERVAL_MS: z.coerce.number().int().min(0).max(MAX_TIMER_MS).default(2000),
  DB_WAIT_MAX_ATTEMPTS: z.coerce.number().int().min(0).default(0),
  DB_WAIT_BACKOFF_FACTOR: z.coerce.number().min(1).default(1),
  DB_WAIT_MAX_INTERVAL_MS: z.coerce.number().int().min(0).max(MAX_TIMER_MS).default(30000),
  MIGRATE_COMMAND: z.string().default("alembic upgrade head"),
  SEED_COMMAND: z.string().default("python fill_data.py"),
  SKIP_MIGRATIONS: booleanFlag(false),
  SKIP_SEED: booleanFlag(false),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type AppEnv = z.infer<typeof EnvSchema>;

let cachedEnv: AppEnv | null = null;

export function parseEnv(source: NodeJS.ProcessEnv): AppEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(
      `Invalid environment variables: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ")}`,
    );
  }
  return parsed.data;
}

export function getEnv(): AppEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}

export function resetEnvForTests(): void {
  cachedEnv = null;
}
