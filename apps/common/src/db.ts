import pg, { type ClientConfig } from "pg";
import type { AppEnv } from "./env.js";
import { normalizeError } from "./errors.js";
import { logger } from "./logger.js";

export interface DatabaseSettings {
  connectionString?: string;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  connectTimeoutMs: number;
}

export function databaseSettingsFromEnv(env: AppEnv): DatabaseSettings {
  return {
    connectionString: env.DATABASE_URL,
    host: env.DB_HOST,
    port: env.DB_PORT,
    user: env.POSTGRES_USER,
    password: env.POSTGRES_PASSWORD,
    database: env.POSTGRES_DB,
    connectTimeoutMs: env.DB_CONNECT_TIMEOUT_MS,
  };
}

export function toClientConfig(settings: DatabaseSettings): ClientConfig {
  if (settings.connectionString) {
    return {
      connectionString: settings.connectionString,
      connectionTimeoutMillis: settings.connectTimeoutMs,
    };
  }

  return {
    host: settings.host,
    port: settings.port,
    user: settings.user,
    password: settings.password,
    database: settings.database,
    connectionTimeoutMillis: settings.connectTimeoutMs,
  };
}

/** Target description safe for logs: never includes the password. */
export function describeTarget(settings: DatabaseSettings): string {
  if (settings.connectionString) {
    try {
      const url = new URL(settings.connectionString);
      const database = url.pathname.replace(/^\//, "");
      return `${url.hostname}:${url.port || "5432"}/${database}`;
    } catch {
      return "DATABASE_URL";
    }
  }
  return `${settings.host}:${String(settings.port)}/${settings.database}`;
}

export interface ProbeClient {
  connect(): Promise<void>;
  query(sql: string): Promise<unknown>;
  end(): Promise<void>;
}

export type ClientFactory = (config: ClientConfig) => ProbeClient;

const defaultClientFactory: ClientFactory = (config) => new pg.Client(config);

export async function probeDatabase(
  settings: DatabaseSettings,
  createClient: ClientFactory = defaultClientFactory,
): Promise<void> {
  const client = createClient(toClientConfig(settings));
  try {
    await client.connect();
    await client.query("SELECT 1");
  } finally {
    await client.end().catch((error: unknown) => {
      logger.debug("probe client close failed", { error: normalizeError(error) });
    });
  }
}
