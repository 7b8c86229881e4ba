#!/usr/bin/env node
import { databaseSettingsFromEnv, describeTarget, probeDatabase } from "../../common/src/db.js";
import { getEnv } from "../../common/src/env.js";
import { exitCodeForError, normalizeError } from "../../common/src/errors.js";
import { logger, setLogLevel } from "../../common/src/logger.js";
import { waitForDatabase, waitPolicyFromEnv } from "./readiness.js";

async function main(): Promise<void> {
  const env = getEnv();
  setLogLevel(env.LOG_LEVEL);

  const settings = databaseSettingsFromEnv(env);
  await waitForDatabase(() => probeDatabase(settings), waitPolicyFromEnv(env), {
    target: describeTarget(settings),
  });
}

main().catch((error) => {
  logger.error("wait for database failed", {
    message: normalizeError(error),
  });
  process.exitCode = exitCodeForError(error);
});
