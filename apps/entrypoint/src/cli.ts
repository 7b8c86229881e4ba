#!/usr/bin/env node
import { getEnv } from "../../common/src/env.js";
import { exitCodeForError, normalizeError } from "../../common/src/errors.js";
import { logger, setLogLevel } from "../../common/src/logger.js";
import { depsFromEnv, handoffArgv, planFromEnv, runEntrypoint } from "./entrypoint.js";

async function main(): Promise<void> {
  const env = getEnv();
  setLogLevel(env.LOG_LEVEL);

  const status = await runEntrypoint(
    handoffArgv(process.argv.slice(2)),
    planFromEnv(env),
    depsFromEnv(env),
  );
  process.exitCode = status;
}

main().catch((error) => {
  logger.error("entrypoint failed", {
    message: normalizeError(error),
  });
  process.exitCode = exitCodeForError(error);
});
