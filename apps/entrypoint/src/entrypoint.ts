import { databaseSettingsFromEnv, describeTarget, probeDatabase } from "../../common/src/db.js";
import type { AppEnv } from "../../common/src/env.js";
import { UsageError } from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";
import { createStepRunner, parseCommandLine, type StepRunner } from "./command.js";
import { handOff } from "./handoff.js";
import { waitForDatabase, waitPolicyFromEnv, type DatabaseProbe } from "./readiness.js";
import type { Sleep, WaitPolicy } from "./retry.js";

export interface EntrypointPlan {
  migrateCommand: string[] | null;
  seedCommand: string[] | null;
  waitPolicy: WaitPolicy;
  target: string;
}

export interface EntrypointDeps {
  probe: DatabaseProbe;
  runStep: StepRunner;
  handOff: (argv: string[]) => Promise<number>;
  sleep?: Sleep;
  signal?: AbortSignal;
}

/** A leading `--` separates entrypoint arguments from the application's. */
export function handoffArgv(rawArgs: string[]): string[] {
  return rawArgs[0] === "--" ? rawArgs.slice(1) : rawArgs;
}

export function planFromEnv(env: AppEnv): EntrypointPlan {
  const migrateCommand = parseCommandLine(env.MIGRATE_COMMAND);
  const seedCommand = parseCommandLine(env.SEED_COMMAND);

  return {
    migrateCommand: env.SKIP_MIGRATIONS || migrateCommand.length === 0 ? null : migrateCommand,
    seedCommand: env.SKIP_SEED || seedCommand.length === 0 ? null : seedCommand,
    waitPolicy: waitPolicyFromEnv(env),
    target: describeTarget(databaseSettingsFromEnv(env)),
  };
}

export function depsFromEnv(env: AppEnv): EntrypointDeps {
  const settings = databaseSettingsFromEnv(env);
  return {
    probe: () => probeDatabase(settings),
    runStep: createStepRunner(),
    handOff: (argv) => handOff(argv),
  };
}

/**
 * Readiness gate, migrations, seed, then handoff. Resolves with the exit
 * status of the application; a failed step rejects with StepFailedError and
 * nothing after it runs.
 */
export async function runEntrypoint(
  argv: string[],
  plan: EntrypointPlan,
  deps: EntrypointDeps,
): Promise<number> {
  if (argv.length === 0) {
    throw new UsageError("usage: pg-entrypoint <command> [args...]");
  }

  await waitForDatabase(deps.probe, plan.waitPolicy, {
    sleep: deps.sleep,
    signal: deps.signal,
    target: plan.target,
  });

  if (plan.migrateCommand) {
    await deps.runStep("migrations", plan.migrateCommand);
  } else {
    logger.info("migrations skipped");
  }

  if (plan.seedCommand) {
    await deps.runStep("seed", plan.seedCommand);
  } else {
    logger.info("seed skipped");
  }

  logger.info("starting application", { argv });
  return deps.handOff(argv);
}
