import { EventEmitter } from "node:events";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { parseEnv } from "../apps/common/src/env.js";
import { StepFailedError, UsageError } from "../apps/common/src/errors.js";
import { createStepRunner } from "../apps/entrypoint/src/command.js";
import {
  handoffArgv,
  planFromEnv,
  runEntrypoint,
  type EntrypointDeps,
  type EntrypointPlan,
} from "../apps/entrypoint/src/entrypoint.js";
import { handOff } from "../apps/entrypoint/src/handoff.js";
import { scriptedSpawner } from "./fake-child.js";

const plan: EntrypointPlan = planFromEnv(parseEnv({}));

function recordingDeps(overrides: Partial<EntrypointDeps> = {}) {
  const events: string[] = [];
  const deps: EntrypointDeps = {
    probe: async () => {
      events.push("probe");
    },
    runStep: async (name, argv) => {
      events.push(`${name}:${argv.join(" ")}`);
    },
    handOff: async (argv) => {
      events.push(`handoff:${argv.join(" ")}`);
      return 0;
    },
    sleep: async () => undefined,
    ...overrides,
  };
  return { events, deps };
}

describe("planFromEnv", () => {
  it("splits the default commands", () => {
    expect(plan.migrateCommand).toEqual(["alembic", "upgrade", "head"]);
    expect(plan.seedCommand).toEqual(["python", "fill_data.py"]);
    expect(plan.target).toBe("db:5432/flight_booking");
    expect(plan.waitPolicy).toEqual({ maxAttempts: 0, intervalMs: 2000, backoffFactor: 1, maxIntervalMs: 30000 });
  });

  it("drops skipped or blank steps", () => {
    const skipped = planFromEnv(parseEnv({ SKIP_MIGRATIONS: "true", SEED_COMMAND: " " }));

    expect(skipped.migrateCommand).toBeNull();
    expect(skipped.seedCommand).toBeNull();
  });
});

describe("handoffArgv", () => {
  it("strips a leading separator only", () => {
    expect(handoffArgv(["--", "uvicorn", "--", "x"])).toEqual(["uvicorn", "--", "x"]);
    expect(handoffArgv(["uvicorn", "app:main"])).toEqual(["uvicorn", "app:main"]);
  });
});

describe("runEntrypoint", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  it("waits, migrates, seeds, then hands off in order", async () => {
    const { events, deps } = recordingDeps();

    const status = await runEntrypoint(["uvicorn", "app:main"], plan, deps);

    expect(status).toBe(0);
    expect(events).toEqual([
      "probe",
      "migrations:alembic upgrade head",
      "seed:python fill_data.py",
      "handoff:uvicorn app:main",
    ]);
  });

  it("proceeds after the database becomes reachable", async () => {
    let attempts = 0;
    const { events, deps } = recordingDeps({
      probe: async () => {
        attempts += 1;
        if (attempts < 4) {
          throw new Error("the database system is starting up");
        }
      },
    });

    await runEntrypoint(["uvicorn", "app:main"], plan, deps);

    expect(attempts).toBe(4);
    expect(events).toEqual([
      "migrations:alembic upgrade head",
      "seed:python fill_data.py",
      "handoff:uvicorn app:main",
    ]);
  });

  it("never seeds or hands off when migrations fail", async () => {
    const { events, deps } = recordingDeps({
      runStep: async (name) => {
        events.push(name);
        if (name === "migrations") {
          throw new StepFailedError(name, 2, "exited with 2");
        }
      },
    });

    const error = await runEntrypoint(["uvicorn", "app:main"], plan, deps).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StepFailedError);
    expect(error).toMatchObject({ exitCode: 2 });
    expect(events).toEqual(["probe", "migrations"]);
  });

  it("does not hand off when the seed fails", async () => {
    const { events, deps } = recordingDeps({
      runStep: async (name) => {
        events.push(name);
        if (name === "seed") {
          throw new StepFailedError(name, 5, "exited with 5");
        }
      },
    });

    await expect(runEntrypoint(["uvicorn", "app:main"], plan, deps)).rejects.toMatchObject({ exitCode: 5 });
    expect(events).toEqual(["probe", "migrations", "seed"]);
  });

  it("skips steps the plan leaves out", async () => {
    const { events, deps } = recordingDeps();

    await runEntrypoint(["uvicorn", "app:main"], { ...plan, migrateCommand: null, seedCommand: null }, deps);

    expect(events).toEqual(["probe", "handoff:uvicorn app:main"]);
  });

  it("refuses to start without a command", async () => {
    const { events, deps } = recordingDeps();

    await expect(runEntrypoint([], plan, deps)).rejects.toBeInstanceOf(UsageError);
    expect(events).toEqual([]);
  });

  it("hands `uvicorn app:main` off unchanged after real step runs", async () => {
    const spawner = scriptedSpawner([(child) => child.exit(0), (child) => child.exit(0), (child) => child.exit(0)]);
    const signals = new EventEmitter();

    const status = await runEntrypoint(["uvicorn", "app:main"], plan, {
      probe: async () => undefined,
      runStep: createStepRunner(spawner),
      handOff: (argv) => handOff(argv, { spawner, signals }),
    });

    expect(status).toBe(0);
    expect(spawner.calls.map(({ command, args }) => [command, ...args])).toEqual([
      ["alembic", "upgrade", "head"],
      ["python", "fill_data.py"],
      ["uvicorn", "app:main"],
    ]);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
  });

  it("stops at a failing migration with real step runs", async () => {
    const spawner = scriptedSpawner([(child) => child.exit(1)]);

    await expect(
      runEntrypoint(["uvicorn", "app:main"], plan, {
        probe: async () => undefined,
        runStep: createStepRunner(spawner),
        handOff: (argv) => handOff(argv, { spawner, signals: new EventEmitter() }),
      }),
    ).rejects.toMatchObject({ step: "migrations", exitCode: 1 });
    expect(spawner.calls).toHaveLength(1);
  });
});
