import { spawn } from "node:child_process";
import { constants } from "node:os";
import {
  EXIT_COMMAND_NOT_EXECUTABLE,
  EXIT_COMMAND_NOT_FOUND,
  EXIT_SIGNAL_BASE,
  normalizeError,
  StepFailedError,
} from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface ChildHandle {
  readonly pid?: number;
  on(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  kill(signal: NodeJS.Signals): boolean;
}

export type Spawner = (command: string, args: string[]) => ChildHandle;

export const inheritStdioSpawner: Spawner = (command, args) =>
  spawn(command, args, {
    stdio: "inherit",
    env: process.env,
    cwd: process.cwd(),
  });

export class SpawnError extends Error {
  readonly command: string;
  readonly code: string | undefined;

  constructor(command: string, cause: Error) {
    super(`${command} failed to start: ${normalizeError(cause)}`, { cause });
    this.name = "SpawnError";
    this.command = command;
    this.code = "code" in cause && typeof cause.code === "string" ? cause.code : undefined;
  }

  get exitCode(): number {
    return this.code === "ENOENT" ? EXIT_COMMAND_NOT_FOUND : EXIT_COMMAND_NOT_EXECUTABLE;
  }
}

export function parseCommandLine(raw: string): string[] {
  return raw
    .split(/\s+/)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

export function signalNumber(signal: NodeJS.Signals): number {
  const value: unknown = Reflect.get(constants.signals, signal);
  return typeof value === "number" ? value : 0;
}

/** Shell convention: the child's own code, or 128 + signal number. */
export function exitStatusOf(result: CommandResult): number {
  if (result.exitCode !== null) {
    return result.exitCode;
  }
  if (result.signal !== null) {
    return EXIT_SIGNAL_BASE + signalNumber(result.signal);
  }
  return 1;
}

export function waitForExit(command: string, child: ChildHandle): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    let settled = false;

    child.on("exit", (code, signal) => {
      if (settled) {
        return;
      }
      settled = true;
      resolve({ exitCode: code, signal });
    });

    child.on("error", (error) => {
      if (settled) {
        return;
      }
      settled = true;
      reject(new SpawnError(command, error));
    });
  });
}

export async function runCommand(
  argv: string[],
  spawner: Spawner = inheritStdioSpawner,
): Promise<CommandResult> {
  const [command, ...args] = argv;
  if (!command) {
    throw new Error("empty command line");
  }
  return waitForExit(command, spawner(command, args));
}

export type StepRunner = (name: string, argv: string[]) => Promise<void>;

export function createStepRunner(spawner: Spawner = inheritStdioSpawner): StepRunner {
  return async (name, argv) => {
    const startedAt = Date.now();
    logger.info(`running ${name}`, { command: argv.join(" ") });

    let result: CommandResult;
    try {
      result = await runCommand(argv, spawner);
    } catch (error) {
      if (error instanceof SpawnError) {
        throw new StepFailedError(name, error.exitCode, error.message);
      }
      throw error;
    }

    const status = exitStatusOf(result);
    if (status !== 0) {
      const detail =
        result.signal !== null
          ? `terminated by ${result.signal}`
          : `exited with ${String(result.exitCode)}`;
      throw new StepFailedError(name, status, detail);
    }

    logger.info(`${name} finished`, { durationMs: Date.now() - startedAt });
  };
}
