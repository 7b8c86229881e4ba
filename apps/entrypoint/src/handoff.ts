import { normalizeError } from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";
import {
  exitStatusOf,
  inheritStdioSpawner,
  SpawnError,
  waitForExit,
  type Spawner,
} from "./command.js";

// SIGUSR1 stays with Node, which uses it to start the inspector.
export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = [
  "SIGTERM",
  "SIGINT",
  "SIGHUP",
  "SIGQUIT",
  "SIGUSR2",
];

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface HandOffOptions {
  spawner?: Spawner;
  signals?: SignalSource;
}

/**
 * Runs `argv` as the application and resolves with the status the
 * entrypoint must exit with. Node cannot exec in place, so the child gets
 * inherited stdio and every forwarded signal; the entrypoint never exits on
 * those signals itself.
 */
export async function handOff(argv: string[], options: HandOffOptions = {}): Promise<number> {
  const [command, ...args] = argv;
  if (!command) {
    throw new Error("handoff requires a command");
  }

  const spawner = options.spawner ?? inheritStdioSpawner;
  const signals = options.signals ?? process;

  const child = spawner(command, args);
  const exited = waitForExit(command, child);

  const forward = (signal: NodeJS.Signals): void => {
    logger.debug("forwarding signal to application", { signal, pid: child.pid });
    child.kill(signal);
  };
  for (const signal of FORWARDED_SIGNALS) {
    signals.on(signal, forward);
  }

  try {
    const result = await exited;
    const status = exitStatusOf(result);
    logger.info("application exited", {
      exitCode: result.exitCode,
      signal: result.signal,
      status,
    });
    return status;
  } catch (error) {
    if (error instanceof SpawnError) {
      logger.error("application failed to start", {
        command,
        message: normalizeError(error),
      });
      return error.exitCode;
    }
    throw error;
  } finally {
    for (const signal of FORWARDED_SIGNALS) {
      signals.off(signal, forward);
    }
  }
}
