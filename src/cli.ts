import { ZodError } from "zod";
import type { PomodoroConfig } from "./config.js";
import { PomodoroError } from "./errors.js";
import type { PomodoroStore } from "./state/timerStore.js";
import { PomodoroToolset } from "./tools/pomodoroTool.js";
import { watch } from "./watch.js";

export const USAGE = `Usage: pomo <command> [options]

Commands:
  start [definition] [--until HH:MM]  Start a pomodoro (default 4p45b10)
  status                              Print the current state on one line
  watch [path]                        Rewrite path (default pomodoro.txt) every second
  pause                               Pause the running pomodoro
  unpause                             Resume a paused pomodoro
  stop                                Stop and discard the pomodoro
  info                                Show schedule and time bookkeeping

Definitions look like 4p45b10: 4 repetitions of 45 minutes work with
10 minute breaks. Durations take an optional h, m or s suffix.`;

export interface CliContext {
  store: PomodoroStore;
  config: PomodoroConfig;
  signal?: AbortSignal;
  clock?: () => Date;
  print?: (line: string) => void;
  printError?: (line: string) => void;
  echo?: (chunk: string) => void;
}

class UsageError extends PomodoroError {
  constructor(message: string) {
    super(message, "usage");
  }
}

export async function runCli(argv: string[], context: CliContext): Promise<number> {
  const {
    store,
    config,
    signal,
    clock = () => new Date(),
    print = console.log,
    printError = console.error,
    echo = (chunk: string) => {
      process.stdout.write(chunk);
    }
  } = context;
  const toolset = new PomodoroToolset(store);
  const command: string | undefined = argv[0];
  const args = argv.slice(1);

  try {
    switch (command) {
      case "start": {
        const result = await toolset.start(parseStartArgs(args), clock());
        print(result.message);
        return 0;
      }
      case "status": {
        expectNoArgs(command, args);
        print((await toolset.status(clock())).message);
        return 0;
      }
      case "pause":
      case "unpause":
      case "stop":
      case "info": {
        expectNoArgs(command, args);
        const result = await toolset[command](clock());
        print(result.message);
        return 0;
      }
      case "watch": {
        if (args.length > 1) {
          throw new UsageError("watch takes at most one path.");
        }
        await watch({
          store,
          target: args[0] ?? config.watchFile,
          intervalMs: config.watchIntervalMs,
          signal,
          clock,
          onRender: text => echo(`\r${text}        `)
        });
        echo("\n");
        return 0;
      }
      case "help":
      case "--help":
      case "-h":
        print(USAGE);
        return 0;
      case undefined:
        printError("not enough arguments");
        printError(USAGE);
        return 1;
      default:
        printError(`Unknown command "${command}".`);
        printError(USAGE);
        return 1;
    }
  } catch (error) {
    printError(`error: ${describeError(error)}`);
    return 1;
  }
}

function parseStartArgs(args: string[]): { definition?: string; until?: string } {
  const parsed: { definition?: string; until?: string } = {};
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === "--until") {
      const value = args[index + 1];
      if (value === undefined) {
        throw new UsageError("--until needs a time like 17:30.");
      }
      parsed.until = value;
      index += 1;
    } else if (arg.startsWith("--until=")) {
      parsed.until = arg.slice("--until=".length);
    } else if (arg.startsWith("--")) {
      throw new UsageError(`Unknown option "${arg}".`);
    } else if (parsed.definition === undefined) {
      parsed.definition = arg;
    } else {
      throw new UsageError(`Unexpected argument "${arg}".`);
    }
  }
  return parsed;
}

function expectNoArgs(command: string, args: string[]): void {
  if (args.length > 0) {
    throw new UsageError(`${command} takes no arguments.`);
  }
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map(issue => issue.message).join("; ");
  }
  if (error instanceof PomodoroError) {
    return error.message;
  }
  console.error("Unexpected failure", error);
  return error instanceof Error ? error.message : String(error);
}
