import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

const envSchema = z.object({
  POMODORO_STATE_FILE: z.string().min(1).optional(),
  XDG_STATE_HOME: z.string().min(1).optional(),
  POMODORO_WATCH_FILE: z.string().min(1).default("pomodoro.txt"),
  POMODORO_WATCH_INTERVAL_MS: z.coerce.number().int().positive().default(1000)
});

export interface PomodoroConfig {
  stateFile: string;
  watchFile: string;
  watchIntervalMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, home = homedir()): PomodoroConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const stateHome = parsed.data.XDG_STATE_HOME ?? join(home, ".local", "state");
  return {
    stateFile: parsed.data.POMODORO_STATE_FILE ?? join(stateHome, "pomodoro", "current_pomo.json"),
    watchFile: parsed.data.POMODORO_WATCH_FILE,
    watchIntervalMs: parsed.data.POMODORO_WATCH_INTERVAL_MS
  };
}
