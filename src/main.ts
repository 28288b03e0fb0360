#!/usr/bin/env node
import { runCli } from "./cli.js";
import { loadConfig } from "./config.js";
import { PomodoroFileStorage } from "./state/timerStorage.js";
import { PomodoroStore } from "./state/timerStore.js";

async function bootstrap() {
  const config = loadConfig();
  const store = new PomodoroStore(new PomodoroFileStorage(config.stateFile));

  const controller = new AbortController();
  const shutdown = () => controller.abort();
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  try {
    process.exitCode = await runCli(process.argv.slice(2), {
      store,
      config,
      signal: controller.signal
    });
  } finally {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
  }
}

bootstrap().catch(error => {
  console.error("Failed to run pomodoro command", error);
  process.exitCode = 1;
});
