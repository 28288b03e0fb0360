import { test } from "node:test";
import assert from "node:assert/strict";
import { join } from "node:path";
import { loadConfig } from "../src/config.js";

const HOME = join("/home", "tester");

test("defaults live under the XDG state directory in home", () => {
  assert.deepEqual(loadConfig({}, HOME), {
    stateFile: join(HOME, ".local", "state", "pomodoro", "current_pomo.json"),
    watchFile: "pomodoro.txt",
    watchIntervalMs: 1000
  });
});

test("XDG_STATE_HOME moves the state directory", () => {
  const config = loadConfig({ XDG_STATE_HOME: "/var/state" }, HOME);
  assert.equal(config.stateFile, join("/var/state", "pomodoro", "current_pomo.json"));
});

test("explicit overrides win", () => {
  const config = loadConfig(
    {
      XDG_STATE_HOME: "/var/state",
      POMODORO_STATE_FILE: "/tmp/pomo.json",
      POMODORO_WATCH_FILE: "overlay.txt",
      POMODORO_WATCH_INTERVAL_MS: "250"
    },
    HOME
  );
  assert.deepEqual(config, { stateFile: "/tmp/pomo.json", watchFile: "overlay.txt", watchIntervalMs: 250 });
});

test("invalid values are reported", () => {
  assert.throws(() => loadConfig({ POMODORO_WATCH_INTERVAL_MS: "soon" }, HOME), /Invalid configuration: POMODORO_WATCH_INTERVAL_MS/);
});
