import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { StateError } from "../src/errors.js";
import { PomodoroFileStorage } from "../src/state/timerStorage.js";
import { PomodoroStore } from "../src/state/timerStore.js";
import { PomodoroToolset, startInput } from "../src/tools/pomodoroTool.js";

const MIN = 60_000;
const START = new Date(2026, 9, 19, 9, 0, 0);

function at(minutes: number): Date {
  return new Date(START.getTime() + minutes * MIN);
}

async function createToolset() {
  const dir = await mkdtemp(join(tmpdir(), "pomodoro-test-"));
  const filePath = join(dir, "current_pomo.json");
  const store = new PomodoroStore(new PomodoroFileStorage(filePath));
  const toolset = new PomodoroToolset(store);

  async function cleanup() {
    await rm(dir, { recursive: true, force: true });
  }

  return { toolset, store, storagePath: filePath, cleanup };
}

function stateError(kind: StateError["kind"]) {
  return (error: unknown) => error instanceof StateError && error.kind === kind;
}

test("start persists a running pomodoro", async t => {
  const { toolset, storagePath, cleanup } = await createToolset();
  t.after(cleanup);

  const result = await toolset.start({ definition: "2p30b5" }, START);

  assert.equal(result.message, "Started 2p30b5: work 30:00 (next: break) 1/2");
  const persisted = JSON.parse(await readFile(storagePath, "utf-8"));
  assert.equal(persisted.startedAt, START.toISOString());
  assert.deepEqual(persisted.schedule, { repetitions: 2, workMs: 30 * MIN, breakMs: 5 * MIN });
  assert.equal(persisted.pausedAt, null);
});

test("start refuses to replace an active pomodoro until it is stopped", async t => {
  const { toolset, cleanup } = await createToolset();
  t.after(cleanup);

  await toolset.start({}, START);
  await assert.rejects(toolset.start({ definition: "p20" }, at(1)), stateError("already_running"));

  await toolset.stop(at(2));
  const restarted = await toolset.start({ definition: "p20" }, at(3));
  assert.equal(restarted.state?.schedule.workMs, 20 * MIN);
});

test("start with until solves the schedule against the target time", async t => {
  const { toolset, cleanup } = await createToolset();
  t.after(cleanup);

  const result = await toolset.start({ definition: "p30b5", until: "11:05" }, START);
  assert.deepEqual(result.state?.schedule, { repetitions: 4, workMs: 27.5 * MIN, breakMs: 5 * MIN });
  assert.equal(result.message, "Started 4p1650sb5: work 27:30 (next: break) 1/4");
});

test("status reports idle, then the live phase", async t => {
  const { toolset, cleanup } = await createToolset();
  t.after(cleanup);

  assert.equal((await toolset.status(START)).message, "idle: no pomodoro running");

  await toolset.start({ definition: "2p10b5" }, START);
  assert.equal((await toolset.status(at(12))).message, "break 03:00 (next: work) 1/2");
  assert.equal((await toolset.status(at(30))).message, "pomodoro finished");
});

test("pause and unpause shift the schedule by the paused time", async t => {
  const { toolset, cleanup } = await createToolset();
  t.after(cleanup);

  await toolset.start({ definition: "2p10b5" }, START);
  const paused = await toolset.pause(at(4));
  assert.equal(paused.message, "Paused: work 06:00 (next: break) 1/2 [paused]");
  assert.equal((await toolset.status(at(9))).message, "work 06:00 (next: break) 1/2 [paused]");

  const resumed = await toolset.unpause(at(11));
  assert.equal(resumed.state?.totalPausedMs, 7 * MIN);
  assert.equal(resumed.state?.pausedAt, undefined);
  assert.equal(resumed.message, "Resumed (7 minutes paused in total): work 06:00 (next: break) 1/2");

  assert.equal((await toolset.status(at(19))).message, "break 03:00 (next: work) 1/2");
  assert.equal((await toolset.status(at(32))).message, "pomodoro finished");
});

test("invalid transitions fail with state errors", async t => {
  const { toolset, cleanup } = await createToolset();
  t.after(cleanup);

  await assert.rejects(toolset.stop(START), stateError("not_running"));
  await assert.rejects(toolset.pause(START), stateError("not_running"));
  await assert.rejects(toolset.info(START), stateError("not_running"));

  await toolset.start({}, START);
  await assert.rejects(toolset.unpause(at(1)), stateError("not_paused"));
  await toolset.pause(at(2));
  await assert.rejects(toolset.pause(at(3)), stateError("already_paused"));
});

test("stop removes the record and reports progress", async t => {
  const { toolset, store, cleanup } = await createToolset();
  t.after(cleanup);

  await toolset.start({ definition: "2p10b5" }, START);
  const stopped = await toolset.stop(at(16));
  assert.equal(stopped.message, "Stopped 2p10b5 at 2/2.");
  assert.equal(await store.current(), undefined);
});

test("info describes the running schedule", async t => {
  const { toolset, cleanup } = await createToolset();
  t.after(cleanup);

  const { state } = await toolset.start({ definition: "3p25b5" }, START);
  const info = await toolset.info(at(10));
  const lines = info.message.split("\n");
  assert.equal(lines[0], "Schedule:  3p25b5 (3 × 25 minutes work, 5 minutes break)");
  assert.equal(lines[1], `Run:       ${state?.id}`);
  assert.equal(lines[4], "Elapsed:   10 minutes");
});

test("startInput rejects oversized definitions", () => {
  const invalid = startInput.safeParse({ definition: "1".repeat(65) });
  assert.ok(!invalid.success);
});
