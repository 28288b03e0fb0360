import { stat, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { setTimeout as sleep } from "timers/promises";
import { evaluate } from "./clock.js";
import { StateError, WatchError } from "./errors.js";
import type { PomodoroStore } from "./state/timerStore.js";
import { renderFile, renderIdle } from "./ui/builders.js";

export interface WatchOptions {
  store: PomodoroStore;
  target: string;
  intervalMs?: number;
  signal?: AbortSignal;
  clock?: () => Date;
  onRender?: (text: string) => void | Promise<void>;
}

export async function watch(options: WatchOptions): Promise<void> {
  const { store, target, intervalMs = 1000, signal, clock = () => new Date(), onRender } = options;

  await requireDirectory(dirname(resolve(target)));
  if (!(await store.current())) {
    throw new StateError("not_running");
  }

  const emit = async (text: string) => {
    await writeFile(target, text, "utf-8");
    await onRender?.(text);
  };

  while (!signal?.aborted) {
    try {
      const state = await store.current();
      if (!state) {
        await emit(renderIdle());
        return;
      }
      await emit(renderFile(evaluate(state, clock())));
    } catch (error) {
      console.error("Watch iteration failed", error);
    }

    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        return;
      }
      throw error;
    }
  }
}

async function requireDirectory(directory: string): Promise<void> {
  try {
    const info = await stat(directory);
    if (!info.isDirectory()) {
      throw new WatchError(`${directory} is not a directory.`);
    }
  } catch (error) {
    if (error instanceof WatchError) {
      throw error;
    }
    throw new WatchError(`Cannot write overlay: directory ${directory} does not exist.`, error);
  }
}
