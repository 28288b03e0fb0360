import { mkdir, readFile, rename, rm, unlink, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";
import { v4 as uuid } from "uuid";
import { z } from "zod";
import { StoreError, isErrnoException } from "../errors.js";
import type { TimerState } from "../types.js";

const RECORD_VERSION = 1;

const scheduleSchema = z.object({
  repetitions: z.number().int().min(1),
  workMs: z.number().positive(),
  breakMs: z.number().min(0)
});

const recordSchema = z.object({
  version: z.literal(RECORD_VERSION),
  id: z.string().uuid(),
  schedule: scheduleSchema,
  startedAt: z.string().datetime(),
  pausedAt: z.string().datetime().nullable(),
  totalPausedMs: z.number().min(0)
});

type TimerRecord = z.infer<typeof recordSchema>;

export interface TimerStorage {
  load(): Promise<TimerState | undefined>;
  save(state: TimerState): Promise<void>;
  delete(): Promise<boolean>;
}

// Writes land in a sibling temp file renamed over the record; readers never see a partial one.
export class PomodoroFileStorage implements TimerStorage {
  private pending = Promise.resolve();

  constructor(readonly filePath: string) {}

  async load(): Promise<TimerState | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return undefined;
      }
      throw new StoreError(`Could not read pomodoro state from ${this.filePath}.`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StoreError(`Pomodoro state at ${this.filePath} is not valid JSON.`, error);
    }

    const parsed = recordSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreError(`Pomodoro state at ${this.filePath} is malformed.`, parsed.error);
    }
    return fromRecord(parsed.data);
  }

  async save(state: TimerState): Promise<void> {
    const serialized = JSON.stringify(toRecord(state), null, 2);
    this.pending = this.pending
      .catch(() => undefined)
      .then(() => this.replace(serialized));
    await this.pending;
  }

  async delete(): Promise<boolean> {
    await this.pending.catch(() => undefined);
    try {
      await unlink(this.filePath);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return false;
      }
      throw new StoreError(`Could not remove pomodoro state at ${this.filePath}.`, error);
    }
  }

  private async replace(serialized: string): Promise<void> {
    const directory = dirname(this.filePath);
    const tempPath = join(directory, `.${basename(this.filePath)}.${uuid()}.tmp`);
    try {
      await mkdir(directory, { recursive: true });
      await writeFile(tempPath, serialized, "utf-8");
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch(() => undefined);
      throw new StoreError(`Could not write pomodoro state to ${this.filePath}.`, error);
    }
  }
}

function toRecord(state: TimerState): TimerRecord {
  return {
    version: RECORD_VERSION,
    id: state.id,
    schedule: {
      repetitions: state.schedule.repetitions,
      workMs: state.schedule.workMs,
      breakMs: state.schedule.breakMs
    },
    startedAt: state.startedAt,
    pausedAt: state.pausedAt ?? null,
    totalPausedMs: state.totalPausedMs
  };
}

function fromRecord(record: TimerRecord): TimerState {
  const state: TimerState = {
    id: record.id,
    schedule: Object.freeze({ ...record.schedule }),
    startedAt: record.startedAt,
    totalPausedMs: record.totalPausedMs
  };
  if (record.pausedAt !== null) {
    state.pausedAt = record.pausedAt;
  }
  return state;
}
