import { appendFile } from "node:fs/promises";
import type { TrajectoryEntry } from "../common/types.js";
import { createLogger, type Logger } from "../common/logger.js";

/** Receives every decision the controller makes, in order. */
export interface TrajectorySink {
  record(entry: TrajectoryEntry): Promise<void>;
}

export class LogTrajectorySink implements TrajectorySink {
  constructor(private readonly logger: Logger = createLogger("trajectory")) {}

  async record(entry: TrajectoryEntry): Promise<void> {
    this.logger.info(entry.incomplete ? "round incomplete" : "proposal evaluated", entry);
  }
}

/** One JSON object per line, appended to `path`. */
export class JsonlTrajectorySink implements TrajectorySink {
  constructor(private readonly path: string) {}

  async record(entry: TrajectoryEntry): Promise<void> {
    await appendFile(this.path, `${JSON.stringify(entry)}\n`, "utf8");
  }
}

export class MemoryTrajectorySink implements TrajectorySink {
  readonly entries: TrajectoryEntry[] = [];

  async record(entry: TrajectoryEntry): Promise<void> {
    this.entries.push(entry);
  }
}

export class FanOutTrajectorySink implements TrajectorySink {
  constructor(private readonly sinks: TrajectorySink[]) {}

  async record(entry: TrajectoryEntry): Promise<void> {
    for (const sink of this.sinks) await sink.record(entry);
  }
}
