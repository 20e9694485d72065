import { errorMessage } from "./errors.js";
import type { RunReport } from "./types.js";

export type SessionRun = (signal: AbortSignal) => Promise<RunReport>;

export interface SessionSnapshot {
  name: string;
  status: "running" | "finished";
  startedAt: string;
  endedAt?: string;
  report?: RunReport;
  error?: string;
}

interface SessionEntry {
  name: string;
  controller: AbortController;
  startedAt: string;
  endedAt?: string;
  done: Promise<void>;
  report?: RunReport;
  error?: string;
}

/** Live sessions keyed by name. Each entry owns its stop signal and its result. */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionEntry>();

  start(name: string, run: SessionRun): SessionSnapshot {
    const existing = this.sessions.get(name);
    if (existing && existing.endedAt === undefined) {
      throw new Error(`Session '${name}' is already running`);
    }

    const controller = new AbortController();
    const entry: SessionEntry = {
      name,
      controller,
      startedAt: new Date().toISOString(),
      done: Promise.resolve()
    };
    entry.done = run(controller.signal).then(
      (report) => {
        entry.report = report;
        entry.endedAt = new Date().toISOString();
      },
      (error: unknown) => {
        entry.error = errorMessage(error);
        entry.endedAt = new Date().toISOString();
      }
    );
    this.sessions.set(name, entry);
    return snapshot(entry);
  }

  /** Signals the session to stop before its next cycle and waits for it to finish. */
  async stop(name: string): Promise<SessionSnapshot> {
    const entry = this.require(name);
    entry.controller.abort();
    await entry.done;
    return snapshot(entry);
  }

  async wait(name: string): Promise<SessionSnapshot> {
    const entry = this.require(name);
    await entry.done;
    return snapshot(entry);
  }

  get(name: string): SessionSnapshot | undefined {
    const entry = this.sessions.get(name);
    return entry ? snapshot(entry) : undefined;
  }

  list(): SessionSnapshot[] {
    return [...this.sessions.values()].map(snapshot);
  }

  async stopAll(): Promise<void> {
    const entries = [...this.sessions.values()];
    for (const entry of entries) {
      entry.controller.abort();
    }
    await Promise.all(entries.map((entry) => entry.done));
  }

  private require(name: string): SessionEntry {
    const entry = this.sessions.get(name);
    if (!entry) {
      throw new Error(`Unknown session '${name}'`);
    }
    return entry;
  }
}

function snapshot(entry: SessionEntry): SessionSnapshot {
  return {
    name: entry.name,
    status: entry.endedAt === undefined ? "running" : "finished",
    startedAt: entry.startedAt,
    endedAt: entry.endedAt,
    report: entry.report,
    error: entry.error
  };
}
