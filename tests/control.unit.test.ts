import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { CONTROL_CONTRACT_VERSION, controlResponseEnvelopeSchema } from "../src/control-contract.js";
import { ControlRuntime } from "../src/control.js";
import type { Directive } from "../src/types.js";
import { runUntilStopped } from "./helpers/runReports.js";

function runtime() {
  const started: Array<{ name: string; directive: Directive; path?: string }> = [];
  const control = new ControlRuntime({
    version: "9.9.9",
    createRun: (name, loaded) => {
      started.push({ name, directive: loaded.directive, path: loaded.path });
      return runUntilStopped();
    }
  });
  return { control, started };
}

describe("control runtime", () => {
  it("answers ping with its versions and methods", async () => {
    const { control } = runtime();

    const response = await control.handleRequest({ id: 1, method: "ping" });

    expect(controlResponseEnvelopeSchema.safeParse(response).success).toBe(true);
    expect(response).toEqual({
      id: 1,
      ok: true,
      result: {
        version: "9.9.9",
        controlContractVersion: CONTROL_CONTRACT_VERSION,
        capabilities: ["ping", "startSession", "stopSession", "getSessionState", "listSessions", "shutdown"]
      }
    });
  });

  it("rejects malformed envelopes and unknown methods", async () => {
    const { control } = runtime();

    expect(await control.handleRequest({ id: 2 })).toEqual({
      ok: false,
      error: { message: "Invalid request envelope: method: Required" }
    });
    expect(await control.handleRequest({ id: 3, method: "dance" })).toEqual({
      id: 3,
      ok: false,
      error: { message: "Unsupported control method 'dance'" }
    });
  });

  it("starts, lists and stops a session from an inline config", async () => {
    const { control, started } = runtime();

    const start = await control.handleRequest({
      id: "s",
      method: "startSession",
      params: { name: "morning", config: { directive: "swipe for 5 actions" } }
    });
    expect(start).toMatchObject({ ok: true, result: { name: "morning", status: "running" } });
    expect(started[0].directive.caps.maxActions).toBe(5);

    const again = await control.handleRequest({ method: "startSession", params: { name: "morning", config: {} } });
    expect(again).toEqual({ ok: false, error: { message: "Session 'morning' is already running" } });

    const list = await control.handleRequest({ method: "listSessions" });
    expect(list).toMatchObject({ ok: true, result: { sessions: [{ name: "morning", status: "running" }] } });

    const stop = await control.handleRequest({ method: "stopSession", params: { name: "morning" } });
    expect(stop).toMatchObject({ ok: true, result: { status: "finished", report: { terminationReason: "stopped" } } });

    const state = await control.handleRequest({ method: "getSessionState", params: { name: "morning" } });
    expect(state).toMatchObject({ ok: true, result: { status: "finished" } });
  });

  it("loads a session config from a file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "tapline-control-"));
    const { control, started } = runtime();
    try {
      const configPath = join(dir, "run.json");
      await writeFile(configPath, JSON.stringify({ directive: "only pass" }), "utf8");

      const response = await control.handleRequest({ method: "startSession", params: { name: "file", configPath } });

      expect(response.ok).toBe(true);
      expect(started[0]).toMatchObject({ name: "file", path: configPath, directive: { allowedActions: ["pass"] } });
    } finally {
      await control.shutdown();
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("reports bad params and bad configs without starting anything", async () => {
    const { control, started } = runtime();

    const both = await control.handleRequest({
      method: "startSession",
      params: { name: "x", configPath: "run.json", config: {} }
    });
    expect(both).toEqual({
      ok: false,
      error: { message: "Invalid params: config: exactly one of 'configPath' or 'config' is required" }
    });

    const badConfig = await control.handleRequest({
      method: "startSession",
      params: { name: "x", config: { maxActions: 0 } }
    });
    expect(badConfig.ok).toBe(false);
    expect(badConfig.error?.message.startsWith("params.config: maxActions:")).toBe(true);

    const unknown = await control.handleRequest({ method: "getSessionState", params: { name: "nope" } });
    expect(unknown.error?.message).toBe("Unknown session 'nope'");
    expect(started).toEqual([]);
  });

  it("stops every session on shutdown", async () => {
    const { control } = runtime();
    await control.handleRequest({ method: "startSession", params: { name: "a", config: {} } });
    await control.handleRequest({ method: "startSession", params: { name: "b", config: {} } });

    expect(await control.handleRequest({ method: "shutdown" })).toEqual({ ok: true, result: { ok: true } });

    const list = await control.handleRequest({ method: "listSessions" });
    expect(list).toMatchObject({
      result: {
        sessions: [
          { name: "a", status: "finished", terminationReason: "stopped" },
          { name: "b", status: "finished", terminationReason: "stopped" }
        ]
      }
    });
  });
});
