import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { describe, expect, it, vi } from "vitest";
import { parseRunConfig } from "../src/contracts.js";
import { parseDirective } from "../src/directive.js";
import { ModelError } from "../src/errors.js";
import { readPacketLog } from "../src/packet-log.js";
import { createDecisionEngine, createLiveRun } from "../src/session-factory.js";
import { ScriptedCaptureAdapter } from "./helpers/scriptedAdapter.js";
import { APP_PACKAGE, discoverXml } from "./helpers/screens.js";

describe("session factory", () => {
  it("needs an API key before building an llm engine", () => {
    const config = parseRunConfig({
      decisionEngine: { type: "llm", llm: { model: "test-model", apiKeyEnv: "TAPLINE_TEST_KEY" } }
    });

    expect(() => createDecisionEngine(config, parseDirective(undefined), { env: {} })).toThrow(
      "Missing API key env var 'TAPLINE_TEST_KEY'"
    );
    expect(createDecisionEngine(config, parseDirective(undefined), { env: { TAPLINE_TEST_KEY: "test-secret" } }).mode).toBe(
      "llm"
    );
  });

  it("builds the deterministic engine with the directive caps", () => {
    const engine = createDecisionEngine(parseRunConfig({}), parseDirective("max likes 3"));

    expect(engine.policySettings.maxLikes).toBe(3);
    expect(engine.modelId).toBe("deterministic");
  });

  it("runs a session into its own run directory and closes the adapter", async () => {
    const dir = await mkdtemp(join(tmpdir(), "tapline-factory-"));
    try {
      const config = parseRunConfig({
        targetPackage: APP_PACKAGE,
        maxActions: 2,
        loopSleepMs: 0,
        artifacts: { dir, captureXml: true }
      });
      const adapter = new ScriptedCaptureAdapter([discoverXml()]);
      const run = createLiveRun({ config, directive: parseDirective(undefined) }, { name: "smoke", adapter, sleep: vi.fn(async () => {}) });

      const report = await run(new AbortController().signal);

      expect(report.terminationReason).toBe("completed");
      expect(adapter.closed).toBe(true);
      expect(report.packetLogPath).toBeDefined();
      const packetLogPath = report.packetLogPath ?? "";
      expect(dirname(dirname(packetLogPath))).toBe(dir);
      expect(dirname(packetLogPath).endsWith("-smoke")).toBe(true);

      const packets = await readPacketLog(packetLogPath);
      expect(packets.map((packet) => packet.xmlRef)).toEqual([join("xml", "cycle-0001.xml"), join("xml", "cycle-0002.xml")]);
      expect(await readFile(join(dirname(packetLogPath), "xml", "cycle-0001.xml"), "utf8")).toBe(discoverXml());
      expect(report.actionLogPath).toBe(join(dirname(packetLogPath), "action_log.json"));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("surfaces config problems before a run exists", () => {
    const config = parseRunConfig({ decisionEngine: { type: "llm", llm: { model: "test-model" } } });

    expect(() => createLiveRun({ config, directive: parseDirective(undefined) }, { env: {} })).toThrow(ModelError);
  });
});
