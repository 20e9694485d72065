import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { loadRunConfig, resolvePolicySettings, resolveRunLimits } from "../src/config.js";
import { parseBaselineFile, parseRegressionCase, parseRunConfig } from "../src/contracts.js";
import { parseDirective } from "../src/directive.js";
import { ConfigError } from "../src/errors.js";

describe("run config", () => {
  it("fills documented defaults", () => {
    const config = parseRunConfig({});

    expect(config.dryRun).toBe(true);
    expect(config.maxActions).toBe(30);
    expect(config.decisionEngine).toMatchObject({ type: "deterministic", llmFailureMode: "fail" });
    expect(config.validation).toEqual({
      enabled: true,
      settleDelayMs: 800,
      requireScreenChangeFor: ["like", "pass", "open_thread", "send_message", "back", "dismiss_overlay"],
      maxConsecutiveFailures: 4,
      changeSignal: "fingerprint",
      observeTimeoutMs: 10_000
    });
    expect(config.profile.swipePolicy.minQualityScoreLike).toBe(70);
    expect(config.appium).toBeUndefined();
  });

  it("rejects unknown keys and inconsistent engines", () => {
    expect(() => parseRunConfig({ maxActons: 3 })).toThrow(ConfigError);
    expect(() => parseRunConfig({ decisionEngine: { type: "llm" } }, "run.json")).toThrow(
      "run.json: decisionEngine.llm.model: llm.model is required when type is 'llm'"
    );
    expect(() => parseRunConfig({ validation: { changeSignal: "pixels" } })).toThrow(ConfigError);
  });

  it("loads a config file and parses its directive once", async () => {
    const dir = await mkdtemp(join(tmpdir(), "tapline-config-"));
    try {
      const path = join(dir, "run.json");
      await writeFile(path, JSON.stringify({ directive: "swipe for 4 actions", maxActions: 10 }), "utf8");

      const loaded = await loadRunConfig(path);

      expect(loaded.path).toBe(path);
      expect(loaded.directive.caps.maxActions).toBe(4);
      expect(resolveRunLimits(loaded.config, loaded.directive)).toEqual({ maxActions: 4, maxRuntimeS: 300, dryRun: true });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("loads the example config shipped with the project", async () => {
    const loaded = await loadRunConfig(fileURLToPath(new URL("../config/run.example.json", import.meta.url)));

    expect(loaded.config.decisionEngine).toMatchObject({ type: "llm", llmFailureMode: "fallback_deterministic" });
    expect(loaded.config.appium?.timeoutMs).toBe(30_000);
    expect(resolvePolicySettings(loaded.config.profile, loaded.directive).maxLikes).toBe(10);
  });

  it("reports unreadable and malformed files as config errors", async () => {
    const dir = await mkdtemp(join(tmpdir(), "tapline-config-"));
    try {
      const path = join(dir, "broken.json");
      await writeFile(path, "{ not json", "utf8");

      await expect(loadRunConfig(path)).rejects.toThrow(ConfigError);
      await expect(loadRunConfig(join(dir, "missing.json"))).rejects.toThrow("cannot read config");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("lets directive caps override profile policies", () => {
    const config = parseRunConfig({
      profile: { swipePolicy: { maxLikes: 10, blockPromptKeywords: ["Crypto"] }, messagePolicy: { enabled: true } }
    });
    const settings = resolvePolicySettings(config.profile, parseDirective("max likes 2, score 90, don't message"));

    expect(settings.maxLikes).toBe(2);
    expect(settings.minQualityScoreLike).toBe(90);
    expect(settings.messageEnabled).toBe(false);
    expect(settings.blockPromptKeywords).toEqual(["crypto"]);
    expect(resolveRunLimits(config, parseDirective("live run")).dryRun).toBe(false);
  });
});

describe("dataset and baseline contracts", () => {
  it("parses a minimal regression case with defaults", () => {
    const parsed = parseRegressionCase({
      id: "c1",
      packet: { screenType: "discover-card", qualityScore: 80, availableActions: ["like", "pass"] },
      expectedActionSet: ["like"]
    });

    expect(parsed.packet.counters).toEqual({ actions: 0, likes: 0, passes: 0, messages: 0 });
    expect(parsed.packet.qualityScoreVersion).toBe("quality_score_v1");
    expect(parsed.packet.targets).toEqual([]);
  });

  it("rejects cases with unknown actions or no expectations", () => {
    const packet = { screenType: "discover-card", qualityScore: 80, availableActions: ["like"] };

    expect(() => parseRegressionCase({ id: "c1", packet, expectedActionSet: [] }, "data.jsonl:1")).toThrow(
      "data.jsonl:1: expectedActionSet"
    );
    expect(() => parseRegressionCase({ id: "c1", packet, expectedActionSet: ["superlike"] })).toThrow(ConfigError);
  });

  it("rejects baselines with duplicate cases", () => {
    expect(() =>
      parseBaselineFile({
        version: 1,
        configName: "default",
        model: "deterministic",
        temperature: 0,
        createdAt: "2024-01-01T00:00:00.000Z",
        entries: [
          { caseId: "c1", actionId: "like" },
          { caseId: "c1", actionId: "pass" }
        ]
      })
    ).toThrow("duplicate baseline entry for case 'c1'");
  });
});
