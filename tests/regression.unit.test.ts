import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { parseBaselineFile, parseRegressionCase, parseRunConfig, type RegressionCase } from "../src/contracts.js";
import { parseDirective } from "../src/directive.js";
import { ConfigError, ModelError } from "../src/errors.js";
import { BudgetedJudge } from "../src/judge.js";
import {
  checkMessageConstraints,
  exitCodeFor,
  loadBaseline,
  runRegression,
  writeBaseline,
  type RegressionTotals
} from "../src/regression.js";
import { createDecisionEngine } from "../src/session-factory.js";
import { CountingJudge } from "./helpers/countingJudge.js";
import { ScriptedModelClient } from "./helpers/scriptedModel.js";

function discoverCase(id: string, extra: Record<string, unknown> = {}): RegressionCase {
  return parseRegressionCase({
    id,
    packet: {
      screenType: "discover-card",
      qualityScore: 82,
      availableActions: ["like", "pass", "back", "wait"],
      targets: [
        { targetId: "like_button:6", kind: "like_button" },
        { targetId: "pass_button:7", kind: "pass_button" }
      ]
    },
    expectedActionSet: ["like"],
    ...extra
  });
}

function deterministicEngine() {
  return createDecisionEngine(parseRunConfig({}), parseDirective(undefined));
}

const baseline = parseBaselineFile({
  version: 1,
  configName: "default",
  model: "deterministic",
  temperature: 0,
  createdAt: "2024-01-01T00:00:00.000Z",
  entries: [{ caseId: "c1", actionId: "pass" }]
});

describe("regression runner", () => {
  it("checks each decision against its expected set", async () => {
    const report = await runRegression(
      [discoverCase("c1"), discoverCase("c2", { directive: "only pass and wait", expectedActionSet: ["pass"] })],
      { engine: deterministicEngine() }
    );

    expect(report).toMatchObject({ engine: "deterministic", model: "deterministic", temperature: 0, exitCode: 0 });
    expect(report.totals).toEqual({ cases: 2, passed: 2, failed: 0, errored: 0, judgeSkipped: 0, judgeCalls: 0, drifted: 0 });
    expect(report.results[1]).toMatchObject({ caseId: "c2", status: "passed", actionId: "pass", reason: "like_unavailable" });
  });

  it("fails a case whose action is outside the expected set", async () => {
    const report = await runRegression([discoverCase("c1", { expectedActionSet: ["pass", "wait"] })], {
      engine: deterministicEngine()
    });

    expect(report.results[0]).toMatchObject({
      status: "failed",
      actionId: "like",
      failures: ["action 'like' not in expected set [pass, wait]"]
    });
    expect(report.exitCode).toBe(1);
  });

  it("reports drift against a baseline and lists uncovered cases", async () => {
    const report = await runRegression([discoverCase("c1"), discoverCase("c2")], {
      engine: deterministicEngine(),
      baseline
    });

    expect(report.drift).toEqual([{ caseId: "c1", baselineAction: "pass", observedAction: "like", actionChanged: true }]);
    expect(report.uncoveredByBaseline).toEqual(["c2"]);
    expect(report.totals.drifted).toBe(1);
  });

  it("fails a judge threshold when no judge is configured", async () => {
    const report = await runRegression(
      [discoverCase("c1", { expectedMessageConstraints: { minJudgeScore: 60 } })],
      { engine: deterministicEngine() }
    );

    expect(report.results[0].failures).toEqual(["judge score >= 60 required but no judge is configured"]);
    expect(report.results[0].status).toBe("failed");
  });

  it("fails a case the judge scores below its threshold", async () => {
    const judge = new BudgetedJudge({ judge: new CountingJudge([40]) });

    const report = await runRegression(
      [discoverCase("c1", { expectedMessageConstraints: { minJudgeScore: 60 } })],
      { engine: deterministicEngine(), judge }
    );

    expect(report.results[0]).toMatchObject({
      status: "failed",
      failures: ["judge score 40 < 60"],
      judge: { status: "scored", score: 40, cached: false }
    });
    expect(report.totals.judgeCalls).toBe(1);
  });

  it("exits 2 when the judge budget leaves every case skipped", async () => {
    const judge = new BudgetedJudge({ judge: new CountingJudge([90]), budget: 0 });

    const report = await runRegression(
      [discoverCase("c1", { expectedMessageConstraints: { minJudgeScore: 60 } })],
      { engine: deterministicEngine(), judge }
    );

    expect(report.results[0].status).toBe("judge_skipped");
    expect(report.totals.judgeSkipped).toBe(1);
    expect(report.exitCode).toBe(2);
  });

  it("marks cases the judge never scored once its budget runs out", async () => {
    const judge = new BudgetedJudge({ judge: new CountingJudge([90]), budget: 1 });

    const report = await runRegression([discoverCase("c1"), discoverCase("c2")], { engine: deterministicEngine(), judge });

    expect(report.results[0]).toMatchObject({ caseId: "c1", status: "passed", judge: { status: "scored", score: 90 } });
    expect(report.results[1]).toMatchObject({
      caseId: "c2",
      status: "judge_skipped",
      judge: { status: "judge_skipped", reason: "judge budget of 1 calls exhausted" }
    });
    expect(report.totals).toMatchObject({ passed: 1, judgeSkipped: 1, judgeCalls: 1 });
    expect(report.exitCode).toBe(1);
  });

  it("turns a judge failure into a case error", async () => {
    const judge = new BudgetedJudge({ judge: new CountingJudge([new Error("judge offline")]) });

    const report = await runRegression([discoverCase("c1")], { engine: deterministicEngine(), judge });

    expect(report.results[0]).toMatchObject({ status: "error", actionId: "like", error: "judge error: judge offline" });
    expect(report.totals.errored).toBe(1);
    expect(report.exitCode).toBe(1);
  });

  it("records personalization for message decisions", async () => {
    const config = parseRunConfig({ decisionEngine: { type: "llm", llm: { model: "test-model" } } });
    const engine = createDecisionEngine(config, parseDirective(undefined), {
      client: new ScriptedModelClient([
        JSON.stringify({
          action_id: "send_message",
          message_text: "Fresh bread fan too. Which bakery is your favorite?",
          target_id: null,
          reason: "prompt hook"
        })
      ])
    });
    const messageCase = discoverCase("c1", {
      packet: {
        screenType: "discover-card",
        qualityScore: 90,
        qualityFeatures: { profileNameCandidate: "Maya", promptAnswer: "Fresh bread and long walks" },
        availableActions: ["like", "pass", "send_message", "back", "wait"],
        targets: [
          { targetId: "like_button:6", kind: "like_button" },
          { targetId: "pass_button:7", kind: "pass_button" }
        ]
      },
      expectedActionSet: ["send_message"]
    });

    const report = await runRegression([messageCase], { engine });

    expect(report.results[0]).toMatchObject({
      status: "passed",
      actionId: "send_message",
      source: "llm",
      personalization: { mentionsProfileName: false, mentionsPromptKeyword: true }
    });
    expect(report.results.filter((result) => result.personalization !== undefined)).toHaveLength(1);
  });

  it("records decision errors per case", async () => {
    const config = parseRunConfig({ decisionEngine: { type: "llm", llm: { model: "test-model" } } });
    const engine = createDecisionEngine(config, parseDirective(undefined), {
      client: new ScriptedModelClient([new ModelError("auth", "bad key")])
    });

    const report = await runRegression([discoverCase("c1")], { engine, baseline });

    expect(report.results[0]).toEqual({ caseId: "c1", status: "error", failures: [], error: "auth: bad key" });
    expect(report.drift).toEqual([]);
    expect(report.exitCode).toBe(1);
  });

  it("rejects a case whose directive does not parse before running anything", async () => {
    const client = new ScriptedModelClient([]);
    const config = parseRunConfig({ decisionEngine: { type: "llm", llm: { model: "test-model" } } });
    const engine = createDecisionEngine(config, parseDirective(undefined), { client });

    const run = runRegression([discoverCase("c1"), discoverCase("c2", { directive: "only fly" })], { engine });

    await expect(run).rejects.toThrow(ConfigError);
    await expect(run).rejects.toThrow("directive does not parse");
    expect(client.requests).toEqual([]);
  });

  it("replaces an existing baseline with the run's decisions", async () => {
    const dir = await mkdtemp(join(tmpdir(), "tapline-baseline-"));
    try {
      const path = join(dir, "baseline.json");
      await writeFile(path, JSON.stringify({ ...baseline, entries: [{ caseId: "old", actionId: "wait" }] }), "utf8");
      const report = await runRegression([discoverCase("c1"), discoverCase("c2")], { engine: deterministicEngine() });

      await writeBaseline(path, report.results, { configName: "default", model: "deterministic", temperature: 0 });
      const loaded = await loadBaseline(path);

      expect(loaded.entries).toEqual([
        { caseId: "c1", actionId: "like" },
        { caseId: "c2", actionId: "like" }
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("message constraints", () => {
  it("lists every broken constraint", () => {
    expect(
      checkMessageConstraints("Hi there", {
        maxChars: 5,
        requireQuestion: true,
        mustInclude: ["coffee"],
        mustNotInclude: ["THERE"]
      })
    ).toEqual([
      "message has 8 chars, max 5",
      "message must ask a question",
      "message must include 'coffee'",
      "message must not include 'THERE'"
    ]);
  });

  it("requires a message only when asked to", () => {
    expect(checkMessageConstraints(undefined, { required: true })).toEqual(["message required but none produced"]);
    expect(checkMessageConstraints(" ", { maxChars: 5 })).toEqual([]);
  });
});

describe("regression exit code", () => {
  const totals: RegressionTotals = { cases: 2, passed: 0, failed: 0, errored: 0, judgeSkipped: 2, judgeCalls: 0, drifted: 0 };

  it("separates budget exhaustion from failures", () => {
    expect(exitCodeFor({ ...totals, passed: 2, judgeSkipped: 0 }, false)).toBe(0);
    expect(exitCodeFor(totals, true)).toBe(2);
    expect(exitCodeFor(totals, false)).toBe(1);
    expect(exitCodeFor({ ...totals, passed: 1, judgeSkipped: 1 }, true)).toBe(1);
  });
});
