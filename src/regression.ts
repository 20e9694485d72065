import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { resolvePolicySettings } from "./config.js";
import {
  parseBaselineFile,
  type BaselineFile,
  type MessageConstraints,
  type RegressionCase
} from "./contracts.js";
import { caseContext } from "./dataset.js";
import type { DecisionEngine } from "./decision-engine.js";
import { parseDirective } from "./directive.js";
import { detectDrift, type DriftReport, type DriftTolerance, type ObservedDecision } from "./drift.js";
import { ConfigError, errorMessage } from "./errors.js";
import type { BudgetedJudge, JudgeOutcome } from "./judge.js";
import { personalizationSignals, type PersonalizationSignals } from "./message-checks.js";
import type { ActionId, DecisionSource, Directive } from "./types.js";

export type CaseStatus = "passed" | "failed" | "error" | "judge_skipped";

export interface CaseResult {
  caseId: string;
  status: CaseStatus;
  actionId?: ActionId;
  messageText?: string;
  source?: DecisionSource;
  reason?: string;
  fallbackReason?: string;
  failures: string[];
  error?: string;
  judge?: JudgeOutcome;
  /** Set for message decisions only. */
  personalization?: PersonalizationSignals;
}

export interface RegressionTotals {
  cases: number;
  passed: number;
  failed: number;
  errored: number;
  judgeSkipped: number;
  judgeCalls: number;
  drifted: number;
}

export interface RegressionReport {
  version: 1;
  createdAt: string;
  engine: string;
  model: string;
  temperature: number;
  totals: RegressionTotals;
  results: CaseResult[];
  drift: DriftReport[];
  uncoveredByBaseline: string[];
  exitCode: 0 | 1 | 2;
}

export interface RegressionOptions {
  engine: DecisionEngine;
  /** Directive for cases that carry none. */
  directive?: string;
  datasetDir?: string;
  judge?: BudgetedJudge;
  baseline?: BaselineFile;
  driftTolerance?: DriftTolerance;
  onCase?: (result: CaseResult) => void;
}

/**
 * Replays cases through the decision engine exactly as the live loop would call it, one case at
 * a time, and checks each decision against its declared expectations.
 */
export async function runRegression(
  cases: readonly RegressionCase[],
  options: RegressionOptions
): Promise<RegressionReport> {
  const { engine } = options;
  const directives = cases.map((item) => parseCaseDirective(item, options.directive));

  const results: CaseResult[] = [];
  const observed: ObservedDecision[] = [];
  for (const [index, regressionCase] of cases.entries()) {
    const directive = directives[index];
    const result = await runCase(regressionCase, directive, options);
    results.push(result.caseResult);
    if (result.observed) {
      observed.push(result.observed);
    }
    options.onCase?.(result.caseResult);
  }

  const drift = options.baseline
    ? await detectDrift(observed, options.baseline, options.driftTolerance)
    : { reports: [], uncovered: [] };

  const totals: RegressionTotals = {
    cases: results.length,
    passed: count(results, "passed"),
    failed: count(results, "failed"),
    errored: count(results, "error"),
    judgeSkipped: count(results, "judge_skipped"),
    judgeCalls: options.judge?.calls ?? 0,
    drifted: drift.reports.length
  };

  return {
    version: 1,
    createdAt: new Date().toISOString(),
    engine: engine.mode,
    model: engine.modelId,
    temperature: engine.temperature,
    totals,
    results,
    drift: drift.reports,
    uncoveredByBaseline: drift.uncovered,
    exitCode: exitCodeFor(totals, options.judge?.exhausted ?? false)
  };
}

async function runCase(
  regressionCase: RegressionCase,
  directive: Directive,
  options: RegressionOptions
): Promise<{ caseResult: CaseResult; observed?: ObservedDecision }> {
  const { engine } = options;
  const caseResult: CaseResult = { caseId: regressionCase.id, status: "passed", failures: [] };

  const context = await caseContext(regressionCase, options.datasetDir);
  const settings = resolvePolicySettings(engine.profileConfig, directive);
  const decision = await engine.decide(
    context,
    directive,
    {
      counters: { ...context.counters },
      forcedActionPending: directive.forceActionOnce !== undefined,
      exploreIndex: 0,
      consecutiveValidationFailures: 0
    },
    settings
  );

  if (decision.kind === "error") {
    caseResult.status = "error";
    caseResult.error = `${decision.errorKind}: ${decision.message}`;
    return { caseResult };
  }

  const { plan } = decision;
  caseResult.actionId = plan.actionId;
  caseResult.messageText = plan.messageText;
  caseResult.source = plan.source;
  caseResult.reason = plan.reason;
  caseResult.fallbackReason = plan.fallbackReason;
  if (plan.actionId === "send_message" && plan.messageText !== undefined) {
    caseResult.personalization = personalizationSignals(plan.messageText, context.qualityFeatures);
  }

  if (!regressionCase.expectedActionSet.includes(plan.actionId)) {
    caseResult.failures.push(
      `action '${plan.actionId}' not in expected set [${regressionCase.expectedActionSet.join(", ")}]`
    );
  }
  const constraints = regressionCase.expectedMessageConstraints;
  if (constraints) {
    caseResult.failures.push(...checkMessageConstraints(plan.messageText, constraints));
  }

  if (options.judge) {
    const packet = { caseId: regressionCase.id, directive: regressionCase.directive ?? null, context: regressionCase.packet };
    caseResult.judge = await options.judge.score(packet, {
      actionId: plan.actionId,
      messageText: plan.messageText ?? null,
      reason: plan.reason
    });
  }
  applyJudgeOutcome(caseResult, constraints?.minJudgeScore, options.judge !== undefined);

  if (caseResult.failures.length > 0 && caseResult.status !== "error") {
    caseResult.status = "failed";
  }
  return {
    caseResult,
    observed: { caseId: regressionCase.id, actionId: plan.actionId, messageText: plan.messageText, context }
  };
}

export function checkMessageConstraints(text: string | undefined, constraints: MessageConstraints): string[] {
  const failures: string[] = [];
  if (text === undefined || text.trim().length === 0) {
    if (constraints.required) {
      failures.push("message required but none produced");
    }
    return failures;
  }

  const lowered = text.toLowerCase();
  const length = [...text].length;
  if (constraints.maxChars !== undefined && length > constraints.maxChars) {
    failures.push(`message has ${length} chars, max ${constraints.maxChars}`);
  }
  if (constraints.requireQuestion && !text.includes("?")) {
    failures.push("message must ask a question");
  }
  for (const needle of constraints.mustInclude ?? []) {
    if (!lowered.includes(needle.toLowerCase())) {
      failures.push(`message must include '${needle}'`);
    }
  }
  for (const needle of constraints.mustNotInclude ?? []) {
    if (lowered.includes(needle.toLowerCase())) {
      failures.push(`message must not include '${needle}'`);
    }
  }
  return failures;
}

/** With a judge on, every case carries its verdict; a skipped call never counts as a pass. */
function applyJudgeOutcome(caseResult: CaseResult, minScore: number | undefined, judgeConfigured: boolean): void {
  if (!judgeConfigured) {
    if (minScore !== undefined) {
      caseResult.failures.push(`judge score >= ${minScore} required but no judge is configured`);
    }
    return;
  }
  const outcome = caseResult.judge;
  if (!outcome || outcome.status === "judge_skipped") {
    caseResult.status = "judge_skipped";
    return;
  }
  if (outcome.status === "judge_error") {
    caseResult.status = "error";
    caseResult.error = `judge error: ${outcome.message}`;
    return;
  }
  if (minScore !== undefined && outcome.score < minScore) {
    caseResult.failures.push(`judge score ${outcome.score} < ${minScore}`);
  }
}

/**
 * 0 when every case passed; 2 when the judge budget ran out and no case passed; 1 otherwise.
 */
export function exitCodeFor(totals: RegressionTotals, judgeExhausted: boolean): 0 | 1 | 2 {
  if (judgeExhausted && totals.judgeSkipped > 0 && totals.passed === 0) {
    return 2;
  }
  return totals.passed === totals.cases ? 0 : 1;
}

export interface BaselineMeta {
  configName: string;
  model: string;
  temperature: number;
}

/** Writes a fresh baseline from a run. An existing file is replaced, never merged. */
export async function writeBaseline(path: string, results: readonly CaseResult[], meta: BaselineMeta): Promise<BaselineFile> {
  const baseline: BaselineFile = {
    version: 1,
    configName: meta.configName,
    model: meta.model,
    temperature: meta.temperature,
    createdAt: new Date().toISOString(),
    entries: results.flatMap((result) =>
      result.actionId === undefined
        ? []
        : [
            {
              caseId: result.caseId,
              actionId: result.actionId,
              ...(result.messageText !== undefined ? { messageText: result.messageText } : {})
            }
          ]
    )
  };
  const absolutePath = resolve(path);
  await mkdir(dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, `${JSON.stringify(baseline, null, 2)}\n`, "utf8");
  return baseline;
}

export async function loadBaseline(path: string): Promise<BaselineFile> {
  const absolutePath = resolve(path);
  let raw: string;
  try {
    raw = await readFile(absolutePath, "utf8");
  } catch (error) {
    throw new ConfigError(`cannot read baseline: ${errorMessage(error)}`, absolutePath);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`invalid JSON: ${errorMessage(error)}`, absolutePath);
  }
  return parseBaselineFile(parsed, absolutePath);
}

function parseCaseDirective(regressionCase: RegressionCase, fallback: string | undefined): Directive {
  try {
    return parseDirective(regressionCase.directive ?? fallback);
  } catch (error) {
    throw new ConfigError(`directive does not parse: ${errorMessage(error)}`, `case ${regressionCase.id}`);
  }
}

function count(results: readonly CaseResult[], status: CaseStatus): number {
  return results.filter((result) => result.status === status).length;
}
