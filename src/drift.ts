import type { BaselineFile } from "./contracts.js";
import type { BudgetedJudge } from "./judge.js";
import type { ActionId, PacketContext } from "./types.js";

export type DriftTolerance = { mode: "exact" } | { mode: "judge"; judge: BudgetedJudge; minScore: number };

export interface ObservedDecision {
  caseId: string;
  actionId: ActionId;
  messageText?: string;
  context?: PacketContext;
}

export interface MessageDelta {
  baseline?: string;
  observed?: string;
  detail: string;
  judgeScore?: number;
}

export interface DriftReport {
  caseId: string;
  baselineAction: ActionId;
  observedAction: ActionId;
  actionChanged: boolean;
  messageDelta?: MessageDelta;
}

export interface DriftResult {
  reports: DriftReport[];
  /** Observed cases with no baseline entry. */
  uncovered: string[];
}

/**
 * Compares decisions with a baseline by case id. A case drifts when its action differs or its
 * message differs beyond the tolerance; unchanged cases produce no report.
 */
export async function detectDrift(
  observed: readonly ObservedDecision[],
  baseline: BaselineFile,
  tolerance: DriftTolerance = { mode: "exact" }
): Promise<DriftResult> {
  const entries = new Map(baseline.entries.map((entry) => [entry.caseId, entry]));
  const reports: DriftReport[] = [];
  const uncovered: string[] = [];

  for (const decision of observed) {
    const entry = entries.get(decision.caseId);
    if (!entry) {
      uncovered.push(decision.caseId);
      continue;
    }

    const actionChanged = entry.actionId !== decision.actionId;
    const messageDelta = await compareMessages(entry.messageText, decision, tolerance);
    if (actionChanged || messageDelta) {
      reports.push({
        caseId: decision.caseId,
        baselineAction: entry.actionId,
        observedAction: decision.actionId,
        actionChanged,
        ...(messageDelta ? { messageDelta } : {})
      });
    }
  }

  return { reports, uncovered };
}

async function compareMessages(
  baselineText: string | undefined,
  decision: ObservedDecision,
  tolerance: DriftTolerance
): Promise<MessageDelta | undefined> {
  const observedText = decision.messageText;
  if (baselineText === observedText) {
    return undefined;
  }
  if (baselineText === undefined || observedText === undefined) {
    return {
      baseline: baselineText,
      observed: observedText,
      detail: baselineText === undefined ? "message added" : "message removed"
    };
  }
  if (tolerance.mode === "exact") {
    return { baseline: baselineText, observed: observedText, detail: "message text differs" };
  }

  const outcome = await tolerance.judge.score(
    { context: decision.context ?? null, referenceMessage: baselineText },
    { actionId: decision.actionId, messageText: observedText }
  );
  if (outcome.status !== "scored") {
    return {
      baseline: baselineText,
      observed: observedText,
      detail: outcome.status === "judge_skipped" ? outcome.reason : `judge error: ${outcome.message}`
    };
  }
  if (outcome.score >= tolerance.minScore) {
    return undefined;
  }
  return {
    baseline: baselineText,
    observed: observedText,
    detail: `judge score ${outcome.score} < ${tolerance.minScore}`,
    judgeScore: outcome.score
  };
}
