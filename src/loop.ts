import { randomUUID } from "node:crypto";
import { buildActionSpace } from "./action-space.js";
import { observe, type CaptureAdapter } from "./capture.js";
import { resolveRunLimits } from "./config.js";
import type { RunConfig } from "./contracts.js";
import type { DecisionEngine } from "./decision-engine.js";
import { errorMessage, TransportError } from "./errors.js";
import { ActionExecutor } from "./executor.js";
import { extract } from "./extractor.js";
import type { ArtifactWriter, PacketLogWriter } from "./packet-log.js";
import { writeActionLog } from "./packet-log.js";
import type {
  ActionId,
  ActionPlan,
  CycleSummary,
  DecisionState,
  Directive,
  ExecutionReport,
  Observation,
  Packet,
  PacketContext,
  RunCounters,
  RunReport,
  TerminationReason
} from "./types.js";
import { PostActionValidator } from "./validator.js";

export interface SessionDependencies {
  adapter: CaptureAdapter;
  engine: DecisionEngine;
  packetLog?: PacketLogWriter;
  artifacts?: ArtifactWriter;
  actionLogPath?: string;
  sessionId?: string;
  signal?: AbortSignal;
  onCycle?: (packet: Packet, summary: CycleSummary, counters: RunCounters) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface SessionInput {
  config: RunConfig;
  directive: Directive;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolvePromise) => setTimeout(resolvePromise, ms));

class SessionEnd extends Error {
  readonly reason: TerminationReason;

  constructor(reason: TerminationReason, message: string) {
    super(message);
    this.name = "SessionEnd";
    this.reason = reason;
  }
}

/**
 * Runs one live session: observe, decide, execute, validate and log, strictly one cycle at a
 * time, until a budget, a stop signal, the validation streak or an error ends it.
 */
export async function runSession(deps: SessionDependencies, input: SessionInput): Promise<RunReport> {
  const { config, directive } = input;
  const { adapter, engine } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? Date.now;
  const limits = resolveRunLimits(config, directive);
  const settings = engine.policySettings;
  const sessionId = deps.sessionId ?? randomUUID();
  const executor = new ActionExecutor({ adapter, dryRun: limits.dryRun, maxNodes: config.maxNodes });
  const validator = new PostActionValidator(config.validation, { sleep });

  const state: DecisionState = {
    counters: { actions: 0, likes: 0, passes: 0, messages: 0 },
    forcedActionPending: directive.forceActionOnce !== undefined,
    exploreIndex: 0,
    consecutiveValidationFailures: 0
  };
  const startedMs = now();
  const report: RunReport = {
    sessionId,
    startedAt: new Date(startedMs).toISOString(),
    endedAt: "",
    dryRun: limits.dryRun,
    directive: config.directive,
    terminationReason: "completed",
    cycles: [],
    countsByAction: {},
    counters: state.counters,
    fallbacks: 0,
    validationFailures: 0,
    recoveries: 0,
    packetLogPath: deps.packetLog?.path
  };

  let recoveryStreak = 0;
  let recoveryFailure: string | undefined;
  const recover = async (cause: string): Promise<void> => {
    const policy = config.foregroundRecovery;
    if (!policy.enabled || !adapter.recover || recoveryStreak >= policy.maxAttempts) {
      throw new SessionEnd("aborted_transport", recoveryFailure ? `${cause}; last recovery: ${recoveryFailure}` : cause);
    }
    recoveryStreak += 1;
    report.recoveries += 1;
    try {
      await adapter.recover(config.targetPackage);
      recoveryFailure = undefined;
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      recoveryFailure = error.message;
    }
    await sleep(policy.cooldownMs);
  };

  try {
    let iteration = 0;
    for (;;) {
      if (deps.signal?.aborted) {
        throw new SessionEnd("stopped", "stop requested");
      }
      if (state.counters.actions >= limits.maxActions) {
        break;
      }
      if ((now() - startedMs) / 1000 >= limits.maxRuntimeS) {
        throw new SessionEnd("aborted_budget", `runtime budget of ${limits.maxRuntimeS}s reached`);
      }

      let observation: Observation;
      try {
        observation = await observe(adapter, config.maxNodes);
      } catch (error) {
        if (!(error instanceof TransportError)) {
          throw error;
        }
        await recover(`observation failed (${error.kind}): ${error.message}`);
        continue;
      }
      if (config.targetPackage && observation.packageName && observation.packageName !== config.targetPackage) {
        await recover(`foreground package is '${observation.packageName}', expected '${config.targetPackage}'`);
        continue;
      }
      recoveryStreak = 0;
      iteration += 1;

      const extraction = extract(observation);
      const context: PacketContext = {
        screenType: observation.screenType,
        packageName: observation.packageName,
        qualityScore: extraction.qualityScore,
        qualityScoreVersion: extraction.qualityScoreVersion,
        qualityFeatures: extraction.qualityFeatures,
        content: extraction.content,
        availableActions: buildActionSpace(observation.screenType, extraction.targets, {
          messageEnabled: settings.messageEnabled
        }),
        observedStrings: [...observation.rawStrings],
        targets: extraction.targets.map(({ targetId, kind, label, contextText }) => ({
          targetId,
          kind,
          label,
          contextText
        })),
        counters: { ...state.counters },
        screenshot: observation.screenshot
      };

      const result = await engine.decide(context, directive, state);
      if (result.kind === "error") {
        throw new SessionEnd("error", `decision failed (${result.errorKind}): ${result.message}`);
      }
      if (result.kind === "fallback") {
        report.fallbacks += 1;
      }
      if (result.effects.consumeForcedAction) {
        state.forcedActionPending = false;
      }
      if (result.effects.nextExploreIndex !== undefined) {
        state.exploreIndex = result.effects.nextExploreIndex;
      }
      const plan = result.plan;

      validator.begin(plan.actionId, { screenType: observation.screenType, fingerprint: extraction.fingerprint });
      let execution: ExecutionReport;
      let transportFailure: TransportError | undefined;
      try {
        execution = await executor.execute(plan, observation, extraction.targets);
      } catch (error) {
        if (!(error instanceof TransportError)) {
          throw error;
        }
        transportFailure = error;
        execution = {
          actionId: plan.actionId,
          dryRun: limits.dryRun,
          issued: 0,
          steps: [],
          status: "failed",
          error: `transport (${error.kind}): ${error.message}`
        };
      }
      validator.markExecuted(execution);
      const validation = await validator.check(async () => {
        const after = await observe(adapter, config.maxNodes);
        return { screenType: after.screenType, fingerprint: extract(after).fingerprint };
      });
      state.consecutiveValidationFailures = validator.consecutiveFailures;
      if (!validation.passed) {
        report.validationFailures += 1;
      }

      if (execution.status === "ok") {
        applyCounters(state.counters, plan, observation.screenType === "discover-card");
      }
      state.counters.actions += 1;
      state.lastActionId = plan.actionId;
      report.countsByAction[plan.actionId] = (report.countsByAction[plan.actionId] ?? 0) + 1;

      const packet: Packet = {
        version: 1,
        sessionId,
        iteration,
        timestamp: new Date(now()).toISOString(),
        screenType: context.screenType,
        packageName: context.packageName,
        qualityScore: context.qualityScore,
        qualityScoreVersion: context.qualityScoreVersion,
        qualityFeatures: context.qualityFeatures,
        content: context.content,
        availableActions: context.availableActions,
        observedStrings: context.observedStrings,
        targets: context.targets,
        counters: context.counters,
        directive: config.directive,
        decision: plan,
        llmTrace: result.trace,
        execution,
        validation
      };
      if (deps.artifacts) {
        if (config.artifacts.captureScreenshot && observation.screenshot) {
          packet.screenshotRef = await deps.artifacts.saveScreenshot(iteration, observation.screenshot.png);
        }
        if (config.artifacts.captureXml) {
          packet.xmlRef = await deps.artifacts.saveXml(iteration, observation.xml);
        }
      }
      await deps.packetLog?.append(packet);

      const summary: CycleSummary = {
        iteration,
        screenType: context.screenType,
        actionId: plan.actionId,
        source: plan.source,
        reason: plan.reason,
        qualityScore: context.qualityScore,
        validationPassed: validation.passed
      };
      report.cycles.push(summary);
      deps.onCycle?.(packet, summary, { ...state.counters });

      if (validator.aborted) {
        throw new SessionEnd(
          "aborted_validation",
          `${validator.consecutiveFailures} consecutive validation failures (last: ${validation.detail})`
        );
      }
      if (transportFailure) {
        await recover(`primitive failed (${transportFailure.kind}): ${transportFailure.message}`);
        continue;
      }
      if (state.counters.actions < limits.maxActions) {
        await sleep(config.loopSleepMs);
      }
    }
  } catch (error) {
    if (error instanceof SessionEnd) {
      report.terminationReason = error.reason;
      if (error.reason !== "stopped" && error.reason !== "aborted_budget") {
        report.error = error.message;
      }
    } else {
      report.terminationReason = "error";
      report.error = errorMessage(error);
    }
  }

  report.endedAt = new Date(now()).toISOString();
  if (deps.actionLogPath) {
    report.actionLogPath = await writeActionLog(deps.actionLogPath, report);
  }
  return report;
}

export function formatCycleLine(summary: CycleSummary, counters: RunCounters): string {
  const validation = summary.validationPassed === false ? " validation=failed" : "";
  return (
    `[${summary.iteration}] ${summary.actionId} | screen=${summary.screenType} score=${summary.qualityScore}` +
    ` likes=${counters.likes} passes=${counters.passes} messages=${counters.messages}` +
    ` source=${summary.source} reason=${summary.reason}${validation}`
  );
}

function applyCounters(counters: RunCounters, plan: ActionPlan, onDiscover: boolean): void {
  const bump: Partial<Record<ActionId, () => void>> = {
    like: () => {
      counters.likes += 1;
    },
    pass: () => {
      counters.passes += 1;
    },
    send_message: () => {
      counters.messages += 1;
      if (onDiscover) {
        counters.likes += 1;
      }
    }
  };
  bump[plan.actionId]?.();
}
