import { observe, type CaptureAdapter } from "./capture.js";
import { ExecutionError } from "./errors.js";
import { extractTargets } from "./extractor.js";
import type {
  ActionPlan,
  ExecutionReport,
  ExecutionStep,
  InteractionTarget,
  Observation,
  Primitive,
  TargetKind
} from "./types.js";

export interface ActionExecutorOptions {
  adapter: CaptureAdapter;
  dryRun: boolean;
  maxNodes?: number;
}

export type StepSpec =
  | { type: "tap"; label: string; kinds: readonly TargetKind[]; targetId?: string; optional?: boolean }
  | { type: "primitive"; label: string; primitive: Primitive }
  | { type: "refresh"; label: string };

const TAP_ACTIONS: Partial<Record<ActionPlan["actionId"], readonly TargetKind[]>> = {
  goto_discover: ["tab_discover"],
  goto_matches: ["tab_matches"],
  goto_likes_you: ["tab_likes_you"],
  goto_standouts: ["tab_standouts"],
  goto_profile_hub: ["tab_profile_hub"],
  open_thread: ["thread_row"],
  pass: ["pass_button"],
  dismiss_overlay: ["close_overlay"]
};

/**
 * Maps an action plan to its fixed primitive sequence. In dry-run mode the sequence is
 * reported but the adapter is never called.
 */
export class ActionExecutor {
  private readonly adapter: CaptureAdapter;
  private readonly dryRun: boolean;
  private readonly maxNodes?: number;

  constructor(options: ActionExecutorOptions) {
    this.adapter = options.adapter;
    this.dryRun = options.dryRun;
    this.maxNodes = options.maxNodes;
  }

  async execute(
    plan: ActionPlan,
    observation: Observation,
    targets: readonly InteractionTarget[]
  ): Promise<ExecutionReport> {
    const report: ExecutionReport = {
      actionId: plan.actionId,
      dryRun: this.dryRun,
      issued: 0,
      steps: [],
      status: "ok"
    };

    let steps: StepSpec[];
    try {
      steps = planSteps(plan, observation, targets);
    } catch (error) {
      return failed(report, error);
    }

    let current: readonly InteractionTarget[] | undefined = targets;
    for (const step of steps) {
      try {
        current = await this.runStep(step, current, report);
      } catch (error) {
        return failed(report, error);
      }
    }
    return report;
  }

  // Returns the targets visible after the step; undefined when a dry run can no longer know them.
  private async runStep(
    step: StepSpec,
    current: readonly InteractionTarget[] | undefined,
    report: ExecutionReport
  ): Promise<readonly InteractionTarget[] | undefined> {
    if (step.type === "refresh") {
      if (this.dryRun) {
        report.steps.push({ label: step.label, issued: false });
        return undefined;
      }
      const next = await observe(this.adapter, this.maxNodes);
      report.steps.push({ label: step.label, issued: false });
      return extractTargets(next.nodes);
    }

    if (step.type === "primitive") {
      await this.issue({ label: step.label, primitive: step.primitive, issued: false }, report);
      return current;
    }

    if (!current) {
      report.steps.push({ label: step.label, issued: false });
      return current;
    }
    const target = resolveTarget(step.kinds, step.targetId, current, step.optional ?? false);
    if (!target) {
      report.steps.push({ label: `${step.label} (absent)`, issued: false });
      return current;
    }
    await this.issue(
      {
        label: step.label,
        primitive: { kind: "tap", x: target.tapPoint.x, y: target.tapPoint.y },
        targetId: target.targetId,
        issued: false
      },
      report
    );
    return current;
  }

  private async issue(step: ExecutionStep, report: ExecutionReport): Promise<void> {
    report.steps.push(step);
    if (this.dryRun || !step.primitive) {
      return;
    }
    await this.adapter.executePrimitive(step.primitive);
    step.issued = true;
    report.issued += 1;
  }
}

export function planSteps(
  plan: ActionPlan,
  observation: Observation,
  targets: readonly InteractionTarget[]
): StepSpec[] {
  const tapKinds = TAP_ACTIONS[plan.actionId];
  if (tapKinds) {
    return [{ type: "tap", label: `tap ${tapKinds[0]}`, kinds: tapKinds, targetId: plan.targetId }];
  }

  switch (plan.actionId) {
    case "like":
      return [
        { type: "tap", label: "tap like_button", kinds: ["like_button"], targetId: plan.targetId },
        { type: "refresh", label: "re-observe" },
        { type: "tap", label: "tap send_like", kinds: ["send_like"], optional: true }
      ];
    case "send_message":
      return messageSteps(plan, observation, targets);
    case "back":
      return [{ type: "primitive", label: "back", primitive: { kind: "back" } }];
    case "wait":
      return [];
    default:
      throw new ExecutionError("missing_target", `No primitive sequence for action '${plan.actionId}'`);
  }
}

function messageSteps(
  plan: ActionPlan,
  observation: Observation,
  targets: readonly InteractionTarget[]
): StepSpec[] {
  const text = plan.messageText?.trim();
  if (!text) {
    throw new ExecutionError("missing_message", "send_message plan carries no message text");
  }
  const typeStep: StepSpec = { type: "primitive", label: "type message", primitive: { kind: "type", text } };

  if (observation.screenType === "chat-thread") {
    return [
      { type: "tap", label: "tap message_input", kinds: ["message_input"], targetId: plan.targetId },
      typeStep,
      { type: "tap", label: "tap send_button", kinds: ["send_button"] }
    ];
  }

  const planned = plan.targetId ? targets.find((target) => target.targetId === plan.targetId) : undefined;
  const composerOpen = planned?.kind === "comment_input";
  const openComposer: StepSpec[] = composerOpen
    ? []
    : [
        { type: "tap", label: "tap like_button", kinds: ["like_button"], targetId: plan.targetId },
        { type: "refresh", label: "re-observe" }
      ];
  return [
    ...openComposer,
    {
      type: "tap",
      label: "tap comment_input",
      kinds: ["comment_input"],
      targetId: composerOpen ? plan.targetId : undefined
    },
    typeStep,
    { type: "tap", label: "tap send", kinds: ["send_like", "send_button"] }
  ];
}

/**
 * An explicit id must name a target of an accepted kind. Without one, exactly one target of the
 * first present kind is required; several candidates are ambiguous.
 */
export function resolveTarget(
  kinds: readonly TargetKind[],
  targetId: string | undefined,
  targets: readonly InteractionTarget[],
  optional = false
): InteractionTarget | undefined {
  if (targetId !== undefined) {
    const target = targets.find((candidate) => candidate.targetId === targetId);
    if (!target) {
      throw new ExecutionError("unknown_target", `Target '${targetId}' is not in the current observation`);
    }
    if (!kinds.includes(target.kind)) {
      throw new ExecutionError("unknown_target", `Target '${targetId}' is a ${target.kind}, expected ${kinds.join("|")}`);
    }
    return target;
  }

  for (const kind of kinds) {
    const matches = targets.filter((candidate) => candidate.kind === kind);
    if (matches.length === 1) {
      return matches[0];
    }
    if (matches.length > 1) {
      throw new ExecutionError(
        "ambiguous_target",
        `${matches.length} ${kind} targets on screen and no target id: ${matches.map((m) => m.targetId).join(", ")}`
      );
    }
  }

  if (optional) {
    return undefined;
  }
  throw new ExecutionError("missing_target", `No ${kinds.join("|")} target on screen`);
}

function failed(report: ExecutionReport, error: unknown): ExecutionReport {
  if (!(error instanceof ExecutionError)) {
    throw error;
  }
  report.status = "failed";
  report.error = `${error.kind}: ${error.message}`;
  return report;
}
