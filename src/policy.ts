import { catalogIndex, requiredTargetKinds } from "./catalog.js";
import type { PolicySettings } from "./config.js";
import { isAllowedByDirective } from "./directive.js";
import { checkMessage, composeTemplateMessage } from "./message-checks.js";
import type {
  ActionId,
  ActionPlan,
  DecisionState,
  Directive,
  DirectiveGoal,
  PacketContext,
  PolicyEffects,
  ScreenType
} from "./types.js";

export interface PolicyInput {
  context: PacketContext;
  directive: Directive;
  settings: PolicySettings;
  state: DecisionState;
}

export interface PolicyDecision {
  plan: ActionPlan;
  effects: PolicyEffects;
}

interface PolicyRule {
  id: string;
  goals: readonly DirectiveGoal[];
  screens: readonly ScreenType[] | "any";
  actionId: ActionId;
  /** Higher wins. Equal priorities resolve by catalog order of the action. */
  priority: number;
  when?: (input: PolicyInput) => boolean;
  reason?: (input: PolicyInput) => string;
  effects?: (input: PolicyInput) => PolicyEffects;
}

interface Candidate {
  rule: PolicyRule;
  plan: ActionPlan;
  effects: PolicyEffects;
}

const ALL_GOALS: readonly DirectiveGoal[] = ["swipe", "message", "explore"];
const OVERLAYS: readonly ScreenType[] = ["overlay-paywall", "overlay-generic"];
const MESSAGE_SURFACES: readonly ScreenType[] = ["chat-thread", "matches-list", "unknown"];
const OFF_DISCOVER: readonly ScreenType[] = ["matches-list", "matches-empty", "chat-thread", "tab-shell", "unknown"];

const EXPLORE_CYCLE: readonly ActionId[] = [
  "goto_matches",
  "goto_likes_you",
  "goto_standouts",
  "goto_profile_hub",
  "goto_discover"
];

const flagsSatisfied = ({ context, settings }: PolicyInput): boolean =>
  settings.requireFlagsAll.every((flag) => context.qualityFeatures.qualityFlags.includes(flag));

const promptBlocked = ({ context, settings }: PolicyInput): boolean => {
  const answer = (context.qualityFeatures.promptAnswer ?? "").toLowerCase();
  return settings.blockPromptKeywords.some((keyword) => keyword.length > 0 && answer.includes(keyword));
};

const likeEligible = (input: PolicyInput): boolean =>
  input.state.counters.likes < input.settings.maxLikes &&
  !promptBlocked(input) &&
  flagsSatisfied(input) &&
  input.context.qualityScore >= input.settings.minQualityScoreLike;

const messagesLeft = ({ state, settings }: PolicyInput): boolean => state.counters.messages < settings.maxMessages;

const discoverMessageEligible = (input: PolicyInput): boolean =>
  input.settings.messageEnabled &&
  messagesLeft(input) &&
  input.state.counters.likes < input.settings.maxLikes &&
  !promptBlocked(input) &&
  flagsSatisfied(input) &&
  input.context.qualityScore >= input.settings.minQualityScoreToMessage;

const passReason = (input: PolicyInput): string => {
  if (input.state.counters.likes >= input.settings.maxLikes) {
    return "like_cap_reached";
  }
  if (promptBlocked(input)) {
    return "blocked_prompt_keyword";
  }
  if (!flagsSatisfied(input)) {
    return "required_flags_missing";
  }
  if (input.context.qualityScore < input.settings.minQualityScoreLike) {
    return `score<${input.settings.minQualityScoreLike}`;
  }
  return "like_unavailable";
};

export const POLICY_RULES: readonly PolicyRule[] = [
  { id: "overlay_dismiss", goals: ALL_GOALS, screens: OVERLAYS, actionId: "dismiss_overlay", priority: 100 },
  { id: "overlay_back", goals: ALL_GOALS, screens: OVERLAYS, actionId: "back", priority: 90 },

  {
    id: "message_goal_recovery_back",
    goals: ["message"],
    screens: ["discover-card"],
    actionId: "back",
    priority: 95,
    when: (input) => input.state.consecutiveValidationFailures >= 2
  },
  {
    id: "message_goal_recovery_discover",
    goals: ["message"],
    screens: OFF_DISCOVER,
    actionId: "goto_discover",
    priority: 95,
    when: (input) => input.state.consecutiveValidationFailures >= 2
  },

  {
    id: "discover_message",
    goals: ["swipe", "explore"],
    screens: ["discover-card"],
    actionId: "send_message",
    priority: 80,
    when: discoverMessageEligible
  },
  {
    id: "discover_like",
    goals: ["swipe", "explore"],
    screens: ["discover-card"],
    actionId: "like",
    priority: 70,
    when: likeEligible,
    reason: (input) => `score>=${input.settings.minQualityScoreLike}`
  },
  {
    id: "discover_pass",
    goals: ["swipe", "explore"],
    screens: ["discover-card"],
    actionId: "pass",
    priority: 60,
    when: (input) => input.state.counters.passes < input.settings.maxPasses,
    reason: passReason
  },
  { id: "discover_no_pass_back", goals: ["swipe"], screens: ["discover-card"], actionId: "back", priority: 10 },

  {
    id: "chat_message",
    goals: ["swipe"],
    screens: ["chat-thread"],
    actionId: "send_message",
    priority: 80,
    when: (input) =>
      input.settings.messageEnabled &&
      messagesLeft(input) &&
      input.context.qualityScore >= input.settings.minQualityScoreToMessage
  },
  { id: "chat_return_discover", goals: ["swipe"], screens: ["chat-thread"], actionId: "goto_discover", priority: 50 },
  { id: "chat_back", goals: ["swipe"], screens: ["chat-thread"], actionId: "back", priority: 40 },
  {
    id: "route_discover",
    goals: ["swipe"],
    screens: ["matches-list", "matches-empty", "tab-shell", "unknown"],
    actionId: "goto_discover",
    priority: 30
  },
  // Same priority as route_discover: catalog order prefers goto_discover when both apply.
  { id: "unknown_back", goals: ["swipe"], screens: ["unknown"], actionId: "back", priority: 30 },

  {
    id: "message_goal_discover_send",
    goals: ["message"],
    screens: ["discover-card"],
    actionId: "send_message",
    priority: 80,
    when: messagesLeft
  },
  {
    id: "message_goal_route_matches",
    goals: ["message"],
    screens: ["discover-card"],
    actionId: "goto_matches",
    priority: 50
  },
  {
    id: "message_goal_send",
    goals: ["message"],
    screens: MESSAGE_SURFACES,
    actionId: "send_message",
    priority: 80,
    when: messagesLeft
  },
  { id: "message_goal_open_thread", goals: ["message"], screens: MESSAGE_SURFACES, actionId: "open_thread", priority: 70 },
  { id: "message_goal_matches", goals: ["message"], screens: MESSAGE_SURFACES, actionId: "goto_matches", priority: 60 },
  {
    id: "message_goal_discover",
    goals: ["message"],
    screens: [...MESSAGE_SURFACES, "matches-empty", "tab-shell"],
    actionId: "goto_discover",
    priority: 50
  },
  { id: "message_goal_back", goals: ["message"], screens: MESSAGE_SURFACES, actionId: "back", priority: 40 },

  {
    id: "explore_message",
    goals: ["explore"],
    screens: OFF_DISCOVER,
    actionId: "send_message",
    priority: 80,
    when: messagesLeft
  },
  {
    id: "explore_open_thread",
    goals: ["explore"],
    screens: OFF_DISCOVER,
    actionId: "open_thread",
    priority: 70,
    when: (input) => input.settings.messageEnabled && messagesLeft(input)
  },
  ...EXPLORE_CYCLE.map(
    (actionId): PolicyRule => ({
      id: `explore_nav_${actionId}`,
      goals: ["explore"],
      screens: "any",
      actionId,
      priority: 30,
      when: (input) => nextExploreStep(input)?.actionId === actionId,
      reason: () => "explore_nav_cycle",
      effects: (input) => ({ nextExploreIndex: nextExploreStep(input)?.nextIndex })
    })
  ),
  {
    id: "explore_back",
    goals: ["explore"],
    screens: "any",
    actionId: "back",
    priority: 10,
    when: (input) => input.state.lastActionId !== "back"
  }
];

// Prerequisite surfaces for one-shot actions that are not yet available.
const FORCED_ROUTES: Partial<Record<ActionId, (screenType: ScreenType) => readonly ActionId[]>> = {
  send_message: (screenType) =>
    OVERLAYS.includes(screenType) ? ["dismiss_overlay", "back"] : ["goto_discover", "open_thread", "goto_matches"],
  open_thread: () => ["goto_matches"],
  like: () => ["goto_discover"],
  pass: () => ["goto_discover"]
};

/**
 * Rule-table policy. Pure: the same input always yields the same plan, and state changes are
 * returned as effects for the caller to apply.
 */
export function decideDeterministic(input: PolicyInput): PolicyDecision {
  const forced = decideForced(input);
  if (forced) {
    return forced;
  }

  const candidates: Candidate[] = [];
  for (const rule of POLICY_RULES) {
    if (!rule.goals.includes(input.directive.goal)) {
      continue;
    }
    if (rule.screens !== "any" && !rule.screens.includes(input.context.screenType)) {
      continue;
    }
    if (!isOffered(input, rule.actionId)) {
      continue;
    }
    if (rule.when && !rule.when(input)) {
      continue;
    }
    const plan = buildPlan(input, rule.actionId, rule.reason ? rule.reason(input) : rule.id);
    if (!plan) {
      continue;
    }
    candidates.push({ rule, plan, effects: rule.effects ? rule.effects(input) : {} });
  }

  candidates.sort(
    (a, b) => b.rule.priority - a.rule.priority || catalogIndex(a.rule.actionId) - catalogIndex(b.rule.actionId)
  );

  const best = candidates[0];
  if (best) {
    return { plan: best.plan, effects: best.effects };
  }
  return {
    plan: { actionId: "wait", reason: "no_rule_matched", source: "deterministic" },
    effects: {}
  };
}

/** Picks the first present target of the action's preferred kinds; undefined when none is needed. */
export function pickTarget(context: PacketContext, actionId: ActionId): string | undefined {
  const kinds = requiredTargetKinds(actionId, context.screenType) ?? [];
  for (const kind of kinds) {
    const target = context.targets.find((candidate) => candidate.kind === kind);
    if (target) {
      return target.targetId;
    }
  }
  return undefined;
}

function decideForced(input: PolicyInput): PolicyDecision | undefined {
  const forced = input.directive.forceActionOnce;
  if (!forced || !input.state.forcedActionPending) {
    return undefined;
  }

  if (isOffered(input, forced)) {
    const plan = buildPlan(input, forced, "directive_forced_action");
    if (plan) {
      return { plan, effects: { consumeForcedAction: true } };
    }
  }

  const routes = FORCED_ROUTES[forced]?.(input.context.screenType) ?? [];
  for (const route of routes) {
    if (!isOffered(input, route)) {
      continue;
    }
    const plan = buildPlan(input, route, `forced_${forced}_route_${route}`);
    if (plan) {
      return { plan, effects: {} };
    }
  }
  return undefined;
}

function isOffered(input: PolicyInput, actionId: ActionId): boolean {
  return input.context.availableActions.includes(actionId) && isAllowedByDirective(input.directive, actionId);
}

function buildPlan(input: PolicyInput, actionId: ActionId, reason: string): ActionPlan | undefined {
  const targetId = pickTarget(input.context, actionId);
  const plan: ActionPlan = { actionId, reason, source: "deterministic", ...(targetId ? { targetId } : {}) };

  if (actionId === "send_message") {
    const { settings, context } = input;
    const rules = {
      maxChars: settings.maxMessageChars,
      requireQuestion: settings.requireQuestion,
      blockOffAppContact: settings.blockOffAppContact
    };
    const name = context.content.threadPeerName ?? context.qualityFeatures.profileNameCandidate;
    const text = composeTemplateMessage(settings.template, name, rules);
    if (checkMessage(text, rules).length > 0) {
      return undefined;
    }
    plan.messageText = text;
  }
  return plan;
}

function nextExploreStep(input: PolicyInput): { actionId: ActionId; nextIndex: number } | undefined {
  const length = EXPLORE_CYCLE.length;
  for (let offset = 0; offset < length; offset += 1) {
    const index = (input.state.exploreIndex + offset) % length;
    const actionId = EXPLORE_CYCLE[index];
    if (actionId !== input.state.lastActionId && isOffered(input, actionId)) {
      return { actionId, nextIndex: (index + 1) % length };
    }
  }
  return undefined;
}
