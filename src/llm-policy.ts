import type { ChatCompletionContentPart } from "openai/resources/chat/completions";
import { describeCatalog, getCatalogEntry, isCatalogAction, requiredTargetKinds } from "./catalog.js";
import type { PolicySettings } from "./config.js";
import { formatZodIssues, modelDecisionSchema, type DecisionEngineConfig, type ProfileConfig } from "./contracts.js";
import { isAllowedByDirective } from "./directive.js";
import { ModelError } from "./errors.js";
import { checkMessage } from "./message-checks.js";
import type { ModelRequest } from "./model-client.js";
import type { ActionId, ActionPlan, Directive, PacketContext } from "./types.js";

export interface LlmPolicyOptions {
  llm: DecisionEngineConfig["llm"];
  model: string;
  profile: ProfileConfig;
  settings: PolicySettings;
}

const SYSTEM_PROMPT = [
  "You choose the next action for an agent operating a dating app on a phone.",
  "Pick exactly one action_id from available_actions, using the packet, the directive and the profile policies.",
  "Reply with a JSON object with keys action_id (string), message_text (string or null), target_id (string or null), reason (string).",
  "message_text is required for actions that require a message and must be null otherwise.",
  "Messages must respect persona.maxMessageChars, ask a question when persona.requireQuestion is true,",
  "follow persona.hardBoundaries and never share contact details, links or other apps.",
  "Set target_id to one of packet.targets when several targets could serve the action (for example several like buttons).",
  "Do not include any other keys."
].join(" ");

export function offeredActions(context: PacketContext, directive: Directive): ActionId[] {
  return context.availableActions.filter((actionId) => isAllowedByDirective(directive, actionId));
}

export function buildDecisionRequest(
  context: PacketContext,
  directive: Directive,
  options: LlmPolicyOptions
): ModelRequest {
  const offered = offeredActions(context, directive);
  const catalog = describeCatalog().filter((entry) => offered.includes(entry.actionId));
  const { settings, profile } = options;

  const payload = {
    available_actions: offered,
    action_catalog: catalog,
    directive: {
      query: directive.query ?? null,
      goal: directive.goal,
      caps: directive.caps
    },
    remaining: {
      likes: Math.max(0, settings.maxLikes - context.counters.likes),
      passes: Math.max(0, settings.maxPasses - context.counters.passes),
      messages: Math.max(0, settings.maxMessages - context.counters.messages)
    },
    profile: {
      name: profile.name,
      persona: profile.persona,
      swipePolicy: { ...profile.swipePolicy, minQualityScoreLike: settings.minQualityScoreLike },
      messagePolicy: { ...profile.messagePolicy, enabled: settings.messageEnabled },
      llmCriteria: profile.llmCriteria
    },
    packet: {
      screenType: context.screenType,
      qualityScore: context.qualityScore,
      qualityScoreVersion: context.qualityScoreVersion,
      qualityFeatures: context.qualityFeatures,
      content: context.content,
      observedStrings: context.observedStrings.slice(0, options.llm.maxObservedStrings),
      targets: context.targets.filter((target) => target.kind !== "clickable_other"),
      counters: context.counters
    }
  };

  const userContent: ChatCompletionContentPart[] = [{ type: "text", text: JSON.stringify(payload) }];
  if (options.llm.includeScreenshot && context.screenshot) {
    userContent.push({
      type: "image_url",
      image_url: {
        url: `data:image/png;base64,${context.screenshot.png.toString("base64")}`,
        detail: options.llm.imageDetail
      }
    });
  }

  return {
    model: options.model,
    temperature: options.llm.temperature,
    timeoutMs: options.llm.timeoutMs,
    jsonMode: true,
    messages: [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: userContent }
    ]
  };
}

export function extractFirstJsonObject(raw: string): unknown {
  const text = raw.trim();
  const start = text.indexOf("{");
  if (start < 0) {
    throw new ModelError("malformed_response", "Model response contains no JSON object");
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        try {
          return JSON.parse(text.slice(start, index + 1));
        } catch (error) {
          throw new ModelError("malformed_response", `Model response is not valid JSON: ${String(error)}`);
        }
      }
    }
  }
  throw new ModelError("malformed_response", "Model response has an unterminated JSON object");
}

/**
 * Turns model output into a plan, or rejects it. Nothing is repaired: a response that names an
 * unavailable action, breaks a message rule or leaves its target ambiguous is invalid.
 */
export function parseDecisionResponse(
  content: string,
  context: PacketContext,
  directive: Directive,
  options: Pick<LlmPolicyOptions, "settings" | "profile">
): ActionPlan {
  const parsed = modelDecisionSchema.safeParse(extractFirstJsonObject(content));
  if (!parsed.success) {
    throw invalid(`unexpected response shape: ${formatZodIssues(parsed.error)}`);
  }
  const response = parsed.data;

  const actionId = response.action_id;
  if (!isCatalogAction(actionId)) {
    throw invalid(`unknown action '${actionId}'`);
  }
  const offered = offeredActions(context, directive);
  if (!offered.includes(actionId)) {
    throw invalid(`action '${actionId}' is not in available_actions [${offered.join(", ")}]`);
  }
  assertWithinCaps(actionId, context, options.settings);

  const entry = getCatalogEntry(actionId);
  const messageText = response.message_text?.trim() ? response.message_text : undefined;
  if (entry.requiresMessage) {
    if (messageText === undefined) {
      throw invalid(`action '${actionId}' requires message_text`);
    }
    const issues = checkMessage(messageText, {
      maxChars: options.settings.maxMessageChars,
      requireQuestion: options.settings.requireQuestion,
      blockOffAppContact: options.settings.blockOffAppContact,
      hardBoundaries: options.profile.persona.hardBoundaries
    });
    if (issues.length > 0) {
      throw invalid(`message_text rejected: ${issues.join(", ")}`);
    }
  } else if (messageText !== undefined) {
    throw invalid(`action '${actionId}' does not take message_text`);
  }

  const targetId = resolveTarget(actionId, response.target_id ?? undefined, context);
  const plan: ActionPlan = {
    actionId,
    reason: response.reason?.trim() || "llm_selected_action",
    source: "llm"
  };
  if (targetId !== undefined) {
    plan.targetId = targetId;
  }
  if (messageText !== undefined) {
    plan.messageText = messageText.trim();
  }
  return plan;
}

function assertWithinCaps(actionId: ActionId, context: PacketContext, settings: PolicySettings): void {
  const { counters } = context;
  if (actionId === "like" && counters.likes >= settings.maxLikes) {
    throw invalid(`like cap of ${settings.maxLikes} reached`);
  }
  if (actionId === "pass" && counters.passes >= settings.maxPasses) {
    throw invalid(`pass cap of ${settings.maxPasses} reached`);
  }
  if (actionId === "send_message" && counters.messages >= settings.maxMessages) {
    throw invalid(`message cap of ${settings.maxMessages} reached`);
  }
}

function resolveTarget(actionId: ActionId, requested: string | undefined, context: PacketContext): string | undefined {
  const kinds = requiredTargetKinds(actionId, context.screenType) ?? [];
  if (kinds.length === 0) {
    if (requested !== undefined) {
      throw invalid(`action '${actionId}' does not take target_id`);
    }
    return undefined;
  }

  if (requested !== undefined) {
    const target = context.targets.find((candidate) => candidate.targetId === requested);
    if (!target) {
      throw invalid(`target_id '${requested}' is not on screen`);
    }
    if (!kinds.includes(target.kind)) {
      throw invalid(`target_id '${requested}' is a ${target.kind}, not usable for '${actionId}'`);
    }
    return target.targetId;
  }

  for (const kind of kinds) {
    const matches = context.targets.filter((candidate) => candidate.kind === kind);
    if (matches.length === 1) {
      return matches[0].targetId;
    }
    if (matches.length > 1) {
      throw invalid(`target for '${actionId}' is ambiguous: ${matches.length} ${kind} targets and no target_id`);
    }
  }
  throw invalid(`no target on screen for '${actionId}'`);
}

function invalid(message: string): ModelError {
  return new ModelError("invalid_response", message);
}
