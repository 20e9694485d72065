import { ConfigError } from "./errors.js";
import { isCatalogAction } from "./catalog.js";
import type { ActionId, Directive, DirectiveCaps, DirectiveGoal } from "./types.js";

const NAVIGATION_ACTIONS: readonly ActionId[] = [
  "goto_discover",
  "goto_matches",
  "goto_likes_you",
  "goto_standouts",
  "goto_profile_hub"
];

// Phrase -> one-shot action, first match wins.
const FORCED_ACTION_PHRASES: ReadonlyArray<[readonly string[], ActionId]> = [
  [["go to matches"], "goto_matches"],
  [["go to discover"], "goto_discover"],
  [["go to likes"], "goto_likes_you"],
  [["go to standouts"], "goto_standouts"],
  [["go to profile"], "goto_profile_hub"],
  [["go back", "press back"], "back"],
  [["dismiss overlay", "close overlay"], "dismiss_overlay"],
  [["open thread now", "force open thread"], "open_thread"],
  [["send message now", "force send message"], "send_message"],
  [["like now", "force like"], "like"],
  [["pass now", "force pass"], "pass"],
  [["wait now", "force wait", "do nothing now"], "wait"]
];

const ALLOWED_ACTION_ALIASES: Readonly<Record<string, readonly ActionId[]>> = {
  like: ["like"],
  likes: ["like"],
  liking: ["like"],
  pass: ["pass"],
  passes: ["pass"],
  skip: ["pass"],
  skips: ["pass"],
  message: ["send_message"],
  messages: ["send_message"],
  messaging: ["send_message"],
  wait: ["wait"],
  back: ["back"],
  dismiss: ["dismiss_overlay"],
  "dismiss overlay": ["dismiss_overlay"],
  "open thread": ["open_thread"],
  "open threads": ["open_thread"],
  navigate: NAVIGATION_ACTIONS,
  navigation: NAVIGATION_ACTIONS
};

const ONLY_PATTERN = /\bonly\s+([a-z_,\s]+?)(?=$|[.;!]|\s+(?:for|with|max|until|then)\b)/;

const EMPTY_DIRECTIVE = deepFreeze<Directive>({ goal: "swipe", caps: {} });

/**
 * Parses a free-text run directive into constraints. Called once per run; the result is
 * frozen and consulted by every decision.
 */
export function parseDirective(text: string | undefined): Directive {
  if (text === undefined || text.trim().length === 0) {
    return EMPTY_DIRECTIVE;
  }

  const query = text.trim();
  const lowered = query.toLowerCase();
  const caps: DirectiveCaps = {};

  let goal: DirectiveGoal = "swipe";
  if (lowered.includes("explore") || lowered.includes("free form") || lowered.includes("freely navigate")) {
    goal = "explore";
  }

  const forceActionOnce = FORCED_ACTION_PHRASES.find(([phrases]) =>
    phrases.some((phrase) => lowered.includes(phrase))
  )?.[1];

  const suppressesMessages = lowered.includes("don't message") || lowered.includes("do not message");
  if (lowered.includes("message") && !suppressesMessages) {
    goal = "message";
  }
  if (lowered.includes("swipe")) {
    goal = "swipe";
  }

  const actions = matchInt(lowered, /(?:for\s+)?(\d+)\s+actions/);
  if (actions !== undefined) {
    if (actions < 1) {
      throw new ConfigError(`action budget must be at least 1 (got ${actions})`, "directive");
    }
    caps.maxActions = actions;
  }
  assignCap(caps, "maxLikes", matchInt(lowered, /max\s+likes?\s+(\d+)/));
  assignCap(caps, "maxPasses", matchInt(lowered, /max\s+passes?\s+(\d+)/));
  assignCap(caps, "maxMessages", matchInt(lowered, /max\s+messages?\s+(\d+)/));

  const score = matchInt(lowered, /(?:score|quality)\s*(?:>=|above|over)?\s*(\d{1,3})/);
  if (score !== undefined) {
    if (score > 100) {
      throw new ConfigError(`quality threshold must be within 0-100 (got ${score})`, "directive");
    }
    caps.minQualityScoreLike = score;
  }

  const minutes = matchInt(lowered, /for\s+(\d+)\s+minutes?/);
  if (minutes !== undefined) {
    caps.maxRuntimeS = minutes * 60;
  }
  const seconds = matchInt(lowered, /for\s+(\d+)\s+seconds?/);
  if (seconds !== undefined) {
    caps.maxRuntimeS = seconds;
  }

  let dryRun: boolean | undefined;
  if (lowered.includes("dry run")) {
    dryRun = true;
  }
  if (lowered.includes("live run") || lowered.includes("execute")) {
    dryRun = false;
  }

  let messageEnabled: boolean | undefined;
  if (suppressesMessages) {
    messageEnabled = false;
  } else if (lowered.includes("message")) {
    messageEnabled = true;
  }

  return deepFreeze<Directive>({
    query,
    goal,
    forceActionOnce,
    caps,
    allowedActions: parseAllowedActions(lowered),
    dryRun,
    messageEnabled
  });
}

/** Actions permitted by the directive; wait is always permitted. */
export function isAllowedByDirective(directive: Directive, actionId: ActionId): boolean {
  if (!directive.allowedActions || actionId === "wait") {
    return true;
  }
  return directive.allowedActions.includes(actionId);
}

function parseAllowedActions(lowered: string): ActionId[] | undefined {
  const match = ONLY_PATTERN.exec(lowered);
  if (!match) {
    return undefined;
  }

  const tokens = match[1]
    .split(/,|\band\b|\bor\b/)
    .map((token) => token.trim().replace(/\s+/g, " "))
    .filter((token) => token.length > 0);

  const allowed = new Set<ActionId>();
  for (const token of tokens) {
    const mapped = ALLOWED_ACTION_ALIASES[token] ?? (isCatalogAction(token) ? [token] : undefined);
    if (!mapped) {
      throw new ConfigError(`unknown action '${token}' in allowed-action list`, "directive");
    }
    for (const actionId of mapped) {
      allowed.add(actionId);
    }
  }

  if (allowed.size === 0) {
    throw new ConfigError("allowed-action list names no actions", "directive");
  }
  return [...allowed];
}

function matchInt(text: string, pattern: RegExp): number | undefined {
  const match = pattern.exec(text);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

function assignCap<K extends keyof DirectiveCaps>(caps: DirectiveCaps, key: K, value: DirectiveCaps[K]): void {
  if (value !== undefined) {
    caps[key] = value;
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
    Object.freeze(value);
  }
  return value;
}
