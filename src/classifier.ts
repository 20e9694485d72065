import type { Observation, ScreenType, UiNode } from "./types.js";

interface ClassifierInput {
  /** Trimmed, lower-cased accessible strings in capture order. */
  lowered: readonly string[];
  nodes: readonly UiNode[];
}

interface ScreenMatcher {
  screenType: Exclude<ScreenType, "unknown">;
  description: string;
  matches: (input: ClassifierInput) => boolean;
}

const THREAD_ROW_RESOURCE = /(?:match|conversation|thread)_(?:row|item|list_item)$/i;

const someIncludes = (input: ClassifierInput, ...needles: string[]): boolean =>
  input.lowered.some((value) => needles.some((needle) => value.includes(needle)));

const someStartsWith = (input: ClassifierInput, prefix: string): boolean =>
  input.lowered.some((value) => value.startsWith(prefix));

const someEquals = (input: ClassifierInput, expected: string): boolean =>
  input.lowered.some((value) => value === expected);

// Order is the precedence: overlays shadow whatever surface sits underneath them.
export const SCREEN_MATCHERS: readonly ScreenMatcher[] = [
  {
    screenType: "overlay-paywall",
    description: "like paywall sheet",
    matches: (input) => someIncludes(input, "out of free likes")
  },
  {
    screenType: "overlay-generic",
    description: "rose upsell or other dismissable sheet",
    matches: (input) =>
      (someIncludes(input, "close sheet") && someIncludes(input, "rose")) ||
      someIncludes(input, "catch their eye by sending a rose")
  },
  {
    screenType: "matches-empty",
    description: "matches tab without conversations",
    matches: (input) => someIncludes(input, "no matches yet", "when a like is mutual")
  },
  {
    screenType: "discover-card",
    description: "profile card with like and skip affordances, or its comment composer",
    matches: (input) => {
      const likeSignal = someStartsWith(input, "like ") || someIncludes(input, "send like with message");
      const passSignal =
        someStartsWith(input, "skip ") ||
        someEquals(input, "skip") ||
        someIncludes(input, "undo the previous pass rating");
      const composerSignal = someIncludes(input, "edit comment", "add a comment", "send like with message");
      return (likeSignal && passSignal) || composerSignal;
    }
  },
  {
    screenType: "chat-thread",
    description: "conversation with a message composer",
    matches: (input) => someIncludes(input, "type a message") || someEquals(input, "send")
  },
  {
    screenType: "matches-list",
    description: "list of conversation rows",
    matches: (input) =>
      someStartsWith(input, "conversation with ") ||
      input.nodes.some((node) => node.resourceId !== undefined && THREAD_ROW_RESOURCE.test(node.resourceId))
  },
  {
    screenType: "tab-shell",
    description: "bottom navigation without a recognised surface",
    matches: (input) => someEquals(input, "matches") && someEquals(input, "discover")
  }
];

export function classify(observation: Pick<Observation, "rawStrings" | "nodes">): ScreenType {
  return classifyStrings(observation.rawStrings, observation.nodes);
}

export function classifyStrings(strings: readonly string[], nodes: readonly UiNode[] = []): ScreenType {
  const input: ClassifierInput = {
    lowered: strings.map((value) => value.trim().toLowerCase()),
    nodes
  };
  for (const matcher of SCREEN_MATCHERS) {
    if (matcher.matches(input)) {
      return matcher.screenType;
    }
  }
  return "unknown";
}

export function isThreadRowResource(resourceId: string | undefined): boolean {
  return resourceId !== undefined && THREAD_ROW_RESOURCE.test(resourceId);
}
