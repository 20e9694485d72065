import { isThreadRowResource } from "./classifier.js";
import { sha256Text } from "./fingerprint.js";
import { nodeLabel } from "./ui-tree.js";
import type {
  Bounds,
  ExtractedContent,
  Extraction,
  InteractionTarget,
  Observation,
  Point,
  PromptPair,
  QualityFeatures,
  QualityFlag,
  QualityScoreVersion,
  ScreenType,
  TargetKind,
  UiNode
} from "./types.js";

export const QUALITY_SCORE_VERSION: QualityScoreVersion = "quality_score_v1";

/** Weights of quality_score_v1. Changing any of these requires a new score version. */
export const QUALITY_WEIGHTS_V1 = {
  discoverSurface: 20,
  selfieVerified: 20,
  activeToday: 15,
  voicePrompt: 10,
  promptAnswer: 15,
  perLikeTarget: 8,
  likeTargetCap: 3,
  profileName: 8
} as const;

const MAX_TARGETS = 160;
const MAX_CONTEXT_LABEL_CHARS = 220;
const LIKE_CONTEXT_MAX_DY = 260;

const PROMPT_ANSWER_PATTERN = /^\s*prompt:\s*(.*?)\s*answer:\s*(.*?)\s*$/is;
const PHOTO_NAME_PATTERN = /^(.+?)['’]s photo$/i;
const THREAD_PEER_PATTERN = /^(?:conversation|chat) with (.+)$/i;

const FLAG_SIGNALS: ReadonlyArray<[QualityFlag, string]> = [
  ["selfie_verified", "selfie verified"],
  ["active_today", "active today"],
  ["has_voice_prompt", "voice prompt"]
];

// App-level labels that are never profile content.
const CHROME_EXACT = new Set([
  "discover",
  "matches",
  "likes you",
  "standouts",
  "profile hub",
  "back",
  "more",
  "send",
  "skip",
  "close",
  "close sheet",
  "boost your profile",
  "send like",
  "add a comment",
  "edit comment"
]);

const CHROME_SUBSTRINGS = [
  "type a message",
  "when a like is mutual",
  "no matches yet",
  "like photo",
  "like prompt",
  "voice prompt",
  "rose",
  "send like with message",
  "undo the previous pass rating"
];

const TAB_KINDS: Readonly<Record<string, TargetKind>> = {
  discover: "tab_discover",
  matches: "tab_matches",
  "likes you": "tab_likes_you",
  standouts: "tab_standouts",
  "profile hub": "tab_profile_hub"
};

export function extract(observation: Observation, screenType: ScreenType = observation.screenType): Extraction {
  const qualityFeatures = extractQualityFeatures(observation.rawStrings);
  return {
    content: extractContent(screenType, observation.rawStrings, qualityFeatures),
    qualityScore: scoreQuality(screenType, qualityFeatures),
    qualityScoreVersion: QUALITY_SCORE_VERSION,
    qualityFeatures,
    targets: extractTargets(observation.nodes),
    fingerprint: screenFingerprint(screenType, qualityFeatures, observation.rawStrings)
  };
}

export function extractQualityFeatures(strings: readonly string[]): QualityFeatures {
  let profileNameCandidate: string | undefined;
  const promptPairs: PromptPair[] = [];
  const likeTargets: string[] = [];
  const flags = new Set<QualityFlag>();
  const bioCandidates: string[] = [];

  for (const raw of strings) {
    const value = raw.trim();
    const lowered = value.toLowerCase();

    const photoMatch = PHOTO_NAME_PATTERN.exec(value);
    if (photoMatch && profileNameCandidate === undefined) {
      const name = photoMatch[1].trim();
      profileNameCandidate = name.length > 0 ? name : undefined;
    }

    const promptMatch = PROMPT_ANSWER_PATTERN.exec(value);
    if (promptMatch) {
      promptPairs.push({ prompt: promptMatch[1].trim(), answer: promptMatch[2].trim() });
    }

    if (lowered.startsWith("like ")) {
      likeTargets.push(value);
    }

    for (const [flag, signal] of FLAG_SIGNALS) {
      if (lowered.includes(signal)) {
        flags.add(flag);
      }
    }

    if (!isChromeText(value) && value.length >= 3 && value.length <= 180) {
      bioCandidates.push(value);
    }
  }

  const promptAnswer = promptPairs.find((pair) => pair.answer.length > 0)?.answer;
  const signals = [
    profileNameCandidate !== undefined,
    promptPairs.length > 0,
    likeTargets.length > 0,
    flags.size > 0,
    bioCandidates.length > 0
  ].filter(Boolean).length;

  return {
    profileNameCandidate,
    promptAnswer,
    promptPairs,
    likeTargets,
    qualityFlags: [...flags].sort(),
    bioCandidates: bioCandidates.slice(0, 30),
    completenessPct: Math.round((signals / 5) * 100)
  };
}

export function scoreQuality(screenType: ScreenType, features: QualityFeatures): number {
  if (screenType === "matches-empty") {
    return 0;
  }

  const weights = QUALITY_WEIGHTS_V1;
  const flags = new Set(features.qualityFlags);
  let score = 0;
  if (screenType === "discover-card") {
    score += weights.discoverSurface;
  }
  if (flags.has("selfie_verified")) {
    score += weights.selfieVerified;
  }
  if (flags.has("active_today")) {
    score += weights.activeToday;
  }
  if (flags.has("has_voice_prompt")) {
    score += weights.voicePrompt;
  }
  if (features.promptAnswer) {
    score += weights.promptAnswer;
  }
  score += Math.min(features.likeTargets.length, weights.likeTargetCap) * weights.perLikeTarget;
  if (features.profileNameCandidate) {
    score += weights.profileName;
  }
  return Math.max(0, Math.min(score, 100));
}

export function extractContent(
  screenType: ScreenType,
  strings: readonly string[],
  features: QualityFeatures
): ExtractedContent {
  const content: ExtractedContent = {
    profileName: features.profileNameCandidate,
    promptAnswer: features.promptAnswer,
    threadLines: []
  };

  if (screenType === "chat-thread") {
    for (const raw of strings) {
      const value = raw.trim();
      const peer = THREAD_PEER_PATTERN.exec(value);
      if (peer && content.threadPeerName === undefined) {
        content.threadPeerName = peer[1].trim();
        continue;
      }
      if (!isChromeText(value) && value.length >= 1 && value.length <= 500) {
        content.threadLines.push(value);
      }
    }
  }

  return content;
}

export function extractTargets(nodes: readonly UiNode[]): InteractionTarget[] {
  const contextNodes = nodes.flatMap((node) => {
    const label = nodeLabel(node);
    if (!node.bounds || !label || isChromeText(label) || label.length > MAX_CONTEXT_LABEL_CHARS) {
      return [];
    }
    return [{ label, center: center(node.bounds) }];
  });

  const targets: InteractionTarget[] = [];
  const others: InteractionTarget[] = [];

  for (const node of nodes) {
    if (!node.bounds || !node.enabled) {
      continue;
    }
    const label = nodeLabel(node);
    const kind = targetKindFor(node, label);
    if (!kind) {
      continue;
    }

    const tapPoint = center(node.bounds);
    const target: InteractionTarget = {
      targetId: `${kind}:${node.ordinal}`,
      kind,
      label: label.length > 0 ? label : undefined,
      bounds: { ...node.bounds },
      tapPoint,
      resourceId: node.resourceId
    };

    if (kind === "like_button") {
      target.contextText = likeContext(tapPoint, contextNodes);
    }

    if (kind === "clickable_other") {
      others.push(target);
    } else {
      targets.push(target);
    }
  }

  return [...targets, ...others].slice(0, MAX_TARGETS);
}

/** Stable identity of a screen's visible state, used to decide whether an action changed anything. */
export function screenFingerprint(
  screenType: ScreenType,
  features: QualityFeatures,
  strings: readonly string[]
): string {
  return sha256Text(
    [
      screenType,
      features.profileNameCandidate ?? "",
      features.promptAnswer ?? "",
      features.qualityFlags.slice(0, 6).join("|"),
      strings.slice(0, 12).join("|")
    ].join("||")
  );
}

export function isChromeText(text: string): boolean {
  const lowered = text.trim().toLowerCase();
  if (lowered.length === 0 || CHROME_EXACT.has(lowered)) {
    return true;
  }
  if (CHROME_SUBSTRINGS.some((needle) => lowered.includes(needle))) {
    return true;
  }
  return lowered.startsWith("like ") || lowered.startsWith("prompt:");
}

function targetKindFor(node: UiNode, label: string): TargetKind | undefined {
  const lowered = label.toLowerCase();
  const isEditText = node.className?.endsWith("EditText") ?? false;

  if (isEditText) {
    if (lowered.includes("add a comment") || lowered.includes("edit comment")) {
      return "comment_input";
    }
    return "message_input";
  }
  if (!node.clickable) {
    return undefined;
  }
  if (isThreadRowResource(node.resourceId) || lowered.startsWith("conversation with ")) {
    return "thread_row";
  }
  if (!label) {
    return undefined;
  }
  if (lowered.startsWith("like ")) {
    return "like_button";
  }
  if (lowered === "skip" || lowered.startsWith("skip ")) {
    return "pass_button";
  }
  if (lowered === "send like" || lowered === "send like with message") {
    return "send_like";
  }
  if (lowered.includes("add a comment") || lowered.includes("edit comment")) {
    return "comment_input";
  }
  if (lowered === "close" || lowered === "close sheet") {
    return "close_overlay";
  }
  if (lowered === "send") {
    return "send_button";
  }
  const tab = TAB_KINDS[lowered];
  if (tab) {
    return tab;
  }
  return "clickable_other";
}

// Nearest content left of and vertically aligned with a like affordance, at most two lines.
function likeContext(likePoint: Point, contextNodes: ReadonlyArray<{ label: string; center: Point }>): string[] {
  const scored = contextNodes
    .filter((entry) => Math.abs(entry.center.y - likePoint.y) <= LIKE_CONTEXT_MAX_DY && entry.center.x < likePoint.x)
    .map((entry) => ({
      label: entry.label,
      score: Math.abs(entry.center.y - likePoint.y) + Math.abs(entry.center.x - likePoint.x) * 0.25
    }))
    .sort((a, b) => a.score - b.score);

  const context: string[] = [];
  for (const entry of scored) {
    const normalized = entry.label.split(/\s+/).join(" ").trim();
    if (normalized.length === 0 || context.includes(normalized)) {
      continue;
    }
    context.push(normalized);
    if (context.length >= 2) {
      break;
    }
  }
  return context;
}

function center(bounds: Bounds): Point {
  return {
    x: Math.trunc((bounds.x1 + bounds.x2) / 2),
    y: Math.trunc((bounds.y1 + bounds.y2) / 2)
  };
}
