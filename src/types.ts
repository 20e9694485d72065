export const SCREEN_TYPES = [
  "discover-card",
  "matches-list",
  "matches-empty",
  "chat-thread",
  "tab-shell",
  "overlay-paywall",
  "overlay-generic",
  "unknown"
] as const;

export type ScreenType = (typeof SCREEN_TYPES)[number];

export const ACTION_IDS = [
  "goto_discover",
  "goto_matches",
  "goto_likes_you",
  "goto_standouts",
  "goto_profile_hub",
  "open_thread",
  "like",
  "pass",
  "send_message",
  "dismiss_overlay",
  "back",
  "wait"
] as const;

export type ActionId = (typeof ACTION_IDS)[number];

export const TARGET_KINDS = [
  "like_button",
  "pass_button",
  "send_like",
  "comment_input",
  "message_input",
  "send_button",
  "close_overlay",
  "tab_discover",
  "tab_matches",
  "tab_likes_you",
  "tab_standouts",
  "tab_profile_hub",
  "thread_row",
  "clickable_other"
] as const;

export type TargetKind = (typeof TARGET_KINDS)[number];

export const QUALITY_FLAGS = ["selfie_verified", "active_today", "has_voice_prompt"] as const;

export type QualityFlag = (typeof QUALITY_FLAGS)[number];

export interface Bounds {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface UiNode {
  ordinal: number;
  className?: string;
  resourceId?: string;
  packageName?: string;
  text?: string;
  contentDesc?: string;
  clickable: boolean;
  enabled: boolean;
  focused: boolean;
  bounds?: Bounds;
}

export interface Screenshot {
  png: Buffer;
  width: number;
  height: number;
}

export interface RawCapture {
  xml: string;
  screenshot?: Screenshot;
  capturedAt?: string;
}

export interface Observation {
  readonly screenType: ScreenType;
  readonly rawStrings: readonly string[];
  readonly nodes: readonly UiNode[];
  readonly packageName?: string;
  readonly xml: string;
  readonly screenshot?: Screenshot;
  readonly capturedAt: string;
}

export interface TargetSummary {
  targetId: string;
  kind: TargetKind;
  label?: string;
  contextText?: string[];
}

export interface InteractionTarget extends TargetSummary {
  resourceId?: string;
  bounds: Bounds;
  tapPoint: Point;
}

export interface PromptPair {
  prompt: string;
  answer: string;
}

export interface QualityFeatures {
  profileNameCandidate?: string;
  promptAnswer?: string;
  promptPairs: PromptPair[];
  likeTargets: string[];
  qualityFlags: QualityFlag[];
  bioCandidates: string[];
  completenessPct: number;
}

export interface ExtractedContent {
  profileName?: string;
  promptAnswer?: string;
  threadPeerName?: string;
  threadLines: string[];
}

export type QualityScoreVersion = "quality_score_v1";

export interface Extraction {
  content: ExtractedContent;
  qualityScore: number;
  qualityScoreVersion: QualityScoreVersion;
  qualityFeatures: QualityFeatures;
  targets: InteractionTarget[];
  fingerprint: string;
}

export interface ActionCatalogEntry {
  actionId: ActionId;
  requiresTarget: boolean;
  requiresMessage: boolean;
  description: string;
  /** Screen types the action applies to, each with the target kinds that satisfy it (any one). */
  screens: "any" | Partial<Record<ScreenType, readonly TargetKind[]>>;
}

export type DecisionSource = "deterministic" | "llm" | "llm_fallback";

export interface ActionPlan {
  actionId: ActionId;
  targetId?: string;
  messageText?: string;
  reason: string;
  source: DecisionSource;
  fallbackReason?: string;
}

export interface RunCounters {
  actions: number;
  likes: number;
  passes: number;
  messages: number;
}

export type DirectiveGoal = "swipe" | "message" | "explore";

export interface DirectiveCaps {
  maxActions?: number;
  maxLikes?: number;
  maxPasses?: number;
  maxMessages?: number;
  maxRuntimeS?: number;
  minQualityScoreLike?: number;
}

export interface Directive {
  readonly query?: string;
  readonly goal: DirectiveGoal;
  readonly forceActionOnce?: ActionId;
  readonly caps: Readonly<DirectiveCaps>;
  readonly allowedActions?: readonly ActionId[];
  readonly dryRun?: boolean;
  readonly messageEnabled?: boolean;
}

/** Everything the decision engine sees for one cycle, live or replayed. */
export interface PacketContext {
  screenType: ScreenType;
  packageName?: string;
  qualityScore: number;
  qualityScoreVersion: QualityScoreVersion;
  qualityFeatures: QualityFeatures;
  content: ExtractedContent;
  availableActions: ActionId[];
  observedStrings: string[];
  targets: TargetSummary[];
  counters: RunCounters;
  screenshot?: Screenshot;
}

export interface DecisionState {
  counters: RunCounters;
  forcedActionPending: boolean;
  exploreIndex: number;
  lastActionId?: ActionId;
  consecutiveValidationFailures: number;
}

export interface PolicyEffects {
  consumeForcedAction?: boolean;
  nextExploreIndex?: number;
}

export interface ModelUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface LlmTrace {
  model: string;
  attempts: number;
  latencyMs: number;
  usage?: ModelUsage;
  rawContent?: string;
  errors: Array<{ kind: string; message: string }>;
}

export type DecisionResult =
  | { kind: "ok"; plan: ActionPlan; effects: PolicyEffects; trace?: LlmTrace }
  | { kind: "fallback"; plan: ActionPlan; reason: string; effects: PolicyEffects; trace?: LlmTrace }
  | { kind: "error"; errorKind: string; message: string; trace?: LlmTrace };

export type Primitive =
  | { kind: "tap"; x: number; y: number }
  | { kind: "swipe"; x1: number; y1: number; x2: number; y2: number; durationMs: number }
  | { kind: "type"; text: string }
  | { kind: "key"; keycode: number }
  | { kind: "back" };

export interface ExecutionStep {
  label: string;
  primitive?: Primitive;
  targetId?: string;
  issued: boolean;
}

export interface ExecutionReport {
  actionId: ActionId;
  dryRun: boolean;
  issued: number;
  steps: ExecutionStep[];
  status: "ok" | "failed";
  error?: string;
}

export type ValidatorState = "idle" | "issued" | "awaiting_check" | "passed" | "failed";

export interface ValidationOutcome {
  actionId: ActionId;
  preScreenType: ScreenType;
  postScreenType: ScreenType;
  changed: boolean;
  passed: boolean;
  state: "passed" | "failed";
  detail: string;
}

export interface Packet {
  version: 1;
  sessionId: string;
  iteration: number;
  timestamp: string;
  screenType: ScreenType;
  packageName?: string;
  qualityScore: number;
  qualityScoreVersion: QualityScoreVersion;
  qualityFeatures: QualityFeatures;
  content: ExtractedContent;
  availableActions: ActionId[];
  observedStrings: string[];
  targets: TargetSummary[];
  counters: RunCounters;
  directive?: string;
  decision: ActionPlan;
  llmTrace?: LlmTrace;
  execution?: ExecutionReport;
  validation?: ValidationOutcome;
  screenshotRef?: string;
  xmlRef?: string;
}

export type TerminationReason =
  | "completed"
  | "aborted_budget"
  | "aborted_validation"
  | "aborted_transport"
  | "stopped"
  | "error";

export interface CycleSummary {
  iteration: number;
  screenType: ScreenType;
  actionId: ActionId;
  source: DecisionSource;
  reason: string;
  qualityScore: number;
  validationPassed?: boolean;
}

export interface RunReport {
  sessionId: string;
  startedAt: string;
  endedAt: string;
  dryRun: boolean;
  directive?: string;
  terminationReason: TerminationReason;
  error?: string;
  cycles: CycleSummary[];
  countsByAction: Partial<Record<ActionId, number>>;
  counters: RunCounters;
  fallbacks: number;
  validationFailures: number;
  recoveries: number;
  packetLogPath?: string;
  actionLogPath?: string;
}
