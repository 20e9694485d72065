import { z } from "zod";
import { ConfigError } from "./errors.js";
import { ACTION_IDS, QUALITY_FLAGS, SCREEN_TYPES, TARGET_KINDS } from "./types.js";

export const actionIdSchema = z.enum(ACTION_IDS);
export const screenTypeSchema = z.enum(SCREEN_TYPES);
export const targetKindSchema = z.enum(TARGET_KINDS);
export const qualityFlagSchema = z.enum(QUALITY_FLAGS);

const llmSchema = z
  .object({
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).default(0.1),
    timeoutMs: z.number().int().positive().default(30_000),
    apiKeyEnv: z.string().min(1).default("OPENAI_API_KEY"),
    baseUrl: z.string().url().default("https://api.openai.com/v1"),
    includeScreenshot: z.boolean().default(true),
    imageDetail: z.enum(["low", "high", "auto"]).default("auto"),
    maxObservedStrings: z.number().int().positive().default(120),
    retryBackoffMs: z.number().int().nonnegative().default(750)
  })
  .strict();

export const decisionEngineSchema = z
  .object({
    type: z.enum(["deterministic", "llm"]).default("deterministic"),
    llmFailureMode: z.enum(["fail", "fallback_deterministic"]).default("fail"),
    llm: llmSchema.default({})
  })
  .strict()
  .superRefine((value, context) => {
    if (value.type === "llm" && !value.llm.model) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["llm", "model"],
        message: "llm.model is required when type is 'llm'"
      });
    }
  });

const personaSchema = z
  .object({
    archetype: z.string().optional(),
    intent: z.string().optional(),
    toneTraits: z.array(z.string().min(1)).default([]),
    hardBoundaries: z.array(z.string().min(1)).default([]),
    preferredSignals: z.array(z.string().min(1)).default([]),
    avoidSignals: z.array(z.string().min(1)).default([]),
    openerStrategy: z.string().optional(),
    examples: z.array(z.string().min(1)).default([]),
    maxMessageChars: z.number().int().min(1).max(500).default(180),
    requireQuestion: z.boolean().default(true),
    blockOffAppContact: z.boolean().default(true)
  })
  .strict();

const swipePolicySchema = z
  .object({
    minQualityScoreLike: z.number().int().min(0).max(100).default(70),
    requireFlagsAll: z.array(qualityFlagSchema).default([]),
    blockPromptKeywords: z.array(z.string().min(1)).default([]),
    maxLikes: z.number().int().nonnegative().default(20),
    maxPasses: z.number().int().nonnegative().default(120)
  })
  .strict();

const messagePolicySchema = z
  .object({
    enabled: z.boolean().default(false),
    minQualityScoreToMessage: z.number().int().min(0).max(100).default(85),
    maxMessages: z.number().int().nonnegative().default(5),
    template: z.string().min(1).default("Hey {{name}}, how's your week going?")
  })
  .strict();

export const profileSchema = z
  .object({
    name: z.string().min(1).default("default"),
    persona: personaSchema.default({}),
    swipePolicy: swipePolicySchema.default({}),
    messagePolicy: messagePolicySchema.default({}),
    llmCriteria: z.record(z.string(), z.unknown()).default({})
  })
  .strict();

export const validationSchema = z
  .object({
    enabled: z.boolean().default(true),
    settleDelayMs: z.number().int().nonnegative().default(800),
    requireScreenChangeFor: z
      .array(actionIdSchema)
      .default(["like", "pass", "open_thread", "send_message", "back", "dismiss_overlay"]),
    maxConsecutiveFailures: z.number().int().positive().default(4),
    changeSignal: z.enum(["fingerprint", "screen_type"]).default("fingerprint"),
    observeTimeoutMs: z.number().int().positive().default(10_000)
  })
  .strict();

const foregroundRecoverySchema = z
  .object({
    enabled: z.boolean().default(true),
    maxAttempts: z.number().int().positive().default(3),
    cooldownMs: z.number().int().nonnegative().default(1000)
  })
  .strict();

const artifactsSchema = z
  .object({
    dir: z.string().min(1).default("artifacts/live"),
    persistPacketLog: z.boolean().default(true),
    captureScreenshot: z.boolean().default(false),
    captureXml: z.boolean().default(false)
  })
  .strict();

export const appiumSchema = z
  .object({
    serverUrl: z.string().url().default("http://127.0.0.1:4723"),
    capabilities: z.record(z.string(), z.unknown()).default({}),
    timeoutMs: z.number().int().positive().default(30_000)
  })
  .strict();

export const runConfigSchema = z
  .object({
    targetPackage: z.string().min(1).optional(),
    directive: z.string().optional(),
    dryRun: z.boolean().default(true),
    maxActions: z.number().int().positive().default(30),
    maxRuntimeS: z.number().int().positive().default(300),
    loopSleepMs: z.number().int().nonnegative().default(1000),
    maxNodes: z.number().int().positive().default(3500),
    decisionEngine: decisionEngineSchema.default({}),
    profile: profileSchema.default({}),
    validation: validationSchema.default({}),
    foregroundRecovery: foregroundRecoverySchema.default({}),
    artifacts: artifactsSchema.default({}),
    appium: appiumSchema.optional()
  })
  .strict();

export type RunConfig = z.infer<typeof runConfigSchema>;
export type RunConfigInput = z.input<typeof runConfigSchema>;
export type DecisionEngineConfig = z.infer<typeof decisionEngineSchema>;
export type ProfileConfig = z.infer<typeof profileSchema>;
export type ValidationConfig = z.infer<typeof validationSchema>;
export type AppiumConfig = z.infer<typeof appiumSchema>;

const qualityFeaturesSchema = z.object({
  profileNameCandidate: z.string().optional(),
  promptAnswer: z.string().optional(),
  promptPairs: z.array(z.object({ prompt: z.string(), answer: z.string() })).default([]),
  likeTargets: z.array(z.string()).default([]),
  qualityFlags: z.array(qualityFlagSchema).default([]),
  bioCandidates: z.array(z.string()).default([]),
  completenessPct: z.number().min(0).max(100).default(0)
});

const countersSchema = z.object({
  actions: z.number().int().nonnegative().default(0),
  likes: z.number().int().nonnegative().default(0),
  passes: z.number().int().nonnegative().default(0),
  messages: z.number().int().nonnegative().default(0)
});

/** Packet fields a decision depends on; both live packets and dataset cases satisfy it. */
export const packetContextSchema = z.object({
  screenType: screenTypeSchema,
  packageName: z.string().optional(),
  qualityScore: z.number().min(0).max(100),
  qualityScoreVersion: z.literal("quality_score_v1").default("quality_score_v1"),
  qualityFeatures: qualityFeaturesSchema.default({}),
  content: z
    .object({
      profileName: z.string().optional(),
      promptAnswer: z.string().optional(),
      threadPeerName: z.string().optional(),
      threadLines: z.array(z.string()).default([])
    })
    .default({}),
  availableActions: z.array(actionIdSchema).min(1),
  observedStrings: z.array(z.string()).default([]),
  targets: z
    .array(
      z.object({
        targetId: z.string().min(1),
        kind: targetKindSchema,
        label: z.string().optional(),
        contextText: z.array(z.string()).optional()
      })
    )
    .default([]),
  counters: countersSchema.default({})
});

export const actionPlanSchema = z.object({
  actionId: actionIdSchema,
  targetId: z.string().min(1).optional(),
  messageText: z.string().optional(),
  reason: z.string(),
  source: z.enum(["deterministic", "llm", "llm_fallback"]),
  fallbackReason: z.string().optional()
});

/** A packet as read back from a packet log; fields the readers do not use pass through. */
export const loggedPacketSchema = packetContextSchema
  .extend({
    version: z.literal(1),
    sessionId: z.string().min(1),
    iteration: z.number().int().positive(),
    timestamp: z.string().min(1),
    directive: z.string().optional(),
    decision: actionPlanSchema,
    screenshotRef: z.string().optional(),
    xmlRef: z.string().optional()
  })
  .passthrough();

export const messageConstraintsSchema = z
  .object({
    required: z.boolean().optional(),
    maxChars: z.number().int().positive().optional(),
    requireQuestion: z.boolean().optional(),
    mustInclude: z.array(z.string().min(1)).optional(),
    mustNotInclude: z.array(z.string().min(1)).optional(),
    minJudgeScore: z.number().min(0).max(100).optional()
  })
  .strict();

export const regressionCaseSchema = z
  .object({
    id: z.string().min(1),
    packet: packetContextSchema,
    directive: z.string().optional(),
    expectedActionSet: z.array(actionIdSchema).min(1),
    expectedMessageConstraints: messageConstraintsSchema.optional(),
    screenshotPath: z.string().min(1).optional()
  })
  .strict();

export const baselineFileSchema = z
  .object({
    version: z.literal(1),
    configName: z.string().min(1),
    model: z.string().min(1),
    temperature: z.number(),
    createdAt: z.string().min(1),
    entries: z.array(
      z
        .object({
          caseId: z.string().min(1),
          actionId: actionIdSchema,
          messageText: z.string().optional()
        })
        .strict()
    )
  })
  .strict()
  .superRefine((value, context) => {
    const seen = new Set<string>();
    value.entries.forEach((entry, index) => {
      if (seen.has(entry.caseId)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entries", index, "caseId"],
          message: `duplicate baseline entry for case '${entry.caseId}'`
        });
      }
      seen.add(entry.caseId);
    });
  });

/** Shape the model must answer with; anything else is an invalid response. */
export const modelDecisionSchema = z
  .object({
    action_id: z.string().min(1),
    message_text: z.string().nullable().optional(),
    target_id: z.string().min(1).nullable().optional(),
    reason: z.string().nullable().optional()
  })
  .strict();

export const judgeResponseSchema = z.object({
  score: z.number(),
  rationale: z.string().min(1)
});

export type LoggedPacket = z.infer<typeof loggedPacketSchema>;
export type RegressionCase = z.infer<typeof regressionCaseSchema>;
export type MessageConstraints = z.infer<typeof messageConstraintsSchema>;
export type BaselineFile = z.infer<typeof baselineFileSchema>;

export function parseRunConfig(input: unknown, source = "config"): RunConfig {
  return parseWith(runConfigSchema, input, source);
}

export function parseRegressionCase(input: unknown, source = "dataset"): RegressionCase {
  return parseWith(regressionCaseSchema, input, source);
}

export function parseBaselineFile(input: unknown, source = "baseline"): BaselineFile {
  return parseWith(baselineFileSchema, input, source);
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, source: string): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatZodIssues(result.error), source);
  }
  return result.data;
}
