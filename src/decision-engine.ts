import type { PolicySettings } from "./config.js";
import type { DecisionEngineConfig, ProfileConfig } from "./contracts.js";
import { ConfigError, ModelError } from "./errors.js";
import { buildDecisionRequest, parseDecisionResponse } from "./llm-policy.js";
import type { ModelClient } from "./model-client.js";
import { decideDeterministic, type PolicyInput } from "./policy.js";
import type { DecisionResult, DecisionState, Directive, LlmTrace, PacketContext, PolicyEffects } from "./types.js";

export interface DecisionEngineOptions {
  config: DecisionEngineConfig;
  profile: ProfileConfig;
  settings: PolicySettings;
  client?: ModelClient;
  sleep?: (ms: number) => Promise<void>;
}

const MAX_MODEL_ATTEMPTS = 2;

const defaultSleep = (ms: number): Promise<void> => new Promise((resolvePromise) => setTimeout(resolvePromise, ms));

export class DecisionEngine {
  private readonly config: DecisionEngineConfig;
  private readonly profile: ProfileConfig;
  private readonly settings: PolicySettings;
  private readonly client?: ModelClient;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: DecisionEngineOptions) {
    this.config = options.config;
    this.profile = options.profile;
    this.settings = options.settings;
    this.client = options.client;
    this.sleep = options.sleep ?? defaultSleep;
    if (this.config.type === "llm" && (!this.client || !this.config.llm.model)) {
      throw new ConfigError("llm decision engine needs llm.model and a model client", "decisionEngine");
    }
  }

  get mode(): DecisionEngineConfig["type"] {
    return this.config.type;
  }

  get modelId(): string {
    return this.config.type === "llm" ? (this.config.llm.model ?? "unknown") : "deterministic";
  }

  get temperature(): number {
    return this.config.type === "llm" ? this.config.llm.temperature : 0;
  }

  get policySettings(): PolicySettings {
    return this.settings;
  }

  get profileConfig(): ProfileConfig {
    return this.profile;
  }

  /** Decides one cycle. `settings` overrides the engine's policy settings for this call only. */
  async decide(
    context: PacketContext,
    directive: Directive,
    state: DecisionState,
    settings: PolicySettings = this.settings
  ): Promise<DecisionResult> {
    if (this.config.type === "deterministic" || !this.client || !this.config.llm.model) {
      const decision = decideDeterministic({ context, directive, settings, state });
      return { kind: "ok", plan: decision.plan, effects: decision.effects };
    }

    const model = this.config.llm.model;
    const client = this.client;
    const request = buildDecisionRequest(context, directive, {
      llm: this.config.llm,
      model,
      profile: this.profile,
      settings
    });
    const trace: LlmTrace = { model, attempts: 0, latencyMs: 0, errors: [] };

    for (;;) {
      trace.attempts += 1;
      try {
        const completion = await client.complete(request);
        trace.latencyMs += completion.latencyMs;
        trace.usage = completion.usage;
        trace.rawContent = completion.content;
        const plan = parseDecisionResponse(completion.content, context, directive, {
          settings,
          profile: this.profile
        });
        const effects: PolicyEffects =
          state.forcedActionPending && plan.actionId === directive.forceActionOnce ? { consumeForcedAction: true } : {};
        return { kind: "ok", plan, effects, trace };
      } catch (error) {
        if (!(error instanceof ModelError)) {
          throw error;
        }
        trace.errors.push({ kind: error.kind, message: error.message });
        if (error.transient && trace.attempts < MAX_MODEL_ATTEMPTS) {
          await this.sleep(this.config.llm.retryBackoffMs * trace.attempts);
          continue;
        }
        return this.resolveFailure(error, { context, directive, settings, state }, trace);
      }
    }
  }

  private resolveFailure(error: ModelError, input: PolicyInput, trace: LlmTrace): DecisionResult {
    if (this.config.llmFailureMode !== "fallback_deterministic") {
      return { kind: "error", errorKind: error.kind, message: error.message, trace };
    }

    const reason = `${error.kind}: ${error.message}`;
    const decision = decideDeterministic(input);
    return {
      kind: "fallback",
      plan: { ...decision.plan, source: "llm_fallback", fallbackReason: reason },
      reason,
      effects: decision.effects,
      trace
    };
  }
}
