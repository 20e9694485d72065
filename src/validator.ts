import type { ValidationConfig } from "./contracts.js";
import { errorMessage } from "./errors.js";
import type { ActionId, ExecutionReport, ScreenType, ValidationOutcome, ValidatorState } from "./types.js";

export interface ScreenState {
  screenType: ScreenType;
  fingerprint: string;
}

export interface PostActionValidatorOptions {
  sleep?: (ms: number) => Promise<void>;
}

interface PendingCheck {
  actionId: ActionId;
  before: ScreenState;
  report?: ExecutionReport;
}

const TRANSITIONS: Readonly<Record<ValidatorState, readonly ValidatorState[]>> = {
  idle: ["issued"],
  issued: ["awaiting_check"],
  awaiting_check: ["passed", "failed"],
  passed: ["issued"],
  failed: ["issued"]
};

const defaultSleep = (ms: number): Promise<void> => new Promise((resolvePromise) => setTimeout(resolvePromise, ms));

/**
 * Checks that the device moved after an action. One instance lives for one session and keeps
 * the consecutive-failure streak across cycles.
 */
export class PostActionValidator {
  private readonly config: ValidationConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  private current: ValidatorState = "idle";
  private pending?: PendingCheck;
  private failureStreak = 0;

  constructor(config: ValidationConfig, options: PostActionValidatorOptions = {}) {
    this.config = config;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get state(): ValidatorState {
    return this.current;
  }

  get consecutiveFailures(): number {
    return this.failureStreak;
  }

  get aborted(): boolean {
    return this.failureStreak >= this.config.maxConsecutiveFailures;
  }

  begin(actionId: ActionId, before: ScreenState): void {
    this.transition("issued");
    this.pending = { actionId, before };
  }

  markExecuted(report: ExecutionReport): void {
    const pending = this.requirePending();
    this.transition("awaiting_check");
    pending.report = report;
  }

  async check(observeAfter: () => Promise<ScreenState>): Promise<ValidationOutcome> {
    if (this.current !== "awaiting_check") {
      throw new Error(`Validator cannot check from state '${this.current}'`);
    }
    const pending = this.requirePending();
    const { actionId, before, report } = pending;

    if (report?.status === "failed") {
      return this.finish(pending, before, false, false, `execution failed: ${report.error ?? "unknown error"}`);
    }
    if (!this.config.enabled) {
      return this.finish(pending, before, false, true, "validation disabled");
    }
    if (!report || report.issued === 0) {
      return this.finish(pending, before, false, true, "no primitives issued");
    }
    if (!this.config.requireScreenChangeFor.includes(actionId)) {
      return this.finish(pending, before, false, true, "screen change not required");
    }

    await this.sleep(this.config.settleDelayMs);
    let after: ScreenState;
    try {
      after = await withTimeout(observeAfter(), this.config.observeTimeoutMs);
    } catch (error) {
      return this.finish(pending, before, false, false, `re-observe failed: ${errorMessage(error)}`);
    }

    const changed =
      this.config.changeSignal === "screen_type"
        ? after.screenType !== before.screenType
        : after.fingerprint !== before.fingerprint;
    return this.finish(
      pending,
      after,
      changed,
      changed,
      changed ? `${this.config.changeSignal} changed` : `${this.config.changeSignal} unchanged`
    );
  }

  private finish(
    pending: PendingCheck,
    after: ScreenState,
    changed: boolean,
    passed: boolean,
    detail: string
  ): ValidationOutcome {
    const state = passed ? "passed" : "failed";
    this.transition(state);
    this.pending = undefined;
    this.failureStreak = passed ? 0 : this.failureStreak + 1;
    return {
      actionId: pending.actionId,
      preScreenType: pending.before.screenType,
      postScreenType: after.screenType,
      changed,
      passed,
      state,
      detail
    };
  }

  private transition(next: ValidatorState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal validator transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }

  private requirePending(): PendingCheck {
    if (!this.pending) {
      throw new Error(`Validator has no action in flight (state '${this.current}')`);
    }
    return this.pending;
  }
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`observation timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
