import { join } from "node:path";
import { AppiumCaptureAdapter } from "./appium-adapter.js";
import type { CaptureAdapter } from "./capture.js";
import { resolvePolicySettings, type LoadedRunConfig } from "./config.js";
import { appiumSchema, type RunConfig } from "./contracts.js";
import { DecisionEngine } from "./decision-engine.js";
import { runSession } from "./loop.js";
import { createOpenAiModelClient, type ModelClient } from "./model-client.js";
import { ArtifactWriter, PacketLogWriter } from "./packet-log.js";
import type { SessionRun } from "./session-registry.js";
import type { CycleSummary, Directive, Packet, RunCounters } from "./types.js";

export interface EngineFactoryOptions {
  client?: ModelClient;
  env?: NodeJS.ProcessEnv;
}

export function createDecisionEngine(
  config: RunConfig,
  directive: Directive,
  options: EngineFactoryOptions = {}
): DecisionEngine {
  const { decisionEngine } = config;
  const client =
    options.client ??
    (decisionEngine.type === "llm"
      ? createOpenAiModelClient(
          {
            apiKeyEnv: decisionEngine.llm.apiKeyEnv,
            baseUrl: decisionEngine.llm.baseUrl,
            timeoutMs: decisionEngine.llm.timeoutMs
          },
          options.env
        )
      : undefined);
  return new DecisionEngine({
    config: decisionEngine,
    profile: config.profile,
    settings: resolvePolicySettings(config.profile, directive),
    client
  });
}

export interface LiveRunOptions extends EngineFactoryOptions {
  name?: string;
  adapter?: CaptureAdapter;
  onCycle?: (packet: Packet, summary: CycleSummary, counters: RunCounters) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Builds everything a live session needs. Configuration problems surface here, before the
 * session is registered; the returned run owns its adapter and closes it when done.
 */
export function createLiveRun(
  loaded: Pick<LoadedRunConfig, "config" | "directive">,
  options: LiveRunOptions = {}
): SessionRun {
  const { config, directive } = loaded;
  const engine = createDecisionEngine(config, directive, options);
  const wantsScreenshot =
    config.artifacts.captureScreenshot ||
    (config.decisionEngine.type === "llm" && config.decisionEngine.llm.includeScreenshot);

  return async (signal) => {
    const adapter =
      options.adapter ??
      new AppiumCaptureAdapter({
        config: config.appium ?? appiumSchema.parse({}),
        captureScreenshot: wantsScreenshot
      });
    const stamp = new Date().toISOString().replace(/[:.]/g, "-");
    const runDir = join(config.artifacts.dir, options.name ? `${stamp}-${options.name}` : stamp);

    try {
      return await runSession(
        {
          adapter,
          engine,
          packetLog: config.artifacts.persistPacketLog ? new PacketLogWriter(join(runDir, "packets.jsonl")) : undefined,
          artifacts: new ArtifactWriter(runDir),
          actionLogPath: join(runDir, "action_log.json"),
          signal,
          onCycle: options.onCycle,
          sleep: options.sleep
        },
        { config, directive }
      );
    } finally {
      await adapter.close?.();
    }
  };
}
