import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parseRunConfig, type ProfileConfig, type RunConfig } from "./contracts.js";
import { parseDirective } from "./directive.js";
import { ConfigError, errorMessage } from "./errors.js";
import type { Directive, QualityFlag } from "./types.js";

export interface PolicySettings {
  minQualityScoreLike: number;
  requireFlagsAll: readonly QualityFlag[];
  blockPromptKeywords: readonly string[];
  maxLikes: number;
  maxPasses: number;
  messageEnabled: boolean;
  minQualityScoreToMessage: number;
  maxMessages: number;
  template: string;
  maxMessageChars: number;
  requireQuestion: boolean;
  blockOffAppContact: boolean;
}

export interface RunLimits {
  maxActions: number;
  maxRuntimeS: number;
  dryRun: boolean;
}

export interface LoadedRunConfig {
  path: string;
  config: RunConfig;
  directive: Directive;
}

export async function loadRunConfig(configPath: string): Promise<LoadedRunConfig> {
  const absolutePath = resolve(configPath);
  let raw: string;
  try {
    raw = await readFile(absolutePath, "utf8");
  } catch (error) {
    throw new ConfigError(`cannot read config: ${errorMessage(error)}`, absolutePath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`invalid JSON: ${errorMessage(error)}`, absolutePath);
  }

  const config = parseRunConfig(parsed, absolutePath);
  return {
    path: absolutePath,
    config,
    directive: parseDirective(config.directive)
  };
}

/** Profile policies with directive overrides applied; directive values win. */
export function resolvePolicySettings(profile: ProfileConfig, directive: Directive): PolicySettings {
  return {
    minQualityScoreLike: directive.caps.minQualityScoreLike ?? profile.swipePolicy.minQualityScoreLike,
    requireFlagsAll: profile.swipePolicy.requireFlagsAll,
    blockPromptKeywords: profile.swipePolicy.blockPromptKeywords.map((keyword) => keyword.toLowerCase()),
    maxLikes: directive.caps.maxLikes ?? profile.swipePolicy.maxLikes,
    maxPasses: directive.caps.maxPasses ?? profile.swipePolicy.maxPasses,
    messageEnabled: directive.messageEnabled ?? profile.messagePolicy.enabled,
    minQualityScoreToMessage: profile.messagePolicy.minQualityScoreToMessage,
    maxMessages: directive.caps.maxMessages ?? profile.messagePolicy.maxMessages,
    template: profile.messagePolicy.template,
    maxMessageChars: profile.persona.maxMessageChars,
    requireQuestion: profile.persona.requireQuestion,
    blockOffAppContact: profile.persona.blockOffAppContact
  };
}

export function resolveRunLimits(config: RunConfig, directive: Directive): RunLimits {
  return {
    maxActions: directive.caps.maxActions ?? config.maxActions,
    maxRuntimeS: directive.caps.maxRuntimeS ?? config.maxRuntimeS,
    dryRun: directive.dryRun ?? config.dryRun
  };
}
