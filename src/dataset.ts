import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { PNG } from "pngjs";
import { parseRegressionCase, type LoggedPacket, type RegressionCase } from "./contracts.js";
import { ConfigError, errorMessage } from "./errors.js";
import type { PacketContext, ScreenType, Screenshot } from "./types.js";

export interface LoadedDataset {
  path: string;
  cases: RegressionCase[];
}

/** Reads a JSONL dataset. Any bad line rejects the whole file. */
export async function loadDataset(path: string): Promise<LoadedDataset> {
  const absolutePath = resolve(path);
  let raw: string;
  try {
    raw = await readFile(absolutePath, "utf8");
  } catch (error) {
    throw new ConfigError(`cannot read dataset: ${errorMessage(error)}`, absolutePath);
  }

  const cases: RegressionCase[] = [];
  const seen = new Set<string>();
  raw.split("\n").forEach((line, index) => {
    if (line.trim().length === 0) {
      return;
    }
    const source = `${absolutePath}:${index + 1}`;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw new ConfigError(`invalid JSON: ${errorMessage(error)}`, source);
    }
    const regressionCase = parseRegressionCase(parsed, source);
    if (seen.has(regressionCase.id)) {
      throw new ConfigError(`duplicate case id '${regressionCase.id}'`, source);
    }
    seen.add(regressionCase.id);
    cases.push(regressionCase);
  });

  if (cases.length === 0) {
    throw new ConfigError("dataset has no cases", absolutePath);
  }
  return { path: absolutePath, cases };
}

export async function writeDataset(path: string, cases: readonly RegressionCase[]): Promise<string> {
  const absolutePath = resolve(path);
  await mkdir(dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, cases.map((item) => `${JSON.stringify(item)}\n`).join(""), "utf8");
  return absolutePath;
}

export interface BuildDatasetOptions {
  screenTypes?: readonly ScreenType[];
  maxRows?: number;
  directive?: string;
  /** Directory packet screenshot refs are relative to. */
  artifactsDir?: string;
}

/** Turns logged packets into regression cases seeded with the action each cycle took. */
export function buildDatasetFromPacketLog(
  packets: readonly LoggedPacket[],
  options: BuildDatasetOptions = {}
): RegressionCase[] {
  const allowed = options.screenTypes && options.screenTypes.length > 0 ? new Set(options.screenTypes) : undefined;
  const maxRows = options.maxRows ?? 50;
  const usedIds = new Map<string, number>();
  const cases: RegressionCase[] = [];

  for (const packet of packets) {
    if (cases.length >= maxRows) {
      break;
    }
    if (allowed && !allowed.has(packet.screenType)) {
      continue;
    }

    const baseId = safeId(`iter_${packet.iteration}_${packet.screenType}`);
    const count = usedIds.get(baseId) ?? 0;
    usedIds.set(baseId, count + 1);

    const regressionCase: RegressionCase = {
      id: count === 0 ? baseId : `${baseId}_${count + 1}`,
      packet: {
        screenType: packet.screenType,
        packageName: packet.packageName,
        qualityScore: packet.qualityScore,
        qualityScoreVersion: packet.qualityScoreVersion,
        qualityFeatures: packet.qualityFeatures,
        content: packet.content,
        availableActions: packet.availableActions,
        observedStrings: packet.observedStrings,
        targets: packet.targets,
        counters: packet.counters
      },
      expectedActionSet: [packet.decision.actionId]
    };
    const directive = options.directive ?? packet.directive;
    if (directive) {
      regressionCase.directive = directive;
    }
    if (packet.screenshotRef) {
      regressionCase.screenshotPath = options.artifactsDir
        ? resolve(options.artifactsDir, packet.screenshotRef)
        : packet.screenshotRef;
    }
    cases.push(regressionCase);
  }
  return cases;
}

/** Packet context for a case, with its screenshot loaded when it has one. */
export async function caseContext(regressionCase: RegressionCase, datasetDir?: string): Promise<PacketContext> {
  const context: PacketContext = { ...regressionCase.packet };
  if (regressionCase.screenshotPath) {
    context.screenshot = await loadScreenshot(regressionCase.screenshotPath, datasetDir);
  }
  return context;
}

async function loadScreenshot(path: string, baseDir?: string): Promise<Screenshot> {
  const absolutePath = isAbsolute(path) || !baseDir ? resolve(path) : resolve(baseDir, path);
  try {
    const png = await readFile(absolutePath);
    const { width, height } = PNG.sync.read(png);
    return { png, width, height };
  } catch (error) {
    throw new ConfigError(`cannot load screenshot: ${errorMessage(error)}`, absolutePath);
  }
}

function safeId(value: string): string {
  const cleaned = value.trim().replace(/[^A-Za-z0-9_-]/g, "_");
  return cleaned.length > 0 ? cleaned : "case";
}
