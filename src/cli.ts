#!/usr/bin/env node

import "dotenv/config";
import { readFile, writeFile } from "node:fs/promises";
import { basename, dirname, extname, resolve } from "node:path";
import process from "node:process";
import { createInterface } from "node:readline";
import { Command } from "commander";
import { buildActionSpace } from "./action-space.js";
import { parseIntegerOption } from "./cli-options.js";
import { loadRunConfig, type LoadedRunConfig } from "./config.js";
import { screenTypeSchema, type BaselineFile } from "./contracts.js";
import { ControlRuntime } from "./control.js";
import { buildDatasetFromPacketLog, loadDataset, writeDataset, type LoadedDataset } from "./dataset.js";
import type { DriftTolerance } from "./drift.js";
import { ConfigError, errorMessage } from "./errors.js";
import { extract } from "./extractor.js";
import { BudgetedJudge, JudgeCache, ModelJudge } from "./judge.js";
import { formatCycleLine } from "./loop.js";
import { createOpenAiModelClient } from "./model-client.js";
import { createObservation } from "./observation.js";
import { readPacketLog } from "./packet-log.js";
import {
  loadBaseline,
  runRegression,
  writeBaseline,
  type CaseResult,
  type RegressionReport
} from "./regression.js";
import { createDecisionEngine, createLiveRun } from "./session-factory.js";
import type { ScreenType } from "./types.js";

const program = new Command();
program
  .name("tapline")
  .description("Observe, decide and act on a mobile dating app, one validated step at a time")
  .version("0.1.0");

configureRunCommand(program);
configureRegressCommand(program);
configureClassifyCommand(program);
configureBuildDatasetCommand(program);
configureControlCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});

function configureRunCommand(root: Command): void {
  root
    .command("run")
    .description("Run a live session against the device")
    .requiredOption("--config <path>", "Path to run config JSON")
    .option("--live", "Issue primitives even when the config asks for a dry run", false)
    .option("--max-actions <n>", "Override maxActions")
    .action(async (options: Record<string, string | boolean>) => {
      const loaded = await loadRunConfig(String(options.config));
      const config = { ...loaded.config };
      if (options.live === true) {
        config.dryRun = false;
      }
      const maxActions = parseIntegerOption(options.maxActions, "--max-actions", 1);
      if (maxActions !== undefined) {
        config.maxActions = maxActions;
      }

      const run = createLiveRun(
        { config, directive: loaded.directive },
        {
          onCycle: (_packet, summary, counters) => {
            console.log(formatCycleLine(summary, counters));
          }
        }
      );

      const controller = new AbortController();
      const onSignal = () => {
        controller.abort();
      };
      process.on("SIGINT", onSignal);
      process.on("SIGTERM", onSignal);

      try {
        const report = await run(controller.signal);
        console.log(
          `Session ${report.sessionId} ended: ${report.terminationReason}` +
            ` (actions=${report.counters.actions} fallbacks=${report.fallbacks}` +
            ` validationFailures=${report.validationFailures} recoveries=${report.recoveries})`
        );
        if (report.error) {
          console.error(`Error: ${report.error}`);
        }
        if (report.packetLogPath) {
          console.log(`Packet log: ${report.packetLogPath}`);
        }
        if (report.actionLogPath) {
          console.log(`Action log: ${report.actionLogPath}`);
        }
        if (
          report.terminationReason === "error" ||
          report.terminationReason === "aborted_transport" ||
          report.terminationReason === "aborted_validation"
        ) {
          process.exitCode = 1;
        }
      } finally {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
      }
    });
}

function configureRegressCommand(root: Command): void {
  root
    .command("regress")
    .description("Replay a dataset through the decision engine and check each decision")
    .requiredOption("--dataset <path>", "Path to dataset JSONL")
    .requiredOption("--config <path>", "Path to run config JSON")
    .option("--baseline <path>", "Baseline to compare decisions against")
    .option("--write-baseline <path>", "Write this run's decisions as a new baseline")
    .option("--config-name <name>", "Config name recorded in a written baseline")
    .option("--judge-model <model>", "Model used to score decisions")
    .option("--judge-budget <n>", "Maximum judge calls for this run")
    .option("--judge-cache <path>", "Judge cache JSONL")
    .option("--drift-tolerance <mode>", "Message drift tolerance: exact|judge", "exact")
    .option("--drift-min-score <n>", "Judge score a changed message needs to not count as drift", "70")
    .option("--report <path>", "Write the JSON report here")
    .action(async (options: Record<string, string | boolean>) => {
      let loaded: LoadedRunConfig;
      let dataset: LoadedDataset;
      let baseline: BaselineFile | undefined;
      let judgeBudget: number | undefined;
      let driftMinScore: number;
      try {
        judgeBudget = parseIntegerOption(options.judgeBudget, "--judge-budget", 0);
        driftMinScore = parseIntegerOption(options.driftMinScore, "--drift-min-score", 0, 100) ?? 70;
        if (options.driftTolerance !== "exact" && options.driftTolerance !== "judge") {
          throw new ConfigError(`Unknown drift tolerance '${String(options.driftTolerance)}'`);
        }
        if (options.driftTolerance === "judge" && typeof options.judgeModel !== "string") {
          throw new ConfigError("--drift-tolerance judge requires --judge-model");
        }
        loaded = await loadRunConfig(String(options.config));
        dataset = await loadDataset(String(options.dataset));
        baseline = typeof options.baseline === "string" ? await loadBaseline(options.baseline) : undefined;
      } catch (error) {
        if (!(error instanceof ConfigError)) {
          throw error;
        }
        console.error(`Error: ${error.message}`);
        process.exitCode = 2;
        return;
      }

      const { config, directive } = loaded;
      const engine = createDecisionEngine(config, directive);
      const judge =
        typeof options.judgeModel === "string"
          ? new BudgetedJudge({
              judge: new ModelJudge({
                client: createOpenAiModelClient({
                  apiKeyEnv: config.decisionEngine.llm.apiKeyEnv,
                  baseUrl: config.decisionEngine.llm.baseUrl,
                  timeoutMs: config.decisionEngine.llm.timeoutMs
                }),
                model: options.judgeModel,
                timeoutMs: config.decisionEngine.llm.timeoutMs
              }),
              cache: new JudgeCache(typeof options.judgeCache === "string" ? options.judgeCache : undefined),
              budget: judgeBudget
            })
          : undefined;

      const driftTolerance: DriftTolerance =
        options.driftTolerance === "judge" && judge ? { mode: "judge", judge, minScore: driftMinScore } : { mode: "exact" };

      let report: RegressionReport;
      try {
        report = await runRegression(dataset.cases, {
          engine,
          directive: config.directive,
          datasetDir: dirname(dataset.path),
          judge,
          baseline,
          driftTolerance,
          onCase: (result) => {
            console.log(formatCaseLine(result));
          }
        });
      } catch (error) {
        if (!(error instanceof ConfigError)) {
          throw error;
        }
        console.error(`Error: ${error.message}`);
        process.exitCode = 2;
        return;
      }

      const { totals } = report;
      console.log(
        `${totals.passed}/${totals.cases} passed, ${totals.failed} failed, ${totals.errored} errored,` +
          ` ${totals.judgeSkipped} judge skipped, ${totals.judgeCalls} judge calls`
      );
      for (const drift of report.drift) {
        const message = drift.messageDelta ? ` message: ${drift.messageDelta.detail}` : "";
        console.log(`drift ${drift.caseId}: ${drift.baselineAction} -> ${drift.observedAction}${message}`);
      }
      if (report.uncoveredByBaseline.length > 0) {
        console.log(`Not in baseline: ${report.uncoveredByBaseline.join(", ")}`);
      }

      if (typeof options.report === "string") {
        const reportPath = resolve(options.report);
        await writeFile(reportPath, `${JSON.stringify(report, null, 2)}\n`, "utf8");
        console.log(`Report: ${reportPath}`);
      }
      if (typeof options.writeBaseline === "string") {
        const configName =
          typeof options.configName === "string" ? options.configName : basename(loaded.path, extname(loaded.path));
        const written = await writeBaseline(options.writeBaseline, report.results, {
          configName,
          model: report.model,
          temperature: report.temperature
        });
        console.log(`Baseline: ${resolve(options.writeBaseline)} (${written.entries.length} entries)`);
      }

      process.exitCode = report.exitCode;
    });
}

function configureClassifyCommand(root: Command): void {
  root
    .command("classify")
    .description("Classify a saved UI hierarchy dump and list what could be done on it")
    .argument("<xmlPath>", "Path to a UI hierarchy XML dump")
    .option("--messages", "Include message actions", false)
    .action(async (xmlPath: string, options: Record<string, string | boolean>) => {
      const xml = await readFile(resolve(xmlPath), "utf8");
      const observation = createObservation({ xml });
      const extraction = extract(observation);
      const availableActions = buildActionSpace(observation.screenType, extraction.targets, {
        messageEnabled: options.messages === true
      });
      console.log(
        JSON.stringify(
          {
            screenType: observation.screenType,
            packageName: observation.packageName,
            qualityScore: extraction.qualityScore,
            content: extraction.content,
            availableActions,
            targets: extraction.targets.map(({ targetId, kind, label }) => ({ targetId, kind, label })),
            fingerprint: extraction.fingerprint
          },
          null,
          2
        )
      );
    });
}

function configureBuildDatasetCommand(root: Command): void {
  root
    .command("build-dataset")
    .description("Seed a regression dataset from a session packet log")
    .requiredOption("--packet-log <path>", "Path to packets.jsonl")
    .requiredOption("--out <path>", "Dataset JSONL to write")
    .option("--screen-types <list>", "Comma-separated screen types to keep")
    .option("--max-rows <n>", "Maximum cases", "50")
    .option("--directive <text>", "Directive for every case")
    .action(async (options: Record<string, string | boolean>) => {
      const packetLogPath = resolve(String(options.packetLog));
      const packets = await readPacketLog(packetLogPath);
      const cases = buildDatasetFromPacketLog(packets, {
        screenTypes: parseScreenTypes(options.screenTypes),
        maxRows: parseIntegerOption(options.maxRows, "--max-rows", 1) ?? 50,
        directive: typeof options.directive === "string" ? options.directive : undefined,
        artifactsDir: dirname(packetLogPath)
      });
      if (cases.length === 0) {
        throw new Error("No packets matched; nothing written");
      }
      const outPath = await writeDataset(String(options.out), cases);
      console.log(`Wrote ${cases.length} cases to ${outPath}`);
    });
}

function configureControlCommand(root: Command): void {
  root
    .command("control")
    .description("Serve the JSON-lines session control protocol over stdio")
    .action(async () => {
      const runtime = new ControlRuntime({
        createRun: (name, loaded) =>
          createLiveRun(loaded, {
            name,
            onCycle: (_packet, summary, counters) => {
              console.error(`${name} ${formatCycleLine(summary, counters)}`);
            }
          })
      });
      await runControlStdioServer(
        (request) => runtime.handleRequest(request),
        () => runtime.shutdown()
      );
    });
}

async function runControlStdioServer(
  handleRequest: (request: unknown) => Promise<unknown>,
  shutdownRuntime: () => Promise<void>
): Promise<void> {
  const rl = createInterface({
    input: process.stdin,
    crlfDelay: Infinity
  });
  const pending = new Set<Promise<void>>();
  let shutdownPromise: Promise<void> | null = null;

  const writeResponse = (payload: unknown) => {
    process.stdout.write(`${JSON.stringify(payload)}\n`);
  };

  const shutdownServer = async () => {
    if (shutdownPromise) {
      return shutdownPromise;
    }

    shutdownPromise = (async () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);

      rl.close();
      await Promise.allSettled([...pending]);
      await shutdownRuntime();
    })();

    return shutdownPromise;
  };

  const onSignal = () => {
    shutdownServer().catch((error: unknown) => {
      console.error(`Error: ${errorMessage(error)}`);
      process.exitCode = 1;
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  for await (const line of rl) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }

    let request: unknown;
    try {
      request = JSON.parse(trimmed);
    } catch (error) {
      writeResponse({
        ok: false,
        error: {
          message: `Invalid JSON request: ${errorMessage(error)}`
        }
      });
      continue;
    }

    const task: Promise<void> = handleRequest(request)
      .then((response) => {
        writeResponse(response);
      })
      .catch((error: unknown) => {
        writeResponse({
          ok: false,
          error: {
            message: errorMessage(error)
          }
        });
      })
      .finally(() => {
        pending.delete(task);
      });
    pending.add(task);
  }

  await shutdownServer();
}

function formatCaseLine(result: CaseResult): string {
  const action = result.actionId ? ` action=${result.actionId}` : "";
  const source = result.source ? ` source=${result.source}` : "";
  const judge = result.judge?.status === "scored" ? ` judge=${result.judge.score}` : "";
  const personalization = result.personalization
    ? ` mentions_name=${result.personalization.mentionsProfileName} mentions_prompt=${result.personalization.mentionsPromptKeyword}`
    : "";
  const detail = result.error ?? result.failures.join("; ");
  return `${result.status.toUpperCase()} ${result.caseId}${action}${source}${judge}${personalization}${detail ? ` | ${detail}` : ""}`;
}

function parseScreenTypes(raw: string | boolean | undefined): ScreenType[] | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  return raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0)
    .map((value) => {
      const parsed = screenTypeSchema.safeParse(value);
      if (!parsed.success) {
        throw new Error(`Unknown screen type '${value}'`);
      }
      return parsed.data;
    });
}
