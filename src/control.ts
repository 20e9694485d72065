import type { z } from "zod";
import { loadRunConfig, type LoadedRunConfig } from "./config.js";
import { formatZodIssues, parseRunConfig } from "./contracts.js";
import {
  CONTROL_CONTRACT_VERSION,
  controlRequestEnvelopeSchema,
  sessionNameParamsSchema,
  startSessionParamsSchema,
  supportedControlMethods,
  type ControlResponseEnvelope
} from "./control-contract.js";
import { parseDirective } from "./directive.js";
import { errorMessage } from "./errors.js";
import { SessionRegistry, type SessionRun, type SessionSnapshot } from "./session-registry.js";

export type SessionRunFactory = (
  name: string,
  loaded: Omit<LoadedRunConfig, "path"> & { path?: string }
) => SessionRun | Promise<SessionRun>;

export interface ControlRuntimeOptions {
  createRun: SessionRunFactory;
  version?: string;
}

/** Line-protocol control surface over a session registry. */
export class ControlRuntime {
  private readonly registry = new SessionRegistry();
  private readonly createRun: SessionRunFactory;
  private readonly version: string;

  constructor(options: ControlRuntimeOptions) {
    this.createRun = options.createRun;
    this.version = options.version ?? "0.1.0";
  }

  async handleRequest(raw: unknown): Promise<ControlResponseEnvelope> {
    const envelope = controlRequestEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      return {
        ok: false,
        error: { message: `Invalid request envelope: ${formatZodIssues(envelope.error)}` }
      };
    }
    const request = envelope.data;

    try {
      const result = await this.execute(request.method, request.params ?? {});
      return {
        id: request.id,
        ok: true,
        result
      };
    } catch (error) {
      return {
        id: request.id,
        ok: false,
        error: {
          message: errorMessage(error)
        }
      };
    }
  }

  async shutdown(): Promise<void> {
    await this.registry.stopAll();
  }

  private async execute(method: string, params: Record<string, unknown>): Promise<unknown> {
    switch (method) {
      case "ping":
        return {
          version: this.version,
          controlContractVersion: CONTROL_CONTRACT_VERSION,
          capabilities: [...supportedControlMethods]
        };

      case "startSession":
        return this.startSession(params);

      case "stopSession":
        return this.registry.stop(parseParams(sessionNameParamsSchema, params).name);

      case "getSessionState":
        return this.getSessionState(params);

      case "listSessions":
        return { sessions: this.registry.list().map(summarize) };

      case "shutdown":
        await this.shutdown();
        return { ok: true };

      default:
        throw new Error(`Unsupported control method '${method}'`);
    }
  }

  private async startSession(params: Record<string, unknown>): Promise<SessionSnapshot> {
    const { name, configPath, config } = parseParams(startSessionParamsSchema, params);
    const existing = this.registry.get(name);
    if (existing?.status === "running") {
      throw new Error(`Session '${name}' is already running`);
    }

    let loaded: Omit<LoadedRunConfig, "path"> & { path?: string };
    if (configPath !== undefined) {
      loaded = await loadRunConfig(configPath);
    } else {
      const parsed = parseRunConfig(config, "params.config");
      loaded = { config: parsed, directive: parseDirective(parsed.directive) };
    }

    const run = await this.createRun(name, loaded);
    return this.registry.start(name, run);
  }

  private getSessionState(params: Record<string, unknown>): SessionSnapshot {
    const { name } = parseParams(sessionNameParamsSchema, params);
    const snapshot = this.registry.get(name);
    if (!snapshot) {
      throw new Error(`Unknown session '${name}'`);
    }
    return snapshot;
  }
}

function parseParams<T extends z.ZodTypeAny>(schema: T, params: Record<string, unknown>): z.infer<T> {
  const result = schema.safeParse(params);
  if (!result.success) {
    throw new Error(`Invalid params: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

function summarize(snapshot: SessionSnapshot): Omit<SessionSnapshot, "report"> & { terminationReason?: string } {
  const { report, ...rest } = snapshot;
  return { ...rest, terminationReason: report?.terminationReason };
}
