import { appendFile, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve } from "node:path";
import { formatZodIssues, loggedPacketSchema, type LoggedPacket } from "./contracts.js";
import { ConfigError, errorMessage } from "./errors.js";
import type { Packet, RunReport } from "./types.js";

/** Append-only JSONL writer; each packet is one line written in a single append. */
export class PacketLogWriter {
  readonly path: string;
  private ready?: Promise<void>;

  constructor(path: string) {
    this.path = resolve(path);
  }

  async append(packet: Packet): Promise<void> {
    this.ready ??= mkdir(dirname(this.path), { recursive: true }).then(() => undefined);
    await this.ready;
    await appendFile(this.path, `${JSON.stringify(packet)}\n`, "utf8");
  }
}

/**
 * Reads a packet log. A final line without its newline is a write cut short and is skipped;
 * any other bad line is an error.
 */
export async function readPacketLog(path: string): Promise<LoggedPacket[]> {
  const absolutePath = resolve(path);
  let raw: string;
  try {
    raw = await readFile(absolutePath, "utf8");
  } catch (error) {
    throw new ConfigError(`cannot read packet log: ${errorMessage(error)}`, absolutePath);
  }

  const lines = raw.split("\n");
  const endsCleanly = raw.endsWith("\n");
  const packets: LoggedPacket[] = [];

  lines.forEach((line, index) => {
    if (line.trim().length === 0) {
      return;
    }
    const isTail = index === lines.length - 1 && !endsCleanly;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      if (isTail) {
        return;
      }
      throw new ConfigError(`line ${index + 1}: invalid JSON: ${errorMessage(error)}`, absolutePath);
    }
    const result = loggedPacketSchema.safeParse(parsed);
    if (!result.success) {
      if (isTail) {
        return;
      }
      throw new ConfigError(`line ${index + 1}: ${formatZodIssues(result.error)}`, absolutePath);
    }
    packets.push(result.data);
  });

  return packets;
}

export async function writeActionLog(path: string, report: RunReport): Promise<string> {
  const absolutePath = resolve(path);
  await mkdir(dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, `${JSON.stringify(report, null, 2)}\n`, "utf8");
  return absolutePath;
}

/** Stores per-cycle screenshots and page sources under one run directory. */
export class ArtifactWriter {
  readonly runDir: string;

  constructor(runDir: string) {
    this.runDir = resolve(runDir);
  }

  async saveScreenshot(iteration: number, png: Buffer): Promise<string> {
    return this.save(`screens/cycle-${pad(iteration)}.png`, png);
  }

  async saveXml(iteration: number, xml: string): Promise<string> {
    return this.save(`xml/cycle-${pad(iteration)}.xml`, xml);
  }

  private async save(relativePath: string, data: Buffer | string): Promise<string> {
    const target = join(this.runDir, relativePath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, data);
    return relative(this.runDir, target);
  }
}

function pad(iteration: number): string {
  return String(iteration).padStart(4, "0");
}
