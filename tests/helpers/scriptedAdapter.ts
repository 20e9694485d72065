import type { CaptureAdapter } from "../../src/capture.js";
import type { Primitive, RawCapture } from "../../src/types.js";

export type ScriptedScreen = string | Error;

/**
 * In-process device stand-in. Each observation takes the next scripted screen; the last one
 * repeats once the script runs out.
 */
export class ScriptedCaptureAdapter implements CaptureAdapter {
  readonly primitives: Primitive[] = [];
  readonly recoveries: Array<string | undefined> = [];
  observations = 0;
  closed = false;
  private readonly screens: ScriptedScreen[];
  private readonly failPrimitive?: (primitive: Primitive) => Error | undefined;

  constructor(screens: ScriptedScreen[], options: { failPrimitive?: (primitive: Primitive) => Error | undefined } = {}) {
    if (screens.length === 0) {
      throw new Error("ScriptedCaptureAdapter needs at least one screen");
    }
    this.screens = [...screens];
    this.failPrimitive = options.failPrimitive;
  }

  async getObservation(): Promise<RawCapture> {
    this.observations += 1;
    const next = this.screens.length > 1 ? this.screens.shift() : this.screens[0];
    if (next === undefined) {
      throw new Error("script exhausted");
    }
    if (next instanceof Error) {
      throw next;
    }
    return { xml: next, capturedAt: "2024-01-01T00:00:00.000Z" };
  }

  async executePrimitive(primitive: Primitive): Promise<void> {
    const failure = this.failPrimitive?.(primitive);
    if (failure) {
      throw failure;
    }
    this.primitives.push(primitive);
  }

  async recover(targetPackage?: string): Promise<void> {
    this.recoveries.push(targetPackage);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
