import { createObservation } from "./observation.js";
import type { Observation, Primitive, RawCapture } from "./types.js";

/** The only surface the loop uses to reach a device. */
export interface CaptureAdapter {
  getObservation(): Promise<RawCapture>;
  executePrimitive(primitive: Primitive): Promise<void>;
  /** Brings the target app back to the foreground. */
  recover?(targetPackage?: string): Promise<void>;
  close?(): Promise<void>;
}

export async function observe(adapter: CaptureAdapter, maxNodes?: number): Promise<Observation> {
  const raw = await adapter.getObservation();
  return createObservation(raw, { maxNodes });
}
