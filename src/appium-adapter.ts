import { PNG } from "pngjs";
import { z } from "zod";
import type { CaptureAdapter } from "./capture.js";
import type { AppiumConfig } from "./contracts.js";
import { errorMessage, TransportError } from "./errors.js";
import type { Primitive, RawCapture, Screenshot } from "./types.js";

export interface AppiumCaptureAdapterOptions {
  config: AppiumConfig;
  captureScreenshot?: boolean;
  fetchImpl?: typeof fetch;
}

const ELEMENT_KEY = "element-6066-11e4-a52e-4f735466cecf";
const TAP_HOLD_MS = 80;

const responseSchema = z.object({ value: z.unknown() });
const errorValueSchema = z.object({ error: z.string(), message: z.string().optional() });
const sessionValueSchema = z.object({ sessionId: z.string().min(1) });
const elementValueSchema = z.object({ [ELEMENT_KEY]: z.string().min(1) });

/** Talks W3C WebDriver to an Appium server running UiAutomator2. */
export class AppiumCaptureAdapter implements CaptureAdapter {
  private readonly config: AppiumConfig;
  private readonly captureScreenshot: boolean;
  private readonly fetchImpl: typeof fetch;
  private readonly baseUrl: string;
  private sessionId?: string;

  constructor(options: AppiumCaptureAdapterOptions) {
    this.config = options.config;
    this.captureScreenshot = options.captureScreenshot ?? false;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.baseUrl = options.config.serverUrl.replace(/\/+$/, "");
  }

  async start(): Promise<string> {
    if (this.sessionId) {
      return this.sessionId;
    }
    const value = await this.request("POST", "/session", {
      capabilities: {
        alwaysMatch: {
          platformName: "Android",
          "appium:automationName": "UiAutomator2",
          ...this.config.capabilities
        }
      }
    });
    const parsed = sessionValueSchema.safeParse(value);
    if (!parsed.success) {
      throw new TransportError("session", "Appium did not return a session id");
    }
    this.sessionId = parsed.data.sessionId;
    return this.sessionId;
  }

  async close(): Promise<void> {
    if (!this.sessionId) {
      return;
    }
    const sessionId = this.sessionId;
    this.sessionId = undefined;
    await this.request("DELETE", `/session/${sessionId}`);
  }

  async getObservation(): Promise<RawCapture> {
    const sessionPath = await this.sessionPath();
    const xml = await this.request("GET", `${sessionPath}/source`);
    if (typeof xml !== "string") {
      throw new TransportError("bad_capture", "Page source is not a string");
    }
    const capture: RawCapture = { xml, capturedAt: new Date().toISOString() };
    if (this.captureScreenshot) {
      capture.screenshot = await this.screenshot(sessionPath);
    }
    return capture;
  }

  async executePrimitive(primitive: Primitive): Promise<void> {
    const sessionPath = await this.sessionPath();
    switch (primitive.kind) {
      case "tap":
        await this.pointer(sessionPath, [
          { type: "pointerMove", duration: 0, x: primitive.x, y: primitive.y },
          { type: "pointerDown", button: 0 },
          { type: "pause", duration: TAP_HOLD_MS },
          { type: "pointerUp", button: 0 }
        ]);
        return;
      case "swipe":
        await this.pointer(sessionPath, [
          { type: "pointerMove", duration: 0, x: primitive.x1, y: primitive.y1 },
          { type: "pointerDown", button: 0 },
          { type: "pointerMove", duration: primitive.durationMs, x: primitive.x2, y: primitive.y2 },
          { type: "pointerUp", button: 0 }
        ]);
        return;
      case "type": {
        const active = elementValueSchema.safeParse(await this.request("GET", `${sessionPath}/element/active`));
        if (!active.success) {
          throw new TransportError("primitive_failed", "No focused element to type into");
        }
        await this.request("POST", `${sessionPath}/element/${active.data[ELEMENT_KEY]}/value`, {
          text: primitive.text
        });
        return;
      }
      case "key":
        await this.request("POST", `${sessionPath}/appium/device/press_keycode`, { keycode: primitive.keycode });
        return;
      case "back":
        await this.request("POST", `${sessionPath}/back`, {});
        return;
    }
  }

  async recover(targetPackage?: string): Promise<void> {
    const sessionPath = await this.sessionPath();
    if (!targetPackage) {
      await this.request("POST", `${sessionPath}/back`, {});
      return;
    }
    await this.request("POST", `${sessionPath}/appium/device/activate_app`, { appId: targetPackage });
  }

  private async screenshot(sessionPath: string): Promise<Screenshot> {
    const value = await this.request("GET", `${sessionPath}/screenshot`);
    if (typeof value !== "string") {
      throw new TransportError("bad_capture", "Screenshot is not base64 text");
    }
    const png = Buffer.from(value, "base64");
    try {
      const { width, height } = PNG.sync.read(png);
      return { png, width, height };
    } catch (error) {
      throw new TransportError("bad_capture", `Screenshot is not a PNG: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async pointer(sessionPath: string, actions: Array<Record<string, unknown>>): Promise<void> {
    await this.request("POST", `${sessionPath}/actions`, {
      actions: [{ type: "pointer", id: "finger1", parameters: { pointerType: "touch" }, actions }]
    });
    await this.request("DELETE", `${sessionPath}/actions`);
  }

  private async sessionPath(): Promise<string> {
    return `/session/${await this.start()}`;
  }

  private async request(method: "GET" | "POST" | "DELETE", path: string, body?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: body === undefined ? undefined : { "content-type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs)
      });
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
      throw timedOut
        ? new TransportError("timeout", `${method} ${path} timed out after ${this.config.timeoutMs}ms`, { cause: error })
        : new TransportError("unreachable", `${method} ${url} failed: ${errorMessage(error)}`, { cause: error });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new TransportError("primitive_failed", `${method} ${path} returned non-JSON (HTTP ${response.status})`, {
        cause: error
      });
    }

    const envelope = responseSchema.safeParse(payload);
    const failure = errorValueSchema.safeParse(envelope.success ? envelope.data.value : undefined);
    if (!response.ok || failure.success || !envelope.success) {
      const detail = failure.success ? `${failure.data.error}: ${failure.data.message ?? ""}`.trim() : `HTTP ${response.status}`;
      const kind = failure.success && failure.data.error === "invalid session id" ? "session" : "primitive_failed";
      throw new TransportError(kind, `${method} ${path} failed: ${detail}`);
    }
    return envelope.data.value;
  }
}
