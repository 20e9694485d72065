import { PNG } from "pngjs";
import { describe, expect, it } from "vitest";
import { AppiumCaptureAdapter } from "../src/appium-adapter.js";
import { appiumSchema } from "../src/contracts.js";
import { TransportError } from "../src/errors.js";

const BASE = "http://127.0.0.1:4723";
const ELEMENT_KEY = "element-6066-11e4-a52e-4f735466cecf";

interface RecordedCall {
  method: string;
  path: string;
  body?: unknown;
}

type Route = { status?: number; value: unknown } | Error;

/** In-process WebDriver stand-in answering by "METHOD /path". */
function fakeServer(routes: Record<string, Route>) {
  const calls: RecordedCall[] = [];
  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = String(input);
    const method = init?.method ?? "GET";
    const path = url.slice(BASE.length);
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    calls.push(body === undefined ? { method, path } : { method, path, body });

    const route = routes[`${method} ${path}`] ?? { value: null };
    if (route instanceof Error) {
      throw route;
    }
    return new Response(JSON.stringify({ value: route.value }), { status: route.status ?? 200 });
  };
  return { calls, fetchImpl };
}

function adapter(routes: Record<string, Route>, options: { captureScreenshot?: boolean; serverUrl?: string } = {}) {
  const server = fakeServer({ "POST /session": { value: { sessionId: "abc" } }, ...routes });
  const config = appiumSchema.parse({
    serverUrl: options.serverUrl ?? BASE,
    capabilities: { "appium:udid": "emulator-5554" }
  });
  return {
    calls: server.calls,
    adapter: new AppiumCaptureAdapter({ config, captureScreenshot: options.captureScreenshot, fetchImpl: server.fetchImpl })
  };
}

describe("appium capture adapter", () => {
  it("opens one session and reads the page source", async () => {
    const { adapter: target, calls } = adapter(
      { "GET /session/abc/source": { value: "<hierarchy />" } },
      { serverUrl: `${BASE}/` }
    );

    const first = await target.getObservation();
    await target.getObservation();

    expect(first.xml).toBe("<hierarchy />");
    expect(first.screenshot).toBeUndefined();
    expect(calls.map((call) => `${call.method} ${call.path}`)).toEqual([
      "POST /session",
      "GET /session/abc/source",
      "GET /session/abc/source"
    ]);
    expect(calls[0].body).toEqual({
      capabilities: {
        alwaysMatch: {
          platformName: "Android",
          "appium:automationName": "UiAutomator2",
          "appium:udid": "emulator-5554"
        }
      }
    });
  });

  it("attaches a decoded screenshot when asked to", async () => {
    const png = PNG.sync.write(new PNG({ width: 4, height: 2 }));
    const { adapter: target } = adapter(
      {
        "GET /session/abc/source": { value: "<hierarchy />" },
        "GET /session/abc/screenshot": { value: png.toString("base64") }
      },
      { captureScreenshot: true }
    );

    const capture = await target.getObservation();

    expect(capture.screenshot?.width).toBe(4);
    expect(capture.screenshot?.height).toBe(2);
  });

  it("taps through a pointer action and releases it", async () => {
    const { adapter: target, calls } = adapter({});

    await target.executePrimitive({ kind: "tap", x: 970, y: 1480 });

    expect(calls.slice(1)).toEqual([
      {
        method: "POST",
        path: "/session/abc/actions",
        body: {
          actions: [
            {
              type: "pointer",
              id: "finger1",
              parameters: { pointerType: "touch" },
              actions: [
                { type: "pointerMove", duration: 0, x: 970, y: 1480 },
                { type: "pointerDown", button: 0 },
                { type: "pause", duration: 80 },
                { type: "pointerUp", button: 0 }
              ]
            }
          ]
        }
      },
      { method: "DELETE", path: "/session/abc/actions" }
    ]);
  });

  it("types into the focused element", async () => {
    const { adapter: target, calls } = adapter({ "GET /session/abc/element/active": { value: { [ELEMENT_KEY]: "el-1" } } });

    await target.executePrimitive({ kind: "type", text: "How was the hike?" });

    expect(calls[2]).toEqual({
      method: "POST",
      path: "/session/abc/element/el-1/value",
      body: { text: "How was the hike?" }
    });
  });

  it("brings the target app back or presses back without one", async () => {
    const { adapter: target, calls } = adapter({});

    await target.recover("com.example.dating");
    await target.recover();

    expect(calls.slice(1)).toEqual([
      { method: "POST", path: "/session/abc/appium/device/activate_app", body: { appId: "com.example.dating" } },
      { method: "POST", path: "/session/abc/back", body: {} }
    ]);
  });

  it("maps WebDriver errors to transport errors", async () => {
    const { adapter: target } = adapter({
      "POST /session/abc/back": { status: 404, value: { error: "no such element", message: "gone" } },
      "GET /session/abc/source": { status: 404, value: { error: "invalid session id", message: "expired" } }
    });

    await expect(target.executePrimitive({ kind: "back" })).rejects.toMatchObject({
      kind: "primitive_failed",
      message: "POST /session/abc/back failed: no such element: gone"
    });
    await expect(target.getObservation()).rejects.toMatchObject({ kind: "session" });
  });

  it("reports an unreachable server", async () => {
    const { adapter: target } = adapter({ "POST /session": new TypeError("fetch failed") });

    const failure = target.getObservation();

    await expect(failure).rejects.toThrow(TransportError);
    await expect(failure).rejects.toMatchObject({
      kind: "unreachable",
      message: `POST ${BASE}/session failed: fetch failed`
    });
  });

  it("deletes the session once on close", async () => {
    const { adapter: target, calls } = adapter({});
    await target.start();

    await target.close();
    await target.close();

    expect(calls.map((call) => `${call.method} ${call.path}`)).toEqual(["POST /session", "DELETE /session/abc"]);
  });
});
