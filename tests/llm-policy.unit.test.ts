import { describe, expect, it } from "vitest";
import { decisionEngineSchema } from "../src/contracts.js";
import { parseDirective } from "../src/directive.js";
import { ModelError } from "../src/errors.js";
import {
  buildDecisionRequest,
  extractFirstJsonObject,
  offeredActions,
  parseDecisionResponse
} from "../src/llm-policy.js";
import { discoverContext, profile, settingsFor } from "./helpers/packets.js";

const directive = parseDirective(undefined);
const options = { settings: settingsFor(directive), profile: profile() };

function reply(body: Record<string, unknown>): string {
  return JSON.stringify({ message_text: null, target_id: null, reason: "test", ...body });
}

function rejection(run: () => unknown): ModelError {
  try {
    run();
  } catch (error) {
    if (error instanceof ModelError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ModelError");
}

describe("llm decision parsing", () => {
  it("accepts an offered action and resolves its only target", () => {
    const plan = parseDecisionResponse(reply({ action_id: "like", reason: "strong prompt" }), discoverContext(), directive, options);

    expect(plan).toEqual({ actionId: "like", targetId: "like_button:6", reason: "strong prompt", source: "llm" });
  });

  it("rejects an action that is not available", () => {
    const error = rejection(() =>
      parseDecisionResponse(
        reply({ action_id: "like" }),
        discoverContext({ availableActions: ["pass", "wait"] }),
        directive,
        options
      )
    );

    expect(error.kind).toBe("invalid_response");
    expect(error.message).toBe("action 'like' is not in available_actions [pass, wait]");
  });

  it("rejects unknown actions, stray keys and missing messages", () => {
    const context = discoverContext({ availableActions: ["like", "pass", "send_message", "back", "wait"] });

    expect(rejection(() => parseDecisionResponse(reply({ action_id: "superlike" }), context, directive, options)).message).toBe(
      "unknown action 'superlike'"
    );
    expect(
      rejection(() => parseDecisionResponse(reply({ action_id: "like", mood: "happy" }), context, directive, options)).kind
    ).toBe("invalid_response");
    expect(
      rejection(() => parseDecisionResponse(reply({ action_id: "send_message" }), context, directive, options)).message
    ).toBe("action 'send_message' requires message_text");
    expect(
      rejection(() =>
        parseDecisionResponse(reply({ action_id: "pass", message_text: "hi?" }), context, directive, options)
      ).message
    ).toBe("action 'pass' does not take message_text");
  });

  it("rejects messages that break the persona rules", () => {
    const context = discoverContext({ availableActions: ["like", "pass", "send_message", "back", "wait"] });
    const error = rejection(() =>
      parseDecisionResponse(
        reply({ action_id: "send_message", message_text: "Call me at 555-123-4567?" }),
        context,
        directive,
        options
      )
    );

    expect(error.message).toBe("message_text rejected: contains_phone_number");
  });

  it("requires a target id when several targets fit", () => {
    const context = discoverContext({
      targets: [
        { targetId: "like_button:3", kind: "like_button" },
        { targetId: "like_button:5", kind: "like_button" }
      ]
    });

    expect(rejection(() => parseDecisionResponse(reply({ action_id: "like" }), context, directive, options)).message).toBe(
      "target for 'like' is ambiguous: 2 like_button targets and no target_id"
    );
    expect(
      parseDecisionResponse(reply({ action_id: "like", target_id: "like_button:5" }), context, directive, options).targetId
    ).toBe("like_button:5");
    expect(
      rejection(() =>
        parseDecisionResponse(reply({ action_id: "like", target_id: "pass_button:7" }), context, directive, options)
      ).message
    ).toBe("target_id 'pass_button:7' is not on screen");
  });

  it("enforces caps the model does not see as binding", () => {
    const context = discoverContext({ counters: { actions: 20, likes: 20, passes: 0, messages: 0 } });

    expect(rejection(() => parseDecisionResponse(reply({ action_id: "like" }), context, directive, options)).message).toBe(
      "like cap of 20 reached"
    );
  });

  it("filters offered actions through the directive", () => {
    const restricted = parseDirective("only pass");

    expect(offeredActions(discoverContext(), restricted)).toEqual(["pass", "wait"]);
    expect(() =>
      parseDecisionResponse(reply({ action_id: "like" }), discoverContext(), restricted, {
        ...options,
        settings: settingsFor(restricted)
      })
    ).toThrow("action 'like' is not in available_actions [pass, wait]");
  });
});

describe("llm request building", () => {
  const llm = decisionEngineSchema.parse({ type: "llm", llm: { model: "test-model" } }).llm;

  it("sends the packet, the offered actions and the screenshot", () => {
    const request = buildDecisionRequest(
      discoverContext({ screenshot: { png: Buffer.from("png-bytes"), width: 1, height: 1 } }),
      directive,
      { llm, model: "test-model", profile: profile(), settings: settingsFor(directive) }
    );

    expect(request).toMatchObject({ model: "test-model", temperature: 0.1, jsonMode: true, timeoutMs: 30_000 });
    expect(request.messages).toHaveLength(2);
    const user = request.messages[1];
    expect(user.role).toBe("user");
    if (!Array.isArray(user.content)) {
      throw new Error("expected multi-part user content");
    }
    expect(user.content).toHaveLength(2);
    const [text, image] = user.content;
    if (text.type !== "text" || image.type !== "image_url") {
      throw new Error("unexpected content parts");
    }
    const payload: unknown = JSON.parse(text.text);
    expect(payload).toMatchObject({
      available_actions: ["like", "pass", "back", "wait"],
      remaining: { likes: 20, passes: 120, messages: 5 },
      packet: { screenType: "discover-card", qualityScore: 82 }
    });
    expect(image.image_url.url).toBe(`data:image/png;base64,${Buffer.from("png-bytes").toString("base64")}`);
  });

  it("leaves the screenshot out when disabled", () => {
    const request = buildDecisionRequest(
      discoverContext({ screenshot: { png: Buffer.from("png-bytes"), width: 1, height: 1 } }),
      directive,
      { llm: { ...llm, includeScreenshot: false }, model: "test-model", profile: profile(), settings: settingsFor(directive) }
    );
    const content = request.messages[1].content;

    expect(Array.isArray(content) ? content.length : 0).toBe(1);
  });
});

describe("json extraction", () => {
  it("takes the first balanced object out of surrounding prose", () => {
    expect(extractFirstJsonObject('Sure! {"a": {"b": "}"}} and {"c": 1}')).toEqual({ a: { b: "}" } });
  });

  it("reports responses without a usable object as malformed", () => {
    expect(rejection(() => extractFirstJsonObject("no json here")).kind).toBe("malformed_response");
    expect(rejection(() => extractFirstJsonObject('{"a": 1')).kind).toBe("malformed_response");
  });
});
