import { describe, expect, it } from "vitest";
import { extract, extractQualityFeatures, scoreQuality } from "../src/extractor.js";
import { createObservation } from "../src/observation.js";
import { chatXml, discoverXml, hierarchy, twoLikeDiscoverXml } from "./helpers/screens.js";

describe("content extractor", () => {
  it("scores a discover card with quality_score_v1", () => {
    const extraction = extract(createObservation({ xml: discoverXml() }));

    expect(extraction.qualityScoreVersion).toBe("quality_score_v1");
    // surface 20 + selfie 20 + active 15 + prompt answer 15 + one like target 8 + name 8
    expect(extraction.qualityScore).toBe(86);
    expect(extraction.qualityFeatures).toMatchObject({
      profileNameCandidate: "Maya",
      promptAnswer: "Fresh bread and long walks",
      promptPairs: [{ prompt: "My simple pleasures", answer: "Fresh bread and long walks" }],
      likeTargets: ["Like prompt"],
      qualityFlags: ["active_today", "selfie_verified"],
      completenessPct: 100
    });
    expect(extraction.content).toEqual({
      profileName: "Maya",
      promptAnswer: "Fresh bread and long walks",
      threadLines: []
    });
  });

  it("finds interaction targets with stable ids and tap points", () => {
    const { targets } = extract(createObservation({ xml: discoverXml() }));

    expect(targets.map((target) => target.targetId)).toEqual([
      "like_button:6",
      "pass_button:7",
      "tab_discover:8",
      "tab_matches:9"
    ]);
    expect(targets[0].tapPoint).toEqual({ x: 970, y: 1480 });
    expect(targets[0].contextText).toEqual(["Active today", "Selfie verified"]);
  });

  it("extracts the peer and lines of a chat thread", () => {
    const extraction = extract(createObservation({ xml: chatXml() }));

    expect(extraction.content.threadPeerName).toBe("Sam");
    expect(extraction.content.threadLines).toEqual(["Hey, how was the hike?", "It was great, the view was worth it"]);
    expect(extraction.targets.map((target) => target.targetId)).toEqual(["message_input:5", "send_button:6"]);
    expect(extraction.qualityScore).toBe(0);
  });

  it("caps like targets in the score", () => {
    const features = extractQualityFeatures(["Like photo", "Like prompt", "Like video", "Like voice note"]);

    expect(features.likeTargets).toHaveLength(4);
    expect(scoreQuality("unknown", features)).toBe(24);
    expect(scoreQuality("matches-empty", features)).toBe(0);
  });

  it("skips disabled and unlabeled nodes", () => {
    const { targets } = extract(
      createObservation({
        xml: hierarchy([
          { desc: "Like photo", clickable: true, enabled: false, bounds: [0, 0, 10, 10] },
          { clickable: true, bounds: [0, 0, 10, 10] },
          { text: "Help", clickable: true, bounds: [0, 20, 10, 30] }
        ])
      })
    );

    expect(targets).toEqual([
      {
        targetId: "clickable_other:4",
        kind: "clickable_other",
        label: "Help",
        bounds: { x1: 0, y1: 20, x2: 10, y2: 30 },
        tapPoint: { x: 5, y: 25 },
        resourceId: undefined
      }
    ]);
  });

  it("gives identical screens identical fingerprints", () => {
    const first = extract(createObservation({ xml: discoverXml() }));
    const again = extract(createObservation({ xml: discoverXml() }));
    const next = extract(createObservation({ xml: discoverXml("Jordan", "Sunday crosswords") }));

    expect(again.fingerprint).toBe(first.fingerprint);
    expect(next.fingerprint).not.toBe(first.fingerprint);
    expect(first.fingerprint).toMatch(/^[0-9a-f]{64}$/);
  });

  it("separates like buttons on the same card", () => {
    const { targets } = extract(createObservation({ xml: twoLikeDiscoverXml() }));

    expect(targets.filter((target) => target.kind === "like_button").map((target) => target.targetId)).toEqual([
      "like_button:3",
      "like_button:5"
    ]);
  });
});
