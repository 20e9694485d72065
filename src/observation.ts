import { classify } from "./classifier.js";
import { parseUiTree, type ParseUiTreeOptions } from "./ui-tree.js";
import type { Observation, RawCapture } from "./types.js";

export function createObservation(raw: RawCapture, options: ParseUiTreeOptions = {}): Observation {
  const tree = parseUiTree(raw.xml, options);
  const rawStrings = Object.freeze([...tree.accessibleStrings]);
  const nodes = Object.freeze(tree.nodes.map((node) => Object.freeze({ ...node })));
  const observation: Observation = {
    screenType: classify({ rawStrings, nodes }),
    rawStrings,
    nodes,
    packageName: tree.packageName,
    xml: raw.xml,
    screenshot: raw.screenshot,
    capturedAt: raw.capturedAt ?? new Date().toISOString()
  };
  return Object.freeze(observation);
}
