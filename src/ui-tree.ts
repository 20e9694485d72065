import { XMLParser, XMLValidator } from "fast-xml-parser";
import { TransportError } from "./errors.js";
import type { Bounds, UiNode } from "./types.js";

export interface UiTree {
  nodes: UiNode[];
  accessibleStrings: string[];
  packageName?: string;
}

export interface ParseUiTreeOptions {
  maxNodes?: number;
}

const DEFAULT_MAX_NODES = 3500;
const ATTRIBUTES_KEY = ":@";
const BOUNDS_PATTERN = /\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]/;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  preserveOrder: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseAttributeValue: false,
  trimValues: false
});

export function parseUiTree(xml: string, options: ParseUiTreeOptions = {}): UiTree {
  const maxNodes = Math.max(1, Math.floor(options.maxNodes ?? DEFAULT_MAX_NODES));
  if (xml.trim().length === 0) {
    throw new TransportError("bad_capture", "Page source is empty");
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new TransportError(
      "bad_capture",
      `Page source is not well-formed XML (line ${validation.err.line}): ${validation.err.msg}`
    );
  }

  const parsed: unknown = parser.parse(xml);
  const nodes: UiNode[] = [];
  visitElements(parsed, (tag, attributes) => {
    if (nodes.length >= maxNodes) {
      return false;
    }
    nodes.push(toUiNode(nodes.length + 1, tag, attributes));
    return true;
  });

  return {
    nodes,
    accessibleStrings: collectAccessibleStrings(nodes),
    packageName: nodes.find((node) => node.packageName)?.packageName
  };
}

export function parseBounds(raw: string | undefined): Bounds | undefined {
  if (!raw) {
    return undefined;
  }
  const match = BOUNDS_PATTERN.exec(raw);
  if (!match) {
    return undefined;
  }
  return {
    x1: Number(match[1]),
    y1: Number(match[2]),
    x2: Number(match[3]),
    y2: Number(match[4])
  };
}

export function nodeLabel(node: UiNode): string {
  const description = node.contentDesc?.trim() ?? "";
  return description.length > 0 ? description : (node.text?.trim() ?? "");
}

function collectAccessibleStrings(nodes: readonly UiNode[]): string[] {
  const seen = new Set<string>();
  const strings: string[] = [];
  for (const node of nodes) {
    for (const value of [node.text, node.contentDesc]) {
      const trimmed = value?.trim();
      if (!trimmed || seen.has(trimmed)) {
        continue;
      }
      seen.add(trimmed);
      strings.push(trimmed);
    }
  }
  return strings;
}

function toUiNode(ordinal: number, tag: string, attributes: Record<string, string>): UiNode {
  const className = nonEmpty(attributes.class) ?? (tag === "node" || tag === "hierarchy" ? undefined : tag);
  return {
    ordinal,
    className,
    resourceId: nonEmpty(attributes["resource-id"]),
    packageName: nonEmpty(attributes.package),
    text: nonEmpty(attributes.text),
    contentDesc: nonEmpty(attributes["content-desc"]),
    clickable: attributes.clickable === "true",
    enabled: attributes.enabled === "true",
    focused: attributes.focused === "true",
    bounds: parseBounds(attributes.bounds)
  };
}

// Pre-order walk over the ordered parser output; the visitor returns false to stop.
function visitElements(
  entries: unknown,
  visitor: (tag: string, attributes: Record<string, string>) => boolean
): boolean {
  if (!Array.isArray(entries)) {
    return true;
  }

  for (const entry of entries) {
    if (!isRecord(entry)) {
      continue;
    }
    const attributes = toAttributeMap(entry[ATTRIBUTES_KEY]);
    for (const [tag, children] of Object.entries(entry)) {
      if (tag === ATTRIBUTES_KEY || tag === "#text") {
        continue;
      }
      if (!visitor(tag, attributes)) {
        return false;
      }
      if (!visitElements(children, visitor)) {
        return false;
      }
    }
  }
  return true;
}

function toAttributeMap(raw: unknown): Record<string, string> {
  if (!isRecord(raw)) {
    return {};
  }
  const attributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") {
      attributes[key] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      attributes[key] = String(value);
    }
  }
  return attributes;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}
