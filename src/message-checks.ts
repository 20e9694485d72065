import type { QualityFeatures } from "./types.js";

export interface MessageRules {
  maxChars: number;
  requireQuestion: boolean;
  blockOffAppContact: boolean;
  hardBoundaries?: readonly string[];
}

export type MessageIssue =
  | "empty"
  | "too_long"
  | "missing_question"
  | "contains_email"
  | "contains_phone_number"
  | "contains_url"
  | "mentions_off_app_handle"
  | "explicit_content";

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const PHONE_PATTERN = /(?<!\d)(?:\+?1\s*)?(?:\(\d{3}\)|\d{3})[\s.-]*\d{3}[\s.-]*\d{4}(?!\d)/;
const URL_PATTERN = /\bhttps?:\/\/\S+/i;
const HANDLE_PATTERN = /\b(?:ig|insta|instagram|snap|snapchat|telegram|whatsapp)\b/i;

// Only consulted when a hard boundary mentions sexual content.
const EXPLICIT_TERMS = ["sexy", "hook up", "hookup", "fwb", "nude", "nudes", "sugar daddy", "sugar baby"];

const QUESTION_SUFFIX = " What's been your highlight this week?";

const STOP_WORDS = new Set([
  "the",
  "and",
  "that",
  "this",
  "with",
  "your",
  "you",
  "are",
  "for",
  "but",
  "not",
  "from",
  "have",
  "has",
  "was",
  "were",
  "what",
  "when",
  "where",
  "who",
  "why",
  "how",
  "really",
  "just",
  "like"
]);

export function checkMessage(text: string, rules: MessageRules): MessageIssue[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return ["empty"];
  }

  const issues: MessageIssue[] = [];
  if ([...trimmed].length > rules.maxChars) {
    issues.push("too_long");
  }
  if (rules.requireQuestion && !trimmed.includes("?")) {
    issues.push("missing_question");
  }
  if (rules.blockOffAppContact) {
    if (EMAIL_PATTERN.test(trimmed)) {
      issues.push("contains_email");
    }
    if (PHONE_PATTERN.test(trimmed)) {
      issues.push("contains_phone_number");
    }
    if (URL_PATTERN.test(trimmed)) {
      issues.push("contains_url");
    }
    if (HANDLE_PATTERN.test(trimmed)) {
      issues.push("mentions_off_app_handle");
    }
  }

  const boundaries = (rules.hardBoundaries ?? []).join(" ").toLowerCase();
  if (boundaries.includes("sex")) {
    const lowered = trimmed.toLowerCase();
    if (EXPLICIT_TERMS.some((term) => lowered.includes(term))) {
      issues.push("explicit_content");
    }
  }
  return issues;
}

export function renderTemplate(template: string, name: string | undefined): string {
  return template.split("{{name}}").join(name && name.trim().length > 0 ? name.trim() : "there");
}

export function normalizeWhitespace(text: string): string {
  return text.split(/\s+/).filter((part) => part.length > 0).join(" ");
}

/**
 * Renders the opener template into a sendable message: whitespace collapsed, clipped to the
 * character limit and, where required, ending in a question.
 */
export function composeTemplateMessage(
  template: string,
  name: string | undefined,
  rules: Pick<MessageRules, "maxChars" | "requireQuestion">
): string {
  let text = normalizeWhitespace(renderTemplate(template, name));
  const chars = [...text];
  if (chars.length > rules.maxChars) {
    text = `${chars.slice(0, Math.max(0, rules.maxChars - 1)).join("").trimEnd()}…`;
  }

  if (rules.requireQuestion && !text.includes("?")) {
    const candidate = `${text}${QUESTION_SUFFIX}`;
    if ([...candidate].length <= rules.maxChars) {
      text = candidate;
    } else {
      const headLength = Math.max(0, rules.maxChars - QUESTION_SUFFIX.length - 1);
      text = `${[...text].slice(0, headLength).join("").trimEnd()}${QUESTION_SUFFIX}`.trim();
    }
  }
  return text;
}

export interface PersonalizationSignals {
  mentionsProfileName: boolean;
  mentionsPromptKeyword: boolean;
}

export function personalizationSignals(text: string, features: QualityFeatures): PersonalizationSignals {
  const lowered = text.toLowerCase();
  const name = features.profileNameCandidate?.trim().toLowerCase();
  const keywords = (features.promptAnswer?.match(/[A-Za-z][A-Za-z'-]{2,}/g) ?? [])
    .map((word) => word.toLowerCase())
    .filter((word) => !STOP_WORDS.has(word))
    .slice(0, 10);
  return {
    mentionsProfileName: name !== undefined && name.length > 0 && lowered.includes(name),
    mentionsPromptKeyword: keywords.some((keyword) => lowered.includes(keyword))
  };
}
