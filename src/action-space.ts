import { ACTION_CATALOG } from "./catalog.js";
import type { ActionId, ScreenType, TargetSummary } from "./types.js";

export interface ActionSpaceOptions {
  /** Gate for actions that carry generated text. */
  messageEnabled: boolean;
}

/**
 * Catalog-ordered list of actions valid for the screen. An action that needs a target is
 * only emitted when a target of one of its kinds is present; nothing is substituted.
 */
export function buildActionSpace(
  screenType: ScreenType,
  targets: readonly TargetSummary[],
  options: ActionSpaceOptions
): ActionId[] {
  const presentKinds = new Set(targets.map((target) => target.kind));
  const available: ActionId[] = [];

  for (const entry of ACTION_CATALOG) {
    if (entry.requiresMessage && !options.messageEnabled) {
      continue;
    }
    if (entry.screens === "any") {
      available.push(entry.actionId);
      continue;
    }
    const kinds = entry.screens[screenType];
    if (!kinds) {
      continue;
    }
    if (entry.requiresTarget && !kinds.some((kind) => presentKinds.has(kind))) {
      continue;
    }
    available.push(entry.actionId);
  }

  return available;
}
