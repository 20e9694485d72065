import { ACTION_IDS, type ActionCatalogEntry, type ActionId, type ScreenType, type TargetKind } from "./types.js";

export const ACTION_CATALOG_VERSION = "action_catalog.v1";

const NAVIGABLE_SCREENS: readonly ScreenType[] = [
  "discover-card",
  "matches-list",
  "matches-empty",
  "chat-thread",
  "tab-shell",
  "unknown"
];

function onScreens(
  screens: readonly ScreenType[],
  kinds: readonly TargetKind[],
  except: readonly ScreenType[] = []
): Partial<Record<ScreenType, readonly TargetKind[]>> {
  const map: Partial<Record<ScreenType, readonly TargetKind[]>> = {};
  for (const screen of screens) {
    if (!except.includes(screen)) {
      map[screen] = kinds;
    }
  }
  return map;
}

export const ACTION_CATALOG: readonly ActionCatalogEntry[] = [
  {
    actionId: "goto_discover",
    requiresTarget: true,
    requiresMessage: false,
    description: "Open the Discover tab.",
    screens: onScreens(NAVIGABLE_SCREENS, ["tab_discover"], ["discover-card"])
  },
  {
    actionId: "goto_matches",
    requiresTarget: true,
    requiresMessage: false,
    description: "Open the Matches tab.",
    screens: onScreens(NAVIGABLE_SCREENS, ["tab_matches"], ["matches-list", "matches-empty"])
  },
  {
    actionId: "goto_likes_you",
    requiresTarget: true,
    requiresMessage: false,
    description: "Open the Likes You tab.",
    screens: onScreens(NAVIGABLE_SCREENS, ["tab_likes_you"])
  },
  {
    actionId: "goto_standouts",
    requiresTarget: true,
    requiresMessage: false,
    description: "Open the Standouts tab.",
    screens: onScreens(NAVIGABLE_SCREENS, ["tab_standouts"])
  },
  {
    actionId: "goto_profile_hub",
    requiresTarget: true,
    requiresMessage: false,
    description: "Open the Profile Hub tab.",
    screens: onScreens(NAVIGABLE_SCREENS, ["tab_profile_hub"])
  },
  {
    actionId: "open_thread",
    requiresTarget: true,
    requiresMessage: false,
    description: "Open a conversation from the matches list.",
    screens: { "matches-list": ["thread_row"] }
  },
  {
    actionId: "like",
    requiresTarget: true,
    requiresMessage: false,
    description: "Like the current profile (photo or prompt).",
    screens: { "discover-card": ["like_button"] }
  },
  {
    actionId: "pass",
    requiresTarget: true,
    requiresMessage: false,
    description: "Skip the current profile.",
    screens: { "discover-card": ["pass_button"] }
  },
  {
    actionId: "send_message",
    requiresTarget: true,
    requiresMessage: true,
    description: "Send a message: a like with comment on Discover, or a chat message in a thread.",
    screens: {
      "discover-card": ["comment_input", "like_button"],
      "chat-thread": ["message_input"]
    }
  },
  {
    actionId: "dismiss_overlay",
    requiresTarget: true,
    requiresMessage: false,
    description: "Close the sheet or paywall covering the screen.",
    screens: onScreens(["overlay-paywall", "overlay-generic"], ["close_overlay"])
  },
  {
    actionId: "back",
    requiresTarget: false,
    requiresMessage: false,
    description: "Press the system back key.",
    screens: "any"
  },
  {
    actionId: "wait",
    requiresTarget: false,
    requiresMessage: false,
    description: "Do nothing this cycle.",
    screens: "any"
  }
];

const CATALOG_INDEX = new Map<string, number>(ACTION_CATALOG.map((entry, index) => [entry.actionId, index]));

export function isCatalogAction(value: string): value is ActionId {
  return CATALOG_INDEX.has(value);
}

export function getCatalogEntry(actionId: ActionId): ActionCatalogEntry {
  const index = CATALOG_INDEX.get(actionId);
  const entry = index === undefined ? undefined : ACTION_CATALOG[index];
  if (!entry) {
    throw new Error(`Action '${actionId}' is not in ${ACTION_CATALOG_VERSION}`);
  }
  return entry;
}

export function catalogIndex(actionId: ActionId): number {
  return CATALOG_INDEX.get(actionId) ?? ACTION_IDS.length;
}

/**
 * Target kinds that satisfy an action on a given screen, in order of preference, or undefined
 * if the action does not apply there.
 */
export function requiredTargetKinds(actionId: ActionId, screenType: ScreenType): readonly TargetKind[] | undefined {
  const { screens } = getCatalogEntry(actionId);
  if (screens === "any") {
    return [];
  }
  return screens[screenType];
}

export function describeCatalog(): Array<{ actionId: ActionId; description: string; requiresMessage: boolean }> {
  return ACTION_CATALOG.map((entry) => ({
    actionId: entry.actionId,
    description: entry.description,
    requiresMessage: entry.requiresMessage
  }));
}
