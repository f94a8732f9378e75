import { MENU_LEVELS, type MenuRow, levelIndex } from "../menu/types.js";
import type { BrowserAction, BrowserState, PaneId, PaneState } from "../types.js";

export const READY_STATUS = Object.freeze({ tone: "info", text: "Ready" } as const);

const EMPTY_PANE: PaneState = Object.freeze({ menu: null, cursor: 0 });

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function emptyPanes(): Readonly<Record<PaneId, PaneState>> {
  return Object.freeze({
    namespaces: EMPTY_PANE,
    repositories: EMPTY_PANE,
    tags: EMPTY_PANE,
    platforms: EMPTY_PANE,
    layers: EMPTY_PANE,
  });
}

export function createInitialState(): BrowserState {
  return {
    panes: emptyPanes(),
    focus: "namespaces",
    detailMode: "command",
    detailScroll: 0,
    error: null,
    status: READY_STATUS,
    showHelp: false,
  };
}

/**
 * Returns panes with every pane from `fromLevel` onward reset to empty.
 * `replace` becomes the content of the pane at `fromLevel`.
 */
function resetFrom(
  panes: Readonly<Record<PaneId, PaneState>>,
  fromLevel: PaneId,
  replace: PaneState = EMPTY_PANE,
): Readonly<Record<PaneId, PaneState>> {
  const from = levelIndex(fromLevel);
  const next: Record<PaneId, PaneState> = { ...panes };
  for (const [index, level] of MENU_LEVELS.entries()) {
    if (index === from) next[level] = replace;
    else if (index > from) next[level] = EMPTY_PANE;
  }
  return Object.freeze(next);
}

export function populatedPanes(state: BrowserState): readonly PaneId[] {
  return MENU_LEVELS.filter((level) => state.panes[level].menu !== null);
}

export function highlightedRow(state: BrowserState, pane: PaneId = state.focus): MenuRow | null {
  const { menu, cursor } = state.panes[pane];
  return menu?.items[cursor] ?? null;
}

function withCursor(state: BrowserState, pane: PaneId, index: number): BrowserState {
  const current = state.panes[pane];
  if (!current.menu) return state;
  const cursor = clamp(index, 0, Math.max(0, current.menu.items.length - 1));
  if (cursor === current.cursor) return state;
  return {
    ...state,
    panes: Object.freeze({ ...state.panes, [pane]: { menu: current.menu, cursor } }),
    detailScroll: 0,
  };
}

function cycleFocus(state: BrowserState, step: 1 | -1): BrowserState {
  const populated = populatedPanes(state);
  if (populated.length === 0) return state;
  const index = populated.indexOf(state.focus);
  const next = populated[(index + step + populated.length) % populated.length];
  return next === undefined || next === state.focus ? state : { ...state, focus: next };
}

/**
 * Display router. `menu-opened` swaps the menu's pane in, resets everything
 * downstream of it, and focuses it; focus changes never land on an empty pane.
 */
export function reduceBrowserState(state: BrowserState, action: BrowserAction): BrowserState {
  if (action.type === "menu-opened") {
    return {
      ...state,
      panes: resetFrom(state.panes, action.menu.level, { menu: action.menu, cursor: 0 }),
      focus: action.menu.level,
      detailScroll: 0,
      error: null,
      status: READY_STATUS,
    };
  }

  if (action.type === "activation-started") {
    return { ...state, status: { tone: "loading", text: `Loading ${action.heading}…` } };
  }

  if (action.type === "activation-failed") {
    const parentIndex = Math.max(0, levelIndex(action.target) - 1);
    const panes = resetFrom(state.panes, action.target);
    const parent = MENU_LEVELS[parentIndex] ?? "namespaces";
    return {
      ...state,
      panes,
      focus: parent,
      detailScroll: 0,
      error: action.message,
      status: { tone: "error", text: action.message },
    };
  }

  if (action.type === "move-cursor") {
    return withCursor(state, state.focus, state.panes[state.focus].cursor + action.delta);
  }

  if (action.type === "set-cursor") {
    return withCursor(state, action.pane, action.index);
  }

  if (action.type === "focus-pane") {
    if (state.panes[action.pane].menu === null || state.focus === action.pane) return state;
    return { ...state, focus: action.pane };
  }

  if (action.type === "focus-next") return cycleFocus(state, 1);

  if (action.type === "focus-prev") return cycleFocus(state, -1);

  if (action.type === "focus-back") {
    const populated = populatedPanes(state);
    const previous = populated[populated.indexOf(state.focus) - 1];
    return previous === undefined ? state : { ...state, focus: previous };
  }

  if (action.type === "toggle-detail") {
    return {
      ...state,
      detailMode: state.detailMode === "command" ? "json" : "command",
      detailScroll: 0,
    };
  }

  if (action.type === "scroll-detail") {
    const detailScroll = clamp(state.detailScroll + action.delta, 0, Math.max(0, action.limit));
    return detailScroll === state.detailScroll ? state : { ...state, detailScroll };
  }

  if (action.type === "toggle-help") {
    return { ...state, showHelp: !state.showHelp };
  }

  return state;
}
