import { MENU_LEVELS } from "../menu/types.js";
import type { BrowserState } from "../types.js";
import { formatJson } from "./format.js";
import { highlightedRow } from "./state.js";

export type DetailContent = Readonly<{
  title: string;
  body: string;
  tone: "normal" | "error";
}>;

const EMPTY_DETAIL: DetailContent = Object.freeze({ title: "Details", body: "", tone: "normal" });

/**
 * What the detail pane shows: a failed query's message, otherwise the
 * highlighted build step (command mode) or the raw registry JSON behind the
 * deepest open menu (JSON mode).
 */
export function describeDetail(state: BrowserState): DetailContent {
  if (state.error !== null) return { title: "Error", body: state.error, tone: "error" };

  const deepest = [...MENU_LEVELS].reverse().find((level) => state.panes[level].menu !== null);
  if (deepest === undefined) return EMPTY_DETAIL;

  const row = highlightedRow(state, deepest);
  const leaf = row?.kind === "leaf" ? row : null;

  if (state.detailMode === "json") {
    const document = leaf ? leaf.detail.document : state.panes[deepest].menu?.document;
    return { title: "JSON", body: formatJson(document ?? null), tone: "normal" };
  }

  if (!leaf) return EMPTY_DETAIL;
  const { cursor, menu } = state.panes[deepest];
  return {
    title: `Step ${String(cursor + 1)}/${String(menu?.items.length ?? 0)}`,
    body: leaf.detail.text,
    tone: "normal",
  };
}
