import type { MenuNode } from "./node.js";

/** Panes in navigation order; a menu of level N is shown in pane N. */
export const MENU_LEVELS = Object.freeze([
  "namespaces",
  "repositories",
  "tags",
  "platforms",
  "layers",
] as const);

export type MenuLevel = (typeof MENU_LEVELS)[number];

export type Cell = Readonly<{
  text: string;
  align?: "left" | "right";
}>;

/** Content of the detail pane for a highlighted leaf row. */
export type DetailView = Readonly<{
  text: string;
  document: unknown;
}>;

/** Row that opens a child menu when activated. */
export type NodeRow = Readonly<{
  kind: "node";
  key: string;
  cells: readonly Cell[];
  target: MenuLevel;
  node: MenuNode;
}>;

/** Row with nothing below it; highlighting it changes the detail pane. */
export type LeafRow = Readonly<{
  kind: "leaf";
  key: string;
  cells: readonly Cell[];
  detail: DetailView;
}>;

export type MenuRow = NodeRow | LeafRow;

export type Menu = Readonly<{
  level: MenuLevel;
  /** Human-readable key of the node that built this menu. */
  heading: string;
  items: readonly MenuRow[];
  /** Raw registry document backing the menu, shown in JSON mode. */
  document: unknown;
}>;

export function levelIndex(level: MenuLevel): number {
  return MENU_LEVELS.indexOf(level);
}
