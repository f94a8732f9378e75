import type { Menu, MenuLevel } from "./menu/types.js";

export type PaneId = MenuLevel;

export type PaneState = Readonly<{
  menu: Menu | null;
  cursor: number;
}>;

export type DetailMode = "command" | "json";

export type StatusLine = Readonly<{
  tone: "info" | "loading" | "error";
  text: string;
}>;

export type BrowserState = Readonly<{
  panes: Readonly<Record<PaneId, PaneState>>;
  focus: PaneId;
  detailMode: DetailMode;
  /** First visible line of the wrapped detail text. */
  detailScroll: number;
  /** Shown in the detail pane instead of the JSON/command content. */
  error: string | null;
  status: StatusLine;
  showHelp: boolean;
}>;

export type BrowserAction =
  | Readonly<{ type: "menu-opened"; menu: Menu }>
  | Readonly<{ type: "activation-started"; heading: string }>
  | Readonly<{ type: "activation-failed"; target: PaneId; message: string }>
  | Readonly<{ type: "move-cursor"; delta: number }>
  | Readonly<{ type: "set-cursor"; pane: PaneId; index: number }>
  | Readonly<{ type: "focus-pane"; pane: PaneId }>
  | Readonly<{ type: "focus-next" }>
  | Readonly<{ type: "focus-prev" }>
  | Readonly<{ type: "focus-back" }>
  | Readonly<{ type: "toggle-detail" }>
  | Readonly<{ type: "scroll-detail"; delta: number; limit: number }>
  | Readonly<{ type: "toggle-help" }>;

export type BrowserCommand =
  | "quit"
  | "move-up"
  | "move-down"
  | "page-up"
  | "page-down"
  | "first"
  | "last"
  | "activate"
  | "back"
  | "focus-next"
  | "focus-prev"
  | "refresh"
  | "toggle-detail"
  | "scroll-detail-up"
  | "scroll-detail-down"
  | "toggle-help";
