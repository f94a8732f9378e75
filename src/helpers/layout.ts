import {
  LAYER_MENU_WIDTH,
  LEFT_COLUMN_WIDTH,
  PLATFORM_PANE_HEIGHT,
} from "../theme.js";
import { HISTORY_LABEL_MAX } from "./format.js";

/** Lines a menu pane spends on its border, heading and footer. */
export const PANE_CHROME_ROWS = 4;
/** Lines the detail pane spends on its border and title. */
export const DETAIL_CHROME_ROWS = 3;

const PANE_BORDER_COLUMNS = 2;
const ROW_PREFIX_COLUMNS = 1;
const CELL_GAP_COLUMNS = 1;
/** Widest size label, e.g. `1023.99 MiB`. */
const SIZE_COLUMN_WIDTH = 11;

/** Narrowest layers pane that still shows a full history label and its size. */
export const LAYER_PANE_MIN_WIDTH =
  PANE_BORDER_COLUMNS + ROW_PREFIX_COLUMNS + HISTORY_LABEL_MAX + CELL_GAP_COLUMNS + SIZE_COLUMN_WIDTH;

export type BrowserLayout = Readonly<{
  /** Rows above the status bar. */
  bodyHeight: number;
  /** Height of each pane in the left column. */
  paneHeight: number;
  /** Rows moved by page-up/page-down. */
  pageRows: number;
  /** Height of the layers and detail panes. */
  lowerHeight: number;
  layerWidth: number;
  /** Text columns inside the detail pane. */
  detailWidth: number;
  /** Text lines inside the detail pane. */
  detailRows: number;
}>;

export function browserLayout(rows: number, columns: number): BrowserLayout {
  const bodyHeight = Math.max(1, rows - 1);
  const paneHeight = Math.max(3, Math.floor(bodyHeight / 3));
  const rightWidth = Math.max(20, columns - LEFT_COLUMN_WIDTH - 1);
  const lowerHeight = Math.max(3, bodyHeight - PLATFORM_PANE_HEIGHT);
  const layerWidth = Math.min(
    LAYER_MENU_WIDTH,
    Math.max(LAYER_PANE_MIN_WIDTH, Math.floor(rightWidth / 2)),
  );

  return {
    bodyHeight,
    paneHeight,
    pageRows: Math.max(1, paneHeight - PANE_CHROME_ROWS),
    lowerHeight,
    layerWidth,
    detailWidth: Math.max(1, rightWidth - layerWidth - PANE_BORDER_COLUMNS),
    detailRows: Math.max(0, lowerHeight - DETAIL_CHROME_ROWS),
  };
}
