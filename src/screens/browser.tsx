import { Box, Text } from "ink";
import type React from "react";
import { describeDetail } from "../helpers/detail.js";
import { browserLayout } from "../helpers/layout.js";
import {
  LEFT_COLUMN_WIDTH,
  PLATFORM_PANE_HEIGHT,
  PRODUCT_NAME,
  PRODUCT_TAGLINE,
  colors,
} from "../theme.js";
import type { BrowserState, StatusLine } from "../types.js";
import { DetailPane } from "./detailPane.js";
import { MenuPane } from "./menuPane.js";

const KEY_HINTS = "enter open · h back · tab focus · r refresh · d json · J/K scroll · ? help · q quit";

const HELP_LINES: readonly string[] = Object.freeze([
  "up/down, k/j     move",
  "pgup/pgdn        move a page",
  "g / G            first / last row",
  "enter, right, l  open the highlighted entry",
  "left, h, bksp    back to the previous pane",
  "tab / shift+tab  cycle focus",
  "r                reload the highlighted entry",
  "d                toggle build step / raw JSON",
  "J / K            scroll the detail pane",
  "?                toggle this help",
  "q, esc, ctrl+c   quit",
]);

function StatusBar({ status }: Readonly<{ status: StatusLine }>): React.JSX.Element {
  const tone =
    status.tone === "error" ? colors.error : status.tone === "loading" ? colors.loading : colors.muted;
  return (
    <Box height={1}>
      <Box flexGrow={1} flexShrink={0}>
        <Text>
          <Text bold>{PRODUCT_NAME}</Text>
          <Text color={tone}>{` · ${status.text}`}</Text>
        </Text>
      </Box>
      {/* Errors get the whole line. */}
      {status.tone === "error" ? null : (
        <Box flexShrink={1} marginLeft={1}>
          <Text wrap="truncate" color={colors.muted}>
            {KEY_HINTS}
          </Text>
        </Box>
      )}
    </Box>
  );
}

function HelpPanel({ height }: Readonly<{ height: number }>): React.JSX.Element {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor={colors.focusBorder} height={height}>
      <Text bold>{` ${PRODUCT_NAME} shortcuts `}</Text>
      <Text color={colors.muted}>{` ${PRODUCT_TAGLINE}`}</Text>
      {HELP_LINES.map((line) => (
        <Text key={line} wrap="truncate">
          {` ${line}`}
        </Text>
      ))}
    </Box>
  );
}

type BrowserScreenProps = Readonly<{
  state: BrowserState;
  rows: number;
  columns: number;
}>;

export function BrowserScreen({ state, rows, columns }: BrowserScreenProps): React.JSX.Element {
  const { bodyHeight, paneHeight, lowerHeight, layerWidth, detailWidth, detailRows } =
    browserLayout(rows, columns);
  const { panes, focus } = state;

  return (
    <Box flexDirection="column" width={columns} height={rows}>
      <Box flexDirection="row" height={bodyHeight}>
        <Box flexDirection="column" width={LEFT_COLUMN_WIDTH} flexShrink={0}>
          <MenuPane
            pane="namespaces"
            state={panes.namespaces}
            focused={focus === "namespaces"}
            height={paneHeight}
          />
          <MenuPane
            pane="repositories"
            state={panes.repositories}
            focused={focus === "repositories"}
            height={paneHeight}
          />
          <MenuPane pane="tags" state={panes.tags} focused={focus === "tags"} height={paneHeight} />
        </Box>
        <Box flexDirection="column" flexGrow={1} marginLeft={1}>
          {state.showHelp ? (
            <HelpPanel height={bodyHeight} />
          ) : (
            <>
              <MenuPane
                pane="platforms"
                state={panes.platforms}
                focused={focus === "platforms"}
                height={PLATFORM_PANE_HEIGHT}
              />
              <Box flexDirection="row" height={lowerHeight}>
                <MenuPane
                  pane="layers"
                  state={panes.layers}
                  focused={focus === "layers"}
                  height={lowerHeight}
                  width={layerWidth}
                />
                <DetailPane
                  content={describeDetail(state)}
                  scroll={state.detailScroll}
                  width={detailWidth}
                  rows={detailRows}
                />
              </Box>
            </>
          )}
        </Box>
      </Box>
      <StatusBar status={state.status} />
    </Box>
  );
}
