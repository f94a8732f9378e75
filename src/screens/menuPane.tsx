import { Box, Text } from "ink";
import type React from "react";
import { PANE_CHROME_ROWS } from "../helpers/layout.js";
import { paneSummary } from "../helpers/summary.js";
import { visibleWindow } from "../helpers/viewport.js";
import type { MenuRow } from "../menu/types.js";
import { colors } from "../theme.js";
import type { PaneId, PaneState } from "../types.js";

type RowProps = Readonly<{
  row: MenuRow;
  highlighted: boolean;
  focused: boolean;
}>;

function Row({ row, highlighted, focused }: RowProps): React.JSX.Element {
  const [first, ...rest] = row.cells;
  const active = highlighted && focused;
  const textProps = {
    bold: highlighted,
    ...(active ? { color: colors.selected, backgroundColor: colors.selectedBg } : {}),
  };

  return (
    <Box>
      <Box flexGrow={1} flexShrink={1}>
        <Text wrap="truncate" {...textProps}>
          {row.kind === "node" ? " • " : " "}
          {first?.text ?? ""}
        </Text>
      </Box>
      {rest.map((cell, index) => (
        <Box
          key={`${row.key}:${String(index)}`}
          marginLeft={1}
          flexShrink={0}
          justifyContent={cell.align === "right" ? "flex-end" : "flex-start"}
        >
          <Text {...textProps}>{cell.text}</Text>
        </Box>
      ))}
    </Box>
  );
}

type MenuPaneProps = Readonly<{
  pane: PaneId;
  state: PaneState;
  focused: boolean;
  height: number;
  width?: number;
}>;

/** Bordered list with a heading, a scrolling body and a count footer. */
export function MenuPane({ pane, state, focused, height, width }: MenuPaneProps): React.JSX.Element {
  const summary = paneSummary(pane, state);
  const items = state.menu?.items ?? [];
  const window = visibleWindow(items.length, state.cursor, Math.max(0, height - PANE_CHROME_ROWS));

  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor={focused ? colors.focusBorder : colors.border}
      height={height}
      width={width}
      flexGrow={width === undefined ? 1 : 0}
      flexShrink={0}
    >
      <Text
        bold
        wrap="truncate"
        color={focused ? colors.focusHeading : colors.heading}
        backgroundColor={focused ? colors.focusHeadingBg : colors.headingBg}
      >
        {` ${summary.heading} `}
      </Text>
      <Box flexDirection="column" flexGrow={1}>
        {items.slice(window.start, window.end).map((row, offset) => (
          <Row
            key={`${String(window.start + offset)}:${row.key}`}
            row={row}
            highlighted={window.start + offset === state.cursor}
            focused={focused}
          />
        ))}
      </Box>
      <Text wrap="truncate" color={colors.muted}>
        {` ${summary.footer}`}
      </Text>
    </Box>
  );
}
