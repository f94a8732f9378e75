import { Box, Text } from "ink";
import type React from "react";
import type { DetailContent } from "../helpers/detail.js";
import { DETAIL_CHROME_ROWS } from "../helpers/layout.js";
import { scrollWindow } from "../helpers/viewport.js";
import { wrapTextToLines } from "../helpers/wrap.js";
import { colors } from "../theme.js";

type DetailPaneProps = Readonly<{
  content: DetailContent;
  scroll: number;
  /** Text columns inside the border. */
  width: number;
  /** Text lines inside the border. */
  rows: number;
}>;

/** Wrapped detail text; scrolls when it is longer than the pane. */
export function DetailPane({ content, scroll, width, rows }: DetailPaneProps): React.JSX.Element {
  const lines = wrapTextToLines(content.body, width);
  const window = scrollWindow(lines.length, scroll, rows);
  const position =
    lines.length > rows
      ? ` ${String(window.start + 1)}-${String(window.end)}/${String(lines.length)}`
      : "";
  const tone = content.tone === "error" ? colors.error : colors.text;

  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor={content.tone === "error" ? colors.error : colors.border}
      height={rows + DETAIL_CHROME_ROWS}
      flexGrow={1}
      flexShrink={1}
    >
      <Text bold wrap="truncate" color={content.tone === "error" ? colors.error : colors.muted}>
        {` ${content.title}${position} `}
      </Text>
      {lines.slice(window.start, window.end).map((line, offset) => (
        <Text key={String(window.start + offset)} wrap="truncate" color={tone}>
          {line.length > 0 ? line : " "}
        </Text>
      ))}
    </Box>
  );
}
