export const PRODUCT_NAME = "regscope";
export const PRODUCT_TAGLINE = "Container registry browser";

/** Ink color names; the terminal's own palette decides the exact shades. */
export const colors = Object.freeze({
  heading: "black",
  headingBg: "gray",
  focusHeading: "white",
  focusHeadingBg: "red",
  border: "gray",
  focusBorder: "red",
  text: "white",
  muted: "gray",
  selected: "white",
  selectedBg: "blue",
  error: "red",
  loading: "yellow",
});

export const LEFT_COLUMN_WIDTH = 36;
export const LAYER_MENU_WIDTH = 54;
export const PLATFORM_PANE_HEIGHT = 7;
export const FALLBACK_ROWS = 24;
export const FALLBACK_COLUMNS = 100;
