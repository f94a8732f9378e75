import type { PaneId, PaneState } from "../types.js";
import { formatCount, formatHeading } from "./format.js";

type PaneSpec = Readonly<{
  /** Heading while the pane is empty. */
  title: string;
  /** Heading once populated; `{}` is replaced by the menu's key. */
  template: string | null;
  singular: string;
  plural: string;
}>;

export const PANE_SPECS: Readonly<Record<PaneId, PaneSpec>> = Object.freeze({
  namespaces: { title: "Namespaces", template: null, singular: "namespace", plural: "namespaces" },
  repositories: { title: "Images", template: "Images: {}", singular: "image", plural: "images" },
  tags: { title: "Tags", template: "Tags: {}", singular: "tag", plural: "tags" },
  platforms: { title: "Platforms", template: "{}", singular: "platform", plural: "platforms" },
  layers: { title: "Layers", template: "Layers: {}", singular: "step", plural: "steps" },
});

export type PaneSummary = Readonly<{
  heading: string;
  footer: string;
}>;

export function paneSummary(pane: PaneId, state: PaneState): PaneSummary {
  const spec = PANE_SPECS[pane];
  if (!state.menu) return { heading: spec.title, footer: "" };
  return {
    heading: spec.template ? formatHeading(spec.template, state.menu.heading) : spec.title,
    footer: formatCount(state.menu.items.length, spec.singular, spec.plural),
  };
}
