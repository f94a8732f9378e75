import { InvariantError } from "../errors.js";
import type { Layer, PlatformImage } from "../registry/types.js";
import { cleanCreatedBy, formatSize, truncateLabel } from "./format.js";

/**
 * Finds the layer produced by a history entry.
 *
 * Empty-layer entries produce nothing and resolve to null. Every other entry
 * matches the layer at its position among the non-empty entries; a missing
 * match means the manifest and config disagree, which is an invariant
 * violation rather than a display problem.
 */
export function resolveLayer(image: PlatformImage, historyIndex: number): Layer | null {
  const history = image.config.history;
  const entry = history[historyIndex];
  if (!entry) {
    throw new InvariantError(
      `history index ${String(historyIndex)} out of range for ${image.platformName}`,
    );
  }
  if (entry.emptyLayer) return null;

  const layerIndex = history.filter((item) => !item.emptyLayer).indexOf(entry);
  const layer = layerIndex < 0 ? undefined : image.layers[layerIndex];
  if (!layer) {
    throw new InvariantError(
      `history entry ${String(historyIndex)} of ${image.platformName} has no matching layer`,
    );
  }
  return layer;
}

/** The history entry as the config blob spells it, or null when the blob has none. */
export function rawHistoryEntry(image: PlatformImage, historyIndex: number): unknown {
  const raw = image.config.raw;
  if (typeof raw !== "object" || raw === null || !("history" in raw)) return null;
  const history: unknown = raw.history;
  if (!Array.isArray(history)) return null;
  const entry: unknown = history[historyIndex];
  return entry ?? null;
}

export function layerSizeLabel(image: PlatformImage, historyIndex: number): string {
  return formatSize(resolveLayer(image, historyIndex)?.size ?? 0);
}

export function historyLabel(createdBy: string): string {
  return truncateLabel(cleanCreatedBy(createdBy));
}

export function totalLayerSize(image: PlatformImage): number {
  return image.layers.reduce((sum, layer) => sum + layer.size, 0);
}
