const LAYER_HISTORY_INSTR_PREFIX = "/bin/sh -c #(nop)";
const LAYER_HISTORY_INSTR_SUFFIX_BUILDKIT = "# buildkit";

const BINARY_UNITS: readonly string[] = Object.freeze([
  "KiB",
  "MiB",
  "GiB",
  "TiB",
  "PiB",
  "EiB",
  "ZiB",
  "YiB",
]);

export const HISTORY_LABEL_MAX = 25;
const ELLIPSIS = "...";

export function formatCount(count: number, singular: string, plural: string): string {
  return count === 1 ? `1 ${singular}` : `${String(count)} ${plural}`;
}

/** Replaces the `{}` placeholder of a heading template with `value`, verbatim. */
export function formatHeading(template: string, value: string): string {
  return template.replace("{}", () => value);
}

function roundNumber(value: number): string {
  const fixed = value.toFixed(2);
  return fixed.replace(/0+$/, "").replace(/\.$/, "");
}

/** `512` → `"512 B"`, `2048` → `"2 KiB"`, `1536` → `"1.5 KiB"`. */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${String(bytes)} B`;

  for (let power = BINARY_UNITS.length; power >= 1; power -= 1) {
    const divider = 1024 ** power;
    if (bytes >= divider) return `${roundNumber(bytes / divider)} ${BINARY_UNITS[power - 1]}`;
  }
  return `${String(bytes)} B`;
}

/** `sha256:0123456789abcdef…` → `0123456789ab`. */
export function trimDigest(digest: string): string {
  return digest.slice(7, 19);
}

/** Strips the shell wrapper Docker and BuildKit put around build instructions. */
export function cleanCreatedBy(createdBy: string): string {
  let cleaned = createdBy.trim();
  if (cleaned.startsWith(LAYER_HISTORY_INSTR_PREFIX)) {
    cleaned = cleaned.slice(LAYER_HISTORY_INSTR_PREFIX.length).trim();
  }
  if (cleaned.endsWith(LAYER_HISTORY_INSTR_SUFFIX_BUILDKIT)) {
    cleaned = cleaned.slice(0, -LAYER_HISTORY_INSTR_SUFFIX_BUILDKIT.length).trim();
  }
  return cleaned;
}

export function truncateLabel(label: string, max = HISTORY_LABEL_MAX): string {
  if (label.length <= max) return label;
  return `${label.slice(0, max - ELLIPSIS.length)}${ELLIPSIS}`;
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2) ?? "null";
}
