import type { Platform } from "./types.js";

/**
 * Parses `os/architecture[/variant]`, e.g. `linux/arm64/v8`.
 * Returns null for anything else.
 */
export function parsePlatform(name: string): Platform | null {
  const parts = name.trim().split("/");
  if (parts.length < 2 || parts.length > 3) return null;
  const [os, architecture, variant] = parts;
  if (!os || !architecture) return null;
  if (variant === undefined) return { os, architecture };
  if (!variant) return null;
  return { os, architecture, variant };
}

export function formatPlatform(platform: Platform): string {
  const base = `${platform.os}/${platform.architecture}`;
  return platform.variant ? `${base}/${platform.variant}` : base;
}

export function samePlatform(a: Platform, b: Platform): boolean {
  return (
    a.os === b.os && a.architecture === b.architecture && (a.variant ?? "") === (b.variant ?? "")
  );
}

/** Attestation manifests in an OCI index are tagged with this platform. */
export function isUnknownPlatform(platform: Platform): boolean {
  return platform.os === "unknown" && platform.architecture === "unknown";
}
