import type { ColumnSelector } from "./types";

const INTEGER_REGEX = /^[+-]?\d+$/;

/**
 * Resolve a `delete_column` value into a selector
 *
 * Integer text is a 1-based position; anything else is an exact label.
 * Returns undefined for an empty selector.
 */
export function parseColumnSelector(raw: string): ColumnSelector | undefined {
  const trimmed = raw.trim();
  if (!trimmed) return undefined;

  if (INTEGER_REGEX.test(trimmed)) {
    return { kind: "index", index: Number.parseInt(trimmed, 10) - 1 };
  }

  return { kind: "label", label: raw };
}

/**
 * Text form of a selector, as written to the profile store
 */
export function formatColumnSelector(selector: ColumnSelector): string {
  return selector.kind === "index" ? String(selector.index + 1) : selector.label;
}
