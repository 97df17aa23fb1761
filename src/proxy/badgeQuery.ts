// src/proxy/badgeQuery.ts
/**
 * Builds the label/message/color/style the renderer draws.
 * Callers may override label, color and style through the inbound query;
 * anything unrecognised is ignored rather than forwarded.
 */

import type { BadgeQuery } from "./director";

export const BADGE_STYLES = [
  "flat",
  "flat-square",
  "plastic",
  "for-the-badge",
  "social",
] as const;

const MAX_LABEL_LENGTH = 64;
const COLOR_RE = /^#?[0-9a-zA-Z-]{1,32}$/;

function firstString(v: unknown): string | undefined {
  if (typeof v === "string") return v.trim() || undefined;
  if (Array.isArray(v) && typeof v[0] === "string") return firstString(v[0]);
  return undefined;
}

function isBadgeStyle(v: string): v is (typeof BADGE_STYLES)[number] {
  return BADGE_STYLES.some((s) => s === v);
}

export function buildBadgeQuery(input: {
  displayName: string;
  count: number;
  defaults: { label: string; color: string };
  query?: Record<string, unknown>;
}): BadgeQuery {
  const q = input.query ?? {};

  const label = firstString(q.label);
  const color = firstString(q.color);
  const style = firstString(q.style);

  const badge: BadgeQuery = {
    label:
      label && label.length <= MAX_LABEL_LENGTH
        ? label
        : `${input.displayName} ${input.defaults.label}`,
    message: String(input.count),
    color: color && COLOR_RE.test(color) ? color : input.defaults.color,
  };
  if (style && isBadgeStyle(style)) badge.style = style;
  return badge;
}
