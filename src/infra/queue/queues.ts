/**
 * Hyphen-only names; BullMQ uses colon as its Redis key separator.
 */
export const queueNames = {
  refresh: "metrics-refresh",
} as const;
